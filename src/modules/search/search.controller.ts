import { Body, Controller, HttpCode, Post } from '@nestjs/common';

import { apiSuccess } from '../../common/http/api-response';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { SafeUser } from '../auth/types/auth.types';
import { searchDtoSchema, type SearchDto } from './dto/search.dto';
import { SearchService } from './search.service';

@Controller('search')
@Auth()
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  @Post()
  @HttpCode(200)
  async search(
    @CurrentUser() user: SafeUser,
    @Body(new ZodValidationPipe(searchDtoSchema))
    body: SearchDto,
  ) {
    const result = await this.searchService.searchAll(user.id, body);

    return apiSuccess(result, 'Search completed');
  }
}
