import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';

import { apiSuccess } from '../../common/http/api-response';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { SafeUser } from '../auth/types/auth.types';
import {
  toggleFavoriteDtoSchema,
  type ToggleFavoriteDto,
} from './dto/toggle-favorite.dto';
import { FavoritesService } from './favorites.service';

@Controller('favorites')
@Auth()
export class FavoritesController {
  constructor(private readonly favoritesService: FavoritesService) {}

  @Get()
  async findAll(@CurrentUser() user: SafeUser) {
    const favorites = await this.favoritesService.findAll(user.id);

    return apiSuccess(favorites, 'Favorites fetched');
  }

  @Post('toggle')
  @HttpCode(200)
  async toggle(
    @CurrentUser() user: SafeUser,
    @Body(new ZodValidationPipe(toggleFavoriteDtoSchema))
    body: ToggleFavoriteDto,
  ) {
    const isFavorite = await this.favoritesService.toggle(user.id, body);

    return apiSuccess({ isFavorite }, 'Favorite updated');
  }
}
