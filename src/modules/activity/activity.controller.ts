import { Controller, Get, Query } from '@nestjs/common';

import { apiSuccess } from '../../common/http/api-response';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { SafeUser } from '../auth/types/auth.types';
import { ActivityService } from './activity.service';
import {
  listActivityQuerySchema,
  type ListActivityQuery,
} from './dto/list-activity.query';

@Controller('activity')
@Auth()
export class ActivityController {
  constructor(private readonly activityService: ActivityService) {}

  @Get()
  async list(
    @CurrentUser() user: SafeUser,
    @Query(new ZodValidationPipe(listActivityQuerySchema))
    query: ListActivityQuery,
  ) {
    const activities = await this.activityService.list(user.id, query.limit);

    return apiSuccess({ activities }, 'Activity fetched', {
      pagination: { total: activities.length },
    });
  }
}
