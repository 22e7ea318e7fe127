import { Controller, Get } from '@nestjs/common';

import { apiSuccess } from '../../common/http/api-response';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { SafeUser } from '../auth/types/auth.types';
import { DashboardService } from './dashboard.service';

@Controller('dashboard')
@Auth()
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get('stats')
  async stats(@CurrentUser() user: SafeUser) {
    const stats = await this.dashboardService.getStats(user.id);

    return apiSuccess({ stats }, 'Dashboard stats fetched');
  }
}
