import { Controller, Get, Req, Res } from '@nestjs/common';
import type { Request, Response } from 'express';

import { getRequestContext } from '../../common/http/request-context';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { SafeUser } from '../auth/types/auth.types';
import { ExportService } from './export.service';

@Controller('export')
@Auth()
export class ExportController {
  constructor(private readonly exportService: ExportService) {}

  // Raw response: the CSV body must bypass the JSON response envelope.
  @Get('credentials')
  async exportCredentials(
    @CurrentUser() user: SafeUser,
    @Req() req: Request,
    @Res() res: Response,
  ): Promise<void> {
    const file = await this.exportService.exportCredentials(
      user.id,
      getRequestContext(req),
    );

    res.setHeader('Content-Type', file.contentType);
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="${file.filename}"`,
    );
    res.send(file.content);
  }
}
