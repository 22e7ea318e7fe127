import { Inject, Injectable } from '@nestjs/common';
import { desc, eq } from 'drizzle-orm';

import { DRIZZLE, type Database } from '../../common/database/database.module';
import { credentials } from '../../common/database/schema';
import type { RequestContext } from '../../common/http/request-context';
import { ActivityService } from '../activity/activity.service';
import type { ExportFile } from './types/export.types';
import { formatDateStamp, formatIsoDate, toCsv } from './utils/csv.util';

export const CREDENTIALS_EXPORT_HEADER = [
  'TYPE',
  'LABEL',
  'USERNAME',
  'EMAIL',
  'WEBSITE',
  'NOTE',
  'TAGS',
  'CREATED',
] as const;

@Injectable()
export class ExportService {
  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    private readonly activityService: ActivityService,
  ) {}

  /** Exports credential metadata. Encrypted fields are never included. */
  async exportCredentials(
    userId: string,
    context: RequestContext = {},
  ): Promise<ExportFile> {
    const rows = await this.db
      .select({
        type: credentials.type,
        label: credentials.label,
        username: credentials.username,
        email: credentials.email,
        websiteUrl: credentials.websiteUrl,
        note: credentials.note,
        tags: credentials.tags,
        createdAt: credentials.createdAt,
      })
      .from(credentials)
      .where(eq(credentials.userId, userId))
      .orderBy(desc(credentials.updatedAt));

    const content = toCsv([
      CREDENTIALS_EXPORT_HEADER,
      ...rows.map((row) => [
        row.type,
        row.label,
        row.username ?? '',
        row.email ?? '',
        row.websiteUrl ?? '',
        row.note ?? '',
        row.tags ?? '',
        formatIsoDate(row.createdAt),
      ]),
    ]);

    await this.activityService.record(
      userId,
      'export_data',
      `Exported ${rows.length} credentials to CSV`,
      context,
    );

    return {
      filename: `credentials_export_${formatDateStamp(new Date())}.csv`,
      contentType: 'text/csv; charset=utf-8',
      content,
    };
  }
}
