import { Inject, Injectable } from '@nestjs/common';
import { desc, eq } from 'drizzle-orm';

import { DRIZZLE, type Database } from '../../common/database/database.module';
import { activityLogs } from '../../common/database/schema';
import type { RequestContext } from '../../common/http/request-context';
import type { ActivityAction, ActivityEntry } from './types/activity.types';

type ActivityLogRow = typeof activityLogs.$inferSelect;

const DEFAULT_ACTIVITY_LIMIT = 50;

@Injectable()
export class ActivityService {
  constructor(@Inject(DRIZZLE) private readonly db: Database) {}

  async record(
    userId: string,
    action: ActivityAction,
    description: string,
    context: RequestContext = {},
  ): Promise<void> {
    await this.db.insert(activityLogs).values({
      userId,
      action,
      description,
      ipAddress: context.ip ?? null,
      userAgent: context.userAgent ?? null,
      createdAt: new Date(),
    });
  }

  async list(
    userId: string,
    limit = DEFAULT_ACTIVITY_LIMIT,
  ): Promise<ActivityEntry[]> {
    const rows = await this.db
      .select()
      .from(activityLogs)
      .where(eq(activityLogs.userId, userId))
      .orderBy(desc(activityLogs.createdAt))
      .limit(limit);

    return rows.map(toActivityEntry);
  }
}

function toActivityEntry(row: ActivityLogRow): ActivityEntry {
  return {
    id: row.id,
    action: row.action,
    description: row.description,
    ipAddress: row.ipAddress ?? null,
    createdAt: row.createdAt,
  };
}
