import { Inject, Injectable } from '@nestjs/common';
import { asc, count, desc, eq, sql } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';

import { DRIZZLE, type Database } from '../../common/database/database.module';
import { credentials, secureNotes } from '../../common/database/schema';
import { ActivityService } from '../activity/activity.service';
import { CredentialsService } from '../credentials/credentials.service';
import { NotesService } from '../notes/notes.service';
import type {
  CredentialTypeCount,
  DashboardStats,
} from './types/dashboard.types';

const RECENT_ITEMS_LIMIT = 5;
const TOP_CREDENTIAL_TYPES_LIMIT = 5;

type ItemTotals = {
  total: number;
  favorites: number;
};

@Injectable()
export class DashboardService {
  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    private readonly credentialsService: CredentialsService,
    private readonly notesService: NotesService,
    private readonly activityService: ActivityService,
  ) {}

  async getStats(userId: string): Promise<DashboardStats> {
    const [
      credentialTotals,
      noteTotals,
      credentialTypes,
      recentActivities,
      recentCredentials,
      recentNotes,
    ] = await Promise.all([
      this.countCredentials(userId),
      this.countNotes(userId),
      this.countCredentialTypes(userId),
      this.activityService.list(userId, RECENT_ITEMS_LIMIT),
      this.credentialsService.findRecent(userId, RECENT_ITEMS_LIMIT),
      this.notesService.findRecent(userId, RECENT_ITEMS_LIMIT),
    ]);

    return {
      totalCredentials: credentialTotals.total,
      totalNotes: noteTotals.total,
      favoriteCredentials: credentialTotals.favorites,
      favoriteNotes: noteTotals.favorites,
      recentActivities,
      recentCredentials,
      recentNotes,
      credentialTypes,
    };
  }

  private async countCredentials(userId: string): Promise<ItemTotals> {
    const [row] = await this.db
      .select({
        total: count(),
        favorites: countWhere(credentials.isFavorite),
      })
      .from(credentials)
      .where(eq(credentials.userId, userId));

    return row ?? { total: 0, favorites: 0 };
  }

  private async countNotes(userId: string): Promise<ItemTotals> {
    const [row] = await this.db
      .select({
        total: count(),
        favorites: countWhere(secureNotes.isFavorite),
      })
      .from(secureNotes)
      .where(eq(secureNotes.userId, userId));

    return row ?? { total: 0, favorites: 0 };
  }

  private async countCredentialTypes(
    userId: string,
  ): Promise<CredentialTypeCount[]> {
    const rows = await this.db
      .select({
        type: credentials.type,
        count: count(),
      })
      .from(credentials)
      .where(eq(credentials.userId, userId))
      .groupBy(credentials.type)
      .orderBy(desc(count()), asc(credentials.type))
      .limit(TOP_CREDENTIAL_TYPES_LIMIT);

    return rows.map((row) => ({ type: row.type, count: row.count }));
  }
}

function countWhere(condition: AnyPgColumn) {
  return sql<number>`count(*) filter (where ${condition})`.mapWith(Number);
}
