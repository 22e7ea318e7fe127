import { Inject, Injectable } from '@nestjs/common';
import { and, count, desc, eq, ilike, or, type SQL } from 'drizzle-orm';

import { FieldCipherService } from '../../common/crypto/field-cipher.service';
import { DRIZZLE, type Database } from '../../common/database/database.module';
import { containsPattern } from '../../common/database/query.util';
import { secureNotes } from '../../common/database/schema';
import { AppException } from '../../common/errors/app.exception';
import { ERROR_CODE } from '../../common/errors/error-codes';
import {
  buildPagination,
  pageOffset,
  type Paginated,
} from '../../common/http/pagination';
import type { RequestContext } from '../../common/http/request-context';
import { splitTags } from '../../common/utils/tags.util';
import { ActivityService } from '../activity/activity.service';
import type { CreateNoteDto } from './dto/create-note.dto';
import type { ListNotesQuery } from './dto/list-notes.query';
import type { UpdateNoteDto } from './dto/update-note.dto';
import type { NoteDetail, NoteFilter, NoteMetadata } from './types/note.types';

export type NoteRow = typeof secureNotes.$inferSelect;
type NoteUpdate = Partial<typeof secureNotes.$inferInsert>;

@Injectable()
export class NotesService {
  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    private readonly fieldCipher: FieldCipherService,
    private readonly activityService: ActivityService,
  ) {}

  async create(
    userId: string,
    dto: CreateNoteDto,
    context: RequestContext = {},
  ): Promise<NoteDetail> {
    const now = new Date();

    const [created] = await this.db
      .insert(secureNotes)
      .values({
        userId,
        title: dto.title,
        contentEncrypted: this.fieldCipher.encrypt(dto.content),
        type: dto.type,
        isFavorite: dto.isFavorite,
        tags: dto.tags ?? null,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    await this.activityService.record(
      userId,
      'create_note',
      `Created note: ${created.title}`,
      context,
    );

    return this.toNoteDetail(created);
  }

  async list(
    userId: string,
    query: ListNotesQuery,
  ): Promise<Paginated<NoteMetadata>> {
    const where = buildNoteFilter(userId, query);

    const [rows, [totals]] = await Promise.all([
      this.db
        .select()
        .from(secureNotes)
        .where(where)
        .orderBy(desc(secureNotes.updatedAt))
        .limit(query.pageSize)
        .offset(pageOffset(query.page, query.pageSize)),
      this.db.select({ total: count() }).from(secureNotes).where(where),
    ]);

    return {
      items: rows.map(toNoteMetadata),
      pagination: buildPagination(
        query.page,
        query.pageSize,
        totals?.total ?? 0,
      ),
    };
  }

  async search(userId: string, filter: NoteFilter): Promise<NoteMetadata[]> {
    const rows = await this.db
      .select()
      .from(secureNotes)
      .where(buildNoteFilter(userId, filter))
      .orderBy(desc(secureNotes.updatedAt));

    return rows.map(toNoteMetadata);
  }

  async findRecent(userId: string, limit: number): Promise<NoteMetadata[]> {
    const rows = await this.db
      .select()
      .from(secureNotes)
      .where(eq(secureNotes.userId, userId))
      .orderBy(desc(secureNotes.updatedAt))
      .limit(limit);

    return rows.map(toNoteMetadata);
  }

  async findOne(
    userId: string,
    noteId: string,
    context: RequestContext = {},
  ): Promise<NoteDetail> {
    const row = await this.getOwnedNoteOrThrow(userId, noteId);
    const now = new Date();

    await this.db
      .update(secureNotes)
      .set({ lastAccessedAt: now })
      .where(eq(secureNotes.id, row.id));

    await this.activityService.record(
      userId,
      'view_note',
      `Viewed note: ${row.title}`,
      context,
    );

    return this.toNoteDetail({
      ...row,
      lastAccessedAt: now,
    });
  }

  async update(
    userId: string,
    noteId: string,
    dto: UpdateNoteDto,
    context: RequestContext = {},
  ): Promise<NoteDetail> {
    const existing = await this.getOwnedNoteOrThrow(userId, noteId);

    const updates: NoteUpdate = {
      updatedAt: new Date(),
    };

    if (dto.title !== undefined) {
      updates.title = dto.title;
    }

    if (dto.content !== undefined) {
      updates.contentEncrypted = this.fieldCipher.encrypt(dto.content);
    }

    if (dto.type !== undefined) {
      updates.type = dto.type;
    }

    if (dto.isFavorite !== undefined) {
      updates.isFavorite = dto.isFavorite;
    }

    if (dto.tags !== undefined) {
      updates.tags = dto.tags;
    }

    const [updated] = await this.db
      .update(secureNotes)
      .set(updates)
      .where(eq(secureNotes.id, existing.id))
      .returning();

    await this.activityService.record(
      userId,
      'update_note',
      `Updated note: ${updated.title}`,
      context,
    );

    return this.toNoteDetail(updated);
  }

  async toggleFavorite(userId: string, noteId: string): Promise<boolean> {
    const existing = await this.getOwnedNoteOrThrow(userId, noteId);
    const isFavorite = !existing.isFavorite;

    await this.db
      .update(secureNotes)
      .set({ isFavorite })
      .where(eq(secureNotes.id, existing.id));

    return isFavorite;
  }

  async remove(
    userId: string,
    noteId: string,
    context: RequestContext = {},
  ): Promise<void> {
    const existing = await this.getOwnedNoteOrThrow(userId, noteId);

    await this.db.delete(secureNotes).where(eq(secureNotes.id, existing.id));

    await this.activityService.record(
      userId,
      'delete_note',
      `Deleted note: ${existing.title}`,
      context,
    );
  }

  private async getOwnedNoteOrThrow(
    userId: string,
    noteId: string,
  ): Promise<NoteRow> {
    const [row] = await this.db
      .select()
      .from(secureNotes)
      .where(and(eq(secureNotes.id, noteId), eq(secureNotes.userId, userId)))
      .limit(1);

    if (!row) {
      throw AppException.notFound('Note not found', ERROR_CODE.NOTE_NOT_FOUND);
    }

    return row;
  }

  private toNoteDetail(row: NoteRow): NoteDetail {
    return {
      ...toNoteMetadata(row),
      content: this.fieldCipher.decrypt(row.contentEncrypted) ?? null,
    };
  }
}

export function buildNoteFilter(
  userId: string,
  filter: NoteFilter,
): SQL | undefined {
  const conditions: Array<SQL | undefined> = [eq(secureNotes.userId, userId)];
  const search = filter.query?.trim();

  if (search) {
    const pattern = containsPattern(search);

    conditions.push(
      or(ilike(secureNotes.title, pattern), ilike(secureNotes.tags, pattern)),
    );
  }

  if (filter.favoritesOnly) {
    conditions.push(eq(secureNotes.isFavorite, true));
  }

  return and(...conditions);
}

export function toNoteMetadata(row: NoteRow): NoteMetadata {
  return {
    id: row.id,
    title: row.title,
    type: row.type,
    isFavorite: row.isFavorite,
    tags: splitTags(row.tags),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    lastAccessedAt: row.lastAccessedAt ?? null,
  };
}
