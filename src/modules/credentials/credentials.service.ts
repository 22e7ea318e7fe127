import { Inject, Injectable } from '@nestjs/common';
import { and, count, desc, eq, ilike, or, type SQL } from 'drizzle-orm';

import { FieldCipherService } from '../../common/crypto/field-cipher.service';
import { DRIZZLE, type Database } from '../../common/database/database.module';
import { containsPattern } from '../../common/database/query.util';
import { credentials } from '../../common/database/schema';
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
import type { CreateCredentialDto } from './dto/create-credential.dto';
import type { ListCredentialsQuery } from './dto/list-credentials.query';
import type { UpdateCredentialDto } from './dto/update-credential.dto';
import type {
  CredentialDetail,
  CredentialFilter,
  CredentialMetadata,
} from './types/credential.types';

export type CredentialRow = typeof credentials.$inferSelect;
type CredentialUpdate = Partial<typeof credentials.$inferInsert>;

@Injectable()
export class CredentialsService {
  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    private readonly fieldCipher: FieldCipherService,
    private readonly activityService: ActivityService,
  ) {}

  async create(
    userId: string,
    dto: CreateCredentialDto,
    context: RequestContext = {},
  ): Promise<CredentialDetail> {
    const now = new Date();

    const [created] = await this.db
      .insert(credentials)
      .values({
        userId,
        label: dto.label,
        type: dto.type,
        websiteUrl: dto.websiteUrl ?? null,
        username: dto.username ?? null,
        email: dto.email ?? null,
        passwordEncrypted: this.seal(dto.password),
        secretKeyEncrypted: this.seal(dto.secretKey),
        note: dto.note ?? null,
        isFavorite: dto.isFavorite,
        tags: dto.tags ?? null,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    await this.activityService.record(
      userId,
      'create_credential',
      `Created credential: ${created.label}`,
      context,
    );

    return this.toCredentialDetail(created);
  }

  async list(
    userId: string,
    query: ListCredentialsQuery,
  ): Promise<Paginated<CredentialMetadata>> {
    const where = buildCredentialFilter(userId, query);

    const [rows, [totals]] = await Promise.all([
      this.db
        .select()
        .from(credentials)
        .where(where)
        .orderBy(desc(credentials.updatedAt))
        .limit(query.pageSize)
        .offset(pageOffset(query.page, query.pageSize)),
      this.db.select({ total: count() }).from(credentials).where(where),
    ]);

    return {
      items: rows.map(toCredentialMetadata),
      pagination: buildPagination(
        query.page,
        query.pageSize,
        totals?.total ?? 0,
      ),
    };
  }

  /** Unpaginated filter used by search and the favorites view. */
  async search(
    userId: string,
    filter: CredentialFilter,
  ): Promise<CredentialMetadata[]> {
    const rows = await this.db
      .select()
      .from(credentials)
      .where(buildCredentialFilter(userId, filter))
      .orderBy(desc(credentials.updatedAt));

    return rows.map(toCredentialMetadata);
  }

  async findRecent(
    userId: string,
    limit: number,
  ): Promise<CredentialMetadata[]> {
    const rows = await this.db
      .select()
      .from(credentials)
      .where(eq(credentials.userId, userId))
      .orderBy(desc(credentials.updatedAt))
      .limit(limit);

    return rows.map(toCredentialMetadata);
  }

  async findOne(
    userId: string,
    credentialId: string,
    context: RequestContext = {},
  ): Promise<CredentialDetail> {
    const row = await this.getOwnedCredentialOrThrow(userId, credentialId);
    const now = new Date();

    await this.db
      .update(credentials)
      .set({ lastAccessedAt: now })
      .where(eq(credentials.id, row.id));

    await this.activityService.record(
      userId,
      'view_credential',
      `Viewed credential: ${row.label}`,
      context,
    );

    return this.toCredentialDetail({
      ...row,
      lastAccessedAt: now,
    });
  }

  async update(
    userId: string,
    credentialId: string,
    dto: UpdateCredentialDto,
    context: RequestContext = {},
  ): Promise<CredentialDetail> {
    const existing = await this.getOwnedCredentialOrThrow(
      userId,
      credentialId,
    );

    const updates: CredentialUpdate = {
      updatedAt: new Date(),
    };

    if (dto.label !== undefined) {
      updates.label = dto.label;
    }

    if (dto.type !== undefined) {
      updates.type = dto.type;
    }

    if (dto.websiteUrl !== undefined) {
      updates.websiteUrl = dto.websiteUrl;
    }

    if (dto.username !== undefined) {
      updates.username = dto.username || null;
    }

    if (dto.email !== undefined) {
      updates.email = dto.email;
    }

    if (dto.password !== undefined) {
      updates.passwordEncrypted = this.seal(dto.password);
    }

    if (dto.secretKey !== undefined) {
      updates.secretKeyEncrypted = this.seal(dto.secretKey);
    }

    if (dto.note !== undefined) {
      updates.note = dto.note || null;
    }

    if (dto.isFavorite !== undefined) {
      updates.isFavorite = dto.isFavorite;
    }

    if (dto.tags !== undefined) {
      updates.tags = dto.tags;
    }

    const [updated] = await this.db
      .update(credentials)
      .set(updates)
      .where(eq(credentials.id, existing.id))
      .returning();

    await this.activityService.record(
      userId,
      'update_credential',
      `Updated credential: ${updated.label}`,
      context,
    );

    return this.toCredentialDetail(updated);
  }

  async toggleFavorite(userId: string, credentialId: string): Promise<boolean> {
    const existing = await this.getOwnedCredentialOrThrow(
      userId,
      credentialId,
    );
    const isFavorite = !existing.isFavorite;

    await this.db
      .update(credentials)
      .set({ isFavorite })
      .where(eq(credentials.id, existing.id));

    return isFavorite;
  }

  async remove(
    userId: string,
    credentialId: string,
    context: RequestContext = {},
  ): Promise<void> {
    const existing = await this.getOwnedCredentialOrThrow(
      userId,
      credentialId,
    );

    await this.db.delete(credentials).where(eq(credentials.id, existing.id));

    await this.activityService.record(
      userId,
      'delete_credential',
      `Deleted credential: ${existing.label}`,
      context,
    );
  }

  private async getOwnedCredentialOrThrow(
    userId: string,
    credentialId: string,
  ): Promise<CredentialRow> {
    const [row] = await this.db
      .select()
      .from(credentials)
      .where(
        and(eq(credentials.id, credentialId), eq(credentials.userId, userId)),
      )
      .limit(1);

    if (!row) {
      throw AppException.notFound('Credential not found', ERROR_CODE.CREDENTIAL_NOT_FOUND);
    }

    return row;
  }

  /** Encrypts a secret for storage; empty and absent values store as null. */
  private seal(value: string | null | undefined): string | null {
    return this.fieldCipher.encrypt(value) || null;
  }

  private toCredentialDetail(row: CredentialRow): CredentialDetail {
    return {
      ...toCredentialMetadata(row),
      note: row.note ?? null,
      password: this.fieldCipher.decrypt(row.passwordEncrypted) ?? null,
      secretKey: this.fieldCipher.decrypt(row.secretKeyEncrypted) ?? null,
    };
  }
}

export function buildCredentialFilter(
  userId: string,
  filter: CredentialFilter,
): SQL | undefined {
  const conditions: Array<SQL | undefined> = [eq(credentials.userId, userId)];
  const search = filter.query?.trim();

  if (search) {
    const pattern = containsPattern(search);

    conditions.push(
      or(
        ilike(credentials.label, pattern),
        ilike(credentials.username, pattern),
        ilike(credentials.email, pattern),
        ilike(credentials.note, pattern),
        ilike(credentials.tags, pattern),
      ),
    );
  }

  if (filter.type && filter.type !== 'all') {
    conditions.push(eq(credentials.type, filter.type));
  }

  if (filter.favoritesOnly) {
    conditions.push(eq(credentials.isFavorite, true));
  }

  return and(...conditions);
}

export function toCredentialMetadata(row: CredentialRow): CredentialMetadata {
  return {
    id: row.id,
    label: row.label,
    type: row.type,
    websiteUrl: row.websiteUrl ?? null,
    username: row.username ?? null,
    email: row.email ?? null,
    isFavorite: row.isFavorite,
    tags: splitTags(row.tags),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    lastAccessedAt: row.lastAccessedAt ?? null,
  };
}
