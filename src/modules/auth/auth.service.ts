import { HttpStatus, Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { eq } from 'drizzle-orm';
import { randomBytes } from 'node:crypto';

import { DRIZZLE, type Database } from '../../common/database/database.module';
import { userLogins, users } from '../../common/database/schema';
import { AppException } from '../../common/errors/app.exception';
import { ERROR_CODE } from '../../common/errors/error-codes';
import { REDIS_CLIENT } from '../../common/redis/redis.provider';
import type { RedisClient } from '../../common/redis/redis.provider';
import { ActivityService } from '../activity/activity.service';
import {
  DEFAULT_SESSION_TTL_SECONDS,
  SESSION_COOKIE_NAME,
  SESSION_KEY_PREFIX,
} from './auth.constants';
import type { LoginAuthDto } from './dto/login-auth.dto';
import type { RegisterAuthDto } from './dto/register-auth.dto';
import type { UpdatePasswordDto } from './dto/update-password.dto';
import type {
  AuthResult,
  SafeUser,
  SessionContext,
  SessionRecord,
} from './types/auth.types';
import { hashPassword, verifyPassword } from './utils/password.util';


@Injectable()
export class AuthService {
  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    @Inject(REDIS_CLIENT) private readonly redis: RedisClient,
    private readonly configService: ConfigService,
    private readonly activityService: ActivityService,
  ) {}

  async register(
    input: RegisterAuthDto,
    sessionContext: SessionContext = {},
  ): Promise<AuthResult> {
    const normalizedEmail = normalizeEmail(input.email);

    const [existingUser] = await this.db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.email, normalizedEmail))
      .limit(1);

    if (existingUser) {
      throw new AppException(HttpStatus.CONFLICT, {
        message: 'Email is already registered',
        code: ERROR_CODE.AUTH_EMAIL_ALREADY_REGISTERED,
      });
    }

    const passwordHash = await hashPassword(input.password);
    const now = new Date();

    const createdUser = await this.db.transaction(async (tx) => {
      const [user] = await tx
        .insert(users)
        .values({
          email: normalizedEmail,
          displayName: input.displayName ?? null,
          lastLoginAt: now,
          createdAt: now,
          updatedAt: now,
        })
        .returning();

      await tx.insert(userLogins).values({
        userId: user.id,
        passwordHash,
        createdAt: now,
        updatedAt: now,
        passwordUpdatedAt: now,
      });

      return user;
    });

    const session = await this.createSession(createdUser.id, sessionContext);

    await this.activityService.record(
      createdUser.id,
      'login',
      'Registered and signed in',
      sessionContext,
    );

    return {
      user: mapSafeUser(createdUser),
      sessionToken: session.token,
      sessionCookieName: SESSION_COOKIE_NAME,
      sessionTtlSeconds: session.ttlSeconds,
    };
  }

  async login(
    input: LoginAuthDto,
    sessionContext: SessionContext = {},
  ): Promise<AuthResult> {
    const normalizedEmail = normalizeEmail(input.email);

    const [record] = await this.db
      .select({
        user: users,
        login: userLogins,
      })
      .from(users)
      .innerJoin(userLogins, eq(userLogins.userId, users.id))
      .where(eq(users.email, normalizedEmail))
      .limit(1);

    if (!record) {
      throw AppException.unauthorized(
        'Invalid email or password',
        ERROR_CODE.AUTH_INVALID_CREDENTIALS,
      );
    }

    if (!record.user.isActive) {
      throw new AppException(HttpStatus.FORBIDDEN, {
        message: 'Account is disabled',
        code: ERROR_CODE.AUTH_ACCOUNT_DISABLED,
      });
    }

    const isValidPassword = await verifyPassword(
      input.password,
      record.login.passwordHash,
    );

    if (!isValidPassword) {
      throw AppException.unauthorized(
        'Invalid email or password',
        ERROR_CODE.AUTH_INVALID_CREDENTIALS,
      );
    }

    const now = new Date();

    await this.db
      .update(users)
      .set({
        lastLoginAt: now,
        updatedAt: now,
      })
      .where(eq(users.id, record.user.id));

    const session = await this.createSession(record.user.id, sessionContext);

    await this.activityService.record(
      record.user.id,
      'login',
      'Signed in',
      sessionContext,
    );

    return {
      user: {
        ...mapSafeUser(record.user),
        lastLoginAt: now,
        updatedAt: now,
      },
      sessionToken: session.token,
      sessionCookieName: SESSION_COOKIE_NAME,
      sessionTtlSeconds: session.ttlSeconds,
    };
  }

  async updatePassword(
    userId: string,
    input: UpdatePasswordDto,
  ): Promise<void> {
    const [login] = await this.db
      .select()
      .from(userLogins)
      .where(eq(userLogins.userId, userId))
      .limit(1);

    if (!login) {
      throw AppException.unauthorized();
    }

    const isValid = await verifyPassword(
      input.currentPassword,
      login.passwordHash,
    );

    if (!isValid) {
      throw AppException.unauthorized(
        'Current password is incorrect',
        ERROR_CODE.AUTH_CURRENT_PASSWORD_INVALID,
      );
    }

    const passwordHash = await hashPassword(input.newPassword);
    const now = new Date();

    await this.db.transaction(async (tx) => {
      await tx
        .update(userLogins)
        .set({
          passwordHash,
          updatedAt: now,
          passwordUpdatedAt: now,
        })
        .where(eq(userLogins.userId, userId));

      await tx
        .update(users)
        .set({ updatedAt: now })
        .where(eq(users.id, userId));
    });
  }

  async getCurrentUser(sessionToken: string): Promise<SafeUser> {
    const session = await this.readSession(sessionToken);

    if (!session) {
      throw AppException.unauthorized(
        'Session is invalid or expired',
        ERROR_CODE.AUTH_SESSION_INVALID,
      );
    }

    const [user] = await this.db
      .select()
      .from(users)
      .where(eq(users.id, session.userId))
      .limit(1);

    if (!user || !user.isActive) {
      await this.deleteSession(sessionToken);
      throw AppException.unauthorized(
        'Session is invalid or expired',
        ERROR_CODE.AUTH_SESSION_INVALID,
      );
    }

    await this.touchSession(sessionToken, session);

    return mapSafeUser(user);
  }

  async logout(
    sessionToken: string | null,
    sessionContext: SessionContext = {},
  ): Promise<void> {
    if (!sessionToken) {
      return;
    }

    const session = await this.readSession(sessionToken);

    await this.deleteSession(sessionToken);

    if (session) {
      await this.activityService.record(
        session.userId,
        'logout',
        'Signed out',
        sessionContext,
      );
    }
  }

  getSessionCookieName(): string {
    return SESSION_COOKIE_NAME;
  }

  getSessionCookieOptions(ttlSeconds: number) {
    const isProduction =
      this.configService.get<string>('NODE_ENV', 'development') ===
      'production';

    return {
      httpOnly: true,
      secure: isProduction,
      sameSite: 'lax' as const,
      path: '/',
      maxAge: ttlSeconds * 1000,
    };
  }

  private getSessionTtlSeconds(): number {
    const raw = this.configService.get<string>('AUTH_SESSION_TTL_SECONDS');
    const parsed = raw ? Number.parseInt(raw, 10) : NaN;

    if (Number.isFinite(parsed) && parsed > 0) {
      return parsed;
    }

    return DEFAULT_SESSION_TTL_SECONDS;
  }

  private async createSession(userId: string, context: SessionContext) {
    const token = randomBytes(32).toString('hex');
    const nowIso = new Date().toISOString();
    const ttlSeconds = this.getSessionTtlSeconds();
    const payload: SessionRecord = {
      userId,
      createdAt: nowIso,
      lastSeenAt: nowIso,
      ...(context.userAgent ? { userAgent: context.userAgent } : {}),
      ...(context.ip ? { ip: context.ip } : {}),
    };

    await this.redis.set(
      this.getSessionKey(token),
      JSON.stringify(payload),
      'EX',
      ttlSeconds,
    );

    return { token, ttlSeconds };
  }

  private async readSession(token: string): Promise<SessionRecord | null> {
    const raw = await this.redis.get(this.getSessionKey(token));

    if (!raw) {
      return null;
    }

    const session = parseSessionRecord(raw);

    if (!session) {
      await this.deleteSession(token);
    }

    return session;
  }

  private async touchSession(
    token: string,
    session: SessionRecord,
  ): Promise<void> {
    const ttlSeconds = this.getSessionTtlSeconds();
    const next: SessionRecord = {
      ...session,
      lastSeenAt: new Date().toISOString(),
    };

    await this.redis.set(
      this.getSessionKey(token),
      JSON.stringify(next),
      'EX',
      ttlSeconds,
    );
  }

  private async deleteSession(token: string): Promise<void> {
    await this.redis.del(this.getSessionKey(token));
  }

  private getSessionKey(token: string): string {
    return `${SESSION_KEY_PREFIX}${token}`;
  }
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function mapSafeUser(user: typeof users.$inferSelect): SafeUser {
  return {
    id: user.id,
    email: user.email,
    displayName: user.displayName ?? null,
    isActive: user.isActive,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
    lastLoginAt: user.lastLoginAt ?? null,
  };
}

function parseSessionRecord(raw: string): SessionRecord | null {
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    !parsed ||
    typeof parsed !== 'object' ||
    !('userId' in parsed) ||
    typeof parsed.userId !== 'string' ||
    !('createdAt' in parsed) ||
    typeof parsed.createdAt !== 'string'
  ) {
    return null;
  }

  return {
    userId: parsed.userId,
    createdAt: parsed.createdAt,
    lastSeenAt:
      'lastSeenAt' in parsed && typeof parsed.lastSeenAt === 'string'
        ? parsed.lastSeenAt
        : parsed.createdAt,
    ...('userAgent' in parsed && typeof parsed.userAgent === 'string'
      ? { userAgent: parsed.userAgent }
      : {}),
    ...('ip' in parsed && typeof parsed.ip === 'string'
      ? { ip: parsed.ip }
      : {}),
  };
}
