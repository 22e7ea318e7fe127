import type { RequestContext } from '../../../common/http/request-context';

export type SafeUser = {
  id: string;
  email: string;
  displayName: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
  lastLoginAt: Date | null;
};

export type SessionRecord = {
  userId: string;
  createdAt: string;
  lastSeenAt: string;
  userAgent?: string;
  ip?: string;
};

export type SessionContext = RequestContext;

export type AuthResult = {
  user: SafeUser;
  sessionToken: string;
  sessionCookieName: string;
  sessionTtlSeconds: number;
};
