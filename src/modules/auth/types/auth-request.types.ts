import type { Request } from 'express';

import type { SafeUser } from './auth.types';

/** Set on the request by SessionAuthGuard once the session resolves. */
export type AuthState = {
  sessionToken: string;
  user: SafeUser;
};

export type AuthenticatedRequest = Request & {
  auth?: AuthState;
};
