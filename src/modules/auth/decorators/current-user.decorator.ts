import { createParamDecorator, ExecutionContext } from '@nestjs/common';

import { AppException } from '../../../common/errors/app.exception';
import type { AuthenticatedRequest } from '../types/auth-request.types';
import type { SafeUser } from '../types/auth.types';

export function resolveCurrentUser(
  field: keyof SafeUser | undefined,
  req: AuthenticatedRequest,
): SafeUser | SafeUser[keyof SafeUser] {
  const user = req.auth?.user;

  if (!user) {
    throw AppException.unauthorized();
  }

  return field ? user[field] : user;
}

/** `@CurrentUser()` injects the session user; `@CurrentUser('id')` one field. */
export const CurrentUser = createParamDecorator(
  (field: keyof SafeUser | undefined, ctx: ExecutionContext) =>
    resolveCurrentUser(
      field,
      ctx.switchToHttp().getRequest<AuthenticatedRequest>(),
    ),
);
