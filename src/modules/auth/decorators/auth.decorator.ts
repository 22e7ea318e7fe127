import { applyDecorators, UseGuards } from '@nestjs/common';
import { ApiCookieAuth, ApiUnauthorizedResponse } from '@nestjs/swagger';

import { SESSION_COOKIE_NAME } from '../auth.constants';
import { SessionAuthGuard } from '../guards/session-auth.guard';

/** Requires a live session cookie; documents the cookie in the OpenAPI output. */
export function Auth() {
  return applyDecorators(
    UseGuards(SessionAuthGuard),
    ApiCookieAuth(SESSION_COOKIE_NAME),
    ApiUnauthorizedResponse({ description: 'Missing or expired session' }),
  );
}
