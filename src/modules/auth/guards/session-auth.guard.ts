import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';

import { AppException } from '../../../common/errors/app.exception';
import { getCookie } from '../../../common/http/request-context';
import { AuthService } from '../auth.service';
import type { AuthenticatedRequest } from '../types/auth-request.types';

@Injectable()
export class SessionAuthGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const sessionToken = getCookie(req, this.authService.getSessionCookieName());

    if (!sessionToken) {
      throw AppException.unauthorized();
    }

    const user = await this.authService.getCurrentUser(sessionToken);

    req.auth = { sessionToken, user };

    return true;
  }
}
