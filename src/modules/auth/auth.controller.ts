import {
  Body,
  Controller,
  Get,
  HttpCode,
  Patch,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import { apiSuccess } from '../../common/http/api-response';
import {
  getCookie,
  getRequestContext,
} from '../../common/http/request-context';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { AuthService } from './auth.service';
import { Auth } from './decorators/auth.decorator';
import { CurrentUser } from './decorators/current-user.decorator';
import { loginAuthDtoSchema, type LoginAuthDto } from './dto/login-auth.dto';
import {
  registerAuthDtoSchema,
  type RegisterAuthDto,
} from './dto/register-auth.dto';
import {
  updatePasswordDtoSchema,
  type UpdatePasswordDto,
} from './dto/update-password.dto';
import type { AuthResult, SafeUser } from './types/auth.types';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  async register(
    @Body(new ZodValidationPipe(registerAuthDtoSchema))
    body: RegisterAuthDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ) {
    const result = await this.authService.register(
      body,
      getRequestContext(req),
    );

    this.setSessionCookie(res, result);

    return apiSuccess({ user: result.user }, 'Registered successfully');
  }

  @Post('login')
  @HttpCode(200)
  async login(
    @Body(new ZodValidationPipe(loginAuthDtoSchema))
    body: LoginAuthDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ) {
    const result = await this.authService.login(body, getRequestContext(req));

    this.setSessionCookie(res, result);

    return apiSuccess({ user: result.user }, 'Logged in successfully');
  }

  @Get('me')
  @Auth()
  async me(@CurrentUser() user: SafeUser) {
    return apiSuccess({ user }, 'Authenticated user fetched');
  }

  @Patch('password')
  @Auth()
  async updatePassword(
    @CurrentUser() user: SafeUser,
    @Body(new ZodValidationPipe(updatePasswordDtoSchema))
    body: UpdatePasswordDto,
  ) {
    await this.authService.updatePassword(user.id, body);

    return apiSuccess(null, 'Password updated successfully');
  }

  @Post('logout')
  @HttpCode(200)
  async logout(
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ) {
    const cookieName = this.authService.getSessionCookieName();
    const sessionToken = getCookie(req, cookieName);

    await this.authService.logout(sessionToken, getRequestContext(req));

    res.clearCookie(cookieName, {
      ...this.authService.getSessionCookieOptions(0),
      maxAge: undefined,
    });

    return apiSuccess(null, 'Logged out successfully');
  }

  private setSessionCookie(res: Response, result: AuthResult): void {
    res.cookie(
      result.sessionCookieName,
      result.sessionToken,
      this.authService.getSessionCookieOptions(result.sessionTtlSeconds),
    );
  }
}
