import { HttpException, HttpStatus } from '@nestjs/common';

import { ERROR_CODE, type ErrorCode } from './error-codes';

export type AppErrorBody = {
  message: string;
  code: ErrorCode;
  details?: unknown;
};

export class AppException extends HttpException {
  readonly code: ErrorCode;

  constructor(statusCode: number, body: AppErrorBody) {
    super(
      {
        message: body.message,
        code: body.code,
        ...(body.details !== undefined ? { details: body.details } : {}),
      },
      statusCode,
    );
    this.code = body.code;
  }

  static notFound(
    message: string,
    code: ErrorCode = ERROR_CODE.NOT_FOUND,
  ): AppException {
    return new AppException(HttpStatus.NOT_FOUND, { message, code });
  }

  static unauthorized(
    message = 'Not authenticated',
    code: ErrorCode = ERROR_CODE.AUTH_UNAUTHORIZED,
  ): AppException {
    return new AppException(HttpStatus.UNAUTHORIZED, { message, code });
  }

  static validation(message: string, details: unknown): AppException {
    return new AppException(HttpStatus.BAD_REQUEST, {
      message,
      code: ERROR_CODE.VALIDATION_ERROR,
      details,
    });
  }
}
