import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import {
  ERROR_CODE,
  isErrorCode,
  type ErrorCode,
} from '../errors/error-codes';
import {
  buildResponseMeta,
  type ApiErrorResponse,
} from '../http/api-response';

export type ParsedException = {
  statusCode: number;
  message: string;
  code: ErrorCode;
  details?: unknown;
};

const STATUS_ERROR_CODES: Partial<Record<number, ErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: ERROR_CODE.BAD_REQUEST,
  [HttpStatus.UNAUTHORIZED]: ERROR_CODE.UNAUTHORIZED,
  [HttpStatus.FORBIDDEN]: ERROR_CODE.FORBIDDEN,
  [HttpStatus.NOT_FOUND]: ERROR_CODE.NOT_FOUND,
  [HttpStatus.CONFLICT]: ERROR_CODE.CONFLICT,
};

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const parsed = parseException(exception);

    if (parsed.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.originalUrl ?? request.url} failed: ${
          exception instanceof Error ? exception.message : String(exception)
        }`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const body: ApiErrorResponse = {
      success: false,
      message: parsed.message,
      error: {
        code: parsed.code,
        statusCode: parsed.statusCode,
        ...(parsed.details !== undefined ? { details: parsed.details } : {}),
      },
      meta: buildResponseMeta(request),
    };

    response.status(parsed.statusCode).json(body);
  }
}

export function parseException(exception: unknown): ParsedException {
  if (!(exception instanceof HttpException)) {
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      code: ERROR_CODE.INTERNAL_SERVER_ERROR,
    };
  }

  const statusCode = exception.getStatus();
  const payload = exception.getResponse();
  const fallbackCode = mapStatusToErrorCode(statusCode);

  if (typeof payload === 'string') {
    return { statusCode, message: payload, code: fallbackCode };
  }

  // Nest's built-in exceptions put validation messages in an array.
  const message =
    'message' in payload
      ? normalizeMessage(payload.message, exception.message)
      : exception.message;
  const code =
    'code' in payload && isErrorCode(payload.code) ? payload.code : fallbackCode;
  const details =
    'details' in payload
      ? payload.details
      : 'message' in payload && Array.isArray(payload.message)
        ? payload.message
        : undefined;

  return {
    statusCode,
    message,
    code,
    ...(details !== undefined ? { details } : {}),
  };
}

function normalizeMessage(message: unknown, fallback: string): string {
  if (typeof message === 'string' && message.length > 0) {
    return message;
  }

  if (Array.isArray(message)) {
    const [first] = message;

    if (typeof first === 'string' && first.length > 0) {
      return first;
    }
  }

  return fallback || 'Request failed';
}

function mapStatusToErrorCode(statusCode: number): ErrorCode {
  const mapped = STATUS_ERROR_CODES[statusCode];

  if (mapped) {
    return mapped;
  }

  return statusCode < HttpStatus.INTERNAL_SERVER_ERROR
    ? ERROR_CODE.BAD_REQUEST
    : ERROR_CODE.INTERNAL_SERVER_ERROR;
}
