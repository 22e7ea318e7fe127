import type { Pagination } from './pagination';

export type ResponseMeta = {
  timestamp?: string;
  path?: string;
  requestId?: string;
  pagination?: Pagination | { total: number };
};

export type ApiSuccessResponse<T> = {
  success: true;
  message: string;
  data: T;
  meta?: ResponseMeta;
};

export type ApiErrorResponse = {
  success: false;
  message: string;
  error: {
    code: string;
    statusCode: number;
    details?: unknown;
  };
  meta: ResponseMeta;
};

/** Minimal request shape both the interceptor and the exception filter read. */
export type MetaSource = {
  url?: string;
  originalUrl?: string;
  headers?: Record<string, string | string[] | undefined>;
};

export function apiSuccess<T>(
  data: T,
  message = 'Success',
  meta?: ResponseMeta,
): ApiSuccessResponse<T> {
  return {
    success: true,
    message,
    data,
    ...(meta ? { meta } : {}),
  };
}

export function isApiSuccessResponse(
  value: unknown,
): value is ApiSuccessResponse<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    value.success === true &&
    'message' in value &&
    typeof value.message === 'string' &&
    'data' in value
  );
}

export function buildResponseMeta(
  request: MetaSource,
  now: Date = new Date(),
): ResponseMeta {
  const requestId = request.headers?.['x-request-id'];

  return {
    timestamp: now.toISOString(),
    path: request.originalUrl ?? request.url ?? '',
    ...(typeof requestId === 'string' && requestId.length > 0
      ? { requestId }
      : {}),
  };
}
