import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { map, Observable } from 'rxjs';

import {
  apiSuccess,
  buildResponseMeta,
  isApiSuccessResponse,
  type ApiSuccessResponse,
  type MetaSource,
} from '../http/api-response';

/**
 * Wraps every controller result in the success envelope. Handlers that
 * already return `apiSuccess(...)` keep their message and meta; request
 * meta (timestamp, path, request id) is merged underneath.
 */
@Injectable()
export class ApiResponseInterceptor implements NestInterceptor {
  intercept(
    context: ExecutionContext,
    next: CallHandler,
  ): Observable<ApiSuccessResponse<unknown>> {
    const request = context.switchToHttp().getRequest<MetaSource>();

    return next.handle().pipe(
      map((data: unknown) => {
        const requestMeta = buildResponseMeta(request);

        if (isApiSuccessResponse(data)) {
          return {
            ...data,
            meta: { ...requestMeta, ...data.meta },
          };
        }

        return apiSuccess(data, 'Success', requestMeta);
      }),
    );
  }
}
