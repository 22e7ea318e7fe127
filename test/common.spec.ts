import {
  BadRequestException,
  HttpStatus,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { lastValueFrom, of } from 'rxjs';
import { z } from 'zod';

import { DatabaseModule } from '../src/common/database/database.module';
import { readPoolMax } from '../src/common/database/database.provider';
import { containsPattern } from '../src/common/database/query.util';
import { AppException } from '../src/common/errors/app.exception';
import { ERROR_CODE, isErrorCode } from '../src/common/errors/error-codes';
import {
  ApiExceptionFilter,
  parseException,
} from '../src/common/filters/api-exception.filter';
import { apiSuccess } from '../src/common/http/api-response';
import {
  buildPagination,
  pageOffset,
} from '../src/common/http/pagination';
import {
  getClientIp,
  getRequestContext,
} from '../src/common/http/request-context';
import { ApiResponseInterceptor } from '../src/common/interceptors/api-response.interceptor';
import { ZodValidationPipe } from '../src/common/pipes/zod-validation.pipe';
import {
  assertRedisUrl,
  buildRedisOptions,
} from '../src/common/redis/redis.provider';
import {
  normalizeTags,
  splitTags,
  tagsSchema,
} from '../src/common/utils/tags.util';
import { createFakeRequest } from './support/query-chain';

describe('tags.util', () => {
  it('splits, trims and drops empty tags', () => {
    expect(splitTags(' dev ,, work ,')).toEqual(['dev', 'work']);
    expect(splitTags(null)).toEqual([]);
  });

  it('normalizes to a comma-space list or null', () => {
    expect(normalizeTags('dev,work ,  personal')).toBe('dev, work, personal');
    expect(normalizeTags(' , ')).toBeNull();
  });

  it('allows ten tags and rejects eleven', () => {
    const ten = Array.from({ length: 10 }, (_, i) => `t${i}`).join(',');

    expect(tagsSchema.parse(ten)).toBe(
      't0, t1, t2, t3, t4, t5, t6, t7, t8, t9',
    );

    const result = tagsSchema.safeParse(`${ten},t10`);
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Maximum 10 tags allowed');
  });
});

describe('pagination', () => {
  it('computes offsets and page counts', () => {
    expect(pageOffset(3, 12)).toBe(24);
    expect(buildPagination(1, 12, 25)).toEqual({
      page: 1,
      pageSize: 12,
      total: 25,
      totalPages: 3,
    });
    expect(buildPagination(1, 12, 0).totalPages).toBe(1);
  });
});

describe('query.util', () => {
  it('escapes LIKE wildcards', () => {
    expect(containsPattern('a_b%c\\d')).toBe('%a\\_b\\%c\\\\d%');
  });
});

describe('request-context', () => {
  it('prefers the first forwarded address', () => {
    expect(getClientIp(createFakeRequest() as never)).toBe('203.0.113.7');
  });

  it('falls back to the socket address', () => {
    expect(getRequestContext(createFakeRequest({}) as never)).toEqual({
      ip: '127.0.0.1',
    });
  });
});

describe('error codes', () => {
  it('recognizes known codes only', () => {
    expect(isErrorCode('NOTE_NOT_FOUND')).toBe(true);
    expect(isErrorCode('SOMETHING_ELSE')).toBe(false);
    expect(isErrorCode(404)).toBe(false);
  });
});

describe('ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(
    z.object({ label: z.string().min(1, 'Label is required') }),
  );

  it('returns parsed data', () => {
    expect(pipe.transform({ label: 'GitHub' }, { type: 'body' })).toEqual({
      label: 'GitHub',
    });
  });

  it('throws a VALIDATION_ERROR with formatted issues', () => {
    let thrown: unknown;

    try {
      pipe.transform({ label: '' }, { type: 'body' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AppException);
    if (thrown instanceof AppException) {
      expect(thrown.getStatus()).toBe(HttpStatus.BAD_REQUEST);
      expect(thrown.getResponse()).toEqual({
        message: 'Label is required',
        code: ERROR_CODE.VALIDATION_ERROR,
        details: {
          source: 'body',
          field: null,
          issues: [
            { code: 'too_small', path: 'label', message: 'Label is required' },
          ],
        },
      });
    }
  });
});

describe('parseException', () => {
  it('keeps the code of an AppException', () => {
    expect(
      parseException(
        AppException.notFound('Note not found', ERROR_CODE.NOTE_NOT_FOUND),
      ),
    ).toEqual({
      statusCode: 404,
      message: 'Note not found',
      code: 'NOTE_NOT_FOUND',
    });
  });

  it('maps built-in exceptions by status', () => {
    expect(parseException(new NotFoundException())).toMatchObject({
      statusCode: 404,
      code: 'NOT_FOUND',
      message: 'Not Found',
    });
    expect(
      parseException(new BadRequestException(['first problem', 'second'])),
    ).toEqual({
      statusCode: 400,
      message: 'first problem',
      code: 'BAD_REQUEST',
      details: ['first problem', 'second'],
    });
  });

  it('hides unknown errors behind a 500', () => {
    expect(parseException(new Error('db exploded'))).toEqual({
      statusCode: 500,
      message: 'Internal server error',
      code: 'INTERNAL_SERVER_ERROR',
    });
  });
});

describe('ApiExceptionFilter', () => {
  function createHost() {
    const response = { status: jest.fn(), json: jest.fn() };
    response.status.mockReturnValue(response);
    const request = {
      method: 'GET',
      url: '/credentials/1',
      originalUrl: '/credentials/1',
      headers: { 'x-request-id': 'req-1' },
    };
    const host = {
      switchToHttp: () => ({
        getResponse: () => response,
        getRequest: () => request,
      }),
    };

    return { host, response };
  }

  it('renders the error envelope', () => {
    const { host, response } = createHost();

    new ApiExceptionFilter().catch(
      AppException.notFound(
        'Credential not found',
        ERROR_CODE.CREDENTIAL_NOT_FOUND,
      ),
      host as never,
    );

    expect(response.status).toHaveBeenCalledWith(404);
    expect(response.json).toHaveBeenCalledWith({
      success: false,
      message: 'Credential not found',
      error: { code: 'CREDENTIAL_NOT_FOUND', statusCode: 404 },
      meta: {
        timestamp: expect.any(String),
        path: '/credentials/1',
        requestId: 'req-1',
      },
    });
  });

  it('logs server errors', () => {
    const { host, response } = createHost();
    const error = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => {});

    new ApiExceptionFilter().catch(new Error('db exploded'), host as never);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(error).toHaveBeenCalledWith(
      'GET /credentials/1 failed: db exploded',
      expect.any(String),
    );
    error.mockRestore();
  });
});

describe('ApiResponseInterceptor', () => {
  const context = {
    switchToHttp: () => ({
      getRequest: () => ({ url: '/notes', headers: {} }),
    }),
  };

  it('merges request meta into an existing envelope', async () => {
    const pagination = { page: 1, pageSize: 12, total: 0, totalPages: 1 };
    const result = await lastValueFrom(
      new ApiResponseInterceptor().intercept(context as never, {
        handle: () => of(apiSuccess({ notes: [] }, 'Notes fetched', { pagination })),
      }),
    );

    expect(result).toEqual({
      success: true,
      message: 'Notes fetched',
      data: { notes: [] },
      meta: { timestamp: expect.any(String), path: '/notes', pagination },
    });
  });

  it('wraps plain values', async () => {
    const result = await lastValueFrom(
      new ApiResponseInterceptor().intercept(context as never, {
        handle: () => of({ ok: true }),
      }),
    );

    expect(result).toEqual({
      success: true,
      message: 'Success',
      data: { ok: true },
      meta: { timestamp: expect.any(String), path: '/notes' },
    });
  });
});

describe('redis.provider', () => {
  it('accepts redis and rediss URLs only', () => {
    expect(() => assertRedisUrl('redis://localhost:6379')).not.toThrow();
    expect(() => assertRedisUrl('rediss://cache.internal:6380')).not.toThrow();
    expect(() => assertRedisUrl('http://localhost')).toThrow(
      'REDIS_URL must use redis:// or rediss:// (got http://)',
    );
    expect(() => assertRedisUrl('not a url')).toThrow(
      'REDIS_URL is not a valid URL',
    );
  });

  it('prefixes keys and connects lazily', () => {
    const configService = {
      get: jest.fn((_key: string, defaultValue: string) => defaultValue),
    };

    const options = buildRedisOptions(configService as never);

    expect(options.keyPrefix).toBe('credentials-manager:');
    expect(options.lazyConnect).toBe(true);
    expect(options.showFriendlyErrorStack).toBe(true);
  });
});

describe('database', () => {
  const configWith = (value: string | undefined) => ({
    get: jest.fn((_key: string, defaultValue: string) => value ?? defaultValue),
  });

  it('reads the pool size from config with a fallback of 10', () => {
    expect(readPoolMax(configWith('25') as never)).toBe(25);
    expect(readPoolMax(configWith(undefined) as never)).toBe(10);
    expect(readPoolMax(configWith('0') as never)).toBe(10);
    expect(readPoolMax(configWith('many') as never)).toBe(10);
  });

  it('ends the pool on shutdown', async () => {
    const pool = { end: jest.fn().mockResolvedValue(undefined) };

    await new DatabaseModule(pool as never).onApplicationShutdown();

    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});
