import { Logger, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { type RedisOptions } from 'ioredis';

export const REDIS_CLIENT = 'REDIS_CLIENT';
export type RedisClient = Redis;

const DEFAULT_KEY_PREFIX = 'credentials-manager:';

export function buildRedisOptions(configService: ConfigService): RedisOptions {
  const isProduction =
    configService.get<string>('NODE_ENV', 'development') === 'production';

  return {
    keyPrefix: configService.get<string>('REDIS_KEY_PREFIX', DEFAULT_KEY_PREFIX),
    lazyConnect: true,
    enableOfflineQueue: false,
    connectTimeout: 10_000,
    commandTimeout: 5_000,
    maxRetriesPerRequest: 1,
    retryStrategy: (attempt) => Math.min(attempt * 200, 2_000),
    reconnectOnError: (error) => error.message.includes('READONLY'),
    showFriendlyErrorStack: !isProduction,
  };
}

export function assertRedisUrl(redisUrl: string): void {
  let protocol: string;

  try {
    protocol = new URL(redisUrl).protocol;
  } catch {
    throw new Error('REDIS_URL is not a valid URL');
  }

  if (protocol !== 'redis:' && protocol !== 'rediss:') {
    throw new Error(
      `REDIS_URL must use redis:// or rediss:// (got ${protocol}//)`,
    );
  }
}

export const redisClientProvider: Provider = {
  provide: REDIS_CLIENT,
  inject: [ConfigService],
  useFactory: async (configService: ConfigService): Promise<RedisClient> => {
    const logger = new Logger('Redis');
    const redisUrl = configService.getOrThrow<string>('REDIS_URL');

    assertRedisUrl(redisUrl);

    const client = new Redis(redisUrl, buildRedisOptions(configService));

    client.on('ready', () => logger.log('Session store connected'));
    client.on('reconnecting', () => logger.warn('Reconnecting...'));
    client.on('error', (error: Error) =>
      logger.error(`Session store error: ${error.message}`, error.stack),
    );

    await client.connect();

    return client;
  },
};
