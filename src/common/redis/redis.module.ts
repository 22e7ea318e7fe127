import {
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
} from '@nestjs/common';

import {
  REDIS_CLIENT,
  redisClientProvider,
  type RedisClient,
} from './redis.provider';

@Global()
@Module({
  providers: [redisClientProvider],
  exports: [REDIS_CLIENT],
})
export class RedisModule implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisModule.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: RedisClient) {}

  async onApplicationShutdown(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.warn(
        `Closing session store failed, disconnecting: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      this.redis.disconnect();
    }
  }
}
