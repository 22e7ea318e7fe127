import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import type { Pool } from 'pg';

import {
  DRIZZLE,
  drizzleProvider,
  PG_POOL,
  pgPoolProvider,
} from './database.provider';

export { DRIZZLE, type Database } from './database.provider';

@Global()
@Module({
  providers: [pgPoolProvider, drizzleProvider],
  exports: [DRIZZLE],
})
export class DatabaseModule implements OnApplicationShutdown {
  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }
}
