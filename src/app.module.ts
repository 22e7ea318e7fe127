import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { CryptoModule } from './common/crypto/crypto.module';
import { DatabaseModule } from './common/database/database.module';
import { RedisModule } from './common/redis/redis.module';
import { ActivityModule } from './modules/activity/activity.module';
import { AuthModule } from './modules/auth/auth.module';
import { CredentialsModule } from './modules/credentials/credentials.module';
import { DashboardModule } from './modules/dashboard/dashboard.module';
import { ExportModule } from './modules/export/export.module';
import { FavoritesModule } from './modules/favorites/favorites.module';
import { NotesModule } from './modules/notes/notes.module';
import { SearchModule } from './modules/search/search.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    CryptoModule,
    DatabaseModule,
    RedisModule,
    AuthModule,
    ActivityModule,
    CredentialsModule,
    NotesModule,
    SearchModule,
    FavoritesModule,
    DashboardModule,
    ExportModule,
  ],
})
export class AppModule {}
