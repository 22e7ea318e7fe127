import { Module } from '@nestjs/common';

import { AuthModule } from '../auth/auth.module';
import { CredentialsModule } from '../credentials/credentials.module';
import { NotesModule } from '../notes/notes.module';
import { SearchController } from './search.controller';
import { SearchService } from './search.service';

@Module({
  imports: [AuthModule, CredentialsModule, NotesModule],
  controllers: [SearchController],
  providers: [SearchService],
})
export class SearchModule {}
