import { Injectable } from '@nestjs/common';

import { CredentialsService } from '../credentials/credentials.service';
import { NotesService } from '../notes/notes.service';
import type { SearchDto } from './dto/search.dto';
import type { SearchResult } from './types/search.types';

@Injectable()
export class SearchService {
  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly notesService: NotesService,
  ) {}

  /** Notes have their own type set, so `typeFilter` narrows credentials only. */
  async searchAll(userId: string, dto: SearchDto): Promise<SearchResult> {
    const [credentials, notes] = await Promise.all([
      this.credentialsService.search(userId, {
        query: dto.query,
        type: dto.typeFilter,
        favoritesOnly: dto.favoritesOnly,
      }),
      this.notesService.search(userId, {
        query: dto.query,
        favoritesOnly: dto.favoritesOnly,
      }),
    ]);

    return {
      credentials,
      notes,
      totalCredentials: credentials.length,
      totalNotes: notes.length,
    };
  }
}
