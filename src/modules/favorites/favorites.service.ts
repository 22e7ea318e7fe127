import { Injectable } from '@nestjs/common';

import { CredentialsService } from '../credentials/credentials.service';
import { NotesService } from '../notes/notes.service';
import type { ToggleFavoriteDto } from './dto/toggle-favorite.dto';
import type { Favorites } from './types/favorites.types';

@Injectable()
export class FavoritesService {
  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly notesService: NotesService,
  ) {}

  async toggle(userId: string, dto: ToggleFavoriteDto): Promise<boolean> {
    switch (dto.type) {
      case 'credential':
        return this.credentialsService.toggleFavorite(userId, dto.id);
      case 'note':
        return this.notesService.toggleFavorite(userId, dto.id);
    }
  }

  async findAll(userId: string): Promise<Favorites> {
    const [credentials, notes] = await Promise.all([
      this.credentialsService.search(userId, { favoritesOnly: true }),
      this.notesService.search(userId, { favoritesOnly: true }),
    ]);

    return { credentials, notes };
  }
}
