import { FavoritesController } from '../src/modules/favorites/favorites.controller';
import { FavoritesService } from '../src/modules/favorites/favorites.service';
import { toggleFavoriteDtoSchema } from '../src/modules/favorites/dto/toggle-favorite.dto';
import { searchDtoSchema } from '../src/modules/search/dto/search.dto';
import { SearchController } from '../src/modules/search/search.controller';
import { SearchService } from '../src/modules/search/search.service';
import {
  createTestUser,
  OTHER_ITEM_ID,
  TEST_USER_ID,
} from './support/query-chain';

function createItemServices() {
  return {
    credentialsService: {
      search: jest.fn().mockResolvedValue([{ id: 'c1' }, { id: 'c2' }]),
      toggleFavorite: jest.fn().mockResolvedValue(true),
    },
    notesService: {
      search: jest.fn().mockResolvedValue([{ id: 'n1' }]),
      toggleFavorite: jest.fn().mockResolvedValue(false),
    },
  };
}

describe('SearchService', () => {
  it('narrows credentials by type and notes by query and favorites only', async () => {
    const { credentialsService, notesService } = createItemServices();
    const service = new SearchService(
      credentialsService as never,
      notesService as never,
    );

    const result = await service.searchAll(TEST_USER_ID, {
      query: 'git',
      typeFilter: 'website',
      favoritesOnly: true,
    });

    expect(credentialsService.search).toHaveBeenCalledWith(TEST_USER_ID, {
      query: 'git',
      type: 'website',
      favoritesOnly: true,
    });
    expect(notesService.search).toHaveBeenCalledWith(TEST_USER_ID, {
      query: 'git',
      favoritesOnly: true,
    });
    expect(result).toEqual({
      credentials: [{ id: 'c1' }, { id: 'c2' }],
      notes: [{ id: 'n1' }],
      totalCredentials: 2,
      totalNotes: 1,
    });
  });
});

describe('SearchController', () => {
  it('wraps the result', async () => {
    const searchService = {
      searchAll: jest.fn().mockResolvedValue({
        credentials: [],
        notes: [],
        totalCredentials: 0,
        totalNotes: 0,
      }),
    };
    const controller = new SearchController(searchService as never);
    const body = searchDtoSchema.parse({});

    const response = await controller.search(createTestUser(), body);

    expect(body).toEqual({ query: '', typeFilter: 'all', favoritesOnly: false });
    expect(searchService.searchAll).toHaveBeenCalledWith(TEST_USER_ID, body);
    expect(response.message).toBe('Search completed');
    expect(response.data.totalCredentials).toBe(0);
  });
});

describe('FavoritesService', () => {
  it('toggles credentials and notes through their own services', async () => {
    const { credentialsService, notesService } = createItemServices();
    const service = new FavoritesService(
      credentialsService as never,
      notesService as never,
    );

    await expect(
      service.toggle(TEST_USER_ID, { type: 'credential', id: OTHER_ITEM_ID }),
    ).resolves.toBe(true);
    await expect(
      service.toggle(TEST_USER_ID, { type: 'note', id: OTHER_ITEM_ID }),
    ).resolves.toBe(false);

    expect(credentialsService.toggleFavorite).toHaveBeenCalledWith(
      TEST_USER_ID,
      OTHER_ITEM_ID,
    );
    expect(notesService.toggleFavorite).toHaveBeenCalledWith(
      TEST_USER_ID,
      OTHER_ITEM_ID,
    );
  });

  it('lists favorites of both kinds', async () => {
    const { credentialsService, notesService } = createItemServices();
    const service = new FavoritesService(
      credentialsService as never,
      notesService as never,
    );

    const favorites = await service.findAll(TEST_USER_ID);

    expect(credentialsService.search).toHaveBeenCalledWith(TEST_USER_ID, {
      favoritesOnly: true,
    });
    expect(favorites).toEqual({
      credentials: [{ id: 'c1' }, { id: 'c2' }],
      notes: [{ id: 'n1' }],
    });
  });
});

describe('FavoritesController', () => {
  it('returns the new favorite state', async () => {
    const favoritesService = { toggle: jest.fn().mockResolvedValue(true) };
    const controller = new FavoritesController(favoritesService as never);

    const response = await controller.toggle(createTestUser(), {
      type: 'note',
      id: OTHER_ITEM_ID,
    });

    expect(response).toEqual({
      success: true,
      message: 'Favorite updated',
      data: { isFavorite: true },
    });
  });

  it('rejects unknown item types and malformed ids', () => {
    expect(
      toggleFavoriteDtoSchema.safeParse({ type: 'folder', id: OTHER_ITEM_ID })
        .success,
    ).toBe(false);
    expect(
      toggleFavoriteDtoSchema.safeParse({ type: 'note', id: 'not-a-uuid' })
        .success,
    ).toBe(false);
  });
});
