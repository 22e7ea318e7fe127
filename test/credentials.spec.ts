import { HttpStatus } from '@nestjs/common';

import { AppException } from '../src/common/errors/app.exception';
import { ERROR_CODE } from '../src/common/errors/error-codes';
import { CredentialsController } from '../src/modules/credentials/credentials.controller';
import type { CredentialDetail } from '../src/modules/credentials/types/credential.types';
import {
  createFakeRequest,
  createTestUser,
  OTHER_ITEM_ID,
} from './support/query-chain';

type MockCredentialsService = {
  create: jest.Mock;
  list: jest.Mock;
  findOne: jest.Mock;
  update: jest.Mock;
  remove: jest.Mock;
};

const EXPECTED_CONTEXT = { ip: '203.0.113.7', userAgent: 'jest-agent' };

describe('CredentialsController (unit)', () => {
  let credentialsService: MockCredentialsService;
  let controller: CredentialsController;
  const user = createTestUser();

  beforeEach(() => {
    credentialsService = {
      create: jest.fn(),
      list: jest.fn(),
      findOne: jest.fn(),
      update: jest.fn(),
      remove: jest.fn(),
    };
    controller = new CredentialsController(credentialsService as never);
  });

  it('creates a credential with the caller context', async () => {
    const credential = createCredentialDetail();
    credentialsService.create.mockResolvedValue(credential);
    const body = { label: 'GitHub', type: 'website' as const, isFavorite: false };

    const response = await controller.create(
      user,
      body,
      createFakeRequest() as never,
    );

    expect(credentialsService.create).toHaveBeenCalledWith(
      user.id,
      body,
      EXPECTED_CONTEXT,
    );
    expect(response).toEqual({
      success: true,
      message: 'Credential created',
      data: { credential },
    });
  });

  it('lists credentials with pagination meta', async () => {
    const pagination = { page: 1, pageSize: 12, total: 0, totalPages: 1 };
    credentialsService.list.mockResolvedValue({ items: [], pagination });
    const query = {
      type: 'all' as const,
      favoritesOnly: false,
      page: 1,
      pageSize: 12,
    };

    const response = await controller.list(user, query);

    expect(credentialsService.list).toHaveBeenCalledWith(user.id, query);
    expect(response).toEqual({
      success: true,
      message: 'Credentials fetched',
      data: { credentials: [] },
      meta: { pagination },
    });
  });

  it('fetches one credential', async () => {
    const credential = createCredentialDetail();
    credentialsService.findOne.mockResolvedValue(credential);

    const response = await controller.findOne(
      user,
      credential.id,
      createFakeRequest() as never,
    );

    expect(credentialsService.findOne).toHaveBeenCalledWith(
      user.id,
      credential.id,
      EXPECTED_CONTEXT,
    );
    expect(response.data).toEqual({ credential });
  });

  it('updates a credential', async () => {
    const credential = createCredentialDetail({ label: 'GitHub (work)' });
    credentialsService.update.mockResolvedValue(credential);

    const response = await controller.update(
      user,
      credential.id,
      { label: 'GitHub (work)' },
      createFakeRequest() as never,
    );

    expect(response.message).toBe('Credential updated');
    expect(response.data.credential.label).toBe('GitHub (work)');
  });

  it('deletes a credential', async () => {
    credentialsService.remove.mockResolvedValue(undefined);

    const response = await controller.remove(
      user,
      OTHER_ITEM_ID,
      createFakeRequest({}) as never,
    );

    expect(credentialsService.remove).toHaveBeenCalledWith(
      user.id,
      OTHER_ITEM_ID,
      { ip: '127.0.0.1' },
    );
    expect(response).toEqual({
      success: true,
      message: 'Credential deleted',
      data: null,
    });
  });

  it('propagates not-found errors', async () => {
    const error = AppException.notFound(
      'Credential not found',
      ERROR_CODE.CREDENTIAL_NOT_FOUND,
    );
    credentialsService.findOne.mockRejectedValue(error);

    await expect(
      controller.findOne(user, OTHER_ITEM_ID, createFakeRequest() as never),
    ).rejects.toBe(error);
    expect(error.getStatus()).toBe(HttpStatus.NOT_FOUND);
  });
});

function createCredentialDetail(
  overrides: Partial<CredentialDetail> = {},
): CredentialDetail {
  const now = new Date('2026-03-01T09:30:00.000Z');

  return {
    id: '0f6e2b4a-8c3d-4e5f-9a1b-2c3d4e5f6a7b',
    label: 'GitHub',
    type: 'website',
    websiteUrl: 'https://github.com',
    username: 'octo',
    email: null,
    isFavorite: false,
    tags: [],
    createdAt: now,
    updatedAt: now,
    lastAccessedAt: null,
    note: null,
    password: 'my_secret_password',
    secretKey: null,
    ...overrides,
  };
}
