import { createCredentialDtoSchema } from '../src/modules/credentials/dto/create-credential.dto';
import { listCredentialsQuerySchema } from '../src/modules/credentials/dto/list-credentials.query';
import { updateCredentialDtoSchema } from '../src/modules/credentials/dto/update-credential.dto';
import { createNoteDtoSchema } from '../src/modules/notes/dto/create-note.dto';
import { updateNoteDtoSchema } from '../src/modules/notes/dto/update-note.dto';

describe('createCredentialDtoSchema', () => {
  it('applies defaults and normalizes tags', () => {
    expect(
      createCredentialDtoSchema.parse({
        label: '  GitHub ',
        password: 'my_secret_password',
        tags: 'dev,  work',
      }),
    ).toEqual({
      label: 'GitHub',
      type: 'other',
      password: 'my_secret_password',
      isFavorite: false,
      tags: 'dev, work',
    });
  });

  it('rejects a password shorter than 8 characters', () => {
    const result = createCredentialDtoSchema.safeParse({
      label: 'GitHub',
      password: 'short',
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe(
      'Password should be at least 8 characters long',
    );
  });

  it('treats a blank password as absent', () => {
    expect(
      createCredentialDtoSchema.parse({ label: 'GitHub', password: '   ' })
        .password,
    ).toBeUndefined();
  });

  it('rejects unknown types and invalid URLs', () => {
    expect(
      createCredentialDtoSchema.safeParse({ label: 'x', type: 'crypto' })
        .success,
    ).toBe(false);
    expect(
      createCredentialDtoSchema.safeParse({ label: 'x', websiteUrl: 'nope' })
        .success,
    ).toBe(false);
  });
});

describe('updateCredentialDtoSchema', () => {
  it('keeps null so the service can clear a secret', () => {
    expect(updateCredentialDtoSchema.parse({ secretKey: null })).toEqual({
      secretKey: null,
    });
  });

  it('maps a blank password to undefined so the stored one is kept', () => {
    expect(
      updateCredentialDtoSchema.parse({ password: '' }).password,
    ).toBeUndefined();
  });

  it('requires at least one field', () => {
    expect(updateCredentialDtoSchema.safeParse({}).success).toBe(false);
  });
});

describe('listCredentialsQuerySchema', () => {
  it('coerces query-string values', () => {
    expect(
      listCredentialsQuerySchema.parse({
        type: 'banking',
        favoritesOnly: 'true',
        page: '2',
        pageSize: '50',
      }),
    ).toEqual({
      type: 'banking',
      favoritesOnly: true,
      page: 2,
      pageSize: 50,
    });
  });

  it('defaults to every type, first page of 12', () => {
    expect(listCredentialsQuerySchema.parse({})).toEqual({
      type: 'all',
      favoritesOnly: false,
      page: 1,
      pageSize: 12,
    });
  });

  it('caps the page size at 100', () => {
    expect(
      listCredentialsQuerySchema.safeParse({ pageSize: '101' }).success,
    ).toBe(false);
  });
});

describe('note DTOs', () => {
  it('requires content on create and defaults the type', () => {
    expect(
      createNoteDtoSchema.safeParse({ title: 'House', content: '  ' }).success,
    ).toBe(false);
    expect(
      createNoteDtoSchema.parse({ title: 'House', content: 'door code' }),
    ).toEqual({
      title: 'House',
      content: 'door code',
      type: 'personal',
      isFavorite: false,
    });
  });

  it('clears tags with null on update', () => {
    expect(updateNoteDtoSchema.parse({ tags: null })).toEqual({ tags: null });
  });
});
