import { Inject, Injectable } from '@nestjs/common';
import { createHash } from 'node:crypto';

import { APPLICATION_SECRET_SOURCE } from './application-secret.provider';
import type { ApplicationSecretSource, DerivedKey } from './crypto.types';

@Injectable()
export class KeyDeriver {
  private derivedKey: DerivedKey | null = null;

  constructor(
    @Inject(APPLICATION_SECRET_SOURCE)
    private readonly secretSource: ApplicationSecretSource,
  ) {}

  deriveKey(): DerivedKey {
    if (this.derivedKey === null) {
      this.derivedKey = deriveKeyFromSecret(
        this.secretSource.getApplicationSecret(),
      );
    }

    return this.derivedKey;
  }
}

/**
 * SHA-256 of the secret's UTF-8 bytes, encoded as unpadded base64url.
 * Changing the secret makes every stored field unreadable.
 */
export function deriveKeyFromSecret(secret: string): DerivedKey {
  return createHash('sha256').update(secret, 'utf8').digest('base64url');
}
