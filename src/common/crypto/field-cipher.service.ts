import { Injectable, Logger } from '@nestjs/common';
import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import type {
  CiphertextToken,
  DecryptionFailureReason,
  DerivedKey,
  OptionalText,
} from './crypto.types';
import { KeyDeriver } from './key-deriver';

const ALGORITHM = 'aes-256-gcm';
const TOKEN_VERSION = 0x01;
const VERSION_LENGTH = 1;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

export const DECRYPTION_ERROR_SENTINEL = '[Decryption Error]';

class FieldDecryptionError extends Error {
  constructor(readonly reason: DecryptionFailureReason) {
    super(`Field decryption failed: ${reason}`);
  }
}

/**
 * Encrypts single text fields with AES-256-GCM under the application key.
 *
 * Tokens are `base64url(version | iv | ciphertext | authTag)`. Empty and
 * absent values pass through untouched in both directions, and `decrypt`
 * never throws: any unreadable token comes back as
 * {@link DECRYPTION_ERROR_SENTINEL} so a record can always be rendered.
 */
@Injectable()
export class FieldCipherService {
  private readonly logger = new Logger(FieldCipherService.name);

  constructor(private readonly keyDeriver: KeyDeriver) {}

  encrypt(plaintext: string): CiphertextToken;
  encrypt(plaintext: OptionalText): OptionalText;
  encrypt(plaintext: OptionalText): OptionalText {
    if (!plaintext) {
      return plaintext;
    }

    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.getKey(), iv);

    const encrypted = Buffer.concat([
      cipher.update(plaintext, 'utf8'),
      cipher.final(),
    ]);

    return Buffer.concat([
      Buffer.from([TOKEN_VERSION]),
      iv,
      encrypted,
      cipher.getAuthTag(),
    ]).toString('base64url');
  }

  decrypt(token: CiphertextToken): string;
  decrypt(token: OptionalText): OptionalText;
  decrypt(token: OptionalText): OptionalText {
    if (!token) {
      return token;
    }

    try {
      return this.open(token);
    } catch (error) {
      this.logger.warn(`Field decryption failed (${describeFailure(error)})`);
      return DECRYPTION_ERROR_SENTINEL;
    }
  }

  private open(token: CiphertextToken): string {
    if (!BASE64URL_PATTERN.test(token)) {
      throw new FieldDecryptionError('malformed');
    }

    const data = Buffer.from(token, 'base64url');

    if (
      data.toString('base64url') !== token ||
      data.length < VERSION_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH
    ) {
      throw new FieldDecryptionError('malformed');
    }

    if (data[0] !== TOKEN_VERSION) {
      throw new FieldDecryptionError('unsupported_version');
    }

    const ivEnd = VERSION_LENGTH + IV_LENGTH;
    const tagStart = data.length - AUTH_TAG_LENGTH;
    const iv = data.subarray(VERSION_LENGTH, ivEnd);
    const ciphertext = data.subarray(ivEnd, tagStart);
    const authTag = data.subarray(tagStart);

    const decipher = createDecipheriv(ALGORITHM, this.getKey(), iv);
    decipher.setAuthTag(authTag);

    let decrypted: Buffer;

    try {
      decrypted = Buffer.concat([
        decipher.update(ciphertext),
        decipher.final(),
      ]);
    } catch {
      // Wrong key and tampered data look the same to GCM.
      throw new FieldDecryptionError('authentication_failed');
    }

    return decrypted.toString('utf8');
  }

  private getKey(): Buffer {
    return parseDerivedKey(this.keyDeriver.deriveKey());
  }
}

export function isDecryptionError(value: unknown): boolean {
  return value === DECRYPTION_ERROR_SENTINEL;
}

function parseDerivedKey(derivedKey: DerivedKey): Buffer {
  const key = Buffer.from(derivedKey, 'base64url');

  if (key.length !== KEY_LENGTH) {
    throw new Error(
      `Invalid field encryption key length: expected ${KEY_LENGTH} bytes, received ${key.length}`,
    );
  }

  return key;
}

function describeFailure(error: unknown): string {
  if (error instanceof FieldDecryptionError) {
    return error.reason;
  }

  return error instanceof Error ? error.message : 'unknown error';
}
