/** URL-safe base64 (unpadded) encoding of the 32-byte field key. */
export type DerivedKey = string;

/** Printable token produced by {@link FieldCipherService.encrypt}. */
export type CiphertextToken = string;

export type OptionalText = string | null | undefined;

export interface ApplicationSecretSource {
  getApplicationSecret(): string;
}

export type DecryptionFailureReason =
  | 'malformed'
  | 'unsupported_version'
  | 'authentication_failed';
