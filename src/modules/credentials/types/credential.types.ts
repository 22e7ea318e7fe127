export const CREDENTIAL_TYPES = [
  'website',
  'email',
  'social',
  'banking',
  'work',
  'personal',
  'server',
  'api',
  'other',
] as const;

export type CredentialType = (typeof CREDENTIAL_TYPES)[number];

export const CREDENTIAL_TYPE_FILTERS = ['all', ...CREDENTIAL_TYPES] as const;

export type CredentialFilter = {
  query?: string;
  type?: CredentialType | 'all';
  favoritesOnly?: boolean;
};

export type CredentialMetadata = {
  id: string;
  label: string;
  type: string;
  websiteUrl: string | null;
  username: string | null;
  email: string | null;
  isFavorite: boolean;
  tags: string[];
  createdAt: Date;
  updatedAt: Date;
  lastAccessedAt: Date | null;
};

/**
 * Decrypted view of a credential. `password` and `secretKey` are null when
 * never set, and `"[Decryption Error]"` when the stored token is unreadable.
 */
export type CredentialDetail = CredentialMetadata & {
  note: string | null;
  password: string | null;
  secretKey: string | null;
};
