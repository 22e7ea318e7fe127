import type { CredentialMetadata } from '../../credentials/types/credential.types';
import type { NoteMetadata } from '../../notes/types/note.types';

export type Favorites = {
  credentials: CredentialMetadata[];
  notes: NoteMetadata[];
};
