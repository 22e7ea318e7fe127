import type { CredentialMetadata } from '../../credentials/types/credential.types';
import type { NoteMetadata } from '../../notes/types/note.types';

export type SearchResult = {
  credentials: CredentialMetadata[];
  notes: NoteMetadata[];
  totalCredentials: number;
  totalNotes: number;
};
