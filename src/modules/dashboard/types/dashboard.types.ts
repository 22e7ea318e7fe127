import type { ActivityEntry } from '../../activity/types/activity.types';
import type { CredentialMetadata } from '../../credentials/types/credential.types';
import type { NoteMetadata } from '../../notes/types/note.types';

export type CredentialTypeCount = {
  type: string;
  count: number;
};

export type DashboardStats = {
  totalCredentials: number;
  totalNotes: number;
  favoriteCredentials: number;
  favoriteNotes: number;
  recentActivities: ActivityEntry[];
  recentCredentials: CredentialMetadata[];
  recentNotes: NoteMetadata[];
  credentialTypes: CredentialTypeCount[];
};
