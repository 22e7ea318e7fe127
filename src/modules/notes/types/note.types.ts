export const NOTE_TYPES = [
  'personal',
  'work',
  'financial',
  'medical',
  'legal',
  'technical',
  'other',
] as const;

export type NoteType = (typeof NOTE_TYPES)[number];

export type NoteFilter = {
  query?: string;
  favoritesOnly?: boolean;
};

export type NoteMetadata = {
  id: string;
  title: string;
  type: string;
  isFavorite: boolean;
  tags: string[];
  createdAt: Date;
  updatedAt: Date;
  lastAccessedAt: Date | null;
};

export type NoteDetail = NoteMetadata & {
  content: string | null;
};
