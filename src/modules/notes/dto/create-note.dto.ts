import { z } from 'zod';

import { tagsSchema } from '../../../common/utils/tags.util';
import { NOTE_TYPES } from '../types/note.types';

export const noteContentSchema = z
  .string()
  .trim()
  .min(1, 'Content is required')
  .max(100_000);

export const createNoteDtoSchema = z
  .object({
    title: z.string().trim().min(1).max(255),
    content: noteContentSchema,
    type: z.enum(NOTE_TYPES).default('personal'),
    isFavorite: z.boolean().default(false),
    tags: tagsSchema.optional(),
  })
  .strict();

export type CreateNoteDto = z.infer<typeof createNoteDtoSchema>;
