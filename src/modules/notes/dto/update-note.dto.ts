import { z } from 'zod';

import { tagsSchema } from '../../../common/utils/tags.util';
import { NOTE_TYPES } from '../types/note.types';
import { noteContentSchema } from './create-note.dto';

export const updateNoteDtoSchema = z
  .object({
    title: z.string().trim().min(1).max(255).optional(),
    content: noteContentSchema.optional(),
    type: z.enum(NOTE_TYPES).optional(),
    isFavorite: z.boolean().optional(),
    tags: tagsSchema.nullable().optional(),
  })
  .strict()
  .refine((value) => Object.keys(value).length > 0, {
    message: 'At least one field must be provided',
    path: [],
  });

export type UpdateNoteDto = z.infer<typeof updateNoteDtoSchema>;
