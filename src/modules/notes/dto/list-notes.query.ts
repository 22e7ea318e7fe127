import { z } from 'zod';

import { paginationQueryShape } from '../../../common/http/pagination';

export const listNotesQuerySchema = z
  .object({
    query: z.string().trim().max(200).optional(),
    favoritesOnly: z
      .enum(['true', 'false'])
      .optional()
      .transform((value) => value === 'true'),
    ...paginationQueryShape,
  })
  .strict();

export type ListNotesQuery = z.infer<typeof listNotesQuerySchema>;
