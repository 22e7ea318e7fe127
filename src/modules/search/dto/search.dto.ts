import { z } from 'zod';

import { credentialTypeFilterSchema } from '../../credentials/dto/list-credentials.query';

export const searchDtoSchema = z
  .object({
    query: z.string().trim().max(200).default(''),
    typeFilter: credentialTypeFilterSchema,
    favoritesOnly: z.boolean().default(false),
  })
  .strict();

export type SearchDto = z.infer<typeof searchDtoSchema>;
