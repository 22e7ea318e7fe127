import { z } from 'zod';

import { paginationQueryShape } from '../../../common/http/pagination';
import { CREDENTIAL_TYPE_FILTERS } from '../types/credential.types';

export const credentialTypeFilterSchema = z
  .enum(CREDENTIAL_TYPE_FILTERS)
  .default('all');

export const listCredentialsQuerySchema = z
  .object({
    query: z.string().trim().max(200).optional(),
    type: credentialTypeFilterSchema,
    favoritesOnly: z
      .enum(['true', 'false'])
      .optional()
      .transform((value) => value === 'true'),
    ...paginationQueryShape,
  })
  .strict();

export type ListCredentialsQuery = z.infer<typeof listCredentialsQuerySchema>;
