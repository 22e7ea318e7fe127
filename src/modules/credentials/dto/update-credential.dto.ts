import { z } from 'zod';

import { tagsSchema } from '../../../common/utils/tags.util';
import { CREDENTIAL_TYPES } from '../types/credential.types';
import {
  passwordFieldSchema,
  secretKeyFieldSchema,
} from './create-credential.dto';

/**
 * `password` / `secretKey`: omitted or blank keeps the stored value,
 * `null` clears it.
 */
export const updateCredentialDtoSchema = z
  .object({
    label: z.string().trim().min(1).max(255).optional(),
    type: z.enum(CREDENTIAL_TYPES).optional(),
    websiteUrl: z
      .url('websiteUrl must be a valid URL')
      .max(2000)
      .nullable()
      .optional(),
    username: z.string().trim().max(255).nullable().optional(),
    email: z.email().max(255).nullable().optional(),
    password: passwordFieldSchema.nullable().optional(),
    secretKey: secretKeyFieldSchema.nullable().optional(),
    note: z.string().trim().max(20_000).nullable().optional(),
    isFavorite: z.boolean().optional(),
    tags: tagsSchema.nullable().optional(),
  })
  .strict()
  .refine((value) => Object.keys(value).length > 0, {
    message: 'At least one field must be provided',
    path: [],
  });

export type UpdateCredentialDto = z.infer<typeof updateCredentialDtoSchema>;
