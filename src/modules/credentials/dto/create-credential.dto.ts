import { z } from 'zod';

import { tagsSchema } from '../../../common/utils/tags.util';
import { CREDENTIAL_TYPES } from '../types/credential.types';

export const MIN_PASSWORD_LENGTH = 8;

const optionalTrimmedString = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .transform((value) => (value.length === 0 ? undefined : value))
    .optional();

// Empty input means "no value"; anything else must meet the minimum length.
export const passwordFieldSchema = z
  .string()
  .trim()
  .max(2048)
  .refine(
    (value) => value.length === 0 || value.length >= MIN_PASSWORD_LENGTH,
    {
      message: `Password should be at least ${MIN_PASSWORD_LENGTH} characters long`,
    },
  )
  .transform((value) => (value.length === 0 ? undefined : value));

export const secretKeyFieldSchema = z
  .string()
  .trim()
  .max(5000)
  .transform((value) => (value.length === 0 ? undefined : value));

export const createCredentialDtoSchema = z
  .object({
    label: z.string().trim().min(1).max(255),
    type: z.enum(CREDENTIAL_TYPES).default('other'),
    websiteUrl: z.url('websiteUrl must be a valid URL').max(2000).optional(),
    username: optionalTrimmedString(255),
    email: z.email().max(255).optional(),
    password: passwordFieldSchema.optional(),
    secretKey: secretKeyFieldSchema.optional(),
    note: optionalTrimmedString(20_000),
    isFavorite: z.boolean().default(false),
    tags: tagsSchema.optional(),
  })
  .strict();

export type CreateCredentialDto = z.infer<typeof createCredentialDtoSchema>;
