import { z } from 'zod';

import { accountEmailSchema, accountPasswordSchema } from './auth-fields.schema';

export const registerAuthDtoSchema = z
  .object({
    email: accountEmailSchema,
    password: accountPasswordSchema('Password'),
    displayName: z
      .string()
      .trim()
      .max(150, 'Display name must be at most 150 characters')
      .transform((value) => value || undefined)
      .optional(),
  })
  .strict();

export type RegisterAuthDto = z.infer<typeof registerAuthDtoSchema>;
