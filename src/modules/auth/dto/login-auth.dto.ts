import { z } from 'zod';

import {
  ACCOUNT_PASSWORD_MAX_LENGTH,
  accountEmailSchema,
} from './auth-fields.schema';

export const loginAuthDtoSchema = z
  .object({
    email: accountEmailSchema,
    password: z
      .string()
      .min(1, 'Password is required')
      .max(ACCOUNT_PASSWORD_MAX_LENGTH),
  })
  .strict();

export type LoginAuthDto = z.infer<typeof loginAuthDtoSchema>;
