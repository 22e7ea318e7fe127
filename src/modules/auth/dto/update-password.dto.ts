import { z } from 'zod';

import {
  ACCOUNT_PASSWORD_MAX_LENGTH,
  accountPasswordSchema,
} from './auth-fields.schema';

export const updatePasswordDtoSchema = z
  .object({
    currentPassword: z
      .string()
      .min(1, 'Current password is required')
      .max(ACCOUNT_PASSWORD_MAX_LENGTH),
    newPassword: accountPasswordSchema('New password'),
  })
  .strict()
  .refine((value) => value.currentPassword !== value.newPassword, {
    message: 'New password must differ from the current password',
    path: ['newPassword'],
  });

export type UpdatePasswordDto = z.infer<typeof updatePasswordDtoSchema>;
