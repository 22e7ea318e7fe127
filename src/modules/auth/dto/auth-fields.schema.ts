import { z } from 'zod';

export const ACCOUNT_PASSWORD_MIN_LENGTH = 8;
export const ACCOUNT_PASSWORD_MAX_LENGTH = 128;

/** Emails are compared lowercased everywhere, so normalize at the edge. */
export const accountEmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.email('Enter a valid email address').max(255));

export function accountPasswordSchema(label: string) {
  return z
    .string()
    .min(
      ACCOUNT_PASSWORD_MIN_LENGTH,
      `${label} must be at least ${ACCOUNT_PASSWORD_MIN_LENGTH} characters`,
    )
    .max(
      ACCOUNT_PASSWORD_MAX_LENGTH,
      `${label} must be at most ${ACCOUNT_PASSWORD_MAX_LENGTH} characters`,
    );
}
