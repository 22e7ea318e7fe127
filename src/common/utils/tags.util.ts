import { z } from 'zod';

export const MAX_TAGS = 10;

export function splitTags(raw: string | null | undefined): string[] {
  if (!raw) {
    return [];
  }

  return raw
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

/** Comma-separated input as stored: `"a, b, c"`, or null when empty. */
export function normalizeTags(raw: string): string | null {
  const tags = splitTags(raw);

  return tags.length > 0 ? tags.join(', ') : null;
}

export const tagsSchema = z
  .string()
  .max(500)
  .refine((value) => splitTags(value).length <= MAX_TAGS, {
    message: `Maximum ${MAX_TAGS} tags allowed`,
  })
  .transform(normalizeTags);
