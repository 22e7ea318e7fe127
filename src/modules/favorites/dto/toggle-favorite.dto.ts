import { z } from 'zod';

export const FAVORITE_ITEM_TYPES = ['credential', 'note'] as const;

export const toggleFavoriteDtoSchema = z
  .object({
    type: z.enum(FAVORITE_ITEM_TYPES),
    id: z.uuid(),
  })
  .strict();

export type ToggleFavoriteDto = z.infer<typeof toggleFavoriteDtoSchema>;
