import {
  boolean,
  index,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';

import { users } from './user.schema';

export const credentials = pgTable(
  'credentials',
  {
    id: uuid('id').defaultRandom().primaryKey(),

    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),

    label: text('label').notNull(),
    type: text('type').notNull().default('other'),
    websiteUrl: text('website_url'),

    username: text('username'),
    email: text('email'),

    // FieldCipher tokens; null when the user left the field empty.
    passwordEncrypted: text('password_encrypted'),
    secretKeyEncrypted: text('secret_key_encrypted'),

    note: text('note'),
    isFavorite: boolean('is_favorite').notNull().default(false),
    tags: text('tags'),

    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    lastAccessedAt: timestamp('last_accessed_at', { withTimezone: true }),
  },
  (t) => [
    index('credentials_user_updated_at_idx').on(t.userId, t.updatedAt),
    index('credentials_user_type_idx').on(t.userId, t.type),
  ],
);
