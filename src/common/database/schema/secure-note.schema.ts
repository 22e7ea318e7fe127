import {
  boolean,
  index,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';

import { users } from './user.schema';

export const secureNotes = pgTable(
  'secure_notes',
  {
    id: uuid('id').defaultRandom().primaryKey(),

    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),

    title: text('title').notNull(),
    contentEncrypted: text('content_encrypted'),
    type: text('type').notNull().default('personal'),

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
  (t) => [index('secure_notes_user_updated_at_idx').on(t.userId, t.updatedAt)],
);
