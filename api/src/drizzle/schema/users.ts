import {
  pgTable,
  text,
  timestamp,
  varchar,
  boolean,
} from 'drizzle-orm/pg-core';

/**
 * Community members known to the bot.
 * The primary key is the Discord user snowflake, kept as a string because
 * snowflakes exceed Number.MAX_SAFE_INTEGER.
 */
export const users = pgTable('users', {
  id: varchar('id', { length: 32 }).primaryKey(),
  displayName: text('display_name').notNull(),
  /** Discord username (the @handle), null when Discord did not provide one */
  handle: text('handle'),
  /** Announcement opt-ins, one per event category */
  notifyIt: boolean('notify_it').default(true).notNull(),
  notifySport: boolean('notify_sport').default(true).notNull(),
  notifyBooks: boolean('notify_books').default(true).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true })
    .defaultNow()
    .notNull(),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
