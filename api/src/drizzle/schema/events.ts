import {
  pgTable,
  serial,
  text,
  timestamp,
  boolean,
  varchar,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const events = pgTable(
  'events',
  {
    id: serial('id').primaryKey(),
    title: varchar('title', { length: 255 }).notNull(),
    category: varchar('category', {
      length: 20,
      enum: ['it', 'sport', 'books'],
    }).notNull(),
    format: varchar('format', {
      length: 20,
      enum: ['online', 'offline'],
    }).notNull(),
    startsAt: timestamp('starts_at', { withTimezone: true }).notNull(),
    /** Street address for offline events, stream link for online ones */
    location: text('location').notNull(),
    description: text('description'),
    organizerContact: varchar('organizer_contact', { length: 255 }).notNull(),
    /** Soft-cancel flag. Only ever flips false -> true. */
    isCancelled: boolean('is_cancelled').default(false).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [
    check(
      'events_category_check',
      sql`${table.category} IN ('it', 'sport', 'books')`,
    ),
    check('events_format_check', sql`${table.format} IN ('online', 'offline')`),
    // Upcoming listings only ever look at live events
    index('idx_events_upcoming')
      .on(table.startsAt)
      .where(sql`NOT ${table.isCancelled}`),
  ],
);

export type Event = typeof events.$inferSelect;
export type NewEvent = typeof events.$inferInsert;
