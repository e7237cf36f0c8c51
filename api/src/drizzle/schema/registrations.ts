import {
  pgTable,
  serial,
  integer,
  timestamp,
  varchar,
  unique,
  check,
  index,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users } from './users';
import { events } from './events';

/**
 * Registration status.
 * - active: user is attending; reminders may be pending
 * - cancelled: user withdrew; re-registering flips the same row back to active
 */
export type RegistrationStatus = 'active' | 'cancelled';

/**
 * One row per (user, event) pair, ever. The unique constraint is what makes
 * "register twice" and "register again after cancelling" safe under
 * concurrent interactions.
 */
export const registrations = pgTable(
  'registrations',
  {
    id: serial('id').primaryKey(),
    userId: varchar('user_id', { length: 32 })
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    eventId: integer('event_id')
      .references(() => events.id, { onDelete: 'cascade' })
      .notNull(),
    status: varchar('status', { length: 20, enum: ['active', 'cancelled'] })
      .default('active')
      .notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [
    unique('unique_user_event').on(table.userId, table.eventId),
    check(
      'registrations_status_check',
      sql`${table.status} IN ('active', 'cancelled')`,
    ),
    index('idx_registrations_user_active')
      .on(table.userId)
      .where(sql`${table.status} = 'active'`),
  ],
);

export type Registration = typeof registrations.$inferSelect;
export type NewRegistration = typeof registrations.$inferInsert;
