import {
  pgTable,
  serial,
  integer,
  timestamp,
  varchar,
  boolean,
  check,
  index,
  unique,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { registrations } from './registrations';

/**
 * Pending and historical reminder DMs.
 *
 * `sent` is monotonic: once true the row is never selected for delivery
 * again. It is set after a delivery, after a permanent failure, when the
 * retry cap is reached, and in bulk when the event is cancelled.
 */
export const scheduledReminders = pgTable(
  'scheduled_reminders',
  {
    id: serial('id').primaryKey(),
    registrationId: integer('registration_id')
      .references(() => registrations.id, { onDelete: 'cascade' })
      .notNull(),
    remindAt: timestamp('remind_at', { withTimezone: true }).notNull(),
    reminderType: varchar('reminder_type', {
      length: 10,
      enum: ['24h', '15min'],
    }).notNull(),
    sent: boolean('sent').default(false).notNull(),
    /** Transient delivery failures so far */
    attempts: integer('attempts').default(0).notNull(),
  },
  (table) => [
    // At most one reminder of each type per registration, however many
    // register calls race
    unique('unique_registration_reminder_type').on(
      table.registrationId,
      table.reminderType,
    ),
    check(
      'scheduled_reminders_type_check',
      sql`${table.reminderType} IN ('24h', '15min')`,
    ),
    index('idx_scheduled_reminders_due').on(table.remindAt, table.sent),
  ],
);

export type ScheduledReminder = typeof scheduledReminders.$inferSelect;
export type NewScheduledReminder = typeof scheduledReminders.$inferInsert;
