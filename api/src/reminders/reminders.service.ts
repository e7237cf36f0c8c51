import { Inject, Injectable } from '@nestjs/common';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from '../drizzle/schema';
import { and, asc, eq, inArray, lte, sql } from 'drizzle-orm';
import { computeReminderSchedule } from './reminder-schedule';

/** Default cap on reminders handled per delivery pass */
export const DEFAULT_DUE_BATCH_SIZE = 100;

/** A due reminder with everything needed to render and address it */
export interface DueReminder {
  reminder: schema.ScheduledReminder;
  event: schema.Event;
  user: schema.User;
}

export interface FailedAttemptResult {
  attempts: number;
  /** True when the cap was reached and the reminder was retired */
  abandoned: boolean;
}

/**
 * Persistence for scheduled reminders.
 *
 * Every state change is a conditional UPDATE on `sent = false`, so a
 * reminder transitions to sent at most once however many writers race.
 */
@Injectable()
export class RemindersService {
  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: PostgresJsDatabase<typeof schema>,
  ) {}

  /**
   * Create the 24h and 15min reminders for a registration.
   * Instants already in the past are skipped. A type that already has an
   * unsent row keeps that row (one per type is enforced by the unique key);
   * returns the unsent rows now in place.
   */
  async deriveForRegistration(
    registrationId: number,
    startsAt: Date,
    now: Date = new Date(),
  ): Promise<schema.ScheduledReminder[]> {
    const slots = computeReminderSchedule(startsAt, now);
    if (slots.length === 0) return [];

    return this.db
      .insert(schema.scheduledReminders)
      .values(
        slots.map((slot) => ({
          registrationId,
          reminderType: slot.reminderType,
          remindAt: slot.remindAt,
        })),
      )
      .onConflictDoUpdate({
        target: [
          schema.scheduledReminders.registrationId,
          schema.scheduledReminders.reminderType,
        ],
        set: { remindAt: sql`excluded.remind_at` },
        setWhere: eq(schema.scheduledReminders.sent, false),
      })
      .returning();
  }

  /**
   * Unsent reminders whose time has come, oldest first. Reminders of
   * cancelled registrations or cancelled events are never selected, even if
   * a cascade left a row behind.
   */
  async findDue(
    now: Date = new Date(),
    limit: number = DEFAULT_DUE_BATCH_SIZE,
  ): Promise<DueReminder[]> {
    return this.db
      .select({
        reminder: schema.scheduledReminders,
        event: schema.events,
        user: schema.users,
      })
      .from(schema.scheduledReminders)
      .innerJoin(
        schema.registrations,
        eq(schema.scheduledReminders.registrationId, schema.registrations.id),
      )
      .innerJoin(
        schema.events,
        eq(schema.registrations.eventId, schema.events.id),
      )
      .innerJoin(schema.users, eq(schema.registrations.userId, schema.users.id))
      .where(
        and(
          lte(schema.scheduledReminders.remindAt, now),
          eq(schema.scheduledReminders.sent, false),
          eq(schema.registrations.status, 'active'),
          eq(schema.events.isCancelled, false),
        ),
      )
      .orderBy(asc(schema.scheduledReminders.remindAt))
      .limit(limit);
  }

  /** Returns false when the reminder was already sent (or is gone) */
  async markSent(id: number): Promise<boolean> {
    const rows = await this.db
      .update(schema.scheduledReminders)
      .set({ sent: true })
      .where(
        and(
          eq(schema.scheduledReminders.id, id),
          eq(schema.scheduledReminders.sent, false),
        ),
      )
      .returning({ id: schema.scheduledReminders.id });
    return rows.length > 0;
  }

  /**
   * Count a transient failure. Once `maxAttempts` is reached the reminder is
   * marked sent in the same statement. Returns null when the reminder was
   * already sent by someone else.
   */
  async recordFailedAttempt(
    id: number,
    maxAttempts: number,
  ): Promise<FailedAttemptResult | null> {
    const [row] = await this.db
      .update(schema.scheduledReminders)
      .set({
        attempts: sql`${schema.scheduledReminders.attempts} + 1`,
        sent: sql`${schema.scheduledReminders.attempts} + 1 >= ${maxAttempts}`,
      })
      .where(
        and(
          eq(schema.scheduledReminders.id, id),
          eq(schema.scheduledReminders.sent, false),
        ),
      )
      .returning({
        attempts: schema.scheduledReminders.attempts,
        sent: schema.scheduledReminders.sent,
      });
    if (!row) return null;
    return { attempts: row.attempts, abandoned: row.sent };
  }

  /** Drop pending reminders of a registration; sent rows stay as history */
  async deleteUnsentForRegistration(registrationId: number): Promise<number> {
    const rows = await this.db
      .delete(schema.scheduledReminders)
      .where(
        and(
          eq(schema.scheduledReminders.registrationId, registrationId),
          eq(schema.scheduledReminders.sent, false),
        ),
      )
      .returning({ id: schema.scheduledReminders.id });
    return rows.length;
  }

  /**
   * Drop pending reminders of a registration only if, at the moment of the
   * delete, the registration is no longer active or its event is cancelled.
   * Lets a flow that derived reminders undo them when a cancel raced it,
   * without touching reminders a newer registration relies on.
   */
  async deleteUnsentIfInactive(registrationId: number): Promise<number> {
    const rows = await this.db
      .delete(schema.scheduledReminders)
      .where(
        and(
          eq(schema.scheduledReminders.registrationId, registrationId),
          eq(schema.scheduledReminders.sent, false),
          sql`EXISTS (
            SELECT 1 FROM ${schema.registrations}
            INNER JOIN ${schema.events}
              ON ${schema.events.id} = ${schema.registrations.eventId}
            WHERE ${schema.registrations.id} = ${registrationId}
              AND (${schema.registrations.status} <> 'active' OR ${schema.events.isCancelled})
          )`,
        ),
      )
      .returning({ id: schema.scheduledReminders.id });
    return rows.length;
  }

  /** Retire every pending reminder of an event's registrations */
  async markAllSentForEvent(eventId: number): Promise<number> {
    const eventRegistrations = this.db
      .select({ id: schema.registrations.id })
      .from(schema.registrations)
      .where(eq(schema.registrations.eventId, eventId));

    const rows = await this.db
      .update(schema.scheduledReminders)
      .set({ sent: true })
      .where(
        and(
          inArray(schema.scheduledReminders.registrationId, eventRegistrations),
          eq(schema.scheduledReminders.sent, false),
        ),
      )
      .returning({ id: schema.scheduledReminders.id });
    return rows.length;
  }
}
