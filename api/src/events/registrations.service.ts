import { Inject, Injectable } from '@nestjs/common';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from '../drizzle/schema';
import { and, asc, count, eq, gt, inArray, type SQL } from 'drizzle-orm';

/** Registrant row joined with the user, as shown to organizers */
export interface ParticipantRow {
  registrationId: number;
  userId: string;
  displayName: string;
  handle: string | null;
  status: schema.RegistrationStatus;
  registeredAt: Date;
}

export interface UserRegistrationRow {
  registration: schema.Registration;
  event: schema.Event;
}

export interface ListByUserOptions {
  includeCancelled?: boolean;
  /** Only events starting after this instant */
  startingAfter?: Date;
}

/**
 * Persistence for registrations. The (user_id, event_id) unique key is the
 * only guard against duplicate registrations; nothing here reads before it
 * writes.
 */
@Injectable()
export class RegistrationsService {
  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: PostgresJsDatabase<typeof schema>,
  ) {}

  /**
   * Create the registration, or re-activate a cancelled one.
   * Returns null when the user already holds an active registration:
   * the conflict update is skipped by `setWhere` and nothing is returned.
   */
  async activate(
    userId: string,
    eventId: number,
  ): Promise<schema.Registration | null> {
    const [registration] = await this.db
      .insert(schema.registrations)
      .values({ userId, eventId, status: 'active' })
      .onConflictDoUpdate({
        target: [schema.registrations.userId, schema.registrations.eventId],
        set: { status: 'active' },
        setWhere: eq(schema.registrations.status, 'cancelled'),
      })
      .returning();
    return registration ?? null;
  }

  /** Returns null when there was no active registration to cancel */
  async cancel(
    userId: string,
    eventId: number,
  ): Promise<schema.Registration | null> {
    const [registration] = await this.db
      .update(schema.registrations)
      .set({ status: 'cancelled' })
      .where(
        and(
          eq(schema.registrations.userId, userId),
          eq(schema.registrations.eventId, eventId),
          eq(schema.registrations.status, 'active'),
        ),
      )
      .returning();
    return registration ?? null;
  }

  async findOne(
    userId: string,
    eventId: number,
  ): Promise<schema.Registration | null> {
    const [registration] = await this.db
      .select()
      .from(schema.registrations)
      .where(
        and(
          eq(schema.registrations.userId, userId),
          eq(schema.registrations.eventId, eventId),
        ),
      )
      .limit(1);
    return registration ?? null;
  }

  async findById(id: number): Promise<schema.Registration | null> {
    const [registration] = await this.db
      .select()
      .from(schema.registrations)
      .where(eq(schema.registrations.id, id))
      .limit(1);
    return registration ?? null;
  }

  /** Participants in registration order */
  async listByEvent(
    eventId: number,
    options: { includeCancelled?: boolean } = {},
  ): Promise<ParticipantRow[]> {
    return this.db
      .select({
        registrationId: schema.registrations.id,
        userId: schema.users.id,
        displayName: schema.users.displayName,
        handle: schema.users.handle,
        status: schema.registrations.status,
        registeredAt: schema.registrations.createdAt,
      })
      .from(schema.registrations)
      .innerJoin(schema.users, eq(schema.registrations.userId, schema.users.id))
      .where(
        and(
          eq(schema.registrations.eventId, eventId),
          options.includeCancelled
            ? undefined
            : eq(schema.registrations.status, 'active'),
        ),
      )
      .orderBy(asc(schema.registrations.createdAt));
  }

  /**
   * A user's registrations with their events, soonest first.
   * The default view hides cancelled registrations and cancelled events.
   */
  async listByUser(
    userId: string,
    options: ListByUserOptions = {},
  ): Promise<UserRegistrationRow[]> {
    const conditions: SQL[] = [eq(schema.registrations.userId, userId)];
    if (!options.includeCancelled) {
      conditions.push(
        eq(schema.registrations.status, 'active'),
        eq(schema.events.isCancelled, false),
      );
    }
    if (options.startingAfter) {
      conditions.push(gt(schema.events.startsAt, options.startingAfter));
    }

    return this.db
      .select({
        registration: schema.registrations,
        event: schema.events,
      })
      .from(schema.registrations)
      .innerJoin(
        schema.events,
        eq(schema.registrations.eventId, schema.events.id),
      )
      .where(and(...conditions))
      .orderBy(asc(schema.events.startsAt));
  }

  async countActive(eventId: number): Promise<number> {
    const [row] = await this.db
      .select({ count: count() })
      .from(schema.registrations)
      .where(
        and(
          eq(schema.registrations.eventId, eventId),
          eq(schema.registrations.status, 'active'),
        ),
      );
    return row?.count ?? 0;
  }

  /** Active registration counts keyed by event id; absent events count 0 */
  async countActiveByEvent(eventIds: number[]): Promise<Map<number, number>> {
    const counts = new Map<number, number>();
    if (eventIds.length === 0) return counts;

    const rows = await this.db
      .select({
        eventId: schema.registrations.eventId,
        count: count(),
      })
      .from(schema.registrations)
      .where(
        and(
          inArray(schema.registrations.eventId, eventIds),
          eq(schema.registrations.status, 'active'),
        ),
      )
      .groupBy(schema.registrations.eventId);

    for (const row of rows) {
      counts.set(row.eventId, row.count);
    }
    return counts;
  }
}
