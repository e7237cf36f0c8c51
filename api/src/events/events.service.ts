import { Inject, Injectable } from '@nestjs/common';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from '../drizzle/schema';
import { and, asc, desc, eq, gt, type SQL } from 'drizzle-orm';
import type {
  CreateEventDto,
  EventCategory,
  EventResponseDto,
} from '@event-pulse/contract';

/** Upper bound for the bot's upcoming-events listing */
export const UPCOMING_EVENTS_LIMIT = 10;

export interface UpcomingEventsQuery {
  category?: EventCategory;
  limit?: number;
  now?: Date;
}

/**
 * Persistence for events. Lifecycle rules (announcements, cancellation
 * cascade) live in EventLifecycleService.
 */
@Injectable()
export class EventsService {
  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: PostgresJsDatabase<typeof schema>,
  ) {}

  async create(dto: CreateEventDto): Promise<schema.Event> {
    const [event] = await this.db
      .insert(schema.events)
      .values({
        title: dto.title,
        category: dto.category,
        format: dto.format,
        startsAt: new Date(dto.startsAt),
        location: dto.location,
        description: dto.description ?? null,
        organizerContact: dto.organizerContact,
      })
      .returning();
    return event;
  }

  async findOne(id: number): Promise<schema.Event | null> {
    const [event] = await this.db
      .select()
      .from(schema.events)
      .where(eq(schema.events.id, id))
      .limit(1);
    return event ?? null;
  }

  /** Live events that have not started yet, soonest first */
  async findUpcoming(query: UpcomingEventsQuery = {}): Promise<schema.Event[]> {
    const conditions: SQL[] = [
      gt(schema.events.startsAt, query.now ?? new Date()),
      eq(schema.events.isCancelled, false),
    ];
    if (query.category) {
      conditions.push(eq(schema.events.category, query.category));
    }

    return this.db
      .select()
      .from(schema.events)
      .where(and(...conditions))
      .orderBy(asc(schema.events.startsAt))
      .limit(query.limit ?? UPCOMING_EVENTS_LIMIT);
  }

  /** Admin listing, latest start first */
  async findAll(
    options: { includeCancelled?: boolean } = {},
  ): Promise<schema.Event[]> {
    return this.db
      .select()
      .from(schema.events)
      .where(
        options.includeCancelled
          ? undefined
          : eq(schema.events.isCancelled, false),
      )
      .orderBy(desc(schema.events.startsAt));
  }

  /**
   * Flip `is_cancelled` once. Returns null when the event is missing or
   * was already cancelled, so concurrent cancels resolve to a single winner.
   */
  async markCancelled(id: number): Promise<schema.Event | null> {
    const [event] = await this.db
      .update(schema.events)
      .set({ isCancelled: true })
      .where(
        and(eq(schema.events.id, id), eq(schema.events.isCancelled, false)),
      )
      .returning();
    return event ?? null;
  }
}

export function toEventResponse(
  event: schema.Event,
  activeRegistrations: number,
): EventResponseDto {
  return {
    id: event.id,
    title: event.title,
    category: event.category,
    format: event.format,
    startsAt: event.startsAt.toISOString(),
    location: event.location,
    description: event.description,
    organizerContact: event.organizerContact,
    isCancelled: event.isCancelled,
    createdAt: event.createdAt.toISOString(),
    activeRegistrations,
  };
}
