/**
 * In-process stand-ins for the store services, backed by plain arrays.
 *
 * They follow the same contracts as the Drizzle-backed services (conditional
 * updates, unique (user, event) key, due-reminder join) so lifecycle and
 * delivery-loop tests can run whole scenarios without a database.
 */
import type {
  CreateEventDto,
  EventCategory,
  UpdateNotificationPreferencesDto,
} from '@event-pulse/contract';
import type {
  Event,
  Registration,
  ScheduledReminder,
  User,
} from '../../drizzle/schema';
import type { UsersService, UserProfile } from '../../users/users.service';
import {
  UPCOMING_EVENTS_LIMIT,
  type EventsService,
  type UpcomingEventsQuery,
} from '../../events/events.service';
import type {
  ListByUserOptions,
  ParticipantRow,
  RegistrationsService,
  UserRegistrationRow,
} from '../../events/registrations.service';
import type {
  DueReminder,
  FailedAttemptResult,
  RemindersService,
} from '../../reminders/reminders.service';
import { DEFAULT_DUE_BATCH_SIZE } from '../../reminders/reminders.service';
import { computeReminderSchedule } from '../../reminders/reminder-schedule';

type PublicApi<T> = {
  [K in keyof T]: T[K];
};

export class InMemoryDatabase {
  readonly users: User[] = [];
  readonly events: Event[] = [];
  readonly registrations: Registration[] = [];
  readonly reminders: ScheduledReminder[] = [];

  /** When set, every store call rejects with this error */
  failure: Error | null = null;

  private sequences = { events: 0, registrations: 0, reminders: 0 };

  nextId(table: 'events' | 'registrations' | 'reminders'): number {
    this.sequences[table] += 1;
    return this.sequences[table];
  }

  async guard(): Promise<void> {
    if (this.failure) throw this.failure;
  }
}

export class InMemoryUsersService implements PublicApi<UsersService> {
  constructor(private readonly db: InMemoryDatabase) {}

  async upsert(profile: UserProfile): Promise<User> {
    await this.db.guard();
    const existing = this.db.users.find((u) => u.id === profile.id);
    if (existing) {
      existing.displayName = profile.displayName;
      existing.handle = profile.handle ?? null;
      return { ...existing };
    }
    const user: User = {
      id: profile.id,
      displayName: profile.displayName,
      handle: profile.handle ?? null,
      notifyIt: true,
      notifySport: true,
      notifyBooks: true,
      createdAt: new Date(),
    };
    this.db.users.push(user);
    return { ...user };
  }

  async findById(id: string): Promise<User | null> {
    await this.db.guard();
    const user = this.db.users.find((u) => u.id === id);
    return user ? { ...user } : null;
  }

  async updateNotificationPreferences(
    id: string,
    prefs: UpdateNotificationPreferencesDto,
  ): Promise<User | null> {
    await this.db.guard();
    const user = this.db.users.find((u) => u.id === id);
    if (!user) return null;
    if (prefs.notifyIt !== undefined) user.notifyIt = prefs.notifyIt;
    if (prefs.notifySport !== undefined) user.notifySport = prefs.notifySport;
    if (prefs.notifyBooks !== undefined) user.notifyBooks = prefs.notifyBooks;
    return { ...user };
  }

  async findSubscribers(category: EventCategory): Promise<User[]> {
    await this.db.guard();
    return this.db.users
      .filter((u) =>
        category === 'it'
          ? u.notifyIt
          : category === 'sport'
            ? u.notifySport
            : u.notifyBooks,
      )
      .map((u) => ({ ...u }));
  }
}

export class InMemoryEventsService implements PublicApi<EventsService> {
  constructor(private readonly db: InMemoryDatabase) {}

  async create(dto: CreateEventDto): Promise<Event> {
    await this.db.guard();
    const event: Event = {
      id: this.db.nextId('events'),
      title: dto.title,
      category: dto.category,
      format: dto.format,
      startsAt: new Date(dto.startsAt),
      location: dto.location,
      description: dto.description ?? null,
      organizerContact: dto.organizerContact,
      isCancelled: false,
      createdAt: new Date(),
    };
    this.db.events.push(event);
    return { ...event };
  }

  async findOne(id: number): Promise<Event | null> {
    await this.db.guard();
    const event = this.db.events.find((e) => e.id === id);
    return event ? { ...event } : null;
  }

  async findUpcoming(query: UpcomingEventsQuery = {}): Promise<Event[]> {
    await this.db.guard();
    const now = query.now ?? new Date();
    return this.db.events
      .filter(
        (e) =>
          !e.isCancelled &&
          e.startsAt.getTime() > now.getTime() &&
          (!query.category || e.category === query.category),
      )
      .sort((a, b) => a.startsAt.getTime() - b.startsAt.getTime())
      .slice(0, query.limit ?? UPCOMING_EVENTS_LIMIT)
      .map((e) => ({ ...e }));
  }

  async findAll(options: { includeCancelled?: boolean } = {}): Promise<Event[]> {
    await this.db.guard();
    return this.db.events
      .filter((e) => options.includeCancelled || !e.isCancelled)
      .sort((a, b) => b.startsAt.getTime() - a.startsAt.getTime())
      .map((e) => ({ ...e }));
  }

  async markCancelled(id: number): Promise<Event | null> {
    await this.db.guard();
    const event = this.db.events.find((e) => e.id === id && !e.isCancelled);
    if (!event) return null;
    event.isCancelled = true;
    return { ...event };
  }
}

export class InMemoryRegistrationsService
  implements PublicApi<RegistrationsService>
{
  constructor(private readonly db: InMemoryDatabase) {}

  async activate(userId: string, eventId: number): Promise<Registration | null> {
    await this.db.guard();
    const existing = this.find(userId, eventId);
    if (existing) {
      if (existing.status === 'active') return null;
      existing.status = 'active';
      return { ...existing };
    }
    const registration: Registration = {
      id: this.db.nextId('registrations'),
      userId,
      eventId,
      status: 'active',
      createdAt: new Date(),
    };
    this.db.registrations.push(registration);
    return { ...registration };
  }

  async cancel(userId: string, eventId: number): Promise<Registration | null> {
    await this.db.guard();
    const existing = this.find(userId, eventId);
    if (!existing || existing.status !== 'active') return null;
    existing.status = 'cancelled';
    return { ...existing };
  }

  async findOne(userId: string, eventId: number): Promise<Registration | null> {
    await this.db.guard();
    const existing = this.find(userId, eventId);
    return existing ? { ...existing } : null;
  }

  async findById(id: number): Promise<Registration | null> {
    await this.db.guard();
    const existing = this.db.registrations.find((r) => r.id === id);
    return existing ? { ...existing } : null;
  }

  async listByEvent(
    eventId: number,
    options: { includeCancelled?: boolean } = {},
  ): Promise<ParticipantRow[]> {
    await this.db.guard();
    const rows: ParticipantRow[] = [];
    for (const r of this.db.registrations) {
      if (r.eventId !== eventId) continue;
      if (!options.includeCancelled && r.status !== 'active') continue;
      const user = this.db.users.find((u) => u.id === r.userId);
      if (!user) continue;
      rows.push({
        registrationId: r.id,
        userId: user.id,
        displayName: user.displayName,
        handle: user.handle,
        status: r.status,
        registeredAt: r.createdAt,
      });
    }
    return rows.sort(
      (a, b) => a.registeredAt.getTime() - b.registeredAt.getTime(),
    );
  }

  async listByUser(
    userId: string,
    options: ListByUserOptions = {},
  ): Promise<UserRegistrationRow[]> {
    await this.db.guard();
    const rows: UserRegistrationRow[] = [];
    for (const r of this.db.registrations) {
      if (r.userId !== userId) continue;
      const event = this.db.events.find((e) => e.id === r.eventId);
      if (!event) continue;
      if (
        !options.includeCancelled &&
        (r.status !== 'active' || event.isCancelled)
      ) {
        continue;
      }
      if (
        options.startingAfter &&
        event.startsAt.getTime() <= options.startingAfter.getTime()
      ) {
        continue;
      }
      rows.push({ registration: { ...r }, event: { ...event } });
    }
    return rows.sort(
      (a, b) => a.event.startsAt.getTime() - b.event.startsAt.getTime(),
    );
  }

  async countActive(eventId: number): Promise<number> {
    await this.db.guard();
    return this.db.registrations.filter(
      (r) => r.eventId === eventId && r.status === 'active',
    ).length;
  }

  async countActiveByEvent(eventIds: number[]): Promise<Map<number, number>> {
    await this.db.guard();
    const counts = new Map<number, number>();
    for (const r of this.db.registrations) {
      if (r.status !== 'active' || !eventIds.includes(r.eventId)) continue;
      counts.set(r.eventId, (counts.get(r.eventId) ?? 0) + 1);
    }
    return counts;
  }

  private find(userId: string, eventId: number): Registration | undefined {
    return this.db.registrations.find(
      (r) => r.userId === userId && r.eventId === eventId,
    );
  }
}

export class InMemoryRemindersService implements PublicApi<RemindersService> {
  constructor(private readonly db: InMemoryDatabase) {}

  async deriveForRegistration(
    registrationId: number,
    startsAt: Date,
    now: Date = new Date(),
  ): Promise<ScheduledReminder[]> {
    await this.db.guard();
    const rows: ScheduledReminder[] = [];
    for (const slot of computeReminderSchedule(startsAt, now)) {
      const existing = this.db.reminders.find(
        (r) =>
          r.registrationId === registrationId &&
          r.reminderType === slot.reminderType,
      );
      if (existing) {
        // Unique (registration, type): refresh an unsent row, skip a sent one
        if (!existing.sent) {
          existing.remindAt = slot.remindAt;
          rows.push({ ...existing });
        }
        continue;
      }
      const reminder: ScheduledReminder = {
        id: this.db.nextId('reminders'),
        registrationId,
        reminderType: slot.reminderType,
        remindAt: slot.remindAt,
        sent: false,
        attempts: 0,
      };
      this.db.reminders.push(reminder);
      rows.push({ ...reminder });
    }
    return rows;
  }

  async findDue(
    now: Date = new Date(),
    limit: number = DEFAULT_DUE_BATCH_SIZE,
  ): Promise<DueReminder[]> {
    await this.db.guard();
    const due: DueReminder[] = [];
    for (const reminder of this.db.reminders) {
      if (reminder.sent || reminder.remindAt.getTime() > now.getTime()) continue;
      const registration = this.db.registrations.find(
        (r) => r.id === reminder.registrationId,
      );
      if (!registration || registration.status !== 'active') continue;
      const event = this.db.events.find((e) => e.id === registration.eventId);
      if (!event || event.isCancelled) continue;
      const user = this.db.users.find((u) => u.id === registration.userId);
      if (!user) continue;
      due.push({
        reminder: { ...reminder },
        event: { ...event },
        user: { ...user },
      });
    }
    return due
      .sort((a, b) => a.reminder.remindAt.getTime() - b.reminder.remindAt.getTime())
      .slice(0, limit);
  }

  async markSent(id: number): Promise<boolean> {
    await this.db.guard();
    const reminder = this.db.reminders.find((r) => r.id === id && !r.sent);
    if (!reminder) return false;
    reminder.sent = true;
    return true;
  }

  async recordFailedAttempt(
    id: number,
    maxAttempts: number,
  ): Promise<FailedAttemptResult | null> {
    await this.db.guard();
    const reminder = this.db.reminders.find((r) => r.id === id && !r.sent);
    if (!reminder) return null;
    reminder.attempts += 1;
    reminder.sent = reminder.attempts >= maxAttempts;
    return { attempts: reminder.attempts, abandoned: reminder.sent };
  }

  async deleteUnsentForRegistration(registrationId: number): Promise<number> {
    await this.db.guard();
    let removed = 0;
    for (let i = this.db.reminders.length - 1; i >= 0; i--) {
      const reminder = this.db.reminders[i];
      if (reminder.registrationId === registrationId && !reminder.sent) {
        this.db.reminders.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }

  async deleteUnsentIfInactive(registrationId: number): Promise<number> {
    await this.db.guard();
    const registration = this.db.registrations.find(
      (r) => r.id === registrationId,
    );
    if (!registration) return 0;
    const event = this.db.events.find((e) => e.id === registration.eventId);
    if (registration.status === 'active' && event && !event.isCancelled) {
      return 0;
    }
    let removed = 0;
    for (let i = this.db.reminders.length - 1; i >= 0; i--) {
      const reminder = this.db.reminders[i];
      if (reminder.registrationId === registrationId && !reminder.sent) {
        this.db.reminders.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }

  async markAllSentForEvent(eventId: number): Promise<number> {
    await this.db.guard();
    const registrationIds = new Set(
      this.db.registrations
        .filter((r) => r.eventId === eventId)
        .map((r) => r.id),
    );
    let changed = 0;
    for (const reminder of this.db.reminders) {
      if (registrationIds.has(reminder.registrationId) && !reminder.sent) {
        reminder.sent = true;
        changed++;
      }
    }
    return changed;
  }
}
