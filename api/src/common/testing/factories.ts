/**
 * Shared mock data factories for backend tests.
 *
 * Each factory returns a plain object matching the Drizzle row shape
 * (database columns, not API response DTOs).
 */
import type {
  User,
  Event,
  Registration,
  ScheduledReminder,
} from '../../drizzle/schema';
import type { DueReminder } from '../../reminders/reminders.service';

export function createMockUser(overrides: Partial<User> = {}): User {
  return {
    id: '100000000000000001',
    displayName: 'Test User',
    handle: 'testuser',
    notifyIt: true,
    notifySport: true,
    notifyBooks: true,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function createMockEvent(overrides: Partial<Event> = {}): Event {
  return {
    id: 1,
    title: 'TypeScript Meetup',
    category: 'it',
    format: 'offline',
    startsAt: new Date('2026-03-10T18:00:00Z'),
    location: 'Main Library, Room 4',
    description: 'Lightning talks and pizza',
    organizerContact: '@organizer',
    isCancelled: false,
    createdAt: new Date('2026-02-01T00:00:00Z'),
    ...overrides,
  };
}

export function createMockRegistration(
  overrides: Partial<Registration> = {},
): Registration {
  return {
    id: 1,
    userId: '100000000000000001',
    eventId: 1,
    status: 'active',
    createdAt: new Date('2026-02-05T12:00:00Z'),
    ...overrides,
  };
}

export function createMockReminder(
  overrides: Partial<ScheduledReminder> = {},
): ScheduledReminder {
  return {
    id: 1,
    registrationId: 1,
    remindAt: new Date('2026-03-09T18:00:00Z'),
    reminderType: '24h',
    sent: false,
    attempts: 0,
    ...overrides,
  };
}

/** A due reminder as returned by the delivery scan join */
export function createMockDueReminder(
  overrides: {
    reminder?: Partial<ScheduledReminder>;
    event?: Partial<Event>;
    user?: Partial<User>;
  } = {},
): DueReminder {
  return {
    reminder: createMockReminder(overrides.reminder),
    event: createMockEvent(overrides.event),
    user: createMockUser(overrides.user),
  };
}
