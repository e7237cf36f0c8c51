import { Injectable, Logger } from '@nestjs/common';
import type * as schema from '../drizzle/schema';
import { EventsService } from './events.service';
import { RegistrationsService } from './registrations.service';
import { RemindersService } from '../reminders/reminders.service';

export type RegisterResult =
  | {
      status: 'registered';
      event: schema.Event;
      registration: schema.Registration;
      reminders: schema.ScheduledReminder[];
    }
  | { status: 'already_registered'; event: schema.Event }
  | { status: 'event_cancelled'; event: schema.Event }
  | { status: 'event_started'; event: schema.Event }
  | { status: 'registration_cancelled'; event: schema.Event }
  | { status: 'event_not_found' };

export type CancelRegistrationResult =
  | {
      status: 'cancelled';
      registration: schema.Registration;
      removedReminders: number;
    }
  | { status: 'not_registered' };

export type DeclineResult =
  | CancelRegistrationResult
  | { status: 'not_found' }
  | { status: 'forbidden' };

export type ConfirmAttendanceResult =
  | { status: 'confirmed'; event: schema.Event }
  | { status: 'not_active' }
  | { status: 'event_cancelled' }
  | { status: 'not_found' }
  | { status: 'forbidden' };

/**
 * Registration flows started by users: register, cancel, and the two
 * answers to a 24h reminder.
 *
 * Store methods are atomic on their own; this service only sequences them.
 * Cancelling removes pending reminders before flipping the status, and the
 * delivery scan ignores inactive registrations, so no reminder fires after
 * a cancel even when a tick runs in between.
 *
 * Registering derives reminders after its checks, so an event or
 * registration cancel may land in between. Both sides finish with
 * `deleteUnsentIfInactive`, which only deletes once the cancel is visible;
 * whichever runs last removes the stray reminders.
 */
@Injectable()
export class RegistrationLifecycleService {
  private readonly logger = new Logger(RegistrationLifecycleService.name);

  constructor(
    private readonly eventsService: EventsService,
    private readonly registrationsService: RegistrationsService,
    private readonly remindersService: RemindersService,
  ) {}

  async register(
    userId: string,
    eventId: number,
    now: Date = new Date(),
  ): Promise<RegisterResult> {
    const event = await this.eventsService.findOne(eventId);
    if (!event) return { status: 'event_not_found' };
    if (event.isCancelled) return { status: 'event_cancelled', event };
    if (event.startsAt.getTime() <= now.getTime()) {
      return { status: 'event_started', event };
    }

    const registration = await this.registrationsService.activate(
      userId,
      eventId,
    );
    if (!registration) return { status: 'already_registered', event };

    const reminders = await this.remindersService.deriveForRegistration(
      registration.id,
      event.startsAt,
      now,
    );

    const pruned = await this.remindersService.deleteUnsentIfInactive(
      registration.id,
    );
    const current = await this.eventsService.findOne(eventId);
    if (!current || current.isCancelled) {
      this.logger.log(
        `Event ${eventId} was cancelled while user ${userId} registered (${pruned} reminders removed)`,
      );
      return { status: 'event_cancelled', event: current ?? event };
    }
    const latest = await this.registrationsService.findById(registration.id);
    if (!latest || latest.status !== 'active') {
      this.logger.log(
        `Registration ${registration.id} was cancelled before registering completed (${pruned} reminders removed)`,
      );
      return { status: 'registration_cancelled', event: current };
    }

    this.logger.log(
      `User ${userId} registered for event ${eventId} (${reminders.length} reminders scheduled)`,
    );
    return { status: 'registered', event, registration, reminders };
  }

  /** Cancel the user's active registration. Safe to repeat. */
  async cancel(
    userId: string,
    eventId: number,
  ): Promise<CancelRegistrationResult> {
    const existing = await this.registrationsService.findOne(userId, eventId);
    if (!existing || existing.status !== 'active') {
      return { status: 'not_registered' };
    }

    const removedReminders =
      await this.remindersService.deleteUnsentForRegistration(existing.id);
    const registration = await this.registrationsService.cancel(
      userId,
      eventId,
    );
    if (!registration) return { status: 'not_registered' };
    // Reminders derived by a register still in flight
    const stray = await this.remindersService.deleteUnsentIfInactive(
      registration.id,
    );

    this.logger.log(
      `User ${userId} cancelled registration for event ${eventId} (${removedReminders + stray} reminders removed)`,
    );
    return {
      status: 'cancelled',
      registration,
      removedReminders: removedReminders + stray,
    };
  }

  /** "Can't make it" on a 24h reminder */
  async decline(userId: string, registrationId: number): Promise<DeclineResult> {
    const registration =
      await this.registrationsService.findById(registrationId);
    if (!registration) return { status: 'not_found' };
    if (registration.userId !== userId) {
      this.logger.warn(
        `User ${userId} tried to decline registration ${registrationId} owned by ${registration.userId}`,
      );
      return { status: 'forbidden' };
    }

    return this.cancel(userId, registration.eventId);
  }

  /** "I'll be there" on a 24h reminder. Changes nothing; the 15min reminder stays queued. */
  async confirmAttendance(
    userId: string,
    registrationId: number,
  ): Promise<ConfirmAttendanceResult> {
    const registration =
      await this.registrationsService.findById(registrationId);
    if (!registration) return { status: 'not_found' };
    if (registration.userId !== userId) return { status: 'forbidden' };
    if (registration.status !== 'active') return { status: 'not_active' };

    const event = await this.eventsService.findOne(registration.eventId);
    if (!event || event.isCancelled) return { status: 'event_cancelled' };

    return { status: 'confirmed', event };
  }
}
