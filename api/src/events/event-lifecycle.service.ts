import { Injectable, Logger } from '@nestjs/common';
import type { CreateEventDto, DeliveryTally } from '@event-pulse/contract';
import type * as schema from '../drizzle/schema';
import { EventsService } from './events.service';
import { RegistrationsService } from './registrations.service';
import { RemindersService } from '../reminders/reminders.service';
import { UsersService } from '../users/users.service';
import { NotificationDispatcherService } from '../notifications/notification-dispatcher.service';
import {
  buildAnnouncementMessage,
  buildBroadcastMessage,
  buildCancellationMessage,
} from '../notifications/notification-messages';

export interface PublishEventResult {
  event: schema.Event;
  announcement: DeliveryTally;
}

export type CancelEventResult =
  | {
      status: 'cancelled';
      event: schema.Event;
      suppressedReminders: number;
      notifications: DeliveryTally;
    }
  | { status: 'already_cancelled'; event: schema.Event }
  | { status: 'not_found' };

export type BroadcastResult =
  | { status: 'sent'; event: schema.Event; tally: DeliveryTally }
  | { status: 'no_participants'; event: schema.Event }
  | { status: 'not_found' };

/**
 * Organizer-side event flows: publish with announcement, cancel with the
 * reminder cascade, and broadcast to registrants.
 */
@Injectable()
export class EventLifecycleService {
  private readonly logger = new Logger(EventLifecycleService.name);

  constructor(
    private readonly eventsService: EventsService,
    private readonly registrationsService: RegistrationsService,
    private readonly remindersService: RemindersService,
    private readonly usersService: UsersService,
    private readonly dispatcher: NotificationDispatcherService,
  ) {}

  /** Create the event and announce it to the category's subscribers */
  async publish(dto: CreateEventDto): Promise<PublishEventResult> {
    const event = await this.eventsService.create(dto);
    const subscribers = await this.usersService.findSubscribers(event.category);
    const announcement = await this.dispatcher.sendBatch(
      subscribers.map((user) => user.id),
      buildAnnouncementMessage(event),
    );

    this.logger.log(
      `Published event ${event.id} "${event.title}"; announced to ${announcement.delivered}/${announcement.total} subscribers`,
    );
    return { event, announcement };
  }

  /**
   * Cancel an event. Pending reminders are retired before the event is
   * flagged and swept once more after, catching reminders a concurrent
   * register derived in between. Registrations stay active; everyone active
   * once the flag is set is told.
   */
  async cancel(eventId: number): Promise<CancelEventResult> {
    const event = await this.eventsService.findOne(eventId);
    if (!event) return { status: 'not_found' };
    if (event.isCancelled) return { status: 'already_cancelled', event };

    const retired = await this.remindersService.markAllSentForEvent(eventId);
    const cancelled = await this.eventsService.markCancelled(eventId);
    if (!cancelled) return { status: 'already_cancelled', event };
    const swept = await this.remindersService.markAllSentForEvent(eventId);
    const suppressedReminders = retired + swept;

    const participants = await this.registrationsService.listByEvent(eventId);
    const notifications = await this.dispatcher.sendBatch(
      participants.map((participant) => participant.userId),
      buildCancellationMessage(cancelled),
    );

    this.logger.log(
      `Cancelled event ${eventId}: ${suppressedReminders} reminders suppressed, ` +
        `${notifications.delivered}/${notifications.total} participants notified`,
    );
    return { status: 'cancelled', event: cancelled, suppressedReminders, notifications };
  }

  /** Send an organizer message to every active registrant */
  async broadcast(eventId: number, text: string): Promise<BroadcastResult> {
    const event = await this.eventsService.findOne(eventId);
    if (!event) return { status: 'not_found' };

    const participants = await this.registrationsService.listByEvent(eventId);
    if (participants.length === 0) return { status: 'no_participants', event };

    const tally = await this.dispatcher.sendBatch(
      participants.map((participant) => participant.userId),
      buildBroadcastMessage(event, text),
    );

    this.logger.log(
      `Broadcast for event ${eventId}: ${tally.delivered}/${tally.total} delivered`,
    );
    return { status: 'sent', event, tally };
  }
}
