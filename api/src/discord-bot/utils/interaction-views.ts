import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  StringSelectMenuBuilder,
} from 'discord.js';
import {
  CATEGORY_PREFERENCE_KEYS,
  EVENT_CATEGORIES,
  EVENT_CATEGORY_LABELS,
  EVENT_FORMAT_LABELS,
  type EventCategory,
  type NotificationPreferencesDto,
  type ReminderType,
} from '@event-pulse/contract';
import type { Event } from '../../drizzle/schema';
import type { UserRegistrationRow } from '../../events/registrations.service';
import type {
  CancelRegistrationResult,
  ConfirmAttendanceResult,
  DeclineResult,
  RegisterResult,
} from '../../events/registration-lifecycle.service';
import {
  EMBED_COLORS,
  EVENT_SELECT_ID,
  NOTIFICATION_TOGGLE_ID,
  REGISTRATION_BUTTON_IDS,
} from '../discord-bot.constants';
import { toDiscordTimestamp } from './discord-timestamp';
import {
  buildEventEmbed,
  CATEGORY_EMOJI,
  FORMAT_EMOJI,
} from '../../notifications/notification-messages';
import {
  googleCalendarUrl,
  yandexCalendarUrl,
} from '../../notifications/calendar-links';

export type ViewRow =
  | ActionRowBuilder<StringSelectMenuBuilder>
  | ActionRowBuilder<ButtonBuilder>;

/** Embeds and components for an interaction reply or update */
export interface InteractionView {
  embeds: EmbedBuilder[];
  components: ViewRow[];
}

/** Discord's limits for select options and link buttons */
const SELECT_TEXT_MAX = 100;
const LINK_BUTTON_URL_MAX = 512;

function shortDate(date: Date): string {
  return date.toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

function eventSelectMenu(events: Event[]): ActionRowBuilder<StringSelectMenuBuilder> {
  const menu = new StringSelectMenuBuilder()
    .setCustomId(EVENT_SELECT_ID)
    .setPlaceholder('Select an event for details...')
    .addOptions(
      events.map((event) => ({
        label: event.title.slice(0, SELECT_TEXT_MAX),
        value: String(event.id),
        description:
          `${EVENT_CATEGORY_LABELS[event.category]} · ${shortDate(event.startsAt)}`.slice(
            0,
            SELECT_TEXT_MAX,
          ),
      })),
    );
  return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu);
}

/** /events listing; callers handle the empty case */
export function buildEventListView(
  events: Event[],
  category?: EventCategory,
): InteractionView {
  const lines = events.map((event) =>
    [
      `**${event.title}**`,
      `${CATEGORY_EMOJI[event.category]} ${EVENT_CATEGORY_LABELS[event.category]} | ` +
        `${toDiscordTimestamp(event.startsAt, 'f')} | ` +
        `${FORMAT_EMOJI[event.format]} ${EVENT_FORMAT_LABELS[event.format]}`,
    ].join('\n'),
  );

  const embed = new EmbedBuilder()
    .setColor(EMBED_COLORS.SYSTEM)
    .setTitle(
      category
        ? `Upcoming ${EVENT_CATEGORY_LABELS[category]} events`
        : 'Upcoming events',
    )
    .setDescription(lines.join('\n\n'))
    .setFooter({ text: 'Pick an event below for details' });

  return { embeds: [embed], components: [eventSelectMenu(events)] };
}

export interface EventDetailState {
  isRegistered: boolean;
  activeRegistrations: number;
  now?: Date;
}

/**
 * Event card with a Register or Cancel button while the event is open,
 * plus calendar links.
 */
export function buildEventDetailView(
  event: Event,
  state: EventDetailState,
): InteractionView {
  const now = state.now ?? new Date();
  const embed = buildEventEmbed(event).addFields({
    name: 'Registered',
    value: String(state.activeRegistrations),
    inline: true,
  });

  const buttons: ButtonBuilder[] = [];
  const open = !event.isCancelled && event.startsAt.getTime() > now.getTime();
  if (open) {
    buttons.push(
      state.isRegistered
        ? new ButtonBuilder()
            .setCustomId(`${REGISTRATION_BUTTON_IDS.UNREGISTER}:${event.id}`)
            .setLabel('Cancel registration')
            .setStyle(ButtonStyle.Danger)
        : new ButtonBuilder()
            .setCustomId(`${REGISTRATION_BUTTON_IDS.REGISTER}:${event.id}`)
            .setLabel('Register')
            .setStyle(ButtonStyle.Primary),
    );
  }

  const calendarLinks: [string, string][] = [
    ['Google Calendar', googleCalendarUrl(event)],
    ['Yandex Calendar', yandexCalendarUrl(event)],
  ];
  for (const [label, url] of calendarLinks) {
    // Long descriptions can push the link past Discord's URL limit
    if (url.length > LINK_BUTTON_URL_MAX) continue;
    buttons.push(
      new ButtonBuilder().setLabel(label).setStyle(ButtonStyle.Link).setURL(url),
    );
  }

  if (event.isCancelled) {
    embed.setColor(EMBED_COLORS.ERROR).setAuthor({ name: 'Cancelled' });
  }

  const components: ViewRow[] =
    buttons.length > 0
      ? [new ActionRowBuilder<ButtonBuilder>().addComponents(...buttons)]
      : [];
  return { embeds: [embed], components };
}

/** /my-events listing; callers handle the empty case */
export function buildMyEventsView(rows: UserRegistrationRow[]): InteractionView {
  const lines = rows.map(({ event }) =>
    [
      `**${event.title}**`,
      `${toDiscordTimestamp(event.startsAt, 'f')} (${toDiscordTimestamp(event.startsAt, 'R')}) | ` +
        `${FORMAT_EMOJI[event.format]} ${event.location}`,
    ].join('\n'),
  );

  const embed = new EmbedBuilder()
    .setColor(EMBED_COLORS.REGISTRATION_CONFIRMATION)
    .setTitle('Your upcoming events')
    .setDescription(lines.join('\n\n'))
    .setFooter({
      text: rows.length === 1 ? '1 registration' : `${rows.length} registrations`,
    });

  return {
    embeds: [embed],
    components: [eventSelectMenu(rows.map((row) => row.event))],
  };
}

/** /notifications: one toggle button per category */
export function buildNotificationSettingsView(
  preferences: NotificationPreferencesDto,
): InteractionView {
  const embed = new EmbedBuilder()
    .setColor(EMBED_COLORS.SYSTEM)
    .setTitle('🔔 Announcement settings')
    .setDescription(
      'New events in the categories switched on here are announced to you by DM.',
    );

  const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
    EVENT_CATEGORIES.map((category) => {
      const enabled = preferences[CATEGORY_PREFERENCE_KEYS[category]];
      return new ButtonBuilder()
        .setCustomId(`${NOTIFICATION_TOGGLE_ID}:${category}`)
        .setLabel(
          `${CATEGORY_EMOJI[category]} ${EVENT_CATEGORY_LABELS[category]}: ${enabled ? 'On' : 'Off'}`,
        )
        .setStyle(enabled ? ButtonStyle.Success : ButtonStyle.Secondary);
    }),
  );

  return { embeds: [embed], components: [row] };
}

const REMINDER_PHRASES: Record<ReminderType, string> = {
  '24h': '24 hours',
  '15min': '15 minutes',
};

export function registerReply(result: RegisterResult): string {
  switch (result.status) {
    case 'registered': {
      const registered = `✅ You're registered for **${result.event.title}**.`;
      if (result.reminders.length === 0) {
        return `${registered} It starts very soon, so no reminders will be sent.`;
      }
      const phrases = result.reminders.map(
        (reminder) => REMINDER_PHRASES[reminder.reminderType],
      );
      return `${registered} I'll remind you ${phrases.join(' and ')} before it starts.`;
    }
    case 'already_registered':
      return `You're already registered for **${result.event.title}**.`;
    case 'event_cancelled':
      return `**${result.event.title}** has been cancelled.`;
    case 'event_started':
      return `**${result.event.title}** has already started.`;
    case 'registration_cancelled':
      return `Your registration for **${result.event.title}** was cancelled before it went through.`;
    case 'event_not_found':
      return 'That event no longer exists.';
  }
}

export function cancelRegistrationReply(
  result: CancelRegistrationResult,
): string {
  switch (result.status) {
    case 'cancelled':
      return 'Your registration is cancelled. You will not get reminders for this event.';
    case 'not_registered':
      return "You're not registered for this event.";
  }
}

const INVALID_REMINDER_REPLY = 'This reminder is no longer valid.';

export function confirmAttendanceReply(result: ConfirmAttendanceResult): string {
  switch (result.status) {
    case 'confirmed':
      return `👍 Great, see you at **${result.event.title}**!`;
    case 'not_active':
      return "You're no longer registered for this event.";
    case 'event_cancelled':
      return 'This event has been cancelled.';
    case 'not_found':
    case 'forbidden':
      return INVALID_REMINDER_REPLY;
  }
}

export function declineReply(result: DeclineResult): string {
  switch (result.status) {
    case 'cancelled':
      return 'Got it. Your registration is cancelled and no more reminders will be sent.';
    case 'not_registered':
      return "You're no longer registered for this event.";
    case 'not_found':
    case 'forbidden':
      return INVALID_REMINDER_REPLY;
  }
}
