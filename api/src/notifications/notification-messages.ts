import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
} from 'discord.js';
import {
  EVENT_CATEGORY_LABELS,
  EVENT_FORMAT_LABELS,
  type EventCategory,
  type EventFormat,
  type ReminderType,
} from '@event-pulse/contract';
import type { Event } from '../drizzle/schema';
import {
  EMBED_COLORS,
  REGISTRATION_BUTTON_IDS,
  REMINDER_BUTTON_IDS,
} from '../discord-bot/discord-bot.constants';
import { toDiscordTimestamp } from '../discord-bot/utils/discord-timestamp';

/** A DM body: embeds plus optional button rows */
export interface NotificationMessage {
  embeds: EmbedBuilder[];
  components: ActionRowBuilder<ButtonBuilder>[];
}

export const CATEGORY_EMOJI: Record<EventCategory, string> = {
  it: '💻',
  sport: '🏃',
  books: '📚',
};

export const FORMAT_EMOJI: Record<EventFormat, string> = {
  online: '🌐',
  offline: '📍',
};

function whenField(event: Event) {
  return {
    name: 'When',
    value: `${toDiscordTimestamp(event.startsAt, 'F')} (${toDiscordTimestamp(event.startsAt, 'R')})`,
  };
}

function whereField(event: Event) {
  return {
    name: event.format === 'online' ? 'Link' : 'Where',
    value: event.location,
  };
}

/**
 * Full event card: category, format, time, place and organizer.
 * Shared by announcements and the bot's event detail view.
 */
export function buildEventEmbed(
  event: Event,
  color: number = EMBED_COLORS.ANNOUNCEMENT,
): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(`${CATEGORY_EMOJI[event.category]} ${event.title}`)
    .setColor(color)
    .addFields(
      whenField(event),
      {
        name: 'Category',
        value: EVENT_CATEGORY_LABELS[event.category],
        inline: true,
      },
      {
        name: 'Format',
        value: `${FORMAT_EMOJI[event.format]} ${EVENT_FORMAT_LABELS[event.format]}`,
        inline: true,
      },
      whereField(event),
      { name: 'Organizer', value: event.organizerContact },
    )
    .setFooter({ text: `Event #${event.id}` });

  if (event.description) {
    embed.setDescription(event.description);
  }
  return embed;
}

/**
 * Reminder DM. The 24h reminder asks the recipient to confirm or drop out;
 * the 15min one is informational and only repeats where to go.
 */
export function buildReminderMessage(
  type: ReminderType,
  event: Event,
  registrationId: number,
): NotificationMessage {
  if (type === '15min') {
    const embed = new EmbedBuilder()
      .setTitle(`🔔 Starting soon: ${event.title}`)
      .setDescription('Your event starts in 15 minutes.')
      .setColor(EMBED_COLORS.REMINDER)
      .addFields(whenField(event), whereField(event));
    return { embeds: [embed], components: [] };
  }

  const embed = new EmbedBuilder()
    .setTitle(`⏰ Tomorrow: ${event.title}`)
    .setDescription('Your event starts in 24 hours. Are you still coming?')
    .setColor(EMBED_COLORS.REMINDER)
    .addFields(whenField(event), whereField(event));

  const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(`${REMINDER_BUTTON_IDS.CONFIRM}:${registrationId}`)
      .setLabel("I'll be there")
      .setStyle(ButtonStyle.Success),
    new ButtonBuilder()
      .setCustomId(`${REMINDER_BUTTON_IDS.DECLINE}:${registrationId}`)
      .setLabel("Can't make it")
      .setStyle(ButtonStyle.Danger),
  );

  return { embeds: [embed], components: [row] };
}

/** New-event DM to category subscribers, with a one-click Register button */
export function buildAnnouncementMessage(event: Event): NotificationMessage {
  const embed = buildEventEmbed(event, EMBED_COLORS.ANNOUNCEMENT).setAuthor({
    name: `New ${EVENT_CATEGORY_LABELS[event.category]} event`,
  });

  const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(`${REGISTRATION_BUTTON_IDS.REGISTER}:${event.id}`)
      .setLabel('Register')
      .setStyle(ButtonStyle.Primary),
  );

  return { embeds: [embed], components: [row] };
}

/** Organizer's free-text message to everyone registered */
export function buildBroadcastMessage(
  event: Event,
  text: string,
): NotificationMessage {
  const embed = new EmbedBuilder()
    .setTitle(`📣 ${event.title}`)
    .setDescription(text)
    .setColor(EMBED_COLORS.BROADCAST)
    .setFooter({ text: 'Message from the organizer' });

  return { embeds: [embed], components: [] };
}

export function buildCancellationMessage(event: Event): NotificationMessage {
  const embed = new EmbedBuilder()
    .setTitle(`❌ Cancelled: ${event.title}`)
    .setDescription(
      `The event scheduled for ${toDiscordTimestamp(event.startsAt, 'F')} has been cancelled. ` +
        'Reminders for it are switched off.',
    )
    .setColor(EMBED_COLORS.ERROR);

  return { embeds: [embed], components: [] };
}
