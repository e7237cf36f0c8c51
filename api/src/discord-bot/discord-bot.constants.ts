/**
 * Internal event names emitted by DiscordBotClientService.
 */
export const DISCORD_BOT_EVENTS = {
  CONNECTED: 'discord-bot.connected',
  DISCONNECTED: 'discord-bot.disconnected',
  ERROR: 'discord-bot.error',
} as const;

/**
 * Embed colors by message type.
 */
export const EMBED_COLORS = {
  /** New Event / Announcement: Cyan #38bdf8 */
  ANNOUNCEMENT: 0x38bdf8,
  /** Reminder: Amber #f59e0b */
  REMINDER: 0xf59e0b,
  /** Registration Confirmation: Emerald #34d399 */
  REGISTRATION_CONFIRMATION: 0x34d399,
  /** Organizer Broadcast: Purple #8b5cf6 */
  BROADCAST: 0x8b5cf6,
  /** Error / Cancellation: Red #ef4444 */
  ERROR: 0xef4444,
  /** Neutral listing: Slate #64748b */
  SYSTEM: 0x64748b,
} as const;

/**
 * Custom ID prefixes for interactive components.
 * Every ID is `<prefix>:<id>`, where id is an event id, a registration id
 * or a category.
 */
export const REGISTRATION_BUTTON_IDS = {
  REGISTER: 'event_register',
  UNREGISTER: 'event_unregister',
} as const;

export const REMINDER_BUTTON_IDS = {
  CONFIRM: 'reminder_confirm',
  DECLINE: 'reminder_decline',
} as const;

export const NOTIFICATION_TOGGLE_ID = 'notify_toggle';

/** String select menu on the /events listing */
export const EVENT_SELECT_ID = 'event_select';

/**
 * Map raw discord.js / gateway errors to user-friendly messages.
 */
export function friendlyDiscordErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) return 'Failed to connect with provided token';
  const raw = error.message;

  if (
    /disallowed intent|privileged intent/i.test(raw) ||
    ('code' in error && error.code === 4014)
  ) {
    return 'Missing a required privileged intent. Enable it in the Discord Developer Portal under Bot > Privileged Gateway Intents.';
  }
  if (/invalid token|TOKEN_INVALID/i.test(raw)) {
    return 'Invalid bot token. Please check the token and try again.';
  }
  if (/getaddrinfo|ENOTFOUND/i.test(raw)) {
    return 'Unable to reach Discord servers. Check your internet connection.';
  }
  if (/ECONNREFUSED/i.test(raw)) {
    return 'Connection to Discord was refused. Try again in a few moments.';
  }

  return 'Failed to connect with provided token';
}
