import { DiscordAPIError, RESTJSONErrorCodes } from 'discord.js';
import type { DeliveryOutcome } from '@event-pulse/contract';

/** Discord API error codes that mean the DM can never succeed */
const UNREACHABLE_ERROR_CODES: ReadonlySet<number | string> = new Set([
  RESTJSONErrorCodes.CannotSendMessagesToThisUser,
  RESTJSONErrorCodes.UnknownUser,
]);

/** Fallback for errors that arrive without a Discord code */
const UNREACHABLE_MESSAGE_PATTERN = /blocked|deactivated/i;

export class DeliveryTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'DeliveryTimeoutError';
  }
}

/**
 * Map a failed send to an outcome. Only a recipient that blocked the bot,
 * closed DMs or no longer exists is unreachable; everything else is
 * transient and may be retried.
 */
export function classifyDeliveryError(error: unknown): DeliveryOutcome {
  if (error instanceof DiscordAPIError && UNREACHABLE_ERROR_CODES.has(error.code)) {
    return 'unreachable';
  }
  const message = error instanceof Error ? error.message : String(error);
  if (UNREACHABLE_MESSAGE_PATTERN.test(message)) {
    return 'unreachable';
  }
  return 'failed';
}

/**
 * Race a send against a timer. The underlying request is not aborted; a
 * late rejection is still observed by the race and does not go unhandled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new DeliveryTimeoutError(label, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
