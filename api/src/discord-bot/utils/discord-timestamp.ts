/**
 * Discord timestamp styles.
 * F: full date and time, R: relative ("in 2 hours"), t: short time.
 */
export type DiscordTimestampStyle = 'F' | 'f' | 'R' | 't' | 'T' | 'D' | 'd';

/**
 * Format a date as a Discord timestamp tag (`<t:epoch:style>`), which every
 * client renders in the reader's own timezone.
 */
export function toDiscordTimestamp(
  date: Date,
  style: DiscordTimestampStyle = 'F',
): string {
  const epoch = Math.floor(date.getTime() / 1000);
  return `<t:${epoch}:${style}>`;
}
