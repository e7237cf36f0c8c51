import type { ParticipantRow } from '../events/registrations.service';
import { toCsv, UTF8_BOM } from '../common/csv.util';

export const PARTICIPANT_CSV_HEADERS = [
  '#',
  'Name',
  'Handle',
  'Discord ID',
  'Status',
  'Registered At',
] as const;

/** Spreadsheet-ready participant list, numbered in registration order */
export function participantsToCsv(rows: readonly ParticipantRow[]): string {
  return (
    UTF8_BOM +
    toCsv(
      PARTICIPANT_CSV_HEADERS,
      rows.map((row, index) => [
        index + 1,
        row.displayName,
        row.handle ? `@${row.handle}` : null,
        row.userId,
        row.status,
        row.registeredAt.toISOString(),
      ]),
    )
  );
}

export function participantsCsvFilename(eventId: number): string {
  return `event-${eventId}-participants.csv`;
}
