import {
  REMINDER_OFFSETS_MS,
  ReminderTypeSchema,
  type ReminderType,
} from '@event-pulse/contract';

export interface ReminderSlot {
  reminderType: ReminderType;
  remindAt: Date;
}

/**
 * Reminder instants for an event starting at `startsAt`, as seen at `now`.
 * Instants that are not strictly in the future are dropped, so a late
 * registration never receives a reminder for a moment that has passed.
 */
export function computeReminderSchedule(
  startsAt: Date,
  now: Date,
): ReminderSlot[] {
  return ReminderTypeSchema.options
    .map((reminderType) => ({
      reminderType,
      remindAt: new Date(startsAt.getTime() - REMINDER_OFFSETS_MS[reminderType]),
    }))
    .filter((slot) => slot.remindAt.getTime() > now.getTime());
}
