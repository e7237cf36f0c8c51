import { z } from 'zod';

/** Reminder offsets derived for every registration */
export const ReminderTypeSchema = z.enum(['24h', '15min']);
export type ReminderType = z.infer<typeof ReminderTypeSchema>;

/** How long before the event start each reminder fires */
export const REMINDER_OFFSETS_MS: Record<ReminderType, number> = {
    '24h': 24 * 60 * 60 * 1000,
    '15min': 15 * 60 * 1000,
};

/** Result of one pass of the reminder delivery loop */
export const DeliveryRunSummarySchema = z.object({
    due: z.number(),
    delivered: z.number(),
    unreachable: z.number(),
    /** Transient failures that will be retried on the next scan */
    retrying: z.number(),
    /** Transient failures that hit the attempt cap and were given up */
    abandoned: z.number(),
    /** Reminders whose processing threw (storage errors and the like) */
    errored: z.number(),
});

export type DeliveryRunSummary = z.infer<typeof DeliveryRunSummarySchema>;
