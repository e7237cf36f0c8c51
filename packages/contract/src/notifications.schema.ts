import { z } from 'zod';
import { EventResponseSchema } from './events.schema.js';

// ============================================================
// Delivery Outcomes
// ============================================================

/**
 * Outcome of a single direct message.
 * - delivered: the platform accepted the message
 * - unreachable: the recipient blocked the bot or no longer exists; never retried
 * - failed: transient (network, timeout, bot offline); eligible for retry
 */
export const DeliveryOutcomeSchema = z.enum(['delivered', 'unreachable', 'failed']);
export type DeliveryOutcome = z.infer<typeof DeliveryOutcomeSchema>;

export const DeliveryTallySchema = z.object({
    total: z.number(),
    delivered: z.number(),
    unreachable: z.number(),
    failed: z.number(),
});

export type DeliveryTally = z.infer<typeof DeliveryTallySchema>;

// ============================================================
// Admin Notification Requests / Responses
// ============================================================

/** Free-text message sent to every active registrant of an event */
export const BroadcastSchema = z.object({
    message: z.string().trim().min(3).max(2000),
});

export type BroadcastDto = z.infer<typeof BroadcastSchema>;

export const CreateEventResponseSchema = z.object({
    event: EventResponseSchema,
    announcement: DeliveryTallySchema,
});

export type CreateEventResponseDto = z.infer<typeof CreateEventResponseSchema>;

export const CancelEventResponseSchema = z.object({
    event: EventResponseSchema,
    /** Pending reminders that will no longer fire */
    suppressedReminders: z.number(),
    notifications: DeliveryTallySchema,
});

export type CancelEventResponseDto = z.infer<typeof CancelEventResponseSchema>;

export const BroadcastResponseSchema = z.object({
    eventId: z.number(),
    tally: DeliveryTallySchema,
});

export type BroadcastResponseDto = z.infer<typeof BroadcastResponseSchema>;
