import { z } from 'zod';

// ============================================================
// Event Categories & Formats
// ============================================================

/** Topic an event belongs to. Users subscribe to announcements per category. */
export const EventCategorySchema = z.enum(['it', 'sport', 'books']);
export type EventCategory = z.infer<typeof EventCategorySchema>;

export const EVENT_CATEGORIES = EventCategorySchema.options;

export const EVENT_CATEGORY_LABELS: Record<EventCategory, string> = {
    it: 'IT',
    sport: 'Sport',
    books: 'Books',
};

/** Whether attendees meet in person or join a stream. */
export const EventFormatSchema = z.enum(['online', 'offline']);
export type EventFormat = z.infer<typeof EventFormatSchema>;

export const EVENT_FORMAT_LABELS: Record<EventFormat, string> = {
    online: 'Online',
    offline: 'In person',
};

// ============================================================
// Event Creation Schema
// ============================================================

/**
 * Schema for creating a new event (POST /admin/events).
 * Online events carry a stream link in `location`, so it must be a URL.
 */
export const CreateEventSchema = z.object({
    title: z.string().trim().min(3).max(255),
    category: EventCategorySchema,
    format: EventFormatSchema,
    startsAt: z.string().datetime({ offset: true }), // ISO 8601 datetime (with TZ offset)
    location: z.string().trim().min(1).max(500),
    description: z.string().trim().max(2000).optional(),
    organizerContact: z.string().trim().min(1).max(255),
}).superRefine((data, ctx) => {
    if (new Date(data.startsAt).getTime() <= Date.now()) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Event start time must be in the future',
            path: ['startsAt'],
        });
    }
    if (data.format === 'online' && !z.string().url().safeParse(data.location).success) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Online events need a link as their location',
            path: ['location'],
        });
    }
});

export type CreateEventDto = z.infer<typeof CreateEventSchema>;

// ============================================================
// Event Response Schemas
// ============================================================

export const EventResponseSchema = z.object({
    id: z.number(),
    title: z.string(),
    category: EventCategorySchema,
    format: EventFormatSchema,
    startsAt: z.string().datetime(),
    location: z.string(),
    description: z.string().nullable(),
    organizerContact: z.string(),
    isCancelled: z.boolean(),
    createdAt: z.string().datetime(),
    /** Number of active registrations */
    activeRegistrations: z.number(),
});

export type EventResponseDto = z.infer<typeof EventResponseSchema>;

export const EventListResponseSchema = z.object({
    data: z.array(EventResponseSchema),
    total: z.number(),
});

export type EventListResponseDto = z.infer<typeof EventListResponseSchema>;

// ============================================================
// Query Schemas
// ============================================================

/** Query params are strings; `includeCancelled=true` opts into cancelled rows. */
export const IncludeCancelledQuerySchema = z.object({
    includeCancelled: z.enum(['true', 'false']).optional()
        .transform((value) => value === 'true'),
});

export type IncludeCancelledQueryDto = z.infer<typeof IncludeCancelledQuerySchema>;
