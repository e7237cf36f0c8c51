import { z } from 'zod';

export const HealthCheckSchema = z.object({
    status: z.enum(['ok', 'unhealthy']),
    timestamp: z.string(),
    db: z.object({
        connected: z.boolean(),
        latencyMs: z.number(),
    }),
    discord: z.object({
        connected: z.boolean(),
    }),
});

export type HealthCheckDto = z.infer<typeof HealthCheckSchema>;

// Events
export * from './events.schema.js';

// Registrations
export * from './registrations.schema.js';

// Reminders
export * from './reminders.schema.js';

// Notifications (delivery outcomes, broadcasts)
export * from './notifications.schema.js';

// Users (notification preferences)
export * from './users.schema.js';
