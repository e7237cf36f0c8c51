import { z } from 'zod';
import type { EventCategory } from './events.schema.js';

// ==========================================
// Notification Preferences
// ==========================================

/** One announcement flag per event category. All default to on. */
export const NotificationPreferencesSchema = z.object({
    notifyIt: z.boolean(),
    notifySport: z.boolean(),
    notifyBooks: z.boolean(),
});

export type NotificationPreferencesDto = z.infer<typeof NotificationPreferencesSchema>;

/** Partial update: only the flags present are written. */
export const UpdateNotificationPreferencesSchema = NotificationPreferencesSchema.partial();

export type UpdateNotificationPreferencesDto = z.infer<typeof UpdateNotificationPreferencesSchema>;

/** Which preference flag gates announcements for a category */
export const CATEGORY_PREFERENCE_KEYS: Record<EventCategory, keyof NotificationPreferencesDto> = {
    it: 'notifyIt',
    sport: 'notifySport',
    books: 'notifyBooks',
};
