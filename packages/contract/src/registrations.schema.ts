import { z } from 'zod';

// ============================================================
// Registration Schemas
// ============================================================

/** A cancelled registration can be re-activated by registering again. */
export const RegistrationStatusSchema = z.enum(['active', 'cancelled']);
export type RegistrationStatus = z.infer<typeof RegistrationStatusSchema>;

/** One registrant of an event, as listed to organizers */
export const ParticipantSchema = z.object({
    registrationId: z.number(),
    userId: z.string(),
    displayName: z.string(),
    handle: z.string().nullable(),
    status: RegistrationStatusSchema,
    registeredAt: z.string().datetime(),
});

export type ParticipantDto = z.infer<typeof ParticipantSchema>;

export const ParticipantListResponseSchema = z.object({
    eventId: z.number(),
    data: z.array(ParticipantSchema),
    total: z.number(),
});

export type ParticipantListResponseDto = z.infer<typeof ParticipantListResponseSchema>;
