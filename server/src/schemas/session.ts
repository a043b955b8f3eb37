/**
 * session.ts
 *
 * Zod schemas for session routes: creating a session, changing its level and
 * feeding it observation events. Counts are checked for type only; the pool
 * ledger rejects non-positive counts with its own error code.
 */

import {z} from "zod";

const unitId = z.string().trim().min(1);
const level = z.number().int().positive();

export const poolSourceSchema = z.enum(["self", "opponent", "shop"]);

export const observationEventSchema = z.discriminatedUnion("type", [
    z.object({type: z.literal("OBSERVE"), unitId, count: z.number(), source: poolSourceSchema.optional()}),
    z.object({type: z.literal("RELEASE"), unitId, count: z.number(), source: poolSourceSchema.optional()}),
]);

export const createSessionSchema = z.object({
    level: level.optional(),
});

export const updateSessionSchema = z.object({
    level,
});

export const observationsSchema = z.object({
    events: z.array(observationEventSchema).min(1),
});

export const opponentsSchema = z.object({
    boards: z.array(z.array(unitId)),
});
