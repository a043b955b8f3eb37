/**
 * catalog.ts
 *
 * Zod schemas for the catalog files handed over by the data-ingestion side.
 * These check shape only (types, required fields); semantic rules such as
 * ascending trait thresholds or odds summing to 1 are enforced by the engine
 * when the catalog is built.
 */

import {z} from "zod";

const id = z.string().trim().min(1);

export const unitSchema = z.object({
    id,
    name: z.string().min(1),
    cost: z.number(),
    traits: z.array(id),
    totalCopies: z.number(),
});

export const traitSchema = z.object({
    id,
    name: z.string().min(1),
    thresholds: z.array(z.number()),
});

export const shopOddsSchema = z.object({
    level: z.number(),
    tiers: z.record(z.string(), z.number()),
});

export const metaDeckSchema = z.object({
    id,
    name: z.string().min(1),
    tier: z.string().optional(),
    core: z.array(id),
    flex: z.array(id).optional(),
    traits: z.array(z.object({traitId: id, level: z.number()})).optional(),
});

export const unitsFileSchema = z.object({units: z.array(unitSchema)});
export const traitsFileSchema = z.object({traits: z.array(traitSchema)});
export const shopOddsFileSchema = z.object({levels: z.array(shopOddsSchema)});
export const metaDecksFileSchema = z.object({
    decks: z.array(metaDeckSchema),
    source: z.string().optional(),
    updatedAt: z.string().optional(),
});
