/**
 * recommendation.ts
 *
 * Zod schemas for recommendation, unit-odds and shop-advice requests.
 * Level and refresh budget fall back to the server defaults when omitted.
 */

import {z} from "zod";

const unitId = z.string().trim().min(1);

export const MAX_REFRESH_BUDGET = 500;

export const weightsSchema = z.object({
    match: z.number().finite(),
    completion: z.number().finite(),
    cost: z.number().finite(),
    flex: z.number().finite(),
}).partial();

export const recommendSchema = z.object({
    owned: z.array(unitId).default([]),
    refreshBudget: z.number().int().nonnegative().max(MAX_REFRESH_BUDGET).optional(),
    level: z.number().int().positive().optional(),
    weights: weightsSchema.optional(),
    // Restrict ranking to these decks; all catalog decks when omitted
    deckIds: z.array(unitId).optional(),
    limit: z.number().int().positive().optional(),
});

export const shopAdviceSchema = recommendSchema.extend({
    shop: z.array(unitId),
    topDecks: z.number().int().positive().optional(),
});

export const unitOddsQuerySchema = z.object({
    copies: z.coerce.number().int().nonnegative().max(100).default(1),
    refreshBudget: z.coerce.number().int().nonnegative().max(MAX_REFRESH_BUDGET).optional(),
    level: z.coerce.number().int().positive().optional(),
});

export type RecommendRequest = z.infer<typeof recommendSchema>;
