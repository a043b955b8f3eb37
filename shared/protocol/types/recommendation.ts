/**
 * recommendation.ts
 *
 * Wire shapes for recommendation results. Mirrors the engine's result types
 * with one difference: an unreachable target has an expected refresh count of
 * `null` here (JSON has no Infinity).
 */

export interface UnitOddsView {
    unitId: string;
    cost: number;
    remaining: number;
    // Probability that one shop slot shows this unit
    slotProbability: number;
    // Probability that one refresh shows at least one copy
    refreshProbability: number;
    copies: number;
    refreshBudget: number;
    // Probability of acquiring `copies` copies within `refreshBudget` refreshes
    acquisitionProbability: number;
    expectedRefreshes: number | null;
}

export interface TraitProgressView {
    traitId: string;
    count: number;
    reachedLevel: number;
    targetLevel: number;
    met: boolean;
}

export interface RecommendationView {
    rank: number;
    deckId: string;
    deckName: string;
    tier?: string;
    matchRatio: number;
    flexRatio: number;
    completionProbability: number;
    expectedRefreshes: number | null;
    acquisitionCost: number;
    score: number;
    ownedCore: string[];
    missingCore: UnitOddsView[];
    traitProgress: TraitProgressView[];
}

export type ShopPickRole = "core" | "flex" | "none";

export interface ShopPickView {
    slot: number;
    unitId: string;
    role: ShopPickRole;
    deckId: string | null;
    deckRank: number | null;
}
