/**
 * unit.ts
 *
 * Catalog shapes shared by the server and any front end. These are the
 * already-parsed structures the data-ingestion side hands to the engine:
 * - `UnitDefinition` is one draftable unit with its cost tier and pool size
 * - `TraitDefinition` lists the distinct-unit counts needed per bonus level
 * - `ShopOddsDefinition` maps a player level to per-tier shop probabilities
 */

export type UnitDefinition = {
    id: string;
    name: string;
    // Cost tier (1 = cheapest)
    cost: number;
    traits: string[];
    // Copies of this unit printed in the shared pool
    totalCopies: number;
};

export type TraitDefinition = {
    id: string;
    name: string;
    // Distinct units with this trait needed for each bonus level, ascending
    thresholds: number[];
};

export type ShopOddsDefinition = {
    level: number;
    // Cost tier (as string key, JSON style) -> probability of a slot rolling that tier
    tiers: Record<string, number>;
};
