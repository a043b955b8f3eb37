/**
 * deck.ts
 *
 * Meta deck model shared by server and client code.
 * - `MetaDeckTraitTarget` is a trait level the composition is built to reach
 * - `MetaDeckDefinition` is a named target composition with required (core)
 *   and optional (flex) units
 *
 * These are plain serializable shapes (no methods) so they can come straight
 * from a crawler's JSON output.
 */

export type MetaDeckTraitTarget = {
    traitId: string;
    // Bonus level (1-based index into the trait's thresholds)
    level: number;
};

export type MetaDeckDefinition = {
    // Stable deck identifier, also the final tie-breaker when ranking
    id: string;
    name: string;
    // Published tier label such as "S" or "A", when the source provides one
    tier?: string;
    // Unit ids the composition cannot do without, in display order
    core: string[];
    flex?: string[];
    traits?: MetaDeckTraitTarget[];
};
