/**
 * matcher.ts
 *
 * Compares the player's owned units with a meta deck.
 *
 * Completion odds are combined per cost tier. Missing units of different
 * tiers are treated as independent. Missing units that share a tier compete
 * for the same slots: each refresh shows any subset of them (drawn with
 * their independent refresh odds) but only one of the shown units is bought,
 * picked uniformly. The group is walked as a chain over "which units are
 * already bought", so its joint odds never exceed the product of the
 * per-unit odds. Bought group members stay in the tier total.
 *
 * That chain has 2^m states, so it is only used for groups of up to
 * `EXACT_GROUP_LIMIT` units. Larger groups are treated as exchangeable: every
 * member gets the group's mean refresh odds and the chain only counts how
 * many are bought. With equal odds the two walks give the same result.
 */

import type {PoolSnapshot} from "./poolState.js";
import type {MetaDeck} from "./metaDeck.js";
import {type PoolProbabilityCalculator, type UnitOdds, assertProbability} from "./probability.js";

export const EXACT_GROUP_LIMIT = 6;

export interface MatchQuery {
    level: number;
    refreshBudget: number;
    snapshot: PoolSnapshot;
}

export interface TraitProgress {
    traitId: string;
    // Distinct owned units carrying the trait
    count: number;
    reachedLevel: number;
    targetLevel: number;
    met: boolean;
}

export interface DeckMatch {
    deck: MetaDeck;
    matchRatio: number;
    flexRatio: number;
    ownedCore: string[];
    missingCore: UnitOdds[];
    completionProbability: number;
    expectedRefreshes: number;
    // Sum of cost tiers of the missing core units
    acquisitionCost: number;
    traitProgress: TraitProgress[];
}

/**
 * Higher match ratio first, then higher completion odds, then cheaper
 * completion, then deck id.
 */
export function compareMatches(a: DeckMatch, b: DeckMatch): number {
    if (a.matchRatio !== b.matchRatio) return b.matchRatio - a.matchRatio;
    if (a.completionProbability !== b.completionProbability) return b.completionProbability - a.completionProbability;
    if (a.acquisitionCost !== b.acquisitionCost) return a.acquisitionCost - b.acquisitionCost;
    return a.deck.id < b.deck.id ? -1 : a.deck.id > b.deck.id ? 1 : 0;
}

export class DeckMatcher {
    constructor(private readonly calculator: PoolProbabilityCalculator) {
    }

    match(deck: MetaDeck, owned: ReadonlySet<string>, query: MatchQuery): DeckMatch {
        const registry = this.calculator.registry;
        this.calculator.odds.tierDistribution(query.level);
        for (const id of owned) registry.lookup(id);

        const ownedCore = deck.core.filter((id) => owned.has(id));
        const missingIds = deck.core.filter((id) => !owned.has(id));
        const ownedFlex = deck.flex.filter((id) => owned.has(id)).length;

        const missingCore = missingIds.map((id) =>
            this.calculator.unitOdds(id, query.level, query.snapshot, 1, query.refreshBudget));

        let expectedRefreshes = 0;
        let acquisitionCost = 0;
        for (const m of missingCore) {
            expectedRefreshes += m.expectedRefreshes;
            acquisitionCost += m.cost;
        }

        return {
            deck,
            matchRatio: ownedCore.length / deck.core.length,
            flexRatio: deck.flex.length === 0 ? 0 : ownedFlex / deck.flex.length,
            ownedCore,
            missingCore,
            completionProbability: this.completionProbability(missingIds, query),
            expectedRefreshes,
            acquisitionCost,
            traitProgress: this.traitProgress(deck, owned),
        };
    }

    matchAll(decks: readonly MetaDeck[], owned: ReadonlySet<string>, query: MatchQuery): DeckMatch[] {
        return decks.map((d) => this.match(d, owned, query)).sort(compareMatches);
    }

    /** Joint odds of buying every listed unit within the refresh budget. */
    completionProbability(missing: readonly string[], query: MatchQuery): number {
        this.calculator.odds.tierDistribution(query.level);
        const byTier = new Map<number, string[]>();
        for (const id of missing) {
            const cost = this.calculator.registry.lookup(id).cost;
            const group = byTier.get(cost);
            if (group) group.push(id);
            else byTier.set(cost, [id]);
        }
        let joint = 1;
        for (const group of byTier.values()) {
            joint *= group.length === 1
                ? this.calculator.acquisitionProbability(group[0], 1, query.level, query.snapshot, query.refreshBudget)
                : this.tierGroupProbability(group, query);
        }
        return assertProbability(joint, "deck completion odds");
    }

    private tierGroupProbability(group: readonly string[], query: MatchQuery): number {
        const hits = group.map((id) => this.calculator.refreshHitProbability(id, query.level, query.snapshot));
        return hits.length <= EXACT_GROUP_LIMIT
            ? exactGroupWalk(hits, query.refreshBudget)
            : exchangeableGroupWalk(hits, query.refreshBudget);
    }

    private traitProgress(deck: MetaDeck, owned: ReadonlySet<string>): TraitProgress[] {
        const registry = this.calculator.registry;
        return deck.traits.map((target) => {
            let count = 0;
            for (const id of owned) {
                if (registry.lookup(id).traits.includes(target.traitId)) count++;
            }
            const reachedLevel = registry.traitLevel(target.traitId, count);
            return {
                traitId: target.traitId,
                count,
                reachedLevel,
                targetLevel: target.level,
                met: reachedLevel >= target.level,
            };
        });
    }
}

/** Chain over the set of bought units; one purchase per refresh at most. */
function exactGroupWalk(hits: readonly number[], budget: number): number {
    const m = hits.length;
    const full = (1 << m) - 1;
    let state = new Array<number>(full + 1).fill(0);
    state[0] = 1;
    for (let step = 0; step < budget; step++) {
        const next = new Array<number>(full + 1).fill(0);
        next[full] = state[full];
        for (let mask = 0; mask < full; mask++) {
            const mass = state[mask];
            if (mass === 0) continue;
            const open = full & ~mask;
            // Every subset of the still-missing units can show up together; one of them is bought
            for (let shown = open; ; shown = (shown - 1) & open) {
                let p = 1;
                let shownCount = 0;
                for (let i = 0; i < m; i++) {
                    const bit = 1 << i;
                    if (!(open & bit)) continue;
                    if (shown & bit) {
                        p *= hits[i];
                        shownCount++;
                    } else {
                        p *= 1 - hits[i];
                    }
                }
                if (shownCount === 0) {
                    next[mask] += mass * p;
                } else if (p > 0) {
                    for (let i = 0; i < m; i++) {
                        if (shown & (1 << i)) next[mask | (1 << i)] += mass * p / shownCount;
                    }
                }
                if (shown === 0) break;
            }
        }
        state = next;
    }
    return state[full];
}

/**
 * Chain over the number of bought units, each still-missing unit showing
 * with the group's mean refresh odds.
 */
function exchangeableGroupWalk(hits: readonly number[], budget: number): number {
    const m = hits.length;
    const mean = hits.reduce((sum, h) => sum + h, 0) / m;
    let state = new Array<number>(m + 1).fill(0);
    state[0] = 1;
    for (let step = 0; step < budget; step++) {
        const next = new Array<number>(m + 1).fill(0);
        next[m] = state[m];
        for (let bought = 0; bought < m; bought++) {
            const mass = state[bought];
            if (mass === 0) continue;
            const anyShown = 1 - Math.pow(1 - mean, m - bought);
            next[bought + 1] += mass * anyShown;
            next[bought] += mass * (1 - anyShown);
        }
        state = next;
    }
    return state[m];
}
