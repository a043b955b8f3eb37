/**
 * probability.ts
 *
 * Shop odds for individual units, derived from the registry, the level odds
 * table and a pool snapshot. Pure: nothing here mutates the snapshot.
 *
 *   slot(u)    = tierOdds(level)[cost(u)] * remaining(u) / remainingAtTier(cost(u))
 *   refresh(u) = drawModel(slot odds, slotsPerRefresh)
 *
 * Acquiring k copies is treated as k geometric phases, one per copy. Each
 * phase uses the hit probability recomputed after the previous copies left
 * the pool, so later copies are never more likely than earlier ones. At most
 * one copy is counted per refresh.
 */

import type {UnitRegistry} from "./registry.js";
import type {ShopOddsTable} from "./odds.js";
import type {PoolSnapshot} from "./poolState.js";
import {type DrawModel, type DrawModelName, drawModelByName} from "./drawModels.js";
import {InvalidQueryError, ProbabilityInvariantError} from "./errors.js";

const PROBABILITY_EPSILON = 1e-9;

/**
 * Final sanity check on a computed probability. Absorbs float noise within
 * 1e-9 of the bounds and throws on anything further out.
 */
export function assertProbability(value: number, context: string): number {
    if (Number.isNaN(value) || value < -PROBABILITY_EPSILON || value > 1 + PROBABILITY_EPSILON) {
        throw new ProbabilityInvariantError(value, context);
    }
    return Math.min(1, Math.max(0, value));
}

function requireCount(name: string, n: number): void {
    if (!Number.isInteger(n) || n < 0) throw new InvalidQueryError(`${name} must be a non-negative integer, got ${n}`);
}

export interface CalculatorOptions {
    slotsPerRefresh: number;
    model?: DrawModelName;
}

export interface UnitOdds {
    unitId: string;
    cost: number;
    remaining: number;
    slotProbability: number;
    refreshProbability: number;
    copies: number;
    refreshBudget: number;
    acquisitionProbability: number;
    // Infinity when the pool cannot supply the copies at this level
    expectedRefreshes: number;
}

export class PoolProbabilityCalculator {
    readonly slotsPerRefresh: number;
    readonly model: DrawModel;

    constructor(
        readonly registry: UnitRegistry,
        readonly odds: ShopOddsTable,
        options: CalculatorOptions,
    ) {
        if (!Number.isInteger(options.slotsPerRefresh) || options.slotsPerRefresh <= 0) {
            throw new InvalidQueryError(`slotsPerRefresh must be a positive integer, got ${options.slotsPerRefresh}`);
        }
        this.slotsPerRefresh = options.slotsPerRefresh;
        this.model = drawModelByName(options.model ?? "independent");
    }

    slotProbability(unitId: string, level: number, snapshot: PoolSnapshot): number {
        const unit = this.registry.lookup(unitId);
        const q = this.odds.tierProbability(level, unit.cost);
        const tierLeft = snapshot.totalRemainingAtTier(unit.cost);
        if (tierLeft === 0) return 0;
        return assertProbability(q * (snapshot.remaining(unitId) / tierLeft), `slot odds for ${unitId}`);
    }

    refreshHitProbability(unitId: string, level: number, snapshot: PoolSnapshot): number {
        const unit = this.registry.lookup(unitId);
        return this.hitAfter(unit.id, 0, level, snapshot);
    }

    /**
     * Expected refreshes to pick up `copies` more copies. Infinity when any
     * phase has zero hit probability (not enough copies left, or the level
     * never rolls the tier).
     *
     * @throws InvalidLevelError for an unsupported level, even when `copies` is 0
     */
    expectedRefreshes(unitId: string, copies: number, level: number, snapshot: PoolSnapshot): number {
        requireCount("copies", copies);
        this.odds.tierDistribution(level);
        const unit = this.registry.lookup(unitId);
        let total = 0;
        for (const h of this.hitSequence(unit.id, copies, level, snapshot)) {
            if (h === 0) return Number.POSITIVE_INFINITY;
            total += 1 / h;
        }
        return total;
    }

    /** Probability of picking up `copies` more copies within `refreshBudget` refreshes. */
    acquisitionProbability(unitId: string, copies: number, level: number, snapshot: PoolSnapshot, refreshBudget: number): number {
        requireCount("copies", copies);
        requireCount("refreshBudget", refreshBudget);
        this.odds.tierDistribution(level);
        const unit = this.registry.lookup(unitId);
        const hits = this.hitSequence(unit.id, copies, level, snapshot);
        return assertProbability(completionWithin(hits, refreshBudget), `acquisition odds for ${unitId}`);
    }

    unitOdds(unitId: string, level: number, snapshot: PoolSnapshot, copies: number, refreshBudget: number): UnitOdds {
        const unit = this.registry.lookup(unitId);
        return {
            unitId: unit.id,
            cost: unit.cost,
            remaining: snapshot.remaining(unit.id),
            slotProbability: this.slotProbability(unit.id, level, snapshot),
            refreshProbability: this.refreshHitProbability(unit.id, level, snapshot),
            copies,
            refreshBudget,
            acquisitionProbability: this.acquisitionProbability(unit.id, copies, level, snapshot, refreshBudget),
            expectedRefreshes: this.expectedRefreshes(unit.id, copies, level, snapshot),
        };
    }

    /**
     * Refresh hit probability with `taken` extra copies of the unit already
     * out of the pool (and so out of its tier's total).
     */
    private hitAfter(unitId: string, taken: number, level: number, snapshot: PoolSnapshot): number {
        const unit = this.registry.lookup(unitId);
        const q = this.odds.tierProbability(level, unit.cost);
        const r = snapshot.remaining(unit.id) - taken;
        const t = snapshot.totalRemainingAtTier(unit.cost) - taken;
        return assertProbability(
            this.model.refreshHitProbability(q, r, t, this.slotsPerRefresh),
            `refresh odds for ${unit.id}`,
        );
    }

    private hitSequence(unitId: string, copies: number, level: number, snapshot: PoolSnapshot): number[] {
        const hits: number[] = [];
        for (let i = 0; i < copies; i++) {
            hits.push(this.hitAfter(unitId, i, level, snapshot));
        }
        return hits;
    }
}

/**
 * Probability that a chain of geometric phases with per-refresh success
 * `hits[i]` finishes within `budget` refreshes (one phase per refresh at most).
 */
export function completionWithin(hits: readonly number[], budget: number): number {
    const k = hits.length;
    if (k === 0) return 1;
    let state = new Array<number>(k + 1).fill(0);
    state[0] = 1;
    for (let step = 0; step < budget; step++) {
        const next = new Array<number>(k + 1).fill(0);
        next[k] = state[k];
        for (let i = 0; i < k; i++) {
            if (state[i] === 0) continue;
            next[i + 1] += state[i] * hits[i];
            next[i] += state[i] * (1 - hits[i]);
        }
        state = next;
    }
    return state[k];
}
