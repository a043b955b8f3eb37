/**
 * poolState.ts
 *
 * The shared-pool ledger for one session. Every copy taken out of the pool is
 * recorded under the place it went (`self`, `opponent`, `shop`), so
 *
 *   remaining = totalCopies - held.self - held.opponent - held.shop
 *
 * and `0 <= remaining <= totalCopies` holds after every call. An observation
 * that would break the bound throws and leaves the ledger untouched; counts
 * are never clamped. Batches are all-or-nothing.
 *
 * The tracker is single-writer: callers serialize mutations per session (see
 * `session/lock.ts`). Readers take a `PoolSnapshot`, which is detached from
 * later mutations.
 */

import type {ObservationEvent, PoolSource, PoolTierStatus} from "../../../shared/protocol/types/session.js";
import type {UnitRegistry} from "./registry.js";
import {InvalidObservationError, PoolOverflowError, PoolUnderflowError} from "./errors.js";

export const POOL_SOURCES: readonly PoolSource[] = ["self", "opponent", "shop"];

type Holdings = Record<PoolSource, number>;

function emptyHoldings(): Holdings {
    return {self: 0, opponent: 0, shop: 0};
}

function heldTotal(h: Holdings): number {
    return h.self + h.opponent + h.shop;
}

/**
 * Frozen view of remaining copies. Also used by the calculator to reason about
 * hypothetical purchases through {@link PoolSnapshot.withTaken}.
 */
export class PoolSnapshot {
    private readonly tierTotals = new Map<number, number>();

    private constructor(
        private readonly registry: UnitRegistry,
        private readonly counts: ReadonlyMap<string, number>,
    ) {
    }

    /** Snapshot of an untouched pool: every unit at its full copy count. */
    static full(registry: UnitRegistry): PoolSnapshot {
        return new PoolSnapshot(registry, new Map(registry.all().map((u) => [u.id, u.totalCopies])));
    }

    static fromCounts(registry: UnitRegistry, counts: ReadonlyMap<string, number>): PoolSnapshot {
        const copy = new Map<string, number>();
        for (const unit of registry.all()) {
            const n = counts.get(unit.id) ?? unit.totalCopies;
            if (!Number.isInteger(n) || n < 0) throw new PoolUnderflowError(unit.id, unit.totalCopies - n, 0);
            if (n > unit.totalCopies) throw new PoolOverflowError(unit.id, n - unit.totalCopies, 0);
            copy.set(unit.id, n);
        }
        return new PoolSnapshot(registry, copy);
    }

    remaining(unitId: string): number {
        this.registry.lookup(unitId);
        return this.counts.get(unitId) ?? 0;
    }

    totalRemainingAtTier(tier: number): number {
        const cached = this.tierTotals.get(tier);
        if (cached !== undefined) return cached;
        let sum = 0;
        for (const unit of this.registry.unitsOfCost(tier)) {
            sum += this.counts.get(unit.id) ?? 0;
        }
        this.tierTotals.set(tier, sum);
        return sum;
    }

    /** A new snapshot with `count` more copies of a unit taken out. */
    withTaken(unitId: string, count: number): PoolSnapshot {
        const left = this.remaining(unitId);
        if (count > left) throw new PoolUnderflowError(unitId, count, left);
        const next = new Map(this.counts);
        next.set(unitId, left - count);
        return new PoolSnapshot(this.registry, next);
    }
}

export class PoolStateTracker {
    private readonly ledger = new Map<string, Holdings>();

    constructor(private readonly registry: UnitRegistry) {
    }

    remaining(unitId: string): number {
        const unit = this.registry.lookup(unitId);
        const h = this.ledger.get(unitId);
        return unit.totalCopies - (h ? heldTotal(h) : 0);
    }

    held(unitId: string, source: PoolSource): number {
        this.registry.lookup(unitId);
        return this.ledger.get(unitId)?.[source] ?? 0;
    }

    heldTotals(): Holdings {
        const out = emptyHoldings();
        for (const h of this.ledger.values()) {
            for (const s of POOL_SOURCES) out[s] += h[s];
        }
        return out;
    }

    /**
     * Take `count` copies out of the pool.
     *
     * @returns remaining copies after the observation
     * @throws PoolUnderflowError when fewer than `count` copies remain
     */
    observeOwned(unitId: string, count: number, source: PoolSource = "self"): number {
        this.applyAll([{type: "OBSERVE", unitId, count, source}]);
        return this.remaining(unitId);
    }

    /**
     * Put `count` copies back, e.g. after a sale.
     *
     * @returns remaining copies after the release
     * @throws PoolOverflowError when the source holds fewer than `count` copies
     */
    release(unitId: string, count: number, source: PoolSource = "self"): number {
        this.applyAll([{type: "RELEASE", unitId, count, source}]);
        return this.remaining(unitId);
    }

    /**
     * Apply a batch of observations atomically. The batch is replayed on a
     * scratch copy of the affected ledger rows and committed only if every
     * event keeps its unit within bounds.
     */
    applyAll(events: readonly ObservationEvent[]): void {
        const scratch = new Map<string, Holdings>();
        for (const ev of events) {
            const unit = this.registry.lookup(ev.unitId);
            if (!Number.isInteger(ev.count) || ev.count <= 0) {
                throw new InvalidObservationError(`count for "${ev.unitId}" must be a positive integer, got ${ev.count}`);
            }
            const source = ev.source ?? "self";
            let row = scratch.get(unit.id);
            if (!row) {
                row = {...(this.ledger.get(unit.id) ?? emptyHoldings())};
                scratch.set(unit.id, row);
            }
            if (ev.type === "OBSERVE") {
                const left = unit.totalCopies - heldTotal(row);
                if (ev.count > left) throw new PoolUnderflowError(unit.id, ev.count, left);
                row[source] += ev.count;
            } else {
                if (ev.count > row[source]) throw new PoolOverflowError(unit.id, ev.count, row[source]);
                row[source] -= ev.count;
            }
        }
        for (const [id, row] of scratch) {
            if (heldTotal(row) === 0) this.ledger.delete(id);
            else this.ledger.set(id, row);
        }
    }

    /** Record one copy per unit listed on each opponent board. */
    observeOpponentBoards(boards: readonly (readonly string[])[]): void {
        const events: ObservationEvent[] = [];
        for (const board of boards) {
            for (const unitId of board) {
                events.push({type: "OBSERVE", unitId, count: 1, source: "opponent"});
            }
        }
        this.applyAll(events);
    }

    snapshot(): PoolSnapshot {
        const counts = new Map<string, number>();
        for (const unit of this.registry.all()) {
            const h = this.ledger.get(unit.id);
            counts.set(unit.id, unit.totalCopies - (h ? heldTotal(h) : 0));
        }
        return PoolSnapshot.fromCounts(this.registry, counts);
    }
}

/** Pool status grouped by cost tier, cheapest tier first. */
export function summarizePool(registry: UnitRegistry, snapshot: PoolSnapshot): PoolTierStatus[] {
    return registry.costTiers().map((cost) => {
        const units = registry.unitsOfCost(cost).map((u) => ({
            unitId: u.id,
            name: u.name,
            remaining: snapshot.remaining(u.id),
            total: u.totalCopies,
        }));
        return {
            cost,
            remaining: snapshot.totalRemainingAtTier(cost),
            total: units.reduce((sum, u) => sum + u.total, 0),
            units,
        };
    });
}
