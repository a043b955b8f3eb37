/**
 * odds.ts
 *
 * Level-gated shop odds. For each supported player level the table holds the
 * probability that a single shop slot rolls each cost tier. This is game data
 * supplied per game version, never computed; construction checks that every
 * row is a proper distribution and rejects the whole table otherwise.
 */

import type {ShopOddsDefinition} from "../../../shared/types/unit.js";
import {InvalidLevelError, InvalidOddsTableError} from "./errors.js";

export const ODDS_SUM_TOLERANCE = 1e-6;

export type TierDistribution = ReadonlyMap<number, number>;

function parseTier(key: string, level: number): number {
    const tier = Number(key);
    if (!Number.isInteger(tier) || tier <= 0) {
        throw new InvalidOddsTableError(`level ${level}: "${key}" is not a cost tier`);
    }
    return tier;
}

export class ShopOddsTable {
    private constructor(private readonly rows: ReadonlyMap<number, TierDistribution>) {
    }

    /**
     * @throws InvalidOddsTableError when a row has a negative entry, does not
     *   sum to 1 within {@link ODDS_SUM_TOLERANCE}, or a level repeats
     */
    static create(defs: readonly ShopOddsDefinition[]): ShopOddsTable {
        if (defs.length === 0) throw new InvalidOddsTableError("odds table has no levels");
        const rows = new Map<number, TierDistribution>();
        for (const def of defs) {
            if (!Number.isInteger(def.level) || def.level <= 0) {
                throw new InvalidOddsTableError(`invalid level ${def.level}`);
            }
            if (rows.has(def.level)) throw new InvalidOddsTableError(`level ${def.level} listed twice`);
            const dist = new Map<number, number>();
            let sum = 0;
            for (const [key, p] of Object.entries(def.tiers)) {
                const tier = parseTier(key, def.level);
                if (!Number.isFinite(p) || p < 0) {
                    throw new InvalidOddsTableError(`level ${def.level}: tier ${tier} has probability ${p}`);
                }
                dist.set(tier, p);
                sum += p;
            }
            if (Math.abs(sum - 1) > ODDS_SUM_TOLERANCE) {
                throw new InvalidOddsTableError(`level ${def.level}: probabilities sum to ${sum}, expected 1`);
            }
            rows.set(def.level, dist);
        }
        return new ShopOddsTable(rows);
    }

    /** @throws InvalidLevelError for a level outside the table */
    tierDistribution(level: number): TierDistribution {
        const row = this.rows.get(level);
        if (!row) throw new InvalidLevelError(level);
        return row;
    }

    tierProbability(level: number, tier: number): number {
        return this.tierDistribution(level).get(tier) ?? 0;
    }

    hasLevel(level: number): boolean {
        return this.rows.has(level);
    }

    levels(): number[] {
        return [...this.rows.keys()].sort((a, b) => a - b);
    }
}
