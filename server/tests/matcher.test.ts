/**
 * matcher.test.ts
 *
 * Unit tests for `DeckMatcher`: match ratio, trait progress, completion odds
 * (including same-tier contention) and the tie-break order.
 */

import {describe, it, expect} from 'vitest';
import {PoolSnapshot} from '../src/engine/poolState.js';
import {DeckMatcher, EXACT_GROUP_LIMIT, type MatchQuery} from '../src/engine/matcher.js';
import {createMetaDeck} from '../src/engine/metaDeck.js';
import {InvalidCatalogError, InvalidLevelError, UnknownUnitError} from '../src/engine/errors.js';
import type {UnitDefinition} from '../../shared/types/unit.js';
import {makeCalculator, makeCatalog} from './fixtures.js';

const catalog = makeCatalog();
const {registry} = catalog;
const full = PoolSnapshot.full(registry);
const matcher = new DeckMatcher(makeCalculator(catalog, 1));
const deck = (id: string) => {
    const found = catalog.decks.find((d) => d.id === id);
    if (!found) throw new Error(`fixture deck ${id} missing`);
    return found;
};

const levelOne: MatchQuery = {level: 1, refreshBudget: 2, snapshot: full};

describe('DeckMatcher.match', () => {
    it('reports the owned share of the core and odds for the rest', () => {
        const m = matcher.match(deck('twins'), new Set(['a']), levelOne);
        expect(m.matchRatio).toBe(0.5);
        expect(m.ownedCore).toEqual(['a']);
        expect(m.missingCore.map((o) => o.unitId)).toEqual(['b']);
        // b alone: 1 - 0.5^2
        expect(m.completionProbability).toBeCloseTo(0.75, 12);
        expect(m.expectedRefreshes).toBeCloseTo(2, 12);
        expect(m.acquisitionCost).toBe(1);
        expect(m.flexRatio).toBe(0);
    });

    it('is complete once every core unit is owned', () => {
        const m = matcher.match(deck('twins'), new Set(['a', 'b', 'c']), levelOne);
        expect(m.matchRatio).toBe(1);
        expect(m.missingCore).toEqual([]);
        expect(m.completionProbability).toBe(1);
        expect(m.expectedRefreshes).toBe(0);
        expect(m.acquisitionCost).toBe(0);
        expect(m.flexRatio).toBe(1);
    });

    it('never lowers the match ratio when more units are owned', () => {
        const owned = new Set<string>();
        let prev = -1;
        for (const id of ['d', 'a', 'c', 'e']) {
            owned.add(id);
            const ratio = matcher.match(deck('wide'), owned, levelOne).matchRatio;
            expect(ratio).toBeGreaterThanOrEqual(prev);
            prev = ratio;
        }
        expect(prev).toBe(1);
    });

    it('never lowers completion odds when the budget grows', () => {
        let prev = 0;
        for (let budget = 0; budget <= 6; budget++) {
            const p = matcher.match(deck('twins'), new Set(), {...levelOne, refreshBudget: budget}).completionProbability;
            expect(p).toBeGreaterThanOrEqual(prev);
            prev = p;
        }
    });

    it('tracks trait progress from distinct owned units', () => {
        const before = matcher.match(deck('twins'), new Set(['a']), levelOne).traitProgress;
        expect(before).toEqual([{traitId: 'alpha', count: 1, reachedLevel: 0, targetLevel: 1, met: false}]);
        const after = matcher.match(deck('twins'), new Set(['a', 'b']), levelOne).traitProgress;
        expect(after).toEqual([{traitId: 'alpha', count: 2, reachedLevel: 1, targetLevel: 1, met: true}]);
    });

    it('rejects unknown owned units', () => {
        expect(() => matcher.match(deck('twins'), new Set(['nope']), levelOne)).toThrow(UnknownUnitError);
    });

    it('gives zero completion when a missing tier never rolls at the level', () => {
        const m = matcher.match(deck('gammas'), new Set(), levelOne);
        expect(m.completionProbability).toBe(0);
        expect(m.expectedRefreshes).toBe(Number.POSITIVE_INFINITY);
    });
});

describe('DeckMatcher.completionProbability', () => {
    it('multiplies odds across different tiers', () => {
        // a and c each show with probability 0.25 per refresh at level 5
        const p = matcher.completionProbability(['a', 'c'], {level: 5, refreshBudget: 1, snapshot: full});
        expect(p).toBeCloseTo(0.0625, 12);
    });

    it('lets same-tier units compete for one purchase per refresh', () => {
        const scarce = PoolSnapshot.fromCounts(registry, new Map([['a', 1], ['b', 1]]));
        const query: MatchQuery = {level: 1, refreshBudget: 2, snapshot: scarce};
        const calc = makeCalculator(catalog, 1);
        const product = calc.acquisitionProbability('a', 1, 1, scarce, 2) * calc.acquisitionProbability('b', 1, 1, scarce, 2);
        expect(product).toBeCloseTo(0.5625, 12);
        expect(matcher.completionProbability(['a', 'b'], query)).toBeCloseTo(0.375, 12);
        expect(matcher.completionProbability(['a', 'b'], {...query, refreshBudget: 1})).toBe(0);
    });

    it('is 1 with nothing missing', () => {
        expect(matcher.completionProbability([], levelOne)).toBe(1);
    });

    it('still checks the level with nothing missing', () => {
        expect(() => matcher.completionProbability([], {...levelOne, level: 99})).toThrow(InvalidLevelError);
        expect(() => matcher.match(deck('twins'), new Set(['a', 'b']), {...levelOne, level: 99})).toThrow(InvalidLevelError);
    });
});

describe('large same-tier groups', () => {
    // 20 tier-1 units of 10 copies: every unit shows with odds 1/20 per refresh
    const many: UnitDefinition[] = Array.from({length: 20}, (_, i) => ({
        id: `u${String(i + 1).padStart(2, '0')}`,
        name: `Unit ${i + 1}`,
        cost: 1,
        traits: ['alpha'],
        totalCopies: 10,
    }));
    const wide = makeCatalog({units: many, odds: [{level: 1, tiers: {'1': 1}}], decks: []});
    const wideMatcher = new DeckMatcher(makeCalculator(wide, 1));
    const snapshot = PoolSnapshot.full(wide.registry);
    const ids = (n: number) => many.slice(0, n).map((u) => u.id);

    // n equal units bought one per refresh within exactly n refreshes
    function oneBuyEveryRefresh(n: number, hit: number): number {
        let p = 1;
        for (let k = 1; k <= n; k++) p *= 1 - Math.pow(1 - hit, k);
        return p;
    }

    it('gives the same answer on either side of the exact-walk limit for equal odds', () => {
        for (const n of [3, EXACT_GROUP_LIMIT, EXACT_GROUP_LIMIT + 1, 9]) {
            const p = wideMatcher.completionProbability(ids(n), {level: 1, refreshBudget: n, snapshot});
            expect(p).toBeCloseTo(oneBuyEveryRefresh(n, 1 / 20), 12);
        }
    });

    it('handles twenty missing units at the largest budget', () => {
        const query = {level: 1, refreshBudget: 500, snapshot};
        expect(wideMatcher.completionProbability(ids(20), query)).toBeGreaterThan(0.99);
        expect(wideMatcher.completionProbability(ids(20), {...query, refreshBudget: 19})).toBe(0);
    });

    it('refuses decks with an oversized core', () => {
        expect(() => createMetaDeck(wide.registry, {id: 'huge', name: 'Huge', core: ids(13)})).toThrow(InvalidCatalogError);
        expect(createMetaDeck(wide.registry, {id: 'big', name: 'Big', core: ids(12)}).core).toHaveLength(12);
    });
});

describe('DeckMatcher.matchAll', () => {
    it('orders by ratio, then completion, then cost', () => {
        const ids = matcher.matchAll(catalog.decks, new Set(), levelOne).map((m) => m.deck.id);
        // all ratios 0; twins can complete, gammas (cost 5) is cheaper than wide (cost 6)
        expect(ids).toEqual(['twins', 'gammas', 'wide']);
    });

    it('falls back to deck id for full ties', () => {
        const tied = makeCatalog({
            decks: [
                {id: 'zeta', name: 'Zeta', core: ['e']},
                {id: 'eta', name: 'Eta', core: ['e']},
            ],
        });
        const m = new DeckMatcher(makeCalculator(tied, 1));
        const ids = m.matchAll(tied.decks, new Set(), {...levelOne, snapshot: PoolSnapshot.full(tied.registry)}).map((x) => x.deck.id);
        expect(ids).toEqual(['eta', 'zeta']);
    });
});
