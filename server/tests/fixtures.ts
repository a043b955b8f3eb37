/**
 * fixtures.ts
 *
 * Small synthetic catalog shared by the engine and HTTP tests. Numbers are
 * chosen so expected odds can be worked out by hand:
 * - tier 1: a, b (10 copies each)
 * - tier 2: c, d (6 copies each)
 * - tier 3: e (4 copies)
 * - level 1 rolls only tier 1, level 5 splits tiers 1 and 2 evenly,
 *   level 8 rolls tiers 1/2/3 at 0.2/0.3/0.5
 */

import type {ShopOddsDefinition, TraitDefinition, UnitDefinition} from '../../shared/types/unit.js';
import type {MetaDeckDefinition} from '../../shared/types/deck.js';
import {type Catalog, type CatalogInput, createCatalog} from '../src/engine/catalog.js';
import {PoolProbabilityCalculator} from '../src/engine/probability.js';

export const TRAITS: TraitDefinition[] = [
    {id: 'alpha', name: 'Alpha', thresholds: [2, 4]},
    {id: 'beta', name: 'Beta', thresholds: [2]},
    {id: 'gamma', name: 'Gamma', thresholds: [1, 3]},
];

export const UNITS: UnitDefinition[] = [
    {id: 'a', name: 'Aster', cost: 1, traits: ['alpha'], totalCopies: 10},
    {id: 'b', name: 'Birch', cost: 1, traits: ['alpha', 'beta'], totalCopies: 10},
    {id: 'c', name: 'Cedar', cost: 2, traits: ['beta'], totalCopies: 6},
    {id: 'd', name: 'Dune', cost: 2, traits: ['gamma'], totalCopies: 6},
    {id: 'e', name: 'Ember', cost: 3, traits: ['gamma', 'alpha'], totalCopies: 4},
];

export const ODDS: ShopOddsDefinition[] = [
    {level: 1, tiers: {'1': 1}},
    {level: 5, tiers: {'1': 0.5, '2': 0.5}},
    {level: 8, tiers: {'1': 0.2, '2': 0.3, '3': 0.5}},
];

export const DECKS: MetaDeckDefinition[] = [
    {id: 'twins', name: 'Twins', tier: 'S', core: ['a', 'b'], flex: ['c'], traits: [{traitId: 'alpha', level: 1}]},
    {id: 'wide', name: 'Wide', tier: 'A', core: ['a', 'c', 'e'], flex: ['d']},
    {id: 'gammas', name: 'Gammas', core: ['d', 'e'], traits: [{traitId: 'gamma', level: 1}]},
];

export function catalogInput(overrides: Partial<CatalogInput> = {}): CatalogInput {
    return {units: UNITS, traits: TRAITS, odds: ODDS, decks: DECKS, ...overrides};
}

export function makeCatalog(overrides: Partial<CatalogInput> = {}): Catalog {
    return createCatalog(catalogInput(overrides));
}

export function makeCalculator(catalog: Catalog, slotsPerRefresh = 1, model: 'independent' | 'hypergeometric' = 'independent') {
    return new PoolProbabilityCalculator(catalog.registry, catalog.odds, {slotsPerRefresh, model});
}
