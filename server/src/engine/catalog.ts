/**
 * catalog.ts
 *
 * The process-wide, read-only inputs of the engine bundled together: unit
 * registry (with traits), shop odds and meta decks. Built once at startup
 * and passed to every session; there is no global instance.
 */

import type {ShopOddsDefinition, TraitDefinition, UnitDefinition} from "../../../shared/types/unit.js";
import type {MetaDeckDefinition} from "../../../shared/types/deck.js";
import {UnitRegistry} from "./registry.js";
import {ShopOddsTable} from "./odds.js";
import {type MetaDeck, createMetaDecks} from "./metaDeck.js";
import {InvalidCatalogError} from "./errors.js";

export interface CatalogInput {
    units: readonly UnitDefinition[];
    traits: readonly TraitDefinition[];
    odds: readonly ShopOddsDefinition[];
    decks: readonly MetaDeckDefinition[];
}

export interface Catalog {
    registry: UnitRegistry;
    odds: ShopOddsTable;
    decks: readonly MetaDeck[];
}

export function createCatalog(input: CatalogInput): Catalog {
    const registry = UnitRegistry.create(input.units, input.traits);
    const odds = ShopOddsTable.create(input.odds);
    // Every tier the shop can roll needs at least one unit
    for (const level of odds.levels()) {
        for (const [tier, p] of odds.tierDistribution(level)) {
            if (p > 0 && registry.unitsOfCost(tier).length === 0) {
                throw new InvalidCatalogError(`level ${level} rolls cost ${tier} but no unit has that cost`);
            }
        }
    }
    return Object.freeze({registry, odds, decks: createMetaDecks(registry, input.decks)});
}
