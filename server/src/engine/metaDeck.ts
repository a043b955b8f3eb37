/**
 * metaDeck.ts
 *
 * Validated, frozen meta decks. Decks arrive from the crawler as plain
 * `MetaDeckDefinition`s; every unit and trait they name must exist in the
 * registry before a deck can be ranked.
 */

import type {MetaDeckDefinition, MetaDeckTraitTarget} from "../../../shared/types/deck.js";
import type {UnitRegistry} from "./registry.js";
import {InvalidCatalogError} from "./errors.js";

export const MAX_CORE_UNITS = 12;

export type MetaDeck = Readonly<{
    id: string;
    name: string;
    tier?: string;
    core: readonly string[];
    flex: readonly string[];
    traits: readonly Readonly<MetaDeckTraitTarget>[];
}>;

export function createMetaDeck(registry: UnitRegistry, def: MetaDeckDefinition): MetaDeck {
    if (!def.id) throw new InvalidCatalogError("meta deck with empty id");
    if (def.core.length === 0) throw new InvalidCatalogError(`deck "${def.id}" has no core units`);
    if (def.core.length > MAX_CORE_UNITS) {
        throw new InvalidCatalogError(`deck "${def.id}" has ${def.core.length} core units, at most ${MAX_CORE_UNITS} allowed`);
    }
    const flex = def.flex ?? [];
    const seen = new Set<string>();
    for (const unitId of [...def.core, ...flex]) {
        registry.lookup(unitId);
        if (seen.has(unitId)) throw new InvalidCatalogError(`deck "${def.id}" lists "${unitId}" twice`);
        seen.add(unitId);
    }
    const traits = def.traits ?? [];
    for (const target of traits) {
        const trait = registry.trait(target.traitId);
        if (!trait) throw new InvalidCatalogError(`deck "${def.id}" targets unknown trait "${target.traitId}"`);
        if (!Number.isInteger(target.level) || target.level < 1 || target.level > trait.thresholds.length) {
            throw new InvalidCatalogError(`deck "${def.id}" targets level ${target.level} of "${trait.id}"`);
        }
    }
    return Object.freeze({
        id: def.id,
        name: def.name,
        tier: def.tier,
        core: Object.freeze([...def.core]),
        flex: Object.freeze([...flex]),
        traits: Object.freeze(traits.map((t) => Object.freeze({...t}))),
    });
}

/** @throws InvalidCatalogError on a duplicate deck id or an invalid deck */
export function createMetaDecks(registry: UnitRegistry, defs: readonly MetaDeckDefinition[]): readonly MetaDeck[] {
    const ids = new Set<string>();
    const decks = defs.map((def) => {
        if (ids.has(def.id)) throw new InvalidCatalogError(`duplicate deck "${def.id}"`);
        ids.add(def.id);
        return createMetaDeck(registry, def);
    });
    return Object.freeze(decks);
}
