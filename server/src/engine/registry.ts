/**
 * registry.ts
 *
 * Immutable unit and trait catalog. Built once from already-parsed catalog
 * data and validated as a whole: a catalog with a single bad entry fails to
 * load instead of serving a partial registry. Units are indexed by id and by
 * cost tier, the latter being what tier-wide pool normalization iterates.
 */

import type {TraitDefinition, UnitDefinition} from "../../../shared/types/unit.js";
import {InvalidCatalogError, UnknownUnitError} from "./errors.js";

export type Unit = Readonly<{
    id: string;
    name: string;
    cost: number;
    traits: readonly string[];
    totalCopies: number;
}>;

export type Trait = Readonly<{
    id: string;
    name: string;
    thresholds: readonly number[];
}>;

function isPositiveInt(n: number): boolean {
    return Number.isInteger(n) && n > 0;
}

function freezeTrait(def: TraitDefinition): Trait {
    if (!def.id) throw new InvalidCatalogError("trait with empty id");
    if (def.thresholds.length === 0) {
        throw new InvalidCatalogError(`trait "${def.id}" has no thresholds`);
    }
    let prev = 0;
    for (const t of def.thresholds) {
        if (!isPositiveInt(t) || t <= prev) {
            throw new InvalidCatalogError(`trait "${def.id}" thresholds must be ascending positive integers`);
        }
        prev = t;
    }
    return Object.freeze({id: def.id, name: def.name, thresholds: Object.freeze([...def.thresholds])});
}

function freezeUnit(def: UnitDefinition, traits: ReadonlyMap<string, Trait>): Unit {
    if (!def.id) throw new InvalidCatalogError("unit with empty id");
    if (!isPositiveInt(def.cost)) {
        throw new InvalidCatalogError(`unit "${def.id}" must have a positive integer cost`);
    }
    if (!isPositiveInt(def.totalCopies)) {
        throw new InvalidCatalogError(`unit "${def.id}" must have a positive integer copy count`);
    }
    if (def.traits.length === 0) {
        throw new InvalidCatalogError(`unit "${def.id}" has no traits`);
    }
    if (new Set(def.traits).size !== def.traits.length) {
        throw new InvalidCatalogError(`unit "${def.id}" lists a trait twice`);
    }
    for (const t of def.traits) {
        if (!traits.has(t)) throw new InvalidCatalogError(`unit "${def.id}" references unknown trait "${t}"`);
    }
    return Object.freeze({
        id: def.id,
        name: def.name,
        cost: def.cost,
        traits: Object.freeze([...def.traits]),
        totalCopies: def.totalCopies,
    });
}

export class UnitRegistry {
    private constructor(
        private readonly units: ReadonlyMap<string, Unit>,
        private readonly traitTable: ReadonlyMap<string, Trait>,
        private readonly byCost: ReadonlyMap<number, readonly Unit[]>,
    ) {
    }

    /**
     * Validate and index a catalog.
     *
     * @throws InvalidCatalogError on the first invalid unit or trait
     */
    static create(units: readonly UnitDefinition[], traits: readonly TraitDefinition[]): UnitRegistry {
        const traitTable = new Map<string, Trait>();
        for (const def of traits) {
            if (traitTable.has(def.id)) throw new InvalidCatalogError(`duplicate trait "${def.id}"`);
            traitTable.set(def.id, freezeTrait(def));
        }
        if (units.length === 0) throw new InvalidCatalogError("registry has no units");

        const unitTable = new Map<string, Unit>();
        const byCost = new Map<number, Unit[]>();
        for (const def of units) {
            if (unitTable.has(def.id)) throw new InvalidCatalogError(`duplicate unit "${def.id}"`);
            const unit = freezeUnit(def, traitTable);
            unitTable.set(unit.id, unit);
            const tier = byCost.get(unit.cost);
            if (tier) tier.push(unit);
            else byCost.set(unit.cost, [unit]);
        }
        const frozenByCost = new Map<number, readonly Unit[]>();
        for (const [cost, list] of byCost) {
            frozenByCost.set(cost, Object.freeze([...list].sort((a, b) => a.id.localeCompare(b.id))));
        }
        return new UnitRegistry(unitTable, traitTable, frozenByCost);
    }

    lookup(id: string): Unit {
        const unit = this.units.get(id);
        if (!unit) throw new UnknownUnitError(id);
        return unit;
    }

    has(id: string): boolean {
        return this.units.has(id);
    }

    /** Units of one cost tier, sorted by id. Empty for a tier nobody has. */
    unitsOfCost(tier: number): readonly Unit[] {
        return this.byCost.get(tier) ?? [];
    }

    costTiers(): number[] {
        return [...this.byCost.keys()].sort((a, b) => a - b);
    }

    all(): Unit[] {
        return [...this.units.values()];
    }

    get size(): number {
        return this.units.size;
    }

    trait(id: string): Trait | undefined {
        return this.traitTable.get(id);
    }

    traits(): Trait[] {
        return [...this.traitTable.values()];
    }

    /** Bonus level reached with `count` distinct units of a trait (0 = inactive). */
    traitLevel(traitId: string, count: number): number {
        const trait = this.traitTable.get(traitId);
        if (!trait) return 0;
        return trait.thresholds.filter((t) => t <= count).length;
    }
}
