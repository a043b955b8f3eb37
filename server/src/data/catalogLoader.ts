/**
 * catalogLoader.ts
 *
 * Reads the catalog JSON files from a data directory, validates their shape
 * and builds the engine's `Catalog`. This is the only place the server
 * touches catalog files; the engine itself receives in-memory structures.
 *
 * Expected files: units.json, traits.json, shopOdds.json, metaDecks.json.
 */

import {readFile} from "node:fs/promises";
import path from "node:path";
import type {z} from "zod";
import {type Catalog, createCatalog} from "../engine/catalog.js";
import {
    metaDecksFileSchema,
    shopOddsFileSchema,
    traitsFileSchema,
    unitsFileSchema,
} from "../schemas/catalog.js";
import {info} from "../logging.js";

export const CATALOG_FILES = {
    units: "units.json",
    traits: "traits.json",
    odds: "shopOdds.json",
    decks: "metaDecks.json",
} as const;

async function readJsonFile<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): Promise<z.infer<S>> {
    const fullPath = path.join(dir, file);
    const text = await readFile(fullPath, "utf-8");
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (e) {
        throw new Error(`${fullPath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    return schema.parse(raw);
}

export async function loadCatalog(dataDir: string): Promise<Catalog> {
    const [units, traits, odds, decks] = await Promise.all([
        readJsonFile(dataDir, CATALOG_FILES.units, unitsFileSchema),
        readJsonFile(dataDir, CATALOG_FILES.traits, traitsFileSchema),
        readJsonFile(dataDir, CATALOG_FILES.odds, shopOddsFileSchema),
        readJsonFile(dataDir, CATALOG_FILES.decks, metaDecksFileSchema),
    ]);
    const catalog = createCatalog({
        units: units.units,
        traits: traits.traits,
        odds: odds.levels,
        decks: decks.decks,
    });
    info(`loaded catalog from ${dataDir}: ${catalog.registry.size} units, ${catalog.decks.length} decks`);
    return catalog;
}
