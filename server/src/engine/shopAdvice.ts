/**
 * shopAdvice.ts
 *
 * Marks the units currently offered in the shop against the best-ranked
 * decks. A unit that is core to any of the top decks outranks one that is
 * only flex; within a role the better-ranked deck wins. Owned units still
 * count, since extra copies upgrade them.
 */

import type {ShopPickRole} from "../../../shared/protocol/types/recommendation.js";
import type {UnitRegistry} from "./registry.js";
import type {RecommendationResult} from "./ranker.js";

export const DEFAULT_SHOP_ADVICE_DECKS = 3;

export interface ShopPick {
    slot: number;
    unitId: string;
    role: ShopPickRole;
    deckId: string | null;
    deckRank: number | null;
}

const ROLE_ORDER: Record<ShopPickRole, number> = {core: 0, flex: 1, none: 2};

export function adviseShop(
    registry: UnitRegistry,
    shop: readonly string[],
    ranked: readonly RecommendationResult[],
    topDecks: number = DEFAULT_SHOP_ADVICE_DECKS,
): ShopPick[] {
    const top = [...ranked].sort((a, b) => a.rank - b.rank).slice(0, Math.max(0, topDecks));
    const picks = shop.map((unitId, slot): ShopPick => {
        registry.lookup(unitId);
        const core = top.find((r) => r.deck.core.includes(unitId));
        if (core) return {slot, unitId, role: "core", deckId: core.deck.id, deckRank: core.rank};
        const flex = top.find((r) => r.deck.flex.includes(unitId));
        if (flex) return {slot, unitId, role: "flex", deckId: flex.deck.id, deckRank: flex.rank};
        return {slot, unitId, role: "none", deckId: null, deckRank: null};
    });
    return picks.sort((a, b) =>
        ROLE_ORDER[a.role] - ROLE_ORDER[b.role]
        || (a.deckRank ?? 0) - (b.deckRank ?? 0)
        || a.slot - b.slot);
}
