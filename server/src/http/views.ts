/**
 * views.ts
 *
 * Converts engine results into the shared wire shapes. The only change of
 * substance: an infinite expected refresh count becomes `null`.
 */

import type {
    RecommendationView,
    ShopPickView,
    UnitOddsView,
} from "../../../shared/protocol/types/recommendation.js";
import type {UnitOdds} from "../engine/probability.js";
import type {RecommendationResult} from "../engine/ranker.js";
import type {ShopPick} from "../engine/shopAdvice.js";

function finiteOrNull(n: number): number | null {
    return Number.isFinite(n) ? n : null;
}

export function toUnitOddsView(o: UnitOdds): UnitOddsView {
    return {...o, expectedRefreshes: finiteOrNull(o.expectedRefreshes)};
}

export function toRecommendationView(r: RecommendationResult): RecommendationView {
    return {
        rank: r.rank,
        deckId: r.deck.id,
        deckName: r.deck.name,
        tier: r.deck.tier,
        matchRatio: r.matchRatio,
        flexRatio: r.flexRatio,
        completionProbability: r.completionProbability,
        expectedRefreshes: finiteOrNull(r.expectedRefreshes),
        acquisitionCost: r.acquisitionCost,
        score: r.score,
        ownedCore: [...r.ownedCore],
        missingCore: r.missingCore.map(toUnitOddsView),
        traitProgress: r.traitProgress.map((t) => ({...t})),
    };
}

export function toShopPickView(p: ShopPick): ShopPickView {
    return {...p};
}
