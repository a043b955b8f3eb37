/**
 * advisor.ts
 *
 * Wires the engine for one process: the shared catalog, the calculator,
 * matcher and ranker built on it, and the session store. Routes and
 * diagnostics receive this object instead of reaching for globals, so tests
 * can build one from a synthetic catalog.
 */

import type {Catalog} from "./engine/catalog.js";
import {PoolProbabilityCalculator} from "./engine/probability.js";
import type {DrawModelName} from "./engine/drawModels.js";
import {DeckMatcher} from "./engine/matcher.js";
import {DEFAULT_RANKING_WEIGHTS, type RankingWeights, RecommendationRanker} from "./engine/ranker.js";
import {SessionStore} from "./session/sessionStore.js";

export interface AdvisorOptions {
    slotsPerRefresh: number;
    drawModel: DrawModelName;
    defaultLevel: number;
    defaultRefreshBudget: number;
    weights: RankingWeights;
    now?: () => number;
}

export interface Advisor {
    catalog: Catalog;
    calculator: PoolProbabilityCalculator;
    matcher: DeckMatcher;
    ranker: RecommendationRanker;
    sessions: SessionStore;
    defaults: { level: number; refreshBudget: number };
}

export const DEFAULT_ADVISOR_OPTIONS: AdvisorOptions = {
    slotsPerRefresh: 5,
    drawModel: "independent",
    defaultLevel: 7,
    defaultRefreshBudget: 10,
    weights: {...DEFAULT_RANKING_WEIGHTS},
};

/** @throws InvalidLevelError when the catalog's odds table has no row for the default level */
export function createAdvisor(catalog: Catalog, options: Partial<AdvisorOptions> = {}): Advisor {
    const opts = {...DEFAULT_ADVISOR_OPTIONS, ...options};
    catalog.odds.tierDistribution(opts.defaultLevel);
    const calculator = new PoolProbabilityCalculator(catalog.registry, catalog.odds, {
        slotsPerRefresh: opts.slotsPerRefresh,
        model: opts.drawModel,
    });
    const matcher = new DeckMatcher(calculator);
    return {
        catalog,
        calculator,
        matcher,
        ranker: new RecommendationRanker(matcher, opts.weights),
        sessions: new SessionStore(catalog, opts.now),
        defaults: {level: opts.defaultLevel, refreshBudget: opts.defaultRefreshBudget},
    };
}
