/**
 * ranker.ts
 *
 * Orders candidate meta decks by a composite score:
 *
 *   score = match * matchRatio + completion * completionProbability
 *           - cost * acquisitionCost + flex * flexRatio
 *
 * Equal scores fall back to the matcher's tie-break, so the order is total
 * and repeatable. The ranker only reads the snapshot it is given.
 */

import type {MetaDeck} from "./metaDeck.js";
import {type DeckMatch, type DeckMatcher, type MatchQuery, type TraitProgress, compareMatches} from "./matcher.js";
import type {UnitOdds} from "./probability.js";
import {EmptyCandidateSetError, InvalidQueryError} from "./errors.js";

export type RankingWeights = {
    match: number;
    completion: number;
    cost: number;
    flex: number;
};

export const DEFAULT_RANKING_WEIGHTS: Readonly<RankingWeights> = Object.freeze({
    match: 0.6,
    completion: 0.4,
    cost: 0.01,
    flex: 0.1,
});

// Frozen all the way down, including the unit lists and per-unit odds
export type RecommendationResult = Readonly<Omit<DeckMatch, "ownedCore" | "missingCore" | "traitProgress"> & {
    ownedCore: readonly string[];
    missingCore: readonly Readonly<UnitOdds>[];
    traitProgress: readonly Readonly<TraitProgress>[];
    score: number;
    rank: number;
}>;

type ScoredParts = Pick<DeckMatch, "matchRatio" | "completionProbability" | "acquisitionCost" | "flexRatio">;

export interface RankQuery extends MatchQuery {
    weights?: Partial<RankingWeights>;
}

export class RecommendationRanker {
    private readonly weights: Readonly<RankingWeights>;

    constructor(private readonly matcher: DeckMatcher, weights: Partial<RankingWeights> = {}) {
        this.weights = resolveWeights(DEFAULT_RANKING_WEIGHTS, weights);
    }

    rank(owned: Iterable<string>, candidates: readonly MetaDeck[], query: RankQuery): RecommendationResult[] {
        if (candidates.length === 0) throw new EmptyCandidateSetError();
        const w = resolveWeights(this.weights, query.weights ?? {});
        const ownedSet = new Set(owned);
        const scored = candidates.map((deck) => {
            const m = this.matcher.match(deck, ownedSet, query);
            return {match: m, score: compositeScore(m, w)};
        });
        scored.sort((a, b) => (a.score !== b.score ? b.score - a.score : compareMatches(a.match, b.match)));
        return scored.map(({match, score}, i) => Object.freeze({
            ...match,
            ownedCore: Object.freeze([...match.ownedCore]),
            missingCore: Object.freeze(match.missingCore.map((o) => Object.freeze({...o}))),
            traitProgress: Object.freeze(match.traitProgress.map((t) => Object.freeze({...t}))),
            score,
            rank: i + 1,
        }));
    }
}

export function compositeScore(m: ScoredParts, w: Readonly<RankingWeights>): number {
    return w.match * m.matchRatio
        + w.completion * m.completionProbability
        - w.cost * m.acquisitionCost
        + w.flex * m.flexRatio;
}

function resolveWeights(base: Readonly<RankingWeights>, override: Partial<RankingWeights>): Readonly<RankingWeights> {
    const merged = {...base, ...override};
    for (const [key, value] of Object.entries(merged)) {
        if (!Number.isFinite(value)) throw new InvalidQueryError(`weight "${key}" must be a finite number`);
    }
    return Object.freeze(merged);
}
