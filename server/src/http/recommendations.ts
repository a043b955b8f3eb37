/**
 * recommendations.ts
 *
 * Query routes over a session's pool: ranked deck recommendations, raw odds
 * for one unit, and shop advice. Each request snapshots the pool first and
 * computes on that snapshot, so it never waits on the session's writers.
 */

import type {FastifyInstance} from "fastify";
import {trace} from "@opentelemetry/api";
import type {Advisor} from "../advisor.js";
import type {MetaDeck} from "../engine/metaDeck.js";
import type {RecommendationResult} from "../engine/ranker.js";
import {adviseShop} from "../engine/shopAdvice.js";
import {InvalidQueryError} from "../engine/errors.js";
import {
    type RecommendRequest,
    recommendSchema,
    shopAdviceSchema,
    unitOddsQuerySchema,
} from "../schemas/recommendation.js";
import {recommendationDurationHistogram, recommendationsCounter} from "../observability/metrics.js";
import {sendError} from "./errors.js";
import {toRecommendationView, toShopPickView, toUnitOddsView} from "./views.js";

type SessionParams = { Params: { id: string } };

export async function registerRecommendationRoutes(app: FastifyInstance, advisor: Advisor) {
    const {sessions, catalog, ranker, calculator, defaults} = advisor;
    const tracer = trace.getTracer("advisor");

    function candidateDecks(deckIds: string[] | undefined): readonly MetaDeck[] {
        if (!deckIds) return catalog.decks;
        return deckIds.map((id) => {
            const deck = catalog.decks.find((d) => d.id === id);
            if (!deck) throw new InvalidQueryError(`unknown deck "${id}"`);
            return deck;
        });
    }

    function rankFor(sessionId: string, body: RecommendRequest): RecommendationResult[] {
        const {session, snapshot} = sessions.snapshot(sessionId);
        const candidates = candidateDecks(body.deckIds);
        const span = tracer.startSpan("recommendations.rank", {
            attributes: {"session.id": sessionId, "deck.count": candidates.length},
        });
        const stopTimer = recommendationDurationHistogram.startTimer();
        try {
            const results = ranker.rank(body.owned, candidates, {
                level: body.level ?? session.level,
                refreshBudget: body.refreshBudget ?? defaults.refreshBudget,
                snapshot,
                weights: body.weights,
            });
            recommendationsCounter.inc();
            return results;
        } finally {
            stopTimer();
            span.end();
        }
    }

    app.post<SessionParams>("/api/sessions/:id/recommendations", async (req, reply) => {
        try {
            const body = recommendSchema.parse(req.body ?? {});
            const results = rankFor(req.params.id, body);
            const limited = body.limit ? results.slice(0, body.limit) : results;
            return reply.send({ok: true, recommendations: limited.map(toRecommendationView)});
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });

    app.get<{ Params: { id: string; unitId: string }; Querystring: Record<string, string> }>(
        "/api/sessions/:id/units/:unitId/odds",
        async (req, reply) => {
            try {
                const query = unitOddsQuerySchema.parse(req.query);
                const {session, snapshot} = sessions.snapshot(req.params.id);
                const odds = calculator.unitOdds(
                    req.params.unitId,
                    query.level ?? session.level,
                    snapshot,
                    query.copies,
                    query.refreshBudget ?? defaults.refreshBudget,
                );
                return reply.send({ok: true, odds: toUnitOddsView(odds)});
            } catch (err) {
                return sendError(reply, app.log, err, {unitInPath: true});
            }
        },
    );

    app.post<SessionParams>("/api/sessions/:id/shop-advice", async (req, reply) => {
        try {
            const body = shopAdviceSchema.parse(req.body);
            const results = rankFor(req.params.id, body);
            const picks = adviseShop(catalog.registry, body.shop, results, body.topDecks);
            return reply.send({
                ok: true,
                picks: picks.map(toShopPickView),
                recommendations: results.slice(0, body.topDecks ?? 3).map(toRecommendationView),
            });
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });
}
