/**
 * catalog.ts
 *
 * Read-only catalog routes: units, traits, meta decks and the shop odds for
 * a level. Lists are sorted (units by cost then id) so output is stable for
 * tests and UIs.
 */

import type {FastifyInstance} from "fastify";
import type {Advisor} from "../advisor.js";
import {sendError} from "./errors.js";

export async function registerCatalogRoutes(app: FastifyInstance, advisor: Advisor) {
    const {registry, odds, decks} = advisor.catalog;

    app.get("/api/units", async (_req, reply) => {
        const units = registry.all().sort((a, b) => a.cost - b.cost || a.id.localeCompare(b.id));
        return reply.send({ok: true, units});
    });

    app.get<{ Params: { id: string } }>("/api/units/:id", async (req, reply) => {
        try {
            return reply.send({ok: true, unit: registry.lookup(req.params.id)});
        } catch (err) {
            return sendError(reply, app.log, err, {unitInPath: true});
        }
    });

    app.get("/api/traits", async (_req, reply) => {
        const traits = registry.traits().sort((a, b) => a.id.localeCompare(b.id));
        return reply.send({ok: true, traits});
    });

    app.get("/api/decks", async (_req, reply) => {
        return reply.send({ok: true, decks});
    });

    app.get<{ Params: { level: string } }>("/api/odds/:level", async (req, reply) => {
        try {
            const level = Number(req.params.level);
            const tiers = Object.fromEntries(odds.tierDistribution(level));
            return reply.send({ok: true, level, tiers});
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });
}
