/**
 * sessions.ts
 *
 * HTTP routes for advisor sessions: create, inspect, change level, delete,
 * feed observation events and read the pool status. Mutating routes go
 * through the session store, which serializes them per session.
 */

import type {FastifyInstance} from "fastify";
import type {Advisor} from "../advisor.js";
import {summarizePool} from "../engine/poolState.js";
import {
    createSessionSchema,
    observationsSchema,
    opponentsSchema,
    updateSessionSchema,
} from "../schemas/session.js";
import {sendError} from "./errors.js";

type SessionParams = { Params: { id: string } };

export async function registerSessionRoutes(app: FastifyInstance, advisor: Advisor) {
    const {sessions, catalog} = advisor;

    app.post("/api/sessions", async (req, reply) => {
        try {
            const body = createSessionSchema.parse(req.body ?? {});
            const session = sessions.create(body.level ?? advisor.defaults.level);
            app.log.info({sessionId: session.id, level: session.level}, "session created");
            return reply.code(201).send({ok: true, session: sessions.view(session)});
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });

    app.get<SessionParams>("/api/sessions/:id", async (req, reply) => {
        try {
            return reply.send({ok: true, session: sessions.view(sessions.get(req.params.id))});
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });

    app.patch<SessionParams>("/api/sessions/:id", async (req, reply) => {
        try {
            const body = updateSessionSchema.parse(req.body);
            const session = await sessions.setLevel(req.params.id, body.level);
            return reply.send({ok: true, session: sessions.view(session)});
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });

    app.delete<SessionParams>("/api/sessions/:id", async (req, reply) => {
        if (!sessions.delete(req.params.id)) {
            return reply.code(404).send({ok: false, error: "SESSION_NOT_FOUND"});
        }
        app.log.info({sessionId: req.params.id}, "session deleted");
        return reply.send({ok: true});
    });

    app.post<SessionParams>("/api/sessions/:id/observations", async (req, reply) => {
        try {
            const body = observationsSchema.parse(req.body);
            const snapshot = await sessions.observe(req.params.id, body.events);
            const remaining: Record<string, number> = {};
            for (const ev of body.events) remaining[ev.unitId] = snapshot.remaining(ev.unitId);
            return reply.send({ok: true, applied: body.events.length, remaining});
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });

    app.post<SessionParams>("/api/sessions/:id/opponents", async (req, reply) => {
        try {
            const body = opponentsSchema.parse(req.body);
            const snapshot = await sessions.observeOpponentBoards(req.params.id, body.boards);
            return reply.send({ok: true, pool: summarizePool(catalog.registry, snapshot)});
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });

    app.get<SessionParams>("/api/sessions/:id/pool", async (req, reply) => {
        try {
            const {snapshot} = sessions.snapshot(req.params.id);
            return reply.send({ok: true, pool: summarizePool(catalog.registry, snapshot)});
        } catch (err) {
            return sendError(reply, app.log, err);
        }
    });
}
