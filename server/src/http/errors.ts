/**
 * errors.ts
 *
 * Maps failures raised while handling a request to JSON error replies of the
 * form `{ok: false, error: CODE, msg}`. Bad input is a 4xx; a probability
 * outside [0, 1] is reported as its own 500 code since it points at the math,
 * not the caller.
 */

import type {FastifyBaseLogger, FastifyReply} from "fastify";
import {ZodError} from "zod";
import {type EngineErrorCode, ProbabilityInvariantError, isEngineError} from "../engine/errors.js";
import {SessionNotFoundError} from "../session/sessionStore.js";

const ENGINE_STATUS: Record<EngineErrorCode, number> = {
    UNKNOWN_UNIT: 400,
    INVALID_CATALOG: 400,
    INVALID_ODDS_TABLE: 400,
    INVALID_LEVEL: 400,
    INVALID_OBSERVATION: 400,
    INVALID_QUERY: 400,
    POOL_UNDERFLOW: 409,
    POOL_OVERFLOW: 409,
    EMPTY_CANDIDATE_SET: 400,
};

export interface ErrorReplyOptions {
    // Report UNKNOWN_UNIT as 404: the unit was the resource named in the path
    unitInPath?: boolean;
}

export function sendError(reply: FastifyReply, log: FastifyBaseLogger, err: unknown, opts: ErrorReplyOptions = {}) {
    if (err instanceof ZodError) {
        return reply.code(400).send({ok: false, error: "VALIDATION_ERROR", issues: err.issues});
    }
    if (err instanceof SessionNotFoundError) {
        return reply.code(404).send({ok: false, error: err.code, msg: err.message});
    }
    if (isEngineError(err)) {
        const status = err.code === "UNKNOWN_UNIT" && opts.unitInPath ? 404 : ENGINE_STATUS[err.code];
        log.debug({code: err.code}, err.message);
        return reply.code(status).send({ok: false, error: err.code, msg: err.message});
    }
    if (err instanceof ProbabilityInvariantError) {
        log.error({err}, "probability invariant violated");
        return reply.code(500).send({ok: false, error: "PROBABILITY_INVARIANT_VIOLATION", msg: err.message});
    }
    log.error({err}, "request failed");
    return reply.code(500).send({ok: false, error: "INTERNAL_ERROR"});
}
