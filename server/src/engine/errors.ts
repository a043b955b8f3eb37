/**
 * errors.ts
 *
 * Typed failures raised by the recommendation engine. Every input error is an
 * `EngineError` with a stable `code` the HTTP layer maps to a status. A
 * probability outside [0, 1] is a defect in the math rather than bad input,
 * so it gets its own class outside that hierarchy.
 */

export type EngineErrorCode =
    | "UNKNOWN_UNIT"
    | "INVALID_CATALOG"
    | "INVALID_ODDS_TABLE"
    | "INVALID_LEVEL"
    | "INVALID_OBSERVATION"
    | "INVALID_QUERY"
    | "POOL_UNDERFLOW"
    | "POOL_OVERFLOW"
    | "EMPTY_CANDIDATE_SET";

export class EngineError extends Error {
    readonly code: EngineErrorCode;

    constructor(code: EngineErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class UnknownUnitError extends EngineError {
    constructor(readonly unitId: string) {
        super("UNKNOWN_UNIT", `unknown unit "${unitId}"`);
    }
}

export class InvalidCatalogError extends EngineError {
    constructor(message: string) {
        super("INVALID_CATALOG", message);
    }
}

export class InvalidOddsTableError extends EngineError {
    constructor(message: string) {
        super("INVALID_ODDS_TABLE", message);
    }
}

export class InvalidLevelError extends EngineError {
    constructor(readonly level: number) {
        super("INVALID_LEVEL", `no shop odds for level ${level}`);
    }
}

export class InvalidObservationError extends EngineError {
    constructor(message: string) {
        super("INVALID_OBSERVATION", message);
    }
}

export class InvalidQueryError extends EngineError {
    constructor(message: string) {
        super("INVALID_QUERY", message);
    }
}

export class PoolUnderflowError extends EngineError {
    constructor(readonly unitId: string, readonly requested: number, readonly remaining: number) {
        super("POOL_UNDERFLOW", `cannot take ${requested} of "${unitId}": only ${remaining} left in the pool`);
    }
}

export class PoolOverflowError extends EngineError {
    constructor(readonly unitId: string, readonly requested: number, readonly releasable: number) {
        super("POOL_OVERFLOW", `cannot return ${requested} of "${unitId}": only ${releasable} recorded as taken`);
    }
}

export class EmptyCandidateSetError extends EngineError {
    constructor() {
        super("EMPTY_CANDIDATE_SET", "no candidate decks to rank");
    }
}

export class ProbabilityInvariantError extends Error {
    constructor(readonly value: number, readonly context: string) {
        super(`probability ${value} out of [0, 1] in ${context}`);
        this.name = "ProbabilityInvariantError";
    }
}

export function isEngineError(e: unknown): e is EngineError {
    return e instanceof EngineError;
}
