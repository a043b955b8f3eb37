/**
 * sessionStore.ts
 *
 * In-memory advisor sessions. A session owns one `PoolStateTracker` and the
 * player's current level. Responsibilities:
 * - create / look up / delete sessions (nothing outlives the process)
 * - serialize pool mutations per session through `runWithLocalLock`
 * - hand out pool snapshots so queries never wait on the lock
 * - prune sessions idle past a cutoff
 */

import {v4 as uuidv4} from "uuid";
import type {ObservationEvent, SessionView} from "../../../shared/protocol/types/session.js";
import type {Catalog} from "../engine/catalog.js";
import {type PoolSnapshot, PoolStateTracker} from "../engine/poolState.js";
import {isEngineError} from "../engine/errors.js";
import {observationsCounter, sessionsActiveGauge} from "../observability/metrics.js";
import {runWithLocalLock} from "./lock.js";
import {debug} from "../logging.js";

export interface Session {
    readonly id: string;
    level: number;
    readonly createdAt: number;
    lastSeenAt: number;
    readonly tracker: PoolStateTracker;
}

export class SessionNotFoundError extends Error {
    readonly code = "SESSION_NOT_FOUND";

    constructor(readonly sessionId: string) {
        super(`session "${sessionId}" not found`);
        this.name = "SessionNotFoundError";
    }
}

export class SessionStore {
    private readonly sessions = new Map<string, Session>();

    constructor(
        private readonly catalog: Catalog,
        private readonly now: () => number = Date.now,
    ) {
    }

    get size(): number {
        return this.sessions.size;
    }

    /** @throws InvalidLevelError when the odds table has no row for `level` */
    create(level: number): Session {
        this.catalog.odds.tierDistribution(level);
        const ts = this.now();
        const session: Session = {
            id: uuidv4(),
            level,
            createdAt: ts,
            lastSeenAt: ts,
            tracker: new PoolStateTracker(this.catalog.registry),
        };
        this.sessions.set(session.id, session);
        sessionsActiveGauge.set(this.sessions.size);
        debug('[sessions] created', session.id, {level});
        return session;
    }

    /** @throws SessionNotFoundError */
    get(id: string): Session {
        const session = this.sessions.get(id);
        if (!session) throw new SessionNotFoundError(id);
        session.lastSeenAt = this.now();
        return session;
    }

    delete(id: string): boolean {
        const deleted = this.sessions.delete(id);
        if (deleted) sessionsActiveGauge.set(this.sessions.size);
        return deleted;
    }

    /** Run a mutation with this session's lock held. */
    async mutate<T>(id: string, fn: (session: Session) => T): Promise<T> {
        return runWithLocalLock(`session:${id}`, () => fn(this.get(id)));
    }

    async setLevel(id: string, level: number): Promise<Session> {
        return this.mutate(id, (s) => {
            this.catalog.odds.tierDistribution(level);
            s.level = level;
            return s;
        });
    }

    /** Apply observation events atomically; counts every event by kind and outcome. */
    async observe(id: string, events: readonly ObservationEvent[]): Promise<PoolSnapshot> {
        return this.mutate(id, (s) => {
            try {
                s.tracker.applyAll(events);
            } catch (e) {
                const outcome = isEngineError(e) ? e.code.toLowerCase() : 'error';
                for (const ev of events) observationsCounter.inc({kind: ev.type.toLowerCase(), outcome});
                debug('[sessions] observation batch rejected', id, e);
                throw e;
            }
            for (const ev of events) observationsCounter.inc({kind: ev.type.toLowerCase(), outcome: 'applied'});
            return s.tracker.snapshot();
        });
    }

    async observeOpponentBoards(id: string, boards: readonly (readonly string[])[]): Promise<PoolSnapshot> {
        return this.mutate(id, (s) => {
            s.tracker.observeOpponentBoards(boards);
            return s.tracker.snapshot();
        });
    }

    /** Frozen pool view taken without the lock; later mutations do not affect it. */
    snapshot(id: string): { session: Session; snapshot: PoolSnapshot } {
        const session = this.get(id);
        return {session, snapshot: session.tracker.snapshot()};
    }

    view(session: Session): SessionView {
        return {
            id: session.id,
            level: session.level,
            createdAt: session.createdAt,
            lastSeenAt: session.lastSeenAt,
            held: session.tracker.heldTotals(),
        };
    }

    /** Delete sessions not seen since `cutoff` (epoch ms). Returns their ids. */
    pruneIdle(cutoff: number): string[] {
        const pruned: string[] = [];
        for (const [id, s] of this.sessions) {
            if (s.lastSeenAt < cutoff) {
                this.sessions.delete(id);
                pruned.push(id);
            }
        }
        if (pruned.length) sessionsActiveGauge.set(this.sessions.size);
        return pruned;
    }
}
