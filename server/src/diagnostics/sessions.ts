/**
 * sessions.ts
 *
 * Periodic diagnostics for session cleanup. Sessions are only ever discarded,
 * never persisted: any session idle longer than the configured number of
 * minutes is deleted and counted in `advisor_sessions_pruned_total`.
 */

import type {SessionStore} from '../session/sessionStore.js';
import {sessionsPrunedCounter} from '../observability/metrics.js';
import {info} from "../logging.js";

export function runSessionDiagnostics(store: SessionStore, maxIdleMinutes: number, now: number = Date.now()): string[] {
    const cutoff = now - maxIdleMinutes * 60 * 1000;
    const pruned = store.pruneIdle(cutoff);
    if (pruned.length > 0) {
        sessionsPrunedCounter.inc(pruned.length);
        info('pruned idle sessions', pruned);
    }
    return pruned;
}
