/**
 * health.ts
 *
 * Health endpoint. The advisor has no external dependencies, so being able
 * to answer means it is healthy; the payload reports what is loaded.
 */

import type {FastifyInstance} from 'fastify';
import type {Advisor} from '../advisor.js';

export async function registerHealthRoutes(app: FastifyInstance, advisor: Advisor) {
    app.get('/api/health', async () => {
        const summary = {
            units: advisor.catalog.registry.size,
            decks: advisor.catalog.decks.length,
            sessions: advisor.sessions.size,
        };
        app.log.debug(summary);
        return {ok: true, ...summary};
    });
}
