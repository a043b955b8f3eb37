/**
 * metrics.ts
 *
 * Prometheus scrape endpoint. Serves whichever prom-client `Registry` it is
 * given; the server passes the advisor's registry from
 * `observability/metrics.ts`.
 */

import type {FastifyInstance} from 'fastify';
import type {Registry} from 'prom-client';

export async function registerMetricsRoute(app: FastifyInstance, registry: Registry) {
    app.get('/metrics', async (_req, reply) => {
        try {
            const body = await registry.metrics();
            return reply.type(registry.contentType).send(body);
        } catch (err) {
            app.log.error({err}, 'metrics scrape failed');
            return reply.code(500).send({ok: false, error: 'METRICS_UNAVAILABLE'});
        }
    });
}
