/**
 * routes.ts
 *
 * Central HTTP route registration. Composes the individual route modules so
 * the server entrypoint (and tests) can call `registerHttpRoutes(app, advisor)`
 * to wire the whole HTTP surface.
 */

import type {FastifyInstance} from 'fastify';
import type {Advisor} from '../advisor.js';
import {registerHealthRoutes} from './health.js';
import {registerMetricsRoute} from './metrics.js';
import {register} from '../observability/metrics.js';
import {registerCatalogRoutes} from './catalog.js';
import {registerSessionRoutes} from './sessions.js';
import {registerRecommendationRoutes} from './recommendations.js';

export async function registerHttpRoutes(app: FastifyInstance, advisor: Advisor) {
    await registerHealthRoutes(app, advisor);
    await registerMetricsRoute(app, register);
    await registerCatalogRoutes(app, advisor);
    await registerSessionRoutes(app, advisor);
    await registerRecommendationRoutes(app, advisor);
}
