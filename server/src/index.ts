/**
 * index.ts
 *
 * Server entrypoint. Responsibilities:
 * - Parse configuration and load the catalog (fails fast on bad data)
 * - Start OpenTelemetry tracing when enabled
 * - Build the advisor; a default level missing from the odds table stops startup
 * - Configure and start the Fastify HTTP server with CORS for the front end
 * - Register the HTTP routes over a single `Advisor`
 * - Schedule optional idle-session diagnostics
 * - Provide graceful shutdown handlers for SIGINT / SIGTERM
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import {loadConfig} from './config.js';
import {loadCatalog} from './data/catalogLoader.js';
import {createAdvisor} from './advisor.js';
import {registerHttpRoutes} from './http/routes.js';
import {runSessionDiagnostics} from './diagnostics/sessions.js';
import {startTracing} from './observability/tracing.js';

const config = loadConfig();
const tracing = config.tracing.enabled ? startTracing(config.tracing) : null;

const app = Fastify({
    logger: {
        level: config.logLevel,
    },
});

const catalog = await loadCatalog(config.dataDir);
const advisor = createAdvisor(catalog, {
    slotsPerRefresh: config.slotsPerRefresh,
    drawModel: config.drawModel,
    defaultLevel: config.defaultLevel,
    defaultRefreshBudget: config.defaultRefreshBudget,
    weights: config.weights,
});

await app.register(cors, {
    origin: config.frontendOrigin,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['content-type', 'traceparent', 'tracestate'],
    maxAge: 86400,
});

await registerHttpRoutes(app, advisor);

let diagnosticsHandle: NodeJS.Timeout | null = null;
if (config.sessionDiagnosticsEnabled) {
    diagnosticsHandle = setInterval(() => {
        try {
            runSessionDiagnostics(advisor.sessions, config.sessionMaxIdleMinutes);
        } catch (e) {
            app.log.error({err: e}, 'session diagnostics failed');
        }
    }, config.sessionDiagnosticsIntervalSeconds * 1000);
    diagnosticsHandle.unref();
    app.log.info({intervalSeconds: config.sessionDiagnosticsIntervalSeconds}, 'session diagnostics scheduled');
}

const shutdown = async () => {
    app.log.info('shutting down...');
    if (diagnosticsHandle) {
        clearInterval(diagnosticsHandle);
        diagnosticsHandle = null;
    }
    try {
        await app.close();
        await tracing?.shutdown();
    } catch (e) {
        app.log.error({err: e}, 'close failed');
    }
    process.exit(0);
};
process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

app.listen({port: config.port, host: '0.0.0.0'}).catch((e) => {
    app.log.error(e);
    process.exit(1);
});
