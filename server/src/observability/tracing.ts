/**
 * tracing.ts
 *
 * OpenTelemetry SDK bootstrap for traces. Ranking spans opened through
 * `@opentelemetry/api` are no-ops until `startTracing` runs; once started
 * they are exported over OTLP HTTP to the configured collector. Metrics stay
 * on prom-client (`/metrics`), so only a trace exporter is set up here.
 */

import {NodeSDK} from '@opentelemetry/sdk-node';
import {getNodeAutoInstrumentations} from '@opentelemetry/auto-instrumentations-node';
import {OTLPTraceExporter} from '@opentelemetry/exporter-trace-otlp-http';

export interface TracingOptions {
    serviceName: string;
    tracesEndpoint: string;
}

export function startTracing(opts: TracingOptions): NodeSDK {
    const sdk = new NodeSDK({
        serviceName: opts.serviceName,
        traceExporter: new OTLPTraceExporter({url: opts.tracesEndpoint}),
        instrumentations: [getNodeAutoInstrumentations({
            '@opentelemetry/instrumentation-fs': {enabled: false},
        })],
    });
    sdk.start();
    return sdk;
}
