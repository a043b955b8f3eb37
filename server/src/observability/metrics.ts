/**
 * metrics.ts
 *
 * Prometheus metrics registry and the advisor's own metrics.
 * - `register` is the central `prom-client` Registry served at `/metrics`.
 * - Default process metrics are collected automatically.
 * - Session, observation and recommendation metrics are defined below.
 */

import client from 'prom-client';

export const register = new client.Registry();
client.collectDefaultMetrics({register});

// Gauge: sessions currently held in memory
export const sessionsActiveGauge = new client.Gauge({
    name: 'advisor_sessions_active',
    help: 'Number of advisor sessions currently in memory',
    registers: [register],
});

// Counter: observation events applied to session pools, by kind and outcome
export const observationsCounter = new client.Counter({
    name: 'advisor_observations_total',
    help: 'Observation events applied to session pools',
    labelNames: ['kind', 'outcome'] as const,
    registers: [register],
});

// Counter: ranking queries answered
export const recommendationsCounter = new client.Counter({
    name: 'advisor_recommendations_total',
    help: 'Total number of recommendation queries answered',
    registers: [register],
});

// Histogram: time spent ranking candidate decks (seconds)
export const recommendationDurationHistogram = new client.Histogram({
    name: 'advisor_recommendation_duration_seconds',
    help: 'Time spent ranking candidate decks in seconds',
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
    registers: [register],
});

// Counter: sessions removed by diagnostics
export const sessionsPrunedCounter = new client.Counter({
    name: 'advisor_sessions_pruned_total',
    help: 'Total number of idle sessions pruned by diagnostics',
    registers: [register],
});
