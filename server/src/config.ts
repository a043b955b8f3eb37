/**
 * config.ts
 *
 * Environment configuration, parsed once with zod. Every value has a default
 * suitable for local use; an invalid value fails startup with the zod issues
 * rather than falling back silently.
 */

import path from "node:path";
import {z} from "zod";

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform((v) => v === "true" || v === "1");

export const configSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("warn"),
    FRONTEND_ORIGIN: z.string().url().default("http://localhost:5173"),
    DATA_DIR: z.string().min(1).default(path.join(process.cwd(), "server", "data")),
    SLOTS_PER_REFRESH: z.coerce.number().int().positive().default(5),
    DEFAULT_REFRESH_BUDGET: z.coerce.number().int().nonnegative().default(10),
    DEFAULT_LEVEL: z.coerce.number().int().positive().default(7),
    DRAW_MODEL: z.enum(["independent", "hypergeometric"]).default("independent"),
    WEIGHT_MATCH: z.coerce.number().finite().default(0.6),
    WEIGHT_COMPLETION: z.coerce.number().finite().default(0.4),
    WEIGHT_COST: z.coerce.number().finite().default(0.01),
    WEIGHT_FLEX: z.coerce.number().finite().default(0.1),
    SESSION_MAX_IDLE_MINUTES: z.coerce.number().positive().default(30),
    SESSION_DIAGNOSTICS_ENABLED: booleanFlag.default("true"),
    SESSION_DIAGNOSTICS_INTERVAL_SECONDS: z.coerce.number().int().min(10).default(60),
    OTEL_ENABLED: booleanFlag.default("false"),
    OTEL_SERVICE_NAME: z.string().min(1).default("comp-scout"),
    OTEL_EXPORTER_OTLP_TRACES_ENDPOINT: z.string().url().default("http://otel-collector:4318/v1/traces"),
});

export type RawConfig = z.infer<typeof configSchema>;

export interface AppConfig {
    port: number;
    logLevel: RawConfig["LOG_LEVEL"];
    frontendOrigin: string;
    dataDir: string;
    slotsPerRefresh: number;
    defaultRefreshBudget: number;
    defaultLevel: number;
    drawModel: RawConfig["DRAW_MODEL"];
    weights: { match: number; completion: number; cost: number; flex: number };
    sessionMaxIdleMinutes: number;
    sessionDiagnosticsEnabled: boolean;
    sessionDiagnosticsIntervalSeconds: number;
    tracing: { enabled: boolean; serviceName: string; tracesEndpoint: string };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const raw = configSchema.parse(env);
    return {
        port: raw.PORT,
        logLevel: raw.LOG_LEVEL,
        frontendOrigin: raw.FRONTEND_ORIGIN,
        dataDir: raw.DATA_DIR,
        slotsPerRefresh: raw.SLOTS_PER_REFRESH,
        defaultRefreshBudget: raw.DEFAULT_REFRESH_BUDGET,
        defaultLevel: raw.DEFAULT_LEVEL,
        drawModel: raw.DRAW_MODEL,
        weights: {
            match: raw.WEIGHT_MATCH,
            completion: raw.WEIGHT_COMPLETION,
            cost: raw.WEIGHT_COST,
            flex: raw.WEIGHT_FLEX,
        },
        sessionMaxIdleMinutes: raw.SESSION_MAX_IDLE_MINUTES,
        sessionDiagnosticsEnabled: raw.SESSION_DIAGNOSTICS_ENABLED,
        sessionDiagnosticsIntervalSeconds: raw.SESSION_DIAGNOSTICS_INTERVAL_SECONDS,
        tracing: {
            enabled: raw.OTEL_ENABLED,
            serviceName: raw.OTEL_SERVICE_NAME,
            tracesEndpoint: raw.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
        },
    };
}
