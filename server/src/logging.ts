/**
 * logging.ts
 *
 * Console-backed logging helpers for modules that run outside a Fastify
 * request (session store, diagnostics, catalog loading). Routes log through
 * `app.log`. Set `LOG_DEBUG=1` (or `true`) to enable debug output.
 */

export function isDebugEnabled(): boolean {
    return process.env.LOG_DEBUG === '1' || process.env.LOG_DEBUG === 'true';
}

export function debug(...args: unknown[]) {
    if (isDebugEnabled()) {
        console.log(...args);
    }
}

export function info(...args: unknown[]) {
    console.log(...args);
}
