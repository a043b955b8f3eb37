/**
 * session.ts
 *
 * Shared types for advisor sessions and the observation events that feed a
 * session's pool ledger. Events arrive already resolved to unit ids (the
 * recognition side owns pixels and templates); the server only applies them.
 */

// Where a copy taken out of the shared pool currently sits
export type PoolSource = "self" | "opponent" | "shop";

export type ObservationEvent =
    | { type: "OBSERVE"; unitId: string; count: number; source?: PoolSource }
    | { type: "RELEASE"; unitId: string; count: number; source?: PoolSource };

export interface SessionView {
    id: string;
    level: number;
    createdAt: number;
    lastSeenAt: number;
    // Copies currently recorded as taken out of the pool, per source
    held: Record<PoolSource, number>;
}

export interface PoolUnitStatus {
    unitId: string;
    name: string;
    remaining: number;
    total: number;
}

export interface PoolTierStatus {
    cost: number;
    remaining: number;
    total: number;
    units: PoolUnitStatus[];
}
