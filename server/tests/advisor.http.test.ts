/**
 * advisor.http.test.ts
 *
 * HTTP tests for the advisor routes, run with `app.inject` against an
 * advisor built on the synthetic fixture catalog (one slot per refresh,
 * level 1 and a budget of two refreshes by default).
 */

import {describe, it, expect, beforeAll, afterAll} from 'vitest';
import Fastify, {type FastifyInstance} from 'fastify';
import {registerHttpRoutes} from '../src/http/routes.js';
import {createAdvisor} from '../src/advisor.js';
import {makeCatalog} from './fixtures.js';

describe('advisor http routes', () => {
    let app: FastifyInstance;

    beforeAll(async () => {
        app = Fastify();
        await registerHttpRoutes(app, createAdvisor(makeCatalog(), {
            slotsPerRefresh: 1,
            defaultLevel: 1,
            defaultRefreshBudget: 2,
        }));
        await app.ready();
    });

    afterAll(async () => {
        await app.close();
    });

    async function newSession(payload: object = {}): Promise<string> {
        const res = await app.inject({method: 'POST', url: '/api/sessions', payload});
        expect(res.statusCode).toBe(201);
        return res.json<{ session: { id: string } }>().session.id;
    }

    it('reports health', async () => {
        const res = await app.inject({method: 'GET', url: '/api/health'});
        expect(res.statusCode).toBe(200);
        expect(res.json()).toMatchObject({ok: true, units: 5, decks: 3});
    });

    it('serves the catalog', async () => {
        const units = await app.inject({method: 'GET', url: '/api/units'});
        expect(units.json<{ units: { id: string }[] }>().units.map((u) => u.id)).toEqual(['a', 'b', 'c', 'd', 'e']);

        const unit = await app.inject({method: 'GET', url: '/api/units/zz'});
        expect(unit.statusCode).toBe(404);
        expect(unit.json()).toMatchObject({ok: false, error: 'UNKNOWN_UNIT'});

        const odds = await app.inject({method: 'GET', url: '/api/odds/5'});
        expect(odds.json()).toEqual({ok: true, level: 5, tiers: {'1': 0.5, '2': 0.5}});

        const badLevel = await app.inject({method: 'GET', url: '/api/odds/4'});
        expect(badLevel.statusCode).toBe(400);
        expect(badLevel.json()).toMatchObject({error: 'INVALID_LEVEL'});
    });

    it('manages the session lifecycle', async () => {
        const id = await newSession({level: 5});

        const got = await app.inject({method: 'GET', url: `/api/sessions/${id}`});
        expect(got.json()).toMatchObject({ok: true, session: {id, level: 5}});

        const patched = await app.inject({method: 'PATCH', url: `/api/sessions/${id}`, payload: {level: 8}});
        expect(patched.json()).toMatchObject({session: {level: 8}});

        const badPatch = await app.inject({method: 'PATCH', url: `/api/sessions/${id}`, payload: {level: 9}});
        expect(badPatch.statusCode).toBe(400);
        expect(badPatch.json()).toMatchObject({error: 'INVALID_LEVEL'});

        expect((await app.inject({method: 'DELETE', url: `/api/sessions/${id}`})).statusCode).toBe(200);
        const gone = await app.inject({method: 'DELETE', url: `/api/sessions/${id}`});
        expect(gone.statusCode).toBe(404);
        const missing = await app.inject({method: 'GET', url: `/api/sessions/${id}`});
        expect(missing.json()).toMatchObject({ok: false, error: 'SESSION_NOT_FOUND'});
    });

    it('applies observations and reports the pool', async () => {
        const id = await newSession();

        const applied = await app.inject({
            method: 'POST',
            url: `/api/sessions/${id}/observations`,
            payload: {events: [{type: 'OBSERVE', unitId: 'a', count: 3}, {type: 'OBSERVE', unitId: 'c', count: 1, source: 'shop'}]},
        });
        expect(applied.json()).toEqual({ok: true, applied: 2, remaining: {a: 7, c: 5}});

        const underflow = await app.inject({
            method: 'POST',
            url: `/api/sessions/${id}/observations`,
            payload: {events: [{type: 'OBSERVE', unitId: 'e', count: 5}]},
        });
        expect(underflow.statusCode).toBe(409);
        expect(underflow.json()).toMatchObject({error: 'POOL_UNDERFLOW'});

        const zero = await app.inject({
            method: 'POST',
            url: `/api/sessions/${id}/observations`,
            payload: {events: [{type: 'OBSERVE', unitId: 'a', count: 0}]},
        });
        expect(zero.statusCode).toBe(400);
        expect(zero.json()).toMatchObject({error: 'INVALID_OBSERVATION'});

        const malformed = await app.inject({
            method: 'POST',
            url: `/api/sessions/${id}/observations`,
            payload: {events: []},
        });
        expect(malformed.statusCode).toBe(400);
        expect(malformed.json()).toMatchObject({error: 'VALIDATION_ERROR'});

        const opponents = await app.inject({
            method: 'POST',
            url: `/api/sessions/${id}/opponents`,
            payload: {boards: [['b'], ['b', 'd']]},
        });
        expect(opponents.statusCode).toBe(200);

        const pool = await app.inject({method: 'GET', url: `/api/sessions/${id}/pool`});
        const tiers = pool.json<{ pool: { cost: number; remaining: number; total: number }[] }>().pool;
        expect(tiers.map((t) => [t.cost, t.remaining, t.total])).toEqual([[1, 15, 20], [2, 10, 12], [3, 4, 4]]);
    });

    it('ranks decks for a session', async () => {
        const id = await newSession();
        const res = await app.inject({
            method: 'POST',
            url: `/api/sessions/${id}/recommendations`,
            payload: {owned: ['a']},
        });
        expect(res.statusCode).toBe(200);
        const recs = res.json<{ recommendations: { deckId: string; rank: number; score: number; completionProbability: number; expectedRefreshes: number | null }[] }>().recommendations;
        expect(recs.map((r) => r.deckId)).toEqual(['twins', 'wide', 'gammas']);
        expect(recs[0].score).toBeCloseTo(0.59, 12);
        expect(recs[0].completionProbability).toBeCloseTo(0.75, 12);
        expect(recs[2].expectedRefreshes).toBeNull();

        const limited = await app.inject({
            method: 'POST',
            url: `/api/sessions/${id}/recommendations`,
            payload: {owned: ['a'], limit: 1, deckIds: ['gammas', 'wide']},
        });
        expect(limited.json<{ recommendations: { deckId: string }[] }>().recommendations.map((r) => r.deckId)).toEqual(['wide']);
    });

    it('rejects bad recommendation queries', async () => {
        const id = await newSession();
        const cases: [object, number, string][] = [
            [{deckIds: ['nope']}, 400, 'INVALID_QUERY'],
            [{deckIds: []}, 400, 'EMPTY_CANDIDATE_SET'],
            [{owned: ['zz']}, 400, 'UNKNOWN_UNIT'],
            [{refreshBudget: -1}, 400, 'VALIDATION_ERROR'],
        ];
        for (const [payload, status, error] of cases) {
            const res = await app.inject({method: 'POST', url: `/api/sessions/${id}/recommendations`, payload});
            expect(res.statusCode).toBe(status);
            expect(res.json()).toMatchObject({ok: false, error});
        }
        const noSession = await app.inject({method: 'POST', url: '/api/sessions/missing/recommendations', payload: {}});
        expect(noSession.statusCode).toBe(404);
    });

    it('returns odds for one unit', async () => {
        const id = await newSession();
        const res = await app.inject({method: 'GET', url: `/api/sessions/${id}/units/a/odds?copies=2&refreshBudget=2`});
        const {odds} = res.json<{ odds: { remaining: number; acquisitionProbability: number; expectedRefreshes: number | null } }>();
        expect(odds.remaining).toBe(10);
        expect(odds.acquisitionProbability).toBeCloseTo(9 / 38, 12);
        expect(odds.expectedRefreshes).toBeCloseTo(37 / 9, 10);

        const never = await app.inject({method: 'GET', url: `/api/sessions/${id}/units/e/odds`});
        expect(never.json()).toMatchObject({odds: {acquisitionProbability: 0, expectedRefreshes: null}});

        const unknown = await app.inject({method: 'GET', url: `/api/sessions/${id}/units/zz/odds`});
        expect(unknown.statusCode).toBe(404);
    });

    it('advises on the current shop', async () => {
        const id = await newSession();
        const res = await app.inject({
            method: 'POST',
            url: `/api/sessions/${id}/shop-advice`,
            payload: {owned: ['a'], shop: ['d', 'c', 'e', 'b'], topDecks: 1},
        });
        const body = res.json<{ picks: { unitId: string; role: string }[]; recommendations: { deckId: string }[] }>();
        expect(body.picks.map((p) => [p.unitId, p.role])).toEqual([['b', 'core'], ['c', 'flex'], ['d', 'none'], ['e', 'none']]);
        expect(body.recommendations.map((r) => r.deckId)).toEqual(['twins']);
    });

    it('serves prometheus metrics', async () => {
        const res = await app.inject({method: 'GET', url: '/metrics'});
        expect(res.statusCode).toBe(200);
        expect(res.body).toContain('advisor_sessions_active');
    });
});
