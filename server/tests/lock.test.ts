/**
 * lock.test.ts
 *
 * Unit tests for the keyed in-process lock used to serialize session writes.
 */

import {describe, it, expect} from 'vitest';
import {pendingLockCount, runWithLocalLock} from '../src/session/lock.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('runWithLocalLock', () => {
    it('runs calls for one key in arrival order', async () => {
        const order: string[] = [];
        const slow = runWithLocalLock('k1', async () => {
            await new Promise((resolve) => setTimeout(resolve, 20));
            order.push('first');
            return 1;
        });
        const fast = runWithLocalLock('k1', () => {
            order.push('second');
            return 2;
        });
        await expect(Promise.all([slow, fast])).resolves.toEqual([1, 2]);
        expect(order).toEqual(['first', 'second']);
    });

    it('does not hold other keys back', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        const blocked = runWithLocalLock('k2', async () => {
            await gate;
            return 'blocked';
        });
        await expect(runWithLocalLock('k3', () => 'free')).resolves.toBe('free');
        release();
        await expect(blocked).resolves.toBe('blocked');
    });

    it('keeps the queue moving after a failure', async () => {
        const failed = runWithLocalLock('k4', () => {
            throw new Error('boom');
        });
        const next = runWithLocalLock('k4', () => 'ok');
        await expect(failed).rejects.toThrow('boom');
        await expect(next).resolves.toBe('ok');
    });

    it('forgets keys once their queue drains', async () => {
        await runWithLocalLock('k5', () => undefined);
        await tick();
        expect(pendingLockCount()).toBe(0);
    });
});
