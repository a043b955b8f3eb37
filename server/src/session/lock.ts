/**
 * lock.ts
 *
 * Keyed, in-process mutual exclusion. Calls for the same key run one after
 * another in arrival order; different keys do not wait on each other. The
 * returned promise settles with `fn`'s own result or error.
 */

const localLocks = new Map<string, Promise<void>>();

export async function runWithLocalLock<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const prev = localLocks.get(key) ?? Promise.resolve();
    const holder = prev.then(async () => fn());
    // The chain only orders callers; failures are reported through `holder`
    const filler: Promise<void> = holder.then(() => undefined, () => undefined);
    const tail = filler.finally(() => {
        if (localLocks.get(key) === tail) localLocks.delete(key);
    });
    localLocks.set(key, tail);
    return holder;
}

export function pendingLockCount(): number {
    return localLocks.size;
}
