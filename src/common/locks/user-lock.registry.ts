// src/common/locks/user-lock.registry.ts

export type ReleaseLock = () => void;

/**
 * FIFO lock per key, held in-process. Callers for the same key run one at a
 * time in arrival order; different keys never wait on each other.
 * Idle keys are dropped from the map once their queue drains.
 */
export class UserLockRegistry<K = number> {
    private readonly tails = new Map<K, Promise<void>>();

    /**
     * Resolves with a release function once every earlier holder of `key` has
     * released. Rejects with `signal.reason` if the signal aborts first; the
     * queue position is given up and later callers are not held back.
     */
    async acquire(key: K, signal?: AbortSignal): Promise<ReleaseLock> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let open: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            open = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        let released = false;
        const release: ReleaseLock = () => {
            if (released) return;
            released = true;
            open();
            void tail.then(() => {
                if (this.tails.get(key) === tail) {
                    this.tails.delete(key);
                }
            });
        };

        try {
            await (signal ? waitOrAbort(previous, signal) : previous);
        } catch (error) {
            release();
            throw error;
        }
        return release;
    }

    async runExclusive<T>(key: K, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const release = await this.acquire(key, signal);
        try {
            return await task();
        } finally {
            release();
        }
    }

    /** Keys with a holder or waiters. */
    get size(): number {
        return this.tails.size;
    }
}

function waitOrAbort(promise: Promise<void>, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
        return Promise.reject(signal.reason);
    }
    return new Promise<void>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        void promise.then(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        });
    });
}
