/**
 * AsyncMutex - FIFO mutual exclusion for async critical sections.
 *
 * Ownership passes straight from the releasing holder to the oldest waiter,
 * so a caller arriving later can never overtake the queue.
 */

import { PetLogError } from '../../shared/errors/PetLogError.js';

export type ReleaseLock = () => void;

interface Waiter {
    grant: (release: ReleaseLock) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
}

export class AsyncMutex {
    private locked = false;
    private waiters: Waiter[] = [];

    get isLocked(): boolean {
        return this.locked;
    }

    /**
     * Number of callers queued behind the current holder.
     */
    get pendingCount(): number {
        return this.waiters.length;
    }

    /**
     * Wait for the lock. Rejects with CANCELLED if the signal fires first,
     * in which case the caller never holds the lock.
     */
    acquire(signal?: AbortSignal): Promise<ReleaseLock> {
        if (signal?.aborted) {
            return Promise.reject(PetLogError.cancelled());
        }

        if (!this.locked) {
            this.locked = true;
            return Promise.resolve(this.createRelease());
        }

        return new Promise<ReleaseLock>((resolve, reject) => {
            const waiter: Waiter = { grant: resolve, signal };

            if (signal) {
                waiter.onAbort = () => {
                    const index = this.waiters.indexOf(waiter);
                    if (index !== -1) {
                        this.waiters.splice(index, 1);
                        reject(PetLogError.cancelled());
                    }
                };
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }

            this.waiters.push(waiter);
        });
    }

    /**
     * Run a task while holding the lock; the lock is released on every exit path.
     */
    async runExclusive<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const release = await this.acquire(signal);
        try {
            return await task();
        } finally {
            release();
        }
    }

    private createRelease(): ReleaseLock {
        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            this.handOff();
        };
    }

    private handOff(): void {
        const next = this.waiters.shift();
        if (!next) {
            this.locked = false;
            return;
        }

        if (next.signal && next.onAbort) {
            next.signal.removeEventListener('abort', next.onAbort);
        }
        next.grant(this.createRelease());
    }
}
