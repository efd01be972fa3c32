/**
 * Per-thread mutual exclusion for writers.
 * Distinct threads never wait on each other.
 */

class Mutex {
    private locked = false;
    private readonly queue: Array<() => void> = [];

    get idle(): boolean {
        return !this.locked && this.queue.length === 0;
    }

    acquire(): Promise<() => void> {
        return new Promise((resolve) => {
            const release = () => {
                const next = this.queue.shift();
                if (next) {
                    next();
                    return;
                }
                this.locked = false;
            };

            if (!this.locked) {
                this.locked = true;
                resolve(release);
                return;
            }

            this.queue.push(() => {
                this.locked = true;
                resolve(release);
            });
        });
    }
}

export class ThreadLock {
    private readonly mutexes = new Map<string, Mutex>();

    /** Resolves with a release function once `threadId` is free */
    async acquire(threadId: string): Promise<() => void> {
        let mutex = this.mutexes.get(threadId);
        if (!mutex) {
            mutex = new Mutex();
            this.mutexes.set(threadId, mutex);
        }

        const owned = mutex;
        const release = await owned.acquire();
        let released = false;

        return () => {
            if (released) return;
            released = true;
            release();
            if (owned.idle && this.mutexes.get(threadId) === owned) {
                this.mutexes.delete(threadId);
            }
        };
    }

    async run<T>(threadId: string, fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire(threadId);
        try {
            return await fn();
        } finally {
            release();
        }
    }

    /** Threads with a holder or waiters */
    get activeThreads(): number {
        return this.mutexes.size;
    }
}
