/**
 * Checkpointer - append-only snapshot storage for graph threads.
 *
 * Snapshots are never updated in place. Corrections and forks are new
 * snapshots with their own parent link, so a thread holds a forest.
 */

import { GraphError } from '../lib/errors';
import type { Snapshot } from './types';

export interface LoadHistoryOptions {
    /** Return at most this many snapshots (newest first) */
    limit?: number;
}

/**
 * Checkpointer interface.
 *
 * Appends must be atomic: a snapshot is either fully stored or absent.
 */
export interface Checkpointer<S> {
    appendSnapshot(snapshot: Snapshot<S>): Promise<void>;

    /** Most recently appended snapshot of the thread */
    loadLatest(threadId: string): Promise<Snapshot<S> | null>;

    loadSnapshot(threadId: string, checkpointId: string): Promise<Snapshot<S> | null>;

    /** Every snapshot of the thread, newest first */
    loadHistory(threadId: string, options?: LoadHistoryOptions): Promise<Snapshot<S>[]>;

    /** Drop the whole thread; returns the number of snapshots removed */
    clear(threadId: string): Promise<number>;
}

/**
 * Whole-snapshot count for `LoadHistoryOptions.limit`: fractions round down
 * and negatives become 0. `undefined` means no limit.
 */
export function normalizeLimit(limit: number | undefined): number | undefined {
    return limit === undefined ? undefined : Math.max(0, Math.floor(limit));
}

/**
 * Copy a snapshot so neither the caller nor the store can mutate the other's copy.
 */
export function cloneSnapshot<S>(snapshot: Snapshot<S>): Snapshot<S> {
    return structuredClone(snapshot);
}

/**
 * In-memory checkpointer.
 * Volatile (process lifetime); suitable for tests and short-lived sessions.
 */
export class MemoryCheckpointer<S> implements Checkpointer<S> {
    /** threadId -> snapshots in append order */
    private readonly threads = new Map<string, Snapshot<S>[]>();

    async appendSnapshot(snapshot: Snapshot<S>): Promise<void> {
        const stored = cloneSnapshot(snapshot);
        const log = this.threads.get(snapshot.threadId);

        if (log) {
            if (log.some(existing => existing.checkpointId === snapshot.checkpointId)) {
                throw new GraphError(`Checkpoint already exists: ${snapshot.checkpointId}`);
            }
            log.push(stored);
        } else {
            this.threads.set(snapshot.threadId, [stored]);
        }
    }

    async loadLatest(threadId: string): Promise<Snapshot<S> | null> {
        const log = this.threads.get(threadId);
        if (!log || log.length === 0) return null;

        return cloneSnapshot(log[log.length - 1]);
    }

    async loadSnapshot(threadId: string, checkpointId: string): Promise<Snapshot<S> | null> {
        const found = this.threads.get(threadId)?.find(s => s.checkpointId === checkpointId);
        return found ? cloneSnapshot(found) : null;
    }

    async loadHistory(threadId: string, options?: LoadHistoryOptions): Promise<Snapshot<S>[]> {
        const log = this.threads.get(threadId) ?? [];
        const newestFirst = [...log].reverse();
        const limit = normalizeLimit(options?.limit);
        const limited = limit !== undefined ? newestFirst.slice(0, limit) : newestFirst;

        return limited.map(cloneSnapshot);
    }

    async clear(threadId: string): Promise<number> {
        const count = this.threads.get(threadId)?.length ?? 0;
        this.threads.delete(threadId);
        return count;
    }
}
