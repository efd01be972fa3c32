/**
 * Redis Checkpointer implementation.
 * Works with any ioredis-compatible client.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { RedisCheckpointer } from 'checkpoint-graph';
 *
 * const redis = new Redis('redis://localhost:6379');
 * const checkpointer = new RedisCheckpointer(redis, {
 *     codec: { values: state, writes: state.partial() },
 *     prefix: 'myapp:',
 * });
 * ```
 */

import { GraphConfigError } from '../lib/errors';
import { normalizeLimit, type Checkpointer, type LoadHistoryOptions } from './checkpointer';
import { decodeSnapshot, encodeSnapshot, type SnapshotCodec } from './serde';
import type { Snapshot } from './types';

/** Redis client interface (compatible with ioredis) */
export interface RedisClient {
    set(key: string, value: string): Promise<unknown>;
    get(key: string): Promise<string | null>;
    del(...keys: string[]): Promise<number>;
    rpush(key: string, ...values: string[]): Promise<number>;
    lrange(key: string, start: number, stop: number): Promise<string[]>;
    expire(key: string, seconds: number): Promise<number>;
}

export interface RedisCheckpointerConfig<S> {
    codec: SnapshotCodec<S>;
    /** Key prefix (default: 'graph:checkpoint:') */
    prefix?: string;
    /** TTL in seconds, refreshed on every append (default: no expiry) */
    ttlSeconds?: number;
}

/**
 * Each snapshot is a string key; a per-thread list holds ids in append order.
 * The list push is the commit point, so a crash between the two writes leaves
 * an unreferenced payload rather than a half-visible snapshot.
 */
export class RedisCheckpointer<S> implements Checkpointer<S> {
    private readonly redis: RedisClient;
    private readonly prefix: string;
    private readonly ttlSeconds?: number;
    private readonly codec: SnapshotCodec<S>;

    constructor(client: RedisClient, config: RedisCheckpointerConfig<S>) {
        if (config.ttlSeconds !== undefined && (!Number.isInteger(config.ttlSeconds) || config.ttlSeconds <= 0)) {
            throw new GraphConfigError('ttlSeconds', 'ttlSeconds must be a positive integer');
        }

        this.redis = client;
        this.prefix = config.prefix ?? 'graph:checkpoint:';
        this.ttlSeconds = config.ttlSeconds;
        this.codec = config.codec;
    }

    private dataKey(threadId: string, checkpointId: string): string {
        return `${this.prefix}data:${threadId}:${checkpointId}`;
    }

    private threadKey(threadId: string): string {
        return `${this.prefix}thread:${threadId}`;
    }

    async appendSnapshot(snapshot: Snapshot<S>): Promise<void> {
        const key = this.dataKey(snapshot.threadId, snapshot.checkpointId);
        const threadKey = this.threadKey(snapshot.threadId);

        await this.redis.set(key, encodeSnapshot(snapshot));
        await this.redis.rpush(threadKey, snapshot.checkpointId);

        if (this.ttlSeconds) {
            await this.redis.expire(key, this.ttlSeconds);
            await this.redis.expire(threadKey, this.ttlSeconds);
        }
    }

    async loadLatest(threadId: string): Promise<Snapshot<S> | null> {
        const [id] = await this.redis.lrange(this.threadKey(threadId), -1, -1);
        if (id === undefined) return null;

        return this.loadSnapshot(threadId, id);
    }

    async loadSnapshot(threadId: string, checkpointId: string): Promise<Snapshot<S> | null> {
        const data = await this.redis.get(this.dataKey(threadId, checkpointId));
        if (data === null) return null;

        return decodeSnapshot(data, this.codec, checkpointId);
    }

    async loadHistory(threadId: string, options?: LoadHistoryOptions): Promise<Snapshot<S>[]> {
        const limit = normalizeLimit(options?.limit);
        if (limit === 0) return [];

        const start = limit !== undefined ? -limit : 0;
        const ids = await this.redis.lrange(this.threadKey(threadId), start, -1);
        const result: Snapshot<S>[] = [];

        for (const id of ids.reverse()) {
            const snapshot = await this.loadSnapshot(threadId, id);
            if (snapshot) {
                result.push(snapshot);
            }
        }

        return result;
    }

    async clear(threadId: string): Promise<number> {
        const threadKey = this.threadKey(threadId);
        const ids = await this.redis.lrange(threadKey, 0, -1);
        if (ids.length === 0) return 0;

        await this.redis.del(...ids.map(id => this.dataKey(threadId, id)));
        await this.redis.del(threadKey);

        return ids.length;
    }
}
