/**
 * In-memory stand-in for the subset of ioredis used by RedisCheckpointer.
 */
import type { RedisClient } from '../../src/graph/redis-checkpointer';

export class InMemoryRedis implements RedisClient {
    readonly strings = new Map<string, string>();
    readonly lists = new Map<string, string[]>();
    readonly ttls = new Map<string, number>();

    async set(key: string, value: string): Promise<'OK'> {
        this.strings.set(key, value);
        return 'OK';
    }

    async get(key: string): Promise<string | null> {
        return this.strings.get(key) ?? null;
    }

    async del(...keys: string[]): Promise<number> {
        let removed = 0;
        for (const key of keys) {
            if (this.strings.delete(key) || this.lists.delete(key)) {
                removed++;
            }
            this.ttls.delete(key);
        }
        return removed;
    }

    async rpush(key: string, ...values: string[]): Promise<number> {
        const list = this.lists.get(key) ?? [];
        list.push(...values);
        this.lists.set(key, list);
        return list.length;
    }

    async lrange(key: string, start: number, stop: number): Promise<string[]> {
        const list = this.lists.get(key) ?? [];
        const len = list.length;
        const from = start < 0 ? Math.max(len + start, 0) : start;
        const to = stop < 0 ? len + stop : Math.min(stop, len - 1);
        if (from > to) return [];
        return list.slice(from, to + 1);
    }

    async expire(key: string, seconds: number): Promise<number> {
        if (!this.strings.has(key) && !this.lists.has(key)) return 0;
        this.ttls.set(key, seconds);
        return 1;
    }
}
