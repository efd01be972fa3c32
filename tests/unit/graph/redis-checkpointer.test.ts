import { describe, it, expect } from 'vitest';
import { RedisCheckpointer } from '../../../src/graph';
import { GraphConfigError, SnapshotDecodeError } from '../../../src/lib/errors';
import { buildCounterGraph, counterCodec, makeSnapshot } from '../../mocks/graphs';
import { InMemoryRedis } from '../../mocks/redis';

describe('RedisCheckpointer', () => {
    const seed = makeSnapshot('t1', 'ckpt_seed', -1, null, 0);

    it('should store each snapshot under the prefix and index it per thread', async () => {
        const redis = new InMemoryRedis();
        const store = new RedisCheckpointer(redis, { codec: counterCodec, prefix: 'app:' });

        await store.appendSnapshot(seed);

        expect([...redis.strings.keys()]).toEqual(['app:data:t1:ckpt_seed']);
        expect(redis.lists.get('app:thread:t1')).toEqual(['ckpt_seed']);
    });

    it('should use the default prefix', async () => {
        const redis = new InMemoryRedis();
        const store = new RedisCheckpointer(redis, { codec: counterCodec });

        await store.appendSnapshot(seed);

        expect(redis.lists.has('graph:checkpoint:thread:t1')).toBe(true);
    });

    it('should refresh the TTL of the snapshot and the thread index', async () => {
        const redis = new InMemoryRedis();
        const store = new RedisCheckpointer(redis, { codec: counterCodec, ttlSeconds: 60 });

        await store.appendSnapshot(seed);

        expect(Object.fromEntries(redis.ttls)).toEqual({
            'graph:checkpoint:data:t1:ckpt_seed': 60,
            'graph:checkpoint:thread:t1': 60,
        });
    });

    it.each([0, -5, 1.5])('should reject ttlSeconds %s', (ttlSeconds) => {
        expect(() => new RedisCheckpointer(new InMemoryRedis(), { codec: counterCodec, ttlSeconds }))
            .toThrow(GraphConfigError);
    });

    it('should fail to decode a corrupted payload', async () => {
        const redis = new InMemoryRedis();
        const store = new RedisCheckpointer(redis, { codec: counterCodec });
        await store.appendSnapshot(seed);

        await redis.set('graph:checkpoint:data:t1:ckpt_seed', '{"bad":true}');

        await expect(store.loadSnapshot('t1', 'ckpt_seed')).rejects.toMatchObject({
            name: 'SnapshotDecodeError',
            checkpointId: 'ckpt_seed',
        });
        await expect(store.loadLatest('t1')).rejects.toThrow(SnapshotDecodeError);
    });

    it('should drive a full run and a fork', async () => {
        const app = buildCounterGraph().compile({
            checkpointer: new RedisCheckpointer(new InMemoryRedis(), { codec: counterCodec }),
        });

        expect(await app.invoke({ count: 0 }, { threadId: 't1' })).toEqual({ count: 4 });
        const history = await app.getHistory({ threadId: 't1' });

        expect(await app.invoke(null, { threadId: 't1', checkpointId: history[3].checkpointId })).toEqual({ count: 4 });
        expect((await app.getHistory({ threadId: 't1' })).map(s => s.step)).toEqual([3, 2, 1, 3, 2, 1, 0, -1]);
    });
});
