import { describe, it, expect } from 'vitest';
import { ThreadLock } from '../../../src/graph';

const tick = () => new Promise(resolve => setTimeout(resolve, 0));

describe('ThreadLock', () => {
    it('should run work on one thread in arrival order', async () => {
        const lock = new ThreadLock();
        const order: string[] = [];

        const first = lock.run('t', async () => {
            order.push('first:start');
            await tick();
            order.push('first:end');
        });
        const second = lock.run('t', async () => {
            order.push('second');
        });
        await Promise.all([first, second]);

        expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should not make distinct threads wait on each other', async () => {
        const lock = new ThreadLock();

        const releaseA = await lock.acquire('a');
        const releaseB = await lock.acquire('b');

        expect(lock.activeThreads).toBe(2);
        releaseA();
        releaseB();
        expect(lock.activeThreads).toBe(0);
    });

    it('should ignore a second release', async () => {
        const lock = new ThreadLock();
        const releaseFirst = await lock.acquire('t');
        const secondTurn = lock.acquire('t');

        releaseFirst();
        const releaseSecond = await secondTurn;
        releaseFirst();

        let thirdAcquired = false;
        const thirdTurn = lock.acquire('t').then((release) => {
            thirdAcquired = true;
            return release;
        });
        await tick();
        expect(thirdAcquired).toBe(false);

        releaseSecond();
        const releaseThird = await thirdTurn;
        expect(thirdAcquired).toBe(true);
        releaseThird();
        expect(lock.activeThreads).toBe(0);
    });

    it('should release when the work fails', async () => {
        const lock = new ThreadLock();

        await expect(lock.run('t', async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        expect(lock.activeThreads).toBe(0);
        await expect(lock.run('t', async () => 'next')).resolves.toBe('next');
    });
});
