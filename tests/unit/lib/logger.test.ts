import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    consoleLogger,
    createFilteredLogger,
    isLogLevel,
    noopLogger,
    withLogContext,
} from '../../../src/lib/logger';
import type { Logger } from '../../../src/lib/logger';
import { MemoryCheckpointer } from '../../../src/graph';
import { buildCounterGraph, type CounterState } from '../../mocks/graphs';

function spyLogger() {
    const logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    } satisfies Logger;
    return logger;
}

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('createFilteredLogger', () => {
        it('should drop records below the level', () => {
            const base = spyLogger();
            const logger = createFilteredLogger(base, 'warn');

            logger.debug('d');
            logger.info('i');
            logger.warn('w', { a: 1 });
            logger.error('e');

            expect(base.debug).not.toHaveBeenCalled();
            expect(base.info).not.toHaveBeenCalled();
            expect(base.warn).toHaveBeenCalledWith('w', { a: 1 });
            expect(base.error).toHaveBeenCalledWith('e', undefined);
        });

        it('should drop everything when silent', () => {
            const base = spyLogger();
            const logger = createFilteredLogger(base, 'silent');

            logger.error('e');

            expect(base.error).not.toHaveBeenCalled();
        });
    });

    describe('withLogContext', () => {
        it('should merge bound context under per-call metadata', () => {
            const base = spyLogger();
            const logger = withLogContext(base, { threadId: 't1', step: 0 });

            logger.info('hello', { step: 3 });

            expect(base.info).toHaveBeenCalledWith('hello', { threadId: 't1', step: 3 });
        });
    });

    describe('isLogLevel', () => {
        it('should accept known levels only', () => {
            expect(isLogLevel('debug')).toBe(true);
            expect(isLogLevel('silent')).toBe(true);
            expect(isLogLevel('verbose')).toBe(false);
            expect(isLogLevel(3)).toBe(false);
        });
    });

    describe('built-in sinks', () => {
        it('should prefix console records with the level', () => {
            const info = vi.spyOn(console, 'info').mockImplementation(() => { });

            consoleLogger.info('Run completed', { step: 3 });
            consoleLogger.info('bare');

            expect(info).toHaveBeenNthCalledWith(1, '[Graph:INFO] Run completed', { step: 3 });
            expect(info).toHaveBeenNthCalledWith(2, '[Graph:INFO] bare', '');
        });

        it('should ignore everything in the noop logger', () => {
            expect(() => noopLogger.error('ignored')).not.toThrow();
        });
    });

    describe('engine logging', () => {
        it('should log completion with the thread bound', async () => {
            const logger = spyLogger();
            const app = buildCounterGraph().compile({ checkpointer: new MemoryCheckpointer<CounterState>(), logger });

            await app.invoke({ count: 0 }, { threadId: 't1' });

            expect(logger.info).toHaveBeenCalledWith('Run completed', { threadId: 't1', step: 3, executed: 4 });
            expect(logger.debug).not.toHaveBeenCalled();
        });

        it('should log each committed step at debug level', async () => {
            const logger = spyLogger();
            const app = buildCounterGraph().compile({
                checkpointer: new MemoryCheckpointer<CounterState>(),
                logger,
                logLevel: 'debug',
            });

            await app.invoke({ count: 0 }, { threadId: 't1' });

            const committed = logger.debug.mock.calls.filter(([message]) => message === 'Step committed');
            expect(committed).toHaveLength(4);
            expect(committed[0]).toEqual(['Step committed', { threadId: 't1', node: 'Node1', step: 0, next: ['Node2'] }]);
        });

        it('should warn when the recursion limit stops a run', async () => {
            const logger = spyLogger();
            const app = buildCounterGraph().compile({
                checkpointer: new MemoryCheckpointer<CounterState>(),
                logger,
                recursionLimit: 2,
            });

            await expect(app.invoke({ count: 0 }, { threadId: 't1' })).rejects.toThrow('Graph execution exceeded recursion limit: 2');

            expect(logger.warn).toHaveBeenCalledWith('Recursion limit reached', {
                threadId: 't1',
                limit: 2,
                step: 1,
                next: ['Node1'],
            });
        });
    });
});
