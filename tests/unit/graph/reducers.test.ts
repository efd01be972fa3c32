import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
    accumulate,
    append,
    applyUpdate,
    initialValues,
    overwrite,
    sum,
} from '../../../src/graph';
import type { StateSchema } from '../../../src/graph';
import { ReducerTypeError } from '../../../src/lib/errors';

interface Ledger {
    balance: number;
    entries: string[];
    owner: string;
    note?: string;
}

const ledgerSchema: StateSchema<Ledger> = {
    balance: { reducer: sum(), default: () => 0 },
    entries: { reducer: append(z.string()), default: () => [] },
    owner: { reducer: overwrite() },
};

describe('Reducers', () => {
    describe('overwrite', () => {
        it('should replace the previous value', () => {
            const reducer = overwrite<string>();

            expect(reducer.policy).toBe('overwrite');
            expect(reducer.merge('owner', 'ada', 'grace')).toBe('grace');
        });
    });

    describe('accumulate', () => {
        it('should combine with identity when the field is absent', () => {
            expect(sum().merge('balance', undefined, 5)).toBe(5);
            expect(sum().merge('balance', 3, 4)).toBe(7);
        });

        it('should use a custom associative operation', () => {
            const max = accumulate(z.number(), (a, b) => Math.max(a, b), () => Number.NEGATIVE_INFINITY);

            expect(max.policy).toBe('accumulate');
            expect(max.merge('peak', undefined, -3)).toBe(-3);
            expect(max.merge('peak', 8, 2)).toBe(8);
        });

        it('should concatenate arrays', () => {
            expect(append(z.string()).merge('entries', ['a'], ['b', 'c'])).toEqual(['a', 'b', 'c']);
        });

        it('should reject operands outside the schema', () => {
            interface Loose { total: unknown }
            const schema: StateSchema<Loose> = { total: { reducer: sum() } };

            try {
                applyUpdate<Loose>(schema, { total: 1 }, { total: 'x' });
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(ReducerTypeError);
                expect(error).toMatchObject({ field: 'total', value: 'x' });
            }
        });

        it('should reject a corrupted current value', () => {
            interface Loose { total: unknown }
            const schema: StateSchema<Loose> = { total: { reducer: sum() } };

            expect(() => applyUpdate<Loose>(schema, { total: null }, { total: 1 }))
                .toThrow('Cannot accumulate field "total": Expected number, received null');
        });
    });

    describe('applyUpdate', () => {
        const base: Ledger = { balance: 10, entries: ['open'], owner: 'ada' };

        it('should merge each field through its reducer', () => {
            const next = applyUpdate(ledgerSchema, base, { balance: 5, entries: ['deposit'], owner: 'grace' });

            expect(next).toEqual({ balance: 15, entries: ['open', 'deposit'], owner: 'grace' });
        });

        it('should not mutate the previous state', () => {
            applyUpdate(ledgerSchema, base, { balance: 5, entries: ['deposit'] });

            expect(base).toEqual({ balance: 10, entries: ['open'], owner: 'ada' });
        });

        it('should keep fields the update leaves out and skip undefined keys', () => {
            const next = applyUpdate(ledgerSchema, base, { owner: undefined, note: 'audited' });

            expect(next).toEqual({ balance: 10, entries: ['open'], owner: 'ada', note: 'audited' });
        });

        it('should add N increments to exactly N', () => {
            let state: Ledger = { balance: 0, entries: [], owner: 'ada' };
            for (let i = 0; i < 7; i++) {
                state = applyUpdate(ledgerSchema, state, { balance: 1 });
            }

            expect(state.balance).toBe(7);
        });
    });

    describe('initialValues', () => {
        it('should build values from channel defaults', () => {
            expect(initialValues(ledgerSchema)).toEqual({ balance: 0, entries: [] });
        });

        it('should produce fresh containers for each thread', () => {
            const first = initialValues(ledgerSchema);
            const second = initialValues(ledgerSchema);

            expect(first.entries).not.toBe(second.entries);
        });
    });
});
