/**
 * Reducer registry: how a node's partial update combines with prior state.
 */

import { z } from 'zod';
import { ReducerTypeError } from '../lib/errors';

export type ReducerPolicy = 'overwrite' | 'accumulate';

export interface Reducer<V> {
    readonly policy: ReducerPolicy;
    /** `current` is undefined when the field is not yet in the state */
    merge(field: string, current: V | undefined, update: V): V;
}

export interface ChannelSpec<V> {
    reducer?: Reducer<V>;
    /** Value the field starts with in a new thread */
    default?: () => V;
}

export type StateSchema<S> = { [K in keyof S]?: ChannelSpec<S[K]> };

/** New value replaces old. */
export function overwrite<V>(): Reducer<V> {
    return {
        policy: 'overwrite',
        merge: (_field, _current, update) => update,
    };
}

/**
 * Combine old and new with an associative operation.
 * Operands are checked against `schema` before combining.
 */
export function accumulate<V>(
    schema: z.ZodType<V>,
    combine: (current: V, update: V) => V,
    identity: () => V,
): Reducer<V> {
    const check = (field: string, value: unknown): V => {
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new ReducerTypeError(field, value, issue ? issue.message : 'invalid value');
        }
        return parsed.data;
    };

    return {
        policy: 'accumulate',
        merge: (field, current, update) => {
            const base = current === undefined ? identity() : check(field, current);
            return combine(base, check(field, update));
        },
    };
}

/** Numeric addition, identity 0 */
export function sum(): Reducer<number> {
    return accumulate(z.number(), (a, b) => a + b, () => 0);
}

/** Array concatenation, identity [] */
export function append<T>(item: z.ZodType<T> = z.any()): Reducer<T[]> {
    return accumulate(z.array(item), (a, b) => [...a, ...b], () => []);
}

/**
 * Merge a partial update into state. Returns a new object; `values` is untouched.
 * Fields without a declared channel overwrite; keys set to undefined are ignored.
 */
export function applyUpdate<S extends object>(schema: StateSchema<S>, values: S, update: Partial<S>): S {
    const next: S = { ...values };

    for (const key in update) {
        const incoming = update[key];
        if (incoming === undefined) continue;

        const reducer = schema[key]?.reducer;
        next[key] = reducer ? reducer.merge(key, values[key], incoming) : incoming;
    }

    return next;
}

/**
 * Seed values from channel defaults.
 */
export function initialValues<S extends object>(schema: StateSchema<S>): Partial<S> {
    const values: Partial<S> = {};

    for (const key in schema) {
        const factory = schema[key]?.default;
        if (factory) {
            values[key] = factory();
        }
    }

    return values;
}
