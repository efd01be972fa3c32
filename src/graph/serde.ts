/**
 * JSON encoding for snapshots held by durable stores.
 * Decoding validates the envelope and the state against caller-supplied zod schemas.
 */

import { z } from 'zod';
import { SnapshotDecodeError } from '../lib/errors';
import type { Snapshot } from './types';

/** Schemas for the state type stored in a thread */
export interface SnapshotCodec<S> {
    values: z.ZodType<S>;
    /** Usually `values.partial()` */
    writes: z.ZodType<Partial<S>>;
}

const envelopeSchema = z.object({
    threadId: z.string(),
    checkpointId: z.string(),
    step: z.number().int().min(-1),
    values: z.unknown(),
    next: z.array(z.string()),
    writes: z.unknown(),
    createdAt: z.number(),
    parentId: z.string().nullable(),
    parentStep: z.number().int().nullable(),
    metadata: z.object({
        source: z.enum(['input', 'loop', 'update', 'interrupt']),
        node: z.string().nullable(),
        interrupt: z.enum(['before', 'after']).nullable().default(null),
    }),
});

export function encodeSnapshot<S>(snapshot: Snapshot<S>): string {
    return JSON.stringify(snapshot);
}

function describe(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

export function decodeSnapshot<S>(raw: string, codec: SnapshotCodec<S>, checkpointId: string): Snapshot<S> {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new SnapshotDecodeError(checkpointId, error instanceof Error ? error.message : String(error));
    }

    const envelope = envelopeSchema.safeParse(data);
    if (!envelope.success) {
        throw new SnapshotDecodeError(checkpointId, describe(envelope.error));
    }

    const values = codec.values.safeParse(envelope.data.values);
    if (!values.success) {
        throw new SnapshotDecodeError(checkpointId, `values: ${describe(values.error)}`);
    }

    let writes: Partial<S> | null = null;
    if (envelope.data.writes !== null && envelope.data.writes !== undefined) {
        const parsed = codec.writes.safeParse(envelope.data.writes);
        if (!parsed.success) {
            throw new SnapshotDecodeError(checkpointId, `writes: ${describe(parsed.error)}`);
        }
        writes = parsed.data;
    }

    const { threadId, step, next, createdAt, parentId, parentStep, metadata } = envelope.data;

    return {
        threadId,
        checkpointId: envelope.data.checkpointId,
        step,
        values: values.data,
        next,
        writes,
        createdAt,
        parentId,
        parentStep,
        metadata,
    };
}
