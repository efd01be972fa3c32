/**
 * Graph runtime types.
 */

import type { Logger, LogLevel } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { Checkpointer } from './checkpointer';
import type { StateSchema } from './reducers';

/** Special end symbol */
export const END = Symbol('END');
export type End = typeof END;

/** Passed to every node alongside the current state */
export interface NodeContext {
    /** Name of the running node */
    node: string;
    threadId: string;
    /** Step number the node's snapshot will carry */
    step: number;
    /** Aborted when the caller cancels the run */
    signal: AbortSignal;
    /** Publish a chunk of intermediate output (e.g. model tokens) to stream consumers */
    emit(chunk: string): void;
}

/** Graph node function signature */
export type NodeFunction<S> = (state: S, context: NodeContext) => Promise<Partial<S>> | Partial<S>;

/** Picks a branch key; the key is looked up in the edge's mapping */
export type BranchDecider<S, K extends string> = (state: S) => K;

/** Picks the destination node directly */
export type EdgeRouter<S> = (state: S) => string | End;

export interface GraphNode<S> {
    name: string;
    fn: NodeFunction<S>;
}

export type GraphEdge<S> =
    | { kind: 'fixed'; from: string; to: string | End }
    | { kind: 'conditional'; from: string; decide: (state: S) => string | End; mapping: ReadonlyMap<string, string | End> }
    | { kind: 'router'; from: string; route: EdgeRouter<S> };

/** Where a snapshot came from; 'interrupt' marks a pause taken on a snapshot that had not recorded one */
export type SnapshotSource = 'input' | 'loop' | 'update' | 'interrupt';

export type InterruptPoint = 'before' | 'after';

/**
 * Immutable record of the state at one step of a thread.
 */
export interface Snapshot<S> {
    threadId: string;
    checkpointId: string;
    /** -1 for the seed; each later snapshot is its parent's step + 1 */
    step: number;
    values: S;
    /** Pending nodes; empty when the thread is complete */
    next: string[];
    /** Update that produced this snapshot (null for the seed) */
    writes: Partial<S> | null;
    createdAt: number;
    parentId: string | null;
    parentStep: number | null;
    metadata: {
        source: SnapshotSource;
        /** Node the writes are attributed to */
        node: string | null;
        /**
         * Pause taken at this snapshot: 'before' the first pending node, or
         * 'after' the node that wrote it. A resumed run only passes an
         * `interruptBefore` node when its starting snapshot recorded 'before'.
         */
        interrupt: InterruptPoint | null;
    };
}

/** Addresses a thread, or one snapshot inside it */
export interface ThreadConfig {
    threadId: string;
    checkpointId?: string;
}

export interface CompileOptions<S> {
    checkpointer: Checkpointer<S>;
    /** Maximum node executions per invoke/stream call (default: 100) */
    recursionLimit?: number;
    /** Suspend before these nodes run */
    interruptBefore?: string[];
    /** Suspend after these nodes' snapshots are written */
    interruptAfter?: string[];
    /** Default: silent */
    logger?: Logger;
    /** Default: 'info' */
    logLevel?: LogLevel;
    /** Default: the global tracer */
    tracer?: Tracer;
}

export interface InvokeOptions {
    /** Cancels the run; the interrupted node writes no snapshot */
    signal?: AbortSignal;
}

export interface HistoryOptions {
    limit?: number;
}

export type StreamEvent<S> =
    | { type: 'checkpoint'; snapshot: Snapshot<S> }
    | { type: 'token'; node: string; step: number; chunk: string }
    | { type: 'step'; node: string; snapshot: Snapshot<S> }
    | { type: 'interrupt'; node: string; when: InterruptPoint; snapshot: Snapshot<S> };

/** Compiled graph */
export interface CompiledGraph<S> {
    /**
     * Run to completion or suspension. A state starts a new run (seeding the
     * thread if empty); `null` resumes the addressed or latest snapshot.
     */
    invoke(input: S | null, config: ThreadConfig, options?: InvokeOptions): Promise<S>;
    /** Same as invoke, yielding one event per snapshot and emitted chunk */
    stream(input: S | null, config: ThreadConfig, options?: InvokeOptions): AsyncGenerator<StreamEvent<S>, S, undefined>;
    getState(config: ThreadConfig): Promise<Snapshot<S> | null>;
    /** Newest first, across every branch of the thread */
    getHistory(config: ThreadConfig, options?: HistoryOptions): Promise<Snapshot<S>[]>;
    /** Write a manual patch as a new child snapshot */
    updateState(config: ThreadConfig, patch: Partial<S>, asNode?: string): Promise<Snapshot<S>>;
}

export interface StateGraphConfig<S> {
    /** Per-field reducers and defaults */
    channels?: StateSchema<S>;
}
