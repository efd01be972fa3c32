/**
 * Execution engine for compiled state graphs.
 *
 * Drives a thread from its current snapshot through nodes until no node is
 * pending, persisting one snapshot per node execution. Any failure leaves the
 * last written snapshot as the resume point.
 */

import {
    CheckpointNotFoundError,
    GraphAbortedError,
    StepLimitExceededError,
    UnknownBranchError,
    UnknownNodeError,
    toError,
} from '../lib/errors';
import type { Logger } from '../lib/logger';
import { withLogContext } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import { serializeContent } from '../lib/tracer';
import type { Checkpointer } from './checkpointer';
import { applyUpdate, initialValues, type StateSchema } from './reducers';
import { ThreadLock } from './thread-lock';
import type {
    CompiledGraph,
    End,
    GraphEdge,
    GraphNode,
    HistoryOptions,
    InterruptPoint,
    InvokeOptions,
    NodeContext,
    Snapshot,
    SnapshotSource,
    StreamEvent,
    ThreadConfig,
} from './types';
import { END } from './types';

export interface CompiledStateGraphParams<S> {
    nodes: ReadonlyMap<string, GraphNode<S>>;
    edges: readonly GraphEdge<S>[];
    entryPoint: string;
    channels: StateSchema<S>;
    checkpointer: Checkpointer<S>;
    recursionLimit: number;
    interruptBefore: ReadonlySet<string>;
    interruptAfter: ReadonlySet<string>;
    logger: Logger;
    tracer: Tracer;
}

interface ChildFields<S> {
    values: S;
    writes: Partial<S>;
    next: string[];
    source: SnapshotSource;
    node: string | null;
    interrupt: InterruptPoint | null;
}

interface NodeResult<S> {
    update: Partial<S>;
    values: S;
}

export function createCheckpointId(): string {
    return `ckpt_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 10)}`;
}

function unique(names: string[]): string[] {
    return [...new Set(names)];
}

export class CompiledStateGraph<S extends object> implements CompiledGraph<S> {
    private readonly params: CompiledStateGraphParams<S>;
    private readonly locks = new ThreadLock();

    constructor(params: CompiledStateGraphParams<S>) {
        this.params = params;
    }

    get checkpointer(): Checkpointer<S> {
        return this.params.checkpointer;
    }

    async invoke(input: S | null, config: ThreadConfig, options?: InvokeOptions): Promise<S> {
        const events = this.stream(input, config, options);

        for (; ;) {
            const result = await events.next();
            if (result.done) {
                return result.value;
            }
        }
    }

    async *stream(
        input: S | null,
        config: ThreadConfig,
        options: InvokeOptions = {},
    ): AsyncGenerator<StreamEvent<S>, S, undefined> {
        const release = await this.locks.acquire(config.threadId);
        try {
            return yield* this.run(input, config, options);
        } finally {
            release();
        }
    }

    async getState(config: ThreadConfig): Promise<Snapshot<S> | null> {
        if (config.checkpointId) {
            return this.checkpointer.loadSnapshot(config.threadId, config.checkpointId);
        }
        return this.checkpointer.loadLatest(config.threadId);
    }

    async getHistory(config: ThreadConfig, options?: HistoryOptions): Promise<Snapshot<S>[]> {
        return this.checkpointer.loadHistory(config.threadId, options);
    }

    /**
     * Record a manual edit. With `asNode`, pending nodes are resolved from that
     * node's edges as though it had just produced `patch`; without it, the
     * parent's pending nodes are kept and the graph does not advance.
     */
    async updateState(config: ThreadConfig, patch: Partial<S>, asNode?: string): Promise<Snapshot<S>> {
        if (asNode !== undefined && !this.params.nodes.has(asNode)) {
            throw new UnknownNodeError(asNode);
        }

        return this.locks.run(config.threadId, async () => {
            const parent = await this.load(config);
            if (!parent) {
                throw new CheckpointNotFoundError(config.threadId, null);
            }

            const values = applyUpdate(this.params.channels, parent.values, patch);
            const next = asNode !== undefined ? this.successors(asNode, values) : [...parent.next];
            const snapshot = this.child(parent, {
                values,
                writes: patch,
                next,
                source: 'update',
                node: asNode ?? null,
                interrupt: null,
            });

            await this.checkpointer.appendSnapshot(snapshot);
            this.params.logger.info('State updated', {
                threadId: config.threadId,
                step: snapshot.step,
                parentId: parent.checkpointId,
                asNode: asNode ?? null,
                next,
            });

            return snapshot;
        });
    }

    private async *run(
        input: S | null,
        config: ThreadConfig,
        options: InvokeOptions,
    ): AsyncGenerator<StreamEvent<S>, S, undefined> {
        const { threadId } = config;
        const { entryPoint, interruptBefore, interruptAfter, recursionLimit } = this.params;
        const log = withLogContext(this.params.logger, { threadId });
        const signal = options.signal ?? new AbortController().signal;

        let current = await this.load(config);
        const resuming = input === null;

        if (input !== null) {
            if (!current) {
                current = this.seed(threadId, input);
                await this.checkpointer.appendSnapshot(current);
                log.debug('Thread seeded', { checkpointId: current.checkpointId });
            } else {
                const values = applyUpdate(this.params.channels, current.values, input);
                current = this.child(current, {
                    values,
                    writes: input,
                    next: [entryPoint],
                    source: 'input',
                    node: null,
                    interrupt: this.pauseBefore([entryPoint]),
                });
                await this.checkpointer.appendSnapshot(current);
                log.debug('Input applied', { checkpointId: current.checkpointId, step: current.step });
            }
            yield { type: 'checkpoint', snapshot: current };
        } else if (!current) {
            throw new CheckpointNotFoundError(threadId, null);
        }

        if (current.next.length === 0) {
            log.debug('Thread already complete', { checkpointId: current.checkpointId });
            return current.values;
        }

        let executed = 0;

        while (current.next.length > 0) {
            const [node, ...rest] = current.next;

            // a resumed run passes the pause its starting snapshot recorded
            const acknowledged = resuming && executed === 0 && current.metadata.interrupt === 'before';
            if (interruptBefore.has(node) && !acknowledged) {
                if (current.metadata.interrupt !== 'before') {
                    current = this.child(current, {
                        values: current.values,
                        writes: {},
                        next: [...current.next],
                        source: 'interrupt',
                        node: null,
                        interrupt: 'before',
                    });
                    await this.checkpointer.appendSnapshot(current);
                }
                log.info('Interrupted before node', { node, step: current.step });
                yield { type: 'interrupt', node, when: 'before', snapshot: current };
                return current.values;
            }

            if (executed >= recursionLimit) {
                log.warn('Recursion limit reached', { limit: recursionLimit, step: current.step, next: current.next });
                throw new StepLimitExceededError(recursionLimit);
            }

            if (signal.aborted) {
                log.warn('Run aborted', { node, step: current.step + 1 });
                throw new GraphAbortedError(threadId);
            }

            const step = current.step + 1;
            const { update, values } = yield* this.executeNode(node, current.values, { threadId, step, signal }, log);
            const next = unique([...rest, ...this.successors(node, values)]);
            const stopAfter = interruptAfter.has(node) && next.length > 0;
            const snapshot = this.child(current, {
                values,
                writes: update,
                next,
                source: 'loop',
                node,
                interrupt: stopAfter ? 'after' : this.pauseBefore(next),
            });

            await this.checkpointer.appendSnapshot(snapshot);
            executed++;
            current = snapshot;

            log.debug('Step committed', { node, step, next });
            yield { type: 'step', node, snapshot };

            if (stopAfter) {
                log.info('Interrupted after node', { node, step });
                yield { type: 'interrupt', node, when: 'after', snapshot };
                return values;
            }
        }

        log.info('Run completed', { step: current.step, executed });
        return current.values;
    }

    /**
     * Run one node inside a span, relaying `emit` chunks as token events while
     * it is in flight. Resolves with the update merged into `values`; nothing
     * is persisted here.
     */
    private async *executeNode(
        name: string,
        values: S,
        run: { threadId: string; step: number; signal: AbortSignal },
        log: Logger,
    ): AsyncGenerator<StreamEvent<S>, NodeResult<S>, undefined> {
        const node = this.params.nodes.get(name);
        if (!node) {
            throw new UnknownNodeError(name);
        }

        const { tracer, channels } = this.params;
        const tracerConfig = tracer.getConfig();
        const chunks: string[] = [];
        let wake: (() => void) | null = null;
        let settled = false;

        const context: NodeContext = {
            node: name,
            threadId: run.threadId,
            step: run.step,
            signal: run.signal,
            emit: (chunk) => {
                chunks.push(chunk);
                wake?.();
            },
        };

        const execution = tracer.withSpan('graph.node', async (span): Promise<NodeResult<S>> => {
            span.setAttributes({ 'graph.thread_id': run.threadId, 'graph.node': name, 'graph.step': run.step });

            const update = await node.fn(values, context);
            if (tracerConfig.recordWrites) {
                span.addEvent('writes', { content: serializeContent(update, tracerConfig) });
            }

            const merged = applyUpdate(channels, values, update);
            if (tracerConfig.recordValues) {
                span.addEvent('values', { content: serializeContent(merged, tracerConfig) });
            }

            return { update, values: merged };
        });

        const onSettled = () => {
            settled = true;
            wake?.();
        };
        const finished = execution.then(onSettled, onSettled);

        const onAbort = () => wake?.();
        run.signal.addEventListener('abort', onAbort);

        try {
            while (!settled || chunks.length > 0) {
                const chunk = chunks.shift();
                if (chunk !== undefined) {
                    yield { type: 'token', node: name, step: run.step, chunk };
                    continue;
                }
                if (run.signal.aborted) break;

                await new Promise<void>((resolve) => {
                    wake = () => resolve();
                });
                wake = null;
            }
        } finally {
            run.signal.removeEventListener('abort', onAbort);
        }

        if (run.signal.aborted) {
            log.warn('Run aborted during node', { node: name, step: run.step });
            throw new GraphAbortedError(run.threadId);
        }

        await finished;
        try {
            return await execution;
        } catch (error) {
            log.error('Node failed', { node: name, step: run.step, error: toError(error).message });
            throw error;
        }
    }

    /**
     * 'before' when a run reaching `next` will stop in front of its first node.
     */
    private pauseBefore(next: readonly string[]): InterruptPoint | null {
        return next.length > 0 && this.params.interruptBefore.has(next[0]) ? 'before' : null;
    }

    /**
     * Destinations of `name`'s outgoing edges against `values`, END dropped.
     */
    private successors(name: string, values: S): string[] {
        const targets: string[] = [];

        for (const edge of this.params.edges) {
            if (edge.from !== name) continue;

            const target = this.resolveEdge(edge, values);
            if (target !== END && !targets.includes(target)) {
                targets.push(target);
            }
        }

        return targets;
    }

    private resolveEdge(edge: GraphEdge<S>, values: S): string | End {
        switch (edge.kind) {
            case 'fixed':
                return edge.to;
            case 'conditional': {
                const branch = edge.decide(values);
                const target = typeof branch === 'string' ? edge.mapping.get(branch) : undefined;
                if (target === undefined) {
                    throw new UnknownBranchError(edge.from, String(branch));
                }
                return target;
            }
            case 'router': {
                const target = edge.route(values);
                if (target !== END && !this.params.nodes.has(target)) {
                    throw new UnknownBranchError(edge.from, target);
                }
                return target;
            }
        }
    }

    private async load(config: ThreadConfig): Promise<Snapshot<S> | null> {
        if (!config.checkpointId) {
            return this.checkpointer.loadLatest(config.threadId);
        }

        const snapshot = await this.checkpointer.loadSnapshot(config.threadId, config.checkpointId);
        if (!snapshot) {
            throw new CheckpointNotFoundError(config.threadId, config.checkpointId);
        }
        return snapshot;
    }

    private seed(threadId: string, input: S): Snapshot<S> {
        return {
            threadId,
            checkpointId: createCheckpointId(),
            step: -1,
            values: { ...initialValues(this.params.channels), ...input },
            next: [this.params.entryPoint],
            writes: null,
            createdAt: Date.now(),
            parentId: null,
            parentStep: null,
            metadata: { source: 'input', node: null, interrupt: this.pauseBefore([this.params.entryPoint]) },
        };
    }

    private child(parent: Snapshot<S>, fields: ChildFields<S>): Snapshot<S> {
        return {
            threadId: parent.threadId,
            checkpointId: createCheckpointId(),
            step: parent.step + 1,
            values: fields.values,
            next: fields.next,
            writes: fields.writes,
            createdAt: Date.now(),
            parentId: parent.checkpointId,
            parentStep: parent.step,
            metadata: { source: fields.source, node: fields.node, interrupt: fields.interrupt },
        };
    }
}
