/**
 * StateGraph - graph builder for checkpointed, resumable workflows.
 */

import {
    DuplicateNodeError,
    GraphConfigError,
    GraphValidationError,
    UnknownNodeError,
} from '../lib/errors';
import { createFilteredLogger, isLogLevel, noopLogger } from '../lib/logger';
import { getGlobalTracer } from '../lib/tracer';
import { CompiledStateGraph } from './compiled-graph';
import type { StateSchema } from './reducers';
import type {
    BranchDecider,
    CompiledGraph,
    CompileOptions,
    EdgeRouter,
    End,
    GraphEdge,
    GraphNode,
    NodeFunction,
    StateGraphConfig,
} from './types';
import { END } from './types';

const DEFAULT_RECURSION_LIMIT = 100;

/**
 * StateGraph builder.
 *
 * @example
 * ```typescript
 * const graph = new StateGraph<{ count: number }>({ channels: { count: { reducer: sum() } } })
 *     .addNode('Node1', () => ({ count: 1 }))
 *     .addNode('Node2', () => ({ count: 1 }))
 *     .addEdge('Node1', 'Node2')
 *     .addConditionalEdges('Node2', (s) => (s.count < 3 ? 'loop' : 'done'), { loop: 'Node1', done: END })
 *     .setEntryPoint('Node1');
 *
 * const app = graph.compile({ checkpointer: new MemoryCheckpointer() });
 * await app.invoke({ count: 0 }, { threadId: '1' }); // { count: 4 }
 * ```
 */
export class StateGraph<S extends object> {
    private readonly nodes = new Map<string, GraphNode<S>>();
    private readonly edges: GraphEdge<S>[] = [];
    private readonly channels: StateSchema<S>;
    private entryPoint: string | null = null;

    constructor(config: StateGraphConfig<S> = {}) {
        this.channels = config.channels ?? {};
    }

    /**
     * Register a node. Collaborators the node needs should be bound into `fn`
     * by the caller (see `examples/`), not read from shared globals.
     */
    addNode(name: string, fn: NodeFunction<S>): this {
        if (!name.trim()) {
            throw new GraphValidationError(['Node name must be a non-empty string']);
        }
        if (this.nodes.has(name)) {
            throw new DuplicateNodeError(name);
        }

        this.nodes.set(name, { name, fn });
        return this;
    }

    addEdge(from: string, to: string | End): this {
        this.assertNode(from);
        if (to !== END) {
            this.assertNode(to);
        }

        this.edges.push({ kind: 'fixed', from, to });
        return this;
    }

    /**
     * Branch on a key from a closed set. The mapping must cover every key the
     * decider can return; a key missing at run time fails with UnknownBranchError.
     */
    addConditionalEdges<K extends string>(from: string, decide: BranchDecider<S, K>, mapping: Record<K, string | End>): this;
    /**
     * Route to whatever node `route` names. Checked at run time only.
     */
    addConditionalEdges(from: string, route: EdgeRouter<S>): this;
    addConditionalEdges(
        from: string,
        fn: (state: S) => string | End,
        mapping?: Record<string, string | End>,
    ): this {
        this.assertNode(from);

        if (!mapping) {
            this.edges.push({ kind: 'router', from, route: fn });
            return this;
        }

        const destinations = new Map<string, string | End>();
        for (const [key, to] of Object.entries(mapping)) {
            if (to !== END) {
                this.assertNode(to);
            }
            destinations.set(key, to);
        }

        this.edges.push({ kind: 'conditional', from, decide: fn, mapping: destinations });
        return this;
    }

    setEntryPoint(name: string): this {
        this.assertNode(name);
        this.entryPoint = name;
        return this;
    }

    /** Shorthand for `addEdge(name, END)` */
    setFinishPoint(name: string): this {
        return this.addEdge(name, END);
    }

    /**
     * Validate the graph and bind it to a checkpointer.
     */
    compile(options: CompileOptions<S>): CompiledGraph<S> {
        const entryPoint = this.entryPoint;
        const violations = entryPoint === null ? ['Graph has no entry point'] : this.findDeadEnds(entryPoint);
        if (entryPoint === null || violations.length > 0) {
            throw new GraphValidationError(violations);
        }

        const recursionLimit = options.recursionLimit ?? DEFAULT_RECURSION_LIMIT;
        if (!Number.isInteger(recursionLimit) || recursionLimit <= 0) {
            throw new GraphConfigError('recursionLimit', `recursionLimit must be a positive integer, got ${recursionLimit}`);
        }

        const logLevel = options.logLevel ?? 'info';
        if (!isLogLevel(logLevel)) {
            throw new GraphConfigError('logLevel', `Unknown log level: ${String(logLevel)}`);
        }

        for (const option of ['interruptBefore', 'interruptAfter'] as const) {
            for (const name of options[option] ?? []) {
                if (!this.nodes.has(name)) {
                    throw new GraphConfigError(option, `${option} names unknown node: ${name}`);
                }
            }
        }

        return new CompiledStateGraph<S>({
            nodes: new Map(this.nodes),
            edges: [...this.edges],
            entryPoint,
            channels: { ...this.channels },
            checkpointer: options.checkpointer,
            recursionLimit,
            interruptBefore: new Set(options.interruptBefore ?? []),
            interruptAfter: new Set(options.interruptAfter ?? []),
            logger: createFilteredLogger(options.logger ?? noopLogger, logLevel),
            tracer: options.tracer ?? getGlobalTracer(),
        });
    }

    /**
     * Every node reachable from the entry point that has no way out.
     */
    private findDeadEnds(entryPoint: string): string[] {
        const violations: string[] = [];
        const reachable = new Set<string>();
        const queue = [entryPoint];

        while (queue.length > 0) {
            const name = queue.shift();
            if (name === undefined || reachable.has(name)) continue;
            reachable.add(name);

            const outgoing = this.edges.filter(edge => edge.from === name);
            if (outgoing.length === 0) {
                violations.push(`Node "${name}" has no outgoing edge`);
            }

            for (const edge of outgoing) {
                switch (edge.kind) {
                    case 'fixed':
                        if (edge.to !== END) queue.push(edge.to);
                        break;
                    case 'conditional':
                        for (const to of edge.mapping.values()) {
                            if (to !== END) queue.push(to);
                        }
                        break;
                    case 'router':
                        // destinations unknown until run time
                        queue.push(...this.nodes.keys());
                        break;
                }
            }
        }

        return violations;
    }

    private assertNode(name: string): void {
        if (!this.nodes.has(name)) {
            throw new UnknownNodeError(name);
        }
    }
}
