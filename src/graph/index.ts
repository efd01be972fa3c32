/**
 * Graph runtime public exports.
 */

export { StateGraph } from './state-graph';
export { CompiledStateGraph, createCheckpointId } from './compiled-graph';
export { END } from './types';
export type {
    End,
    NodeContext,
    NodeFunction,
    BranchDecider,
    EdgeRouter,
    GraphNode,
    GraphEdge,
    Snapshot,
    SnapshotSource,
    InterruptPoint,
    ThreadConfig,
    CompileOptions,
    InvokeOptions,
    HistoryOptions,
    StreamEvent,
    CompiledGraph,
    StateGraphConfig,
} from './types';

// Reducers
export { overwrite, accumulate, sum, append, applyUpdate, initialValues } from './reducers';
export type { Reducer, ReducerPolicy, ChannelSpec, StateSchema } from './reducers';

// Checkpointers
export { MemoryCheckpointer, cloneSnapshot } from './checkpointer';
export type { Checkpointer, LoadHistoryOptions } from './checkpointer';
export { encodeSnapshot, decodeSnapshot } from './serde';
export type { SnapshotCodec } from './serde';

// Redis Checkpointer (bring an ioredis-compatible client)
export { RedisCheckpointer } from './redis-checkpointer';
export type { RedisClient, RedisCheckpointerConfig } from './redis-checkpointer';

export { ThreadLock } from './thread-lock';
