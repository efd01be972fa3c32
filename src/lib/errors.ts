export class GraphError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GraphError';
    }
}

/**
 * Raised by `compile()` when the graph is malformed.
 * Carries every violation found, not only the first.
 */
export class GraphValidationError extends GraphError {
    readonly violations: string[];

    constructor(violations: string[]) {
        super(`Invalid graph:\n${violations.map(v => `  - ${v}`).join('\n')}`);
        this.name = 'GraphValidationError';
        this.violations = violations;
    }
}

/**
 * Raised when a compile option or store configuration is out of range.
 */
export class GraphConfigError extends GraphError {
    constructor(
        public readonly option: string,
        message: string,
    ) {
        super(message);
        this.name = 'GraphConfigError';
    }
}

export class DuplicateNodeError extends GraphError {
    nodeName: string;

    constructor(nodeName: string) {
        super(`Node already registered: ${nodeName}`);
        this.name = 'DuplicateNodeError';
        this.nodeName = nodeName;
    }
}

export class UnknownNodeError extends GraphError {
    nodeName: string;

    constructor(nodeName: string) {
        super(`Node not found: ${nodeName}`);
        this.name = 'UnknownNodeError';
        this.nodeName = nodeName;
    }
}

/**
 * A conditional edge produced a branch with no destination.
 */
export class UnknownBranchError extends GraphError {
    constructor(
        public readonly nodeName: string,
        public readonly branch: string,
    ) {
        super(`Conditional edge from "${nodeName}" returned unmapped branch: ${branch}`);
        this.name = 'UnknownBranchError';
    }
}

export class ReducerTypeError extends GraphError {
    constructor(
        public readonly field: string,
        public readonly value: unknown,
        detail: string,
    ) {
        super(`Cannot accumulate field "${field}": ${detail}`);
        this.name = 'ReducerTypeError';
    }
}

export class StepLimitExceededError extends GraphError {
    limit: number;

    constructor(limit: number) {
        super(`Graph execution exceeded recursion limit: ${limit}`);
        this.name = 'StepLimitExceededError';
        this.limit = limit;
    }
}

export class GraphAbortedError extends GraphError {
    constructor(public readonly threadId: string) {
        super(`Graph execution aborted on thread: ${threadId}`);
        this.name = 'GraphAbortedError';
    }
}

export class CheckpointNotFoundError extends GraphError {
    constructor(
        public readonly threadId: string,
        public readonly checkpointId: string | null,
    ) {
        super(checkpointId
            ? `Checkpoint ${checkpointId} not found on thread: ${threadId}`
            : `Thread has no checkpoints: ${threadId}`);
        this.name = 'CheckpointNotFoundError';
    }
}

/**
 * A durable store returned a record that does not decode to a snapshot.
 */
export class SnapshotDecodeError extends GraphError {
    constructor(
        public readonly checkpointId: string,
        message: string,
    ) {
        super(`Failed to decode checkpoint ${checkpointId}: ${message}`);
        this.name = 'SnapshotDecodeError';
    }
}

/**
 * Normalize anything thrown by a node body into an Error for logging and spans.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
