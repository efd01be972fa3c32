// Graph runtime
export * from './graph';

// Error types
export {
    GraphError,
    GraphValidationError,
    GraphConfigError,
    DuplicateNodeError,
    UnknownNodeError,
    UnknownBranchError,
    ReducerTypeError,
    StepLimitExceededError,
    GraphAbortedError,
    CheckpointNotFoundError,
    SnapshotDecodeError,
} from './lib/errors';

// Logging
export { consoleLogger, noopLogger, createFilteredLogger, withLogContext } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Tracing
export {
    NoopTracer,
    ConsoleTracer,
    DEFAULT_TRACER_CONFIG,
    PRODUCTION_TRACER_CONFIG,
    setGlobalTracer,
    getGlobalTracer,
    redactContent,
    serializeContent,
    UNSERIALIZABLE_CONTENT,
    redactAttributes,
} from './lib/tracer';
export type { Span, SpanAttributes, Tracer, TracerConfig } from './lib/tracer';
export { OTelTracer } from './lib/otel-tracer';
export type { IOTelTracerProvider } from './lib/otel-tracer';
