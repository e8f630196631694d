/**
 * weftgraph - directed computation graphs over shared state, with parallel
 * supersteps, checkpoints and human-in-the-loop interrupts.
 */

export * from './graph';

// Logging
export {
    consoleLogger,
    noopLogger,
    createFilteredLogger,
    describeError,
} from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Errors
export {
    GraphError,
    DuplicateNodeError,
    UnknownNodeError,
    InvalidNodeNameError,
    CompilationError,
    RecursionLimitExceededError,
    GraphAbortedError,
    InvalidConfigError,
    CheckpointNotFoundError,
    CheckpointCorruptedError,
    NodeTimeoutError,
    CircuitOpenError,
    RateLimitExceededError,
} from './lib/errors';
export type { ValidationErrorItem } from './lib/errors';

// Tracing
export {
    NoopTracer,
    LoggerTracer,
    setGlobalTracer,
    getGlobalTracer,
    redactContent,
    redactAttributes,
    describeState,
    DEFAULT_TRACER_CONFIG,
    DEBUG_TRACER_CONFIG,
} from './lib/tracer';
export type { Tracer, Span, TracerConfig, AttributeValue } from './lib/tracer';

// OpenTelemetry (bring an @opentelemetry/api tracer provider)
export { OTelTracer } from './lib/otel-tracer';
export type { OTelTracerProvider } from './lib/otel-tracer';

// Streaming
export { AsyncChannel } from './lib/channel';
