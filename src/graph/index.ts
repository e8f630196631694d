/**
 * Graph runtime public exports.
 */

export { StateGraph } from './state-graph';
export { CompiledStateGraph } from './compiled-graph';
export type { CompiledGraphInit, StateSnapshot, StreamMode, StreamOptions } from './compiled-graph';
export { END, START } from './types';
export type {
    End,
    MapState,
    NodeUpdate,
    NodeFunction,
    RouteContext,
    RouteFunction,
    GraphNode,
    GraphEdge,
    StaticEdge,
    ConditionalEdge,
    DeadNodeWarning,
} from './types';
export { Command, isCommand } from './command';
export type { CommandInit, Goto } from './command';
export { NodeContext } from './context';
export type { NodeContextInit } from './context';

// Configuration
export {
    DEFAULT_RECURSION_LIMIT,
    DEFAULT_CHECKPOINT_OPTIONS,
    validateConfig,
    validateCompileOptions,
    getThreadIdFromConfig,
    getCheckpointIdFromConfig,
} from './config';
export type { RunnableConfig, CompileOptions, CheckpointOptions } from './config';

// State schema
export {
    ReducerSchema,
    overwriteSchema,
    canInit,
    overwriteReducer,
    appendReducer,
    appendValueReducer,
    sumReducer,
    mergeObjectReducer,
} from './schema';
export type { Reducer, StateSchema } from './schema';

// Interrupts
export {
    interrupt,
    NodeInterrupt,
    GraphInterrupt,
    isGraphInterrupt,
    findNodeInterrupt,
} from './interrupt';
export type { InterruptInfo } from './interrupt';

// Events
export { ListenerRegistry } from './listeners';
export type { GraphEvent, GraphEventType, GraphListener } from './listeners';

// Scheduler internals, for custom runners
export { executeGraph, successorsOf, normalizeFrontier } from './executor';
export type { GraphRuntime, RunPlan } from './executor';
export { executeParallel, cloneStateForBranch, isPlainData } from './parallel-executor';
export type { ParallelBranch, ParallelConfig, ParallelResult, BranchOutcome } from './parallel-executor';

// Checkpointing
export {
    MemoryCheckpointStore,
    isCheckpointStore,
    compareCheckpoints,
    latestCheckpoint,
    cloneCheckpoint,
} from './checkpointer';
export type { Checkpoint, CheckpointMetadata, CheckpointSource, CheckpointStore } from './checkpointer';
export {
    CheckpointManager,
    resolveCheckpointOptions,
    generateThreadId,
    generateCheckpointId,
} from './checkpoint-manager';
export type { CheckpointRecord, ResolvedCheckpointOptions } from './checkpoint-manager';
export {
    jsonSerializer,
    zodSerializer,
    encodeValue,
    decodeValue,
    encodeCheckpoint,
    decodeCheckpoint,
    parseCheckpoint,
} from './serializer';
export type { JsonValue, StateSerializer, PersistedCheckpoint } from './serializer';

// File Checkpointer
export { FileCheckpointStore } from './file-checkpointer';
export type { FileCheckpointStoreConfig } from './file-checkpointer';

// Redis Checkpointer (bring an ioredis client)
export { RedisCheckpointStore } from './redis-checkpointer';
export type { RedisClient, RedisCheckpointStoreConfig } from './redis-checkpointer';

// Postgres Checkpointer (bring a pg client)
export { PostgresCheckpointStore } from './postgres-checkpointer';
export type { PostgresClient, PostgresCheckpointStoreConfig } from './postgres-checkpointer';

// Node helpers
export {
    withRetry,
    withTimeout,
    withCircuitBreaker,
    withRateLimit,
    retryDelay,
    CircuitBreaker,
    RateLimiter,
} from './node-wrappers';
export type {
    BackoffStrategy,
    RetryOptions,
    CircuitState,
    CircuitBreakerOptions,
    RateLimitOptions,
} from './node-wrappers';
export { mapReduceNode } from './map-reduce';
export type { Mapper, MapReduceOptions } from './map-reduce';
export { subgraphNode, mapSubgraphNode } from './subgraph';
export type { SubgraphMapping } from './subgraph';

// Visualization
export { drawMermaid, drawDot, drawAscii } from './visualization';
export type { GraphStructure, MermaidOptions } from './visualization';
