/**
 * CompiledStateGraph - the runnable produced by StateGraph.compile().
 *
 * Immutable: the builder can keep changing after compile without affecting it.
 */

import { AsyncChannel } from '../lib/channel';
import {
    CheckpointNotFoundError,
    GraphError,
    InvalidConfigError,
    UnknownNodeError,
} from '../lib/errors';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import { getGlobalTracer } from '../lib/tracer';
import type { ResolvedCheckpointOptions } from './checkpoint-manager';
import { CheckpointManager, resolveCheckpointOptions } from './checkpoint-manager';
import type { Checkpoint, CheckpointMetadata, CheckpointStore } from './checkpointer';
import { latestCheckpoint } from './checkpointer';
import type { CheckpointOptions, CompileOptions, RunnableConfig } from './config';
import {
    DEFAULT_RECURSION_LIMIT,
    getCheckpointIdFromConfig,
    getThreadIdFromConfig,
    validateConfig,
} from './config';
import { NodeContext } from './context';
import type { GraphRuntime, RunPlan } from './executor';
import { executeGraph, normalizeFrontier, successorsOf } from './executor';
import type { GraphEvent, GraphListener } from './listeners';
import { ListenerRegistry } from './listeners';
import type { StateSchema } from './schema';
import { canInit } from './schema';
import type { DeadNodeWarning, GraphEdge, GraphNode } from './types';
import { START } from './types';
import type { GraphStructure, MermaidOptions } from './visualization';
import { drawAscii, drawDot, drawMermaid } from './visualization';

// ============================================================================
// Types
// ============================================================================

/**
 * - debug: every event
 * - values: the merged state after each superstep (`step` events)
 * - updates: what each node returned (`node_complete` events)
 */
export type StreamMode = 'debug' | 'values' | 'updates';

export interface StreamOptions {
    /** Events buffered before the run waits for the consumer (default: 16) */
    bufferSize?: number;
    /** Default: 'debug' */
    mode?: StreamMode;
}

/**
 * A checkpoint as seen by callers of getState() / getStateHistory().
 */
export interface StateSnapshot<S extends object> {
    values: S;
    /** Nodes that run when the thread resumes from this snapshot */
    next: string[];
    /** Addresses this snapshot; pass it to resume() or updateState() */
    config: RunnableConfig<S>;
    metadata: CheckpointMetadata;
    createdAt: Date;
    checkpointId: string;
    threadId: string;
    version: number;
    nodeName: string;
}

export interface CompiledGraphInit<S extends object> {
    name: string;
    nodes: ReadonlyMap<string, GraphNode<S>>;
    edges: ReadonlyArray<GraphEdge<S>>;
    entryPoint: string;
    schema: StateSchema<S>;
    options: CompileOptions<S>;
    warnings: DeadNodeWarning[];
}

type RunRequest<S> =
    | { kind: 'invoke'; input: S }
    | { kind: 'resume'; input?: Partial<S> };

type Prepared<S extends object> =
    | { kind: 'run'; plan: RunPlan<S> }
    /** Resumed from a finished thread: nothing left to run */
    | { kind: 'done'; state: S };

function acceptsEvent<S>(mode: StreamMode, event: GraphEvent<S>): boolean {
    switch (mode) {
        case 'debug':
            return true;
        case 'values':
            return event.type === 'step';
        case 'updates':
            return event.type === 'node_complete';
    }
}

function missingThreadError(): InvalidConfigError {
    return new InvalidConfigError('Invalid config: configurable.thread_id: Required', [
        { path: ['configurable', 'thread_id'], message: 'Required' },
    ]);
}

// ============================================================================
// CompiledStateGraph
// ============================================================================

export class CompiledStateGraph<S extends object> {
    readonly name: string;
    /** Nodes not reachable from the entry point */
    readonly warnings: ReadonlyArray<DeadNodeWarning>;
    private readonly nodes: ReadonlyMap<string, GraphNode<S>>;
    private readonly edges: ReadonlyArray<GraphEdge<S>>;
    private readonly entryPoint: string;
    private readonly schema: StateSchema<S>;
    private readonly recursionLimit: number;
    private readonly logger: Logger;
    private readonly tracer?: Tracer;
    private readonly checkpointDefaults?: CheckpointOptions<S>;
    private readonly listeners: ListenerRegistry<S>;

    constructor(init: CompiledGraphInit<S>) {
        this.name = init.name;
        this.nodes = init.nodes;
        this.edges = init.edges;
        this.entryPoint = init.entryPoint;
        this.schema = init.schema;
        this.warnings = Object.freeze([...init.warnings]);
        this.recursionLimit = init.options.recursionLimit ?? DEFAULT_RECURSION_LIMIT;
        this.logger = init.options.logger ?? noopLogger;
        this.tracer = init.options.tracer;
        this.checkpointDefaults = init.options.checkpointer;
        this.listeners = new ListenerRegistry<S>(this.logger);
    }

    /** Names of the declared nodes, in declaration order */
    get nodeNames(): string[] {
        return [...this.nodes.keys()];
    }

    /**
     * Observe every run of this graph. Returns a function that unregisters
     * the listener.
     */
    addListener(listener: GraphListener<S>): () => void {
        return this.listeners.add(listener);
    }

    /**
     * Run from the entry point (or `config.resumeFrom`) until the frontier
     * empties.
     *
     * Passing a `thread_id` makes the run checkpoint under that thread; it
     * never continues from an earlier checkpoint. Use resume() for that.
     *
     * @throws GraphInterrupt - execution paused
     * @throws whatever a node threw, unchanged
     */
    async invoke(input: S, config?: RunnableConfig<S>): Promise<S> {
        return this.execute({ kind: 'invoke', input }, config, new AbortController());
    }

    /**
     * Continue a thread from its latest checkpoint, or from
     * `configurable.checkpoint_id`. `input` is merged into the checkpointed
     * state through the schema before the run continues.
     *
     * @throws CheckpointNotFoundError
     */
    async resume(input: Partial<S> | undefined, config: RunnableConfig<S>): Promise<S> {
        return this.execute({ kind: 'resume', input }, config, new AbortController());
    }

    /**
     * Run the graph and yield its events as they happen.
     *
     * Leaving the loop early aborts the run. If the run fails (or pauses), the
     * generator throws that error after the last event.
     */
    async *stream(
        input: S,
        config?: RunnableConfig<S>,
        options: StreamOptions = {},
    ): AsyncGenerator<GraphEvent<S>, void, undefined> {
        yield* this.streamRun({ kind: 'invoke', input }, config, options);
    }

    /** stream() counterpart of resume() */
    async *streamResume(
        input: Partial<S> | undefined,
        config: RunnableConfig<S>,
        options: StreamOptions = {},
    ): AsyncGenerator<GraphEvent<S>, void, undefined> {
        yield* this.streamRun({ kind: 'resume', input }, config, options);
    }

    /**
     * Snapshot at `configurable.checkpoint_id`, or the latest of the thread.
     *
     * @throws CheckpointNotFoundError
     */
    async getState(config: RunnableConfig<S>): Promise<StateSnapshot<S>> {
        const validated = validateConfig(config);
        const { store } = this.requireCheckpointOptions(validated);
        return this.toSnapshot(await this.loadCheckpoint(store, validated));
    }

    /** Every snapshot of the thread, oldest first */
    async getStateHistory(config: RunnableConfig<S>): Promise<StateSnapshot<S>[]> {
        const validated = validateConfig(config);
        const { store } = this.requireCheckpointOptions(validated);
        const threadId = getThreadIdFromConfig(validated);
        if (threadId === undefined) throw missingThreadError();

        const checkpoints = await store.list(threadId);
        return checkpoints.map(checkpoint => this.toSnapshot(checkpoint));
    }

    /**
     * Write a new checkpoint with `values` merged through the schema, as if
     * `asNode` had returned them. The next resume continues from that node's
     * successors; without `asNode` the recorded frontier is kept.
     *
     * A thread without checkpoints starts from the schema's initial state.
     *
     * @returns config addressing the new checkpoint
     */
    async updateState(config: RunnableConfig<S>, values: Partial<S>, asNode?: string): Promise<RunnableConfig<S>> {
        const validated = validateConfig(config);
        const options = this.requireCheckpointOptions(validated);
        if (asNode !== undefined && !this.nodes.has(asNode)) {
            throw new UnknownNodeError(asNode, 'updateState');
        }

        const { threadId, checkpoint: base } = await this.locateCheckpoint(options.store, validated);
        let current: S;
        if (base) {
            current = base.state;
        } else if (canInit(this.schema)) {
            current = this.schema.init();
        } else {
            throw new CheckpointNotFoundError({ threadId });
        }

        const state = this.schema.update(current, values);
        const step = base?.metadata.step ?? 0;
        let next: string[];
        if (asNode !== undefined) {
            const context = new NodeContext<S>({
                node: asNode,
                step,
                config: validated,
                signal: new AbortController().signal,
                logger: this.logger,
                threadId,
            });
            const targets = await successorsOf(this.edges, asNode, state, context);
            next = normalizeFrontier(this.nodes, targets, asNode);
        } else {
            next = base ? [...base.metadata.next] : [];
        }

        const manager = new CheckpointManager(options, threadId, this.logger, validated.metadata);
        const saved = await manager.save({
            nodeName: asNode ?? base?.nodeName ?? START,
            state,
            source: 'update',
            step,
            next,
            completed: asNode !== undefined ? [asNode] : [],
        });

        return {
            ...config,
            configurable: { ...config.configurable, thread_id: threadId, checkpoint_id: saved.id },
        };
    }

    drawMermaid(options?: MermaidOptions): string {
        return drawMermaid(this.structure(), options);
    }

    drawDot(): string {
        return drawDot(this.structure());
    }

    drawAscii(): string {
        return drawAscii(this.structure());
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private structure(): GraphStructure<S> {
        return { nodes: this.nodeNames, edges: this.edges, entryPoint: this.entryPoint };
    }

    private runtime(): GraphRuntime<S> {
        return {
            name: this.name,
            nodes: this.nodes,
            edges: this.edges,
            entryPoint: this.entryPoint,
            schema: this.schema,
            recursionLimit: this.recursionLimit,
            logger: this.logger,
            tracer: this.tracer ?? getGlobalTracer(),
            listeners: this.listeners,
        };
    }

    private async execute(
        request: RunRequest<S>,
        rawConfig: RunnableConfig<S> | undefined,
        controller: AbortController,
        scopedListeners?: GraphListener<S>[],
    ): Promise<S> {
        const config = validateConfig(rawConfig);
        this.warnUnknownInterrupts(config);

        const parent = config.signal;
        const onParentAbort = () => controller.abort(parent?.reason);
        if (parent?.aborted) {
            onParentAbort();
        } else {
            parent?.addEventListener('abort', onParentAbort, { once: true });
        }

        try {
            const prepared = request.kind === 'invoke'
                ? this.prepareInvoke(request.input, config, controller.signal)
                : await this.prepareResume(request.input, config, controller.signal);
            if (prepared.kind === 'done') {
                return prepared.state;
            }
            return await executeGraph(this.runtime(), { ...prepared.plan, scopedListeners });
        } finally {
            parent?.removeEventListener('abort', onParentAbort);
        }
    }

    private async *streamRun(
        request: RunRequest<S>,
        config: RunnableConfig<S> | undefined,
        options: StreamOptions,
    ): AsyncGenerator<GraphEvent<S>, void, undefined> {
        const mode = options.mode ?? 'debug';
        const channel = new AsyncChannel<GraphEvent<S>>(options.bufferSize ?? 16);
        const controller = new AbortController();
        const forward: GraphListener<S> = async event => {
            if (acceptsEvent(mode, event)) {
                await channel.send(event);
            }
        };

        const outcome: { failed: boolean; error?: unknown } = { failed: false };
        const run = this.execute(request, config, controller, [forward])
            .then(
                () => undefined,
                (error: unknown) => {
                    outcome.failed = true;
                    outcome.error = error;
                },
            )
            .finally(() => channel.close());

        try {
            for await (const event of channel) {
                yield event;
            }
            await run;
            if (outcome.failed) {
                throw outcome.error;
            }
        } finally {
            if (!channel.isClosed) {
                // The consumer stopped early
                controller.abort(new Error('Stream consumer stopped reading'));
                channel.cancel();
            }
        }
    }

    private prepareInvoke(input: S, config: RunnableConfig<S>, signal: AbortSignal): Prepared<S> {
        const frontier = config.resumeFrom
            ? this.checkNodes(config.resumeFrom, 'resumeFrom')
            : [this.entryPoint];
        const options = resolveCheckpointOptions(this.checkpointDefaults, config.checkpoint);

        return {
            kind: 'run',
            plan: {
                state: input,
                frontier,
                config,
                manager: options ? CheckpointManager.forConfig(options, config, this.logger) : null,
                signal,
                resumed: config.resumeFrom !== undefined,
                baseStep: 0,
                lastNode: START,
            },
        };
    }

    private async prepareResume(
        input: Partial<S> | undefined,
        config: RunnableConfig<S>,
        signal: AbortSignal,
    ): Promise<Prepared<S>> {
        const options = this.requireCheckpointOptions(config);
        const checkpoint = await this.loadCheckpoint(options.store, config);
        const state = input ? this.schema.update(checkpoint.state, input) : checkpoint.state;
        const { metadata } = checkpoint;

        let frontier: string[];
        if (config.resumeFrom) {
            frontier = this.checkNodes(config.resumeFrom, 'resumeFrom');
        } else if (metadata.next.length > 0) {
            frontier = this.checkNodes(metadata.next, `checkpoint ${checkpoint.id}`);
        } else if (metadata.source === 'end') {
            this.logger.debug('Thread already finished', { threadId: checkpoint.threadId, checkpointId: checkpoint.id });
            return { kind: 'done', state };
        } else if (checkpoint.nodeName === START) {
            frontier = [this.entryPoint];
        } else {
            if (!this.nodes.has(checkpoint.nodeName)) {
                throw new UnknownNodeError(checkpoint.nodeName, `checkpoint ${checkpoint.id}`);
            }
            const context = new NodeContext<S>({
                node: checkpoint.nodeName,
                step: metadata.step,
                config,
                signal,
                logger: this.logger,
                threadId: checkpoint.threadId,
            });
            const targets = await successorsOf(this.edges, checkpoint.nodeName, state, context);
            frontier = normalizeFrontier(this.nodes, targets, checkpoint.nodeName);
        }

        this.logger.debug('Resuming thread', {
            threadId: checkpoint.threadId,
            checkpointId: checkpoint.id,
            frontier,
        });

        return {
            kind: 'run',
            plan: {
                state,
                frontier,
                config,
                manager: CheckpointManager.forConfig(options, config, this.logger, checkpoint.threadId),
                signal,
                resumed: true,
                baseStep: metadata.step,
                lastNode: checkpoint.nodeName,
            },
        };
    }

    private requireCheckpointOptions(config: RunnableConfig<S>): ResolvedCheckpointOptions<S> {
        const options = resolveCheckpointOptions(this.checkpointDefaults, config.checkpoint);
        if (!options) {
            throw new GraphError(`Graph "${this.name}" has no checkpoint store configured`);
        }
        return options;
    }

    private async locateCheckpoint(
        store: CheckpointStore<S>,
        config: RunnableConfig<S>,
    ): Promise<{ threadId: string; checkpoint: Checkpoint<S> | null }> {
        const threadId = getThreadIdFromConfig(config);
        const checkpointId = getCheckpointIdFromConfig(config);

        if (checkpointId !== undefined) {
            const checkpoint = await store.load(checkpointId);
            if (!checkpoint || (threadId !== undefined && checkpoint.threadId !== threadId)) {
                throw new CheckpointNotFoundError({ threadId, checkpointId });
            }
            return { threadId: checkpoint.threadId, checkpoint };
        }
        if (threadId === undefined) {
            throw missingThreadError();
        }
        return { threadId, checkpoint: latestCheckpoint(await store.list(threadId)) };
    }

    private async loadCheckpoint(store: CheckpointStore<S>, config: RunnableConfig<S>): Promise<Checkpoint<S>> {
        const { threadId, checkpoint } = await this.locateCheckpoint(store, config);
        if (!checkpoint) {
            throw new CheckpointNotFoundError({ threadId });
        }
        return checkpoint;
    }

    private checkNodes(names: ReadonlyArray<string>, source: string): string[] {
        const frontier: string[] = [];
        for (const name of names) {
            if (!this.nodes.has(name)) {
                throw new UnknownNodeError(name, source);
            }
            if (!frontier.includes(name)) frontier.push(name);
        }
        return frontier;
    }

    private warnUnknownInterrupts(config: RunnableConfig<S>): void {
        for (const [list, names] of [
            ['interruptBefore', config.interruptBefore],
            ['interruptAfter', config.interruptAfter],
        ] as const) {
            for (const name of names ?? []) {
                if (!this.nodes.has(name)) {
                    this.logger.warn('Interrupt names an unknown node', { list, node: name });
                }
            }
        }
    }

    private toSnapshot(checkpoint: Checkpoint<S>): StateSnapshot<S> {
        return {
            values: checkpoint.state,
            next: [...checkpoint.metadata.next],
            config: {
                configurable: { thread_id: checkpoint.threadId, checkpoint_id: checkpoint.id },
            },
            metadata: checkpoint.metadata,
            createdAt: new Date(checkpoint.timestamp),
            checkpointId: checkpoint.id,
            threadId: checkpoint.threadId,
            version: checkpoint.version,
            nodeName: checkpoint.nodeName,
        };
    }
}
