import type { Logger } from '../lib/logger';
import type { RunnableConfig } from './config';
import { getThreadIdFromConfig } from './config';
import type { MapState } from './types';

export interface NodeContextInit<S extends object> {
    node: string;
    step: number;
    config: RunnableConfig<S>;
    signal: AbortSignal;
    logger: Logger;
    /** Thread the run checkpoints under, when it has one */
    threadId?: string;
}

/**
 * Execution context handed to every node function and conditional route.
 */
export class NodeContext<S extends object = MapState> {
    readonly node: string;
    /** Superstep the node runs in (1-based, counted across the thread) */
    readonly step: number;
    /** Aborted when the run is cancelled or a sibling node fails */
    readonly signal: AbortSignal;
    readonly logger: Logger;
    private readonly config: RunnableConfig<S>;
    private readonly threadId?: string;

    constructor(init: NodeContextInit<S>) {
        this.node = init.node;
        this.step = init.step;
        this.signal = init.signal;
        this.logger = init.logger;
        this.config = init.config;
        this.threadId = init.threadId;
    }

    getConfig(): Readonly<RunnableConfig<S>> {
        return this.config;
    }

    getThreadId(): string | undefined {
        return this.threadId ?? getThreadIdFromConfig(this.config);
    }

    getConfigurable(key: string): unknown {
        return this.config.configurable?.[key];
    }

    getMetadata(key: string): unknown {
        return this.config.metadata?.[key];
    }

    /** Whether this run was started with a value for `interrupt()` to return */
    hasResumeValue(): boolean {
        return this.config.resumeValue !== undefined;
    }

    /** Same context, observing a different signal */
    withSignal(signal: AbortSignal): NodeContext<S> {
        return new NodeContext<S>({
            node: this.node,
            step: this.step,
            config: this.config,
            signal,
            logger: this.logger,
            threadId: this.threadId,
        });
    }

    /** Throw the abort reason if the run was cancelled */
    throwIfAborted(): void {
        this.signal.throwIfAborted();
    }
}
