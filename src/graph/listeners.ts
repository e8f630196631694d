/**
 * Listener bus. Observes execution, never steers it.
 */

import type { Logger } from '../lib/logger';
import { describeError } from '../lib/logger';

export type GraphEventType =
    | 'chain_start'
    | 'node_start'
    | 'node_complete'
    | 'node_error'
    | 'step'
    | 'chain_end';

export interface GraphEvent<S> {
    type: GraphEventType;
    /** Set on node events */
    node?: string;
    /**
     * node_start / node_complete / node_error: state the node ran with.
     * step / chain_end: merged state.
     */
    state: S;
    /** node_complete: what the node returned (a Command contributes its update) */
    update?: Partial<S>;
    /** node_error, or chain_end of a failed or interrupted run */
    error?: unknown;
    step: number;
    timestamp: number;
    /** node_complete / node_error / chain_end */
    durationMs?: number;
}

export type GraphListener<S> = (event: GraphEvent<S>) => void | Promise<void>;

/**
 * Listeners run one after another in registration order. A listener that
 * throws is logged and skipped.
 */
export class ListenerRegistry<S> {
    private readonly listeners: GraphListener<S>[] = [];

    constructor(private readonly logger: Logger) { }

    /** Register a listener; returns a function that unregisters it. */
    add(listener: GraphListener<S>): () => void {
        this.listeners.push(listener);
        return () => {
            const index = this.listeners.indexOf(listener);
            if (index !== -1) this.listeners.splice(index, 1);
        };
    }

    get size(): number {
        return this.listeners.length;
    }

    /**
     * Deliver an event to every registered listener, then to the run-scoped
     * ones (a stream's channel, for instance).
     */
    async emit(event: GraphEvent<S>, scoped: ReadonlyArray<GraphListener<S>> = []): Promise<void> {
        for (const listener of [...this.listeners, ...scoped]) {
            try {
                await listener(event);
            } catch (error) {
                this.logger.warn('Graph listener failed', {
                    event: event.type,
                    node: event.node,
                    error: describeError(error),
                });
            }
        }
    }
}
