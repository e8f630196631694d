/**
 * Human-in-the-loop suspension.
 *
 * A node calls `interrupt(context, value)`. On the first pass this throws a
 * NodeInterrupt that the scheduler turns into a GraphInterrupt for the caller.
 * When the run is resumed with a `resumeValue`, the node executes again from its
 * start and the same `interrupt()` call returns that value instead.
 */

import type { NodeContext } from './context';

/**
 * Thrown inside a node to request suspension. Let it propagate.
 */
export class NodeInterrupt extends Error {
    constructor(
        public readonly value: unknown,
        public readonly node?: string,
    ) {
        super(node ? `Interrupt requested by node "${node}"` : 'Interrupt requested');
        this.name = 'NodeInterrupt';
    }
}

export interface InterruptInfo {
    node: string;
    value: unknown;
}

/**
 * Thrown out of invoke/resume/stream when execution pauses.
 * Not a GraphError: it is a pause signal, not a failure.
 */
export class GraphInterrupt<S = unknown> extends Error {
    /** First node (in frontier order) that requested the pause */
    readonly node: string;
    readonly interruptValue: unknown;
    /** State as checkpointed at the pause */
    readonly state: S;
    /** Nodes that run when the thread resumes */
    readonly next: string[];
    /** Every node that interrupted in the superstep, in frontier order */
    readonly interrupts: InterruptInfo[];
    readonly threadId?: string;
    readonly checkpointId?: string;

    constructor(init: {
        node: string;
        interruptValue?: unknown;
        state: S;
        next: string[];
        interrupts?: InterruptInfo[];
        threadId?: string;
        checkpointId?: string;
    }) {
        super(`Graph interrupted at node "${init.node}"`);
        this.name = 'GraphInterrupt';
        this.node = init.node;
        this.interruptValue = init.interruptValue;
        this.state = init.state;
        this.next = init.next;
        this.interrupts = init.interrupts ?? [];
        this.threadId = init.threadId;
        this.checkpointId = init.checkpointId;
    }
}

export function isGraphInterrupt(error: unknown): error is GraphInterrupt {
    return error instanceof GraphInterrupt;
}

/**
 * Find a NodeInterrupt in an error or its `cause` chain.
 */
export function findNodeInterrupt(error: unknown): NodeInterrupt | undefined {
    const seen = new Set<unknown>();
    let current: unknown = error;
    while (current instanceof Error && !seen.has(current)) {
        if (current instanceof NodeInterrupt) return current;
        seen.add(current);
        current = current.cause;
    }
    return undefined;
}

/**
 * Pause the graph and wait for a value from the caller.
 *
 * @returns the `resumeValue` of the invocation when one was supplied
 * @throws NodeInterrupt otherwise
 */
export function interrupt<S extends object>(context: NodeContext<S>, value: unknown): unknown {
    if (context.hasResumeValue()) {
        return context.getConfig().resumeValue;
    }
    throw new NodeInterrupt(value, context.node);
}
