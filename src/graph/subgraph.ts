/**
 * Run a compiled graph as a single node of another graph.
 */

import type { CompiledStateGraph } from './compiled-graph';
import type { RunnableConfig } from './config';
import { NodeInterrupt, isGraphInterrupt } from './interrupt';
import type { NodeFunction, NodeUpdate } from './types';

export interface SubgraphMapping<P extends object, C extends object> {
    /** Parent state to the child's initial state */
    input: (state: P) => C;
    /** Child's final state to the parent's update */
    output: (result: C, state: P) => NodeUpdate<P>;
}

/**
 * Child graph over a different state type.
 *
 * The child receives the parent's signal, metadata and resume value. An
 * interrupt inside the child pauses the parent at this node; on resume the
 * whole child runs again from its entry point and its `interrupt()` call
 * returns the resume value.
 */
export function mapSubgraphNode<P extends object, C extends object>(
    graph: CompiledStateGraph<C>,
    mapping: SubgraphMapping<P, C>,
): NodeFunction<P> {
    return async (state, context) => {
        const parent = context.getConfig();
        const config: RunnableConfig<C> = {
            signal: context.signal,
            metadata: { ...parent.metadata, parent_node: context.node },
            resumeValue: parent.resumeValue,
            maxConcurrency: parent.maxConcurrency,
            tags: parent.tags,
        };

        try {
            const result = await graph.invoke(mapping.input(state), config);
            return mapping.output(result, state);
        } catch (error) {
            if (isGraphInterrupt(error)) {
                throw new NodeInterrupt(error.interruptValue, context.node);
            }
            throw error;
        }
    };
}

/**
 * Child graph sharing the parent's state type.
 *
 * By default the child starts from the parent's state and its final state is
 * returned as the update. With accumulating reducers on the parent, pass an
 * `output` that returns only what the child added.
 */
export function subgraphNode<S extends object>(
    graph: CompiledStateGraph<S>,
    options: Partial<SubgraphMapping<S, S>> = {},
): NodeFunction<S> {
    return mapSubgraphNode(graph, {
        input: options.input ?? (state => state),
        output: options.output ?? (result => result),
    });
}
