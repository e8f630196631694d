/**
 * Map-reduce inside a single node: run several mappers over the node's state
 * concurrently, then fold their results into one update.
 *
 * @example
 * ```typescript
 * graph.addNode('score', mapReduceNode<DocState, number>({
 *     mappers: {
 *         chars: state => state.text.length,
 *         words: state => state.text.split(/\s+/).length,
 *     },
 *     reduce: results => ({ score: results.chars + results.words }),
 * }));
 * ```
 */

import type { NodeContext } from './context';
import { findNodeInterrupt } from './interrupt';
import { cloneStateForBranch, executeParallel } from './parallel-executor';
import type { NodeFunction, NodeUpdate } from './types';

export type Mapper<S extends object, R> = (state: S, context: NodeContext<S>) => R | Promise<R>;

export interface MapReduceOptions<S extends object, R> {
    mappers: Record<string, Mapper<S, R>>;
    /** Receives every mapper's result keyed by mapper name, in declaration order */
    reduce: (results: Record<string, R>, state: S) => NodeUpdate<S> | Promise<NodeUpdate<S>>;
    /** Mappers running at once (default: unlimited) */
    maxConcurrency?: number;
}

/**
 * Build a node that fans out to `mappers` and reduces their results.
 *
 * Each mapper gets its own copy of the state and a signal that aborts when a
 * sibling fails. The first failure is rethrown unchanged; an interrupt from a
 * mapper pauses the whole node.
 */
export function mapReduceNode<S extends object, R>(options: MapReduceOptions<S, R>): NodeFunction<S> {
    const names = Object.keys(options.mappers);
    if (names.length === 0) {
        throw new RangeError('mapReduceNode needs at least one mapper');
    }

    return async (state, context) => {
        const { outcomes, firstError } = await executeParallel<R>({
            branches: names.map(name => ({
                name,
                execute: async signal => options.mappers[name](cloneStateForBranch(state), context.withSignal(signal)),
            })),
            maxConcurrency: options.maxConcurrency,
            signal: context.signal,
            isFatal: error => findNodeInterrupt(error) === undefined,
        });

        if (firstError) throw firstError.error;

        const results: Record<string, R> = {};
        for (const outcome of outcomes) {
            if (outcome.status === 'rejected') throw outcome.reason;
            results[outcome.name] = outcome.value;
        }
        return options.reduce(results, state);
    };
}
