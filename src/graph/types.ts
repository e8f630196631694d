/**
 * Graph runtime types.
 */

import type { Command } from './command';
import type { NodeContext } from './context';

/** Special end symbol */
export const END = Symbol('END');
export type End = typeof END;

/** Node name recorded on checkpoints taken before any node completed */
export const START = '__start__';

/** Dynamic state variant */
export type MapState = Record<string, unknown>;

/**
 * What a node may return: a partial update, a Command, or nothing.
 */
export type NodeUpdate<S> = Partial<S> | Command<S> | undefined | void;

/** Graph node function signature */
export type NodeFunction<S extends object> = (state: S, context: NodeContext<S>) => NodeUpdate<S> | Promise<NodeUpdate<S>>;

/** Conditional routes see the same context as the node they leave */
export type RouteContext<S extends object> = NodeContext<S>;

/** Edge destination resolver */
export type RouteFunction<S extends object> = (state: S, context: RouteContext<S>) => string | End | Promise<string | End>;

/** Graph node definition */
export interface GraphNode<S extends object> {
    name: string;
    description: string;
    fn: NodeFunction<S>;
}

export interface StaticEdge {
    kind: 'static';
    from: string;
    to: string | End;
}

export interface ConditionalEdge<S extends object> {
    kind: 'conditional';
    from: string;
    route: RouteFunction<S>;
    /** Possible destinations, used for reachability and drawing only */
    targets?: ReadonlyArray<string | End>;
}

/** Graph edge definition */
export type GraphEdge<S extends object> = StaticEdge | ConditionalEdge<S>;

/**
 * Nodes unreachable from the entry point. Reported by compile(), never fatal.
 */
export interface DeadNodeWarning {
    kind: 'dead_node';
    node: string;
    message: string;
}
