/**
 * StateGraph - graph builder.
 *
 * @example
 * ```typescript
 * const graph = new StateGraph<{ query: string; results: string[] }>(
 *     new ReducerSchema<{ query: string; results: string[] }>()
 *         .registerReducer('results', appendReducer),
 * )
 *     .addNode('search', searchNode)
 *     .addNode('rank', rankNode)
 *     .addEdge('search', 'rank')
 *     .addEdge('rank', END)
 *     .setEntryPoint('search')
 *     .compile();
 * ```
 */

import {
    CompilationError,
    DuplicateNodeError,
    InvalidNodeNameError,
    UnknownNodeError,
} from '../lib/errors';
import { noopLogger } from '../lib/logger';
import { CompiledStateGraph } from './compiled-graph';
import type { CompileOptions } from './config';
import { validateCompileOptions } from './config';
import type { StateSchema } from './schema';
import { overwriteSchema } from './schema';
import type {
    DeadNodeWarning,
    End,
    GraphEdge,
    GraphNode,
    MapState,
    NodeFunction,
    RouteFunction,
} from './types';
import { END, START } from './types';
import type { GraphStructure, MermaidOptions } from './visualization';
import { drawAscii, drawDot, drawMermaid } from './visualization';

function describeTarget(target: string | End): string {
    return target === END ? 'END' : `"${target}"`;
}

/**
 * Nodes the entry point cannot reach through static edges or declared
 * conditional targets.
 */
function findDeadNodes<S extends object>(
    nodes: ReadonlyMap<string, GraphNode<S>>,
    edges: ReadonlyArray<GraphEdge<S>>,
    entryPoint: string,
): DeadNodeWarning[] {
    const reachable = new Set<string>([entryPoint]);
    const queue = [entryPoint];

    while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        for (const edge of edges) {
            if (edge.from !== current) continue;
            const targets: ReadonlyArray<string | End> = edge.kind === 'static' ? [edge.to] : edge.targets ?? [];
            for (const target of targets) {
                if (target !== END && !reachable.has(target)) {
                    reachable.add(target);
                    queue.push(target);
                }
            }
        }
    }

    return [...nodes.keys()]
        .filter(name => !reachable.has(name))
        .map((name): DeadNodeWarning => ({
            kind: 'dead_node',
            node: name,
            message: `Node "${name}" is not reachable from entry point "${entryPoint}"`,
        }));
}

export class StateGraph<S extends object = MapState> {
    private readonly nodes = new Map<string, GraphNode<S>>();
    private readonly edges: GraphEdge<S>[] = [];
    private entryPoint: string | null = null;
    private schema: StateSchema<S>;

    constructor(schema?: StateSchema<S>) {
        this.schema = schema ?? overwriteSchema<S>();
    }

    /**
     * Add a node to the graph.
     */
    addNode(name: string, fn: NodeFunction<S>): this;
    addNode(name: string, description: string, fn: NodeFunction<S>): this;
    addNode(name: string, descriptionOrFn: string | NodeFunction<S>, maybeFn?: NodeFunction<S>): this {
        if (name.length === 0) {
            throw new InvalidNodeNameError(name, 'name must not be empty');
        }
        if (name === START) {
            throw new InvalidNodeNameError(name, 'name is reserved');
        }
        if (this.nodes.has(name)) {
            throw new DuplicateNodeError(name);
        }

        const fn = typeof descriptionOrFn === 'function' ? descriptionOrFn : maybeFn;
        if (!fn) {
            throw new TypeError(`Node "${name}" needs a function`);
        }
        const description = typeof descriptionOrFn === 'string' ? descriptionOrFn : '';

        this.nodes.set(name, { name, description, fn });
        return this;
    }

    /**
     * Add an edge between nodes. The target is checked by compile().
     */
    addEdge(from: string, to: string | End): this {
        this.requireNode(from, 'edge source');
        this.edges.push({ kind: 'static', from, to });
        return this;
    }

    /**
     * Add a conditional edge. `targets` lists the destinations the route can
     * return; it is only used for reachability checks and drawing.
     */
    addConditionalEdge(from: string, route: RouteFunction<S>, targets?: ReadonlyArray<string | End>): this {
        this.requireNode(from, 'conditional edge source');
        this.edges.push({
            kind: 'conditional',
            from,
            route,
            targets: targets ? [...targets] : undefined,
        });
        return this;
    }

    /**
     * Set the entry point. A second call replaces the first.
     */
    setEntryPoint(name: string): this {
        this.requireNode(name, 'entry point');
        this.entryPoint = name;
        return this;
    }

    /** Shorthand for `addEdge(name, END)` */
    setFinishPoint(name: string): this {
        return this.addEdge(name, END);
    }

    /** Replace the state schema (default: overwrite every key) */
    setSchema(schema: StateSchema<S>): this {
        this.schema = schema;
        return this;
    }

    /**
     * Validate the graph and freeze it into a runnable.
     *
     * @throws CompilationError - every problem found, not just the first
     * @throws InvalidConfigError - malformed options
     */
    compile(options?: CompileOptions<S>): CompiledStateGraph<S> {
        const validated = validateCompileOptions(options);
        const problems: string[] = [];

        if (this.entryPoint === null) {
            problems.push('No entry point set');
        }
        for (const edge of this.edges) {
            const targets: ReadonlyArray<string | End> = edge.kind === 'static' ? [edge.to] : edge.targets ?? [];
            for (const target of targets) {
                if (target !== END && !this.nodes.has(target)) {
                    const kind = edge.kind === 'static' ? 'Edge' : 'Conditional edge';
                    problems.push(`${kind} "${edge.from}" -> ${describeTarget(target)} targets an undeclared node`);
                }
            }
        }

        const entryPoint = this.entryPoint;
        if (entryPoint === null || problems.length > 0) {
            throw new CompilationError(problems);
        }

        const nodes = new Map(this.nodes);
        const edges = this.edges.map(edge => Object.freeze({ ...edge }));
        const warnings = findDeadNodes(nodes, edges, entryPoint);

        const logger = validated.logger ?? noopLogger;
        for (const warning of warnings) {
            logger.warn(warning.message, { node: warning.node });
        }

        return new CompiledStateGraph<S>({
            name: validated.name ?? 'StateGraph',
            nodes,
            edges: Object.freeze(edges),
            entryPoint,
            schema: this.schema,
            options: validated,
            warnings,
        });
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

    private structure(): GraphStructure<S> {
        return { nodes: [...this.nodes.keys()], edges: this.edges, entryPoint: this.entryPoint };
    }

    private requireNode(name: string, context: string): void {
        if (!this.nodes.has(name)) {
            throw new UnknownNodeError(name, context);
        }
    }
}
