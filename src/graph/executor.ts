/**
 * Superstep scheduler.
 *
 * Each superstep runs the whole frontier concurrently against the same
 * pre-step state, merges the updates through the schema in frontier order and
 * derives the next frontier from Command.goto or the nodes' outgoing edges.
 */

import type { Logger } from '../lib/logger';
import {
    GraphAbortedError,
    RecursionLimitExceededError,
    UnknownNodeError,
} from '../lib/errors';
import type { Tracer } from '../lib/tracer';
import { describeState } from '../lib/tracer';
import type { CheckpointManager } from './checkpoint-manager';
import { isCommand } from './command';
import type { RunnableConfig } from './config';
import { getThreadIdFromConfig } from './config';
import { NodeContext } from './context';
import type { InterruptInfo } from './interrupt';
import { GraphInterrupt, findNodeInterrupt } from './interrupt';
import type { GraphEvent, GraphListener, ListenerRegistry } from './listeners';
import { cloneStateForBranch, executeParallel } from './parallel-executor';
import type { StateSchema } from './schema';
import type { End, GraphEdge, GraphNode, NodeUpdate } from './types';
import { END } from './types';

/**
 * Frozen view of a compiled graph that the scheduler runs against.
 */
export interface GraphRuntime<S extends object> {
    name: string;
    nodes: ReadonlyMap<string, GraphNode<S>>;
    edges: ReadonlyArray<GraphEdge<S>>;
    entryPoint: string;
    schema: StateSchema<S>;
    recursionLimit: number;
    logger: Logger;
    tracer: Tracer;
    listeners: ListenerRegistry<S>;
}

/**
 * Where and how one invocation starts.
 */
export interface RunPlan<S extends object> {
    state: S;
    frontier: string[];
    config: RunnableConfig<S>;
    manager: CheckpointManager<S> | null;
    /** Aborted by the caller's signal or by a stream consumer that stopped */
    signal: AbortSignal;
    /** Continue past interruptBefore on the first superstep */
    resumed: boolean;
    /** Step count of the snapshot the run continues from */
    baseStep: number;
    /** Node recorded on checkpoints until a node of this run completes */
    lastNode: string;
    /** Listeners that only see this run */
    scopedListeners?: ReadonlyArray<GraphListener<S>>;
}

interface NodeResult<S extends object> {
    node: string;
    update?: Partial<S>;
    goto?: Array<string | End>;
    context: NodeContext<S>;
}

function splitResult<S extends object>(result: NodeUpdate<S>): { update?: Partial<S>; goto?: Array<string | End> } {
    if (isCommand<S>(result)) {
        return { update: result.update, goto: result.gotoTargets() };
    }
    if (result) {
        return { update: result };
    }
    return {};
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Targets of a node's outgoing edges, in declaration order. Conditional routes
 * are evaluated against `state`.
 */
export async function successorsOf<S extends object>(
    edges: ReadonlyArray<GraphEdge<S>>,
    node: string,
    state: S,
    context: NodeContext<S>,
): Promise<Array<string | End>> {
    const targets: Array<string | End> = [];
    for (const edge of edges) {
        if (edge.from !== node) continue;
        if (edge.kind === 'static') {
            targets.push(edge.to);
        } else {
            targets.push(await edge.route(state, context));
        }
    }
    return targets;
}

/**
 * Drop END, reject unknown names and collapse duplicates, keeping first-seen order.
 */
export function normalizeFrontier<S extends object>(
    nodes: ReadonlyMap<string, GraphNode<S>>,
    targets: ReadonlyArray<string | End>,
    from: string,
    into: string[] = [],
): string[] {
    for (const target of targets) {
        if (target === END) continue;
        if (typeof target !== 'string' || !nodes.has(target)) {
            throw new UnknownNodeError(String(target), `routed from "${from}"`);
        }
        if (!into.includes(target)) into.push(target);
    }
    return into;
}

/**
 * Run a graph until its frontier empties.
 *
 * @throws GraphInterrupt - execution paused (static or dynamic interrupt)
 * @throws RecursionLimitExceededError
 * @throws GraphAbortedError
 * @throws whatever a node threw, unchanged
 */
export async function executeGraph<S extends object>(graph: GraphRuntime<S>, plan: RunPlan<S>): Promise<S> {
    const { config, manager, signal } = plan;
    const limit = config.recursionLimit ?? graph.recursionLimit;
    const interruptBefore = new Set(config.interruptBefore ?? []);
    const interruptAfter = new Set(config.interruptAfter ?? []);
    const threadId = manager?.threadId ?? getThreadIdFromConfig(config);
    const emit = (event: GraphEvent<S>) => graph.listeners.emit(event, plan.scopedListeners);

    const span = graph.tracer.startSpan('graph.invoke', {
        'graph.name': graph.name,
        'graph.recursion_limit': limit,
        ...(threadId ? { 'graph.thread_id': threadId } : {}),
        ...(config.tags?.length ? { 'graph.tags': config.tags.join(',') } : {}),
    });
    const startedAt = Date.now();

    let state = plan.state;
    let frontier = [...plan.frontier];
    let lastNode = plan.lastNode;
    let superstep = 0;
    let skipInterruptBefore = plan.resumed;

    await emit({ type: 'chain_start', state, step: plan.baseStep, timestamp: startedAt });

    try {
        while (frontier.length > 0) {
            if (signal.aborted) {
                throw new GraphAbortedError(signal.reason);
            }
            if (superstep >= limit) {
                throw new RecursionLimitExceededError(limit);
            }
            superstep++;
            const step = plan.baseStep + superstep;
            graph.logger.debug('Superstep started', { graph: graph.name, step, frontier });

            if (!skipInterruptBefore) {
                const halted = frontier.find(name => interruptBefore.has(name));
                if (halted !== undefined) {
                    const checkpoint = await manager?.save({
                        nodeName: lastNode,
                        state,
                        source: 'interrupt',
                        step: step - 1,
                        next: frontier,
                        completed: [],
                    });
                    throw new GraphInterrupt({
                        node: halted,
                        state,
                        next: [...frontier],
                        interrupts: [{ node: halted, value: undefined }],
                        threadId,
                        checkpointId: checkpoint?.id,
                    });
                }
            }
            skipInterruptBefore = false;

            const { results, interrupts } = await runSuperstep(graph, plan, state, frontier, step, threadId, emit);

            if (interrupts.length > 0) {
                // Nothing from this superstep is committed; the frontier reruns on resume
                const checkpoint = await manager?.save({
                    nodeName: lastNode,
                    state,
                    source: 'interrupt',
                    step: step - 1,
                    next: frontier,
                    completed: [],
                });
                throw new GraphInterrupt({
                    node: interrupts[0].node,
                    interruptValue: interrupts[0].value,
                    state,
                    next: [...frontier],
                    interrupts,
                    threadId,
                    checkpointId: checkpoint?.id,
                });
            }

            for (const result of results) {
                if (result.update) {
                    state = graph.schema.update(state, result.update);
                }
            }

            const next: string[] = [];
            for (const result of results) {
                const targets = result.goto ?? await successorsOf(graph.edges, result.node, state, result.context);
                normalizeFrontier(graph.nodes, targets, result.node, next);
            }

            const completed = results.map(result => result.node);
            lastNode = completed[completed.length - 1] ?? lastNode;
            await emit({ type: 'step', state, step, timestamp: Date.now() });

            if (next.length === 0) {
                if (manager?.autoSave) {
                    await manager.save({ nodeName: lastNode, state, source: 'end', step, next, completed });
                }
            } else {
                const pausedAfter = completed.find(name => interruptAfter.has(name));
                if (pausedAfter !== undefined) {
                    const checkpoint = await manager?.save({ nodeName: lastNode, state, source: 'interrupt', step, next, completed });
                    throw new GraphInterrupt({
                        node: pausedAfter,
                        state,
                        next,
                        interrupts: [{ node: pausedAfter, value: undefined }],
                        threadId,
                        checkpointId: checkpoint?.id,
                    });
                }
                await manager?.record({ nodeName: lastNode, state, source: 'step', step, next, completed });
            }

            frontier = next;
        }

        span.setAttribute('graph.steps', superstep);
        const recorded = describeState(state, graph.tracer.getConfig());
        if (recorded !== undefined) span.setAttribute('graph.output', recorded);

        await emit({
            type: 'chain_end',
            state,
            step: plan.baseStep + superstep,
            timestamp: Date.now(),
            durationMs: Date.now() - startedAt,
        });
        return state;
    } catch (error) {
        if (error instanceof GraphInterrupt) {
            span.addEvent('graph.interrupt', { node: error.node });
        } else {
            span.recordException(toError(error));
        }
        await emit({
            type: 'chain_end',
            state,
            error,
            step: plan.baseStep + superstep,
            timestamp: Date.now(),
            durationMs: Date.now() - startedAt,
        });
        throw error;
    } finally {
        span.end();
    }
}

async function runSuperstep<S extends object>(
    graph: GraphRuntime<S>,
    plan: RunPlan<S>,
    state: S,
    frontier: string[],
    step: number,
    threadId: string | undefined,
    emit: (event: GraphEvent<S>) => Promise<void>,
): Promise<{ results: NodeResult<S>[]; interrupts: InterruptInfo[] }> {
    const outcome = await executeParallel<NodeResult<S>>({
        branches: frontier.map(name => ({
            name,
            execute: signal => runNode(graph, plan, name, state, step, signal, threadId, emit),
        })),
        maxConcurrency: plan.config.maxConcurrency,
        signal: plan.signal,
        isFatal: error => findNodeInterrupt(error) === undefined,
    });

    // A real failure beats any interrupt raised beside it
    if (outcome.firstError) {
        throw outcome.firstError.error;
    }

    const results: NodeResult<S>[] = [];
    const interrupts: InterruptInfo[] = [];
    for (const branch of outcome.outcomes) {
        if (branch.status === 'fulfilled') {
            results.push(branch.value);
            continue;
        }
        const nodeInterrupt = findNodeInterrupt(branch.reason);
        if (!nodeInterrupt) throw branch.reason;
        interrupts.push({ node: branch.name, value: nodeInterrupt.value });
    }

    return { results, interrupts };
}

async function runNode<S extends object>(
    graph: GraphRuntime<S>,
    plan: RunPlan<S>,
    name: string,
    state: S,
    step: number,
    signal: AbortSignal,
    threadId: string | undefined,
    emit: (event: GraphEvent<S>) => Promise<void>,
): Promise<NodeResult<S>> {
    const node = graph.nodes.get(name);
    if (!node) {
        throw new UnknownNodeError(name, 'frontier');
    }

    const context = new NodeContext<S>({
        node: name,
        step,
        config: plan.config,
        signal,
        logger: graph.logger,
        threadId,
    });

    const span = graph.tracer.startSpan('graph.node', {
        'graph.name': graph.name,
        'node.name': name,
        'graph.step': step,
    });
    const startedAt = Date.now();
    await emit({ type: 'node_start', node: name, state, step, timestamp: startedAt });

    try {
        const { update, goto } = splitResult(await node.fn(cloneStateForBranch(state), context));

        const recorded = describeState(update, graph.tracer.getConfig());
        if (recorded !== undefined) span.setAttribute('node.update', recorded);

        await emit({
            type: 'node_complete',
            node: name,
            state,
            update,
            step,
            timestamp: Date.now(),
            durationMs: Date.now() - startedAt,
        });
        return { node: name, update, goto, context };
    } catch (error) {
        const nodeInterrupt = findNodeInterrupt(error);
        if (nodeInterrupt) {
            span.addEvent('node.interrupt');
        } else {
            span.recordException(toError(error));
            await emit({
                type: 'node_error',
                node: name,
                state,
                error,
                step,
                timestamp: Date.now(),
                durationMs: Date.now() - startedAt,
            });
        }
        throw error;
    } finally {
        span.end();
    }
}
