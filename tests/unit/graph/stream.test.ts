import { describe, it, expect, vi } from 'vitest';
import { StateGraph } from '../../../src/graph/state-graph';
import { MemoryCheckpointStore } from '../../../src/graph/checkpointer';
import { GraphInterrupt, interrupt } from '../../../src/graph/interrupt';
import type { GraphEvent } from '../../../src/graph/listeners';
import { ListenerRegistry } from '../../../src/graph/listeners';
import { ReducerSchema, appendReducer } from '../../../src/graph/schema';
import { END } from '../../../src/graph/types';
import { GraphAbortedError } from '../../../src/lib/errors';
import type { Logger } from '../../../src/lib/logger';
import { noopLogger } from '../../../src/lib/logger';

interface TrailState {
    trail: string[];
}

function trailSchema() {
    return new ReducerSchema<TrailState>().registerReducer('trail', appendReducer);
}

function buildChain(options: { logger?: Logger } = {}) {
    return new StateGraph<TrailState>(trailSchema())
        .addNode('a', () => ({ trail: ['a'] }))
        .addNode('b', () => ({ trail: ['b'] }))
        .addEdge('a', 'b')
        .addEdge('b', END)
        .setEntryPoint('a')
        .compile(options);
}

async function collect<S>(events: AsyncIterable<GraphEvent<S>>): Promise<{ events: GraphEvent<S>[]; error?: unknown }> {
    const seen: GraphEvent<S>[] = [];
    try {
        for await (const event of events) {
            seen.push(event);
        }
    } catch (error) {
        return { events: seen, error };
    }
    return { events: seen };
}

describe('CompiledStateGraph.stream', () => {
    it('should yield every event in order', async () => {
        const { events, error } = await collect(buildChain().stream({ trail: [] }));

        expect(error).toBeUndefined();
        expect(events.map(event => [event.type, event.node, event.step])).toEqual([
            ['chain_start', undefined, 0],
            ['node_start', 'a', 1],
            ['node_complete', 'a', 1],
            ['step', undefined, 1],
            ['node_start', 'b', 2],
            ['node_complete', 'b', 2],
            ['step', undefined, 2],
            ['chain_end', undefined, 2],
        ]);
        expect(events[2].update).toEqual({ trail: ['a'] });
        expect(events[3].state).toEqual({ trail: ['a'] });
        expect(events[7].state).toEqual({ trail: ['a', 'b'] });
    });

    it('should yield merged states in values mode', async () => {
        const { events } = await collect(buildChain().stream({ trail: [] }, undefined, { mode: 'values' }));

        expect(events.map(event => event.state)).toEqual([{ trail: ['a'] }, { trail: ['a', 'b'] }]);
    });

    it('should yield node updates in updates mode', async () => {
        const { events } = await collect(buildChain().stream({ trail: [] }, undefined, { mode: 'updates' }));

        expect(events.map(event => [event.node, event.update])).toEqual([
            ['a', { trail: ['a'] }],
            ['b', { trail: ['b'] }],
        ]);
    });

    it('should throw a node failure after the last event', async () => {
        const failure = new Error('boom');
        const graph = new StateGraph<TrailState>()
            .addNode('a', () => {
                throw failure;
            })
            .setEntryPoint('a')
            .compile();

        const { events, error } = await collect(graph.stream({ trail: [] }));

        expect(error).toBe(failure);
        expect(events.map(event => event.type)).toEqual(['chain_start', 'node_start', 'node_error', 'chain_end']);
        expect(events[2].error).toBe(failure);
        expect(events[3].error).toBe(failure);
    });

    it('should abort the run when the consumer stops reading', async () => {
        const graph = buildChain();
        const b = vi.fn(() => ({ trail: ['b'] }));
        const looping = new StateGraph<TrailState>(trailSchema())
            .addNode('a', () => ({ trail: ['a'] }))
            .addNode('b', b)
            .addEdge('a', 'b')
            .setEntryPoint('a')
            .compile();

        const ended = new Promise<GraphEvent<TrailState>>(resolve => {
            looping.addListener(event => {
                if (event.type === 'chain_end') resolve(event);
            });
        });

        for await (const event of looping.stream({ trail: [] }, undefined, { bufferSize: 0 })) {
            expect(event.type).toBe('chain_start');
            break;
        }

        const end = await ended;
        expect(end.error).toBeInstanceOf(GraphAbortedError);
        expect(b).not.toHaveBeenCalled();
        // An unrelated graph is unaffected
        await expect(graph.invoke({ trail: [] })).resolves.toEqual({ trail: ['a', 'b'] });
    });

    it('should end with the GraphInterrupt of a paused run', async () => {
        const store = new MemoryCheckpointStore<TrailState>();
        const graph = new StateGraph<TrailState>(trailSchema())
            .addNode('ask', (_state, context) => ({ trail: [String(interrupt(context, 'continue?'))] }))
            .addNode('done', () => ({ trail: ['done'] }))
            .addEdge('ask', 'done')
            .setEntryPoint('ask')
            .compile({ checkpointer: { store } });
        const config = { configurable: { thread_id: 'stream-thread' } };

        const paused = await collect(graph.stream({ trail: [] }, config));
        expect(paused.error).toBeInstanceOf(GraphInterrupt);
        expect(paused.events.map(event => event.type)).toEqual(['chain_start', 'node_start', 'chain_end']);

        const resumed = await collect(graph.streamResume(undefined, { ...config, resumeValue: 'yes' }, { mode: 'values' }));
        expect(resumed.error).toBeUndefined();
        expect(resumed.events.map(event => [event.step, event.state])).toEqual([
            [1, { trail: ['yes'] }],
            [2, { trail: ['yes', 'done'] }],
        ]);
    });
});

describe('listeners', () => {
    it('should observe every run until unregistered', async () => {
        const graph = buildChain();
        const types: string[] = [];
        const remove = graph.addListener(event => {
            types.push(event.type);
        });

        await graph.invoke({ trail: [] });
        remove();
        await graph.invoke({ trail: [] });

        expect(types).toEqual([
            'chain_start',
            'node_start',
            'node_complete',
            'step',
            'node_start',
            'node_complete',
            'step',
            'chain_end',
        ]);
    });

    it('should log a failing listener and keep running', async () => {
        const warn = vi.fn();
        const graph = buildChain({ logger: { ...noopLogger, warn } });
        const later = vi.fn();
        graph.addListener(event => {
            if (event.type === 'chain_start') throw new Error('listener broke');
        });
        graph.addListener(later);

        await expect(graph.invoke({ trail: [] })).resolves.toEqual({ trail: ['a', 'b'] });
        expect(warn).toHaveBeenCalledWith('Graph listener failed', {
            event: 'chain_start',
            node: undefined,
            error: 'listener broke',
        });
        expect(later).toHaveBeenCalledTimes(8);
    });

    it('should run registered listeners before scoped ones', async () => {
        const registry = new ListenerRegistry<TrailState>(noopLogger);
        const order: string[] = [];
        registry.add(async () => {
            await new Promise(resolve => setTimeout(resolve, 5));
            order.push('registered');
        });

        await registry.emit({ type: 'step', state: { trail: [] }, step: 1, timestamp: 0 }, [
            () => {
                order.push('scoped');
            },
        ]);

        expect(order).toEqual(['registered', 'scoped']);
        expect(registry.size).toBe(1);
    });
});
