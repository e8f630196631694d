import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StateGraph } from '../../../src/graph/state-graph';
import { MemoryCheckpointStore } from '../../../src/graph/checkpointer';
import {
    GraphInterrupt,
    NodeInterrupt,
    findNodeInterrupt,
    interrupt,
    isGraphInterrupt,
} from '../../../src/graph/interrupt';
import { ReducerSchema, appendReducer } from '../../../src/graph/schema';
import { END, START } from '../../../src/graph/types';
import { CheckpointNotFoundError, GraphError } from '../../../src/lib/errors';

interface ApprovalState {
    request: string;
    answer?: string;
    log: string[];
}

function approvalSchema() {
    return new ReducerSchema<ApprovalState>().registerReducer('log', appendReducer);
}

async function captureInterrupt(run: Promise<unknown>): Promise<GraphInterrupt> {
    try {
        await run;
    } catch (error) {
        if (error instanceof GraphInterrupt) return error;
        throw error;
    }
    throw new Error('expected the run to pause');
}

describe('interrupt helpers', () => {
    it('should find a NodeInterrupt through the cause chain', () => {
        const inner = new NodeInterrupt('value', 'node');
        const wrapped = new Error('outer', { cause: new Error('middle', { cause: inner }) });

        expect(findNodeInterrupt(wrapped)).toBe(inner);
        expect(findNodeInterrupt(new Error('plain'))).toBeUndefined();
        expect(findNodeInterrupt('not an error')).toBeUndefined();
    });

    it('should not treat GraphInterrupt as a GraphError', () => {
        const error = new GraphInterrupt({ node: 'a', state: {}, next: ['a'] });

        expect(isGraphInterrupt(error)).toBe(true);
        expect(error).not.toBeInstanceOf(GraphError);
        expect(error.message).toBe('Graph interrupted at node "a"');
        expect(error.interrupts).toEqual([]);
    });
});

describe('interrupt / resume', () => {
    let store: MemoryCheckpointStore<ApprovalState>;
    let askCalls: number;
    let confirmCalls: number;

    function buildApprovalGraph() {
        return new StateGraph<ApprovalState>(approvalSchema())
            .addNode('ask', (state, context) => {
                askCalls++;
                const answer = interrupt(context, `approve ${state.request}?`);
                return { answer: String(answer), log: ['ask'] };
            })
            .addNode('confirm', () => {
                confirmCalls++;
                return { log: ['confirm'] };
            })
            .addEdge('ask', 'confirm')
            .addEdge('confirm', END)
            .setEntryPoint('ask')
            .compile({ checkpointer: { store } });
    }

    beforeEach(() => {
        store = new MemoryCheckpointStore<ApprovalState>();
        askCalls = 0;
        confirmCalls = 0;
    });

    it('should pause, checkpoint and resume with a value', async () => {
        const graph = buildApprovalGraph();
        const config = { configurable: { thread_id: 'thread-1' } };

        const paused = await captureInterrupt(graph.invoke({ request: 'deploy', log: [] }, config));

        expect(paused.node).toBe('ask');
        expect(paused.interruptValue).toBe('approve deploy?');
        expect(paused.next).toEqual(['ask']);
        expect(paused.threadId).toBe('thread-1');
        expect(paused.interrupts).toEqual([{ node: 'ask', value: 'approve deploy?' }]);
        expect(paused.state).toEqual({ request: 'deploy', log: [] });

        const pausedSnapshot = await graph.getState(config);
        expect(pausedSnapshot.checkpointId).toBe(paused.checkpointId);
        expect(pausedSnapshot.nodeName).toBe(START);
        expect(pausedSnapshot.metadata).toEqual({ source: 'interrupt', step: 0, next: ['ask'], completed: [] });

        const result = await graph.resume(undefined, { ...config, resumeValue: 'yes' });

        expect(result).toEqual({ request: 'deploy', answer: 'yes', log: ['ask', 'confirm'] });
        // The interrupted node runs again from its start
        expect(askCalls).toBe(2);
        expect(confirmCalls).toBe(1);
    });

    it('should record the whole thread history', async () => {
        const graph = buildApprovalGraph();
        const config = { configurable: { thread_id: 'thread-2' } };

        await captureInterrupt(graph.invoke({ request: 'deploy', log: [] }, config));
        await graph.resume(undefined, { ...config, resumeValue: 'ok' });

        const history = await graph.getStateHistory(config);
        expect(history.map(snapshot => [snapshot.metadata.source, snapshot.metadata.step, snapshot.next, snapshot.version]))
            .toEqual([
                ['interrupt', 0, ['ask'], 1],
                ['step', 1, ['confirm'], 2],
                ['end', 2, [], 3],
            ]);

        const latest = await graph.getState(config);
        expect(latest.values).toEqual({ request: 'deploy', answer: 'ok', log: ['ask', 'confirm'] });
        expect(latest.nodeName).toBe('confirm');
        expect(latest.config).toEqual({
            configurable: { thread_id: 'thread-2', checkpoint_id: latest.checkpointId },
        });
        expect(latest.createdAt).toBeInstanceOf(Date);
    });

    it('should do nothing when resuming a finished thread', async () => {
        const graph = buildApprovalGraph();
        const config = { configurable: { thread_id: 'thread-3' } };

        await captureInterrupt(graph.invoke({ request: 'deploy', log: [] }, config));
        const first = await graph.resume(undefined, { ...config, resumeValue: 'ok' });
        const again = await graph.resume(undefined, config);

        expect(again).toEqual(first);
        expect(askCalls).toBe(2);
        expect(confirmCalls).toBe(1);
    });

    it('should merge resume input through the schema', async () => {
        const graph = buildApprovalGraph();
        const config = { configurable: { thread_id: 'thread-4' } };

        await captureInterrupt(graph.invoke({ request: 'deploy', log: [] }, config));
        const result = await graph.resume({ request: 'rollback', log: ['edited'] }, { ...config, resumeValue: 'no' });

        expect(result).toEqual({ request: 'rollback', answer: 'no', log: ['edited', 'ask', 'confirm'] });
    });

    it('should resume from an explicit checkpoint id', async () => {
        const graph = buildApprovalGraph();
        const config = { configurable: { thread_id: 'thread-5' } };

        const paused = await captureInterrupt(graph.invoke({ request: 'deploy', log: [] }, config));
        await graph.resume(undefined, { ...config, resumeValue: 'first' });

        // Branch off the paused checkpoint again with a different answer
        const result = await graph.resume(undefined, {
            configurable: { checkpoint_id: paused.checkpointId },
            resumeValue: 'second',
        });

        expect(result.answer).toBe('second');
    });

    it('should give the same result each time the same checkpoint is resumed', async () => {
        const graph = buildApprovalGraph();
        const config = { configurable: { thread_id: 'thread-5b' } };

        const paused = await captureInterrupt(graph.invoke({ request: 'deploy', log: [] }, config));
        const fromPause = { configurable: { checkpoint_id: paused.checkpointId }, resumeValue: 'yes' };

        const first = await graph.resume({ request: 'deploy' }, fromPause);
        const second = await graph.resume({ request: 'deploy' }, fromPause);

        expect(first).toEqual({ request: 'deploy', answer: 'yes', log: ['ask', 'confirm'] });
        expect(second).toEqual(first);
        expect(askCalls).toBe(3);
    });

    it('should not resume implicitly from invoke()', async () => {
        const graph = buildApprovalGraph();
        const config = { configurable: { thread_id: 'thread-6' } };

        await captureInterrupt(graph.invoke({ request: 'deploy', log: [] }, config));
        const paused = await captureInterrupt(graph.invoke({ request: 'other', log: [] }, config));

        expect(paused.state).toEqual({ request: 'other', log: [] });
    });

    it('should report a missing thread', async () => {
        const graph = buildApprovalGraph();

        await expect(graph.resume(undefined, { configurable: { thread_id: 'nobody' } }))
            .rejects.toBeInstanceOf(CheckpointNotFoundError);
        await expect(graph.getState({ configurable: { checkpoint_id: 'ckpt_missing' } }))
            .rejects.toThrow('Checkpoint not found: ckpt_missing');
        await expect(graph.getState({})).rejects.toThrow('Invalid config: configurable.thread_id: Required');
    });

    it('should require a checkpoint store for resume()', async () => {
        const graph = new StateGraph<ApprovalState>()
            .addNode('a', () => ({}))
            .setEntryPoint('a')
            .compile({ name: 'storeless' });

        await expect(graph.resume(undefined, { configurable: { thread_id: 't' } }))
            .rejects.toThrow('Graph "storeless" has no checkpoint store configured');
    });

    it('should collect every interrupt of a superstep', async () => {
        const graph = new StateGraph<ApprovalState>(approvalSchema())
            .addNode('fork', () => ({}))
            .addNode('left', (_state, context) => {
                interrupt(context, 'left?');
                return {};
            })
            .addNode('right', (_state, context) => {
                interrupt(context, 'right?');
                return {};
            })
            .addEdge('fork', 'left')
            .addEdge('fork', 'right')
            .setEntryPoint('fork')
            .compile({ checkpointer: { store } });

        const paused = await captureInterrupt(
            graph.invoke({ request: 'r', log: [] }, { configurable: { thread_id: 'fork-thread' } }),
        );

        expect(paused.node).toBe('left');
        expect(paused.next).toEqual(['left', 'right']);
        expect(paused.interrupts).toEqual([
            { node: 'left', value: 'left?' },
            { node: 'right', value: 'right?' },
        ]);

        const snapshot = await graph.getState({ configurable: { thread_id: 'fork-thread' } });
        expect(snapshot.nodeName).toBe('fork');
        expect(snapshot.metadata.step).toBe(1);
    });
});

describe('static interrupts', () => {
    interface StepState {
        trail: string[];
    }

    let store: MemoryCheckpointStore<StepState>;
    const calls = { a: 0, b: 0 };

    function buildGraph() {
        return new StateGraph<StepState>(new ReducerSchema<StepState>().registerReducer('trail', appendReducer))
            .addNode('a', () => {
                calls.a++;
                return { trail: ['a'] };
            })
            .addNode('b', () => {
                calls.b++;
                return { trail: ['b'] };
            })
            .addEdge('a', 'b')
            .addEdge('b', END)
            .setEntryPoint('a')
            .compile({ checkpointer: { store } });
    }

    beforeEach(() => {
        store = new MemoryCheckpointStore<StepState>();
        calls.a = 0;
        calls.b = 0;
    });

    it('should halt before a listed node and continue past it on resume', async () => {
        const graph = buildGraph();
        const config = { configurable: { thread_id: 'before' }, interruptBefore: ['b'] };

        const paused = await captureInterrupt(graph.invoke({ trail: [] }, config));

        expect(paused.node).toBe('b');
        expect(paused.interruptValue).toBeUndefined();
        expect(paused.next).toEqual(['b']);
        expect(paused.state).toEqual({ trail: ['a'] });
        expect(calls.b).toBe(0);

        const snapshot = await graph.getState(config);
        expect(snapshot.metadata.source).toBe('interrupt');
        expect(snapshot.nodeName).toBe('a');

        // Same config, interruptBefore included: the first superstep passes the boundary
        await expect(graph.resume(undefined, config)).resolves.toEqual({ trail: ['a', 'b'] });
        expect(calls.a).toBe(1);
        expect(calls.b).toBe(1);
    });

    it('should halt after a listed node with its update committed', async () => {
        const graph = buildGraph();
        const config = { configurable: { thread_id: 'after' } };

        const paused = await captureInterrupt(graph.invoke({ trail: [] }, { ...config, interruptAfter: ['a'] }));

        expect(paused.node).toBe('a');
        expect(paused.next).toEqual(['b']);
        expect(paused.state).toEqual({ trail: ['a'] });

        const snapshot = await graph.getState(config);
        expect(snapshot.metadata).toEqual({ source: 'interrupt', step: 1, next: ['b'], completed: ['a'] });

        await expect(graph.resume(undefined, config)).resolves.toEqual({ trail: ['a', 'b'] });
    });

    it('should not halt after the last node', async () => {
        const graph = buildGraph();

        await expect(graph.invoke({ trail: [] }, { interruptAfter: ['b'] }))
            .resolves.toEqual({ trail: ['a', 'b'] });
    });

    it('should warn about interrupt names that match no node', async () => {
        const warn = vi.fn();
        const graph = new StateGraph<StepState>()
            .addNode('a', () => ({}))
            .setEntryPoint('a')
            .compile({ logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() } });

        await graph.invoke({ trail: [] }, { interruptBefore: ['ghost'] });

        expect(warn).toHaveBeenCalledWith('Interrupt names an unknown node', { list: 'interruptBefore', node: 'ghost' });
    });
});

describe('updateState', () => {
    interface DraftState {
        draft: string;
        edits: string[];
    }

    function buildGraph(store: MemoryCheckpointStore<DraftState>, withInitial: boolean) {
        const schema = new ReducerSchema<DraftState>(withInitial ? () => ({ draft: '', edits: [] }) : undefined)
            .registerReducer('edits', appendReducer);

        return new StateGraph<DraftState>(schema)
            .addNode('write', () => ({ draft: 'v1', edits: ['write'] }))
            .addNode('review', state => ({ edits: [`review:${state.draft}`] }))
            .addEdge('write', 'review')
            .addEdge('review', END)
            .setEntryPoint('write')
            .compile({ checkpointer: { store } });
    }

    it('should write a checkpoint as if a node had produced it', async () => {
        const store = new MemoryCheckpointStore<DraftState>();
        const graph = buildGraph(store, true);
        const thread = { configurable: { thread_id: 'draft-1' } };

        const updated = await graph.updateState(thread, { draft: 'human draft', edits: ['human'] }, 'write');

        const snapshot = await graph.getState(updated);
        expect(updated.configurable?.['thread_id']).toBe('draft-1');
        expect(snapshot.values).toEqual({ draft: 'human draft', edits: ['human'] });
        expect(snapshot.next).toEqual(['review']);
        expect(snapshot.nodeName).toBe('write');
        expect(snapshot.metadata).toEqual({ source: 'update', step: 0, next: ['review'], completed: ['write'] });

        const result = await graph.resume(undefined, thread);
        expect(result).toEqual({ draft: 'human draft', edits: ['human', 'review:human draft'] });
    });

    it('should keep the recorded frontier without asNode', async () => {
        const store = new MemoryCheckpointStore<DraftState>();
        const graph = buildGraph(store, true);
        const thread = { configurable: { thread_id: 'draft-2' } };

        await captureInterrupt(graph.invoke({ draft: '', edits: [] }, { ...thread, interruptBefore: ['review'] }));
        await graph.updateState(thread, { draft: 'patched' });

        const snapshot = await graph.getState(thread);
        expect(snapshot.values).toEqual({ draft: 'patched', edits: ['write'] });
        expect(snapshot.next).toEqual(['review']);
        expect(snapshot.nodeName).toBe('write');
    });

    it('should need an initial state for a thread without checkpoints', async () => {
        const graph = buildGraph(new MemoryCheckpointStore<DraftState>(), false);

        await expect(graph.updateState({ configurable: { thread_id: 'empty' } }, { draft: 'x' }))
            .rejects.toThrow('No checkpoints found for thread: empty');
    });

    it('should reject an unknown asNode', async () => {
        const graph = buildGraph(new MemoryCheckpointStore<DraftState>(), true);

        await expect(graph.updateState({ configurable: { thread_id: 't' } }, {}, 'nope'))
            .rejects.toThrow('Unknown node "nope" (updateState)');
    });
});
