import { describe, it, expect, vi } from 'vitest';
import type { Checkpoint } from '../../../src/graph/checkpointer';
import {
    MemoryCheckpointStore,
    cloneCheckpoint,
    isCheckpointStore,
    latestCheckpoint,
} from '../../../src/graph/checkpointer';
import type { CheckpointRecord } from '../../../src/graph/checkpoint-manager';
import {
    CheckpointManager,
    resolveCheckpointOptions,
} from '../../../src/graph/checkpoint-manager';
import { StateGraph } from '../../../src/graph/state-graph';
import { END } from '../../../src/graph/types';
import { noopLogger } from '../../../src/lib/logger';

interface NoteState {
    notes: string[];
}

function checkpoint(overrides: Partial<Checkpoint<NoteState>> = {}): Checkpoint<NoteState> {
    return {
        id: 'ckpt-1',
        threadId: 'thread-1',
        nodeName: 'a',
        state: { notes: ['first'] },
        metadata: { source: 'step', step: 1, next: ['b'], completed: ['a'] },
        timestamp: 1_000,
        version: 1,
        ...overrides,
    };
}

function record(step: number): CheckpointRecord<NoteState> {
    return {
        nodeName: `n${step}`,
        state: { notes: [`step ${step}`] },
        source: 'step',
        step,
        next: ['next'],
        completed: [`n${step}`],
    };
}

describe('MemoryCheckpointStore', () => {
    it('should isolate stored checkpoints from callers', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        const original = checkpoint();
        await store.save(original);

        original.state.notes.push('mutated after save');
        const loaded = await store.load('ckpt-1');
        expect(loaded?.state).toEqual({ notes: ['first'] });

        loaded?.state.notes.push('mutated after load');
        loaded?.metadata.next.push('x');
        const again = await store.load('ckpt-1');
        expect(again?.state).toEqual({ notes: ['first'] });
        expect(again?.metadata.next).toEqual(['b']);
    });

    it('should list a thread oldest first', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        await store.save(checkpoint({ id: 'late', timestamp: 3_000, version: 3 }));
        await store.save(checkpoint({ id: 'tie-b', timestamp: 2_000, version: 2 }));
        await store.save(checkpoint({ id: 'tie-a', timestamp: 2_000, version: 1 }));
        await store.save(checkpoint({ id: 'other', threadId: 'thread-2' }));

        const listed = await store.list('thread-1');
        expect(listed.map(c => c.id)).toEqual(['tie-a', 'tie-b', 'late']);
        expect(latestCheckpoint(listed)?.id).toBe('late');
        expect(latestCheckpoint([])).toBeNull();
        expect(await store.list('nobody')).toEqual([]);
    });

    it('should replace a checkpoint saved twice under one id', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        await store.save(checkpoint());
        await store.save(checkpoint({ state: { notes: ['replaced'] } }));

        expect(store.size).toBe(1);
        expect((await store.load('ckpt-1'))?.state).toEqual({ notes: ['replaced'] });
    });

    it('should delete and clear', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        await store.save(checkpoint({ id: 'a' }));
        await store.save(checkpoint({ id: 'b' }));
        await store.save(checkpoint({ id: 'c', threadId: 'thread-2' }));

        expect(await store.delete('a')).toBe(true);
        expect(await store.delete('a')).toBe(false);
        expect(await store.load('a')).toBeNull();
        expect(await store.clear('thread-1')).toBe(1);
        expect(await store.clear('thread-1')).toBe(0);
        expect(store.size).toBe(1);
    });
});

describe('checkpoint helpers', () => {
    it('should recognise stores structurally', () => {
        expect(isCheckpointStore(new MemoryCheckpointStore())).toBe(true);
        expect(isCheckpointStore({ save() { }, load() { } })).toBe(false);
        expect(isCheckpointStore(null)).toBe(false);
    });

    it('should share state that is not plain data', () => {
        class Counter {
            value = 1;
        }
        const counter = new Counter();
        const original: Checkpoint<{ counter: Counter }> = {
            ...checkpoint(),
            state: { counter },
        };

        const copy = cloneCheckpoint(original);
        expect(copy.state.counter).toBe(counter);
        expect(copy.metadata).not.toBe(original.metadata);
    });

    it('should merge compile defaults with invocation overrides', () => {
        const store = new MemoryCheckpointStore<NoteState>();
        const other = new MemoryCheckpointStore<NoteState>();

        expect(resolveCheckpointOptions(undefined, undefined)).toBeNull();
        expect(resolveCheckpointOptions({ autoSave: false }, undefined)).toBeNull();
        expect(resolveCheckpointOptions({ store, saveInterval: 500 }, { maxCheckpoints: 3 })).toEqual({
            store,
            autoSave: true,
            saveInterval: 500,
            maxCheckpoints: 3,
        });
        expect(resolveCheckpointOptions({ store, autoSave: true }, { store: other, autoSave: false })).toEqual({
            store: other,
            autoSave: false,
            saveInterval: 0,
            maxCheckpoints: 0,
        });
    });
});

describe('CheckpointManager', () => {
    function options(store: MemoryCheckpointStore<NoteState>, overrides: { autoSave?: boolean; saveInterval?: number; maxCheckpoints?: number } = {}) {
        return { store, autoSave: true, saveInterval: 0, maxCheckpoints: 0, ...overrides };
    }

    it('should number versions from what the thread already holds', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        await store.save(checkpoint({ id: 'old', version: 7 }));
        const manager = new CheckpointManager(options(store), 'thread-1', noopLogger);

        const first = await manager.save(record(1));
        const second = await manager.save(record(2));

        expect(first.version).toBe(8);
        expect(second.version).toBe(9);
        expect(first.id).toMatch(/^ckpt_/);
        expect(first.threadId).toBe('thread-1');
    });

    it('should keep only the newest checkpoints', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        const manager = new CheckpointManager(options(store, { maxCheckpoints: 2 }), 'thread-1', noopLogger);

        for (const step of [1, 2, 3, 4]) {
            await manager.save(record(step));
        }

        const remaining = await store.list('thread-1');
        expect(remaining.map(c => c.version)).toEqual([3, 4]);
    });

    it('should throttle step saves by saveInterval', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        let now = 0;
        const debug = vi.fn();
        const manager = new CheckpointManager(
            options(store, { saveInterval: 1_000 }),
            'thread-1',
            { ...noopLogger, debug },
            {},
            () => now,
        );

        expect(await manager.record(record(1))).not.toBeNull();
        now = 500;
        expect(await manager.record(record(2))).toBeNull();
        now = 1_500;
        expect(await manager.record(record(3))).not.toBeNull();

        expect((await store.list('thread-1')).map(c => c.metadata.step)).toEqual([1, 3]);
        expect(debug).toHaveBeenCalledWith('Checkpoint save throttled', { threadId: 'thread-1', step: 2 });
    });

    it('should skip step saves when autoSave is off but still save explicitly', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        const manager = new CheckpointManager(options(store, { autoSave: false }), 'thread-1', noopLogger);

        expect(manager.autoSave).toBe(false);
        expect(await manager.record(record(1))).toBeNull();
        await manager.save({ ...record(2), source: 'interrupt' });

        expect((await store.list('thread-1')).map(c => c.metadata.source)).toEqual(['interrupt']);
    });

    it('should let engine metadata win over caller metadata', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        const manager = new CheckpointManager(
            options(store),
            'thread-1',
            noopLogger,
            { user: 'u-1', step: 99, source: 'caller' },
            () => 42,
        );

        const saved = await manager.save(record(3));

        expect(saved.timestamp).toBe(42);
        expect(saved.metadata).toEqual({
            user: 'u-1',
            source: 'step',
            step: 3,
            next: ['next'],
            completed: ['n3'],
        });
    });

    it('should take the thread id from the config or generate one', () => {
        const store = new MemoryCheckpointStore<NoteState>();

        const named = CheckpointManager.forConfig(options(store), { configurable: { thread_id: 'given' } }, noopLogger);
        const generated = CheckpointManager.forConfig(options(store), {}, noopLogger);
        const explicit = CheckpointManager.forConfig(options(store), { configurable: { thread_id: 'given' } }, noopLogger, 'bound');

        expect(named.threadId).toBe('given');
        expect(generated.threadId).toMatch(/^exec_[0-9a-f-]{36}$/);
        expect(explicit.threadId).toBe('bound');
    });
});

describe('checkpointing a running graph', () => {
    it('should save the terminal state even while saves are throttled', async () => {
        const store = new MemoryCheckpointStore<NoteState>();
        const graph = new StateGraph<NoteState>()
            .addNode('a', state => ({ notes: [...state.notes, 'a'] }))
            .addNode('b', state => ({ notes: [...state.notes, 'b'] }))
            .addNode('c', state => ({ notes: [...state.notes, 'c'] }))
            .addEdge('a', 'b')
            .addEdge('b', 'c')
            .addEdge('c', END)
            .setEntryPoint('a')
            .compile({ checkpointer: { store, saveInterval: 60_000 } });
        const config = { configurable: { thread_id: 'throttled' } };

        await graph.invoke({ notes: [] }, config);

        const history = await graph.getStateHistory(config);
        expect(history.map(snapshot => [snapshot.metadata.source, snapshot.nodeName, snapshot.metadata.step]))
            .toEqual([
                ['step', 'a', 1],
                ['end', 'c', 3],
            ]);
        expect(history[1].values).toEqual({ notes: ['a', 'b', 'c'] });
    });
});
