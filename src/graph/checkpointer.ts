/**
 * Checkpointer - state persistence for graph execution.
 *
 * A checkpoint is an immutable snapshot of the state between supersteps. Stores
 * only persist and return them; versioning, throttling and retention live in
 * CheckpointManager.
 */

import { isPlainData } from './parallel-executor';

/** Why a checkpoint was written */
export type CheckpointSource = 'step' | 'interrupt' | 'end' | 'update';

/**
 * Checkpoint metadata. Caller keys from `config.metadata` are copied in beside
 * the engine's own.
 */
export interface CheckpointMetadata {
    source: CheckpointSource;
    /** Superstep count of the thread when the snapshot was taken */
    step: number;
    /** Nodes to run when the thread resumes from here */
    next: string[];
    /** Nodes merged into this snapshot by the last superstep */
    completed: string[];
    [key: string]: unknown;
}

/**
 * Stored checkpoint data.
 */
export interface Checkpoint<S> {
    id: string;
    threadId: string;
    /** Last node that completed, or START */
    nodeName: string;
    state: S;
    metadata: CheckpointMetadata;
    /** Epoch milliseconds */
    timestamp: number;
    /** Monotonic per thread */
    version: number;
}

/**
 * Checkpoint store interface.
 * Implementations must accept concurrent saves for different threads.
 */
export interface CheckpointStore<S> {
    /** Save (or replace, by id) a checkpoint. */
    save(checkpoint: Checkpoint<S>): Promise<void>;
    /** Load a checkpoint by id. */
    load(checkpointId: string): Promise<Checkpoint<S> | null>;
    /** All checkpoints of a thread, oldest first (timestamp, then version). */
    list(threadId: string): Promise<Checkpoint<S>[]>;
    /** Delete a checkpoint. */
    delete(checkpointId: string): Promise<boolean>;
    /** Delete every checkpoint of a thread; returns how many were removed. */
    clear(threadId: string): Promise<number>;
}

const STORE_METHODS = ['save', 'load', 'list', 'delete', 'clear'] as const;

/** Structural check used when validating configuration. */
export function isCheckpointStore(value: unknown): boolean {
    if (typeof value !== 'object' || value === null) return false;
    return STORE_METHODS.every(method => typeof Reflect.get(value, method) === 'function');
}

/** Order used by every store's `list()` */
export function compareCheckpoints<S>(a: Checkpoint<S>, b: Checkpoint<S>): number {
    if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
    return a.version - b.version;
}

/** Newest checkpoint of a listed thread */
export function latestCheckpoint<S>(checkpoints: Checkpoint<S>[]): Checkpoint<S> | null {
    return checkpoints.length > 0 ? checkpoints[checkpoints.length - 1] : null;
}

/**
 * Copy a checkpoint so callers cannot mutate what a store holds.
 * State that is not plain data keeps its references (shallow copy).
 */
export function cloneCheckpoint<S>(checkpoint: Checkpoint<S>): Checkpoint<S> {
    const metadata = isPlainData(checkpoint.metadata)
        ? structuredClone(checkpoint.metadata)
        : { ...checkpoint.metadata, next: [...checkpoint.metadata.next], completed: [...checkpoint.metadata.completed] };
    if (isPlainData(checkpoint.state)) {
        try {
            return { ...checkpoint, state: structuredClone(checkpoint.state), metadata };
        } catch {
            // Fall through to sharing the state
        }
    }
    return { ...checkpoint, metadata };
}

/**
 * In-memory checkpoint store.
 * Suitable for testing and short-lived sessions.
 */
export class MemoryCheckpointStore<S> implements CheckpointStore<S> {
    private readonly checkpoints = new Map<string, Checkpoint<S>>();

    async save(checkpoint: Checkpoint<S>): Promise<void> {
        this.checkpoints.set(checkpoint.id, cloneCheckpoint(checkpoint));
    }

    async load(checkpointId: string): Promise<Checkpoint<S> | null> {
        const checkpoint = this.checkpoints.get(checkpointId);
        return checkpoint ? cloneCheckpoint(checkpoint) : null;
    }

    async list(threadId: string): Promise<Checkpoint<S>[]> {
        const result: Checkpoint<S>[] = [];

        for (const checkpoint of this.checkpoints.values()) {
            if (checkpoint.threadId === threadId) {
                result.push(cloneCheckpoint(checkpoint));
            }
        }

        return result.sort(compareCheckpoints);
    }

    async delete(checkpointId: string): Promise<boolean> {
        return this.checkpoints.delete(checkpointId);
    }

    async clear(threadId: string): Promise<number> {
        let count = 0;

        for (const [id, checkpoint] of this.checkpoints) {
            if (checkpoint.threadId === threadId) {
                this.checkpoints.delete(id);
                count++;
            }
        }

        return count;
    }

    /** Number of checkpoints held across all threads */
    get size(): number {
        return this.checkpoints.size;
    }
}
