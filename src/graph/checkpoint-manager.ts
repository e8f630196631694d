/**
 * Per-invocation checkpoint bookkeeping: thread id, versions, throttling and
 * retention. Stores stay dumb; every policy lives here.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../lib/logger';
import type { Checkpoint, CheckpointSource, CheckpointStore } from './checkpointer';
import type { CheckpointOptions, RunnableConfig } from './config';
import { DEFAULT_CHECKPOINT_OPTIONS, getThreadIdFromConfig } from './config';

export interface CheckpointRecord<S> {
    nodeName: string;
    state: S;
    source: CheckpointSource;
    step: number;
    next: string[];
    completed: string[];
}

export interface ResolvedCheckpointOptions<S> {
    store: CheckpointStore<S>;
    autoSave: boolean;
    saveInterval: number;
    maxCheckpoints: number;
}

/**
 * Merge compile-time defaults with per-invocation overrides.
 * Returns null when no store is configured anywhere.
 */
export function resolveCheckpointOptions<S>(
    defaults: CheckpointOptions<S> | undefined,
    overrides: CheckpointOptions<S> | undefined,
): ResolvedCheckpointOptions<S> | null {
    const store = overrides?.store ?? defaults?.store;
    if (!store) return null;
    return {
        store,
        autoSave: overrides?.autoSave ?? defaults?.autoSave ?? DEFAULT_CHECKPOINT_OPTIONS.autoSave,
        saveInterval: overrides?.saveInterval ?? defaults?.saveInterval ?? DEFAULT_CHECKPOINT_OPTIONS.saveInterval,
        maxCheckpoints: overrides?.maxCheckpoints ?? defaults?.maxCheckpoints ?? DEFAULT_CHECKPOINT_OPTIONS.maxCheckpoints,
    };
}

export function generateThreadId(): string {
    return `exec_${randomUUID()}`;
}

export function generateCheckpointId(): string {
    return `ckpt_${randomUUID()}`;
}

export class CheckpointManager<S> {
    readonly threadId: string;
    private readonly store: CheckpointStore<S>;
    private readonly options: ResolvedCheckpointOptions<S>;
    private version: number | undefined;
    private lastSaveAt: number | undefined;

    constructor(
        options: ResolvedCheckpointOptions<S>,
        threadId: string,
        private readonly logger: Logger,
        private readonly callerMetadata: Record<string, unknown> = {},
        private readonly now: () => number = Date.now,
    ) {
        this.options = options;
        this.store = options.store;
        this.threadId = threadId;
    }

    static forConfig<S extends object>(
        options: ResolvedCheckpointOptions<S>,
        config: RunnableConfig<S>,
        logger: Logger,
        threadId: string = getThreadIdFromConfig(config) ?? generateThreadId(),
    ): CheckpointManager<S> {
        return new CheckpointManager(options, threadId, logger, config.metadata);
    }

    get autoSave(): boolean {
        return this.options.autoSave;
    }

    /**
     * Save a step snapshot, subject to policy.
     *
     * Skipped when autoSave is off or when the previous save is less than
     * saveInterval ms old. Returns null when skipped.
     */
    async record(input: CheckpointRecord<S>): Promise<Checkpoint<S> | null> {
        if (!this.options.autoSave) return null;
        if (
            this.options.saveInterval > 0
            && this.lastSaveAt !== undefined
            && this.now() - this.lastSaveAt < this.options.saveInterval
        ) {
            this.logger.debug('Checkpoint save throttled', { threadId: this.threadId, step: input.step });
            return null;
        }
        return this.save(input);
    }

    /**
     * Save a snapshot unconditionally, then apply retention.
     */
    async save(input: CheckpointRecord<S>): Promise<Checkpoint<S>> {
        const version = (await this.currentVersion()) + 1;
        const timestamp = this.now();
        const checkpoint: Checkpoint<S> = {
            id: generateCheckpointId(),
            threadId: this.threadId,
            nodeName: input.nodeName,
            state: input.state,
            metadata: {
                ...this.callerMetadata,
                source: input.source,
                step: input.step,
                next: [...input.next],
                completed: [...input.completed],
            },
            timestamp,
            version,
        };

        await this.store.save(checkpoint);
        this.version = version;
        this.lastSaveAt = timestamp;

        await this.prune();
        return checkpoint;
    }

    private async currentVersion(): Promise<number> {
        if (this.version === undefined) {
            const existing = await this.store.list(this.threadId);
            this.version = existing.reduce((max, checkpoint) => Math.max(max, checkpoint.version), 0);
        }
        return this.version;
    }

    private async prune(): Promise<void> {
        const limit = this.options.maxCheckpoints;
        if (limit <= 0) return;

        const checkpoints = await this.store.list(this.threadId);
        const excess = checkpoints.length - limit;
        if (excess <= 0) return;

        for (const checkpoint of checkpoints.slice(0, excess)) {
            await this.store.delete(checkpoint.id);
        }
        this.logger.debug('Pruned old checkpoints', { threadId: this.threadId, removed: excess });
    }
}
