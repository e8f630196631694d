/**
 * Per-invocation configuration and its validation.
 */

import { z } from 'zod';
import type { ValidationErrorItem } from '../lib/errors';
import { InvalidConfigError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { CheckpointStore } from './checkpointer';
import { isCheckpointStore } from './checkpointer';
import type { MapState } from './types';

/** Default step budget per invocation */
export const DEFAULT_RECURSION_LIMIT = 25;

/** Checkpointing knobs */
export interface CheckpointOptions<S> {
    store?: CheckpointStore<S>;
    /** Save after every superstep (default: true) */
    autoSave?: boolean;
    /** Minimum milliseconds between step saves; 0 disables throttling */
    saveInterval?: number;
    /** Checkpoints kept per thread; 0 keeps all */
    maxCheckpoints?: number;
}

export const DEFAULT_CHECKPOINT_OPTIONS = {
    autoSave: true,
    saveInterval: 0,
    maxCheckpoints: 0,
} as const;

/**
 * Configuration for one invocation. Never mutated by the scheduler.
 */
export interface RunnableConfig<S extends object = MapState> {
    /** Carries `thread_id` and `checkpoint_id` */
    configurable?: Record<string, unknown>;
    /** Visible to nodes and copied into checkpoint metadata */
    metadata?: Record<string, unknown>;
    /** Start from these nodes instead of the entry point */
    resumeFrom?: string[];
    /** Returned by the next `interrupt()` call */
    resumeValue?: unknown;
    interruptBefore?: string[];
    interruptAfter?: string[];
    /** Superstep budget (default: 25) */
    recursionLimit?: number;
    /** Cap on nodes running at once within a superstep */
    maxConcurrency?: number;
    signal?: AbortSignal;
    /** Overrides the compile-time checkpoint defaults */
    checkpoint?: CheckpointOptions<S>;
    /** Copied onto tracer spans */
    tags?: string[];
}

/** Options for StateGraph.compile() */
export interface CompileOptions<S extends object = MapState> {
    checkpointer?: CheckpointOptions<S>;
    recursionLimit?: number;
    logger?: Logger;
    tracer?: Tracer;
    /** Graph name used in spans and logs */
    name?: string;
}

const nodeNameList = z.array(z.string().min(1, 'Node name must not be empty'));

const checkpointOptionsSchema = z.object({
    store: z.unknown()
        .refine(value => value === undefined || isCheckpointStore(value), 'Expected a checkpoint store')
        .optional(),
    autoSave: z.boolean().optional(),
    saveInterval: z.number().nonnegative().finite().optional(),
    maxCheckpoints: z.number().int().nonnegative().optional(),
});

const runnableConfigSchema = z.object({
    configurable: z.object({
        thread_id: z.string().min(1).optional(),
        checkpoint_id: z.string().min(1).optional(),
    }).passthrough().optional(),
    metadata: z.record(z.unknown()).optional(),
    resumeFrom: nodeNameList.optional(),
    resumeValue: z.unknown().optional(),
    interruptBefore: nodeNameList.optional(),
    interruptAfter: nodeNameList.optional(),
    recursionLimit: z.number().int().positive().optional(),
    maxConcurrency: z.number().int().positive().optional(),
    signal: z.custom<AbortSignal>(value => value instanceof AbortSignal, 'Expected an AbortSignal').optional(),
    checkpoint: checkpointOptionsSchema.optional(),
    tags: z.array(z.string()).optional(),
});

const compileOptionsSchema = z.object({
    checkpointer: checkpointOptionsSchema.optional(),
    recursionLimit: z.number().int().positive().optional(),
    name: z.string().min(1).optional(),
});

function validate(schema: z.ZodTypeAny, value: unknown, label: string): void {
    const result = schema.safeParse(value ?? {});
    if (!result.success) {
        const validationErrors: ValidationErrorItem[] = result.error.errors.map(e => ({
            path: e.path,
            message: e.message,
        }));
        throw new InvalidConfigError(
            `Invalid ${label}: ${validationErrors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`).join(', ')}`,
            validationErrors,
        );
    }
}

/**
 * Validate an invocation config.
 *
 * @throws InvalidConfigError
 */
export function validateConfig<S extends object>(config: RunnableConfig<S> | undefined): RunnableConfig<S> {
    validate(runnableConfigSchema, config, 'config');
    return config ?? {};
}

/**
 * Validate compile options.
 *
 * @throws InvalidConfigError
 */
export function validateCompileOptions<S extends object>(options: CompileOptions<S> | undefined): CompileOptions<S> {
    validate(compileOptionsSchema, options, 'compile options');
    return options ?? {};
}

/** `configurable.thread_id` when it is a string */
export function getThreadIdFromConfig<S extends object>(config: RunnableConfig<S> | undefined): string | undefined {
    const threadId = config?.configurable?.['thread_id'];
    return typeof threadId === 'string' ? threadId : undefined;
}

/** `configurable.checkpoint_id` when it is a string */
export function getCheckpointIdFromConfig<S extends object>(config: RunnableConfig<S> | undefined): string | undefined {
    const checkpointId = config?.configurable?.['checkpoint_id'];
    return typeof checkpointId === 'string' ? checkpointId : undefined;
}
