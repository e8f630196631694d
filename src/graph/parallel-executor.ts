/**
 * Parallel execution of one superstep's frontier.
 *
 * Every branch runs as its own task, optionally bounded by maxConcurrency. The
 * executor waits for all of them to settle. The first fatal failure aborts a
 * shared group signal so the siblings can stop cooperatively.
 */

import { GraphAbortedError } from '../lib/errors';

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration for a parallel branch.
 */
export interface ParallelBranch<R> {
    /** Branch name for debugging and logging */
    name: string;
    /** Receives the group signal, aborted when the run stops or a sibling fails */
    execute: (signal: AbortSignal) => Promise<R>;
}

/**
 * Configuration for parallel execution.
 */
export interface ParallelConfig<R> {
    branches: ParallelBranch<R>[];
    /** Maximum concurrent executions (default: unlimited) */
    maxConcurrency?: number;
    /** Parent signal linked into the group signal */
    signal?: AbortSignal;
    /** Failures that should stop the siblings (default: every failure) */
    isFatal?: (error: unknown) => boolean;
}

export type BranchOutcome<R> =
    | { name: string; status: 'fulfilled'; value: R }
    | { name: string; status: 'rejected'; reason: unknown };

/**
 * Result of parallel execution, outcomes in branch order.
 */
export interface ParallelResult<R> {
    outcomes: BranchOutcome<R>[];
    /** First fatal failure, in the order failures happened */
    firstError?: { branch: string; error: unknown };
}

// ============================================================================
// State Cloning
// ============================================================================

/**
 * Whether a value is made only of primitives, arrays, plain objects, Dates,
 * Maps and Sets, so structuredClone reproduces it exactly.
 */
export function isPlainData(value: unknown, seen: Set<object> = new Set()): boolean {
    if (value === null || typeof value !== 'object') {
        return typeof value !== 'function' && typeof value !== 'symbol';
    }
    if (seen.has(value)) return true;
    seen.add(value);

    if (value instanceof Date) return true;
    if (Array.isArray(value)) return value.every(item => isPlainData(item, seen));
    if (value instanceof Map) {
        return [...value].every(([k, v]) => isPlainData(k, seen) && isPlainData(v, seen));
    }
    if (value instanceof Set) return [...value].every(item => isPlainData(item, seen));

    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) return false;
    return Object.values(value).every(item => isPlainData(item, seen));
}

/**
 * Clone state for a branch so siblings cannot observe each other's in-place
 * mutations. Plain-data states are deep-copied; anything else (class
 * instances, functions) gets a shallow top-level copy.
 */
export function cloneStateForBranch<S extends object>(state: S): S {
    if (isPlainData(state)) {
        try {
            return structuredClone(state);
        } catch {
            // Fall through to the shallow copy
        }
    }
    return { ...state };
}

// ============================================================================
// Parallel Executor
// ============================================================================

/**
 * Execute branches in parallel with fail-fast signalling.
 *
 * Never rejects because of a branch: the caller decides what the outcomes mean.
 *
 * @throws GraphAbortedError - the parent signal was aborted before start
 */
export async function executeParallel<R>(config: ParallelConfig<R>): Promise<ParallelResult<R>> {
    const { branches, maxConcurrency, signal, isFatal = () => true } = config;

    if (signal?.aborted) {
        throw new GraphAbortedError(signal.reason);
    }

    if (branches.length === 0) {
        return { outcomes: [] };
    }

    // Shared abort controller for fail-fast, linked to the parent signal
    const groupAbort = new AbortController();
    const onParentAbort = () => groupAbort.abort(signal?.reason);
    signal?.addEventListener('abort', onParentAbort, { once: true });

    const semaphore = maxConcurrency ? createSemaphore(maxConcurrency) : null;
    const failures: Array<{ branch: string; error: unknown }> = [];

    const promises = branches.map(async branch => {
        if (semaphore) await semaphore.acquire();

        try {
            return await branch.execute(groupAbort.signal);
        } catch (error) {
            if (isFatal(error)) {
                failures.push({ branch: branch.name, error });
                groupAbort.abort(error);
            }
            throw error;
        } finally {
            if (semaphore) semaphore.release();
        }
    });

    try {
        // allSettled so no branch is left running when we return
        const settled = await Promise.allSettled(promises);

        const outcomes = settled.map((result, index): BranchOutcome<R> => {
            const name = branches[index].name;
            return result.status === 'fulfilled'
                ? { name, status: 'fulfilled', value: result.value }
                : { name, status: 'rejected', reason: result.reason };
        });

        return { outcomes, firstError: failures[0] };
    } finally {
        signal?.removeEventListener('abort', onParentAbort);
    }
}

// ============================================================================
// Semaphore (for maxConcurrency)
// ============================================================================

interface Semaphore {
    acquire(): Promise<void>;
    release(): void;
}

export function createSemaphore(max: number): Semaphore {
    let current = 0;
    const queue: Array<() => void> = [];

    return {
        async acquire() {
            if (current < max) {
                current++;
                return;
            }
            // The releasing branch hands its slot over directly
            await new Promise<void>(resolve => queue.push(resolve));
        },
        release() {
            const next = queue.shift();
            if (next) {
                next();
            } else {
                current--;
            }
        },
    };
}
