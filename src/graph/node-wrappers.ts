/**
 * Node function decorators: retry with backoff, timeout, circuit breaking and
 * rate limiting.
 *
 * Each wrapper returns a plain NodeFunction, so they compose:
 *
 * @example
 * ```typescript
 * graph.addNode('fetch', withRetry(withTimeout(fetchNode, 5_000), { maxRetries: 3 }));
 * ```
 */

import { CircuitOpenError, GraphAbortedError, NodeTimeoutError, RateLimitExceededError } from '../lib/errors';
import { describeError } from '../lib/logger';
import { findNodeInterrupt } from './interrupt';
import type { NodeFunction, NodeUpdate } from './types';

// ============================================================================
// Retry
// ============================================================================

export type BackoffStrategy = 'fixed' | 'linear' | 'exponential';

export interface RetryOptions {
    /** Attempts after the first one */
    maxRetries: number;
    /** Default: 'exponential' */
    backoff?: BackoffStrategy;
    /** Default: 100 */
    baseDelayMs?: number;
    /** Default: 5000 */
    maxDelayMs?: number;
    /** Return false to fail immediately. Interrupts are never retried. */
    retryOn?: (error: unknown, attempt: number) => boolean;
}

/** Delay before retry number `attempt` (1-based) */
export function retryDelay(options: RetryOptions, attempt: number): number {
    const base = options.baseDelayMs ?? 100;
    const max = options.maxDelayMs ?? 5_000;
    let delay: number;
    switch (options.backoff ?? 'exponential') {
        case 'fixed':
            delay = base;
            break;
        case 'linear':
            delay = base * attempt;
            break;
        case 'exponential':
            delay = base * 2 ** (attempt - 1);
            break;
    }
    return Math.min(delay, max);
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal.aborted) {
            reject(new GraphAbortedError(signal.reason));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new GraphAbortedError(signal.reason));
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Re-run a failing node with backoff. The wait is cut short when the run is
 * aborted.
 */
export function withRetry<S extends object>(fn: NodeFunction<S>, options: RetryOptions): NodeFunction<S> {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
        throw new RangeError(`maxRetries must be a non-negative integer, got ${options.maxRetries}`);
    }

    return async (state, context): Promise<NodeUpdate<S>> => {
        for (let attempt = 1; ; attempt++) {
            try {
                return await fn(state, context);
            } catch (error) {
                const retryable = attempt <= options.maxRetries
                    && !context.signal.aborted
                    && findNodeInterrupt(error) === undefined
                    && (options.retryOn?.(error, attempt) ?? true);
                if (!retryable) throw error;

                const delayMs = retryDelay(options, attempt);
                context.logger.debug('Retrying node', {
                    node: context.node,
                    attempt,
                    delayMs,
                    error: describeError(error),
                });
                await sleep(delayMs, context.signal);
            }
        }
    };
}

// ============================================================================
// Timeout
// ============================================================================

/**
 * Fail with NodeTimeoutError when the node takes longer than `timeoutMs`.
 * The node sees a derived signal that aborts on timeout as well as on
 * cancellation of the run.
 */
export function withTimeout<S extends object>(fn: NodeFunction<S>, timeoutMs: number): NodeFunction<S> {
    if (!(timeoutMs > 0) || !Number.isFinite(timeoutMs)) {
        throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
    }

    return async (state, context): Promise<NodeUpdate<S>> => {
        const controller = new AbortController();
        const onParentAbort = () => controller.abort(context.signal.reason);
        if (context.signal.aborted) {
            onParentAbort();
        } else {
            context.signal.addEventListener('abort', onParentAbort, { once: true });
        }

        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = new NodeTimeoutError(context.node, timeoutMs);
                controller.abort(error);
                reject(error);
            }, timeoutMs);
        });

        try {
            const run = (async () => fn(state, context.withSignal(controller.signal)))();
            return await Promise.race([run, timeout]);
        } finally {
            clearTimeout(timer);
            context.signal.removeEventListener('abort', onParentAbort);
        }
    };
}

// ============================================================================
// Circuit Breaker
// ============================================================================

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
    /** Consecutive failures that open the circuit (default: 5) */
    failureThreshold?: number;
    /** Successes in half-open state that close it again (default: 1) */
    successThreshold?: number;
    /** How long the circuit stays open before a trial call (default: 30000) */
    resetTimeoutMs?: number;
    /** Trial calls allowed while half-open (default: 1) */
    halfOpenMaxCalls?: number;
}

/**
 * Failure counter shared by every execution of one node.
 * Interrupts count neither as success nor as failure.
 */
export class CircuitBreaker {
    private readonly failureThreshold: number;
    private readonly successThreshold: number;
    private readonly resetTimeoutMs: number;
    private readonly halfOpenMaxCalls: number;
    private current: CircuitState = 'closed';
    private failures = 0;
    private successes = 0;
    private openedAt = 0;
    private halfOpenCalls = 0;

    constructor(options: CircuitBreakerOptions = {}, private readonly now: () => number = Date.now) {
        this.failureThreshold = options.failureThreshold ?? 5;
        this.successThreshold = options.successThreshold ?? 1;
        this.resetTimeoutMs = options.resetTimeoutMs ?? 30_000;
        this.halfOpenMaxCalls = options.halfOpenMaxCalls ?? 1;
    }

    get state(): CircuitState {
        return this.current;
    }

    async execute<T>(name: string, task: () => Promise<T>): Promise<T> {
        this.admit(name);
        try {
            const result = await task();
            this.onSuccess();
            return result;
        } catch (error) {
            if (findNodeInterrupt(error) === undefined) {
                this.onFailure();
            } else if (this.current === 'half_open') {
                this.halfOpenCalls--;
            }
            throw error;
        }
    }

    private admit(name: string): void {
        if (this.current === 'open') {
            const elapsed = this.now() - this.openedAt;
            if (elapsed < this.resetTimeoutMs) {
                throw new CircuitOpenError(name, this.resetTimeoutMs - elapsed);
            }
            this.current = 'half_open';
            this.halfOpenCalls = 0;
            this.successes = 0;
        }
        if (this.current === 'half_open') {
            if (this.halfOpenCalls >= this.halfOpenMaxCalls) {
                throw new CircuitOpenError(name, 0);
            }
            this.halfOpenCalls++;
        }
    }

    private onSuccess(): void {
        this.failures = 0;
        if (this.current !== 'half_open') return;
        this.halfOpenCalls--;
        this.successes++;
        if (this.successes >= this.successThreshold) {
            this.current = 'closed';
            this.successes = 0;
        }
    }

    private onFailure(): void {
        this.failures++;
        if (this.current === 'half_open' || this.failures >= this.failureThreshold) {
            this.current = 'open';
            this.openedAt = this.now();
            this.halfOpenCalls = 0;
            this.successes = 0;
        }
    }
}

/**
 * Reject calls with CircuitOpenError while the node keeps failing.
 * Pass a CircuitBreaker to share or inspect its state.
 */
export function withCircuitBreaker<S extends object>(
    fn: NodeFunction<S>,
    breaker: CircuitBreaker | CircuitBreakerOptions = {},
): NodeFunction<S> {
    const circuit = breaker instanceof CircuitBreaker ? breaker : new CircuitBreaker(breaker);
    return (state, context) => circuit.execute(context.node, async () => fn(state, context));
}

// ============================================================================
// Rate Limiter
// ============================================================================

export interface RateLimitOptions {
    /** Calls admitted per window */
    maxCalls: number;
    windowMs: number;
}

/**
 * Sliding-window call counter. A rejected call is not recorded.
 */
export class RateLimiter {
    private calls: number[] = [];

    constructor(
        private readonly options: RateLimitOptions,
        private readonly now: () => number = Date.now,
    ) {
        if (!Number.isInteger(options.maxCalls) || options.maxCalls < 1) {
            throw new RangeError(`maxCalls must be a positive integer, got ${options.maxCalls}`);
        }
        if (!(options.windowMs > 0) || !Number.isFinite(options.windowMs)) {
            throw new RangeError(`windowMs must be a positive number, got ${options.windowMs}`);
        }
    }

    /** Record a call, or throw RateLimitExceededError when the window is full */
    acquire(name: string): void {
        const now = this.now();
        this.calls = this.calls.filter(at => now - at < this.options.windowMs);
        if (this.calls.length >= this.options.maxCalls) {
            throw new RateLimitExceededError(name, this.options.windowMs - (now - this.calls[0]));
        }
        this.calls.push(now);
    }
}

/**
 * Reject calls beyond `maxCalls` per `windowMs` with RateLimitExceededError.
 * Pass a RateLimiter to share one budget between nodes.
 */
export function withRateLimit<S extends object>(
    fn: NodeFunction<S>,
    limiter: RateLimiter | RateLimitOptions,
): NodeFunction<S> {
    const limit = limiter instanceof RateLimiter ? limiter : new RateLimiter(limiter);
    return async (state, context) => {
        limit.acquire(context.node);
        return fn(state, context);
    };
}
