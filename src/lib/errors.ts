/**
 * Base class for every failure raised by the engine itself.
 * Errors thrown by node functions are never wrapped in it.
 */
export class GraphError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GraphError';
    }
}

export class DuplicateNodeError extends GraphError {
    constructor(public readonly nodeName: string) {
        super(`Node already exists: ${nodeName}`);
        this.name = 'DuplicateNodeError';
    }
}

export class UnknownNodeError extends GraphError {
    constructor(
        public readonly nodeName: string,
        context?: string,
    ) {
        super(context ? `Unknown node "${nodeName}" (${context})` : `Unknown node "${nodeName}"`);
        this.name = 'UnknownNodeError';
    }
}

export class InvalidNodeNameError extends GraphError {
    constructor(public readonly nodeName: string, reason: string) {
        super(`Invalid node name "${nodeName}": ${reason}`);
        this.name = 'InvalidNodeNameError';
    }
}

/**
 * Raised by `compile()`; lists every problem found, not just the first.
 */
export class CompilationError extends GraphError {
    constructor(public readonly problems: string[]) {
        super(`Graph compilation failed: ${problems.join('; ')}`);
        this.name = 'CompilationError';
    }
}

/**
 * The step budget was exhausted. Usually a conditional edge that never routes to END.
 */
export class RecursionLimitExceededError extends GraphError {
    constructor(public readonly limit: number) {
        super(`Graph execution exceeded recursion limit of ${limit} supersteps`);
        this.name = 'RecursionLimitExceededError';
    }
}

export class GraphAbortedError extends GraphError {
    constructor(reason?: unknown) {
        super('Graph execution aborted', reason === undefined ? undefined : { cause: reason });
        this.name = 'GraphAbortedError';
    }
}

/** Validation error details */
export interface ValidationErrorItem {
    path: (string | number)[];
    message: string;
}

export class InvalidConfigError extends GraphError {
    constructor(
        message: string,
        public readonly validationErrors: ValidationErrorItem[],
    ) {
        super(message);
        this.name = 'InvalidConfigError';
    }
}

export class CheckpointNotFoundError extends GraphError {
    constructor(public readonly lookup: { threadId?: string; checkpointId?: string }) {
        super(
            lookup.checkpointId
                ? `Checkpoint not found: ${lookup.checkpointId}`
                : `No checkpoints found for thread: ${lookup.threadId ?? '<none>'}`,
        );
        this.name = 'CheckpointNotFoundError';
    }
}

/**
 * A persisted checkpoint could not be decoded back into a record.
 */
export class CheckpointCorruptedError extends GraphError {
    constructor(
        public readonly checkpointId: string,
        public readonly validationErrors: ValidationErrorItem[],
    ) {
        super(`Checkpoint ${checkpointId} is corrupted: ${validationErrors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`).join(', ')}`);
        this.name = 'CheckpointCorruptedError';
    }
}

export class NodeTimeoutError extends GraphError {
    constructor(
        public readonly nodeName: string,
        public readonly timeoutMs: number,
    ) {
        super(`Node "${nodeName}" timed out after ${timeoutMs}ms`);
        this.name = 'NodeTimeoutError';
    }
}

/**
 * A circuit breaker rejected the call without running the node.
 */
export class CircuitOpenError extends GraphError {
    constructor(
        public readonly nodeName: string,
        public readonly retryAfterMs: number,
    ) {
        super(`Circuit open for node "${nodeName}"; retry in ${retryAfterMs}ms`);
        this.name = 'CircuitOpenError';
    }
}

/**
 * A rate limiter rejected the call without running the node.
 */
export class RateLimitExceededError extends GraphError {
    constructor(
        public readonly nodeName: string,
        public readonly retryAfterMs: number,
    ) {
        super(`Rate limit exceeded for node "${nodeName}"; retry in ${retryAfterMs}ms`);
        this.name = 'RateLimitExceededError';
    }
}
