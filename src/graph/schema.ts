/**
 * State schema and reducers.
 *
 * A schema decides how a node's partial update is folded into the current
 * state. Keys without a registered reducer are overwritten (last write wins).
 * Keys whose incoming value is `undefined` are left untouched.
 */

/** Merge rule for a single state key */
export type Reducer<V> = (current: V | undefined, incoming: V) => V;

export interface StateSchema<S> {
    /** Initial state, used when a thread is updated before it ever ran */
    init?(): S;
    /** Fold `update` into `current`; must return a new object */
    update(current: S, update: Partial<S>): S;
}

/**
 * Schema with per-key reducers.
 *
 * @example
 * ```typescript
 * const schema = new ReducerSchema<{ results: string[]; total: number }>()
 *     .registerReducer('results', appendReducer)
 *     .registerReducer('total', sumReducer);
 * ```
 */
export class ReducerSchema<S extends object> implements StateSchema<S> {
    private readonly reducers: { [K in keyof S]?: Reducer<S[K]> } = {};

    constructor(private readonly initial?: () => S) { }

    registerReducer<K extends keyof S>(key: K, reducer: Reducer<S[K]>): this {
        this.reducers[key] = reducer;
        return this;
    }

    hasReducer(key: keyof S): boolean {
        return this.reducers[key] !== undefined;
    }

    hasInitial(): boolean {
        return this.initial !== undefined;
    }

    init(): S {
        if (!this.initial) {
            throw new Error('ReducerSchema has no initial state factory');
        }
        return this.initial();
    }

    update(current: S, update: Partial<S>): S {
        const next: S = { ...current };
        for (const key of keysOf(update)) {
            const incoming = update[key];
            if (incoming === undefined) continue;
            this.applyKey(next, key, incoming);
        }
        return next;
    }

    private applyKey<K extends keyof S>(target: S, key: K, incoming: S[K]): void {
        const reducer: Reducer<S[K]> | undefined = this.reducers[key];
        target[key] = reducer ? reducer(target[key], incoming) : incoming;
    }
}

/**
 * Default schema: shallow overwrite.
 */
export function overwriteSchema<S extends object>(): StateSchema<S> {
    return new ReducerSchema<S>();
}

/** Whether the schema can produce an initial state */
export function canInit<S>(schema: StateSchema<S>): schema is StateSchema<S> & { init(): S } {
    if (schema instanceof ReducerSchema) {
        return schema.hasInitial();
    }
    return typeof schema.init === 'function';
}

function keysOf<T extends object>(value: T): Array<Extract<keyof T, string>> {
    return Object.keys(value).filter((key): key is Extract<keyof T, string> => key in value);
}

// ============================================================================
// Reducers
// ============================================================================

/** Replace the current value */
export function overwriteReducer<V>(_current: V | undefined, incoming: V): V {
    return incoming;
}

/** Concatenate arrays */
export function appendReducer<T>(current: T[] | undefined, incoming: T[]): T[] {
    return [...(current ?? []), ...incoming];
}

/**
 * Append for dynamic state: arrays are concatenated, anything else is pushed
 * as a single element. A non-array current value becomes the first element.
 */
export const appendValueReducer: Reducer<unknown> = (current, incoming) => {
    const base: unknown[] = current === undefined
        ? []
        : Array.isArray(current) ? [...current] : [current];
    if (Array.isArray(incoming)) {
        base.push(...incoming);
    } else {
        base.push(incoming);
    }
    return base;
};

/** Add numbers */
export function sumReducer(current: number | undefined, incoming: number): number {
    return (current ?? 0) + incoming;
}

/** Shallow merge of objects */
export function mergeObjectReducer<V extends object>(current: V | undefined, incoming: V): V {
    return current === undefined ? { ...incoming } : { ...current, ...incoming };
}
