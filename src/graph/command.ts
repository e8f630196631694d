import type { End } from './types';

export type Goto = string | End | ReadonlyArray<string | End>;

export interface CommandInit<S> {
    /** Partial update merged through the schema like a plain return value */
    update?: Partial<S>;
    /** Replaces the node's outgoing edges for this step */
    goto?: Goto;
}

/**
 * Node result that updates state and picks the next nodes itself.
 *
 * @example
 * ```typescript
 * graph.addNode('triage', state =>
 *     state.urgent
 *         ? new Command({ update: { handled: true }, goto: 'escalate' })
 *         : new Command({ goto: END }));
 * ```
 */
export class Command<S> {
    readonly update?: Partial<S>;
    readonly goto?: Goto;

    constructor(init: CommandInit<S> = {}) {
        this.update = init.update;
        this.goto = init.goto;
    }

    /** Goto targets as a list; undefined when the node's edges apply. */
    gotoTargets(): Array<string | End> | undefined {
        if (this.goto === undefined) return undefined;
        return typeof this.goto === 'string' || typeof this.goto === 'symbol'
            ? [this.goto]
            : [...this.goto];
    }
}

export function isCommand<S>(value: unknown): value is Command<S> {
    return value instanceof Command;
}
