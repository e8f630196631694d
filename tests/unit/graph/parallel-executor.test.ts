import { describe, it, expect } from 'vitest';
import {
    cloneStateForBranch,
    createSemaphore,
    executeParallel,
    isPlainData,
} from '../../../src/graph/parallel-executor';
import { GraphAbortedError } from '../../../src/lib/errors';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('executeParallel', () => {
    it('should report outcomes in branch order whatever finishes first', async () => {
        const result = await executeParallel({
            branches: [
                { name: 'slow', execute: async () => { await delay(20); return 'slow'; } },
                { name: 'fast', execute: async () => 'fast' },
            ],
        });

        expect(result.outcomes).toEqual([
            { name: 'slow', status: 'fulfilled', value: 'slow' },
            { name: 'fast', status: 'fulfilled', value: 'fast' },
        ]);
        expect(result.firstError).toBeUndefined();
    });

    it('should abort siblings after a fatal failure and wait for them', async () => {
        const failure = new Error('broken');
        let siblingReason: unknown;

        const result = await executeParallel<string>({
            branches: [
                {
                    name: 'waiter',
                    execute: signal => new Promise<string>((_, reject) => {
                        signal.addEventListener('abort', () => {
                            siblingReason = signal.reason;
                            reject(new Error('stopped'));
                        });
                    }),
                },
                { name: 'breaker', execute: async () => { throw failure; } },
            ],
        });

        expect(result.firstError).toEqual({ branch: 'breaker', error: failure });
        expect(siblingReason).toBe(failure);
        expect(result.outcomes.map(outcome => outcome.status)).toEqual(['rejected', 'rejected']);
    });

    it('should leave siblings running after a non-fatal failure', async () => {
        let aborted = false;
        const result = await executeParallel<string>({
            branches: [
                { name: 'soft', execute: async () => { throw new Error('soft'); } },
                {
                    name: 'steady',
                    execute: async signal => {
                        await delay(10);
                        aborted = signal.aborted;
                        return 'done';
                    },
                },
            ],
            isFatal: () => false,
        });

        expect(aborted).toBe(false);
        expect(result.firstError).toBeUndefined();
        expect(result.outcomes[1]).toEqual({ name: 'steady', status: 'fulfilled', value: 'done' });
    });

    it('should refuse to start under an aborted signal', async () => {
        const controller = new AbortController();
        controller.abort('gone');

        await expect(executeParallel({ branches: [], signal: controller.signal }))
            .rejects.toBeInstanceOf(GraphAbortedError);
        await expect(executeParallel({ branches: [] })).resolves.toEqual({ outcomes: [] });
    });

    it('should respect maxConcurrency', async () => {
        let running = 0;
        let peak = 0;
        const branches = [1, 2, 3, 4, 5].map(n => ({
            name: `b${n}`,
            execute: async () => {
                running++;
                peak = Math.max(peak, running);
                await delay(5);
                running--;
                return n;
            },
        }));

        const result = await executeParallel({ branches, maxConcurrency: 2 });

        expect(peak).toBe(2);
        expect(result.outcomes.map(outcome => outcome.status === 'fulfilled' && outcome.value)).toEqual([1, 2, 3, 4, 5]);
    });
});

describe('createSemaphore', () => {
    it('should hand a released slot to the next waiter', async () => {
        const semaphore = createSemaphore(1);
        const order: string[] = [];

        await semaphore.acquire();
        const second = semaphore.acquire().then(() => order.push('second'));
        const third = semaphore.acquire().then(() => order.push('third'));

        semaphore.release();
        await second;
        expect(order).toEqual(['second']);

        semaphore.release();
        await third;
        expect(order).toEqual(['second', 'third']);
    });
});

describe('branch state cloning', () => {
    it('should recognise plain data', () => {
        expect(isPlainData({ a: [1, { b: new Date(0) }], m: new Map([[1, new Set(['x'])]]) })).toBe(true);
        expect(isPlainData(Object.create(null))).toBe(true);
        expect(isPlainData({ fn: () => 1 })).toBe(false);
        expect(isPlainData({ tag: Symbol('x') })).toBe(false);
        expect(isPlainData({ when: new URL('https://example.com') })).toBe(false);
    });

    it('should deep-copy plain state', () => {
        const state = { items: [{ id: 1 }] };
        const copy = cloneStateForBranch(state);

        copy.items[0].id = 2;
        expect(state.items[0].id).toBe(1);
    });

    it('should copy only the top level of anything else', () => {
        class Client {
            calls = 0;
        }
        const state = { client: new Client(), items: [1] };
        const copy = cloneStateForBranch(state);

        expect(copy).not.toBe(state);
        expect(copy.client).toBe(state.client);
        expect(copy.items).toBe(state.items);
    });

    it('should handle cycles', () => {
        const node: { self?: unknown; value: number } = { value: 1 };
        node.self = node;
        const copy = cloneStateForBranch(node);

        expect(copy.self).toBe(copy);
        expect(copy).not.toBe(node);
    });
});
