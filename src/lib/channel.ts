/**
 * Bounded single-consumer async channel.
 *
 * `send()` resolves once the value is buffered (or handed straight to a waiting
 * reader), so a full buffer applies back-pressure to the producer. A capacity of 0
 * makes every send a rendezvous with a reader.
 */

interface PendingSend<T> {
    value: T;
    resolve: (accepted: boolean) => void;
}

export class AsyncChannel<T> implements AsyncIterable<T> {
    private readonly buffer: Array<{ value: T }> = [];
    private readonly pendingSends: PendingSend<T>[] = [];
    private readonly waitingReaders: Array<(result: IteratorResult<T>) => void> = [];
    private closed = false;

    constructor(private readonly capacity: number = 16) {
        if (!Number.isInteger(capacity) || capacity < 0) {
            throw new RangeError(`Channel capacity must be a non-negative integer, got ${capacity}`);
        }
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Number of values buffered or waiting to be buffered. */
    get size(): number {
        return this.buffer.length + this.pendingSends.length;
    }

    /**
     * Deliver a value. Resolves `false` if the channel was closed or cancelled
     * before the value was accepted.
     */
    send(value: T): Promise<boolean> {
        if (this.closed) {
            return Promise.resolve(false);
        }

        const reader = this.waitingReaders.shift();
        if (reader) {
            reader({ value, done: false });
            return Promise.resolve(true);
        }

        if (this.buffer.length < this.capacity) {
            this.buffer.push({ value });
            return Promise.resolve(true);
        }

        return new Promise<boolean>(resolve => {
            this.pendingSends.push({ value, resolve });
        });
    }

    /**
     * Stop accepting values. Buffered values stay readable.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;

        // Senders blocked on a full buffer keep their place; readers drain them.
        if (this.buffer.length === 0 && this.pendingSends.length === 0) {
            this.flushReaders();
        }
    }

    /**
     * Close and discard everything still buffered.
     */
    cancel(): void {
        this.closed = true;
        this.buffer.length = 0;
        for (const pending of this.pendingSends.splice(0)) {
            pending.resolve(false);
        }
        this.flushReaders();
    }

    /**
     * Read the next value; `done` once the channel is closed and drained.
     */
    receive(): Promise<IteratorResult<T>> {
        const buffered = this.buffer.shift();
        if (buffered) {
            this.promotePendingSend();
            return Promise.resolve({ value: buffered.value, done: false });
        }

        const pending = this.pendingSends.shift();
        if (pending) {
            pending.resolve(true);
            return Promise.resolve({ value: pending.value, done: false });
        }

        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }

        return new Promise(resolve => {
            this.waitingReaders.push(resolve);
        });
    }

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
        while (true) {
            const next = await this.receive();
            if (next.done) return;
            yield next.value;
        }
    }

    private promotePendingSend(): void {
        const pending = this.pendingSends.shift();
        if (pending) {
            this.buffer.push({ value: pending.value });
            pending.resolve(true);
        }
    }

    private flushReaders(): void {
        for (const reader of this.waitingReaders.splice(0)) {
            reader({ value: undefined, done: true });
        }
    }
}
