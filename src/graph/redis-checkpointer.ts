/**
 * Redis checkpoint store.
 * Takes an ioredis instance or any client with the same commands.
 *
 * Layout: `<prefix>checkpoint:<id>` holds the JSON record and
 * `<prefix>thread:<threadId>` is a set of the thread's checkpoint ids.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { RedisCheckpointStore } from 'weftgraph';
 *
 * const redis = new Redis('redis://localhost:6379');
 * const store = new RedisCheckpointStore(redis, { prefix: 'myapp:', ttlSeconds: 86400 });
 * ```
 */

import type { Checkpoint, CheckpointStore } from './checkpointer';
import { compareCheckpoints } from './checkpointer';
import type { StateSerializer } from './serializer';
import { encodeCheckpoint, jsonSerializer, parseCheckpoint } from './serializer';

/** Redis client interface (compatible with ioredis) */
export interface RedisClient {
    set(key: string, value: string, exMode?: 'EX', time?: number): Promise<'OK' | null>;
    get(key: string): Promise<string | null>;
    del(...keys: string[]): Promise<number>;
    smembers(key: string): Promise<string[]>;
    sadd(key: string, ...members: string[]): Promise<number>;
    srem(key: string, ...members: string[]): Promise<number>;
    expire(key: string, seconds: number): Promise<number>;
}

/** Redis checkpoint store configuration */
export interface RedisCheckpointStoreConfig<S> {
    /** Key prefix (default: 'weftgraph:') */
    prefix?: string;
    /** TTL in seconds (default: no expiry) */
    ttlSeconds?: number;
    serializer?: StateSerializer<S>;
}

export class RedisCheckpointStore<S> implements CheckpointStore<S> {
    private readonly redis: RedisClient;
    private readonly prefix: string;
    private readonly ttlSeconds?: number;
    private readonly serializer: StateSerializer<S>;

    constructor(client: RedisClient, config: RedisCheckpointStoreConfig<S> = {}) {
        this.redis = client;
        this.prefix = config.prefix ?? 'weftgraph:';
        this.ttlSeconds = config.ttlSeconds;
        this.serializer = config.serializer ?? jsonSerializer<S>();
    }

    private checkpointKey(id: string): string {
        return `${this.prefix}checkpoint:${id}`;
    }

    private threadKey(threadId: string): string {
        return `${this.prefix}thread:${threadId}`;
    }

    async save(checkpoint: Checkpoint<S>): Promise<void> {
        const key = this.checkpointKey(checkpoint.id);
        const data = JSON.stringify(encodeCheckpoint(checkpoint, this.serializer));

        if (this.ttlSeconds) {
            await this.redis.set(key, data, 'EX', this.ttlSeconds);
        } else {
            await this.redis.set(key, data);
        }

        // Add to thread index
        const threadKey = this.threadKey(checkpoint.threadId);
        await this.redis.sadd(threadKey, checkpoint.id);
        if (this.ttlSeconds) {
            await this.redis.expire(threadKey, this.ttlSeconds);
        }
    }

    async load(checkpointId: string): Promise<Checkpoint<S> | null> {
        const data = await this.redis.get(this.checkpointKey(checkpointId));
        return data ? parseCheckpoint(data, this.serializer, checkpointId) : null;
    }

    async list(threadId: string): Promise<Checkpoint<S>[]> {
        const threadKey = this.threadKey(threadId);
        const ids = await this.redis.smembers(threadKey);
        const result: Checkpoint<S>[] = [];
        const expired: string[] = [];

        for (const id of ids) {
            const data = await this.redis.get(this.checkpointKey(id));
            if (data) {
                result.push(parseCheckpoint(data, this.serializer, id));
            } else {
                expired.push(id);
            }
        }

        // Records that expired on their own leave stale ids in the index
        if (expired.length > 0) {
            await this.redis.srem(threadKey, ...expired);
        }

        return result.sort(compareCheckpoints);
    }

    async delete(checkpointId: string): Promise<boolean> {
        const checkpoint = await this.load(checkpointId);
        if (!checkpoint) return false;

        await this.redis.del(this.checkpointKey(checkpointId));
        await this.redis.srem(this.threadKey(checkpoint.threadId), checkpointId);

        return true;
    }

    async clear(threadId: string): Promise<number> {
        const ids = await this.redis.smembers(this.threadKey(threadId));
        if (ids.length === 0) return 0;

        const removed = await this.redis.del(...ids.map(id => this.checkpointKey(id)));
        await this.redis.del(this.threadKey(threadId));

        return removed;
    }
}
