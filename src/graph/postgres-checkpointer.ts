/**
 * PostgreSQL checkpoint store.
 * Takes any client with pg's `query` shape, such as a `Pool`.
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 * import { PostgresCheckpointStore } from 'weftgraph';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const store = new PostgresCheckpointStore(pool, { tableName: 'graph_checkpoints' });
 *
 * // Create table (run once)
 * await store.createTable();
 * ```
 */

import { z } from 'zod';
import { CheckpointCorruptedError } from '../lib/errors';
import type { Checkpoint, CheckpointStore } from './checkpointer';
import type { StateSerializer } from './serializer';
import { decodeCheckpoint, encodeCheckpoint, jsonSerializer } from './serializer';

/** Postgres client interface (compatible with pg Pool) */
export interface PostgresClient {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }>;
}

/** Postgres checkpoint store configuration */
export interface PostgresCheckpointStoreConfig<S> {
    /** Table name (default: 'weftgraph_checkpoints') */
    tableName?: string;
    /** Schema name (default: 'public') */
    schema?: string;
    serializer?: StateSerializer<S>;
}

const checkpointRowSchema = z.object({
    id: z.string(),
    thread_id: z.string(),
    node_name: z.string(),
    state: z.unknown(),
    metadata: z.unknown(),
    // BIGINT comes back as a string from pg
    timestamp: z.union([z.string(), z.number()]),
    version: z.number(),
});

const COLUMNS = 'id, thread_id, node_name, state, metadata, timestamp, version';

export class PostgresCheckpointStore<S> implements CheckpointStore<S> {
    private readonly client: PostgresClient;
    private readonly tableName: string;
    private readonly schema: string;
    private readonly serializer: StateSerializer<S>;

    constructor(client: PostgresClient, config: PostgresCheckpointStoreConfig<S> = {}) {
        const identifier = /^[A-Za-z_][A-Za-z0-9_]*$/;
        this.tableName = config.tableName ?? 'weftgraph_checkpoints';
        this.schema = config.schema ?? 'public';
        if (!identifier.test(this.tableName) || !identifier.test(this.schema)) {
            throw new Error(`Invalid table or schema name: ${this.schema}.${this.tableName}`);
        }
        this.client = client;
        this.serializer = config.serializer ?? jsonSerializer<S>();
    }

    private get table(): string {
        return `"${this.schema}"."${this.tableName}"`;
    }

    /**
     * Create the checkpoints table if it doesn't exist.
     * Run this during application setup.
     */
    async createTable(): Promise<void> {
        await this.client.query(`
            CREATE TABLE IF NOT EXISTS ${this.table} (
                id TEXT PRIMARY KEY,
                thread_id TEXT NOT NULL,
                node_name TEXT NOT NULL,
                state JSONB NOT NULL,
                metadata JSONB NOT NULL,
                timestamp BIGINT NOT NULL,
                version INTEGER NOT NULL
            )
        `);

        await this.client.query(`
            CREATE INDEX IF NOT EXISTS idx_${this.tableName}_thread_id
            ON ${this.table} (thread_id, timestamp, version)
        `);
    }

    async save(checkpoint: Checkpoint<S>): Promise<void> {
        const record = encodeCheckpoint(checkpoint, this.serializer);

        await this.client.query(
            `INSERT INTO ${this.table} (${COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7)
             ON CONFLICT (id) DO UPDATE SET
                thread_id = EXCLUDED.thread_id,
                node_name = EXCLUDED.node_name,
                state = EXCLUDED.state,
                metadata = EXCLUDED.metadata,
                timestamp = EXCLUDED.timestamp,
                version = EXCLUDED.version`,
            [
                record.id,
                record.threadId,
                record.nodeName,
                JSON.stringify(record.state),
                JSON.stringify(record.metadata),
                record.timestamp,
                record.version,
            ]
        );
    }

    async load(checkpointId: string): Promise<Checkpoint<S> | null> {
        const result = await this.client.query(
            `SELECT ${COLUMNS} FROM ${this.table} WHERE id = $1`,
            [checkpointId]
        );

        if (result.rows.length === 0) return null;
        return this.fromRow(result.rows[0], checkpointId);
    }

    async list(threadId: string): Promise<Checkpoint<S>[]> {
        const result = await this.client.query(
            `SELECT ${COLUMNS} FROM ${this.table}
             WHERE thread_id = $1
             ORDER BY timestamp ASC, version ASC`,
            [threadId]
        );

        return result.rows.map(row => this.fromRow(row, threadId));
    }

    async delete(checkpointId: string): Promise<boolean> {
        const result = await this.client.query(
            `DELETE FROM ${this.table} WHERE id = $1`,
            [checkpointId]
        );
        return (result.rowCount ?? 0) > 0;
    }

    async clear(threadId: string): Promise<number> {
        const result = await this.client.query(
            `DELETE FROM ${this.table} WHERE thread_id = $1`,
            [threadId]
        );
        return result.rowCount ?? 0;
    }

    private fromRow(raw: unknown, idHint: string): Checkpoint<S> {
        const parsed = checkpointRowSchema.safeParse(raw);
        if (!parsed.success) {
            throw new CheckpointCorruptedError(
                idHint,
                parsed.error.errors.map(e => ({ path: e.path, message: e.message })),
            );
        }
        const row = parsed.data;
        return decodeCheckpoint(
            {
                id: row.id,
                threadId: row.thread_id,
                nodeName: row.node_name,
                state: row.state,
                metadata: row.metadata,
                timestamp: Number(row.timestamp),
                version: Number(row.version),
            },
            this.serializer,
            row.id,
        );
    }
}
