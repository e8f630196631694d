/**
 * File-based checkpoint store.
 * One JSON file per checkpoint under `<directory>/<threadId>/<checkpointId>.json`.
 *
 * @example
 * ```typescript
 * import { FileCheckpointStore } from 'weftgraph';
 *
 * const store = new FileCheckpointStore({ directory: './.checkpoints' });
 * const app = graph.compile({ checkpointer: { store } });
 * ```
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Checkpoint, CheckpointStore } from './checkpointer';
import { compareCheckpoints } from './checkpointer';
import type { StateSerializer } from './serializer';
import { encodeCheckpoint, jsonSerializer, parseCheckpoint } from './serializer';

/** File checkpoint store configuration */
export interface FileCheckpointStoreConfig<S> {
    /** Root directory; created on first save */
    directory: string;
    /** File permissions (default: 0o600) */
    fileMode?: number;
    serializer?: StateSerializer<S>;
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Make an id safe as a single path segment; reversible and never `.` or `..` */
function toSegment(id: string): string {
    return encodeURIComponent(id).replace(/\./g, '%2E');
}

export class FileCheckpointStore<S> implements CheckpointStore<S> {
    private readonly directory: string;
    private readonly fileMode: number;
    private readonly serializer: StateSerializer<S>;

    constructor(config: FileCheckpointStoreConfig<S>) {
        this.directory = config.directory;
        this.fileMode = config.fileMode ?? 0o600;
        this.serializer = config.serializer ?? jsonSerializer<S>();
    }

    private threadDir(threadId: string): string {
        return path.join(this.directory, toSegment(threadId));
    }

    private checkpointFile(threadId: string, checkpointId: string): string {
        return path.join(this.threadDir(threadId), `${toSegment(checkpointId)}.json`);
    }

    async save(checkpoint: Checkpoint<S>): Promise<void> {
        const dir = this.threadDir(checkpoint.threadId);
        await fs.mkdir(dir, { recursive: true, mode: 0o700 });

        const target = this.checkpointFile(checkpoint.threadId, checkpoint.id);
        const temp = `${target}.tmp`;
        const data = JSON.stringify(encodeCheckpoint(checkpoint, this.serializer), null, 2);

        // Write then rename so readers never see a half-written file
        await fs.writeFile(temp, data, { mode: this.fileMode });
        await fs.rename(temp, target);
    }

    async load(checkpointId: string): Promise<Checkpoint<S> | null> {
        const file = await this.findFile(checkpointId);
        if (!file) return null;
        return this.readFile(file, checkpointId);
    }

    async list(threadId: string): Promise<Checkpoint<S>[]> {
        const dir = this.threadDir(threadId);
        const names = await this.readDir(dir);

        const result: Checkpoint<S>[] = [];
        for (const name of names) {
            if (!name.endsWith('.json')) continue;
            const checkpoint = await this.readFile(path.join(dir, name), decodeURIComponent(name.slice(0, -'.json'.length)));
            if (checkpoint) result.push(checkpoint);
        }

        return result.sort(compareCheckpoints);
    }

    async delete(checkpointId: string): Promise<boolean> {
        const file = await this.findFile(checkpointId);
        if (!file) return false;

        try {
            await fs.unlink(file);
            return true;
        } catch (error) {
            if (isNotFound(error)) return false;
            throw error;
        }
    }

    async clear(threadId: string): Promise<number> {
        const dir = this.threadDir(threadId);
        const names = await this.readDir(dir);
        const count = names.filter(name => name.endsWith('.json')).length;

        await fs.rm(dir, { recursive: true, force: true });
        return count;
    }

    private async readDir(dir: string): Promise<string[]> {
        try {
            return await fs.readdir(dir);
        } catch (error) {
            if (isNotFound(error)) return [];
            throw error;
        }
    }

    private async readFile(file: string, checkpointId: string): Promise<Checkpoint<S> | null> {
        let content: string;
        try {
            content = await fs.readFile(file, 'utf-8');
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
        return parseCheckpoint(content, this.serializer, checkpointId);
    }

    private async findFile(checkpointId: string): Promise<string | null> {
        const fileName = `${toSegment(checkpointId)}.json`;
        let entries: Dirent[];
        try {
            entries = await fs.readdir(this.directory, { withFileTypes: true });
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }

        for (const entry of entries) {
            if (!entry.isDirectory()) continue;
            const candidate = path.join(this.directory, entry.name, fileName);
            try {
                await fs.access(candidate);
                return candidate;
            } catch (error) {
                if (!isNotFound(error)) throw error;
            }
        }
        return null;
    }
}
