/**
 * State serialization for persistent checkpoint stores.
 *
 * Values JSON cannot carry (Date, Map, Set, bigint, undefined, non-finite
 * numbers) are written as tagged objects `{ "__type": ..., "value": ... }`.
 */

import { z } from 'zod';
import { CheckpointCorruptedError } from '../lib/errors';
import type { ValidationErrorItem } from '../lib/errors';
import type { Checkpoint } from './checkpointer';

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface StateSerializer<S> {
    /** Turn state into a JSON-safe value */
    serialize(state: S): JsonValue;
    /** Rebuild state from what serialize() produced */
    deserialize(data: unknown): S;
}

const TYPE_KEY = '__type';

// ============================================================================
// Tagged JSON encoding
// ============================================================================

export function encodeValue(value: unknown, path = '$'): JsonValue {
    if (value === null) return null;

    switch (typeof value) {
        case 'string':
        case 'boolean':
            return value;
        case 'number':
            return Number.isFinite(value) ? value : { [TYPE_KEY]: 'Number', value: String(value) };
        case 'undefined':
            return { [TYPE_KEY]: 'undefined' };
        case 'bigint':
            return { [TYPE_KEY]: 'BigInt', value: value.toString() };
        case 'function':
        case 'symbol':
            throw new TypeError(`Cannot serialize ${typeof value} at ${path}`);
        default:
            break;
    }

    if (value instanceof Date) {
        const time = value.getTime();
        // An invalid date has a NaN time, which JSON would turn into null
        return { [TYPE_KEY]: 'Date', value: Number.isFinite(time) ? time : String(time) };
    }
    if (value instanceof Map) {
        return {
            [TYPE_KEY]: 'Map',
            value: [...value].map(([k, v], i) => [encodeValue(k, `${path}<key ${i}>`), encodeValue(v, `${path}<value ${i}>`)]),
        };
    }
    if (value instanceof Set) {
        return { [TYPE_KEY]: 'Set', value: [...value].map((item, i) => encodeValue(item, `${path}[${i}]`)) };
    }
    if (Array.isArray(value)) {
        return value.map((item, i) => encodeValue(item, `${path}[${i}]`));
    }

    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
        out[key] = encodeValue(item, `${path}.${key}`);
    }
    // A plain object that happens to use the tag key is wrapped so it decodes as itself
    return TYPE_KEY in out ? { [TYPE_KEY]: 'Object', value: out } : out;
}

export function decodeValue(data: unknown): unknown {
    if (Array.isArray(data)) {
        return data.map(item => decodeValue(item));
    }
    if (data === null || typeof data !== 'object') {
        return data;
    }

    const tag: unknown = Reflect.get(data, TYPE_KEY);
    const payload: unknown = Reflect.get(data, 'value');
    if (typeof tag === 'string') {
        switch (tag) {
            case 'undefined':
                return undefined;
            case 'Number':
                return Number(payload);
            case 'BigInt':
                if (typeof payload === 'string') return BigInt(payload);
                break;
            case 'Date':
                if (typeof payload === 'number' || typeof payload === 'string') return new Date(payload);
                break;
            case 'Map':
                if (Array.isArray(payload)) {
                    return new Map(payload.map((entry: unknown): [unknown, unknown] =>
                        Array.isArray(entry) ? [decodeValue(entry[0]), decodeValue(entry[1])] : [undefined, undefined]));
                }
                break;
            case 'Set':
                if (Array.isArray(payload)) return new Set(payload.map(item => decodeValue(item)));
                break;
            case 'Object':
                return decodePlainObject(payload);
            default:
                break;
        }
    }

    return decodePlainObject(data);
}

function decodePlainObject(data: unknown): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    if (data === null || typeof data !== 'object') return out;
    for (const [key, item] of Object.entries(data)) {
        out[key] = decodeValue(item);
    }
    return out;
}

// ============================================================================
// Serializers
// ============================================================================

/**
 * Tagged-JSON serializer. Decoded values are trusted to match S; use
 * zodSerializer() to check them.
 */
export function jsonSerializer<S>(): StateSerializer<S> {
    return {
        serialize: state => encodeValue(state),
        deserialize: data => decodeValue(data) as S,
    };
}

/**
 * Tagged-JSON serializer that validates decoded state with a zod schema.
 * Throws the schema's ZodError when the stored state does not match.
 */
export function zodSerializer<S>(schema: z.ZodType<S, z.ZodTypeDef, unknown>): StateSerializer<S> {
    return {
        serialize: state => encodeValue(state),
        deserialize: data => schema.parse(decodeValue(data)),
    };
}

// ============================================================================
// Persisted checkpoint envelope
// ============================================================================

export interface PersistedCheckpoint {
    id: string;
    threadId: string;
    nodeName: string;
    state: JsonValue;
    metadata: JsonValue;
    timestamp: number;
    version: number;
}

const persistedCheckpointSchema = z.object({
    id: z.string().min(1),
    threadId: z.string().min(1),
    nodeName: z.string(),
    state: z.unknown(),
    metadata: z.unknown(),
    timestamp: z.number().finite(),
    version: z.number().int().nonnegative(),
});

const metadataSchema = z.object({
    source: z.enum(['step', 'interrupt', 'end', 'update']),
    step: z.number().int().nonnegative(),
    next: z.array(z.string()),
    completed: z.array(z.string()),
}).passthrough();

export function encodeCheckpoint<S>(checkpoint: Checkpoint<S>, serializer: StateSerializer<S>): PersistedCheckpoint {
    return {
        id: checkpoint.id,
        threadId: checkpoint.threadId,
        nodeName: checkpoint.nodeName,
        state: serializer.serialize(checkpoint.state),
        metadata: encodeValue(checkpoint.metadata),
        timestamp: checkpoint.timestamp,
        version: checkpoint.version,
    };
}

function toItems(error: z.ZodError, prefix: (string | number)[] = []): ValidationErrorItem[] {
    return error.errors.map(e => ({ path: [...prefix, ...e.path], message: e.message }));
}

/**
 * Validate and decode a stored record.
 *
 * @param idHint - id to report when the record is too broken to carry its own
 * @throws CheckpointCorruptedError
 */
export function decodeCheckpoint<S>(raw: unknown, serializer: StateSerializer<S>, idHint: string): Checkpoint<S> {
    const envelope = persistedCheckpointSchema.safeParse(raw);
    if (!envelope.success) {
        throw new CheckpointCorruptedError(idHint, toItems(envelope.error));
    }
    const record = envelope.data;

    const metadata = metadataSchema.safeParse(decodeValue(record.metadata));
    if (!metadata.success) {
        throw new CheckpointCorruptedError(record.id, toItems(metadata.error, ['metadata']));
    }

    let state: S;
    try {
        state = serializer.deserialize(record.state);
    } catch (error) {
        if (error instanceof z.ZodError) {
            throw new CheckpointCorruptedError(record.id, toItems(error, ['state']));
        }
        throw error;
    }

    return {
        id: record.id,
        threadId: record.threadId,
        nodeName: record.nodeName,
        state,
        metadata: metadata.data,
        timestamp: record.timestamp,
        version: record.version,
    };
}

/**
 * Parse a stored JSON string and decode it.
 *
 * @throws CheckpointCorruptedError
 */
export function parseCheckpoint<S>(text: string, serializer: StateSerializer<S>, idHint: string): Checkpoint<S> {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch {
        throw new CheckpointCorruptedError(idHint, [{ path: [], message: 'Invalid JSON' }]);
    }
    return decodeCheckpoint(raw, serializer, idHint);
}
