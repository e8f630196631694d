/**
 * Tracer abstraction for observability.
 * Provides pluggable tracing with redaction of recorded state.
 *
 * Default: recordState=false (node updates may carry user data)
 * Development: Use DEBUG_TRACER_CONFIG to see state in spans
 */

import type { Logger } from './logger';
import { consoleLogger } from './logger';

/** Span attribute value */
export type AttributeValue = string | number | boolean;

/** Span interface */
export interface Span {
    /** Set a string attribute */
    setAttribute(key: string, value: AttributeValue): void;
    /** Set multiple attributes */
    setAttributes(attributes: Record<string, AttributeValue>): void;
    /** Record an error */
    recordException(error: Error): void;
    /** Add an event */
    addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
    /** End the span */
    end(): void;
}

/** Tracer configuration */
export interface TracerConfig {
    /** Record node updates and final state on spans (default: false) */
    recordState?: boolean;
    /** Maximum content length before truncation (default: 1000) */
    maxContentLength?: number;
    /** Sensitive keys to mask (default: ['password', 'apiKey', 'token', 'secret', 'authorization']) */
    sensitiveKeys?: string[];
}

/** Tracer interface */
export interface Tracer {
    /** Start a new span */
    startSpan(name: string, attributes?: Record<string, AttributeValue>): Span;
    /** Execute a function within a span */
    withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T>;
    /** Get the tracer config */
    getConfig(): TracerConfig;
}

/** Default configuration */
export const DEFAULT_TRACER_CONFIG: Required<TracerConfig> = {
    recordState: false,
    maxContentLength: 1000,
    sensitiveKeys: ['password', 'apiKey', 'token', 'secret', 'authorization'],
};

/** Development configuration */
export const DEBUG_TRACER_CONFIG: TracerConfig = {
    recordState: true,
    maxContentLength: 4000,
};

/**
 * Redact sensitive information from content.
 * Strategy: mask first, then truncate.
 */
export function redactContent(
    content: string,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): string {
    const maxLen = config.maxContentLength ?? DEFAULT_TRACER_CONFIG.maxContentLength;
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;

    let result = content;
    for (const key of sensitiveKeys) {
        const regex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, 'gi');
        result = result.replace(regex, '$1"[REDACTED]"');
    }

    if (result.length > maxLen) {
        result = result.substring(0, maxLen) + `... [truncated ${result.length - maxLen} chars]`;
    }

    return result;
}

/**
 * Redact attributes based on config.
 */
export function redactAttributes(
    attributes: Record<string, unknown>,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): Record<string, AttributeValue> {
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;
    const result: Record<string, AttributeValue> = {};

    for (const [key, value] of Object.entries(attributes)) {
        const lowerKey = key.toLowerCase();
        const isSensitive = sensitiveKeys.some(sk => lowerKey.includes(sk.toLowerCase()));

        if (isSensitive) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            result[key] = value;
        } else if (value !== null && typeof value === 'object') {
            result[key] = safeStringify(value).substring(0, 100);
        } else {
            result[key] = String(value);
        }
    }

    return result;
}

/**
 * Serialize a state value for a span attribute, honoring recordState.
 * Returns undefined when state recording is off.
 */
export function describeState(value: unknown, config: TracerConfig): string | undefined {
    if (!(config.recordState ?? DEFAULT_TRACER_CONFIG.recordState)) {
        return undefined;
    }
    return redactContent(safeStringify(value), config);
}

function safeStringify(value: unknown): string {
    try {
        return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v)) ?? String(value);
    } catch {
        return '[unserializable]';
    }
}

/**
 * No-op span (for NoopTracer).
 */
class NoopSpan implements Span {
    setAttribute(_key: string, _value: AttributeValue): void { }
    setAttributes(_attributes: Record<string, AttributeValue>): void { }
    recordException(_error: Error): void { }
    addEvent(_name: string, _attributes?: Record<string, AttributeValue>): void { }
    end(): void { }
}

/**
 * No-op tracer (default when no tracing configured).
 */
export class NoopTracer implements Tracer {
    private readonly config: TracerConfig;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(_name: string, _attributes?: Record<string, AttributeValue>): Span {
        return new NoopSpan();
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
        const span = this.startSpan(name);
        try {
            return await fn(span);
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

/**
 * Tracer that writes spans to a Logger at debug level, for development.
 * Every attribute passes through redactAttributes first.
 */
export class LoggerTracer implements Tracer {
    private readonly config: Required<TracerConfig>;

    constructor(config: TracerConfig = {}, private readonly logger: Logger = consoleLogger) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes: Record<string, AttributeValue> = {}): Span {
        const startTime = Date.now();
        const log = (message: string, attrs: Record<string, AttributeValue> = {}) =>
            this.logger.debug(message, { span: name, ...redactAttributes(attrs, this.config) });

        log('Span started', attributes);
        return {
            setAttribute: (key, value) => log('Span attribute', { [key]: value }),
            setAttributes: attrs => log('Span attribute', attrs),
            recordException: error => this.logger.debug('Span exception', { span: name, error: error.message }),
            addEvent: (eventName, eventAttrs) => log(`Span event ${eventName}`, eventAttrs),
            end: () => this.logger.debug('Span ended', { span: name, durationMs: Date.now() - startTime }),
        };
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
        const span = this.startSpan(name);
        try {
            return await fn(span);
        } catch (error) {
            span.recordException(error instanceof Error ? error : new Error(String(error)));
            throw error;
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

/** Global tracer instance */
let globalTracer: Tracer = new NoopTracer();

/**
 * Set the global tracer.
 */
export function setGlobalTracer(tracer: Tracer): void {
    globalTracer = tracer;
}

/**
 * Get the global tracer.
 */
export function getGlobalTracer(): Tracer {
    return globalTracer;
}
