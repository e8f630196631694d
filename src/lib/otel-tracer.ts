/**
 * OpenTelemetry Tracer adapter.
 *
 * @optional - Only useful when @opentelemetry/api is installed; the types below
 * are structural so the engine never imports it.
 */

import type { AttributeValue, Span, Tracer, TracerConfig } from './tracer';
import { DEFAULT_TRACER_CONFIG, redactAttributes } from './tracer';

interface IOTelSpan {
    setAttribute(key: string, value: AttributeValue): unknown;
    setAttributes(attributes: Record<string, AttributeValue>): unknown;
    recordException(exception: Error): void;
    addEvent(name: string, attributes?: Record<string, AttributeValue>): unknown;
    end(): void;
}

interface IOTelTracer {
    startSpan(name: string, options?: { attributes?: Record<string, AttributeValue> }): IOTelSpan;
}

export interface OTelTracerProvider {
    getTracer(name: string, version?: string): IOTelTracer;
}

class OTelSpanWrapper implements Span {
    constructor(
        private readonly otelSpan: IOTelSpan,
        private readonly config: TracerConfig
    ) { }

    setAttribute(key: string, value: AttributeValue): void {
        const [redacted] = Object.values(redactAttributes({ [key]: value }, this.config));
        this.otelSpan.setAttribute(key, redacted ?? value);
    }

    setAttributes(attributes: Record<string, AttributeValue>): void {
        this.otelSpan.setAttributes(redactAttributes(attributes, this.config));
    }

    recordException(error: Error): void {
        this.otelSpan.recordException(error);
    }

    addEvent(name: string, attributes?: Record<string, AttributeValue>): void {
        this.otelSpan.addEvent(name, attributes ? redactAttributes(attributes, this.config) : undefined);
    }

    end(): void {
        this.otelSpan.end();
    }
}

/**
 * Tracer backed by an OpenTelemetry tracer provider.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 * import { OTelTracer } from 'weftgraph';
 *
 * const tracer = new OTelTracer(trace.getTracerProvider(), { recordState: false });
 * const app = graph.compile({ tracer });
 * ```
 */
export class OTelTracer implements Tracer {
    private readonly otelTracer: IOTelTracer;
    private readonly config: Required<TracerConfig>;

    constructor(provider: OTelTracerProvider, config: TracerConfig = {}, instrumentationName = 'weftgraph') {
        this.otelTracer = provider.getTracer(instrumentationName);
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes?: Record<string, AttributeValue>): Span {
        const otelSpan = this.otelTracer.startSpan(name, {
            attributes: attributes ? redactAttributes(attributes, this.config) : undefined,
        });
        return new OTelSpanWrapper(otelSpan, this.config);
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
