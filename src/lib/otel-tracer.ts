/**
 * OpenTelemetry Tracer adapter.
 * Structurally typed over @opentelemetry/api so the package stays optional.
 */

import type { Span, SpanAttributes, Tracer, TracerConfig } from './tracer';
import { DEFAULT_TRACER_CONFIG, redactAttributes } from './tracer';

/** Subset of the OTel Span API used here */
interface IOTelSpan {
    setAttribute(key: string, value: string | number | boolean): unknown;
    setAttributes(attributes: SpanAttributes): unknown;
    recordException(exception: Error): void;
    addEvent(name: string, attributes?: SpanAttributes): unknown;
    end(): void;
}

interface IOTelTracer {
    startSpan(name: string, options?: { attributes?: SpanAttributes }): IOTelSpan;
}

export interface IOTelTracerProvider {
    getTracer(name: string, version?: string): IOTelTracer;
}

class OTelSpanWrapper implements Span {
    constructor(
        private readonly otelSpan: IOTelSpan,
        private readonly config: TracerConfig
    ) { }

    setAttribute(key: string, value: string | number | boolean): void {
        this.otelSpan.setAttribute(key, value);
    }

    setAttributes(attributes: SpanAttributes): void {
        this.otelSpan.setAttributes(redactAttributes(attributes, this.config));
    }

    recordException(error: Error): void {
        this.otelSpan.recordException(error);
    }

    addEvent(name: string, attributes?: SpanAttributes): void {
        this.otelSpan.addEvent(name, attributes ? redactAttributes(attributes, this.config) : undefined);
    }

    end(): void {
        this.otelSpan.end();
    }
}

/**
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 * import { OTelTracer, setGlobalTracer } from 'checkpoint-graph';
 *
 * setGlobalTracer(new OTelTracer(trace.getTracerProvider(), { recordWrites: false }));
 * ```
 */
export class OTelTracer implements Tracer {
    private readonly otelTracer: IOTelTracer;
    private readonly config: Required<TracerConfig>;

    constructor(provider: IOTelTracerProvider, config: TracerConfig = {}) {
        this.otelTracer = provider.getTracer('checkpoint-graph', '0.1.0');
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes?: SpanAttributes): Span {
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
