/**
 * Tracer abstraction for graph observability.
 * Node executions are recorded as spans; state content is opt-in and redacted.
 *
 * Default: recordWrites=true, recordValues=false
 * Production: use PRODUCTION_TRACER_CONFIG
 */

export type SpanAttributes = Record<string, string | number | boolean>;

export interface Span {
    setAttribute(key: string, value: string | number | boolean): void;
    setAttributes(attributes: SpanAttributes): void;
    recordException(error: Error): void;
    addEvent(name: string, attributes?: SpanAttributes): void;
    end(): void;
}

export interface TracerConfig {
    /** Record each node's partial update on its span (default: true) */
    recordWrites?: boolean;
    /** Record the merged state after each node (default: false) */
    recordValues?: boolean;
    /** Maximum content length before truncation (default: 1000) */
    maxContentLength?: number;
    /** Keys whose values are masked (default: ['password', 'apiKey', 'token', 'secret', 'authorization']) */
    sensitiveKeys?: string[];
}

export interface Tracer {
    startSpan(name: string, attributes?: SpanAttributes): Span;
    /** Run `fn` inside a span; exceptions are recorded and rethrown */
    withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T>;
    getConfig(): TracerConfig;
}

export const DEFAULT_TRACER_CONFIG: Required<TracerConfig> = {
    recordWrites: true,
    recordValues: false,
    maxContentLength: 1000,
    sensitiveKeys: ['password', 'apiKey', 'token', 'secret', 'authorization'],
};

export const UNSERIALIZABLE_CONTENT = '[unserializable]';

export const PRODUCTION_TRACER_CONFIG: TracerConfig = {
    recordWrites: false,
    recordValues: false,
    maxContentLength: 200,
};

/**
 * Redact sensitive information from serialized content.
 * Strategy: truncate first, then regex mask.
 */
export function redactContent(
    content: string,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): string {
    const maxLen = config.maxContentLength ?? DEFAULT_TRACER_CONFIG.maxContentLength;
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;

    let result = content;
    if (result.length > maxLen) {
        result = result.substring(0, maxLen) + `... [truncated ${content.length - maxLen} chars]`;
    }

    for (const key of sensitiveKeys) {
        const regex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, 'gi');
        result = result.replace(regex, '$1"[REDACTED]"');
    }

    return result;
}

function toJson(value: unknown): string | null {
    try {
        return JSON.stringify(value);
    } catch {
        return null;
    }
}

/**
 * Serialize a state value for a span event, then redact it.
 * Values JSON cannot represent (BigInt, cycles) are recorded as a placeholder.
 */
export function serializeContent(
    value: unknown,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): string {
    const json = toJson(value);
    return json === null ? UNSERIALIZABLE_CONTENT : redactContent(json, config);
}

/**
 * Flatten arbitrary attributes into span-safe primitives, masking sensitive keys.
 */
export function redactAttributes(
    attributes: Record<string, unknown>,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): SpanAttributes {
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;
    const result: SpanAttributes = {};

    for (const [key, value] of Object.entries(attributes)) {
        const lowerKey = key.toLowerCase();
        const isSensitive = sensitiveKeys.some(sk => lowerKey.includes(sk.toLowerCase()));

        if (isSensitive) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            result[key] = value;
        } else if (value !== null && typeof value === 'object') {
            result[key] = (toJson(value) ?? UNSERIALIZABLE_CONTENT).substring(0, 100);
        } else {
            result[key] = String(value);
        }
    }

    return result;
}

class NoopSpan implements Span {
    setAttribute(_key: string, _value: string | number | boolean): void { }
    setAttributes(_attributes: SpanAttributes): void { }
    recordException(_error: Error): void { }
    addEvent(_name: string, _attributes?: SpanAttributes): void { }
    end(): void { }
}

/**
 * Default tracer when nothing is configured.
 * Its spans discard everything, so it records no content unless asked.
 */
export class NoopTracer implements Tracer {
    private readonly config: TracerConfig;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, recordWrites: false, recordValues: false, ...config };
    }

    startSpan(_name: string, _attributes?: SpanAttributes): Span {
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
 * Console tracer for development.
 */
export class ConsoleTracer implements Tracer {
    private readonly config: Required<TracerConfig>;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes?: SpanAttributes): Span {
        const startTime = Date.now();
        console.log(`[TRACE] START: ${name}`, attributes ? redactAttributes(attributes, this.config) : '');

        return {
            setAttribute: (key, value) => {
                console.log(`[TRACE] ATTR: ${name}.${key} =`, value);
            },
            setAttributes: (attrs) => {
                console.log(`[TRACE] ATTRS: ${name}`, redactAttributes(attrs, this.config));
            },
            recordException: (error) => {
                console.error(`[TRACE] ERROR: ${name}`, error.message);
            },
            addEvent: (eventName, eventAttrs) => {
                console.log(`[TRACE] EVENT: ${name}.${eventName}`, eventAttrs || '');
            },
            end: () => {
                console.log(`[TRACE] END: ${name} (${Date.now() - startTime}ms)`);
            },
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

let globalTracer: Tracer = new NoopTracer();

export function setGlobalTracer(tracer: Tracer): void {
    globalTracer = tracer;
}

export function getGlobalTracer(): Tracer {
    return globalTracer;
}
