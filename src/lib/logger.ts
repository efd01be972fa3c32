/**
 * Logger interface for engine observability.
 * Callers can plug in their own sink (e.g., pino, winston, console).
 */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Default no-op logger (silent)
 */
export const noopLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { },
};

/**
 * Console logger for development/debugging
 */
export const consoleLogger: Logger = {
    debug: (msg, meta) => console.debug(`[Graph:DEBUG] ${msg}`, meta ?? ''),
    info: (msg, meta) => console.info(`[Graph:INFO] ${msg}`, meta ?? ''),
    warn: (msg, meta) => console.warn(`[Graph:WARN] ${msg}`, meta ?? ''),
    error: (msg, meta) => console.error(`[Graph:ERROR] ${msg}`, meta ?? ''),
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Creates a filtered logger that only forwards messages at or above `level`.
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const minPriority = LOG_LEVEL_PRIORITY[level];
    const enabled = (msgLevel: Exclude<LogLevel, 'silent'>) => LOG_LEVEL_PRIORITY[msgLevel] >= minPriority;

    return {
        debug: (msg, meta) => {
            if (enabled('debug')) baseLogger.debug(msg, meta);
        },
        info: (msg, meta) => {
            if (enabled('info')) baseLogger.info(msg, meta);
        },
        warn: (msg, meta) => {
            if (enabled('warn')) baseLogger.warn(msg, meta);
        },
        error: (msg, meta) => {
            if (enabled('error')) baseLogger.error(msg, meta);
        },
    };
}

/**
 * Bind fixed metadata (thread id, graph name) onto every record.
 * Per-call metadata wins on key collisions.
 */
export function withLogContext(baseLogger: Logger, context: Record<string, unknown>): Logger {
    const bind = (meta?: Record<string, unknown>) => ({ ...context, ...meta });

    return {
        debug: (msg, meta) => baseLogger.debug(msg, bind(meta)),
        info: (msg, meta) => baseLogger.info(msg, bind(meta)),
        warn: (msg, meta) => baseLogger.warn(msg, bind(meta)),
        error: (msg, meta) => baseLogger.error(msg, bind(meta)),
    };
}
