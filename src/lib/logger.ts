/**
 * Logger interface for engine observability.
 * Callers can plug in their own logger (e.g., pino, winston, console).
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
    debug: (msg, meta) => console.debug(`[weftgraph:DEBUG] ${msg}`, meta ?? ''),
    info: (msg, meta) => console.info(`[weftgraph:INFO] ${msg}`, meta ?? ''),
    warn: (msg, meta) => console.warn(`[weftgraph:WARN] ${msg}`, meta ?? ''),
    error: (msg, meta) => console.error(`[weftgraph:ERROR] ${msg}`, meta ?? ''),
};

/**
 * Log levels for filtering
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

/**
 * Creates a filtered logger that only logs messages at or above the specified level
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const minPriority = LOG_LEVEL_PRIORITY[level];
    const enabled = (target: Exclude<LogLevel, 'silent'>): boolean =>
        LOG_LEVEL_PRIORITY[target] >= minPriority;

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
 * Turn an unknown thrown value into a loggable string.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
