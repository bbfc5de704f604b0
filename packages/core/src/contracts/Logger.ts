/**
 * @fileoverview Logger Contract
 *
 * Structured logger interface accepted by managers and games,
 * plus the default console-backed implementation.
 *
 * @module @listkeeper/core/contracts/Logger
 */

/**
 * Logger interface for core components.
 */
export interface ManagerLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Log level threshold. "silent" drops everything.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const kLEVEL_RANK: Record<LogLevel, number> = {
    debug : 10,
    info  : 20,
    warn  : 30,
    error : 40,
    silent: 100,
};

/**
 * Type guard for log level strings (e.g. from environment variables).
 */
export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(kLEVEL_RANK, value);
}

/**
 * Create a console logger that drops messages below the given level.
 *
 * @param level - Minimum level to print (default "info")
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("warn");
 * logger.info("hidden");
 * logger.warn("Question skipped", { index: 2 }); // [WARN] Question skipped { index: 2 }
 * ```
 */
export function createConsoleLogger(level: LogLevel = "info"): ManagerLogger {
    const threshold = kLEVEL_RANK[level];
    const enabled = (candidate: LogLevel): boolean => kLEVEL_RANK[candidate] >= threshold;

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.debug(`[DEBUG] ${msg}`, data ?? "");
        },
        info: (msg, data) => {
            if (enabled("info")) console.info(`[INFO] ${msg}`, data ?? "");
        },
        warn: (msg, data) => {
            if (enabled("warn")) console.warn(`[WARN] ${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[ERROR] ${msg}`, data ?? "");
        },
    };
}

/**
 * Logger that discards everything. Default for managers created without one.
 */
export const silentLogger: ManagerLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
