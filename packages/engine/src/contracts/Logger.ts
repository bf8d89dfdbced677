/**
 * Logger Contract
 *
 * Every engine component takes an injected logger. The CLI passes a
 * console logger; tests pass vi.fn() stubs.
 */

/**
 * Logger interface for engine components.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Log levels in increasing severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info : 1,
    warn : 2,
    error: 3,
};

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && value in LEVEL_ORDER;
}

/**
 * Create a console logger that drops messages below a minimum level.
 *
 * @param minLevel - Lowest level written (default "info")
 * @param prefix - Optional component prefix, e.g. "[Pipeline]"
 */
export function createConsoleLogger(minLevel: LogLevel = "info", prefix = ""): EngineLogger {
    const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
    const tag = (level: string) => (prefix ? `[${level}] ${prefix}` : `[${level}]`);

    return {
        debug: (msg, data) => enabled("debug") && console.debug(`${tag("DEBUG")} ${msg}`, data ?? ""),
        info : (msg, data) => enabled("info") && console.info(`${tag("INFO")} ${msg}`, data ?? ""),
        warn : (msg, data) => enabled("warn") && console.warn(`${tag("WARN")} ${msg}`, data ?? ""),
        error: (msg, data) => enabled("error") && console.error(`${tag("ERROR")} ${msg}`, data ?? ""),
    };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: EngineLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
