/**
 * Scoped stderr logger
 *
 * stdout belongs to the MCP stdio transport, so everything goes to stderr.
 * Only errors are printed while running under the test runner.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

function isTestEnvironment(): boolean {
    return process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";
}

export function createLogger(scope: string): Logger {
    const emit = (level: LogLevel, message: string, details: unknown[]) => {
        if (level !== "error" && isTestEnvironment()) {
            return;
        }
        if (level === "debug" && !process.env.DEBUG) {
            return;
        }
        console.error(`[${scope}] ${message}`, ...details);
    };

    return {
        debug: (message, ...details) => emit("debug", message, details),
        info: (message, ...details) => emit("info", message, details),
        warn: (message, ...details) => emit("warn", message, details),
        error: (message, ...details) => emit("error", message, details),
    };
}
