/**
 * @fileoverview Logger Contract
 *
 * Structured logger shared by the engine, its stages and the host application.
 *
 * @module @legal-cascade/engine/contracts/Logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger interface.
 *
 * Messages are short human-readable strings; details go in `data`.
 */
export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Type guard for log level strings read from configuration.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && LOG_LEVELS.some(level => level === value);
}

/**
 * Logger that drops everything. Useful as a default for library callers.
 */
export const silentLogger: Logger = Object.freeze({
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
});
