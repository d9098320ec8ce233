/**
 * @fileoverview Console Logger
 *
 * Level-filtered logger writing `[LEVEL] message` lines through the console,
 * plus a scoping helper that prefixes messages and stamps a trace ID.
 *
 * @module @legal-cascade/engine/impl/ConsoleLogger
 */

import { LOG_LEVELS, type Logger, type LogLevel } from "../contracts/Logger.js";

export interface ConsoleLoggerOptions {
    /** Minimum level written (default: info) */
    readonly level?: LogLevel;

    /** Optional prefix, rendered as `[prefix]` after the level tag */
    readonly prefix?: string;

    /** Write every level to stderr, keeping stdout for program output */
    readonly stderr?: boolean;
}

function rank(level: LogLevel): number {
    return LOG_LEVELS.indexOf(level);
}

/**
 * Create a console-backed logger.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: "debug", prefix: "classifier" });
 * logger.info("Classified", { category: "Asylum & Refugee" });
 * // [INFO] [classifier] Classified { category: 'Asylum & Refugee' }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const threshold = rank(options.level ?? "info");
    const tag = options.prefix ? ` [${options.prefix}]` : "";

    const write = (level: LogLevel, sink: (...args: unknown[]) => void) =>
        (message: string, data?: Record<string, unknown>): void => {
            if (rank(level) < threshold) {
                return;
            }
            sink(`[${level.toUpperCase()}]${tag} ${message}`, data ?? "");
        };

    if (options.stderr) {
        return Object.freeze({
            debug: write("debug", console.error),
            info : write("info", console.error),
            warn : write("warn", console.error),
            error: write("error", console.error),
        });
    }

    return Object.freeze({
        debug: write("debug", console.debug),
        info : write("info", console.info),
        warn : write("warn", console.warn),
        error: write("error", console.error),
    });
}

/**
 * Derive a logger that prefixes messages with `[scope]` and merges
 * `traceId` into every data record.
 */
export function childLogger(parent: Logger, scope: string, traceId?: string): Logger {
    const merge = (data?: Record<string, unknown>): Record<string, unknown> | undefined =>
        traceId === undefined ? data : { ...data, traceId };

    return Object.freeze({
        debug: (msg: string, data?: Record<string, unknown>) => parent.debug(`[${scope}] ${msg}`, merge(data)),
        info : (msg: string, data?: Record<string, unknown>) => parent.info(`[${scope}] ${msg}`, merge(data)),
        warn : (msg: string, data?: Record<string, unknown>) => parent.warn(`[${scope}] ${msg}`, merge(data)),
        error: (msg: string, data?: Record<string, unknown>) => parent.error(`[${scope}] ${msg}`, merge(data)),
    });
}
