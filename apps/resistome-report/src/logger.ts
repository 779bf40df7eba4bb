/**
 * @fileoverview Structured logging for the report application
 *
 * Implements the engine's EngineLogger contract with level filtering and
 * child loggers that carry fixed context. Entries go to a sink; the
 * default sink writes one line per entry to the console.
 *
 * @module logger
 */

import type { EngineLogger } from "@resistome/engine";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

const kLEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info : 1,
    warn : 2,
    error: 3,
};

const kCOLORS: Record<LogLevel, string> = {
    debug: "\x1b[90m",
    info : "\x1b[36m",
    warn : "\x1b[33m",
    error: "\x1b[31m",
};

/**
 * Writes `[timestamp] [LEVEL] message {context}` to the console.
 */
export const consoleSink: LogSink = (entry) => {
    const prefix = `${kCOLORS[entry.level]}[${entry.timestamp}] [${entry.level.toUpperCase()}]\x1b[0m`;
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const line = `${prefix} ${entry.message}${context}`;

    if (entry.level === "error") {
        console.error(line);
    }
    else {
        console.log(line);
    }
};

export interface AppLoggerOptions {
    level?: LogLevel;
    sink?: LogSink;
    context?: Record<string, unknown>;
}

/**
 * Application logger.
 *
 * @example
 * ```typescript
 * const logger = new AppLogger({ level: "debug" });
 * const runLogger = logger.child({ runId });
 * runLogger.info("Dataset written", { path });
 * ```
 */
export class AppLogger implements EngineLogger {
    readonly level: LogLevel;

    private readonly sink: LogSink;
    private readonly context: Record<string, unknown>;

    constructor(options: AppLoggerOptions = {}) {
        this.level = options.level ?? "info";
        this.sink = options.sink ?? consoleSink;
        this.context = options.context ?? {};
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.emit("debug", message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.emit("info", message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.emit("warn", message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.emit("error", message, data);
    }

    /**
     * Logger sharing this one's level and sink, with extra fixed context.
     */
    child(context: Record<string, unknown>): AppLogger {
        return new AppLogger({
            level  : this.level,
            sink   : this.sink,
            context: { ...this.context, ...context },
        });
    }

    private emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (kLEVEL_PRIORITY[level] < kLEVEL_PRIORITY[this.level]) {
            return;
        }

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
        };

        const context = { ...this.context, ...data };
        if (Object.keys(context).length > 0) {
            entry.context = context;
        }

        try {
            this.sink(entry);
        }
        catch (error) {
            console.error("Logger sink error:", error);
        }
    }
}
