/**
 * Logger interface accepted by the engine, its loaders and adapters.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger handed to adapters and providers, scoped to the plugin.
 */
export type PluginLogger = EngineLogger;

/**
 * Console logger with a bracketed prefix.
 */
export function createConsoleLogger(prefix: string): EngineLogger {
    return {
        debug: (msg, data) => console.debug(`[${prefix}] ${msg}`, data ?? ""),
        info : (msg, data) => console.info(`[${prefix}] ${msg}`, data ?? ""),
        warn : (msg, data) => console.warn(`[${prefix}] ${msg}`, data ?? ""),
        error: (msg, data) => console.error(`[${prefix}] ${msg}`, data ?? ""),
    };
}

/**
 * Wrap a logger so every message carries a scope prefix and fixed fields.
 */
export function createScopedLogger(
    logger: EngineLogger,
    scope: string,
    fields: Record<string, unknown> = {}
): PluginLogger {
    return {
        debug: (msg, data) => logger.debug(`[${scope}] ${msg}`, { ...fields, ...data }),
        info : (msg, data) => logger.info(`[${scope}] ${msg}`, { ...fields, ...data }),
        warn : (msg, data) => logger.warn(`[${scope}] ${msg}`, { ...fields, ...data }),
        error: (msg, data) => logger.error(`[${scope}] ${msg}`, { ...fields, ...data }),
    };
}
