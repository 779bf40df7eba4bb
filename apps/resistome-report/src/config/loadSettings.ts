/**
 * @fileoverview Pipeline Settings Loader
 *
 * Loads thresholds, tool priority, flags, patterns and typing tables
 * from a YAML file.
 *
 * @module config/loadSettings
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    ConfigError,
    errorMessage,
    formatIssues,
    pipelineSettingsSchema,
    type EngineLogger,
    type PipelineSettings,
} from "@resistome/engine";

/**
 * Load pipeline settings from a YAML file. Keys left out take their defaults.
 *
 * @param filePath - Path to pipeline.yml
 * @throws ConfigError if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const settings = loadPipelineSettings("./config/pipeline.yml");
 * settings.thresholds.minIdentity; // 80
 * ```
 */
export function loadPipelineSettings(filePath: string): PipelineSettings {
    if (!existsSync(filePath)) {
        throw new ConfigError(`Pipeline settings file not found: ${filePath}`, { filePath });
    }

    let raw: unknown;
    try {
        raw = parseYaml(readFileSync(filePath, "utf-8"));
    }
    catch (error) {
        throw new ConfigError(`Invalid pipeline settings file: ${filePath}`, { filePath, error: errorMessage(error) }, error);
    }

    // An empty file means "all defaults"
    const parsed = pipelineSettingsSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        throw new ConfigError(`Invalid pipeline settings file: ${filePath}`, {
            filePath,
            issues: formatIssues(parsed.error),
        });
    }

    return parsed.data;
}

/**
 * Load pipeline settings, falling back to the defaults when the file is
 * missing. An invalid file still throws.
 */
export function loadPipelineSettingsWithFallback(filePath: string, logger: EngineLogger): PipelineSettings {
    if (!existsSync(filePath)) {
        logger.warn("Pipeline settings file not found, using defaults", { filePath });
        return getDefaultSettings();
    }

    return loadPipelineSettings(filePath);
}

/**
 * Default pipeline settings.
 */
export function getDefaultSettings(): PipelineSettings {
    return pipelineSettingsSchema.parse({});
}
