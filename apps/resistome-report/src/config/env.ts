/**
 * @fileoverview Environment configuration
 *
 * Reads run configuration from environment variables (a `.env` file is
 * loaded by the entry point). A positional command-line argument overrides
 * the input directory.
 *
 * @module config/env
 */

import { join, resolve } from "path";
import { z } from "zod";
import { ConfigError, formatIssues } from "@resistome/engine";

const envSchema = z.object({
    RESISTOME_INPUT_DIR                : z.string().min(1).optional(),
    RESISTOME_OUTPUT_DIR               : z.string().min(1).default("./output"),
    RESISTOME_KNOWLEDGE_BASE           : z.string().min(1).optional(),
    RESISTOME_KNOWLEDGE_BASE_EXTENSIONS: z.string().min(1).optional(),
    RESISTOME_PIPELINE_CONFIG          : z.string().min(1).optional(),
    RESISTOME_ADAPTERS_DIR             : z.string().min(1).optional(),
    RESISTOME_WORKERS                  : z.coerce.number().int().positive().optional(),
    LOG_LEVEL                          : z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface AppConfig {
    inputDir: string;
    outputDir: string;
    knowledgeBasePath: string;
    knowledgeBaseExtensionsDir: string;
    pipelineConfigPath: string;

    /** Directory of extra source adapter modules, when configured */
    adaptersDir?: string;

    /** Overrides the worker count of the pipeline settings */
    workerCount?: number;
    logLevel: "debug" | "info" | "warn" | "error";
}

/**
 * Build the application configuration.
 *
 * @param env - Environment variables
 * @param args - Command-line arguments after the script name
 * @param configDir - Directory holding the bundled genes.yml, genes.d and pipeline.yml
 * @throws ConfigError if a variable is invalid or no input directory is given
 */
export function loadAppConfig(
    env: NodeJS.ProcessEnv,
    args: readonly string[],
    configDir: string
): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError("Invalid environment configuration", { issues: formatIssues(parsed.error) });
    }

    const vars = parsed.data;
    const inputDir = args.find((arg) => !arg.startsWith("-")) ?? vars.RESISTOME_INPUT_DIR;
    if (!inputDir) {
        throw new ConfigError("No input directory: pass one as an argument or set RESISTOME_INPUT_DIR");
    }

    return {
        inputDir                  : resolve(inputDir),
        outputDir                 : resolve(vars.RESISTOME_OUTPUT_DIR),
        knowledgeBasePath         : resolve(vars.RESISTOME_KNOWLEDGE_BASE ?? join(configDir, "genes.yml")),
        knowledgeBaseExtensionsDir: resolve(vars.RESISTOME_KNOWLEDGE_BASE_EXTENSIONS ?? join(configDir, "genes.d")),
        pipelineConfigPath        : resolve(vars.RESISTOME_PIPELINE_CONFIG ?? join(configDir, "pipeline.yml")),
        adaptersDir               : vars.RESISTOME_ADAPTERS_DIR ? resolve(vars.RESISTOME_ADAPTERS_DIR) : undefined,
        workerCount               : vars.RESISTOME_WORKERS,
        logLevel                  : vars.LOG_LEVEL,
    };
}
