/**
 * @fileoverview Tool Output Provider
 *
 * Implements the SampleProvider contract over a directory of tool output
 * files. Each file is handed to the first adapter that matches its name;
 * records are grouped by the sample they name.
 *
 * @module domain/providers/ToolOutputProvider
 */

import { readFile, readdir, stat } from "fs/promises";
import { basename, join, relative } from "path";
import {
    ConfigError,
    createScopedLogger,
    errorMessage,
    type EngineLogger,
    type ProviderFailure,
    type RawHit,
    type SampleBatch,
    type SampleInput,
    type SampleProvider,
    type SourceAdapter,
    type TypingRecord,
} from "@resistome/engine";

/**
 * Configuration for the tool output provider
 */
export interface ToolOutputProviderConfig {
    /** Directory searched recursively for tool output files */
    inputDir: string;

    /** Adapters in priority order */
    adapters: readonly SourceAdapter[];

    logger: EngineLogger;
}

interface SampleRecords {
    hits: RawHit[];
    typing: TypingRecord[];
}

/**
 * Tool Output Provider
 *
 * @example
 * ```typescript
 * const provider = new ToolOutputProvider({
 *     inputDir: "./results",
 *     adapters: createBuiltInAdapters(),
 *     logger,
 * });
 *
 * await provider.initialize();
 * const { samples, failures } = await provider.getSamples();
 * ```
 */
export class ToolOutputProvider implements SampleProvider {
    readonly id = "tool-output-provider";
    readonly name = "Tool Output Provider";
    readonly description = "Gathers samples from a directory of AMR and typing tool reports";

    private readonly config: ToolOutputProviderConfig;
    private initialized: boolean = false;

    constructor(config: ToolOutputProviderConfig) {
        this.config = config;
    }

    /**
     * Check that the input directory exists.
     *
     * @throws ConfigError if it is missing or not a directory
     */
    async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }

        const { inputDir } = this.config;
        let isDirectory: boolean;
        try {
            isDirectory = (await stat(inputDir)).isDirectory();
        }
        catch (error) {
            throw new ConfigError(`Input directory not found: ${inputDir}`, { inputDir }, error);
        }

        if (!isDirectory) {
            throw new ConfigError(`Input path is not a directory: ${inputDir}`, { inputDir });
        }

        this.initialized = true;
    }

    /**
     * Parse every recognized file under the input directory.
     */
    async getSamples(): Promise<SampleBatch> {
        if (!this.initialized) {
            throw new Error("Provider not initialized. Call initialize() first.");
        }

        const { inputDir, adapters, logger } = this.config;
        const records = new Map<string, SampleRecords>();
        const failures: ProviderFailure[] = [];

        for (const filePath of await this.listFiles(inputDir)) {
            const fileName = basename(filePath);
            const source = relative(inputDir, filePath);
            const adapter = adapters.find((candidate) => candidate.matches(fileName));

            if (!adapter) {
                logger.debug("No adapter for file", { source });
                continue;
            }

            try {
                const content = await readFile(filePath, "utf-8");
                const output = adapter.parse(content, {
                    fileName,
                    logger: createScopedLogger(logger, adapter.id, { source }),
                });

                for (const hit of output.hits) {
                    this.recordsFor(records, hit.sampleId).hits.push(hit);
                }
                for (const record of output.typing) {
                    this.recordsFor(records, record.sampleId).typing.push(record);
                }

                // A report with no rows still tells us the sample was analyzed
                const named = adapter.sampleIdFor?.(fileName);
                if (output.hits.length === 0 && output.typing.length === 0 && named) {
                    this.recordsFor(records, named);
                }

                logger.debug("Parsed tool output", {
                    source,
                    adapterId: adapter.id,
                    hits     : output.hits.length,
                    typing   : output.typing.length,
                });
            }
            catch (error) {
                const failure: ProviderFailure = {
                    sampleId: adapter.sampleIdFor?.(fileName),
                    source,
                    reason  : errorMessage(error),
                };
                failures.push(failure);
                logger.warn("Unreadable tool output", { ...failure, adapterId: adapter.id });
            }
        }

        const samples: SampleInput[] = [...records.keys()]
            .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
            .map((sampleId) => {
                const { hits, typing } = this.recordsFor(records, sampleId);
                return { sampleId, hits, typing };
            });

        return { samples, failures };
    }

    async shutdown(): Promise<void> {
        this.initialized = false;
    }

    private recordsFor(records: Map<string, SampleRecords>, sampleId: string): SampleRecords {
        let entry = records.get(sampleId);
        if (!entry) {
            entry = { hits: [], typing: [] };
            records.set(sampleId, entry);
        }
        return entry;
    }

    /**
     * Files under a directory, recursively, in path order.
     */
    private async listFiles(dirPath: string): Promise<string[]> {
        const entries = await readdir(dirPath, { withFileTypes: true });
        const files: string[] = [];

        for (const entry of entries) {
            const entryPath = join(dirPath, entry.name);
            if (entry.isDirectory()) {
                files.push(...await this.listFiles(entryPath));
            }
            else if (entry.isFile()) {
                files.push(entryPath);
            }
        }

        return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }
}
