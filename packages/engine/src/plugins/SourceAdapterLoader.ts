/**
 * @fileoverview Source Adapter Loader
 *
 * Loads source adapters from code files (.js / .mjs) so new tool formats
 * can be supported without touching the engine or the app.
 *
 * A file may export adapters under any name, as its default export, or as
 * an array in its default export.
 *
 * @module @resistome/engine/plugins/SourceAdapterLoader
 */

import { readdirSync, existsSync, statSync } from "fs";
import { join, extname } from "path";
import { pathToFileURL } from "url";
import { isSourceAdapter, type SourceAdapter } from "../contracts/SourceAdapter.js";
import { createConsoleLogger, type EngineLogger } from "../contracts/Logger.js";
import { errorMessage } from "../errors.js";

export interface SourceAdapterLoaderConfig {
    logger?: EngineLogger;
}

const kCODE_EXTENSIONS = new Set([".js", ".mjs"]);

/**
 * Source Adapter Loader
 *
 * @example
 * ```typescript
 * const loader = new SourceAdapterLoader({ logger });
 * const extra = await loader.loadFromDirectory("./adapters");
 * const adapters = [...builtInAdapters, ...extra];
 * ```
 */
export class SourceAdapterLoader {
    private readonly logger: EngineLogger;

    constructor(config: SourceAdapterLoaderConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("SourceAdapterLoader");
    }

    /**
     * Load all adapters from a directory.
     *
     * Files that fail to import are logged and skipped.
     */
    async loadFromDirectory(dirPath: string): Promise<SourceAdapter[]> {
        const adapters: SourceAdapter[] = [];

        if (!existsSync(dirPath)) {
            this.logger.warn("Adapter directory does not exist", { dirPath });
            return adapters;
        }

        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Adapter path is not a directory", { dirPath });
            return adapters;
        }

        const files = readdirSync(dirPath)
            .filter((file) => kCODE_EXTENSIONS.has(extname(file).toLowerCase()))
            .sort();

        for (const file of files) {
            const filePath = join(dirPath, file);
            try {
                adapters.push(...await this.loadCodeFile(filePath));
            }
            catch (error) {
                this.logger.error("Failed to load adapter file", {
                    filePath,
                    error: errorMessage(error),
                });
            }
        }

        this.logger.info("Adapters loaded from directory", {
            dirPath,
            adapters: adapters.length,
        });

        return adapters;
    }

    /**
     * Load adapters exported by one code file.
     */
    async loadCodeFile(filePath: string): Promise<SourceAdapter[]> {
        const adapters: SourceAdapter[] = [];
        const loaded: unknown = await import(pathToFileURL(filePath).href);

        if (typeof loaded !== "object" || loaded === null) {
            return adapters;
        }

        const exports: [string, unknown][] = Object.entries(loaded);
        for (const [key, exported] of exports) {
            const candidates: unknown[] = Array.isArray(exported) ? exported : [exported];
            for (const candidate of candidates) {
                if (isSourceAdapter(candidate) && !adapters.includes(candidate)) {
                    adapters.push(candidate);
                    this.logger.debug("Loaded code adapter", { id: candidate.id, export: key });
                }
            }
        }

        return adapters;
    }
}
