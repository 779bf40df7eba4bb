/**
 * @fileoverview Knowledge Base Loader
 *
 * Loads the gene knowledge base from YAML:
 * - a base file (normalization rules, categories, genes, families)
 * - an optional extension directory whose *.yml / *.yaml files add entries
 *
 * @module @resistome/engine/knowledge/KnowledgeBaseLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname } from "path";
import { parse as parseYaml } from "yaml";
import { createConsoleLogger, type EngineLogger } from "../contracts/Logger.js";
import { KnowledgeBaseError, errorMessage, formatIssues } from "../errors.js";
import { GeneKnowledgeBase } from "./GeneKnowledgeBase.js";
import {
    knowledgeBaseExtensionSchema,
    knowledgeBaseSchema,
    type KnowledgeBaseExtension,
} from "./schema.js";

export interface KnowledgeBaseLoaderConfig {
    logger?: EngineLogger;
}

export interface LoadKnowledgeBaseOptions {
    /** Directory of extension files applied after the base file */
    extensionsDir?: string;
    logger?: EngineLogger;
}

const kYAML_EXTENSIONS = new Set([".yml", ".yaml"]);

/**
 * Knowledge Base Loader
 *
 * @example
 * ```typescript
 * const loader = new KnowledgeBaseLoader({ logger });
 * const kb = loader.load("./config/genes.yml", "./config/genes.d");
 * ```
 */
export class KnowledgeBaseLoader {
    private readonly logger: EngineLogger;

    constructor(config: KnowledgeBaseLoaderConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("KnowledgeBaseLoader");
    }

    /**
     * Build a knowledge base from a base file plus an optional extension directory.
     *
     * @throws KnowledgeBaseError if any file is unreadable or invalid
     */
    load(basePath: string, extensionsDir?: string): GeneKnowledgeBase {
        const kb = this.loadFile(basePath);

        if (extensionsDir) {
            this.applyExtensions(kb, extensionsDir);
        }

        this.logger.info("Knowledge base loaded", {
            basePath,
            version   : kb.version,
            genes     : kb.genes.length,
            categories: kb.categories.length,
            families  : kb.familyCount,
        });

        return kb;
    }

    /**
     * Build a knowledge base from a single YAML file.
     */
    loadFile(filePath: string): GeneKnowledgeBase {
        const parsed = knowledgeBaseSchema.safeParse(this.readYaml(filePath) ?? {});
        if (!parsed.success) {
            throw new KnowledgeBaseError(`Invalid knowledge base file: ${filePath}`, {
                filePath,
                issues: formatIssues(parsed.error),
            });
        }

        try {
            return new GeneKnowledgeBase(parsed.data);
        }
        catch (error) {
            throw this.wrap(error, filePath);
        }
    }

    /**
     * Apply every YAML file of a directory, in file-name order.
     * A missing directory is not an error.
     *
     * @returns Number of files applied
     */
    applyExtensions(kb: GeneKnowledgeBase, dirPath: string): number {
        if (!existsSync(dirPath)) {
            this.logger.warn("Knowledge base extension directory does not exist", { dirPath });
            return 0;
        }

        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Knowledge base extension path is not a directory", { dirPath });
            return 0;
        }

        const files = readdirSync(dirPath)
            .filter((file) => kYAML_EXTENSIONS.has(extname(file).toLowerCase()))
            .sort();

        for (const file of files) {
            const filePath = join(dirPath, file);
            const extension = this.readExtension(filePath);
            try {
                kb.extend(extension);
            }
            catch (error) {
                throw this.wrap(error, filePath);
            }
            this.logger.debug("Applied knowledge base extension", { filePath });
        }

        return files.length;
    }

    private readYaml(filePath: string): unknown {
        let content: string;
        try {
            content = readFileSync(filePath, "utf-8");
        }
        catch (error) {
            throw new KnowledgeBaseError(`Cannot read knowledge base file: ${filePath}`, { filePath }, error);
        }

        try {
            return parseYaml(content);
        }
        catch (error) {
            throw new KnowledgeBaseError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`, { filePath }, error);
        }
    }

    private readExtension(filePath: string): KnowledgeBaseExtension {
        const parsed = knowledgeBaseExtensionSchema.safeParse(this.readYaml(filePath) ?? {});
        if (!parsed.success) {
            throw new KnowledgeBaseError(`Invalid knowledge base extension: ${filePath}`, {
                filePath,
                issues: formatIssues(parsed.error),
            });
        }
        return parsed.data;
    }

    private wrap(error: unknown, filePath: string): KnowledgeBaseError {
        if (error instanceof KnowledgeBaseError) {
            return new KnowledgeBaseError(`${error.message} (${filePath})`, { ...error.context, filePath }, error);
        }
        return new KnowledgeBaseError(`Failed to load ${filePath}: ${errorMessage(error)}`, { filePath }, error);
    }
}

/**
 * Shorthand for `new KnowledgeBaseLoader({ logger }).load(path, extensionsDir)`.
 */
export function loadKnowledgeBase(basePath: string, options: LoadKnowledgeBaseOptions = {}): GeneKnowledgeBase {
    return new KnowledgeBaseLoader({ logger: options.logger }).load(basePath, options.extensionsDir);
}
