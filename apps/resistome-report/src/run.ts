/**
 * @fileoverview Report run
 *
 * Wires the knowledge base, pipeline settings and source adapters into a
 * CohortEngine, runs it over the input directory and writes the dataset.
 *
 * Adapter order:
 * 1. Built-in adapters (AMRFinderPlus, ABRicate, mlst, Kaptive)
 * 2. Adapter modules from the configured adapters directory
 *
 * @module run
 */

import {
    CohortEngine,
    SourceAdapterLoader,
    loadKnowledgeBase,
    type CohortDataset,
    type SourceAdapter,
} from "@resistome/engine";
import type { AppConfig } from "./config/index.js";
import { loadPipelineSettingsWithFallback } from "./config/index.js";
import { ToolOutputProvider, createBuiltInAdapters } from "./domain/index.js";
import type { AppLogger } from "./logger.js";
import { writeDataset } from "./report/datasetJson.js";

export interface ReportResult {
    dataset: CohortDataset;
    outputPath: string;
}

export interface RunReportOptions {
    /** Correlation id for the run (generated when absent) */
    runId?: string;
}

/**
 * Source adapters for a run, built-ins first.
 */
export async function createAdapters(config: AppConfig, logger: AppLogger): Promise<SourceAdapter[]> {
    const adapters = createBuiltInAdapters();

    if (config.adaptersDir) {
        const loader = new SourceAdapterLoader({ logger: logger.child({ component: "SourceAdapterLoader" }) });
        const extra = await loader.loadFromDirectory(config.adaptersDir);
        adapters.push(...extra);
        logger.info("Loaded adapter modules", { adaptersDir: config.adaptersDir, count: extra.length });
    }

    return adapters;
}

/**
 * Run the pipeline over the input directory and write the dataset.
 *
 * @throws ConfigError or KnowledgeBaseError on invalid configuration
 */
export async function runReport(
    config: AppConfig,
    logger: AppLogger,
    options: RunReportOptions = {}
): Promise<ReportResult> {
    const knowledgeBase = loadKnowledgeBase(config.knowledgeBasePath, {
        extensionsDir: config.knowledgeBaseExtensionsDir,
        logger       : logger.child({ component: "KnowledgeBaseLoader" }),
    });
    logger.info("Loaded gene knowledge base", {
        version   : knowledgeBase.version,
        genes     : knowledgeBase.genes.length,
        categories: knowledgeBase.categories.length,
        families  : knowledgeBase.familyCount,
    });

    const settings = loadPipelineSettingsWithFallback(config.pipelineConfigPath, logger);
    const engine = new CohortEngine({
        knowledgeBase,
        settings: config.workerCount === undefined ? settings : { ...settings, workerCount: config.workerCount },
        logger  : logger.child({ component: "CohortEngine" }),
    });

    engine.eventBus.subscribe("sample:profiled", (event) => {
        logger.debug("Sample profiled", event.data);
    });
    engine.eventBus.subscribe("cohort:patterns", (event) => {
        logger.info("Patterns found", event.data);
    });

    const provider = new ToolOutputProvider({
        inputDir: config.inputDir,
        adapters: await createAdapters(config, logger),
        logger  : logger.child({ component: "ToolOutputProvider" }),
    });

    const dataset = await engine.runProvider(provider, { runId: options.runId });
    const outputPath = await writeDataset(dataset, config.outputDir);

    logger.info("Dataset written", {
        outputPath,
        totalSamples   : dataset.totalSamples,
        analyzedSamples: dataset.analyzedSamples,
        excluded       : dataset.diagnostics.excludedSamples.length,
        genes          : dataset.genes.size,
        patterns       : dataset.patterns.length,
    });

    return { dataset, outputPath };
}
