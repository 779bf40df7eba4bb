/**
 * @fileoverview Resistome Report - Main Entry Point
 *
 * Aggregates AMR, virulence and typing tool outputs for a cohort of
 * assemblies into one risk-classified dataset (cohort-dataset.json).
 *
 * Usage:
 *   resistome-report <input-dir>
 *
 * Configuration comes from environment variables (see config/env.ts);
 * a `.env` file in the working directory is loaded first.
 *
 * @module resistome-report
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { errorMessage, ResistomeError } from "@resistome/engine";
import { loadAppConfig } from "./config/index.js";
import { AppLogger } from "./logger.js";
import { runReport } from "./run.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const kCONFIG_DIR = join(__dirname, "..", "config");

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const config = loadAppConfig(process.env, process.argv.slice(2), kCONFIG_DIR);
    const logger = new AppLogger({ level: config.logLevel });

    logger.info("Resistome report starting", {
        inputDir : config.inputDir,
        outputDir: config.outputDir,
    });

    const { dataset } = await runReport(config, logger);

    if (!dataset.complete) {
        logger.warn("Dataset is incomplete", {
            excluded: dataset.diagnostics.excludedSamples.map((d) => d.sampleId),
        });
    }
}

main().catch((error: unknown) => {
    const logger = new AppLogger();
    logger.error("Report failed", error instanceof ResistomeError ? error.toJSON() : { error: errorMessage(error) });
    process.exitCode = 1;
});
