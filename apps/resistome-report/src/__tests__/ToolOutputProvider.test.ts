/**
 * @fileoverview Unit tests for ToolOutputProvider
 *
 * @module domain/providers/__tests__/ToolOutputProvider
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { EngineLogger } from "@resistome/engine";
import { ToolOutputProvider, createBuiltInAdapters } from "../domain/index.js";
import { createMockLogger, tsv } from "./fixtures.js";

const kAMRFINDER_HEADER = ["Name", "Element symbol", "% Identity to reference", "% Coverage of reference"];

describe("ToolOutputProvider", () => {
    let dir: string;
    let logger: EngineLogger;
    let provider: ToolOutputProvider;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "tool-output-"));
        logger = createMockLogger();
        provider = new ToolOutputProvider({ inputDir: dir, adapters: createBuiltInAdapters(), logger });
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe("getSamples", () => {
        // Scenario: Mixed tools, a nested file, an empty report, a broken report
        it("should group records by sample across files", async () => {
            writeFileSync(join(dir, "S1.amrfinder.tsv"), tsv(kAMRFINDER_HEADER, ["S1", "blaOXA-23", "100", "100"]));
            mkdirSync(join(dir, "nested"));
            writeFileSync(join(dir, "nested", "S1_abricate_card.tsv"), tsv(
                ["#FILE", "GENE", "%COVERAGE", "%IDENTITY", "DATABASE"],
                ["S1.fasta", "adeB", "99", "98", "card"],
            ));
            writeFileSync(join(dir, "S2.mlst.tsv"), "S2.fasta\tabaumannii_2\t2\tcpn60(2)\n");
            writeFileSync(join(dir, "S3.amrfinder.tsv"), tsv(kAMRFINDER_HEADER));
            writeFileSync(join(dir, "S4.kaptive.tsv"), tsv(["Sample", "Locus"], ["S4", "KL2"]));
            writeFileSync(join(dir, "notes.txt"), "not a report");

            await provider.initialize();
            const { samples, failures } = await provider.getSamples();

            expect(samples.map((s) => s.sampleId)).toEqual(["S1", "S2", "S3"]);

            const [s1, s2, s3] = samples;
            expect(s1?.hits.map((h) => `${h.tool}:${h.gene}`)).toEqual(["AMRFinder:blaOXA-23", "ABRicate:adeB"]);
            expect(s2?.hits).toEqual([]);
            expect(s2?.typing).toEqual([expect.objectContaining({ kind: "mlst", st: "2" })]);
            expect(s3).toEqual({ sampleId: "S3", hits: [], typing: [] });

            expect(failures).toEqual([{
                sampleId: "S4",
                source  : "S4.kaptive.tsv",
                reason  : "Missing Kaptive columns: Assembly, Best match locus",
            }]);
            expect(logger.warn).toHaveBeenCalledWith("Unreadable tool output", {
                sampleId : "S4",
                source   : "S4.kaptive.tsv",
                reason   : "Missing Kaptive columns: Assembly, Best match locus",
                adapterId: "kaptive",
            });
            expect(logger.debug).toHaveBeenCalledWith("No adapter for file", { source: "notes.txt" });
        });

        // Scenario: Adapter warnings carry the adapter scope and file
        it("should scope adapter logs to the adapter and file", async () => {
            writeFileSync(join(dir, "S1.amrfinder.tsv"), tsv(kAMRFINDER_HEADER, ["S1", "", "100", "100"]));

            await provider.initialize();
            await provider.getSamples();

            expect(logger.warn).toHaveBeenCalledWith("[amrfinder-tsv] Row without a gene symbol skipped", {
                source: "S1.amrfinder.tsv",
                row   : 2,
            });
        });

        it("should refuse to run before initialize", async () => {
            await expect(provider.getSamples()).rejects.toThrow("Provider not initialized. Call initialize() first.");
        });
    });

    describe("initialize", () => {
        it("should throw ConfigError for a missing input directory", async () => {
            const missing = join(dir, "nowhere");
            const broken = new ToolOutputProvider({ inputDir: missing, adapters: [], logger });

            await expect(broken.initialize()).rejects.toThrow(`Input directory not found: ${missing}`);
        });

        it("should throw ConfigError when the input is a file", async () => {
            const file = join(dir, "S1.amrfinder.tsv");
            writeFileSync(file, "");
            const broken = new ToolOutputProvider({ inputDir: file, adapters: [], logger });

            await expect(broken.initialize()).rejects.toThrow(`Input path is not a directory: ${file}`);
        });
    });
});
