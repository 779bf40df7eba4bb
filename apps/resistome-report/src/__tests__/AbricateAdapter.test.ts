/**
 * @fileoverview Unit tests for AbricateAdapter
 *
 * @module domain/adapters/__tests__/AbricateAdapter
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { EngineLogger } from "@resistome/engine";
import { AbricateAdapter } from "../domain/adapters/index.js";
import { createAdapterContext, createMockLogger, tsv } from "./fixtures.js";

const kHEADER = [
    "#FILE", "SEQUENCE", "START", "END", "STRAND", "GENE", "COVERAGE", "COVERAGE_MAP", "GAPS",
    "%COVERAGE", "%IDENTITY", "DATABASE", "ACCESSION", "PRODUCT", "RESISTANCE",
];

describe("AbricateAdapter", () => {
    let adapter: AbricateAdapter;
    let logger: EngineLogger;

    beforeEach(() => {
        adapter = new AbricateAdapter();
        logger = createMockLogger();
    });

    describe("matches", () => {
        it("should recognize ABRicate report names with or without a database", () => {
            expect(adapter.matches("S1.abricate.tsv")).toBe(true);
            expect(adapter.matches("S1.abricate.vfdb.txt")).toBe(true);
            expect(adapter.matches("S1_abricate_card.tsv")).toBe(true);
            expect(adapter.matches("S1.kaptive.tsv")).toBe(false);
        });

        it("should read the sample from the file name", () => {
            expect(adapter.sampleIdFor("S1_abricate_card.tsv")).toBe("S1");
        });
    });

    describe("parse", () => {
        // Scenario: Two concatenated reports with a repeated header
        it("should parse every row and skip repeated headers", () => {
            const content = tsv(
                kHEADER,
                ["/data/S1.fasta", "contig_3", "1500", "2322", "+", "blaOXA-23", "1-822/822", "========", "0/0", "100.00", "99.88", "resfinder", "AY795964", "blaOXA-23", "Carbapenem"],
                kHEADER,
                ["GCF_000005.1.fna", "c1", "10", "20", "-", "adeB", "1-10/10", "==", "0/0", "95.00", "97.10", "card", "X1", "adeB", ""],
            );

            const output = adapter.parse(content, createAdapterContext("cohort.abricate.tsv", logger));

            expect(output.typing).toEqual([]);
            expect(output.hits).toEqual([
                {
                    format    : "abricate",
                    sampleId  : "S1",
                    tool      : "ABRicate",
                    gene      : "blaOXA-23",
                    identity  : 99.88,
                    coverage  : 100,
                    database  : "resfinder",
                    contig    : "contig_3",
                    start     : 1500,
                    end       : 2322,
                    accession : "AY795964",
                    product   : "blaOXA-23",
                    resistance: "Carbapenem",
                },
                {
                    format    : "abricate",
                    sampleId  : "GCA_000005.1",
                    tool      : "ABRicate",
                    gene      : "adeB",
                    identity  : 97.1,
                    coverage  : 95,
                    database  : "card",
                    contig    : "c1",
                    start     : 10,
                    end       : 20,
                    accession : "X1",
                    product   : "adeB",
                },
            ]);
        });

        // Scenario: Minimal report without a DATABASE column
        it("should label hits without a database as unknown", () => {
            const content = tsv(["#FILE", "GENE", "%COVERAGE", "%IDENTITY"], ["S3.fa", "sul1", "100", "100"]);

            const [hit] = adapter.parse(content, createAdapterContext("S3.abricate.tsv", logger)).hits;

            expect(hit).toEqual(expect.objectContaining({ sampleId: "S3", database: "unknown", gene: "sul1" }));
        });

        it("should skip rows without a gene and warn", () => {
            const content = tsv(["#FILE", "GENE", "%COVERAGE", "%IDENTITY"], ["S4", "", "100", "100"]);

            expect(adapter.parse(content, createAdapterContext("S4.abricate.tsv", logger)).hits).toEqual([]);
            expect(logger.warn).toHaveBeenCalledWith("Row without a gene or file skipped", { row: 2 });
        });

        it("should throw without a header line", () => {
            const content = tsv(["S1", "sul1", "100", "100"]);

            expect(() => adapter.parse(content, createAdapterContext("S1.abricate.tsv", logger)))
                .toThrow("Missing ABRicate header line (#FILE ...)");
        });

        it("should throw when a required column is missing", () => {
            const content = tsv(["#FILE", "GENE"], ["S1", "sul1"]);

            expect(() => adapter.parse(content, createAdapterContext("S1.abricate.tsv", logger)))
                .toThrow("Missing ABRicate columns: %COVERAGE, %IDENTITY");
        });
    });
});
