/**
 * @fileoverview Unit tests for PatternEngine
 *
 * @module @resistome/engine/__tests__/PatternEngine
 */

import { describe, it, expect } from "vitest";
import { PatternEngine, distribution } from "../patterns/PatternEngine.js";
import type { PatternRule } from "../contracts/Pattern.js";
import type { SampleProfile } from "../contracts/SampleProfile.js";
import { ConfigError } from "../errors.js";
import { kDEFAULT_FLAGS } from "../settings/schema.js";
import {
    abricate,
    amrfinder,
    capsule,
    createTestKnowledgeBase,
    mlst,
    profileOf,
} from "./fixtures.js";

const kb = createTestKnowledgeBase();
const kCLONES = { "1": "IC1", "2": "IC2" };

/**
 * Four-sample cohort:
 * - S1: OXA-23 + mcr-1, ST2 KL2
 * - S2: OXA-23 (two tools) + adeB, ST2 KL9
 * - S3: adeB + aph(3')-VIa, ST1
 * - S4: no hits, no ST
 */
function cohort(): SampleProfile[] {
    return [
        profileOf(kb, "S1", [amrfinder("S1", "OXA-23"), amrfinder("S1", "mcr-1")],
            [mlst("S1", "2"), capsule("S1", "K", "KL2")], kCLONES),
        profileOf(kb, "S2", [amrfinder("S2", "OXA-23"), abricate("S2", "blaOXA-23"), abricate("S2", "adeB")],
            [mlst("S2", "2"), capsule("S2", "K", "KL9")], kCLONES),
        profileOf(kb, "S3", [amrfinder("S3", "adeB"), amrfinder("S3", "aph(3')-VIa")],
            [mlst("S3", "1")], kCLONES),
        profileOf(kb, "S4", [], [mlst("S4", null)], kCLONES),
    ];
}

const kRULES: PatternRule[] = [
    { name: "efflux", markers: ["efflux"] },
    { name: "carbapenemase+lastResortResistance", markers: ["carbapenemase", "lastResortResistance"] },
    { name: "carbapenemase+colistin", markers: ["carbapenemase", "colistin"] },
    { name: "carbapenemase", markers: ["carbapenemase"] },
    {
        name      : "multidrug",
        markers   : ["carbapenemase", "aminoglycoside", "efflux", "colistin"],
        minMatched: 2,
        severity  : "HIGH",
    },
    { name: "biocide", markers: ["biocide"] },
];

describe("PatternEngine", () => {
    describe("construction", () => {
        // Scenario: Rule names a marker nobody declared
        it("should reject rules with unknown markers", () => {
            expect(() => new PatternEngine(kb, {
                flags   : kDEFAULT_FLAGS,
                patterns: [{ name: "broken", markers: ["carbapenemase", "betaLactam"] }],
            })).toThrow(new ConfigError('Pattern "broken" uses unknown markers: betaLactam'));
        });

        // Scenario: Flags rank by their most severe category
        it("should derive marker tiers for categories and flags", () => {
            const engine = new PatternEngine(kb, {
                flags: [...kDEFAULT_FLAGS, { id: "exotic", anyOfCategories: ["unknownCategory"] }],
            });

            expect(engine.markerTier("efflux")).toBe("LOW");
            expect(engine.markerTier("lastResortResistance")).toBe("CRITICAL");
            expect(engine.markerTier("exotic")).toBe("LOW");
            expect(engine.markerTier("nothing")).toBeUndefined();
        });
    });

    describe("discoverPatterns", () => {
        // Scenario: Count equals the satisfying samples
        it("should emit matching patterns ordered by severity, count and name", () => {
            const engine = new PatternEngine(kb, { flags: kDEFAULT_FLAGS, patterns: kRULES });

            const patterns = engine.discoverPatterns(cohort());

            expect(patterns.map((p) => [p.name, p.severity, p.count, p.sampleIds])).toEqual([
                ["carbapenemase", "CRITICAL", 2, ["S1", "S2"]],
                ["carbapenemase+colistin", "CRITICAL", 1, ["S1"]],
                ["carbapenemase+lastResortResistance", "CRITICAL", 1, ["S1"]],
                ["multidrug", "HIGH", 3, ["S1", "S2", "S3"]],
                ["efflux", "LOW", 2, ["S2", "S3"]],
            ]);
        });

        // Scenario: Minimum support filters rare patterns
        it("should drop patterns below the minimum support", () => {
            const engine = new PatternEngine(kb, { flags: kDEFAULT_FLAGS, patterns: kRULES, minSupport: 2 });

            expect(engine.discoverPatterns(cohort()).map((p) => p.name)).toEqual(["carbapenemase", "multidrug", "efflux"]);
        });

        // Scenario: A rule's own support overrides the default
        it("should honour a per-rule minimum support", () => {
            const engine = new PatternEngine(kb, {
                patterns: [{ name: "carbapenemase", markers: ["carbapenemase"], minSupport: 3 }],
            });

            expect(engine.discoverPatterns(cohort())).toEqual([]);
        });

        // Scenario: Empty cohort
        it("should find nothing in an empty cohort", () => {
            const engine = new PatternEngine(kb, { flags: kDEFAULT_FLAGS, patterns: kRULES });

            expect(engine.discoverPatterns([])).toEqual([]);
        });
    });

    describe("geneSummaries", () => {
        // Scenario: Carriers, prevalence and sources per gene
        it("should summarize every gene in name order", () => {
            const engine = new PatternEngine(kb);

            const genes = engine.geneSummaries(cohort());

            expect([...genes.keys()]).toEqual(["OXA-23", "adeB", "aph(3')-VIa", "mcr-1"]);
            expect([...(genes.get("OXA-23")?.carriers ?? [])]).toEqual(["S1", "S2"]);
            expect(genes.get("OXA-23")?.prevalence).toBe(0.5);
            expect(genes.get("OXA-23")?.sources).toEqual(["ABRicate:card", "AMRFinder"]);
            expect(genes.get("mcr-1")?.prevalence).toBe(0.25);
        });
    });

    describe("cooccurrence", () => {
        // Scenario: Pairs shared by enough samples
        it("should report gene pairs meeting the minimum count", () => {
            const engine = new PatternEngine(kb, { minCooccurrence: 2 });
            const profiles = [
                profileOf(kb, "A", [amrfinder("A", "OXA-23"), amrfinder("A", "adeB"), amrfinder("A", "mcr-1")]),
                profileOf(kb, "B", [amrfinder("B", "adeB"), amrfinder("B", "OXA-23")]),
                profileOf(kb, "C", [amrfinder("C", "mcr-1"), amrfinder("C", "OXA-23")]),
                profileOf(kb, "D", [amrfinder("D", "mcr-1"), amrfinder("D", "OXA-23"), amrfinder("D", "adeB")]),
            ];

            expect(engine.cooccurrence(profiles)).toEqual([
                { genes: ["OXA-23", "adeB"], count: 3, sampleIds: ["A", "B", "D"] },
                { genes: ["OXA-23", "mcr-1"], count: 3, sampleIds: ["A", "C", "D"] },
                { genes: ["adeB", "mcr-1"], count: 2, sampleIds: ["A", "D"] },
            ]);
        });

        // Scenario: Nothing meets the default minimum
        it("should return no pairs when none reach the minimum", () => {
            expect(new PatternEngine(kb).cooccurrence(cohort())).toEqual([]);
        });
    });

    describe("typingDistributions", () => {
        // Scenario: Percentages per dimension
        it("should count typing calls relative to the samples with a call", () => {
            const typing = new PatternEngine(kb).typingDistributions(cohort());

            expect(typing).toEqual({
                sequenceTypes: {
                    pasteur: [
                        { value: "ST2", count: 2, percentage: 66.67 },
                        { value: "ST1", count: 1, percentage: 33.33 },
                    ],
                },
                internationalClones: [
                    { value: "IC2", count: 2, percentage: 66.67 },
                    { value: "IC1", count: 1, percentage: 33.33 },
                ],
                kLoci: [
                    { value: "KL2", count: 1, percentage: 50 },
                    { value: "KL9", count: 1, percentage: 50 },
                ],
                oLoci               : [],
                stKLocusCombinations: [
                    { value: "ST2-KL2", count: 1, percentage: 50 },
                    { value: "ST2-KL9", count: 1, percentage: 50 },
                ],
            });
        });
    });

    describe("sourceCoverage", () => {
        // Scenario: Samples with at least one hit per source
        it("should report hit coverage per source over all profiles", () => {
            expect(new PatternEngine(kb).sourceCoverage(cohort())).toEqual([
                { source: "AMRFinder", samplesWithHits: 3, percentage: 75 },
                { source: "ABRicate:card", samplesWithHits: 1, percentage: 25 },
            ]);
        });
    });

    describe("distribution", () => {
        // Scenario: Ties ordered by value
        it("should order by count then value", () => {
            expect(distribution(["b", "a", "b", "c", "a", "b"])).toEqual([
                { value: "b", count: 3, percentage: 50 },
                { value: "a", count: 2, percentage: 33.33 },
                { value: "c", count: 1, percentage: 16.67 },
            ]);
        });
    });

    describe("analyze", () => {
        // Scenario: Profiles are not modified
        it("should leave the profiles untouched", () => {
            const profiles = cohort();
            const before = JSON.stringify(profiles);

            const analysis = new PatternEngine(kb, { flags: kDEFAULT_FLAGS, patterns: kRULES }).analyze(profiles);

            expect(JSON.stringify(profiles)).toBe(before);
            expect(analysis.patterns).toHaveLength(5);
            expect(analysis.genes.size).toBe(4);
        });
    });
});
