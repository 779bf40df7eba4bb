/**
 * @fileoverview Unit tests for DatasetBuilder
 *
 * Tests cover:
 * - Assembly of a consistent dataset
 * - Immutability of the result
 * - Each invariant check
 *
 * @module @resistome/engine/__tests__/DatasetBuilder
 */

import { describe, it, expect } from "vitest";
import { DatasetBuilder, type DatasetParts } from "../dataset/DatasetBuilder.js";
import type { Diagnostic } from "../contracts/Diagnostics.js";
import type { SampleProfile } from "../contracts/SampleProfile.js";
import { FrozenMap, FrozenSet } from "../dataset/freeze.js";
import { DatasetInvariantViolation } from "../errors.js";
import { PatternEngine } from "../patterns/PatternEngine.js";
import { kDEFAULT_FLAGS } from "../settings/schema.js";
import { amrfinder, createTestKnowledgeBase, profileOf } from "./fixtures.js";

const kb = createTestKnowledgeBase();
const patterns = new PatternEngine(kb, {
    flags   : kDEFAULT_FLAGS,
    patterns: [{ name: "carbapenemase+colistin", markers: ["carbapenemase", "colistin"] }],
});

const kMALFORMED: Diagnostic = {
    kind    : "MalformedSampleInput",
    sampleId: "S3",
    reason  : "invalid records",
    issues  : ["hits.0.identity: Expected number, received nan"],
};

function parts(overrides: Partial<DatasetParts> = {}): DatasetParts {
    const profiles = overrides.profiles ?? [
        profileOf(kb, "S1", [amrfinder("S1", "OXA-23"), amrfinder("S1", "mcr-1")]),
        profileOf(kb, "S2", [amrfinder("S2", "adeB")]),
    ];
    return {
        profiles,
        analysis    : overrides.analysis ?? patterns.analyze(profiles),
        diagnostics : overrides.diagnostics ?? [],
        totalSamples: overrides.totalSamples ?? profiles.length,
    };
}

describe("DatasetBuilder", () => {
    const builder = new DatasetBuilder();

    describe("build", () => {
        // Scenario: Consistent parts
        it("should assemble the dataset", () => {
            const dataset = builder.build(parts({ diagnostics: [kMALFORMED], totalSamples: 3 }));

            expect([...dataset.samples.keys()]).toEqual(["S1", "S2"]);
            expect([...dataset.genes.keys()]).toEqual(["OXA-23", "adeB", "mcr-1"]);
            expect(dataset.patterns.map((p) => p.name)).toEqual(["carbapenemase+colistin"]);
            expect(dataset.totalSamples).toBe(3);
            expect(dataset.analyzedSamples).toBe(2);
            expect(dataset.complete).toBe(false);
            expect(dataset.diagnostics.excludedSamples).toEqual([kMALFORMED]);
            expect(Number.isNaN(Date.parse(dataset.generatedAt))).toBe(false);
        });

        // Scenario: Nothing excluded
        it("should mark a dataset without exclusions complete", () => {
            expect(builder.build(parts()).complete).toBe(true);
        });

        // Scenario: Empty cohort
        it("should build an empty dataset", () => {
            const dataset = builder.build(parts({ profiles: [] }));

            expect(dataset.samples.size).toBe(0);
            expect(dataset.genes.size).toBe(0);
            expect(dataset.complete).toBe(true);
        });

        // Scenario: Consumers cannot modify the dataset
        it("should return a read-only dataset", () => {
            const dataset = builder.build(parts());

            expect(Object.isFrozen(dataset)).toBe(true);
            expect(Object.isFrozen(dataset.patterns)).toBe(true);
            expect(Object.isFrozen(dataset.genes.get("OXA-23"))).toBe(true);
            expect(dataset.samples).toBeInstanceOf(FrozenMap);
            expect(dataset.genes.get("OXA-23")?.carriers).toBeInstanceOf(FrozenSet);
        });
    });

    describe("frozen collections", () => {
        // Scenario: Map mutators are blocked after construction
        it("should reject mutation of a frozen map", () => {
            const map = new FrozenMap<string, number>([["S1", 1]]);

            expect(map.get("S1")).toBe(1);
            expect(() => map.set("S2", 2)).toThrow("Cannot modify a frozen map");
            expect(() => map.delete("S1")).toThrow("Cannot modify a frozen map");
            expect(() => map.clear()).toThrow("Cannot modify a frozen map");
        });

        // Scenario: Set mutators are blocked after construction
        it("should reject mutation of a frozen set", () => {
            const set = new FrozenSet(["S1"]);

            expect(set.has("S1")).toBe(true);
            expect(() => set.add("S2")).toThrow("Cannot modify a frozen set");
            expect(() => set.delete("S1")).toThrow("Cannot modify a frozen set");
            expect(() => set.clear()).toThrow("Cannot modify a frozen set");
        });
    });

    describe("verify", () => {
        // Scenario: Consistent parts have no violations
        it("should report nothing for consistent parts", () => {
            expect(builder.verify(parts())).toEqual([]);
        });

        // Scenario: Excluded sample still has a profile
        it("should refuse a profile for an excluded sample", () => {
            const bad = parts({ diagnostics: [{ ...kMALFORMED, sampleId: "S2" }], totalSamples: 3 });

            expect(() => builder.build(bad)).toThrow(DatasetInvariantViolation);
            expect(builder.verify(bad)).toEqual(["excluded sample S2 has a profile"]);
        });

        // Scenario: Counts exceed the submitted total
        it("should refuse more samples than were submitted", () => {
            expect(builder.verify(parts({ diagnostics: [kMALFORMED] }))).toEqual([
                "2 analyzed and 1 excluded exceed 2 submitted samples",
            ]);
        });

        // Scenario: Tier disagrees with the hits
        it("should refuse a tier that is not the maximum of the hits", () => {
            const real = profileOf(kb, "S1", [amrfinder("S1", "OXA-23")]);
            const forged: SampleProfile = { ...real, tier: "LOW" };

            expect(builder.verify(parts({ profiles: [forged], analysis: patterns.analyze([real]) }))).toEqual([
                "sample S1 has tier LOW, hits imply CRITICAL",
            ]);
        });

        // Scenario: Same sample profiled twice
        it("should refuse duplicate profiles", () => {
            const profile = profileOf(kb, "S1", [amrfinder("S1", "adeB")]);

            const violations = builder.verify(parts({
                profiles: [profile, profile],
                analysis: patterns.analyze([profile]),
            }));

            expect(violations).toEqual(["sample S1 has more than one profile"]);
        });

        // Scenario: Gene index out of step with the profiles
        it("should refuse a gene index that does not match the carriers", () => {
            const profiles = [profileOf(kb, "S1", [amrfinder("S1", "adeB")])];
            const stale = patterns.analyze([
                profileOf(kb, "S1", [amrfinder("S1", "OXA-23")]),
            ]);

            expect(builder.verify(parts({ profiles, analysis: stale }))).toEqual([
                "gene adeB is carried but missing from the gene index",
                "gene OXA-23 is indexed but carried by no sample",
            ]);
        });

        // Scenario: Pattern names a sample outside the dataset
        it("should refuse patterns that name unknown samples", () => {
            const base = parts();
            const analysis = {
                ...base.analysis,
                patterns: [{ name: "ghost", markers: ["efflux"], severity: "LOW" as const, count: 2, sampleIds: ["S2", "S7"] }],
            };

            expect(builder.verify({ ...base, analysis })).toEqual(["pattern ghost names unknown sample S7"]);
        });
    });
});
