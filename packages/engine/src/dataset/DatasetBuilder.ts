/**
 * @fileoverview Aggregate Dataset Builder
 *
 * Composes the cohort dataset from the finished profiles, the pattern
 * analysis and the collected diagnostics. Adds no business logic; it checks
 * the dataset's invariants and refuses to hand over a dataset that breaks
 * any of them.
 *
 * @module @resistome/engine/dataset/DatasetBuilder
 */

import type { CohortDataset, GeneSummary } from "../contracts/CohortDataset.js";
import { summarizeDiagnostics, type Diagnostic } from "../contracts/Diagnostics.js";
import { tierSeverity, maxTier, type SampleTier } from "../contracts/GeneDefinition.js";
import type { SampleProfile } from "../contracts/SampleProfile.js";
import { DatasetInvariantViolation } from "../errors.js";
import type { CohortAnalysis } from "../patterns/PatternEngine.js";
import { deepFreeze, FrozenMap, FrozenSet } from "./freeze.js";

export interface DatasetParts {
    readonly profiles: readonly SampleProfile[];
    readonly analysis: CohortAnalysis;
    readonly diagnostics: readonly Diagnostic[];

    /** Samples submitted, including excluded ones */
    readonly totalSamples: number;
}

const kVALID_TIERS = new Set<string>(["CRITICAL", "HIGH", "MEDIUM", "LOW", "ENVIRONMENTAL", "NONE"]);

export class DatasetBuilder {
    /**
     * @throws DatasetInvariantViolation when any invariant does not hold
     */
    build(parts: DatasetParts): CohortDataset {
        const violations = this.verify(parts);
        if (violations.length > 0) {
            throw new DatasetInvariantViolation(violations);
        }

        const diagnostics = summarizeDiagnostics(parts.diagnostics);
        const genes = new FrozenMap<string, GeneSummary>(
            [...parts.analysis.genes].map(([name, summary]) =>
                [name, { ...summary, carriers: new FrozenSet(summary.carriers) }] as const
            )
        );

        return deepFreeze({
            genes,
            samples        : new FrozenMap(parts.profiles.map((profile) => [profile.sampleId, profile] as const)),
            patterns       : parts.analysis.patterns,
            cooccurrence   : parts.analysis.cooccurrence,
            typing         : parts.analysis.typing,
            coverage       : parts.analysis.coverage,
            diagnostics,
            totalSamples   : parts.totalSamples,
            analyzedSamples: parts.profiles.length,
            complete       : diagnostics.excludedSamples.length === 0,
            generatedAt    : new Date().toISOString(),
        });
    }

    /**
     * Every broken invariant, as a readable message. Empty when the parts are consistent.
     */
    verify(parts: DatasetParts): string[] {
        const violations: string[] = [];
        const profiles = new Map<string, SampleProfile>();

        for (const profile of parts.profiles) {
            if (profiles.has(profile.sampleId)) {
                violations.push(`sample ${profile.sampleId} has more than one profile`);
            }
            profiles.set(profile.sampleId, profile);

            const genes = new Set<string>();
            let expected: SampleTier = "NONE";
            for (const hit of profile.hits) {
                if (genes.has(hit.gene.name)) {
                    violations.push(`sample ${profile.sampleId} has more than one hit for ${hit.gene.name}`);
                }
                genes.add(hit.gene.name);

                if (hit.sampleId !== profile.sampleId) {
                    violations.push(`hit ${hit.gene.name} of sample ${hit.sampleId} is filed under ${profile.sampleId}`);
                }
                expected = maxTier(expected, hit.gene.tier);
            }

            if (!kVALID_TIERS.has(profile.tier)) {
                violations.push(`sample ${profile.sampleId} has no valid tier`);
            }
            else if (tierSeverity(profile.tier) !== tierSeverity(expected)) {
                violations.push(`sample ${profile.sampleId} has tier ${profile.tier}, hits imply ${expected}`);
            }
        }

        const carried = new Map<string, Set<string>>();
        for (const profile of profiles.values()) {
            for (const hit of profile.hits) {
                const carriers = carried.get(hit.gene.name) ?? new Set<string>();
                carriers.add(profile.sampleId);
                carried.set(hit.gene.name, carriers);
            }
        }

        for (const [name, carriers] of carried) {
            const summary = parts.analysis.genes.get(name);
            if (!summary) {
                violations.push(`gene ${name} is carried but missing from the gene index`);
            }
            else if (summary.carriers.size !== carriers.size || [...carriers].some((id) => !summary.carriers.has(id))) {
                violations.push(`carriers of ${name} do not match the sample profiles`);
            }
        }
        for (const name of parts.analysis.genes.keys()) {
            if (!carried.has(name)) {
                violations.push(`gene ${name} is indexed but carried by no sample`);
            }
        }

        const excluded = summarizeDiagnostics(parts.diagnostics).excludedSamples;
        for (const { sampleId } of excluded) {
            if (profiles.has(sampleId)) {
                violations.push(`excluded sample ${sampleId} has a profile`);
            }
        }

        if (parts.profiles.length + excluded.length > parts.totalSamples) {
            violations.push(
                `${parts.profiles.length} analyzed and ${excluded.length} excluded exceed ${parts.totalSamples} submitted samples`
            );
        }

        for (const pattern of parts.analysis.patterns) {
            if (pattern.count !== pattern.sampleIds.length) {
                violations.push(`pattern ${pattern.name} count ${pattern.count} differs from its ${pattern.sampleIds.length} samples`);
            }
            for (const sampleId of pattern.sampleIds) {
                if (!profiles.has(sampleId)) {
                    violations.push(`pattern ${pattern.name} names unknown sample ${sampleId}`);
                }
            }
        }

        return violations;
    }
}
