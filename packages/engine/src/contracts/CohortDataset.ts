/**
 * Cohort Dataset Contract
 *
 * The normalized, gene-centric view of one pipeline run. This is the single
 * hand-off to reporting: tiers, flags and patterns are final here and
 * reporting does no risk logic of its own.
 *
 * Read-only once built.
 */

import type { GeneDefinition } from "./GeneDefinition.js";
import type { SampleProfile } from "./SampleProfile.js";
import type { Pattern } from "./Pattern.js";
import type { DiagnosticsReport } from "./Diagnostics.js";

/**
 * One canonical gene across the cohort.
 */
export interface GeneSummary {
    readonly gene: GeneDefinition;

    /** Samples carrying the gene */
    readonly carriers: ReadonlySet<string>;

    /** carriers / analyzed samples, in [0, 1] */
    readonly prevalence: number;

    /** Sorted source labels that reported the gene anywhere in the cohort */
    readonly sources: readonly string[];
}

/**
 * Two genes found together in the same samples.
 */
export interface CooccurrencePair {
    readonly genes: readonly [string, string];
    readonly count: number;
    readonly sampleIds: readonly string[];
}

export interface DistributionEntry {
    readonly value: string;
    readonly count: number;

    /** Share of the samples with a call, in percent */
    readonly percentage: number;
}

export interface TypingDistributions {
    /** ST distribution keyed by MLST scheme */
    readonly sequenceTypes: Readonly<Record<string, readonly DistributionEntry[]>>;
    readonly internationalClones: readonly DistributionEntry[];
    readonly kLoci: readonly DistributionEntry[];
    readonly oLoci: readonly DistributionEntry[];

    /** "ST{st}-{K locus}" combinations for the configured scheme */
    readonly stKLocusCombinations: readonly DistributionEntry[];
}

/**
 * How many analyzed samples a source produced at least one hit for.
 */
export interface SourceCoverage {
    readonly source: string;
    readonly samplesWithHits: number;
    readonly percentage: number;
}

export interface CohortDataset {
    /** Canonical gene name to its cohort summary */
    readonly genes: ReadonlyMap<string, GeneSummary>;

    /** Sample id to its profile (excluded samples are absent) */
    readonly samples: ReadonlyMap<string, SampleProfile>;

    readonly patterns: readonly Pattern[];

    readonly cooccurrence: readonly CooccurrencePair[];

    readonly typing: TypingDistributions;

    readonly coverage: readonly SourceCoverage[];

    readonly diagnostics: DiagnosticsReport;

    /** Samples submitted to the run, including excluded ones */
    readonly totalSamples: number;

    /** Samples that made it into the dataset */
    readonly analyzedSamples: number;

    /** False whenever at least one sample was excluded */
    readonly complete: boolean;

    /** ISO timestamp of assembly */
    readonly generatedAt: string;
}
