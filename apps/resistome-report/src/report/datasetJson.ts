/**
 * @fileoverview Cohort dataset JSON export
 *
 * Turns a CohortDataset into plain JSON: maps become arrays in the
 * dataset's own order, sets become sorted arrays, raw hits are left out.
 * No risk logic happens here; tiers, flags and patterns are copied as is.
 *
 * @module report/datasetJson
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type {
    CanonicalHit,
    CohortDataset,
    CooccurrencePair,
    DiagnosticsReport,
    IdentityDiscrepancy,
    Pattern,
    RiskTier,
    SampleProfile,
    SampleTier,
    SourceCoverage,
    TypingDistributions,
    TypingSummary,
} from "@resistome/engine";

export const kDATASET_FILE_NAME = "cohort-dataset.json";

export interface SerializedHit {
    gene: string;
    category: string;
    tier: RiskTier;
    identity: number;
    coverage: number;
    winningTool: string;
    tools: readonly string[];
    sources: readonly string[];
    reportedNames: readonly string[];
    discrepancy?: IdentityDiscrepancy;
}

export interface SerializedSample {
    sampleId: string;
    tier: SampleTier;
    categories: readonly string[];
    flags: Readonly<Record<string, boolean>>;
    typing: TypingSummary;
    hits: SerializedHit[];
}

export interface SerializedGene {
    name: string;
    category: string;
    tier: RiskTier;
    family?: string;
    uncategorized?: boolean;
    carriers: string[];
    prevalence: number;
    sources: readonly string[];
}

export interface SerializedDataset {
    generatedAt: string;
    totalSamples: number;
    analyzedSamples: number;
    complete: boolean;
    genes: SerializedGene[];
    samples: SerializedSample[];
    patterns: readonly Pattern[];
    cooccurrence: readonly CooccurrencePair[];
    typing: TypingDistributions;
    coverage: readonly SourceCoverage[];
    diagnostics: DiagnosticsReport;
}

function serializeHit(hit: CanonicalHit): SerializedHit {
    const serialized: SerializedHit = {
        gene         : hit.gene.name,
        category     : hit.gene.category,
        tier         : hit.gene.tier,
        identity     : hit.identity,
        coverage     : hit.coverage,
        winningTool  : hit.winningTool,
        tools        : hit.tools,
        sources      : hit.sources,
        reportedNames: hit.reportedNames,
    };

    if (hit.discrepancy) {
        serialized.discrepancy = hit.discrepancy;
    }

    return serialized;
}

function serializeSample(profile: SampleProfile): SerializedSample {
    return {
        sampleId  : profile.sampleId,
        tier      : profile.tier,
        categories: profile.categories,
        flags     : profile.flags,
        typing    : profile.typing,
        hits      : profile.hits.map(serializeHit),
    };
}

/**
 * Plain-JSON view of a dataset.
 */
export function serializeDataset(dataset: CohortDataset): SerializedDataset {
    const genes: SerializedGene[] = [...dataset.genes.values()].map((summary) => {
        const gene: SerializedGene = {
            name      : summary.gene.name,
            category  : summary.gene.category,
            tier      : summary.gene.tier,
            carriers  : [...summary.carriers].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)),
            prevalence: summary.prevalence,
            sources   : summary.sources,
        };
        if (summary.gene.family) {
            gene.family = summary.gene.family;
        }
        if (summary.gene.uncategorized) {
            gene.uncategorized = true;
        }
        return gene;
    });

    return {
        generatedAt    : dataset.generatedAt,
        totalSamples   : dataset.totalSamples,
        analyzedSamples: dataset.analyzedSamples,
        complete       : dataset.complete,
        genes,
        samples        : [...dataset.samples.values()].map(serializeSample),
        patterns       : dataset.patterns,
        cooccurrence   : dataset.cooccurrence,
        typing         : dataset.typing,
        coverage       : dataset.coverage,
        diagnostics    : dataset.diagnostics,
    };
}

/**
 * Write the dataset as indented JSON into the output directory.
 *
 * @returns Path of the written file
 */
export async function writeDataset(dataset: CohortDataset, outputDir: string): Promise<string> {
    await mkdir(outputDir, { recursive: true });

    const filePath = join(outputDir, kDATASET_FILE_NAME);
    await writeFile(filePath, `${JSON.stringify(serializeDataset(dataset), null, 2)}\n`, "utf-8");

    return filePath;
}
