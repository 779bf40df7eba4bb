/**
 * Diagnostics Contract
 *
 * Recoverable per-record and per-sample problems are absorbed where they
 * happen and collected here, so the final dataset can state what was left
 * out and why.
 */

import type { ReportedIdentity } from "./CanonicalHit.js";

export interface UnresolvedGeneDiagnostic {
    readonly kind: "UnresolvedGene";
    readonly sampleId: string;
    readonly tool: string;
    readonly identifier: string;

    /** What the unresolved-gene policy did with the hit */
    readonly action: "uncategorized" | "dropped";
}

export interface LowQualityHitDiagnostic {
    readonly kind: "LowQualityHit";
    readonly sampleId: string;
    readonly tool: string;
    readonly identifier: string;
    readonly identity: number;
    readonly coverage: number;
    readonly failed: readonly ("identity" | "coverage")[];
}

export interface DiscrepantMergeDiagnostic {
    readonly kind: "DiscrepantMerge";
    readonly sampleId: string;
    readonly gene: string;
    readonly spread: number;
    readonly identities: readonly ReportedIdentity[];
}

export interface MalformedSampleDiagnostic {
    readonly kind: "MalformedSampleInput";
    readonly sampleId: string;
    readonly reason: string;
    readonly issues: readonly string[];
}

export type Diagnostic =
    | UnresolvedGeneDiagnostic
    | LowQualityHitDiagnostic
    | DiscrepantMergeDiagnostic
    | MalformedSampleDiagnostic;

export type DiagnosticKind = Diagnostic["kind"];

export interface DiagnosticsReport {
    readonly excludedSamples: readonly MalformedSampleDiagnostic[];
    readonly unresolvedGenes: readonly UnresolvedGeneDiagnostic[];
    readonly lowQualityHits: readonly LowQualityHitDiagnostic[];
    readonly discrepancies: readonly DiscrepantMergeDiagnostic[];
}

/**
 * Group a flat list of diagnostics by kind, keeping their order.
 */
export function summarizeDiagnostics(diagnostics: readonly Diagnostic[]): DiagnosticsReport {
    const excludedSamples: MalformedSampleDiagnostic[] = [];
    const unresolvedGenes: UnresolvedGeneDiagnostic[] = [];
    const lowQualityHits: LowQualityHitDiagnostic[] = [];
    const discrepancies: DiscrepantMergeDiagnostic[] = [];

    for (const diagnostic of diagnostics) {
        switch (diagnostic.kind) {
            case "MalformedSampleInput":
                excludedSamples.push(diagnostic);
                break;
            case "UnresolvedGene":
                unresolvedGenes.push(diagnostic);
                break;
            case "LowQualityHit":
                lowQualityHits.push(diagnostic);
                break;
            case "DiscrepantMerge":
                discrepancies.push(diagnostic);
                break;
        }
    }

    return { excludedSamples, unresolvedGenes, lowQualityHits, discrepancies };
}
