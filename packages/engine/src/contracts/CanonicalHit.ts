/**
 * Canonical Hit Contract
 *
 * One resolved gene in one sample, merged from every raw detection that
 * resolved to it. A CanonicalHit owns the raw hits it merged; no raw hit
 * belongs to two canonical hits.
 */

import type { GeneDefinition } from "./GeneDefinition.js";
import type { RawHit } from "./RawHit.js";

/**
 * A raw hit that passed normalization, paired with its resolved gene.
 */
export interface NormalizedCandidate {
    readonly sampleId: string;
    readonly gene: GeneDefinition;
    readonly tool: string;
    readonly identity: number;
    readonly coverage: number;
    readonly rawHit: RawHit;
}

/**
 * Identity reported by one contributing hit.
 */
export interface ReportedIdentity {
    readonly tool: string;
    readonly source: string;
    readonly identity: number;
}

/**
 * Disagreement between contributing hits on percent identity.
 */
export interface IdentityDiscrepancy {
    /** max - min identity, in percentage points */
    readonly spread: number;
    readonly identities: readonly ReportedIdentity[];
}

export interface CanonicalHit {
    readonly sampleId: string;
    readonly gene: GeneDefinition;

    /** Identity of the winning hit */
    readonly identity: number;

    /** Coverage of the winning hit */
    readonly coverage: number;

    /** Tool whose metrics were kept */
    readonly winningTool: string;

    /** Sorted union of contributing tool names */
    readonly tools: readonly string[];

    /** Sorted union of contributing source labels (tool or tool:database) */
    readonly sources: readonly string[];

    /** Sorted, distinct identifiers as the tools reported them */
    readonly reportedNames: readonly string[];

    /** Every raw hit merged into this one, winner first */
    readonly rawHits: readonly RawHit[];

    readonly discrepancy?: IdentityDiscrepancy;
}
