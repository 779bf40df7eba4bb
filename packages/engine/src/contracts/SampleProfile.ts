/**
 * Sample Profile Contract
 *
 * Everything known about one sample after its hits are finalized:
 * merged hits, derived tier, categories, named flags and typing calls.
 * Built once by the risk classifier and frozen.
 */

import type { CanonicalHit } from "./CanonicalHit.js";
import type { GeneCategory, SampleTier } from "./GeneDefinition.js";

/**
 * MLST result for one scheme.
 */
export interface SchemeType {
    readonly st: string | null;
    readonly alleles: Readonly<Record<string, string>>;
}

export interface TypingSummary {
    /** MLST results keyed by scheme name */
    readonly mlst: Readonly<Record<string, SchemeType>>;

    /** International clone derived from the configured scheme's ST */
    readonly internationalClone?: string;

    readonly kLocus?: string;
    readonly oLocus?: string;
}

export interface SampleProfile {
    readonly sampleId: string;

    /** Hits ordered by tier severity, then gene name */
    readonly hits: readonly CanonicalHit[];

    /** Most severe tier among the hits, NONE without hits */
    readonly tier: SampleTier;

    /** Sorted distinct categories carried */
    readonly categories: readonly GeneCategory[];

    /** Named flags (e.g. carbapenemase, lastResortResistance) */
    readonly flags: Readonly<Record<string, boolean>>;

    readonly typing: TypingSummary;
}
