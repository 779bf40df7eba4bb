/**
 * Gene Definition Contract
 *
 * A curated entry of the gene knowledge base: the canonical identity of a
 * resistance, virulence or mobile-element marker after alias resolution.
 *
 * Definitions are immutable once loaded. Two lookups that resolve to the same
 * canonical gene return the same object.
 */

/**
 * Clinical risk tiers, ordered from most to least severe.
 */
export const RISK_TIERS = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "ENVIRONMENTAL"] as const;

export type RiskTier = (typeof RISK_TIERS)[number];

/**
 * Tier of a sample with no canonical hits.
 */
export type SampleTier = RiskTier | "NONE";

/**
 * Category identifier (domain-defined, e.g. "carbapenemase", "esbl", "colistin").
 * Categories are declared in the knowledge base, not compiled in.
 */
export type GeneCategory = string;

/**
 * Category assigned to genes that matched no knowledge-base entry.
 */
export const UNCATEGORIZED: GeneCategory = "uncategorized";

/**
 * Declared category with its nominal tier.
 */
export interface CategoryDefinition {
    readonly id: GeneCategory;
    readonly label: string;

    /** Nominal tier, used to rank patterns built from this category */
    readonly tier: RiskTier;
}

export interface GeneDefinition {
    /** Canonical display name (e.g. "OXA-23") */
    readonly name: string;

    /** Known aliases as written in the knowledge base */
    readonly aliases: readonly string[];

    readonly category: GeneCategory;

    readonly tier: RiskTier;

    readonly note?: string;

    /** Family rule that synthesized this definition, if any */
    readonly family?: string;

    /** Set when the gene was not found and the uncategorized policy applied */
    readonly uncategorized?: boolean;
}

const kSEVERITY: Readonly<Record<SampleTier, number>> = {
    CRITICAL     : 5,
    HIGH         : 4,
    MEDIUM       : 3,
    LOW          : 2,
    ENVIRONMENTAL: 1,
    NONE         : 0,
};

/**
 * Numeric severity of a tier. Higher is more severe; NONE is 0.
 */
export function tierSeverity(tier: SampleTier): number {
    return kSEVERITY[tier];
}

/**
 * Return the more severe of two tiers.
 */
export function maxTier(a: SampleTier, b: SampleTier): SampleTier {
    return tierSeverity(b) > tierSeverity(a) ? b : a;
}

/**
 * Comparator ordering tiers from most to least severe.
 */
export function compareTiersDescending(a: SampleTier, b: SampleTier): number {
    return tierSeverity(b) - tierSeverity(a);
}

export function isRiskTier(value: unknown): value is RiskTier {
    return RISK_TIERS.some((tier) => tier === value);
}
