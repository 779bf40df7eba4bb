/**
 * Pattern Contracts
 *
 * Flags and co-occurrence patterns are data, not code. Adding a new
 * combination of interest means adding an entry to the pipeline settings.
 */

import type { GeneCategory, RiskTier } from "./GeneDefinition.js";

/**
 * Named boolean flag set on a sample when it carries any of the categories.
 *
 * @example
 * ```yaml
 * - id: lastResortResistance
 *   anyOfCategories: [colistin, tigecycline]
 * ```
 */
export interface FlagRule {
    readonly id: string;
    readonly label?: string;
    readonly anyOfCategories: readonly GeneCategory[];
}

/**
 * Combination of markers to look for across the cohort.
 * A marker is either a category id or a flag id.
 */
export interface PatternRule {
    readonly name: string;
    readonly description?: string;
    readonly markers: readonly string[];

    /** Minimum satisfying samples for the pattern to be emitted */
    readonly minSupport?: number;

    /**
     * Number of markers a sample must carry. Defaults to all of them.
     * Lower values express "at least N of" rules (e.g. multidrug resistance).
     */
    readonly minMatched?: number;

    /** Explicit severity; otherwise the highest tier of the markers */
    readonly severity?: RiskTier;
}

/**
 * A rule that matched at least its minimum support.
 */
export interface Pattern {
    readonly name: string;
    readonly description?: string;
    readonly markers: readonly string[];
    readonly severity: RiskTier;
    readonly count: number;

    /** Sorted ids of the satisfying samples */
    readonly sampleIds: readonly string[];
}
