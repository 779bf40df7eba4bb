/**
 * @fileoverview Risk Classifier
 *
 * Derives a sample's tier, categories, flags and typing summary from its
 * finalized hits. Pure: the same set of hits gives the same profile in any
 * order.
 *
 * @module @resistome/engine/classify/RiskClassifier
 */

import type { CanonicalHit } from "../contracts/CanonicalHit.js";
import {
    maxTier,
    compareTiersDescending,
    type SampleTier,
} from "../contracts/GeneDefinition.js";
import type { FlagRule } from "../contracts/Pattern.js";
import type { TypingRecord } from "../contracts/RawHit.js";
import type { SampleProfile, SchemeType, TypingSummary } from "../contracts/SampleProfile.js";

export interface RiskClassifierOptions {
    readonly flags?: readonly FlagRule[];

    /** MLST scheme used to derive the international clone (default "pasteur") */
    readonly typingScheme?: string;

    /** ST to international clone label for the typing scheme */
    readonly internationalClones?: Readonly<Record<string, string>>;
}

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Keep the lexicographically smallest value so duplicates resolve the same
 * way whatever their order.
 */
function pickStable(current: string | undefined, next: string): string {
    return current === undefined || compareStrings(next, current) < 0 ? next : current;
}

export class RiskClassifier {
    readonly flags: readonly FlagRule[];
    private readonly typingScheme: string;
    private readonly internationalClones: Readonly<Record<string, string>>;

    constructor(options: RiskClassifierOptions = {}) {
        this.flags = options.flags ?? [];
        this.typingScheme = options.typingScheme ?? "pasteur";
        this.internationalClones = options.internationalClones ?? {};
    }

    /**
     * Most severe tier among the hits; NONE when there are none.
     */
    classify(hits: readonly CanonicalHit[]): SampleTier {
        return hits.reduce<SampleTier>((tier, hit) => maxTier(tier, hit.gene.tier), "NONE");
    }

    /**
     * Evaluate every flag rule against a set of categories.
     */
    evaluateFlags(categories: ReadonlySet<string>): Record<string, boolean> {
        const flags: Record<string, boolean> = {};
        for (const rule of this.flags) {
            flags[rule.id] = rule.anyOfCategories.some((category) => categories.has(category));
        }
        return flags;
    }

    /**
     * Build the frozen profile of one sample.
     */
    buildProfile(
        sampleId: string,
        hits: readonly CanonicalHit[],
        typing: readonly TypingRecord[] = []
    ): SampleProfile {
        const ordered = [...hits].sort((a, b) =>
            compareTiersDescending(a.gene.tier, b.gene.tier) || compareStrings(a.gene.name, b.gene.name)
        );
        const categories = new Set(ordered.map((hit) => hit.gene.category));

        return Object.freeze({
            sampleId,
            hits      : Object.freeze(ordered),
            tier      : this.classify(ordered),
            categories: Object.freeze([...categories].sort(compareStrings)),
            flags     : Object.freeze(this.evaluateFlags(categories)),
            typing    : this.summarizeTyping(typing),
        });
    }

    /**
     * Collapse typing records into one summary.
     * Conflicting calls for the same slot keep the smallest value.
     */
    summarizeTyping(records: readonly TypingRecord[]): TypingSummary {
        const mlst: Record<string, SchemeType> = {};
        let kLocus: string | undefined;
        let oLocus: string | undefined;

        const sorted = [...records].sort((a, b) =>
            compareStrings(JSON.stringify(a), JSON.stringify(b))
        );

        for (const record of sorted) {
            if (record.kind === "mlst") {
                if (!(record.scheme in mlst)) {
                    mlst[record.scheme] = Object.freeze({
                        st     : record.st,
                        alleles: Object.freeze({ ...record.alleles }),
                    });
                }
            }
            else if (record.locusType === "K") {
                kLocus = pickStable(kLocus, record.locus);
            }
            else {
                oLocus = pickStable(oLocus, record.locus);
            }
        }

        const st = mlst[this.typingScheme]?.st;
        const internationalClone = st ? this.internationalClones[st] : undefined;

        return Object.freeze({
            mlst: Object.freeze(mlst),
            ...(internationalClone !== undefined && { internationalClone }),
            ...(kLocus !== undefined && { kLocus }),
            ...(oLocus !== undefined && { oLocus }),
        });
    }
}
