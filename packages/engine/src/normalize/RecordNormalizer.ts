/**
 * @fileoverview Record Normalizer
 *
 * Turns a raw hit into a candidate for merging: applies the identity and
 * coverage thresholds, then resolves the reported identifier against the
 * knowledge base. What happens to identifiers the knowledge base does not
 * know is decided by the unresolved policy.
 *
 * @module @resistome/engine/normalize/RecordNormalizer
 */

import type { NormalizedCandidate } from "../contracts/CanonicalHit.js";
import type {
    LowQualityHitDiagnostic,
    UnresolvedGeneDiagnostic,
} from "../contracts/Diagnostics.js";
import type { RawHit } from "../contracts/RawHit.js";
import type { GeneKnowledgeBase } from "../knowledge/GeneKnowledgeBase.js";
import type { UnresolvedPolicy } from "../settings/schema.js";

export interface RecordNormalizerOptions {
    /** Minimum percent identity (default 80) */
    readonly minIdentity?: number;

    /** Minimum percent coverage (default 70) */
    readonly minCoverage?: number;

    /** "uncategorized" keeps unknown genes at tier LOW, "drop" rejects them */
    readonly unresolvedPolicy?: UnresolvedPolicy;
}

export type NormalizeResult =
    | {
        readonly status: "accepted";
        readonly candidate: NormalizedCandidate;

        /** Present when the gene was unknown and kept as uncategorized */
        readonly unresolved?: UnresolvedGeneDiagnostic;
    }
    | {
        readonly status: "rejected";
        readonly reason: "LowQualityHit";
        readonly diagnostic: LowQualityHitDiagnostic;
    }
    | {
        readonly status: "rejected";
        readonly reason: "UnresolvedGene";
        readonly diagnostic: UnresolvedGeneDiagnostic;
    };

export class RecordNormalizer {
    readonly minIdentity: number;
    readonly minCoverage: number;
    readonly unresolvedPolicy: UnresolvedPolicy;

    constructor(
        private readonly knowledgeBase: GeneKnowledgeBase,
        options: RecordNormalizerOptions = {}
    ) {
        this.minIdentity = options.minIdentity ?? 80;
        this.minCoverage = options.minCoverage ?? 70;
        this.unresolvedPolicy = options.unresolvedPolicy ?? "uncategorized";
    }

    /**
     * Normalize one raw hit. Thresholds are inclusive.
     */
    normalize(hit: RawHit): NormalizeResult {
        const failed: ("identity" | "coverage")[] = [];
        if (hit.identity < this.minIdentity) {
            failed.push("identity");
        }
        if (hit.coverage < this.minCoverage) {
            failed.push("coverage");
        }

        if (failed.length > 0) {
            return {
                status    : "rejected",
                reason    : "LowQualityHit",
                diagnostic: {
                    kind      : "LowQualityHit",
                    sampleId  : hit.sampleId,
                    tool      : hit.tool,
                    identifier: hit.gene,
                    identity  : hit.identity,
                    coverage  : hit.coverage,
                    failed,
                },
            };
        }

        const resolved = this.knowledgeBase.resolve(hit.gene);
        if (resolved.found) {
            return { status: "accepted", candidate: this.candidate(hit, resolved.gene) };
        }

        if (this.unresolvedPolicy === "drop") {
            return {
                status    : "rejected",
                reason    : "UnresolvedGene",
                diagnostic: this.unresolved(hit, "dropped"),
            };
        }

        return {
            status    : "accepted",
            candidate : this.candidate(hit, this.knowledgeBase.uncategorized(hit.gene)),
            unresolved: this.unresolved(hit, "uncategorized"),
        };
    }

    private candidate(hit: RawHit, gene: NormalizedCandidate["gene"]): NormalizedCandidate {
        return {
            sampleId: hit.sampleId,
            gene,
            tool    : hit.tool,
            identity: hit.identity,
            coverage: hit.coverage,
            rawHit  : hit,
        };
    }

    private unresolved(hit: RawHit, action: UnresolvedGeneDiagnostic["action"]): UnresolvedGeneDiagnostic {
        return {
            kind      : "UnresolvedGene",
            sampleId  : hit.sampleId,
            tool      : hit.tool,
            identifier: hit.gene,
            action,
        };
    }
}
