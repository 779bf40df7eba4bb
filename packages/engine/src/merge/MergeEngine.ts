/**
 * @fileoverview Deduplication & Merge Engine
 *
 * Collapses the candidates of one sample into one CanonicalHit per
 * canonical gene.
 *
 * Winner selection is a total order, so the result does not depend on the
 * order candidates arrive in:
 * 1. highest identity
 * 2. highest coverage
 * 3. tool priority (configured list; unlisted tools after listed ones)
 * 4. tool name, source label, contig, start, reported identifier
 *
 * @module @resistome/engine/merge/MergeEngine
 */

import type {
    CanonicalHit,
    IdentityDiscrepancy,
    NormalizedCandidate,
} from "../contracts/CanonicalHit.js";
import { sourceLabel } from "../contracts/RawHit.js";

export interface MergeEngineOptions {
    /** Preferred tools, most preferred first */
    readonly toolPriority?: readonly string[];

    /** Identity spread in percentage points above which a discrepancy is recorded (default 2.0) */
    readonly discrepancyThreshold?: number;
}

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function sortedUnique(values: Iterable<string>): string[] {
    return [...new Set(values)].sort(compareStrings);
}

export class MergeEngine {
    readonly discrepancyThreshold: number;
    private readonly priority: ReadonlyMap<string, number>;

    constructor(options: MergeEngineOptions = {}) {
        this.discrepancyThreshold = options.discrepancyThreshold ?? 2.0;
        this.priority = new Map((options.toolPriority ?? []).map((tool, index) => [tool, index]));
    }

    /**
     * Merge all candidates of a sample.
     *
     * Candidates are grouped by (sample, canonical gene name); the result is
     * sorted by sample id, then gene name.
     */
    mergeSample(candidates: readonly NormalizedCandidate[]): CanonicalHit[] {
        const groups = new Map<string, NormalizedCandidate[]>();

        for (const candidate of candidates) {
            const key = `${candidate.sampleId}\u0000${candidate.gene.name}`;
            const group = groups.get(key);
            if (group) {
                group.push(candidate);
            }
            else {
                groups.set(key, [candidate]);
            }
        }

        return [...groups.values()]
            .map((group) => this.mergeGroup(group))
            .sort((a, b) => compareStrings(a.sampleId, b.sampleId) || compareStrings(a.gene.name, b.gene.name));
    }

    /**
     * Merge candidates that resolved to the same gene in the same sample.
     */
    mergeGroup(group: readonly NormalizedCandidate[]): CanonicalHit {
        const ordered = [...group].sort((a, b) => this.compare(a, b));
        const winner = ordered[0];
        if (!winner) {
            throw new RangeError("Cannot merge an empty group");
        }

        const discrepancy = this.discrepancy(ordered);

        return {
            sampleId     : winner.sampleId,
            gene         : winner.gene,
            identity     : winner.identity,
            coverage     : winner.coverage,
            winningTool  : winner.tool,
            tools        : sortedUnique(ordered.map((c) => c.tool)),
            sources      : sortedUnique(ordered.map((c) => sourceLabel(c.rawHit))),
            reportedNames: sortedUnique(ordered.map((c) => c.rawHit.gene)),
            rawHits      : ordered.map((c) => ({ ...c.rawHit })),
            ...(discrepancy && { discrepancy }),
        };
    }

    /**
     * Total order over candidates; negative when `a` should win.
     */
    compare(a: NormalizedCandidate, b: NormalizedCandidate): number {
        return (
            b.identity - a.identity ||
            b.coverage - a.coverage ||
            this.rank(a.tool) - this.rank(b.tool) ||
            compareStrings(a.tool, b.tool) ||
            compareStrings(sourceLabel(a.rawHit), sourceLabel(b.rawHit)) ||
            compareStrings(a.rawHit.contig ?? "", b.rawHit.contig ?? "") ||
            (a.rawHit.start ?? -1) - (b.rawHit.start ?? -1) ||
            compareStrings(a.rawHit.gene, b.rawHit.gene)
        );
    }

    private rank(tool: string): number {
        return this.priority.get(tool) ?? this.priority.size;
    }

    private discrepancy(ordered: readonly NormalizedCandidate[]): IdentityDiscrepancy | undefined {
        if (ordered.length < 2) {
            return undefined;
        }

        const values = ordered.map((c) => c.identity);
        const spread = Math.max(...values) - Math.min(...values);
        if (spread <= this.discrepancyThreshold) {
            return undefined;
        }

        return {
            spread,
            identities: ordered.map((c) => ({
                tool    : c.tool,
                source  : sourceLabel(c.rawHit),
                identity: c.identity,
            })),
        };
    }
}
