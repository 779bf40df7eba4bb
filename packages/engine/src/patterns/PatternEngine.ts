/**
 * @fileoverview Cross-Genome Pattern Engine
 *
 * Whole-cohort analysis over finalized sample profiles:
 * - gene prevalence
 * - marker combinations declared as pattern rules
 * - gene pairs that travel together
 * - typing distributions (ST, international clone, K/O loci)
 * - which sources produced hits for how many samples
 *
 * Read-only: profiles are never modified.
 *
 * @module @resistome/engine/patterns/PatternEngine
 */

import type {
    CooccurrencePair,
    DistributionEntry,
    GeneSummary,
    SourceCoverage,
    TypingDistributions,
} from "../contracts/CohortDataset.js";
import {
    compareTiersDescending,
    maxTier,
    tierSeverity,
    type RiskTier,
    type SampleTier,
} from "../contracts/GeneDefinition.js";
import type { FlagRule, Pattern, PatternRule } from "../contracts/Pattern.js";
import type { SampleProfile } from "../contracts/SampleProfile.js";
import { ConfigError } from "../errors.js";
import type { GeneKnowledgeBase } from "../knowledge/GeneKnowledgeBase.js";

export interface PatternEngineOptions {
    readonly patterns?: readonly PatternRule[];
    readonly flags?: readonly FlagRule[];

    /** Default minimum support for rules without their own (default 1) */
    readonly minSupport?: number;

    /** Minimum shared samples for a gene pair (default 2) */
    readonly minCooccurrence?: number;

    /** MLST scheme for ST-K combinations (default "pasteur") */
    readonly typingScheme?: string;
}

/**
 * Everything the pattern pass computes.
 */
export interface CohortAnalysis {
    readonly genes: ReadonlyMap<string, GeneSummary>;
    readonly patterns: readonly Pattern[];
    readonly cooccurrence: readonly CooccurrencePair[];
    readonly typing: TypingDistributions;
    readonly coverage: readonly SourceCoverage[];
}

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function percent(count: number, total: number): number {
    return total === 0 ? 0 : Math.round((count / total) * 10000) / 100;
}

/**
 * Count values, most frequent first, ties by value.
 */
export function distribution(values: readonly string[]): DistributionEntry[] {
    const counts = new Map<string, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }

    return [...counts]
        .map(([value, count]) => ({ value, count, percentage: percent(count, values.length) }))
        .sort((a, b) => b.count - a.count || compareStrings(a.value, b.value));
}

/**
 * Cross-Genome Pattern Engine
 *
 * @example
 * ```typescript
 * const engine = new PatternEngine(kb, {
 *     flags   : settings.flags,
 *     patterns: [{ name: "carbapenemase+colistin", markers: ["carbapenemase", "colistin"] }],
 * });
 *
 * const analysis = engine.analyze(profiles);
 * analysis.patterns[0]; // { name: "carbapenemase+colistin", count: 1, sampleIds: ["S1"], ... }
 * ```
 */
export class PatternEngine {
    private readonly rules: readonly PatternRule[];
    private readonly minSupport: number;
    private readonly minCooccurrence: number;
    private readonly typingScheme: string;
    private readonly markerTiers: ReadonlyMap<string, RiskTier>;

    /**
     * @throws ConfigError if a rule names a marker that is neither a declared
     *         category nor a flag
     */
    constructor(knowledgeBase: GeneKnowledgeBase, options: PatternEngineOptions = {}) {
        this.rules = options.patterns ?? [];
        this.minSupport = options.minSupport ?? 1;
        this.minCooccurrence = options.minCooccurrence ?? 2;
        this.typingScheme = options.typingScheme ?? "pasteur";

        const markerTiers = new Map<string, RiskTier>();
        for (const category of knowledgeBase.categories) {
            markerTiers.set(category.id, category.tier);
        }
        for (const flag of options.flags ?? []) {
            const tier = flag.anyOfCategories.reduce<SampleTier>(
                (highest, id) => maxTier(highest, knowledgeBase.category(id)?.tier ?? "NONE"),
                markerTiers.get(flag.id) ?? "NONE"
            );
            markerTiers.set(flag.id, tier === "NONE" ? "LOW" : tier);
        }
        this.markerTiers = markerTiers;

        for (const rule of this.rules) {
            const unknown = rule.markers.filter((marker) => !markerTiers.has(marker));
            if (unknown.length > 0) {
                throw new ConfigError(`Pattern "${rule.name}" uses unknown markers: ${unknown.join(", ")}`, {
                    pattern: rule.name,
                    unknown,
                });
            }
        }
    }

    /**
     * Run every analysis over the cohort.
     */
    analyze(profiles: readonly SampleProfile[]): CohortAnalysis {
        return {
            genes       : this.geneSummaries(profiles),
            patterns    : this.discoverPatterns(profiles),
            cooccurrence: this.cooccurrence(profiles),
            typing      : this.typingDistributions(profiles),
            coverage    : this.sourceCoverage(profiles),
        };
    }

    /**
     * Carriers, prevalence and reporting sources for every gene, keyed and
     * ordered by gene name.
     */
    geneSummaries(profiles: readonly SampleProfile[]): Map<string, GeneSummary> {
        const builders = new Map<string, { gene: GeneSummary["gene"]; carriers: Set<string>; sources: Set<string> }>();

        for (const profile of profiles) {
            for (const hit of profile.hits) {
                const entry = builders.get(hit.gene.name)
                    ?? { gene: hit.gene, carriers: new Set<string>(), sources: new Set<string>() };
                builders.set(hit.gene.name, entry);

                entry.carriers.add(profile.sampleId);
                for (const source of hit.sources) {
                    entry.sources.add(source);
                }
            }
        }

        const summaries = new Map<string, GeneSummary>();
        for (const [name, entry] of [...builders].sort(([a], [b]) => compareStrings(a, b))) {
            summaries.set(name, {
                gene      : entry.gene,
                carriers  : entry.carriers,
                prevalence: profiles.length === 0 ? 0 : entry.carriers.size / profiles.length,
                sources   : [...entry.sources].sort(compareStrings),
            });
        }
        return summaries;
    }

    /**
     * Evaluate every pattern rule. Sorted by severity, then count (both
     * descending), then name.
     */
    discoverPatterns(profiles: readonly SampleProfile[]): Pattern[] {
        const patterns: Pattern[] = [];

        for (const rule of this.rules) {
            const required = rule.minMatched ?? rule.markers.length;
            const sampleIds = profiles
                .filter((profile) => rule.markers.filter((m) => this.carries(profile, m)).length >= required)
                .map((profile) => profile.sampleId)
                .sort(compareStrings);

            if (sampleIds.length >= (rule.minSupport ?? this.minSupport)) {
                patterns.push({
                    name       : rule.name,
                    ...(rule.description !== undefined && { description: rule.description }),
                    markers    : [...rule.markers],
                    severity   : rule.severity ?? this.severityOf(rule.markers),
                    count      : sampleIds.length,
                    sampleIds,
                });
            }
        }

        return patterns.sort((a, b) =>
            compareTiersDescending(a.severity, b.severity) ||
            b.count - a.count ||
            compareStrings(a.name, b.name)
        );
    }

    /**
     * Gene pairs carried together by at least `minCooccurrence` samples.
     */
    cooccurrence(profiles: readonly SampleProfile[]): CooccurrencePair[] {
        const pairs = new Map<string, { genes: [string, string]; sampleIds: string[] }>();

        for (const profile of profiles) {
            const genes = [...new Set(profile.hits.map((hit) => hit.gene.name))].sort(compareStrings);
            for (let i = 0; i < genes.length; i++) {
                for (let j = i + 1; j < genes.length; j++) {
                    const genePair: [string, string] = [genes[i], genes[j]];
                    const key = genePair.join("\u0000");
                    const entry = pairs.get(key) ?? { genes: genePair, sampleIds: [] };
                    entry.sampleIds.push(profile.sampleId);
                    pairs.set(key, entry);
                }
            }
        }

        return [...pairs.values()]
            .filter((entry) => entry.sampleIds.length >= this.minCooccurrence)
            .map((entry) => ({
                genes    : entry.genes,
                count    : entry.sampleIds.length,
                sampleIds: entry.sampleIds.sort(compareStrings),
            }))
            .sort((a, b) =>
                b.count - a.count ||
                compareStrings(a.genes[0], b.genes[0]) ||
                compareStrings(a.genes[1], b.genes[1])
            );
    }

    /**
     * Typing distributions. Each percentage is relative to the samples that
     * have a call for that dimension.
     */
    typingDistributions(profiles: readonly SampleProfile[]): TypingDistributions {
        const stsByScheme = new Map<string, string[]>();
        const clones: string[] = [];
        const kLoci: string[] = [];
        const oLoci: string[] = [];
        const combinations: string[] = [];

        for (const { typing } of profiles) {
            for (const [scheme, call] of Object.entries(typing.mlst)) {
                if (call.st === null) {
                    continue;
                }
                const values = stsByScheme.get(scheme) ?? [];
                values.push(`ST${call.st}`);
                stsByScheme.set(scheme, values);
            }

            if (typing.internationalClone) {
                clones.push(typing.internationalClone);
            }
            if (typing.kLocus) {
                kLoci.push(typing.kLocus);
            }
            if (typing.oLocus) {
                oLoci.push(typing.oLocus);
            }

            const st = typing.mlst[this.typingScheme]?.st;
            if (st && typing.kLocus) {
                combinations.push(`ST${st}-${typing.kLocus}`);
            }
        }

        const sequenceTypes: Record<string, DistributionEntry[]> = {};
        for (const scheme of [...stsByScheme.keys()].sort(compareStrings)) {
            sequenceTypes[scheme] = distribution(stsByScheme.get(scheme) ?? []);
        }

        return {
            sequenceTypes,
            internationalClones : distribution(clones),
            kLoci               : distribution(kLoci),
            oLoci               : distribution(oLoci),
            stKLocusCombinations: distribution(combinations),
        };
    }

    /**
     * Samples with at least one hit per source label.
     */
    sourceCoverage(profiles: readonly SampleProfile[]): SourceCoverage[] {
        const samplesBySource = new Map<string, Set<string>>();

        for (const profile of profiles) {
            for (const hit of profile.hits) {
                for (const source of hit.sources) {
                    const samples = samplesBySource.get(source) ?? new Set<string>();
                    samples.add(profile.sampleId);
                    samplesBySource.set(source, samples);
                }
            }
        }

        return [...samplesBySource]
            .map(([source, samples]) => ({
                source,
                samplesWithHits: samples.size,
                percentage     : percent(samples.size, profiles.length),
            }))
            .sort((a, b) => b.samplesWithHits - a.samplesWithHits || compareStrings(a.source, b.source));
    }

    /**
     * Nominal tier of a marker (category tier, or highest tier of a flag's categories).
     */
    markerTier(marker: string): RiskTier | undefined {
        return this.markerTiers.get(marker);
    }

    private carries(profile: SampleProfile, marker: string): boolean {
        return profile.flags[marker] === true || profile.categories.includes(marker);
    }

    private severityOf(markers: readonly string[]): RiskTier {
        let severity: RiskTier = "ENVIRONMENTAL";
        for (const marker of markers) {
            const tier = this.markerTiers.get(marker);
            if (tier && tierSeverity(tier) > tierSeverity(severity)) {
                severity = tier;
            }
        }
        return severity;
    }
}
