/**
 * @fileoverview CohortEngine
 *
 * The orchestration engine for a cohort run.
 *
 * Pipeline flow:
 * 1. Samples gathered (from a provider or handed in directly)
 * 2. Per sample, independently: validate, normalize, merge, classify,
 *    in batches of workerCount with a yield to the event loop after each
 * 3. Barrier: every sample is profiled or excluded
 * 4. Whole-cohort pattern analysis
 * 5. Dataset assembly and invariant check
 *
 * Design principles:
 * - Tool-agnostic: knows nothing about file formats
 * - Partial over total failure: a bad sample is excluded, the run goes on
 * - Observable: emits events at each lifecycle stage
 *
 * @module @resistome/engine/engine/CohortEngine
 */

import { setImmediate as yieldToEventLoop } from "timers/promises";
import type { CanonicalHit, NormalizedCandidate } from "../contracts/CanonicalHit.js";
import type { CohortDataset } from "../contracts/CohortDataset.js";
import type { Diagnostic, MalformedSampleDiagnostic } from "../contracts/Diagnostics.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { createConsoleLogger, createScopedLogger, type EngineLogger } from "../contracts/Logger.js";
import type { SampleInput } from "../contracts/RawHit.js";
import type { SampleProfile } from "../contracts/SampleProfile.js";
import type { ProviderFailure, SampleProvider } from "../contracts/SampleProvider.js";
import { ConfigError, MalformedSampleInputError, errorMessage, formatIssues } from "../errors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { RiskClassifier } from "../classify/RiskClassifier.js";
import { DatasetBuilder } from "../dataset/DatasetBuilder.js";
import type { GeneKnowledgeBase } from "../knowledge/GeneKnowledgeBase.js";
import { MergeEngine } from "../merge/MergeEngine.js";
import { RecordNormalizer } from "../normalize/RecordNormalizer.js";
import { PatternEngine } from "../patterns/PatternEngine.js";
import {
    pipelineSettingsSchema,
    type PipelineSettings,
    type PipelineSettingsInput,
} from "../settings/schema.js";
import { validateSampleInput } from "../validation/rawRecordSchemas.js";

/**
 * Engine configuration options.
 */
export interface CohortEngineConfig {
    readonly knowledgeBase: GeneKnowledgeBase;

    /** Pipeline settings; defaults apply to anything left out */
    readonly settings?: PipelineSettingsInput;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;
}

export interface RunOptions {
    /** Correlation id stamped on every event (generated when absent) */
    readonly runId?: string;

    /** Inputs a provider could not read; their samples are excluded */
    readonly failures?: readonly ProviderFailure[];
}

/**
 * Result of one sample task.
 */
export type SampleOutcome =
    | {
        readonly status: "profiled";
        readonly profile: SampleProfile;
        readonly diagnostics: readonly Diagnostic[];
    }
    | {
        readonly status: "excluded";
        readonly diagnostic: MalformedSampleDiagnostic;
    };

/**
 * Generate a unique id for a run.
 */
function generateRunId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `run_${timestamp}_${random}`;
}

function malformed(sampleId: string, reason: string, issues: readonly string[] = []): MalformedSampleDiagnostic {
    return { kind: "MalformedSampleInput", sampleId, reason, issues };
}

/**
 * CohortEngine - builds a CohortDataset from per-sample raw records.
 *
 * @example
 * ```typescript
 * const engine = new CohortEngine({ knowledgeBase, settings, logger });
 *
 * engine.eventBus.subscribe("sample:excluded", (event) => {
 *     console.warn("Excluded:", event.data);
 * });
 *
 * const dataset = await engine.runProvider(new ToolOutputProvider({ inputDir, adapters }));
 * ```
 */
export class CohortEngine {
    readonly settings: PipelineSettings;

    /** Public access to the event bus for external subscriptions */
    readonly eventBus: EventBus;

    private readonly logger: EngineLogger;
    private readonly normalizer: RecordNormalizer;
    private readonly merger: MergeEngine;
    private readonly classifier: RiskClassifier;
    private readonly patterns: PatternEngine;
    private readonly builder = new DatasetBuilder();

    /**
     * @throws ConfigError if the settings are invalid or a pattern names an unknown marker
     */
    constructor(config: CohortEngineConfig) {
        const parsed = pipelineSettingsSchema.safeParse(config.settings ?? {});
        if (!parsed.success) {
            throw new ConfigError("Invalid pipeline settings", { issues: formatIssues(parsed.error) });
        }

        this.settings = parsed.data;
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = config.logger ?? createConsoleLogger("CohortEngine");

        const { thresholds, typing } = this.settings;
        this.normalizer = new RecordNormalizer(config.knowledgeBase, {
            minIdentity     : thresholds.minIdentity,
            minCoverage     : thresholds.minCoverage,
            unresolvedPolicy: this.settings.unresolvedPolicy,
        });
        this.merger = new MergeEngine({
            toolPriority        : this.settings.toolPriority,
            discrepancyThreshold: this.settings.discrepancyThreshold,
        });
        this.classifier = new RiskClassifier({
            flags              : this.settings.flags,
            typingScheme       : typing.scheme,
            internationalClones: typing.internationalClones,
        });
        this.patterns = new PatternEngine(config.knowledgeBase, {
            patterns       : this.settings.patterns,
            flags          : this.settings.flags,
            minSupport     : this.settings.minSupport,
            minCooccurrence: this.settings.minCooccurrence,
            typingScheme   : typing.scheme,
        });
    }

    /**
     * Pull the cohort from a provider and run it.
     * The provider is shut down afterwards, even when the run fails.
     */
    async runProvider(provider: SampleProvider, options: Omit<RunOptions, "failures"> = {}): Promise<CohortDataset> {
        try {
            if (provider.initialize) {
                await provider.initialize();
            }
            this.logger.info("Provider initialized", { providerId: provider.id });

            const batch = await provider.getSamples();
            this.logger.info("Samples gathered", {
                providerId: provider.id,
                samples   : batch.samples.length,
                failures  : batch.failures.length,
            });

            return await this.run(batch.samples, { ...options, failures: batch.failures });
        }
        finally {
            if (provider.shutdown) {
                try {
                    await provider.shutdown();
                }
                catch (error) {
                    this.logger.error("Provider shutdown error", {
                        providerId: provider.id,
                        error     : errorMessage(error),
                    });
                }
            }
        }
    }

    /**
     * Run the full pipeline over a cohort.
     *
     * @throws DatasetInvariantViolation if assembly finds an inconsistency
     */
    async run(samples: readonly SampleInput[], options: RunOptions = {}): Promise<CohortDataset> {
        const runId = options.runId ?? generateRunId();
        const startTime = Date.now();
        const failures = options.failures ?? [];

        this.emit(createEvent("cohort:started", {
            samples : samples.length,
            failures: failures.length,
        }, runId));
        this.logger.info("Cohort run starting", { runId, samples: samples.length });

        try {
            const { runnable, excluded } = this.screen(samples, failures);
            for (const diagnostic of excluded) {
                this.reportExclusion(diagnostic, runId);
            }

            const profiles: SampleProfile[] = [];
            const diagnostics: Diagnostic[] = [...excluded];

            // Samples run one at a time; workerCount is how many run between
            // yields to the event loop.
            for (let i = 0; i < runnable.length; i += this.settings.workerCount) {
                const batch = runnable.slice(i, i + this.settings.workerCount);

                for (const input of batch) {
                    const outcome = this.processSample(input, runId);
                    if (outcome.status === "profiled") {
                        profiles.push(outcome.profile);
                        diagnostics.push(...outcome.diagnostics);
                    }
                    else {
                        diagnostics.push(outcome.diagnostic);
                        this.reportExclusion(outcome.diagnostic, runId);
                    }
                }

                await yieldToEventLoop();
            }

            const analysis = this.patterns.analyze(profiles);
            this.emit(createEvent("cohort:patterns", {
                patterns: analysis.patterns.map((p) => ({ name: p.name, severity: p.severity, count: p.count })),
            }, runId));

            const dataset = this.builder.build({
                profiles,
                analysis,
                diagnostics,
                totalSamples: samples.length + this.failureOnlySamples(samples, failures).length,
            });

            const duration = Date.now() - startTime;
            this.emit(createEvent("cohort:completed", {
                totalSamples   : dataset.totalSamples,
                analyzedSamples: dataset.analyzedSamples,
                excluded       : dataset.diagnostics.excludedSamples.length,
                patterns       : dataset.patterns.length,
                duration,
            }, runId));
            this.logger.info("Cohort run completed", {
                runId,
                analyzed: dataset.analyzedSamples,
                excluded: dataset.diagnostics.excludedSamples.length,
                genes   : dataset.genes.size,
                patterns: dataset.patterns.length,
                duration,
            });

            return dataset;
        }
        catch (error) {
            this.emit(createEvent("cohort:failed", { error: errorMessage(error) }, runId));
            this.logger.error("Cohort run failed", { runId, error: errorMessage(error) });
            throw error;
        }
    }

    /**
     * Validate, normalize, merge and classify one sample.
     * Never throws: any failure becomes an exclusion.
     */
    processSample(input: SampleInput, runId: string): SampleOutcome {
        const sampleId = typeof input.sampleId === "string" && input.sampleId.trim() ? input.sampleId : "(unnamed)";

        this.emit(createEvent("sample:received", {
            sampleId,
            hits  : Array.isArray(input.hits) ? input.hits.length : 0,
            typing: input.typing?.length ?? 0,
        }, runId));

        try {
            const issues = validateSampleInput(input);
            if (issues.length > 0) {
                throw new MalformedSampleInputError(sampleId, "invalid records", issues);
            }

            const diagnostics: Diagnostic[] = [];
            const candidates: NormalizedCandidate[] = [];
            const logger = createScopedLogger(this.logger, sampleId, { runId });

            for (const hit of input.hits) {
                const result = this.normalizer.normalize(hit);

                if (result.status === "accepted") {
                    candidates.push(result.candidate);
                    if (result.unresolved) {
                        diagnostics.push(result.unresolved);
                        logger.info("Unresolved gene kept as uncategorized", {
                            tool      : hit.tool,
                            identifier: hit.gene,
                        });
                        this.emit(createEvent("hit:unresolved", { ...result.unresolved }, runId));
                    }
                }
                else if (result.reason === "UnresolvedGene") {
                    diagnostics.push(result.diagnostic);
                    logger.info("Unresolved gene dropped", { tool: hit.tool, identifier: hit.gene });
                    this.emit(createEvent("hit:unresolved", { ...result.diagnostic }, runId));
                }
                else {
                    diagnostics.push(result.diagnostic);
                    logger.debug("Low-quality hit rejected", {
                        tool      : hit.tool,
                        identifier: hit.gene,
                        failed    : result.diagnostic.failed,
                    });
                    this.emit(createEvent("hit:rejected", { ...result.diagnostic }, runId));
                }
            }

            const hits = this.merger.mergeSample(candidates);
            for (const hit of hits) {
                this.recordDiscrepancy(hit, diagnostics, logger, runId);
            }

            const profile = this.classifier.buildProfile(sampleId, hits, input.typing ?? []);

            this.emit(createEvent("sample:profiled", {
                sampleId,
                tier : profile.tier,
                hits : profile.hits.length,
                flags: profile.flags,
            }, runId));

            return { status: "profiled", profile, diagnostics };
        }
        catch (error) {
            const diagnostic = error instanceof MalformedSampleInputError
                ? malformed(error.sampleId, error.reason, error.issues)
                : malformed(sampleId, errorMessage(error));
            return { status: "excluded", diagnostic };
        }
    }

    /**
     * Split the cohort into samples to process and samples excluded up
     * front: every copy of a duplicated id, and samples whose inputs the
     * provider could not read.
     */
    private screen(
        samples: readonly SampleInput[],
        failures: readonly ProviderFailure[]
    ): { runnable: SampleInput[]; excluded: MalformedSampleDiagnostic[] } {
        const counts = new Map<string, number>();
        for (const sample of samples) {
            counts.set(sample.sampleId, (counts.get(sample.sampleId) ?? 0) + 1);
        }

        const failed = new Map<string, ProviderFailure[]>();
        for (const failure of failures) {
            if (failure.sampleId === undefined) {
                this.logger.warn("Unreadable input without a sample", {
                    source: failure.source,
                    reason: failure.reason,
                });
                continue;
            }
            failed.set(failure.sampleId, [...(failed.get(failure.sampleId) ?? []), failure]);
        }

        const runnable: SampleInput[] = [];
        const excluded: MalformedSampleDiagnostic[] = [];

        for (const sample of samples) {
            const sampleFailures = failed.get(sample.sampleId);
            if ((counts.get(sample.sampleId) ?? 0) > 1) {
                excluded.push(malformed(sample.sampleId, "duplicate sample id in run"));
            }
            else if (sampleFailures) {
                excluded.push(malformed(
                    sample.sampleId,
                    "unreadable tool output",
                    sampleFailures.map((f) => `${f.source}: ${f.reason}`)
                ));
            }
            else {
                runnable.push(sample);
            }
        }

        for (const sampleId of this.failureOnlySamples(samples, failures)) {
            excluded.push(malformed(
                sampleId,
                "unreadable tool output",
                (failed.get(sampleId) ?? []).map((f) => `${f.source}: ${f.reason}`)
            ));
        }

        return { runnable, excluded };
    }

    /**
     * Samples known only through a provider failure.
     */
    private failureOnlySamples(samples: readonly SampleInput[], failures: readonly ProviderFailure[]): string[] {
        const known = new Set(samples.map((s) => s.sampleId));
        const ids = new Set<string>();
        for (const failure of failures) {
            if (failure.sampleId !== undefined && !known.has(failure.sampleId)) {
                ids.add(failure.sampleId);
            }
        }
        return [...ids].sort();
    }

    private recordDiscrepancy(
        hit: CanonicalHit,
        diagnostics: Diagnostic[],
        logger: EngineLogger,
        runId: string
    ): void {
        if (!hit.discrepancy) {
            return;
        }

        diagnostics.push({
            kind      : "DiscrepantMerge",
            sampleId  : hit.sampleId,
            gene      : hit.gene.name,
            spread    : hit.discrepancy.spread,
            identities: hit.discrepancy.identities,
        });
        logger.warn("Tools disagree on identity", {
            gene  : hit.gene.name,
            spread: hit.discrepancy.spread,
        });
        this.emit(createEvent("hit:discrepant", {
            sampleId: hit.sampleId,
            gene    : hit.gene.name,
            spread  : hit.discrepancy.spread,
        }, runId));
    }

    private reportExclusion(diagnostic: MalformedSampleDiagnostic, runId: string): void {
        this.logger.warn("Sample excluded", {
            runId,
            sampleId: diagnostic.sampleId,
            reason  : diagnostic.reason,
            issues  : diagnostic.issues,
        });
        this.emit(createEvent("sample:excluded", {
            sampleId: diagnostic.sampleId,
            reason  : diagnostic.reason,
            issues  : diagnostic.issues,
        }, runId));
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
