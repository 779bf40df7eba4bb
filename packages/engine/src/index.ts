/**
 * @fileoverview Resistome Engine
 *
 * Tool-agnostic aggregation and risk classification of genomic detections
 * across a cohort of bacterial assemblies.
 *
 * The engine provides:
 * - Gene nomenclature reconciliation against a YAML knowledge base
 * - Threshold filtering and cross-tool deduplication
 * - Per-sample risk tiers and flags
 * - Cohort-wide prevalence, patterns, co-occurrence and typing distributions
 *
 * @module @resistome/engine
 * @example
 * ```typescript
 * import { CohortEngine, loadKnowledgeBase } from "@resistome/engine";
 *
 * const knowledgeBase = loadKnowledgeBase("./config/genes.yml");
 * const engine = new CohortEngine({ knowledgeBase, settings });
 * const dataset = await engine.run(samples);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Errors
// ============================================================================

export {
    ConfigError,
    DatasetInvariantViolation,
    KnowledgeBaseError,
    MalformedSampleInputError,
    ResistomeError,
    errorMessage,
    formatIssues,
} from "./errors.js";

// ============================================================================
// Knowledge base and settings
// ============================================================================

export { GeneKnowledgeBase, type ResolveResult } from "./knowledge/GeneKnowledgeBase.js";
export {
    KnowledgeBaseLoader,
    loadKnowledgeBase,
    type KnowledgeBaseLoaderConfig,
    type LoadKnowledgeBaseOptions,
} from "./knowledge/KnowledgeBaseLoader.js";
export {
    knowledgeBaseSchema,
    type KnowledgeBaseConfig,
    type KnowledgeBaseExtensionInput,
    type KnowledgeBaseInput,
} from "./knowledge/schema.js";
export {
    kDEFAULT_FLAGS,
    pipelineSettingsSchema,
    type PipelineSettings,
    type PipelineSettingsInput,
    type UnresolvedPolicy,
} from "./settings/schema.js";

// ============================================================================
// Pipeline stages
// ============================================================================

export {
    RecordNormalizer,
    type NormalizeResult,
    type RecordNormalizerOptions,
} from "./normalize/RecordNormalizer.js";
export { MergeEngine, type MergeEngineOptions } from "./merge/MergeEngine.js";
export { RiskClassifier, type RiskClassifierOptions } from "./classify/RiskClassifier.js";
export {
    PatternEngine,
    distribution,
    type CohortAnalysis,
    type PatternEngineOptions,
} from "./patterns/PatternEngine.js";
export { DatasetBuilder, type DatasetParts } from "./dataset/DatasetBuilder.js";
export { validateSampleInput } from "./validation/rawRecordSchemas.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";
export { SourceAdapterLoader } from "./plugins/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    CohortEngine,
    type CohortEngineConfig,
    type RunOptions,
    type SampleOutcome,
} from "./engine/index.js";
