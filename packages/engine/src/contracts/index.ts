/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and types shared by the engine, its loaders and the
 * source adapters that feed it.
 *
 * @module @resistome/engine/contracts
 */

// Gene definitions and tiers
export type {
    CategoryDefinition,
    GeneCategory,
    GeneDefinition,
    RiskTier,
    SampleTier,
} from "./GeneDefinition.js";
export {
    RISK_TIERS,
    UNCATEGORIZED,
    compareTiersDescending,
    isRiskTier,
    maxTier,
    tierSeverity,
} from "./GeneDefinition.js";

// Raw records
export type {
    AbricateHit,
    AmrFinderHit,
    CapsuleLocusRecord,
    GenericHit,
    MlstRecord,
    RawHit,
    RawHitFormat,
    SampleInput,
    TypingRecord,
} from "./RawHit.js";
export { sourceLabel } from "./RawHit.js";

// Merged hits and profiles
export type {
    CanonicalHit,
    IdentityDiscrepancy,
    NormalizedCandidate,
    ReportedIdentity,
} from "./CanonicalHit.js";
export type {
    SampleProfile,
    SchemeType,
    TypingSummary,
} from "./SampleProfile.js";

// Patterns
export type {
    FlagRule,
    Pattern,
    PatternRule,
} from "./Pattern.js";

// Diagnostics
export type {
    Diagnostic,
    DiagnosticKind,
    DiagnosticsReport,
    DiscrepantMergeDiagnostic,
    LowQualityHitDiagnostic,
    MalformedSampleDiagnostic,
    UnresolvedGeneDiagnostic,
} from "./Diagnostics.js";
export { summarizeDiagnostics } from "./Diagnostics.js";

// Dataset
export type {
    CohortDataset,
    CooccurrencePair,
    DistributionEntry,
    GeneSummary,
    SourceCoverage,
    TypingDistributions,
} from "./CohortDataset.js";

// Logging
export type { EngineLogger, PluginLogger } from "./Logger.js";
export { createConsoleLogger, createScopedLogger } from "./Logger.js";

// Source adapter contract
export type {
    AdapterContext,
    AdapterOutput,
    SourceAdapter,
} from "./SourceAdapter.js";
export { isSourceAdapter } from "./SourceAdapter.js";

// SampleProvider contract
export type {
    ProviderFailure,
    SampleBatch,
    SampleProvider,
} from "./SampleProvider.js";

// EventBus contract
export type {
    CohortEventType,
    EventBus,
    EventHandler,
    EventPayload,
    EventType,
    SampleEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
