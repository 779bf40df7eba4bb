/**
 * SampleProvider Contract
 *
 * Sample providers are passive data sources. The engine pulls the complete
 * cohort from a provider once per run.
 *
 * Design principles:
 * - Passive: providers don't push; the engine pulls
 * - Whole cohort: one call returns every sample of the run
 * - Honest: inputs that could not be read are reported, not hidden
 */

import type { SampleInput } from "./RawHit.js";

/**
 * An input the provider could not turn into records.
 */
export interface ProviderFailure {
    /** Sample the failure belongs to, when it can be told */
    readonly sampleId?: string;

    /** File or other source of the failure */
    readonly source: string;

    readonly reason: string;
}

/**
 * Result of gathering a cohort.
 */
export interface SampleBatch {
    readonly samples: readonly SampleInput[];
    readonly failures: readonly ProviderFailure[];
}

/**
 * SampleProvider interface.
 *
 * @example
 * ```typescript
 * class DirectoryProvider implements SampleProvider {
 *     readonly id = "directory";
 *     readonly name = "Tool output directory";
 *
 *     async getSamples() {
 *         const files = await listFiles(this.dir);
 *         return groupBySample(files.flatMap(parseFile));
 *     }
 * }
 * ```
 */
export interface SampleProvider {
    /** Unique identifier for this provider */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    readonly description?: string;

    /**
     * Initialize the provider. Called once before getSamples().
     */
    initialize?(): Promise<void>;

    /**
     * Gather every sample of the cohort.
     */
    getSamples(): Promise<SampleBatch>;

    /**
     * Release resources. Called once after the run, even when it failed.
     */
    shutdown?(): Promise<void>;
}
