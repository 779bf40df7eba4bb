/**
 * @fileoverview Error types
 *
 * Structured errors raised by the engine and its loaders.
 * Recoverable per-record problems are not errors; they become diagnostics.
 *
 * @module @resistome/engine/errors
 */

import type { ZodError } from "zod";

/**
 * Base error class for all engine errors.
 */
export class ResistomeError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: string,
        options?: {
            cause?: unknown;
            context?: Record<string, unknown>;
        }
    ) {
        super(message);
        this.name = "ResistomeError";
        this.code = code;
        this.context = options?.context;

        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }

        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name   : this.name,
            code   : this.code,
            message: this.message,
            context: this.context,
            stack  : this.stack,
        };
    }
}

/**
 * Invalid pipeline settings or environment.
 */
export class ConfigError extends ResistomeError {
    constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
        super(message, "CONFIG_ERROR", { context, cause });
        this.name = "ConfigError";
    }
}

/**
 * Invalid gene knowledge base (unknown category, alias collision, bad regex).
 */
export class KnowledgeBaseError extends ResistomeError {
    constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
        super(message, "KNOWLEDGE_BASE_ERROR", { context, cause });
        this.name = "KnowledgeBaseError";
    }
}

/**
 * A sample's raw records are structurally invalid. The sample is excluded.
 */
export class MalformedSampleInputError extends ResistomeError {
    public readonly sampleId: string;
    public readonly reason: string;
    public readonly issues: readonly string[];

    constructor(sampleId: string, reason: string, issues: readonly string[] = []) {
        super(`Malformed input for sample ${sampleId}: ${reason}`, "MALFORMED_SAMPLE_INPUT", {
            context: { sampleId, issues },
        });
        this.name = "MalformedSampleInputError";
        this.sampleId = sampleId;
        this.reason = reason;
        this.issues = issues;
    }
}

/**
 * The assembled dataset breaks one of its invariants. Always fatal:
 * it means a defect upstream, not bad input.
 */
export class DatasetInvariantViolation extends ResistomeError {
    public readonly violations: readonly string[];

    constructor(violations: readonly string[]) {
        super(
            `Dataset invariant violated: ${violations[0] ?? "unknown"}` +
                (violations.length > 1 ? ` (+${violations.length - 1} more)` : ""),
            "DATASET_INVARIANT_VIOLATION",
            { context: { violations } }
        );
        this.name = "DatasetInvariantViolation";
        this.violations = violations;
    }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * One line per zod issue: "path.to.field: message".
 */
export function formatIssues(error: ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}
