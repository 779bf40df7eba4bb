/**
 * Source Adapter Contract
 *
 * One adapter per tool output format. Adapters turn a file's text into raw
 * records and keep format churn out of the engine.
 *
 * Design principles:
 * - Pure: parse() has no side effects beyond logging
 * - Lenient: adapters report what the file says; the engine validates
 * - Tagged: every record carries its format and source tool
 */

import type { RawHit, TypingRecord } from "./RawHit.js";
import type { PluginLogger } from "./Logger.js";

/**
 * Context provided to adapters while parsing a file.
 */
export interface AdapterContext {
    /** Base name of the file being parsed */
    readonly fileName: string;

    readonly logger: PluginLogger;
}

/**
 * Records parsed from one file. A file may cover several samples.
 */
export interface AdapterOutput {
    readonly hits: readonly RawHit[];
    readonly typing: readonly TypingRecord[];
}

/**
 * Source Adapter interface.
 *
 * @example
 * ```typescript
 * const rgiAdapter: SourceAdapter = {
 *     id     : "rgi-tsv",
 *     tool   : "RGI",
 *     matches: (fileName) => fileName.endsWith(".rgi.txt"),
 *     parse(content, context) {
 *         const hits = parseRgiRows(content, context.fileName);
 *         return { hits, typing: [] };
 *     },
 * };
 * ```
 */
export interface SourceAdapter {
    /** Unique identifier for this adapter */
    readonly id: string;

    /** Tool name stamped on every record this adapter produces */
    readonly tool: string;

    readonly name?: string;
    readonly description?: string;

    /**
     * Whether this adapter understands the file.
     *
     * @param fileName - Base name of the candidate file
     */
    matches(fileName: string): boolean;

    /**
     * Sample named by a file of this format, when the name carries one.
     * Used to attribute unreadable files and files without records.
     */
    sampleIdFor?(fileName: string): string | undefined;

    /**
     * Parse a file's content into raw records.
     *
     * @param content - Full text of the file
     * @param context - File name and logger
     */
    parse(content: string, context: AdapterContext): AdapterOutput;
}

/**
 * Type guard to check if an object is a SourceAdapter.
 */
export function isSourceAdapter(obj: unknown): obj is SourceAdapter {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "tool" in obj &&
        typeof obj.tool === "string" &&
        "matches" in obj &&
        typeof obj.matches === "function" &&
        "parse" in obj &&
        typeof obj.parse === "function"
    );
}
