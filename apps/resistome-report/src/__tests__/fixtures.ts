/**
 * @fileoverview Shared test helpers for the report application
 *
 * @module __tests__/fixtures
 */

import { vi } from "vitest";
import type { AdapterContext, EngineLogger } from "@resistome/engine";

export function createMockLogger(): EngineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

export function createAdapterContext(fileName: string, logger: EngineLogger = createMockLogger()): AdapterContext {
    return { fileName, logger };
}

/**
 * Join cells with tabs and rows with newlines.
 */
export function tsv(...rows: string[][]): string {
    return `${rows.map((row) => row.join("\t")).join("\n")}\n`;
}
