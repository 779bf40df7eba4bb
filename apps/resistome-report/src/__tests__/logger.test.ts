/**
 * @fileoverview Unit tests for AppLogger
 *
 * @module __tests__/logger
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { AppLogger, consoleSink, type LogEntry } from "../logger.js";

describe("AppLogger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // Scenario: Level "warn" drops debug and info
    it("should drop entries below its level", () => {
        const sink = vi.fn();
        const logger = new AppLogger({ level: "warn", sink });

        logger.debug("d");
        logger.info("i");
        logger.warn("w", { a: 1 });

        expect(sink).toHaveBeenCalledTimes(1);
        expect(sink).toHaveBeenCalledWith({
            timestamp: expect.any(String),
            level    : "warn",
            message  : "w",
            context  : { a: 1 },
        });
    });

    it("should leave out an empty context", () => {
        const sink = vi.fn();
        new AppLogger({ sink }).info("hello");

        expect(sink.mock.calls[0]?.[0]).toEqual({
            timestamp: expect.any(String),
            level    : "info",
            message  : "hello",
        });
    });

    // Scenario: Child carries run context, inherits level and sink
    it("should merge child context into every entry", () => {
        const sink = vi.fn();
        const child = new AppLogger({ level: "debug", sink }).child({ runId: "r1" });

        child.debug("x", { sampleId: "S1" });

        expect(child.level).toBe("debug");
        expect(sink).toHaveBeenCalledWith(expect.objectContaining({
            message: "x",
            context: { runId: "r1", sampleId: "S1" },
        }));
    });

    it("should report a failing sink on the console", () => {
        const failure = new Error("disk full");
        const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
        const logger = new AppLogger({ sink: () => { throw failure; } });

        logger.error("boom");

        expect(consoleError).toHaveBeenCalledWith("Logger sink error:", failure);
    });
});

describe("consoleSink", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    const entry: LogEntry = {
        timestamp: "2024-01-01T00:00:00.000Z",
        level    : "info",
        message  : "hello",
        context  : { a: 1 },
    };

    it("should write one colored line with JSON context", () => {
        const consoleLog = vi.spyOn(console, "log").mockImplementation(() => undefined);

        consoleSink(entry);

        expect(consoleLog).toHaveBeenCalledWith("\x1b[36m[2024-01-01T00:00:00.000Z] [INFO]\x1b[0m hello {\"a\":1}");
    });

    it("should write errors to stderr", () => {
        const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);

        consoleSink({ ...entry, level: "error", context: undefined });

        expect(consoleError).toHaveBeenCalledWith("\x1b[31m[2024-01-01T00:00:00.000Z] [ERROR]\x1b[0m hello");
    });
});
