/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * @module @resistome/engine/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createEvent, type EventPayload } from "../contracts/EventBus.js";

const kPROFILED: EventPayload = {
    type     : "sample:profiled",
    timestamp: "2026-03-02T09:00:00.000Z",
    runId    : "run_test",
    data     : { sampleId: "S1", tier: "CRITICAL" },
};

const kEXCLUDED: EventPayload = {
    type     : "sample:excluded",
    timestamp: "2026-03-02T09:00:01.000Z",
    runId    : "run_test",
    data     : { sampleId: "S2", reason: "invalid records" },
};

describe("InMemoryEventBus", () => {
    let reporter: ReturnType<typeof vi.fn>;
    let bus: InMemoryEventBus;

    beforeEach(() => {
        reporter = vi.fn();
        bus = new InMemoryEventBus({ onHandlerError: reporter });
    });

    describe("subscribe and emit", () => {
        // Scenario: Handler receives events of its type only
        it("should deliver events to handlers of the matching type", () => {
            const onProfiled = vi.fn();
            bus.subscribe("sample:profiled", onProfiled);

            bus.emit(kPROFILED);
            bus.emit(kEXCLUDED);

            expect(onProfiled).toHaveBeenCalledTimes(1);
            expect(onProfiled).toHaveBeenCalledWith(kPROFILED);
        });

        // Scenario: Wildcard sees everything, after specific handlers
        it("should call wildcard handlers after specific ones", () => {
            const order: string[] = [];
            bus.subscribe("*", (event) => {
                order.push(`*:${event.type}`);
            });
            bus.subscribe("sample:profiled", () => {
                order.push("specific");
            });

            bus.emit(kPROFILED);
            bus.emit(kEXCLUDED);

            expect(order).toEqual(["specific", "*:sample:profiled", "*:sample:excluded"]);
        });

        // Scenario: Run id travels with the event
        it("should keep the run id of events built by createEvent", () => {
            const handler = vi.fn();
            bus.subscribe("cohort:started", handler);

            bus.emit(createEvent("cohort:started", { samples: 3 }, "run_abc"));

            expect(handler).toHaveBeenCalledWith(expect.objectContaining({
                type : "cohort:started",
                runId: "run_abc",
                data : { samples: 3 },
            }));
        });
    });

    describe("once", () => {
        // Scenario: One-time handler
        it("should call a once handler for the first event only", () => {
            const handler = vi.fn();
            bus.once("sample:profiled", handler);

            bus.emit(kPROFILED);
            bus.emit(kPROFILED);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(bus.handlerCount("sample:profiled")).toBe(0);
        });

        // Scenario: Cancelled before any event
        it("should allow a once handler to be cancelled", () => {
            const handler = vi.fn();
            bus.once("sample:profiled", handler).unsubscribe();

            bus.emit(kPROFILED);

            expect(handler).not.toHaveBeenCalled();
        });
    });

    describe("unsubscribe and clear", () => {
        // Scenario: Unsubscribe leaves other handlers in place
        it("should stop only the unsubscribed handler", () => {
            const first = vi.fn();
            const second = vi.fn();
            const subscription = bus.subscribe("sample:excluded", first);
            bus.subscribe("sample:excluded", second);

            subscription.unsubscribe();
            subscription.unsubscribe();
            bus.emit(kEXCLUDED);

            expect(first).not.toHaveBeenCalled();
            expect(second).toHaveBeenCalledTimes(1);
        });

        // Scenario: Clearing one type
        it("should clear handlers of one type", () => {
            bus.subscribe("sample:profiled", vi.fn());
            bus.subscribe("sample:excluded", vi.fn());

            bus.clear("sample:profiled");

            expect(bus.handlerCount("sample:profiled")).toBe(0);
            expect(bus.handlerCount("sample:excluded")).toBe(1);
        });

        // Scenario: Clearing everything
        it("should clear every handler when no type is given", () => {
            bus.subscribe("sample:profiled", vi.fn());
            bus.subscribe("*", vi.fn());

            bus.clear();

            expect(bus.handlerCount("sample:profiled")).toBe(0);
            expect(bus.handlerCount("*")).toBe(0);
        });
    });

    describe("handler errors", () => {
        // Scenario: Throwing handler
        it("should report a throwing handler and keep dispatching", () => {
            const failure = new Error("subscriber broke");
            const after = vi.fn();
            bus.subscribe("sample:profiled", () => {
                throw failure;
            });
            bus.subscribe("sample:profiled", after);

            bus.emit(kPROFILED);

            expect(after).toHaveBeenCalledTimes(1);
            expect(reporter).toHaveBeenCalledWith("sample:profiled", failure);
        });

        // Scenario: Async handler rejects
        it("should report a rejected handler promise", async () => {
            const failure = new Error("async subscriber broke");
            bus.subscribe("sample:excluded", async () => {
                throw failure;
            });

            bus.emit(kEXCLUDED);
            await new Promise((resolve) => setImmediate(resolve));

            expect(reporter).toHaveBeenCalledWith("sample:excluded", failure);
        });

        // Scenario: Default reporter writes to the console
        it("should fall back to console.error", () => {
            const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
            const plain = new InMemoryEventBus();
            plain.subscribe("sample:profiled", () => {
                throw new Error("boom");
            });

            plain.emit(kPROFILED);

            expect(consoleSpy).toHaveBeenCalledTimes(1);
            consoleSpy.mockRestore();
        });
    });
});
