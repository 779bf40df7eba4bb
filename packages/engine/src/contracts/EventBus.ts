/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for internal event flow within the cohort engine.
 * Reporting and logging subscribe to events instead of being called directly.
 *
 * Design decisions:
 * - Synchronous dispatch
 * - In-memory implementation (no external queue dependency)
 * - Ordering is preserved within a single event type
 *
 * @module @resistome/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Run ID for correlation */
    readonly runId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Cohort-level lifecycle events.
 */
export type CohortEventType =
    | "cohort:started"
    | "cohort:patterns"
    | "cohort:completed"
    | "cohort:failed";

/**
 * Events emitted while a sample is processed.
 */
export type SampleEventType =
    | "sample:received"
    | "sample:profiled"
    | "sample:excluded"
    | "hit:unresolved"
    | "hit:rejected"
    | "hit:discrepant";

/**
 * All known event types. Other strings are allowed for extensions.
 */
export type EventType = CohortEventType | SampleEventType | (string & {});

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("sample:excluded", (event) => {
 *     console.warn("Excluded:", event.data);
 * });
 *
 * bus.emit(createEvent("sample:excluded", { sampleId: "S7", reason: "bad identity" }));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type (or "*" for all events).
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type (or "*"/undefined for all).
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param runId - Optional run ID
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    runId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        runId,
        data,
    };
}
