/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A simple, synchronous, in-memory event bus for a single pipeline process.
 *
 * @module @resistome/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * Called when a handler throws or its promise rejects.
 */
export type HandlerErrorReporter = (eventType: string, error: unknown) => void;

export interface InMemoryEventBusOptions {
    /** Defaults to console.error */
    readonly onHandlerError?: HandlerErrorReporter;
}

const defaultReporter: HandlerErrorReporter = (eventType, error) => {
    console.error(`EventBus handler error for ${eventType}:`, error);
};

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A failing handler never prevents the others from running
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("sample:profiled", (event) => {
 *     console.log("Profiled:", event.data);
 * });
 *
 * bus.emit(createEvent("sample:profiled", { sampleId: "S1", tier: "CRITICAL" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly onHandlerError: HandlerErrorReporter;

    constructor(options: InMemoryEventBusOptions = {}) {
        this.onHandlerError = options.onHandlerError ?? defaultReporter;
    }

    /**
     * Emit an event to all subscribers.
     *
     * Specific handlers run first, then wildcard handlers.
     */
    emit(event: EventPayload): void {
        this.dispatch(event, this.handlers.get(event.type));
        this.dispatch(event, this.handlers.get("*"));
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const wrappedHandler: EventHandler = (event) => {
            subscription.unsubscribe();
            return handler(event);
        };

        const subscription = this.subscribe(eventType, wrappedHandler);
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" for all, undefined clears everything)
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(event: EventPayload, handlers: Set<EventHandler> | undefined): void {
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe during iteration
        for (const handler of [...handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.onHandlerError(event.type, error));
                }
            }
            catch (error) {
                this.onHandlerError(event.type, error);
            }
        }
    }
}
