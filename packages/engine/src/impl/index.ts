/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @resistome/engine/impl
 */

export {
    InMemoryEventBus,
    type HandlerErrorReporter,
    type InMemoryEventBusOptions,
} from "./InMemoryEventBus.js";
