/**
 * @fileoverview Engine barrel exports
 *
 * @module @resistome/engine/engine
 */

export {
    CohortEngine,
    type CohortEngineConfig,
    type RunOptions,
    type SampleOutcome,
} from "./CohortEngine.js";
