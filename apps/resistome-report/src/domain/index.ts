/**
 * @fileoverview Domain barrel exports
 *
 * Source adapters for the supported tool formats and the provider that
 * feeds their records to the engine.
 *
 * @module domain
 */

export {
    AbricateAdapter,
    AmrFinderAdapter,
    KaptiveAdapter,
    MlstAdapter,
    createBuiltInAdapters,
    locusTypeOf,
    parseSequenceType,
} from "./adapters/index.js";

export {
    ToolOutputProvider,
    type ToolOutputProviderConfig,
} from "./providers/index.js";

export { normalizeSampleId } from "./utils/index.js";
