/**
 * @fileoverview Adapter loader barrel exports
 *
 * @module @resistome/engine/plugins
 */

export {
    SourceAdapterLoader,
    type SourceAdapterLoaderConfig,
} from "./SourceAdapterLoader.js";
