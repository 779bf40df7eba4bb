/**
 * @fileoverview Sample providers barrel exports
 *
 * @module domain/providers
 */

export {
    ToolOutputProvider,
    type ToolOutputProviderConfig,
} from "./ToolOutputProvider.js";
