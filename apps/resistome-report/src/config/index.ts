/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export { loadAppConfig, type AppConfig } from "./env.js";
export {
    loadPipelineSettings,
    loadPipelineSettingsWithFallback,
    getDefaultSettings,
} from "./loadSettings.js";
