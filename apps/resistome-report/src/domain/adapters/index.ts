/**
 * @fileoverview Source adapters barrel exports
 *
 * @module domain/adapters
 */

import type { SourceAdapter } from "@resistome/engine";
import { AbricateAdapter } from "./AbricateAdapter.js";
import { AmrFinderAdapter } from "./AmrFinderAdapter.js";
import { KaptiveAdapter } from "./KaptiveAdapter.js";
import { MlstAdapter } from "./MlstAdapter.js";

export { AbricateAdapter, AmrFinderAdapter, KaptiveAdapter, MlstAdapter };
export { parseSequenceType } from "./MlstAdapter.js";
export { locusTypeOf } from "./KaptiveAdapter.js";

/**
 * Adapters for the tool formats supported out of the box.
 */
export function createBuiltInAdapters(): SourceAdapter[] {
    return [
        new AmrFinderAdapter(),
        new AbricateAdapter(),
        new MlstAdapter(),
        new KaptiveAdapter(),
    ];
}
