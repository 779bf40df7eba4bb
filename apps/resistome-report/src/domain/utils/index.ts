/**
 * @fileoverview Domain utilities barrel exports
 *
 * @module domain/utils
 */

export { normalizeSampleId, sampleFromFileName } from "./sampleId.js";
export {
    contentLines,
    missingColumns,
    optionalCell,
    parseOptionalInt,
    parseOptionalNumber,
    parsePercent,
    parseTsv,
    toRecord,
} from "./table.js";
