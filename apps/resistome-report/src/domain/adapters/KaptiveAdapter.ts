/**
 * @fileoverview Kaptive adapter
 *
 * Parses Kaptive tables. The locus kind comes from the locus name:
 * `OCL` loci are outer-core (O) calls, `KL` loci capsule (K) calls.
 *
 * @module domain/adapters/KaptiveAdapter
 */

import type {
    AdapterContext,
    AdapterOutput,
    CapsuleLocusRecord,
    SourceAdapter,
} from "@resistome/engine";
import {
    missingColumns,
    normalizeSampleId,
    optionalCell,
    parseOptionalNumber,
    parseTsv,
    sampleFromFileName,
} from "../utils/index.js";

const kFILE_PATTERN = /[._]kaptive([._]\w+)?\.(tsv|txt)$/i;
const kREQUIRED_COLUMNS = ["Assembly", "Best match locus"];

/**
 * K or O from a locus name; undefined for anything else.
 */
export function locusTypeOf(locus: string): CapsuleLocusRecord["locusType"] | undefined {
    const upper = locus.toUpperCase();
    if (upper.includes("OCL")) {
        return "O";
    }
    if (upper.includes("KL")) {
        return "K";
    }
    return undefined;
}

export class KaptiveAdapter implements SourceAdapter {
    readonly id = "kaptive";
    readonly tool = "Kaptive";
    readonly name = "Kaptive table";

    matches(fileName: string): boolean {
        return kFILE_PATTERN.test(fileName);
    }

    sampleIdFor(fileName: string): string | undefined {
        return sampleFromFileName(fileName, kFILE_PATTERN);
    }

    /**
     * @throws Error if a required column is missing
     */
    parse(content: string, context: AdapterContext): AdapterOutput {
        const { header, rows } = parseTsv(content);
        if (header.length === 0) {
            return { hits: [], typing: [] };
        }

        const missing = missingColumns(header, kREQUIRED_COLUMNS);
        if (missing.length > 0) {
            throw new Error(`Missing Kaptive columns: ${missing.join(", ")}`);
        }

        const typing: CapsuleLocusRecord[] = [];

        rows.forEach((row, index) => {
            const assembly = optionalCell(row["Assembly"]);
            const locus = optionalCell(row["Best match locus"]);
            const locusType = locus ? locusTypeOf(locus) : undefined;

            if (!assembly || !locus || !locusType) {
                context.logger.warn("Row without a K or O locus skipped", { row: index + 2, locus });
                return;
            }

            typing.push({
                kind      : "kaptive",
                sampleId  : normalizeSampleId(assembly),
                tool      : this.tool,
                locusType,
                locus,
                confidence: optionalCell(row["Match confidence"]),
                identity  : parseOptionalNumber(row["Identity"]),
                coverage  : parseOptionalNumber(row["Coverage"]),
            });
        });

        return { hits: [], typing };
    }
}
