/**
 * @fileoverview AMRFinderPlus adapter
 *
 * Parses AMRFinderPlus tab-separated reports. Both the current column
 * names ("Element symbol", "% Identity to reference") and the older ones
 * ("Gene symbol", "% Identity to reference sequence") are understood.
 *
 * The sample comes from the `Name` column (present when AMRFinderPlus ran
 * with `--name`), otherwise from the file name: `S1.amrfinder.tsv`.
 *
 * @module domain/adapters/AmrFinderAdapter
 */

import type {
    AdapterContext,
    AdapterOutput,
    AmrFinderHit,
    SourceAdapter,
} from "@resistome/engine";
import {
    normalizeSampleId,
    optionalCell,
    parseOptionalInt,
    parsePercent,
    parseTsv,
    sampleFromFileName,
} from "../utils/index.js";

const kFILE_PATTERN = /[._]amrfinder(plus)?\.(tsv|txt)$/i;

const kGENE_COLUMNS = ["Element symbol", "Gene symbol"];
const kIDENTITY_COLUMNS = ["% Identity to reference", "% Identity to reference sequence"];
const kCOVERAGE_COLUMNS = ["% Coverage of reference", "% Coverage of reference sequence"];

function pick(header: readonly string[], candidates: readonly string[]): string | undefined {
    return candidates.find((column) => header.includes(column));
}

export class AmrFinderAdapter implements SourceAdapter {
    readonly id = "amrfinder-tsv";
    readonly tool = "AMRFinder";
    readonly name = "AMRFinderPlus report";

    matches(fileName: string): boolean {
        return kFILE_PATTERN.test(fileName);
    }

    sampleIdFor(fileName: string): string | undefined {
        return sampleFromFileName(fileName, kFILE_PATTERN);
    }

    /**
     * @throws Error if a required column is missing or the sample cannot be told
     */
    parse(content: string, context: AdapterContext): AdapterOutput {
        const { header, rows } = parseTsv(content);
        if (header.length === 0) {
            return { hits: [], typing: [] };
        }

        const geneColumn = pick(header, kGENE_COLUMNS);
        const identityColumn = pick(header, kIDENTITY_COLUMNS);
        const coverageColumn = pick(header, kCOVERAGE_COLUMNS);

        if (!geneColumn || !identityColumn || !coverageColumn) {
            const missing = [
                geneColumn ? undefined : kGENE_COLUMNS[0],
                identityColumn ? undefined : kIDENTITY_COLUMNS[0],
                coverageColumn ? undefined : kCOVERAGE_COLUMNS[0],
            ].filter((column): column is string => column !== undefined);
            throw new Error(`Missing AMRFinderPlus columns: ${missing.join(", ")}`);
        }

        const fileSample = this.sampleIdFor(context.fileName);
        const hits: AmrFinderHit[] = [];

        rows.forEach((row, index) => {
            const gene = optionalCell(row[geneColumn]);
            if (!gene) {
                context.logger.warn("Row without a gene symbol skipped", { row: index + 2 });
                return;
            }

            const named = optionalCell(row["Name"]);
            const sampleId = named ? normalizeSampleId(named) : fileSample;
            if (!sampleId) {
                throw new Error("Cannot tell the sample: no Name column and no sample in the file name");
            }

            hits.push({
                format        : "amrfinder",
                sampleId,
                tool          : this.tool,
                gene,
                identity      : parsePercent(row[identityColumn]),
                coverage      : parsePercent(row[coverageColumn]),
                contig        : optionalCell(row["Contig id"]),
                start         : parseOptionalInt(row["Start"]),
                end           : parseOptionalInt(row["Stop"]),
                elementType   : optionalCell(row["Type"] ?? row["Element type"]),
                elementSubtype: optionalCell(row["Subtype"] ?? row["Element subtype"]),
                drugClass     : optionalCell(row["Class"]),
                drugSubclass  : optionalCell(row["Subclass"]),
                method        : optionalCell(row["Method"]),
            });
        });

        return { hits, typing: [] };
    }
}
