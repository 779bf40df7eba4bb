/**
 * @fileoverview ABRicate adapter
 *
 * Parses ABRicate tab-separated reports against any database (card,
 * resfinder, ncbi, vfdb, bacmet2, ...). Reports concatenated from several
 * runs repeat the `#FILE` header line; repeats are skipped.
 *
 * @module domain/adapters/AbricateAdapter
 */

import type {
    AbricateHit,
    AdapterContext,
    AdapterOutput,
    SourceAdapter,
} from "@resistome/engine";
import {
    contentLines,
    missingColumns,
    normalizeSampleId,
    optionalCell,
    parseOptionalInt,
    parsePercent,
    sampleFromFileName,
    toRecord,
} from "../utils/index.js";

const kFILE_PATTERN = /[._]abricate([._]\w+)?\.(tsv|txt)$/i;
const kREQUIRED_COLUMNS = ["FILE", "GENE", "%COVERAGE", "%IDENTITY"];

export class AbricateAdapter implements SourceAdapter {
    readonly id = "abricate-tsv";
    readonly tool = "ABRicate";
    readonly name = "ABRicate report";

    matches(fileName: string): boolean {
        return kFILE_PATTERN.test(fileName);
    }

    sampleIdFor(fileName: string): string | undefined {
        return sampleFromFileName(fileName, kFILE_PATTERN);
    }

    /**
     * @throws Error if the header line is missing or lacks a required column
     */
    parse(content: string, context: AdapterContext): AdapterOutput {
        const lines = contentLines(content);
        const [first] = lines;
        if (first === undefined) {
            return { hits: [], typing: [] };
        }
        if (!first.startsWith("#")) {
            throw new Error("Missing ABRicate header line (#FILE ...)");
        }

        const header = first.slice(1).split("\t").map((column) => column.trim());
        const missing = missingColumns(header, kREQUIRED_COLUMNS);
        if (missing.length > 0) {
            throw new Error(`Missing ABRicate columns: ${missing.join(", ")}`);
        }

        const hits: AbricateHit[] = [];

        lines.slice(1).forEach((line, index) => {
            if (line.startsWith("#")) {
                return;
            }

            const row = toRecord(header, line.split("\t"));
            const gene = optionalCell(row["GENE"]);
            const file = optionalCell(row["FILE"]);
            if (!gene || !file) {
                context.logger.warn("Row without a gene or file skipped", { row: index + 2 });
                return;
            }

            hits.push({
                format    : "abricate",
                sampleId  : normalizeSampleId(file),
                tool      : this.tool,
                gene,
                identity  : parsePercent(row["%IDENTITY"]),
                coverage  : parsePercent(row["%COVERAGE"]),
                database  : optionalCell(row["DATABASE"]) ?? "unknown",
                contig    : optionalCell(row["SEQUENCE"]),
                start     : parseOptionalInt(row["START"]),
                end       : parseOptionalInt(row["END"]),
                accession : optionalCell(row["ACCESSION"]),
                product   : optionalCell(row["PRODUCT"]),
                resistance: optionalCell(row["RESISTANCE"]),
            });
        });

        return { hits, typing: [] };
    }
}
