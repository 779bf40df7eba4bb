/**
 * @fileoverview mlst adapter
 *
 * Parses the output of Torsten Seemann's `mlst`: one line per assembly,
 * `FILE  SCHEME  ST  allele  allele ...`, tab- or comma-separated, with an
 * optional header line. Alleles are written `gene(number)`.
 *
 * @module domain/adapters/MlstAdapter
 */

import type {
    AdapterContext,
    AdapterOutput,
    MlstRecord,
    SourceAdapter,
} from "@resistome/engine";
import { contentLines, normalizeSampleId, sampleFromFileName } from "../utils/index.js";

const kFILE_PATTERN = /[._]mlst\.(tsv|csv|txt)$/i;
const kALLELE = /^([^()]+)\(([^()]*)\)$/;
const kUNASSIGNED = new Set(["", "-", "0"]);

/**
 * Sequence type without its "ST" prefix; null when mlst assigned none.
 */
export function parseSequenceType(raw: string): string | null {
    const st = raw.trim().replace(/^ST/i, "");
    return kUNASSIGNED.has(st) ? null : st;
}

export class MlstAdapter implements SourceAdapter {
    readonly id = "mlst";
    readonly tool = "mlst";
    readonly name = "mlst report";

    matches(fileName: string): boolean {
        return kFILE_PATTERN.test(fileName);
    }

    sampleIdFor(fileName: string): string | undefined {
        return sampleFromFileName(fileName, kFILE_PATTERN);
    }

    parse(content: string, context: AdapterContext): AdapterOutput {
        const typing: MlstRecord[] = [];

        contentLines(content).forEach((line, index) => {
            const cells = line.split(line.includes("\t") ? "\t" : ",").map((cell) => cell.trim());
            const [file, scheme, st, ...alleleCells] = cells;

            if (file === "FILE") {
                return;
            }
            if (!file || !scheme || st === undefined) {
                context.logger.warn("Incomplete mlst line skipped", { line: index + 1 });
                return;
            }

            const alleles: Record<string, string> = {};
            for (const cell of alleleCells) {
                const match = kALLELE.exec(cell);
                if (match?.[1] && match[2] !== undefined) {
                    alleles[match[1]] = match[2];
                }
            }

            typing.push({
                kind    : "mlst",
                sampleId: normalizeSampleId(file),
                tool    : this.tool,
                scheme,
                st      : parseSequenceType(st),
                alleles,
            });
        });

        return { hits: [], typing };
    }
}
