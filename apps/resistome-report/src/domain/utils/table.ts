/**
 * @fileoverview Delimited text helpers shared by the source adapters
 *
 * @module domain/utils/table
 */

/**
 * Non-blank lines of a file, without line terminators.
 */
export function contentLines(content: string): string[] {
    return content.split(/\r?\n/).filter((line) => line.trim() !== "");
}

/**
 * Pair cells with header columns.
 *
 * Rows wider than the header have their extra cells folded into the last
 * column (free-text columns may contain tabs); short rows are padded with
 * empty strings.
 */
export function toRecord(header: readonly string[], cells: readonly string[], separator = "\t"): Record<string, string> {
    const record: Record<string, string> = {};
    const last = header.length - 1;

    header.forEach((column, index) => {
        record[column] = index === last
            ? cells.slice(index).join(separator)
            : cells[index] ?? "";
    });

    return record;
}

/**
 * Parse a tab-separated table whose first non-blank line is the header.
 */
export function parseTsv(content: string): { header: string[]; rows: Record<string, string>[] } {
    const [first, ...rest] = contentLines(content);
    if (first === undefined) {
        return { header: [], rows: [] };
    }

    const header = first.split("\t").map((column) => column.trim());
    return {
        header,
        rows: rest.map((line) => toRecord(header, line.split("\t"))),
    };
}

/**
 * Names of required columns missing from a header.
 */
export function missingColumns(header: readonly string[], required: readonly string[]): string[] {
    return required.filter((column) => !header.includes(column));
}

/**
 * Parse a percentage cell ("99.5", "99.5%"). Unparseable cells give NaN,
 * which record validation rejects.
 */
export function parsePercent(value: string | undefined): number {
    const cleaned = (value ?? "").replace("%", "").trim();
    return cleaned === "" ? Number.NaN : Number(cleaned);
}

/**
 * Parse an optional numeric cell; empty or unparseable cells give undefined.
 */
export function parseOptionalNumber(value: string | undefined): number | undefined {
    const parsed = parsePercent(value);
    return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Parse an optional non-negative integer cell (contig coordinates).
 */
export function parseOptionalInt(value: string | undefined): number | undefined {
    const trimmed = (value ?? "").trim();
    return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Empty cells become undefined.
 */
export function optionalCell(value: string | undefined): string | undefined {
    const trimmed = (value ?? "").trim();
    return trimmed === "" ? undefined : trimmed;
}
