/**
 * @fileoverview Sample identifier normalization
 *
 * Tools name the same assembly differently: a full path, the FASTA file
 * name, or a RefSeq accession where another tool used the GenBank one.
 * Every adapter runs its sample column through normalizeSampleId so the
 * records of one assembly group together.
 *
 * @module domain/utils/sampleId
 */

const kASSEMBLY_EXTENSIONS = [".fna", ".fasta", ".fa", ".gb", ".gbk", ".gbff", ".txt", ".tsv", ".csv"];

/**
 * Normalize a sample identifier.
 *
 * - strips directories (either separator)
 * - strips one assembly or table extension (case-insensitive)
 * - maps RefSeq `GCF_` accessions to GenBank `GCA_`
 *
 * @example
 * ```typescript
 * normalizeSampleId("/data/assemblies/GCF_000123.1.fna"); // "GCA_000123.1"
 * normalizeSampleId("S1.fasta");                           // "S1"
 * ```
 */
export function normalizeSampleId(raw: string): string {
    let id = raw.trim();

    const slash = Math.max(id.lastIndexOf("/"), id.lastIndexOf("\\"));
    if (slash >= 0) {
        id = id.slice(slash + 1);
    }

    const lower = id.toLowerCase();
    const extension = kASSEMBLY_EXTENSIONS.find((ext) => lower.endsWith(ext) && lower.length > ext.length);
    if (extension) {
        id = id.slice(0, -extension.length);
    }

    if (id.startsWith("GCF_")) {
        id = `GCA_${id.slice(4)}`;
    }

    return id;
}

/**
 * Sample named by a tool output file, e.g. `S1.amrfinder.tsv` or
 * `S1_abricate_card.tsv`: the part before the tool marker.
 *
 * @param marker - Pattern matching the tool marker and everything after it
 * @returns Normalized sample id, or undefined when the marker is absent or nothing precedes it
 */
export function sampleFromFileName(fileName: string, marker: RegExp): string | undefined {
    const match = marker.exec(fileName);
    if (!match || match.index === 0) {
        return undefined;
    }

    const id = normalizeSampleId(fileName.slice(0, match.index));
    return id || undefined;
}
