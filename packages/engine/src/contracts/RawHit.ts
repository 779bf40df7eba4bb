/**
 * Raw Record Contracts
 *
 * What source adapters produce from a tool's output file: one record per
 * detection (RawHit) or per typing call (TypingRecord), tagged by format so
 * that format-specific fields stay typed.
 *
 * Raw records are immutable. The engine validates them before use; an
 * adapter may hand over NaN or out-of-range metrics and the sample carrying
 * them is excluded as malformed.
 */

/**
 * Fields shared by every detection record.
 */
interface RawHitBase {
    /** Sample (assembly) identifier */
    readonly sampleId: string;

    /** Source tool name (e.g. "AMRFinder", "ABRicate") */
    readonly tool: string;

    /** Gene identifier as reported, not yet canonicalized */
    readonly gene: string;

    /** Percent identity to the reference (0-100) */
    readonly identity: number;

    /** Percent coverage of the reference (0-100) */
    readonly coverage: number;

    readonly contig?: string;
    readonly start?: number;
    readonly end?: number;
}

/**
 * Detection reported by AMRFinderPlus.
 */
export interface AmrFinderHit extends RawHitBase {
    readonly format: "amrfinder";
    readonly elementType?: string;
    readonly elementSubtype?: string;
    readonly drugClass?: string;
    readonly drugSubclass?: string;
    readonly method?: string;
}

/**
 * Detection reported by ABRicate against one of its databases.
 */
export interface AbricateHit extends RawHitBase {
    readonly format: "abricate";

    /** ABRicate database (card, resfinder, vfdb, bacmet2, ...) */
    readonly database: string;
    readonly accession?: string;
    readonly product?: string;
    readonly resistance?: string;
}

/**
 * Detection from any other tool, for adapters loaded at run time.
 */
export interface GenericHit extends RawHitBase {
    readonly format: "generic";
    readonly database?: string;
}

export type RawHit = AmrFinderHit | AbricateHit | GenericHit;

export type RawHitFormat = RawHit["format"];

/**
 * MLST call for one scheme.
 */
export interface MlstRecord {
    readonly kind: "mlst";
    readonly sampleId: string;
    readonly tool: string;
    readonly scheme: string;

    /** Sequence type without the "ST" prefix, or null when not assigned */
    readonly st: string | null;

    /** Allele number per housekeeping gene ("?" when unknown) */
    readonly alleles: Readonly<Record<string, string>>;
}

/**
 * Capsule (K) or outer-core (O) locus call from Kaptive.
 */
export interface CapsuleLocusRecord {
    readonly kind: "kaptive";
    readonly sampleId: string;
    readonly tool: string;
    readonly locusType: "K" | "O";
    readonly locus: string;
    readonly confidence?: string;
    readonly identity?: number;
    readonly coverage?: number;
}

export type TypingRecord = MlstRecord | CapsuleLocusRecord;

/**
 * All raw records gathered for one sample across every tool.
 */
export interface SampleInput {
    readonly sampleId: string;
    readonly hits: readonly RawHit[];
    readonly typing?: readonly TypingRecord[];
}

/**
 * Label of the database or tool that produced a hit.
 * ABRicate hits are labelled per database ("ABRicate:card").
 */
export function sourceLabel(hit: RawHit): string {
    switch (hit.format) {
        case "abricate":
            return `${hit.tool}:${hit.database}`;
        case "generic":
            return hit.database ? `${hit.tool}:${hit.database}` : hit.tool;
        case "amrfinder":
            return hit.tool;
    }
}
