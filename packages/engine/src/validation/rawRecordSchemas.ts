/**
 * @fileoverview Raw record validation
 *
 * Structural checks applied to each sample before it enters the pipeline.
 * Adapters are lenient; anything they hand over that breaks these rules
 * excludes the sample as malformed.
 *
 * @module @resistome/engine/validation/rawRecordSchemas
 */

import { z } from "zod";
import type { SampleInput } from "../contracts/RawHit.js";
import { formatIssues } from "../errors.js";

const metric = z.number().min(0).max(100);
const identifier = z.string().trim().min(1);

// Compared and stored verbatim, so surrounding whitespace is refused rather than trimmed.
const sampleIdentifier = z
    .string()
    .min(1)
    .refine((value) => value === value.trim(), "must not have surrounding whitespace");

const hitBase = {
    sampleId: sampleIdentifier,
    tool    : identifier,
    gene    : identifier,
    identity: metric,
    coverage: metric,
    contig  : z.string().optional(),
    start   : z.number().int().nonnegative().optional(),
    end     : z.number().int().nonnegative().optional(),
};

export const amrFinderHitSchema = z.object({
    ...hitBase,
    format        : z.literal("amrfinder"),
    elementType   : z.string().optional(),
    elementSubtype: z.string().optional(),
    drugClass     : z.string().optional(),
    drugSubclass  : z.string().optional(),
    method        : z.string().optional(),
});

export const abricateHitSchema = z.object({
    ...hitBase,
    format    : z.literal("abricate"),
    database  : identifier,
    accession : z.string().optional(),
    product   : z.string().optional(),
    resistance: z.string().optional(),
});

export const genericHitSchema = z.object({
    ...hitBase,
    format  : z.literal("generic"),
    database: z.string().optional(),
});

export const rawHitSchema = z.discriminatedUnion("format", [
    amrFinderHitSchema,
    abricateHitSchema,
    genericHitSchema,
]);

export const mlstRecordSchema = z.object({
    kind    : z.literal("mlst"),
    sampleId: sampleIdentifier,
    tool    : identifier,
    scheme  : identifier,
    st      : identifier.nullable(),
    alleles : z.record(z.string(), z.string()),
});

export const capsuleLocusRecordSchema = z.object({
    kind      : z.literal("kaptive"),
    sampleId  : sampleIdentifier,
    tool      : identifier,
    locusType : z.enum(["K", "O"]),
    locus     : identifier,
    confidence: z.string().optional(),
    identity  : metric.optional(),
    coverage  : metric.optional(),
});

export const typingRecordSchema = z.discriminatedUnion("kind", [
    mlstRecordSchema,
    capsuleLocusRecordSchema,
]);

export const sampleInputSchema = z
    .object({
        sampleId: sampleIdentifier,
        hits    : z.array(rawHitSchema),
        typing  : z.array(typingRecordSchema).optional(),
    })
    .superRefine((sample, ctx) => {
        const records = [
            ...sample.hits.map((record, index) => ({ record, path: ["hits", index] })),
            ...(sample.typing ?? []).map((record, index) => ({ record, path: ["typing", index] })),
        ];

        for (const { record, path } of records) {
            if (record.sampleId !== sample.sampleId) {
                ctx.addIssue({
                    code   : z.ZodIssueCode.custom,
                    path   : [...path, "sampleId"],
                    message: `belongs to sample ${record.sampleId}, not ${sample.sampleId}`,
                });
            }
        }
    });

/**
 * Problems with a sample's records, one line each. Empty when valid.
 */
export function validateSampleInput(input: SampleInput): string[] {
    const result = sampleInputSchema.safeParse(input);
    return result.success ? [] : formatIssues(result.error);
}
