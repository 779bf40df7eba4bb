/**
 * @fileoverview Knowledge base schema
 *
 * Shape of the gene knowledge-base resource. The resource is plain data
 * (YAML on disk) validated here before the knowledge base is built.
 *
 * @module @resistome/engine/knowledge/schema
 */

import { z } from "zod";
import { RISK_TIERS } from "../contracts/GeneDefinition.js";

const tierSchema = z.enum(RISK_TIERS);

export const normalizationSchema = z.object({
    /** Prefixes removed from identifiers before lookup (e.g. "bla") */
    stripPrefixes      : z.array(z.string().min(1)).default(["bla"]),

    /** Regexes removed from the end of identifiers (e.g. allele suffixes "_\\d+$") */
    stripSuffixPatterns: z.array(z.string().min(1)).default([]),

    /** Characters ignored when comparing identifiers */
    removeCharacters   : z.string().default("-_()'. "),
});

export const categorySchema = z.object({
    id   : z.string().min(1),
    label: z.string().min(1),
    tier : tierSchema,
});

export const geneEntrySchema = z.object({
    name    : z.string().min(1),
    aliases : z.array(z.string().min(1)).default([]),
    category: z.string().min(1),

    /** Defaults to the category's tier */
    tier    : tierSchema.optional(),
    note    : z.string().optional(),
});

export const familyRuleSchema = z.object({
    family  : z.string().min(1),

    /** Regex over the normalized key with a named "variant" group */
    pattern : z.string().min(1),
    category: z.string().min(1),
    tier    : tierSchema.optional(),
    note    : z.string().optional(),
});

export const knowledgeBaseSchema = z.object({
    version      : z.string().optional(),
    normalization: normalizationSchema.default({}),
    categories   : z.array(categorySchema).default([]),
    genes        : z.array(geneEntrySchema).default([]),
    families     : z.array(familyRuleSchema).default([]),
});

/**
 * Additional entries layered on a loaded knowledge base.
 * Normalization rules are fixed by the base resource.
 */
export const knowledgeBaseExtensionSchema = knowledgeBaseSchema.omit({ normalization: true });

export type NormalizationRules = z.infer<typeof normalizationSchema>;
export type GeneEntry = z.infer<typeof geneEntrySchema>;
export type FamilyRule = z.infer<typeof familyRuleSchema>;
export type KnowledgeBaseConfig = z.infer<typeof knowledgeBaseSchema>;
export type KnowledgeBaseExtension = z.infer<typeof knowledgeBaseExtensionSchema>;

/**
 * Input accepted by the knowledge base constructor (defaults not yet applied).
 */
export type KnowledgeBaseInput = z.input<typeof knowledgeBaseSchema>;
export type KnowledgeBaseExtensionInput = z.input<typeof knowledgeBaseExtensionSchema>;
