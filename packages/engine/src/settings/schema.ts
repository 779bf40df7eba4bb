/**
 * @fileoverview Pipeline settings schema
 *
 * Tunables of a cohort run. Every field has a default, so an empty
 * document is a valid configuration.
 *
 * @module @resistome/engine/settings/schema
 */

import { z } from "zod";
import { RISK_TIERS } from "../contracts/GeneDefinition.js";
import type { FlagRule } from "../contracts/Pattern.js";

const percentage = z.number().min(0).max(100);

export const kDEFAULT_FLAGS: readonly FlagRule[] = [
    { id: "carbapenemase", label: "Carbapenemase producer", anyOfCategories: ["carbapenemase"] },
    { id: "lastResortResistance", label: "Last-resort resistance", anyOfCategories: ["colistin", "tigecycline"] },
];

export const flagRuleSchema = z.object({
    id             : z.string().min(1),
    label          : z.string().optional(),
    anyOfCategories: z.array(z.string().min(1)).min(1),
});

export const patternRuleSchema = z
    .object({
        name       : z.string().min(1),
        description: z.string().optional(),
        markers    : z.array(z.string().min(1)).min(1),
        minSupport : z.number().int().min(1).optional(),
        minMatched : z.number().int().min(1).optional(),
        severity   : z.enum(RISK_TIERS).optional(),
    })
    .refine((rule) => rule.minMatched === undefined || rule.minMatched <= rule.markers.length, {
        message: "minMatched cannot exceed the number of markers",
        path   : ["minMatched"],
    });

export const pipelineSettingsSchema = z.object({
    thresholds: z
        .object({
            minIdentity: percentage.default(80),
            minCoverage: percentage.default(70),
        })
        .default({}),

    /** Tools in order of preference when metrics tie; unlisted tools rank last */
    toolPriority: z.array(z.string().min(1)).default(["AMRFinder", "ABRicate"]),

    /** Identity spread (percentage points) above which a merge is flagged */
    discrepancyThreshold: z.number().min(0).default(2.0),

    unresolvedPolicy: z.enum(["uncategorized", "drop"]).default("uncategorized"),

    /** Samples processed between yields to the event loop */
    workerCount: z.number().int().min(1).default(4),

    flags: z.array(flagRuleSchema).default(() => kDEFAULT_FLAGS.map((flag) => ({
        ...flag,
        anyOfCategories: [...flag.anyOfCategories],
    }))),

    patterns: z.array(patternRuleSchema).default([]),

    /** Default minimum support for pattern rules without their own */
    minSupport: z.number().int().min(1).default(1),

    /** Minimum shared samples for a gene pair to be reported */
    minCooccurrence: z.number().int().min(1).default(2),

    typing: z
        .object({
            /** MLST scheme used for clones and ST-K combinations */
            scheme: z.string().min(1).default("pasteur"),

            /** ST (without prefix) to international clone label */
            internationalClones: z.record(z.string(), z.string()).default({}),
        })
        .default({}),
});

export type PipelineSettings = z.infer<typeof pipelineSettingsSchema>;
export type PipelineSettingsInput = z.input<typeof pipelineSettingsSchema>;
export type UnresolvedPolicy = PipelineSettings["unresolvedPolicy"];
