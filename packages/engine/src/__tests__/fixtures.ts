/**
 * @fileoverview Shared test fixtures
 *
 * A small knowledge base and raw-record factories used across the engine tests.
 */

import { vi } from "vitest";
import type { CanonicalHit } from "../contracts/CanonicalHit.js";
import type { EngineLogger } from "../contracts/Logger.js";
import type {
    AbricateHit,
    AmrFinderHit,
    CapsuleLocusRecord,
    MlstRecord,
    RawHit,
    TypingRecord,
} from "../contracts/RawHit.js";
import type { SampleProfile } from "../contracts/SampleProfile.js";
import { RiskClassifier } from "../classify/RiskClassifier.js";
import { GeneKnowledgeBase } from "../knowledge/GeneKnowledgeBase.js";
import type { KnowledgeBaseInput } from "../knowledge/schema.js";
import { MergeEngine } from "../merge/MergeEngine.js";
import { RecordNormalizer } from "../normalize/RecordNormalizer.js";
import { kDEFAULT_FLAGS } from "../settings/schema.js";

export const kTEST_KNOWLEDGE_BASE: KnowledgeBaseInput = {
    version   : "test-1",
    categories: [
        { id: "carbapenemase", label: "Carbapenemases", tier: "CRITICAL" },
        { id: "esbl", label: "Extended-spectrum beta-lactamases", tier: "HIGH" },
        { id: "colistin", label: "Colistin resistance", tier: "CRITICAL" },
        { id: "tigecycline", label: "Tigecycline resistance", tier: "HIGH" },
        { id: "aminoglycoside", label: "Aminoglycoside resistance", tier: "MEDIUM" },
        { id: "efflux", label: "Efflux pumps", tier: "LOW" },
        { id: "biocide", label: "Biocide tolerance", tier: "ENVIRONMENTAL" },
    ],
    genes: [
        { name: "OXA-23", aliases: ["blaOXA-23", "OXA23"], category: "carbapenemase" },
        { name: "NDM-1", aliases: ["blaNDM-1"], category: "carbapenemase" },
        { name: "mcr-1", aliases: ["mcr-1.1"], category: "colistin" },
        { name: "tet(X)", aliases: ["tetX"], category: "tigecycline" },
        { name: "aph(3')-VIa", category: "aminoglycoside" },
        { name: "adeB", category: "efflux" },
        { name: "qacE", aliases: ["qacEdelta1"], category: "biocide" },
    ],
    families: [
        { family: "CTX-M", pattern: "^ctxm(?<variant>\\d+)$", category: "esbl" },
    ],
};

export function createTestKnowledgeBase(): GeneKnowledgeBase {
    return new GeneKnowledgeBase(kTEST_KNOWLEDGE_BASE);
}

export function amrfinder(
    sampleId: string,
    gene: string,
    identity = 100,
    coverage = 100,
    extra: Partial<AmrFinderHit> = {}
): AmrFinderHit {
    return { format: "amrfinder", sampleId, tool: "AMRFinder", gene, identity, coverage, ...extra };
}

export function abricate(
    sampleId: string,
    gene: string,
    identity = 100,
    coverage = 100,
    database = "card",
    extra: Partial<AbricateHit> = {}
): AbricateHit {
    return { format: "abricate", sampleId, tool: "ABRicate", gene, identity, coverage, database, ...extra };
}

export function mlst(sampleId: string, st: string | null, scheme = "pasteur"): MlstRecord {
    return { kind: "mlst", sampleId, tool: "mlst", scheme, st, alleles: { cpn60: "1", fusA: "1" } };
}

export function capsule(sampleId: string, locusType: "K" | "O", locus: string): CapsuleLocusRecord {
    return { kind: "kaptive", sampleId, tool: "Kaptive", locusType, locus };
}

/**
 * Normalize and merge raw hits with default thresholds.
 * Rejected hits are skipped.
 */
export function canonicalHits(kb: GeneKnowledgeBase, ...hits: RawHit[]): CanonicalHit[] {
    const normalizer = new RecordNormalizer(kb);
    const candidates = hits.flatMap((hit) => {
        const result = normalizer.normalize(hit);
        return result.status === "accepted" ? [result.candidate] : [];
    });
    return new MergeEngine().mergeSample(candidates);
}

/**
 * Profile of one sample built with the default flags.
 */
export function profileOf(
    kb: GeneKnowledgeBase,
    sampleId: string,
    hits: RawHit[],
    typing: TypingRecord[] = [],
    internationalClones: Record<string, string> = {}
): SampleProfile {
    const classifier = new RiskClassifier({ flags: kDEFAULT_FLAGS, internationalClones });
    return classifier.buildProfile(sampleId, canonicalHits(kb, ...hits), typing);
}

/**
 * Create a mock logger
 */
export function createMockLogger(): EngineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}
