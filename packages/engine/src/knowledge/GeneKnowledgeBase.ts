/**
 * @fileoverview Gene Knowledge Base
 *
 * Registry mapping gene identifiers and aliases to canonical definitions.
 *
 * Lookup is case-insensitive and tolerant of formatting variants through
 * configurable normalization rules: "blaOXA-23", "OXA-23" and "oxa23" all
 * reduce to the key "oxa23". Curated aliases are tried first, then family
 * rules that cover numbered allele series without listing every member.
 *
 * @module @resistome/engine/knowledge/GeneKnowledgeBase
 */

import {
    UNCATEGORIZED,
    type CategoryDefinition,
    type GeneCategory,
    type GeneDefinition,
    type RiskTier,
} from "../contracts/GeneDefinition.js";
import { KnowledgeBaseError, formatIssues } from "../errors.js";
import {
    knowledgeBaseExtensionSchema,
    knowledgeBaseSchema,
    type FamilyRule,
    type GeneEntry,
    type KnowledgeBaseExtensionInput,
    type KnowledgeBaseInput,
    type NormalizationRules,
} from "./schema.js";

/**
 * Outcome of a lookup. Unknown identifiers are a normal result, not an error.
 */
export type ResolveResult =
    | { readonly found: true; readonly gene: GeneDefinition }
    | { readonly found: false; readonly identifier: string; readonly key: string };

interface CompiledFamily {
    readonly rule: FamilyRule;
    readonly regex: RegExp;
}

const kUNCATEGORIZED_CATEGORY: CategoryDefinition = Object.freeze({
    id   : UNCATEGORIZED,
    label: "Uncategorized",
    tier : "LOW",
});

function escapeForCharacterClass(characters: string): string {
    return characters.replace(/[\\\]^-]/g, "\\$&");
}

/**
 * Gene Knowledge Base
 *
 * Built from an external resource (see {@link loadKnowledgeBase}); extendable
 * at run time with {@link GeneKnowledgeBase.extend}.
 *
 * @example
 * ```typescript
 * const kb = new GeneKnowledgeBase({
 *     categories: [{ id: "carbapenemase", label: "Carbapenemases", tier: "CRITICAL" }],
 *     genes     : [{ name: "OXA-23", aliases: ["blaOXA-23"], category: "carbapenemase" }],
 * });
 *
 * kb.resolve("oxa23");   // { found: true, gene: { name: "OXA-23", ... } }
 * kb.resolve("mystery"); // { found: false, identifier: "mystery", key: "mystery" }
 * ```
 */
export class GeneKnowledgeBase {
    readonly version?: string;

    private readonly rules: NormalizationRules;
    private readonly prefixes: readonly string[];
    private readonly suffixPatterns: readonly RegExp[];
    private readonly removable: RegExp | null;

    private readonly categoryIndex = new Map<GeneCategory, CategoryDefinition>();
    private readonly keyIndex = new Map<string, GeneDefinition>();
    private readonly definitions: GeneDefinition[] = [];
    private readonly families: CompiledFamily[] = [];

    private readonly familyCache = new Map<string, GeneDefinition>();
    private readonly uncategorizedCache = new Map<string, GeneDefinition>();

    /**
     * @throws KnowledgeBaseError if the resource is invalid, names an
     *         undeclared category, or two genes share an alias key
     */
    constructor(input: KnowledgeBaseInput) {
        const parsed = knowledgeBaseSchema.safeParse(input);
        if (!parsed.success) {
            throw new KnowledgeBaseError("Invalid knowledge base", { issues: formatIssues(parsed.error) });
        }

        const config = parsed.data;
        this.version = config.version;
        this.rules = config.normalization;

        this.prefixes = [...new Set(this.rules.stripPrefixes.map((p) => p.toLowerCase()))]
            .sort((a, b) => b.length - a.length);
        this.suffixPatterns = this.rules.stripSuffixPatterns.map((pattern) =>
            this.compileRegex(pattern, "i", { stripSuffixPattern: pattern })
        );
        this.removable = this.rules.removeCharacters.length > 0
            ? new RegExp(`[${escapeForCharacterClass(this.rules.removeCharacters)}]`, "g")
            : null;

        this.categoryIndex.set(UNCATEGORIZED, kUNCATEGORIZED_CATEGORY);
        this.addEntries(config.categories, config.genes, config.families);
    }

    /**
     * Reduce an identifier to its lookup key.
     *
     * Steps: trim, lowercase, strip suffix patterns, strip the longest
     * matching prefix (unless nothing would remain), drop ignored characters.
     */
    normalizeKey(identifier: string): string {
        let key = identifier.trim().toLowerCase();

        for (const pattern of this.suffixPatterns) {
            key = key.replace(pattern, "");
        }

        for (const prefix of this.prefixes) {
            if (key.startsWith(prefix) && key.length > prefix.length) {
                key = key.slice(prefix.length);
                break;
            }
        }

        return this.removable ? key.replace(this.removable, "") : key;
    }

    /**
     * Resolve an identifier to its canonical definition.
     * Never throws; unknown identifiers yield `found: false`.
     */
    resolve(identifier: string): ResolveResult {
        const key = this.normalizeKey(identifier);
        if (key.length === 0) {
            return { found: false, identifier, key };
        }

        const curated = this.keyIndex.get(key);
        if (curated) {
            return { found: true, gene: curated };
        }

        for (const { rule, regex } of this.families) {
            const variant = regex.exec(key)?.groups?.variant;
            if (variant) {
                return { found: true, gene: this.familyMember(rule, variant) };
            }
        }

        return { found: false, identifier, key };
    }

    /**
     * Definition used for identifiers nobody recognised.
     * Tier LOW, category "uncategorized". Spellings with the same lookup key
     * share one definition, named after the first spelling seen.
     */
    uncategorized(identifier: string): GeneDefinition {
        const name = identifier.trim();
        const key = this.normalizeKey(name) || name;
        const cached = this.uncategorizedCache.get(key);
        if (cached) {
            return cached;
        }

        const gene: GeneDefinition = Object.freeze({
            name,
            aliases      : Object.freeze([]),
            category     : UNCATEGORIZED,
            tier         : kUNCATEGORIZED_CATEGORY.tier,
            uncategorized: true,
        });
        this.uncategorizedCache.set(key, gene);
        return gene;
    }

    /**
     * Add categories, genes and family rules.
     * The same validation as construction applies; nothing is added on failure.
     *
     * @throws KnowledgeBaseError on invalid entries or alias collisions
     */
    extend(input: KnowledgeBaseExtensionInput): void {
        const parsed = knowledgeBaseExtensionSchema.safeParse(input);
        if (!parsed.success) {
            throw new KnowledgeBaseError("Invalid knowledge base extension", {
                issues: formatIssues(parsed.error),
            });
        }

        this.addEntries(parsed.data.categories, parsed.data.genes, parsed.data.families);
    }

    category(id: GeneCategory): CategoryDefinition | undefined {
        return this.categoryIndex.get(id);
    }

    hasCategory(id: GeneCategory): boolean {
        return this.categoryIndex.has(id);
    }

    get categories(): readonly CategoryDefinition[] {
        return [...this.categoryIndex.values()];
    }

    /**
     * Curated definitions in load order.
     */
    get genes(): readonly GeneDefinition[] {
        return [...this.definitions];
    }

    get familyCount(): number {
        return this.families.length;
    }

    /**
     * Validate everything first, then commit, so a failed extend leaves the
     * knowledge base untouched.
     */
    private addEntries(
        categories: readonly CategoryDefinition[],
        genes: readonly GeneEntry[],
        families: readonly FamilyRule[]
    ): void {
        const stagedCategories = new Map<GeneCategory, CategoryDefinition>();
        for (const category of categories) {
            if (this.categoryIndex.has(category.id) || stagedCategories.has(category.id)) {
                throw new KnowledgeBaseError(`Duplicate category: ${category.id}`, { category: category.id });
            }
            stagedCategories.set(category.id, Object.freeze({ ...category }));
        }

        const tierOf = (category: GeneCategory, explicit: RiskTier | undefined, owner: string): RiskTier => {
            const declared = stagedCategories.get(category) ?? this.categoryIndex.get(category);
            if (!declared) {
                throw new KnowledgeBaseError(`Unknown category "${category}" for ${owner}`, { category, owner });
            }
            return explicit ?? declared.tier;
        };

        const stagedKeys = new Map<string, GeneDefinition>();
        const stagedDefinitions: GeneDefinition[] = [];

        for (const entry of genes) {
            const gene: GeneDefinition = Object.freeze({
                name    : entry.name,
                aliases : Object.freeze([...entry.aliases]),
                category: entry.category,
                tier    : tierOf(entry.category, entry.tier, `gene ${entry.name}`),
                ...(entry.note !== undefined && { note: entry.note }),
            });

            for (const alias of [entry.name, ...entry.aliases]) {
                const key = this.normalizeKey(alias);
                if (key.length === 0) {
                    throw new KnowledgeBaseError(`Alias "${alias}" of ${entry.name} normalizes to nothing`, {
                        gene: entry.name,
                        alias,
                    });
                }

                const owner = stagedKeys.get(key) ?? this.keyIndex.get(key);
                if (owner && owner.name !== gene.name) {
                    throw new KnowledgeBaseError(
                        `Alias "${alias}" of ${gene.name} collides with ${owner.name} (key "${key}")`,
                        { alias, key, gene: gene.name, existing: owner.name }
                    );
                }
                stagedKeys.set(key, gene);
            }

            stagedDefinitions.push(gene);
        }

        const stagedFamilies: CompiledFamily[] = families.map((rule) => {
            tierOf(rule.category, rule.tier, `family ${rule.family}`);
            const regex = this.compileRegex(rule.pattern, "i", { family: rule.family });
            if (!rule.pattern.includes("(?<variant>")) {
                throw new KnowledgeBaseError(`Family ${rule.family} pattern has no "variant" group`, {
                    family : rule.family,
                    pattern: rule.pattern,
                });
            }
            return { rule, regex };
        });

        for (const [id, category] of stagedCategories) {
            this.categoryIndex.set(id, category);
        }
        for (const [key, gene] of stagedKeys) {
            this.keyIndex.set(key, gene);
        }
        this.definitions.push(...stagedDefinitions);
        this.families.push(...stagedFamilies);
    }

    private familyMember(rule: FamilyRule, variant: string): GeneDefinition {
        const name = `${rule.family}-${variant.toUpperCase()}`;
        const cached = this.familyCache.get(name);
        if (cached) {
            return cached;
        }

        const declared = this.categoryIndex.get(rule.category);
        const gene: GeneDefinition = Object.freeze({
            name,
            aliases : Object.freeze([]),
            category: rule.category,
            tier    : rule.tier ?? declared?.tier ?? kUNCATEGORIZED_CATEGORY.tier,
            family  : rule.family,
            ...(rule.note !== undefined && { note: rule.note }),
        });
        this.familyCache.set(name, gene);
        return gene;
    }

    private compileRegex(pattern: string, flags: string, context: Record<string, unknown>): RegExp {
        try {
            return new RegExp(pattern, flags);
        }
        catch (error) {
            throw new KnowledgeBaseError(`Invalid pattern: ${pattern}`, context, error);
        }
    }
}
