// ---------------------------------------------------------------------------
// Safety policy loader.
// Reads the YAML policy files from a directory, validates them with Zod,
// compiles the pattern tables and returns one frozen SafetyPolicy.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";
import {
  AgeBand,
  FilterStrictness,
  SentenceComplexity,
  SeverityLevel,
  VIOLATION_CATEGORIES,
  VocabularyTier,
} from "../core/types.js";
import type {
  AgeProfile,
  BandPhrases,
  PatternCatalogue,
  PatternRule,
  PipelineConfig,
  RedirectCatalogue,
  SafetyPolicy,
  SymbolDensityCheck,
  TermTable,
  TopicDefinition,
  VocabularyCatalogue,
  VocabularyTable,
  ViolationCategory,
} from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { AGE_BANDS, isAgeBand } from "../domain/age/age-classifier.js";
import { compileTermPattern, matchesAnywhere } from "../utils/text.js";

export const POLICY_FILES = {
  profiles: "age-profiles.yaml",
  patterns: "safety-patterns.yaml",
  redirects: "redirects.yaml",
  vocabulary: "vocabulary.yaml",
  pipeline: "pipeline.yaml",
} as const;

export type PolicyDocuments = Record<keyof typeof POLICY_FILES, unknown>;

// ── Zod schemas ─────────────────────────────────────────────────────────────

const CategorySchema = z.enum(VIOLATION_CATEGORIES);
const SeveritySchema = z.nativeEnum(SeverityLevel);
const TermListSchema = z.array(z.string().trim().min(1)).min(1);
const PhraseListSchema = z.array(z.string().trim().min(1)).min(1);

export const AgeProfileSchema = z.object({
  maxWords: z.number().int().min(10),
  sentenceComplexity: z.nativeEnum(SentenceComplexity),
  vocabularyTier: z.nativeEnum(VocabularyTier),
  filterStrictness: z.nativeEnum(FilterStrictness),
  allowedTopics: z.array(z.string().min(1)).default([]),
  blockedTopics: z.array(z.string().min(1)).default([]),
  tolerance: z.object({
    scary: z.boolean(),
    violent: z.boolean(),
    romantic: z.boolean(),
  }),
  severityBoost: z.union([z.literal(0), z.literal(1)]),
  issueTolerance: z.object({
    maxIssues: z.number().int().min(0),
    maxSeverity: SeveritySchema.refine((s) => s <= SeverityLevel.SEVERE, {
      message: "maxSeverity may not exceed severe (3)",
    }),
  }),
  engagement: z.object({
    greeting: z.boolean(),
    followUp: z.boolean(),
  }),
  vagueNumbersAbove: z.number().int().min(0).nullable().default(null),
});

export const ProfilesFileSchema = z.record(z.string(), AgeProfileSchema);

export const PatternsFileSchema = z.object({
  terms: z.record(
    z.string(),
    z.object({
      category: CategorySchema,
      severity: SeveritySchema,
      gate: z.enum(["scary", "violent", "romantic"]).nullable().default(null),
      terms: TermListSchema,
    }),
  ),
  rules: z.record(
    z.string(),
    z.object({
      category: CategorySchema,
      severity: SeveritySchema,
      patterns: z.array(z.string().min(1)).min(1),
    }),
  ),
  encoding: z
    .object({
      category: CategorySchema,
      severity: SeveritySchema,
      maxSymbolRatio: z.number().gt(0).lt(1),
      minLength: z.number().int().min(1),
    })
    .nullable()
    .default(null),
  topics: z.record(
    z.string(),
    z.object({
      category: CategorySchema,
      severity: SeveritySchema,
      terms: TermListSchema,
    }),
  ),
  educationalTopics: z.record(z.string(), TermListSchema).default({}),
});

const PhraseSetSchema = z.record(
  z.union([z.nativeEnum(AgeBand), z.literal("fallback")]),
  PhraseListSchema,
);

export const RedirectsFileSchema = z.object({
  generic: PhraseSetSchema,
  categories: z.record(CategorySchema, PhraseSetSchema).default({}),
  educational: z.record(CategorySchema, PhraseListSchema).default({}),
});

const VocabularyTableSchema = z.record(z.string().trim().min(1), z.string().trim().min(1));

export const VocabularyFileSchema = z.object({
  tiers: z.object({
    basic: VocabularyTableSchema,
    intermediate: VocabularyTableSchema,
    advanced: VocabularyTableSchema,
  }),
  engagement: z.object({
    greetings: PhraseListSchema.refine(
      (list) => list.every((g) => g.includes("{name}")),
      { message: "every greeting must contain {name}" },
    ),
    followUps: PhraseListSchema.refine(
      (list) => list.every((f) => f.endsWith("?")),
      { message: "every follow-up must end with '?'" },
    ),
    continuation: z.string().trim().endsWith("?"),
  }),
  vagueQuantity: z.string().trim().min(1),
});

export const PipelineFileSchema = z.object({
  safetyStage: z.string().min(1),
  order: z.array(z.string().min(1)).min(1),
});

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Text that would make the sentence restructurer split a phrase. */
const CLAUSE_DELIMITER = /,\s|\s(?:and|but)\s/i;

function validate<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  file: string,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${file}: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function compileRule(id: string, sources: readonly string[]): RegExp {
  try {
    return new RegExp(sources.map((s) => `(?:${s})`).join("|"), "gi");
  } catch (err) {
    throw new ConfigurationError(
      `Invalid ${POLICY_FILES.patterns}: rule "${id}" has a malformed pattern`,
      { cause: err },
    );
  }
}

function toBandPhrases(
  set: z.output<typeof PhraseSetSchema>,
  where: string,
): BandPhrases {
  const { fallback, ...byBand } = set;
  if (fallback === undefined) {
    throw new ConfigurationError(
      `Invalid ${POLICY_FILES.redirects}: ${where} has no fallback phrases`,
    );
  }
  return Object.freeze({
    byBand: Object.freeze(byBand),
    fallback: Object.freeze([...fallback]),
  });
}

// ── Section builders ────────────────────────────────────────────────────────

function buildPatterns(raw: unknown): PatternCatalogue {
  const file = POLICY_FILES.patterns;
  const doc = validate(PatternsFileSchema, raw, file);

  const termTables: TermTable[] = Object.entries(doc.terms).map(([id, t]) =>
    Object.freeze({
      id,
      category: t.category,
      severity: t.severity,
      gate: t.gate,
      pattern: compileTermPattern(t.terms),
    }),
  );

  const rules: PatternRule[] = Object.entries(doc.rules).map(([id, r]) =>
    Object.freeze({
      id,
      category: r.category,
      severity: r.severity,
      pattern: compileRule(id, r.patterns),
    }),
  );

  const topics = new Map<string, TopicDefinition>();
  for (const [tag, t] of Object.entries(doc.topics)) {
    topics.set(
      tag,
      Object.freeze({
        tag,
        category: t.category,
        severity: t.severity,
        pattern: compileTermPattern(t.terms),
      }),
    );
  }

  const educationalTopics = new Map<string, RegExp>();
  for (const [tag, terms] of Object.entries(doc.educationalTopics)) {
    educationalTopics.set(tag, compileTermPattern(terms));
  }

  const symbolDensity: SymbolDensityCheck | null = doc.encoding
    ? Object.freeze({
        id: "encoded_text",
        category: doc.encoding.category,
        severity: doc.encoding.severity,
        maxRatio: doc.encoding.maxSymbolRatio,
        minLength: doc.encoding.minLength,
      })
    : null;

  return Object.freeze({
    termTables: Object.freeze(termTables),
    rules: Object.freeze(rules),
    symbolDensity,
    topics,
    educationalTopics,
  });
}

function buildProfiles(
  raw: unknown,
  patterns: PatternCatalogue,
): Map<AgeBand, AgeProfile> {
  const file = POLICY_FILES.profiles;
  const doc = validate(ProfilesFileSchema, raw, file);

  for (const key of Object.keys(doc)) {
    if (!isAgeBand(key)) {
      throw new ConfigurationError(`Invalid ${file}: unknown age band "${key}"`);
    }
  }

  const profiles = new Map<AgeBand, AgeProfile>();
  for (const band of AGE_BANDS) {
    const p = doc[band];
    if (p === undefined) {
      throw new ConfigurationError(`Invalid ${file}: missing profile for band "${band}"`);
    }

    for (const tag of p.blockedTopics) {
      if (!patterns.topics.has(tag)) {
        throw new ConfigurationError(
          `Invalid ${file}: ${band}.blockedTopics references unknown topic "${tag}"`,
        );
      }
    }
    for (const tag of p.allowedTopics) {
      if (!patterns.educationalTopics.has(tag)) {
        throw new ConfigurationError(
          `Invalid ${file}: ${band}.allowedTopics references unknown topic "${tag}"`,
        );
      }
    }

    profiles.set(
      band,
      Object.freeze({
        band,
        maxWords: p.maxWords,
        sentenceComplexity: p.sentenceComplexity,
        vocabularyTier: p.vocabularyTier,
        allowedTopics: new Set(p.allowedTopics),
        blockedTopics: new Set(p.blockedTopics),
        filterStrictness: p.filterStrictness,
        tolerance: Object.freeze({ ...p.tolerance }),
        severityBoost: p.severityBoost,
        issueTolerance: Object.freeze({ ...p.issueTolerance }),
        engagement: Object.freeze({ ...p.engagement }),
        vagueNumbersAbove: p.vagueNumbersAbove,
      }),
    );
  }

  return profiles;
}

function buildRedirects(raw: unknown): RedirectCatalogue {
  const doc = validate(RedirectsFileSchema, raw, POLICY_FILES.redirects);

  const byCategory: Partial<Record<ViolationCategory, BandPhrases>> = {};
  for (const category of VIOLATION_CATEGORIES) {
    const set = doc.categories[category];
    if (set !== undefined) {
      byCategory[category] = toBandPhrases(set, `categories.${category}`);
    }
  }

  return Object.freeze({
    byCategory: Object.freeze(byCategory),
    generic: toBandPhrases(doc.generic, "generic"),
    educational: Object.freeze({ ...doc.educational }),
  });
}

function buildVocabularyTable(
  entries: Record<string, string>,
  tier: string,
): VocabularyTable {
  const file = POLICY_FILES.vocabulary;
  const table = new Map<string, string>();
  for (const [key, replacement] of Object.entries(entries)) {
    table.set(key.toLowerCase(), replacement);
  }

  const keys = compileTermPattern([...table.keys()]);
  for (const [key, replacement] of table) {
    if (matchesAnywhere(keys, replacement)) {
      throw new ConfigurationError(
        `Invalid ${file}: tiers.${tier}.${key} replacement "${replacement}" contains a term of the same tier`,
      );
    }
    if (CLAUSE_DELIMITER.test(replacement)) {
      throw new ConfigurationError(
        `Invalid ${file}: tiers.${tier}.${key} replacement "${replacement}" contains a clause delimiter`,
      );
    }
  }
  return table;
}

function buildVocabulary(raw: unknown): VocabularyCatalogue {
  const file = POLICY_FILES.vocabulary;
  const doc = validate(VocabularyFileSchema, raw, file);

  const tiers = Object.freeze({
    basic: buildVocabularyTable(doc.tiers.basic, "basic"),
    intermediate: buildVocabularyTable(doc.tiers.intermediate, "intermediate"),
    advanced: buildVocabularyTable(doc.tiers.advanced, "advanced"),
  });

  // Phrases the adapter adds must survive a second adaptation pass untouched.
  const added = [
    ...doc.engagement.greetings,
    ...doc.engagement.followUps,
    doc.engagement.continuation,
    doc.vagueQuantity,
  ];
  const allKeys = compileTermPattern([
    ...tiers.basic.keys(),
    ...tiers.intermediate.keys(),
    ...tiers.advanced.keys(),
  ]);
  for (const phrase of added) {
    if (CLAUSE_DELIMITER.test(phrase) || matchesAnywhere(allKeys, phrase)) {
      throw new ConfigurationError(
        `Invalid ${file}: engagement phrase "${phrase}" would be rewritten by the adapter`,
      );
    }
  }

  return Object.freeze({
    tiers,
    engagement: Object.freeze({
      greetings: Object.freeze([...doc.engagement.greetings]),
      followUps: Object.freeze([...doc.engagement.followUps]),
      continuation: doc.engagement.continuation,
    }),
    vagueQuantity: doc.vagueQuantity,
  });
}

function buildPipeline(raw: unknown): PipelineConfig {
  const doc = validate(PipelineFileSchema, raw, POLICY_FILES.pipeline);
  return Object.freeze({
    safetyStage: doc.safetyStage,
    order: Object.freeze([...doc.order]),
  });
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Build a policy from already-parsed documents. Throws
 * {@link ConfigurationError} on the first defect.
 */
export function buildSafetyPolicy(documents: PolicyDocuments): SafetyPolicy {
  const patterns = buildPatterns(documents.patterns);
  return Object.freeze({
    profiles: buildProfiles(documents.profiles, patterns),
    patterns,
    redirects: buildRedirects(documents.redirects),
    vocabulary: buildVocabulary(documents.vocabulary),
    pipeline: buildPipeline(documents.pipeline),
  });
}

/** Read and parse every policy file in `dir`. */
export function readPolicyDocuments(dir: string): PolicyDocuments {
  const absoluteDir = path.resolve(dir);

  if (!fs.existsSync(absoluteDir)) {
    throw new ConfigurationError(`Policy directory does not exist: ${absoluteDir}`);
  }

  const read = (file: string): unknown => {
    const filePath = path.join(absoluteDir, file);
    try {
      return parse(fs.readFileSync(filePath, "utf-8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read ${filePath}: ${message}`, {
        cause: err,
      });
    }
  };

  return {
    profiles: read(POLICY_FILES.profiles),
    patterns: read(POLICY_FILES.patterns),
    redirects: read(POLICY_FILES.redirects),
    vocabulary: read(POLICY_FILES.vocabulary),
    pipeline: read(POLICY_FILES.pipeline),
  };
}

/**
 * Load the safety policy from `dir`. Any missing band, unknown topic
 * reference or malformed entry stops startup with a
 * {@link ConfigurationError}.
 */
export function loadSafetyPolicy(dir: string): SafetyPolicy {
  return buildSafetyPolicy(readPolicyDocuments(dir));
}
