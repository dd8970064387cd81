// ---------------------------------------------------------------------------
// Tests for the safety policy loader.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  PatternsFileSchema,
  ProfilesFileSchema,
  RedirectsFileSchema,
  VocabularyFileSchema,
  buildSafetyPolicy,
  loadSafetyPolicy,
} from "../../../src/config/policy-loader.js";
import { ConfigurationError } from "../../../src/core/errors.js";
import { AgeBand, FilterStrictness } from "../../../src/core/types.js";
import { AGE_BANDS } from "../../../src/domain/age/age-classifier.js";
import { policyDocuments, shippedPolicy } from "../../support/policy.js";

describe("loadSafetyPolicy", () => {
  it("loads a profile for every band", () => {
    const policy = shippedPolicy();
    expect([...policy.profiles.keys()]).toEqual([...AGE_BANDS]);
  });

  it("reads the toddler profile", () => {
    const toddler = shippedPolicy().profiles.get(AgeBand.TODDLER);
    expect(toddler).toMatchObject({
      band: "toddler",
      maxWords: 35,
      sentenceComplexity: "simple",
      vocabularyTier: "basic",
      filterStrictness: FilterStrictness.MAXIMUM,
      severityBoost: 1,
      vagueNumbersAbove: 999,
    });
    expect(toddler?.blockedTopics.has("horror")).toBe(true);
  });

  it("freezes the loaded objects", () => {
    const policy = shippedPolicy();
    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.profiles.get(AgeBand.HIGH))).toBe(true);
    expect(Object.isFrozen(policy.patterns.termTables)).toBe(true);
    expect(Object.isFrozen(policy.pipeline.order)).toBe(true);
  });

  it("reads the stage order with the safety stage first", () => {
    expect(shippedPolicy().pipeline).toEqual({
      safetyStage: "content_filter",
      order: ["content_filter", "age_adapter", "parent_logger"],
    });
  });

  it("compiles term tables to word-boundary expressions", () => {
    const profanity = shippedPolicy().patterns.termTables.find((t) => t.id === "profanity");
    expect(profanity?.pattern.flags).toBe("gi");
    expect("what class are you in".match(profanity?.pattern ?? /(?!)/g)).toBeNull();
  });

  it("reads the symbol-density check", () => {
    expect(shippedPolicy().patterns.symbolDensity).toEqual({
      id: "encoded_text",
      category: "off_topic",
      severity: 2,
      maxRatio: 0.3,
      minLength: 10,
    });
  });

  it("fails when the directory does not exist", () => {
    expect(() => loadSafetyPolicy("/nonexistent/policy-dir")).toThrow(
      "Policy directory does not exist: /nonexistent/policy-dir",
    );
  });
});

describe("buildSafetyPolicy validation", () => {
  it("rejects a missing band", () => {
    const docs = policyDocuments();
    const profiles = ProfilesFileSchema.parse(docs.profiles);
    delete profiles["adult"];

    expect(() => buildSafetyPolicy({ ...docs, profiles })).toThrow(
      'Invalid age-profiles.yaml: missing profile for band "adult"',
    );
  });

  it("rejects an unknown band", () => {
    const docs = policyDocuments();
    const profiles = ProfilesFileSchema.parse(docs.profiles);
    const middle = profiles["middle"];
    expect(middle).toBeDefined();
    profiles["tween"] = middle;

    expect(() => buildSafetyPolicy({ ...docs, profiles })).toThrow(
      'Invalid age-profiles.yaml: unknown age band "tween"',
    );
  });

  it("rejects a blocked topic that has no definition", () => {
    const docs = policyDocuments();
    const profiles = ProfilesFileSchema.parse(docs.profiles);
    const high = profiles["high"];
    if (!high) throw new Error("fixture missing high profile");
    profiles["high"] = { ...high, blockedTopics: ["gambling", "skateboarding"] };

    expect(() => buildSafetyPolicy({ ...docs, profiles })).toThrow(
      'high.blockedTopics references unknown topic "skateboarding"',
    );
  });

  it("rejects an issue tolerance above severe", () => {
    const docs = policyDocuments();
    const profiles = ProfilesFileSchema.parse(docs.profiles);
    const adult = profiles["adult"];
    if (!adult) throw new Error("fixture missing adult profile");
    const broken = {
      ...profiles,
      adult: { ...adult, issueTolerance: { maxIssues: 5, maxSeverity: 4 } },
    };

    expect(() => buildSafetyPolicy({ ...docs, profiles: broken })).toThrow(
      "adult.issueTolerance.maxSeverity: maxSeverity may not exceed severe (3)",
    );
  });

  it("rejects a malformed rule expression", () => {
    const docs = policyDocuments();
    const patterns = PatternsFileSchema.parse(docs.patterns);
    patterns.rules["broken"] = {
      category: "dangerous",
      severity: 3,
      patterns: ["(unclosed"],
    };

    expect(() => buildSafetyPolicy({ ...docs, patterns })).toThrow(
      'Invalid safety-patterns.yaml: rule "broken" has a malformed pattern',
    );
  });

  it("rejects a symbol ratio outside (0, 1)", () => {
    const docs = policyDocuments();
    const parsed = PatternsFileSchema.parse(docs.patterns);
    const patterns = {
      ...parsed,
      encoding: { category: "off_topic", severity: 2, maxSymbolRatio: 1.5, minLength: 10 },
    };

    expect(() => buildSafetyPolicy({ ...docs, patterns })).toThrow(
      /Invalid safety-patterns\.yaml: encoding\.maxSymbolRatio/,
    );
  });

  it("rejects an unknown category", () => {
    const docs = policyDocuments();
    const patterns = {
      ...PatternsFileSchema.parse(docs.patterns),
      terms: { odd: { category: "spooky", severity: 1, terms: ["boo"] } },
    };

    expect(() => buildSafetyPolicy({ ...docs, patterns })).toThrow(ConfigurationError);
  });

  it("rejects redirect sets without a fallback", () => {
    const docs = policyDocuments();
    const redirects = {
      ...RedirectsFileSchema.parse(docs.redirects),
      generic: { toddler: ["Let's play a counting game!"] },
    };

    expect(() => buildSafetyPolicy({ ...docs, redirects })).toThrow(
      "Invalid redirects.yaml: generic has no fallback phrases",
    );
  });

  it("rejects a replacement that contains a word of its own tier", () => {
    const docs = policyDocuments();
    const vocabulary = VocabularyFileSchema.parse(docs.vocabulary);
    vocabulary.tiers.basic["huge"] = "enormous";

    expect(() => buildSafetyPolicy({ ...docs, vocabulary })).toThrow(
      'tiers.basic.huge replacement "enormous" contains a term of the same tier',
    );
  });

  it("rejects engagement phrases the adapter would split", () => {
    const docs = policyDocuments();
    const parsed = VocabularyFileSchema.parse(docs.vocabulary);
    const vocabulary = {
      ...parsed,
      engagement: {
        ...parsed.engagement,
        followUps: ["What do you think, and why?"],
      },
    };

    expect(() => buildSafetyPolicy({ ...docs, vocabulary })).toThrow(
      'engagement phrase "What do you think, and why?" would be rewritten by the adapter',
    );
  });

  it("rejects a stage order that is empty", () => {
    const docs = policyDocuments();
    expect(() =>
      buildSafetyPolicy({ ...docs, pipeline: { safetyStage: "content_filter", order: [] } }),
    ).toThrow("Invalid pipeline.yaml: order: Array must contain at least 1 element(s)");
  });
});
