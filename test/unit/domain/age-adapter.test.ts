import { describe, it, expect } from "vitest";

import { AgeAdapter } from "../../../src/domain/adaptation/age-adapter.js";
import { truncateToLimit } from "../../../src/domain/adaptation/length.js";
import { scrubText } from "../../../src/domain/adaptation/scrub.js";
import { restructure } from "../../../src/domain/adaptation/sentences.js";
import { SentenceComplexity } from "../../../src/core/types.js";
import { shippedPolicy } from "../../support/policy.js";

const adapter = new AgeAdapter(shippedPolicy());

function numberedWords(count: number): string {
  return Array.from({ length: count }, (_, i) => `word${i + 1}`).join(" ");
}

describe("AgeAdapter.adapt", () => {
  it("simplifies vocabulary and adds a greeting and follow-up for toddlers", () => {
    expect(
      adapter.adapt("Photosynthesis is how plants use energy.", "toddler", { childName: "Sam" }),
    ).toBe("Hi Sam! How plants make food is how plants use power. What do you think about that?");
  });

  it("splits joined clauses into short sentences for simple readers", () => {
    expect(adapter.adapt("Bees collect nectar and they make honey.", "early_elementary")).toBe(
      "Bees collect nectar. They make honey. What do you think about that?",
    );
  });

  it("keeps at most two clauses per sentence for compound readers", () => {
    expect(
      adapter.adapt("Frogs jump, fish swim, birds fly and bats glide.", "late_elementary"),
    ).toBe("Frogs jump, fish swim. Birds fly and bats glide. What do you think about that?");
  });

  it("uses the advanced tier and no engagement for middle schoolers", () => {
    expect(
      adapter.adapt("We utilize magnets to facilitate motion.", "middle", { childName: "Sam" }),
    ).toBe("We use magnets to help motion.");
    expect(adapter.adapt("Utilize the tools.", "middle")).toBe("Use the tools.");
  });

  it("leaves vocabulary alone for bands without a tier", () => {
    expect(adapter.adapt("We utilize magnets.", "high")).toBe("We utilize magnets.");
  });

  it("collapses whitespace", () => {
    expect(adapter.adapt("Cats  like\n\nto nap.", "high")).toBe("Cats like to nap.");
  });

  it("returns an empty string for empty input", () => {
    expect(adapter.adapt("   ", "toddler", { childName: "Sam" })).toBe("");
  });

  it("skips the greeting when the name is already used", () => {
    expect(adapter.adapt("Sam likes the stars.", "toddler", { childName: "Sam" })).toBe(
      "Sam likes the stars. What do you think about that?",
    );
  });

  it("does not add a follow-up after a question", () => {
    expect(adapter.adapt("Do you like dogs?", "toddler")).toBe("Do you like dogs?");
  });

  it("uses the injected phrase picker", () => {
    const last = new AgeAdapter(shippedPolicy(), {
      pickPhrase: (phrases) => phrases[phrases.length - 1] ?? "",
    });

    expect(last.adapt("Cats nap.", "toddler", { childName: "Sam" })).toBe(
      "Hello Sam! Cats nap. What would you like to learn next?",
    );
  });

  // ── Length ──────────────────────────────────────────────────────────

  it("drops whole sentences to stay within the word limit", () => {
    const text = Array.from({ length: 10 }, () => "Cats like to nap.").join(" ");
    const kept = Array.from({ length: 6 }, () => "Cats like to nap.").join(" ");

    const out = adapter.adapt(text, "toddler", { childName: "Sam" });

    expect(out).toBe(`Hi Sam! ${kept} What do you think about that?`);
    expect(out.split(" ")).toHaveLength(32);
  });

  it("cuts a long sentence and ends with the continuation prompt", () => {
    const out = adapter.adapt(`${numberedWords(40)}.`, "toddler");

    expect(out).toBe(`${numberedWords(24)}... Want to hear more?`);
  });

  // ── Scrub ───────────────────────────────────────────────────────────

  it("replaces contact details and links", () => {
    expect(adapter.adapt("Call 555-123-4567 or email kid@example.com.", "high")).toBe(
      "Call [phone] or email [email].",
    );
    expect(adapter.adapt("See https://example.com/page, then www.example.org.", "high")).toBe(
      "See [link], then [link].",
    );
  });

  it("makes large numbers vague for toddlers", () => {
    expect(adapter.adapt("There are 8 planets. The sun is 93,000,000 miles away.", "toddler")).toBe(
      "There are 8 planets. The sun is many miles away. What do you think about that?",
    );
  });

  // ── Idempotence ─────────────────────────────────────────────────────

  it.each([
    ["Photosynthesis is how plants use energy.", "toddler"],
    ["Bees collect nectar and they make honey.", "early_elementary"],
    ["Frogs jump, fish swim, birds fly and bats glide.", "late_elementary"],
    [Array.from({ length: 10 }, () => "Cats like to nap.").join(" "), "toddler"],
    [`${numberedWords(40)}.`, "toddler"],
    ["There are 8 planets. The sun is 93,000,000 miles away.", "toddler"],
  ] as const)("is idempotent for %s (%s)", (text, band) => {
    const once = adapter.adapt(text, band, { childName: "Sam" });

    expect(adapter.adapt(once, band, { childName: "Sam" })).toBe(once);
  });

  it.each([
    ["Tiny", "Hi Tiny! Plants grow toward light. What do you think about that?"],
    ["Sam, Jr", "Hi Sam, Jr! Plants grow toward light. What do you think about that?"],
    ["  Ana   Lu ", "Hi Ana Lu! Plants grow toward light. What do you think about that?"],
  ])("leaves the greeting for %j alone on a second pass", (childName, expected) => {
    const once = adapter.adapt("Plants grow toward light.", "toddler", { childName });

    expect(once).toBe(expected);
    expect(adapter.adapt(once, "toddler", { childName })).toBe(expected);
  });
});

describe("truncateToLimit", () => {
  it("returns text already within the limit unchanged", () => {
    expect(truncateToLimit("One two three.", 3, "More?")).toBe("One two three.");
  });

  it("falls back to a word cut when whole sentences keep too little", () => {
    expect(truncateToLimit("Short one. word1 word2 word3 word4 word5 word6.", 5, "More?")).toBe(
      "Short one. word1 word2... More?",
    );
  });
});

describe("restructure", () => {
  it("leaves a sentence with an empty clause untouched", () => {
    expect(restructure("Well, , fine.", SentenceComplexity.SIMPLE)).toBe("Well, , fine.");
  });

  it("does not change complex text", () => {
    expect(restructure("A, b and c.", SentenceComplexity.COMPLEX)).toBe("A, b and c.");
  });
});

describe("scrubText", () => {
  it("keeps numbers when no threshold is set", () => {
    expect(scrubText("It is 5,000 years old.", null, "many")).toBe("It is 5,000 years old.");
  });

  it("leaves decimals at or below the threshold", () => {
    expect(scrubText("Pi is 3.14 and 2,000 is big.", 999, "many")).toBe(
      "Pi is 3.14 and many is big.",
    );
  });
});
