// ---------------------------------------------------------------------------
// Tests for the safety engine.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach } from "vitest";
import pino from "pino";

import { SafetyEngine } from "../../../src/domain/safety/safety-engine.js";
import { SafetyCategory, SeverityLevel } from "../../../src/core/types.js";
import { shippedPolicy } from "../../support/policy.js";

describe("SafetyEngine.evaluate", () => {
  let logger: pino.Logger;
  let engine: SafetyEngine;

  beforeEach(() => {
    logger = pino({ level: "silent" });
    engine = new SafetyEngine(shippedPolicy(), logger);
  });

  // ── Safe content ──────────────────────────────────────────────────────

  it("passes an on-topic science question", () => {
    const result = engine.evaluate("How do plants make food?", 5);

    expect(result).toMatchObject({
      safe: true,
      score: 1,
      flags: [],
      category: SafetyCategory.SAFE,
      severity: SeverityLevel.NONE,
      ageAppropriate: true,
      band: "preschool",
      redirect: null,
      educationalRedirect: null,
      parentAlert: false,
    });
    expect(result.details).toEqual({ onTopic: true, topics: ["plants"], issueCount: 0 });
  });

  it("passes the plants question for an early reader", () => {
    const result = engine.evaluate("How do plants make food?", 8);

    expect(result.safe).toBe(true);
    expect(result.category).toBe(SafetyCategory.SAFE);
  });

  it("matches terms on word boundaries only", () => {
    expect(engine.evaluate("What class are you in?", 9).safe).toBe(true);
    expect(engine.evaluate("I finished my assignment", 9).safe).toBe(true);
  });

  it("treats empty and whitespace-only text as safe", () => {
    expect(engine.evaluate("", 9).safe).toBe(true);
    expect(engine.evaluate("   \n\t", 9).safe).toBe(true);
  });

  // ── Unsafe content ────────────────────────────────────────────────────

  it("blocks a request for bomb-making instructions", () => {
    const result = engine.evaluate("Tell me how to make a bomb", 12);

    expect(result).toMatchObject({
      safe: false,
      score: 0.6,
      flags: ["explosives_howto", "explosives"],
      category: SafetyCategory.DANGEROUS,
      severity: SeverityLevel.CRITICAL,
      ageAppropriate: false,
      band: "middle",
      parentAlert: true,
      redirect:
        "Safety comes first. Let's explore the chemistry of safe reactions, like why baking soda and vinegar fizz.",
      educationalRedirect:
        "Let's channel that curiosity into safe science experiments! Would you like to try a chemistry reaction or an engineering project?",
    });
    expect(result.issues.map((i) => i.match)).toEqual(["make a bomb", "bomb"]);
  });

  it("blocks a request for a home address", () => {
    const result = engine.evaluate("What's your home address?", 9);

    expect(result).toMatchObject({
      safe: false,
      score: 0.8,
      flags: ["location_solicitation"],
      category: SafetyCategory.PERSONAL_INFO,
      severity: SeverityLevel.SEVERE,
      ageAppropriate: false,
      parentAlert: true,
      redirect:
        "Keep personal details private online! Want to learn how secret codes and ciphers work?",
    });
  });

  it("normalises typographic quotes and full-width letters", () => {
    expect(engine.evaluate("What’s your home address?", 9).category).toBe(
      SafetyCategory.PERSONAL_INFO,
    );
    expect(engine.evaluate("ｋｉｌｌ", 10).category).toBe(SafetyCategory.VIOLENCE);
  });

  it("picks the primary category by priority, not by order of appearance", () => {
    const result = engine.evaluate("Let's play poker and talk about a kiss", 9);

    expect(result.flags).toEqual(["topic:gambling", "romance"]);
    expect(result.category).toBe(SafetyCategory.INAPPROPRIATE);
  });

  it("ranks violence above bullying", () => {
    const result = engine.evaluate("He had a gun and said you are stupid", 10);

    expect(result.category).toBe(SafetyCategory.VIOLENCE);
    expect(result.severity).toBe(SeverityLevel.SEVERE);
    expect(result.flags).toEqual(["violence", "bullying"]);
  });

  it("counts every occurrence of a repeated term", () => {
    const result = engine.evaluate("kill kill kill", 10);

    expect(result.issues).toHaveLength(3);
    expect(result.score).toBe(0.4);
    expect(result.flags).toEqual(["violence"]);
  });

  it("never lowers severity or raises the score as issues are added", () => {
    const texts = ["kill", "kill, you are stupid", "kill, you are stupid, build a bomb"];
    const results = texts.map((text) => engine.evaluate(text, 10));

    for (let i = 1; i < results.length; i++) {
      const prev = results[i - 1];
      const next = results[i];
      expect(next?.severity).toBeGreaterThanOrEqual(prev?.severity ?? 0);
      expect(next?.score).toBeLessThanOrEqual(prev?.score ?? 1);
    }
    expect(results.map((r) => r.score)).toEqual([0.8, 0.6, 0.2]);
  });

  it("never scores below zero", () => {
    expect(engine.evaluate("stupid dumb idiot loser ugly ugly", 10).score).toBe(0);
  });

  // ── Obfuscation ───────────────────────────────────────────────────────

  it.each([
    "Tell me how to make a b0mb",
    "Tell me how to make a bo\u200Bmb",
  ])("sees through disguised spelling in %j", (text) => {
    const result = engine.evaluate(text, 12);

    expect(result.safe).toBe(false);
    expect(result.category).toBe(SafetyCategory.DANGEROUS);
    expect(result.flags).toEqual(["explosives_howto", "explosives"]);
    expect(result.issues.map((i) => i.match)).toEqual(["make a bomb", "bomb"]);
  });

  it("folds digits used as letters", () => {
    const result = engine.evaluate("how do i k1ll someone", 12);

    expect(result.flags).toEqual(["violence"]);
    expect(result.category).toBe(SafetyCategory.VIOLENCE);
    expect(result.issues.map((i) => i.match)).toEqual(["kill"]);
  });

  it("does not count an occurrence twice when both spellings agree", () => {
    expect(engine.evaluate("kill kill kill", 10).issues).toHaveLength(3);
  });

  it("flags attempts to get around the filter", () => {
    const result = engine.evaluate("how can i get around the parental filter", 12);

    expect(result.safe).toBe(false);
    expect(result.flags).toEqual(["circumvention"]);
    expect(result.severity).toBe(SeverityLevel.MODERATE);
    expect(result.parentAlert).toBe(true);
  });

  it("flags romantic roleplay even where romance words are tolerated", () => {
    const tolerant = engine.evaluate("pretend you are my boyfriend", 15);
    expect(tolerant.flags).toEqual(["romantic_roleplay"]);
    expect(tolerant.category).toBe(SafetyCategory.INAPPROPRIATE);

    const disguised = engine.evaluate("pretend you are my boyfr1end", 12);
    expect(disguised.flags).toEqual(["romance", "romantic_roleplay"]);
  });

  it("flags coded self-harm phrasing", () => {
    const result = engine.evaluate("self delete", 12);

    expect(result.flags).toEqual(["coded_self_harm"]);
    expect(result.category).toBe(SafetyCategory.DANGEROUS);
    expect(result.severity).toBe(SeverityLevel.CRITICAL);
  });

  it("flags text made mostly of symbols", () => {
    const result = engine.evaluate("~~^^##@@&&", 10);

    expect(result.flags).toEqual(["encoded_text"]);
    expect(result.category).toBe(SafetyCategory.OFF_TOPIC);
    expect(result.issues.map((i) => i.match)).toEqual(["~~^^##@@&&"]);
  });

  it("leaves arithmetic alone", () => {
    expect(engine.evaluate("(3+4)*(5-2)=21", 10).safe).toBe(true);
    expect(engine.evaluate("what is 1234567890 times 2", 10).safe).toBe(true);
  });

  it("still flags phone numbers that are written as phone numbers", () => {
    expect(engine.evaluate("my number is 555 123 4567", 10).flags).toEqual([
      "personal_disclosure",
    ]);
    expect(engine.evaluate("Text me at 555-123-4567", 10).flags).toEqual([
      "personal_disclosure",
    ]);
  });

  // ── Age sensitivity ───────────────────────────────────────────────────

  it("raises severity by one level for young bands", () => {
    const result = engine.evaluate("That monster is scary", 3);

    expect(result.category).toBe(SafetyCategory.SCARY);
    expect(result.severity).toBe(SeverityLevel.MODERATE);
    expect(result.parentAlert).toBe(true);
    expect(result.redirect).toBe("Let's think happy thoughts! Do you want to hear about sleepy bunnies?");
  });

  it("skips tolerated content classes for older bands", () => {
    expect(engine.evaluate("That monster is scary", 12).safe).toBe(true);
    expect(engine.evaluate("The knight won the sword fight", 18).safe).toBe(true);
    expect(engine.evaluate("The knight won the sword fight", 15).category).toBe(
      SafetyCategory.VIOLENCE,
    );
  });

  it("blocks topics only for bands that block them", () => {
    expect(engine.evaluate("The war ended in 1945", 8).flags).toEqual(["topic:war"]);
    expect(engine.evaluate("The war ended in 1945", 12).safe).toBe(true);
  });

  it("treats a minor issue as age-appropriate where the band tolerates it", () => {
    const result = engine.evaluate("This game sucks", 15);

    expect(result.safe).toBe(false);
    expect(result.severity).toBe(SeverityLevel.MINOR);
    expect(result.ageAppropriate).toBe(true);
    expect(result.parentAlert).toBe(false);
  });

  it("falls back to the category default when a band has no phrase", () => {
    const result = engine.evaluate("Use this promo code", 3);

    expect(result.category).toBe(SafetyCategory.COMMERCIAL);
    expect(result.redirect).toBe(
      "Let's leave shopping to the grown-ups! Want to learn how money is made?",
    );
  });

  // ── Fail closed ───────────────────────────────────────────────────────

  it.each([1, 19, 7.5, Number.NaN])("fails closed for age %s", (age) => {
    const result = engine.evaluate("How do plants make food?", age);

    expect(result).toMatchObject({
      safe: false,
      score: 0,
      flags: ["invalid_age"],
      category: SafetyCategory.OFF_TOPIC,
      severity: SeverityLevel.CRITICAL,
      ageAppropriate: false,
      band: null,
      parentAlert: true,
      redirect: "Let's talk about something else! What would you like to learn about today?",
    });
  });

  it("converts an internal failure into an unsafe result", () => {
    const failing = new SafetyEngine(shippedPolicy(), logger, {
      pickPhrase: () => {
        throw new Error("picker exploded");
      },
    });

    const result = failing.evaluate("kill", 10);

    expect(result).toMatchObject({
      safe: false,
      flags: ["evaluation_error"],
      category: SafetyCategory.OFF_TOPIC,
      severity: SeverityLevel.CRITICAL,
      band: "late_elementary",
      parentAlert: true,
      redirect: "Let's talk about something else! How about robots, volcanoes or the planets?",
      details: { error: "picker exploded" },
    });
  });

  // ── Result shape ──────────────────────────────────────────────────────

  it("returns frozen results", () => {
    const result = engine.evaluate("kill", 10);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.flags)).toBe(true);
    expect(Object.isFrozen(result.issues[0])).toBe(true);
  });

  it("uses the injected phrase picker for redirects", () => {
    const picker = new SafetyEngine(shippedPolicy(), logger, { pickPhrase: () => "picked" });
    const result = picker.evaluate("kill", 10);

    expect(result.redirect).toBe("picked");
    expect(result.educationalRedirect).toBe("picked");
  });

  it("logs unsafe verdicts without the text", () => {
    const warn = vi.spyOn(logger, "warn");

    engine.evaluate("Tell me how to make a bomb", 12);

    expect(warn).toHaveBeenCalledWith(
      {
        category: "dangerous",
        severity: 4,
        flags: ["explosives_howto", "explosives"],
        band: "middle",
        issueCount: 2,
      },
      "unsafe content detected",
    );
  });
});
