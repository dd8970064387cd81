// ---------------------------------------------------------------------------
// Tests for the text helpers used by the safety engine.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { foldLookalikes, normalizeText, symbolDensity } from "../../../src/utils/text.js";

describe("normalizeText", () => {
  it("removes zero-width and other format characters", () => {
    expect(normalizeText("bo\u200Bmb")).toBe("bomb");
    expect(normalizeText("k\u200Dil\uFEFFl")).toBe("kill");
  });

  it("folds full-width letters and curly quotes", () => {
    expect(normalizeText("ｗｈａｔ’ｓ")).toBe("what's");
  });
});

describe("foldLookalikes", () => {
  it("turns look-alike digits and symbols into letters", () => {
    expect(foldLookalikes("b0mb k1ll $ecret p@ss")).toBe("bomb kill secret pass");
  });

  it("blanks other symbols and keeps the length", () => {
    const text = "kill! (now) 2 🙂";
    const folded = foldLookalikes(text);

    expect(folded).toBe("kill   now  2   ");
    expect(folded).toHaveLength(text.length);
  });
});

describe("symbolDensity", () => {
  it("counts unusual symbols against non-space characters", () => {
    expect(symbolDensity("ab ~~")).toEqual({ symbols: ["~", "~"], length: 4, ratio: 0.5 });
  });

  it("ignores everyday punctuation and arithmetic", () => {
    expect(symbolDensity("(3+4)*2 = 14?").symbols).toEqual([]);
  });

  it("reports nothing for empty text", () => {
    expect(symbolDensity("   ")).toEqual({ symbols: [], length: 0, ratio: 0 });
  });
});
