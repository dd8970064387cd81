import { describe, it, expect } from "vitest";

import {
  firstPhrase,
  genericRedirect,
  resolveEducationalRedirect,
  resolveRedirect,
} from "../../../src/domain/safety/redirects.js";
import type { RedirectCatalogue } from "../../../src/core/types.js";

const catalogue: RedirectCatalogue = {
  byCategory: {
    violence: { byBand: { toddler: ["Be gentle!"] }, fallback: ["Let's be peaceful."] },
  },
  generic: { byBand: { middle: ["Switch topics."] }, fallback: ["Something else?"] },
  educational: { violence: ["Physics of motion?"] },
};

describe("resolveRedirect", () => {
  it("prefers the category phrase for the band", () => {
    expect(resolveRedirect(catalogue, "violence", "toddler", firstPhrase)).toBe("Be gentle!");
  });

  it("falls back to the category default", () => {
    expect(resolveRedirect(catalogue, "violence", "middle", firstPhrase)).toBe("Let's be peaceful.");
  });

  it("uses generic phrases for a category without redirects", () => {
    expect(resolveRedirect(catalogue, "scary", "middle", firstPhrase)).toBe("Switch topics.");
    expect(resolveRedirect(catalogue, "scary", "toddler", firstPhrase)).toBe("Something else?");
    expect(resolveRedirect(catalogue, "scary", null, firstPhrase)).toBe("Something else?");
  });
});

describe("genericRedirect", () => {
  it("falls back when the band has no phrase", () => {
    expect(genericRedirect(catalogue, "middle", firstPhrase)).toBe("Switch topics.");
    expect(genericRedirect(catalogue, "high", firstPhrase)).toBe("Something else?");
  });
});

describe("resolveEducationalRedirect", () => {
  it("returns null for safe content and unlisted categories", () => {
    expect(resolveEducationalRedirect(catalogue, "violence", firstPhrase)).toBe("Physics of motion?");
    expect(resolveEducationalRedirect(catalogue, "scary", firstPhrase)).toBeNull();
    expect(resolveEducationalRedirect(catalogue, "safe", firstPhrase)).toBeNull();
  });
});
