import { describe, it, expect } from "vitest";
import {
  countOccurrences,
  countWords,
  jaccard,
  smoothstep,
  splitParagraphs,
  splitSentences,
  tokenizeWords,
} from "./textUtils.js";

describe("textUtils", () => {
  it("splits sentences on terminal punctuation before a capital", () => {
    expect(splitSentences("The model converged. However, e.g. the rate fell! Next step?")).toEqual([
      "The model converged.",
      "However, e.g. the rate fell!",
      "Next step?",
    ]);
  });

  it("splits paragraphs on blank lines and folds single newlines", () => {
    expect(splitParagraphs("First line\nstill first.\n\n\nSecond.")).toEqual(["First line still first.", "Second."]);
    expect(splitParagraphs("   \n  ")).toEqual([]);
  });

  it("counts whitespace-delimited words", () => {
    expect(countWords("  one two\tthree \n four ")).toBe(4);
    expect(countWords("")).toBe(0);
  });

  it("tokenizes lower-cased words and keeps apostrophes inside them", () => {
    expect(tokenizeWords("Don't STOP, it's fine")).toEqual(["don't", "stop", "it's", "fine"]);
  });

  it("counts whole-word, case-insensitive occurrences", () => {
    expect(countOccurrences("However, the data... however. Howeverish", ["however", "in addition"])).toEqual({
      count: 2,
      hits: ["however"],
    });
  });

  it("computes jaccard overlap and smoothstep", () => {
    expect(jaccard(new Set(["a", "b"]), new Set(["b", "c"]))).toBeCloseTo(1 / 3);
    expect(jaccard(new Set(), new Set(["a"]))).toBe(0);
    expect(smoothstep(0.5)).toBe(0.5);
    expect(smoothstep(-1)).toBe(0);
    expect(smoothstep(2)).toBe(1);
  });
});
