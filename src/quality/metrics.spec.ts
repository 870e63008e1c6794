import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../config/errors.js";
import { createQualityMetrics, DEFAULT_WEIGHTS, validateWeights } from "./metrics.js";

const stats = { wordCount: 10, sentenceCount: 1, paragraphCount: 1, avgSentenceLength: 10 };

describe("validateWeights", () => {
  it("accepts the default weights", () => {
    expect(validateWeights(DEFAULT_WEIGHTS)).toEqual(DEFAULT_WEIGHTS);
  });

  it("rejects weights that do not sum to one", () => {
    expect(() => validateWeights({ ...DEFAULT_WEIGHTS, clarity: 0.5 })).toThrow(ConfigurationError);
  });

  it("rejects unknown and negative weights", () => {
    expect(() => validateWeights({ ...DEFAULT_WEIGHTS, novelty: 0 })).toThrow(/Unknown quality dimension/);
    expect(() =>
      validateWeights({ ...DEFAULT_WEIGHTS, clarity: -0.25, coherence: 0.75 })
    ).toThrow(ConfigurationError);
  });
});

describe("createQualityMetrics", () => {
  it("derives the overall score from the weighted dimensions", () => {
    const m = createQualityMetrics(
      { clarity: 1, coherence: 0, academicTone: 0, completeness: 0, citationQuality: 0 },
      DEFAULT_WEIGHTS,
      stats
    );
    expect(m.overallScore).toBeCloseTo(0.25);
  });

  it("is frozen and still serialises the overall score", () => {
    const m = createQualityMetrics(
      { clarity: 1, coherence: 1, academicTone: 1, completeness: 1, citationQuality: 1 },
      DEFAULT_WEIGHTS,
      stats
    );
    expect(Object.isFrozen(m)).toBe(true);
    expect(Object.isFrozen(m.dimensionScores)).toBe(true);
    const json = JSON.parse(JSON.stringify(m));
    expect(json.overallScore).toBeCloseTo(1);
    expect(json.stats).toEqual(stats);
  });
});
