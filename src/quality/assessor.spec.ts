import { describe, it, expect } from "vitest";
import { extractFeatures } from "../analysis/features.js";
import { ConfigurationError } from "../config/errors.js";
import { createContent } from "../content/content.js";
import { SuggestionGenerator } from "../revision/suggestions.js";
import { citationScore, lengthScore, QualityAssessor } from "./assessor.js";
import { DEFAULT_WEIGHTS } from "./metrics.js";

// 5 sentences × 10 words
const FIFTY_WORD_ABSTRACT = Array.from({ length: 5 }, () => "The analysis of the sample data shows a clear pattern.").join(" ");

describe("QualityAssessor", () => {
  const assessor = new QualityAssessor();

  it("is deterministic", () => {
    const content = createContent("We can't say much. Results were okay!", "results");
    const a = assessor.assess(content);
    const b = assessor.assess(content);
    expect(a.dimensionScores).toEqual(b.dimensionScores);
    expect(a.overallScore).toBe(b.overallScore);
  });

  it("scores whitespace-only text as zero on every dimension", () => {
    const m = assessor.assess(createContent(" \n\t ", "abstract"));
    expect(m.dimensionScores).toEqual({
      clarity: 0,
      coherence: 0,
      academicTone: 0,
      completeness: 0,
      citationQuality: 0,
    });
    expect(m.overallScore).toBe(0);
    expect(m.stats.wordCount).toBe(0);
  });

  it("scores a 50-word abstract as incomplete with a high-severity directive", () => {
    const m = assessor.assess(createContent(FIFTY_WORD_ABSTRACT, "abstract"));
    expect(m.stats.wordCount).toBe(50);
    expect(m.dimensionScores.completeness).toBe(0);
    expect(m.dimensionScores.clarity).toBe(1);
    expect(m.dimensionScores.coherence).toBeCloseTo(0.6);
    expect(m.dimensionScores.academicTone).toBeCloseTo(0.8);
    expect(m.dimensionScores.citationQuality).toBe(1);
    expect(m.overallScore).toBeCloseTo(0.71);

    const suggestions = new SuggestionGenerator().suggest(m, 0.7);
    expect(suggestions.map((s) => [s.dimension, s.severity])).toEqual([
      ["completeness", "high"],
      ["coherence", "medium"],
    ]);
  });

  it("penalises informal register", () => {
    const informal = assessor.assess(
      createContent("I think it's really a huge deal! We can't ignore this stuff.", "discussion")
    );
    const formal = assessor.assess(
      createContent("The evidence suggests a substantial effect. The findings may inform further research.", "discussion")
    );
    expect(informal.dimensionScores.academicTone).toBeLessThan(formal.dimensionScores.academicTone);
  });

  it("rejects invalid configuration at construction", () => {
    expect(() => new QualityAssessor({ weights: { ...DEFAULT_WEIGHTS, clarity: 0.9 } })).toThrow(ConfigurationError);
    expect(() => new QualityAssessor({ completenessTolerance: 2 })).toThrow(ConfigurationError);
    expect(
      () =>
        new QualityAssessor({
          profiles: {
            abstract: {
              label: "Abstract",
              wordCountBounds: { min: 300, max: 150 },
              requiredElements: [],
              citationDensity: { min: 0, max: 1 },
            },
          },
        })
    ).toThrow(ConfigurationError);
  });
});

describe("lengthScore", () => {
  const bounds = { min: 150, max: 300 };

  it("is 1 inside the bounds and 0 beyond the tolerance", () => {
    expect(lengthScore(200, bounds, 0.5)).toBe(1);
    expect(lengthScore(150, bounds, 0.5)).toBe(1);
    expect(lengthScore(75, bounds, 0.5)).toBe(0);
    expect(lengthScore(50, bounds, 0.5)).toBe(0);
    expect(lengthScore(450, bounds, 0.5)).toBe(0);
  });

  it("interpolates with smoothstep in between", () => {
    expect(lengthScore(112.5, bounds, 0.5)).toBeCloseTo(0.5);
    expect(lengthScore(375, bounds, 0.5)).toBeCloseTo(0.5);
  });
});

describe("citationScore", () => {
  it("costs 0.2 for mixing numeric and author-year styles", () => {
    const f = extractFeatures("Prior work [1] and Smith (2020) disagree.");
    const profile = {
      label: "Test",
      wordCountBounds: { min: 1, max: 10 },
      requiredElements: [],
      citationDensity: { min: 0, max: 50 },
    };
    expect(citationScore(f, profile)).toBeCloseTo(0.8);
  });

  it("scales down below the expected density", () => {
    const f = extractFeatures("Caching reduces latency in most deployments we studied.");
    const profile = {
      label: "Test",
      wordCountBounds: { min: 1, max: 10 },
      requiredElements: [],
      citationDensity: { min: 1.5, max: 5 },
    };
    expect(citationScore(f, profile)).toBe(0);
  });
});
