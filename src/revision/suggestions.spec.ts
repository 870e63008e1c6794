import { describe, it, expect } from "vitest";
import { createQualityMetrics, DEFAULT_WEIGHTS } from "../quality/metrics.js";
import type { DimensionScores } from "../report/schema.js";
import { severityFor, SuggestionGenerator } from "./suggestions.js";

const stats = { wordCount: 100, sentenceCount: 5, paragraphCount: 1, avgSentenceLength: 20 };

function metrics(scores: DimensionScores) {
  return createQualityMetrics(scores, DEFAULT_WEIGHTS, stats);
}

describe("severityFor", () => {
  it("maps score bands to severities", () => {
    expect(severityFor(0.39)).toBe("high");
    expect(severityFor(0.4)).toBe("medium");
    expect(severityFor(0.59)).toBe("medium");
    expect(severityFor(0.6)).toBe("low");
  });
});

describe("SuggestionGenerator", () => {
  const generator = new SuggestionGenerator();

  it("orders by severity, then by dimension weight", () => {
    const out = generator.suggest(
      metrics({ clarity: 0.3, coherence: 0.5, academicTone: 0.35, completeness: 0.69, citationQuality: 0.9 }),
      0.7
    );
    expect(out.map((s) => s.dimension)).toEqual(["clarity", "academicTone", "coherence", "completeness"]);
    expect(out.map((s) => s.severity)).toEqual(["high", "high", "medium", "low"]);
    expect(out[0].rationale).toBe("Clarity scored 0.30, below the 0.70 minimum.");
    expect(out[0].directive).toMatch(/^Shorten sentences/);
  });

  it("skips dimensions at or above the threshold", () => {
    const out = generator.suggest(
      metrics({ clarity: 0.7, coherence: 0.9, academicTone: 0.8, completeness: 0.75, citationQuality: 0.7 }),
      0.7
    );
    expect(out).toEqual([]);
  });

  it("returns frozen suggestions and the same output for the same metrics", () => {
    const m = metrics({ clarity: 0.2, coherence: 0.2, academicTone: 0.2, completeness: 0.2, citationQuality: 0.2 });
    const a = generator.suggest(m, 0.7);
    expect(a).toEqual(generator.suggest(m, 0.7));
    expect(Object.isFrozen(a[0])).toBe(true);
    // equal severities and equal weights fall back to declaration order
    expect(a.map((s) => s.dimension)).toEqual(["clarity", "coherence", "academicTone", "completeness", "citationQuality"]);
  });
});
