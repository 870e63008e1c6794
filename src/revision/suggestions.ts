import { dimensionLabel } from "../quality/metrics.js";
import {
  DIMENSIONS,
  type DimensionName,
  type QualityMetrics,
  type RevisionSuggestion,
  type Severity,
} from "../report/schema.js";

const DIRECTIVES: Readonly<Record<DimensionName, string>> = {
  clarity: "Shorten sentences and reduce nested clauses; keep one main idea per sentence and prefer plain terms over long nominalisations.",
  coherence: "Add transition words between ideas and open each paragraph with a sentence that links it to the previous one.",
  academicTone: "Replace informal wording and contractions with a formal academic register, drop exclamations, and hedge claims the evidence does not fully support.",
  completeness: "Bring the section to its expected length and make sure it covers every element readers expect of this section type.",
  citationQuality: "Support claims with citations at the density this section type expects and use a single citation style consistently.",
};

const SEVERITY_RANK: Readonly<Record<Severity, number>> = { high: 3, medium: 2, low: 1 };

export function severityFor(score: number): Severity {
  if (score < 0.4) return "high";
  if (score < 0.6) return "medium";
  return "low";
}

/**
 * Turns low-scoring dimensions into revision directives.
 *
 * An empty result means every dimension cleared the threshold, which the
 * cycle controller treats as acceptance.
 */
export class SuggestionGenerator {
  suggest(metrics: QualityMetrics, minDimensionThreshold: number): RevisionSuggestion[] {
    const out: RevisionSuggestion[] = [];
    for (const dimension of DIMENSIONS) {
      const score = metrics.dimensionScores[dimension];
      if (score >= minDimensionThreshold) continue;
      out.push(
        Object.freeze({
          dimension,
          severity: severityFor(score),
          directive: DIRECTIVES[dimension],
          rationale: `${dimensionLabel(dimension)} scored ${score.toFixed(2)}, below the ${minDimensionThreshold.toFixed(2)} minimum.`,
        })
      );
    }

    // severity first, then the dimensions that move the overall score most
    return out.sort(
      (a, b) =>
        SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
        metrics.weights[b.dimension] - metrics.weights[a.dimension] ||
        DIMENSIONS.indexOf(a.dimension) - DIMENSIONS.indexOf(b.dimension)
    );
  }
}
