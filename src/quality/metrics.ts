import { ConfigurationError } from "../config/errors.js";
import { clamp } from "../analysis/textUtils.js";
import {
  DIMENSIONS,
  type DimensionName,
  type DimensionScores,
  type DimensionWeights,
  type QualityMetrics,
  type TextStats,
} from "../report/schema.js";

export const DEFAULT_WEIGHTS: DimensionWeights = Object.freeze({
  clarity: 0.25,
  coherence: 0.25,
  academicTone: 0.2,
  completeness: 0.15,
  citationQuality: 0.15,
});

const WEIGHT_SUM_TOLERANCE = 1e-6;

export function validateWeights(weights: Readonly<Record<string, number>>): DimensionWeights {
  const known = new Set<string>(DIMENSIONS);
  for (const key of Object.keys(weights)) {
    if (!known.has(key)) throw new ConfigurationError(`Unknown quality dimension in weights: ${key}`);
  }
  const out: Record<DimensionName, number> = { ...DEFAULT_WEIGHTS };
  let sum = 0;
  for (const d of DIMENSIONS) {
    const w = weights[d];
    if (typeof w !== "number" || !Number.isFinite(w) || w < 0) {
      throw new ConfigurationError(`Weight for ${d} must be a non-negative number`);
    }
    out[d] = w;
    sum += w;
  }
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(`Dimension weights must sum to 1 (got ${sum.toFixed(4)})`);
  }
  return Object.freeze(out);
}

export function weightedOverall(scores: DimensionScores, weights: DimensionWeights): number {
  let total = 0;
  for (const d of DIMENSIONS) total += scores[d] * weights[d];
  return clamp(total, 0, 1);
}

/**
 * Freeze scores and weights together. `overallScore` is an accessor so it
 * cannot drift from the scores it summarises; it still serialises to JSON.
 */
export function createQualityMetrics(
  scores: DimensionScores,
  weights: DimensionWeights,
  stats: TextStats
): QualityMetrics {
  const dimensionScores: DimensionScores = Object.freeze({ ...scores });
  const frozenWeights: DimensionWeights = Object.freeze({ ...weights });
  return Object.freeze({
    dimensionScores,
    weights: frozenWeights,
    stats: Object.freeze({ ...stats }),
    get overallScore(): number {
      return weightedOverall(dimensionScores, frozenWeights);
    },
  });
}

export function dimensionLabel(d: DimensionName): string {
  switch (d) {
    case "clarity":
      return "Clarity";
    case "coherence":
      return "Coherence";
    case "academicTone":
      return "Academic tone";
    case "completeness":
      return "Completeness";
    case "citationQuality":
      return "Citation quality";
  }
}
