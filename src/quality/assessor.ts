import { extractFeatures, type TextFeatures } from "../analysis/features.js";
import { clamp, smoothstep } from "../analysis/textUtils.js";
import { ConfigurationError } from "../config/errors.js";
import type { Content } from "../content/content.js";
import { SECTION_PROFILES, SECTION_TYPES, type SectionProfile, type WordCountBounds } from "../content/sections.js";
import type { DimensionScores, DimensionWeights, QualityMetrics, TextStats } from "../report/schema.js";
import { createQualityMetrics, DEFAULT_WEIGHTS, validateWeights } from "./metrics.js";

export interface Assessor {
  assess(content: Content): QualityMetrics;
}

export type QualityAssessorOptions = {
  weights?: DimensionWeights;
  /**
   * How far outside the section's word bounds (as a fraction of the bound)
   * completeness fades to zero.
   */
  completenessTolerance?: number;
  profiles?: Readonly<Record<string, SectionProfile | undefined>>;
};

const ZERO_SCORES: DimensionScores = Object.freeze({
  clarity: 0,
  coherence: 0,
  academicTone: 0,
  completeness: 0,
  citationQuality: 0,
});

/**
 * Rule-based multi-dimension scorer. No network, no mutable state: the same
 * content always yields the same metrics.
 *
 * Dimensions, each in [0, 1]:
 * - clarity: average sentence length (full marks up to 20 words, none at 45),
 *   less penalties for clause density and very long words;
 * - coherence: share of sentences with a transition and word overlap between adjacent
 *   paragraphs (or sentences, for single-paragraph text);
 * - academicTone: academic vocabulary and hedging, penalised by contractions,
 *   informal words, casual first person and exclamations;
 * - completeness: word count against the section's bounds, fading to zero
 *   `completenessTolerance` beyond them, scaled down by up to a fifth when
 *   the section's required elements are not named;
 * - citationQuality: citation markers against the section's expected density,
 *   with a deduction for mixing numeric and author-year styles.
 *
 * Text with no words scores zero everywhere. The weighted overall score is
 * computed by `createQualityMetrics`.
 */
export class QualityAssessor implements Assessor {
  private readonly weights: DimensionWeights;
  private readonly tolerance: number;
  private readonly profiles: Readonly<Record<string, SectionProfile | undefined>>;

  constructor(opts: QualityAssessorOptions = {}) {
    this.weights = validateWeights(opts.weights ?? DEFAULT_WEIGHTS);
    this.tolerance = opts.completenessTolerance ?? 0.5;
    if (!Number.isFinite(this.tolerance) || this.tolerance < 0 || this.tolerance > 1) {
      throw new ConfigurationError("completenessTolerance must be within [0, 1]");
    }
    this.profiles = opts.profiles ?? SECTION_PROFILES;
    for (const t of SECTION_TYPES) {
      const p = this.profiles[t];
      if (!p) throw new ConfigurationError(`Missing section profile for ${t}`);
      if (p.wordCountBounds.min > p.wordCountBounds.max) {
        throw new ConfigurationError(`Word bounds for ${t} are inverted`);
      }
    }
  }

  assess(content: Content): QualityMetrics {
    const f = extractFeatures(content.text);
    const stats: TextStats = {
      wordCount: f.wordCount,
      sentenceCount: f.sentenceCount,
      paragraphCount: f.paragraphCount,
      avgSentenceLength: f.avgSentenceLength,
    };
    if (f.wordCount === 0) return createQualityMetrics(ZERO_SCORES, this.weights, stats);

    const profile = this.profileFor(content.sectionType);
    const scores: DimensionScores = {
      clarity: clarityScore(f),
      coherence: coherenceScore(f),
      academicTone: academicToneScore(f),
      completeness: completenessScore(content.text, f, content.wordCountBounds, profile, this.tolerance),
      citationQuality: citationScore(f, profile),
    };
    return createQualityMetrics(scores, this.weights, stats);
  }

  private profileFor(sectionType: string): SectionProfile {
    const p = this.profiles[sectionType];
    if (!p) throw new ConfigurationError(`Missing section profile for ${sectionType}`);
    return p;
  }
}

/** 1 inside the bounds, smoothstep down to 0 at `bound·(1 ± tolerance)`. */
export function lengthScore(wordCount: number, bounds: WordCountBounds, tolerance: number): number {
  const lowZero = bounds.min * (1 - tolerance);
  const highZero = bounds.max * (1 + tolerance);
  if (wordCount <= lowZero || wordCount >= highZero) {
    return wordCount >= bounds.min && wordCount <= bounds.max ? 1 : 0;
  }
  if (wordCount < bounds.min) return smoothstep((wordCount - lowZero) / (bounds.min - lowZero));
  if (wordCount > bounds.max) return smoothstep((highZero - wordCount) / (highZero - bounds.max));
  return 1;
}

export function clarityScore(f: TextFeatures): number {
  if (f.sentenceCount === 0) return 0;
  const avg = f.avgSentenceLength;
  const base = avg <= 20 ? 1 : avg >= 45 ? 0 : 1 - (avg - 20) / 25;
  const clausesPerSentence = f.clauseMarkerCount / f.sentenceCount;
  const clausePenalty = clamp((clausesPerSentence - 2) * 0.1, 0, 0.3);
  const longWordPenalty = clamp((f.longWordRatio - 0.1) * 1.5, 0, 0.2);
  return clamp(base - clausePenalty - longWordPenalty, 0, 1);
}

export function coherenceScore(f: TextFeatures): number {
  if (f.sentenceCount === 0) return 0;
  const markerScore = clamp(f.sentencesWithTransition / f.sentenceCount / 0.3, 0, 1);
  // a lone sentence has nothing to connect to
  const continuity = f.continuityUnitCount < 2 ? 0.5 : clamp(f.adjacentOverlap / 0.15, 0, 1);
  return clamp(0.3 + 0.4 * markerScore + 0.3 * continuity, 0, 1);
}

export function academicToneScore(f: TextFeatures): number {
  if (f.wordCount === 0) return 0;
  const contractionsPer100 = (f.contractionCount / f.wordCount) * 100;
  const exclamationRate = f.sentenceCount ? f.exclamationCount / f.sentenceCount : 0;

  let score = 0.7;
  score -= Math.min(0.3, contractionsPer100 * 0.1);
  score -= Math.min(0.25, f.informalCount * 0.05);
  score -= Math.min(0.24, f.casualFirstPersonCount * 0.08);
  score -= Math.min(0.2, exclamationRate * 0.5);
  score += Math.min(0.2, f.hedgingCount * 0.03);
  score += Math.min(0.1, f.academicTermCount * 0.02);
  return clamp(score, 0, 1);
}

export function completenessScore(
  text: string,
  f: TextFeatures,
  bounds: WordCountBounds,
  profile: SectionProfile,
  tolerance: number
): number {
  if (f.wordCount === 0) return 0;
  const lower = text.toLowerCase();
  const required = profile.requiredElements;
  const found = required.filter((e) => lower.includes(e.toLowerCase())).length;
  const coverage = required.length ? found / required.length : 1;
  return clamp(lengthScore(f.wordCount, bounds, tolerance) * (0.8 + 0.2 * coverage), 0, 1);
}

export function citationScore(f: TextFeatures, profile: SectionProfile): number {
  if (f.wordCount === 0) return 0;
  const density = (f.citationMarkerCount / f.wordCount) * 100;
  const { min, max } = profile.citationDensity;

  let score: number;
  if (density < min) score = min > 0 ? density / min : 1;
  else if (density > max) score = max > 0 ? 1 - (density - max) / max : 0;
  else score = 1;

  // mixed numeric and author-year styles
  if (f.numericCitationCount > 0 && f.authorYearCitationCount > 0) score -= 0.2;
  return clamp(score, 0, 1);
}
