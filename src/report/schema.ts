import type { Content } from "../content/content.js";

export const DIMENSIONS = ["clarity", "coherence", "academicTone", "completeness", "citationQuality"] as const;

export type DimensionName = (typeof DIMENSIONS)[number];

export type DimensionScores = Readonly<Record<DimensionName, number>>;

export type DimensionWeights = Readonly<Record<DimensionName, number>>;

export type TextStats = {
  readonly wordCount: number;
  readonly sentenceCount: number;
  readonly paragraphCount: number;
  readonly avgSentenceLength: number;
};

export type QualityMetrics = {
  /** Each dimension in [0, 1]. */
  readonly dimensionScores: DimensionScores;
  /** Sums to 1. */
  readonly weights: DimensionWeights;
  /** Σ score·weight, recomputed on every read. */
  readonly overallScore: number;
  readonly stats: TextStats;
};

export type Severity = "low" | "medium" | "high";

export type RevisionSuggestion = {
  readonly dimension: DimensionName;
  readonly severity: Severity;
  /** Instruction handed to the rewriting backend. */
  readonly directive: string;
  readonly rationale: string;
};

export type ProviderId = string;

export type RevisionRecord = {
  readonly iteration: number;
  readonly preScore: QualityMetrics;
  readonly suggestionsApplied: readonly RevisionSuggestion[];
  readonly postScore: QualityMetrics;
  readonly providerUsed: ProviderId;
  /** ISO-8601. */
  readonly timestamp: string;
};

export type TerminationReason =
  | "AcceptedThreshold"
  | "MaxIterations"
  | "NoImprovement"
  | "ProviderExhausted"
  | "Cancelled";

export type CycleResult = {
  readonly finalText: string;
  readonly finalScore: QualityMetrics;
  readonly history: readonly RevisionRecord[];
  readonly terminationReason: TerminationReason;
  readonly iterations: number;
};

/** Single-pass review: score plus directives, no rewriting. */
export type ContentReview = {
  readonly content: Content;
  readonly metrics: QualityMetrics;
  readonly suggestions: readonly RevisionSuggestion[];
  readonly reviewedAt: string;
};
