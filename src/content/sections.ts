import { z } from "zod";

export const SECTION_TYPES = ["abstract", "introduction", "methods", "results", "discussion"] as const;

export const SectionTypeSchema = z.enum(SECTION_TYPES);

export type SectionType = z.infer<typeof SectionTypeSchema>;

export type WordCountBounds = {
  readonly min: number;
  readonly max: number;
};

/** Expected citation markers per 100 words. */
export type CitationDensityRange = {
  readonly min: number;
  readonly max: number;
};

export type SectionProfile = {
  readonly label: string;
  readonly wordCountBounds: WordCountBounds;
  /** Keywords whose presence signals that the section covers what readers expect of it. */
  readonly requiredElements: readonly string[];
  readonly citationDensity: CitationDensityRange;
};

/**
 * Fixed per-section expectations. Introduction and discussion lean on the
 * literature; methods and results mostly report the authors' own work.
 */
export const SECTION_PROFILES: Readonly<Record<SectionType, SectionProfile>> = {
  abstract: {
    label: "Abstract",
    wordCountBounds: { min: 150, max: 300 },
    requiredElements: ["background", "methods", "results", "conclusion"],
    citationDensity: { min: 0, max: 1 },
  },
  introduction: {
    label: "Introduction",
    wordCountBounds: { min: 300, max: 1000 },
    requiredElements: ["background", "problem", "objectives", "significance"],
    citationDensity: { min: 1.5, max: 5 },
  },
  methods: {
    label: "Methods",
    wordCountBounds: { min: 400, max: 1200 },
    requiredElements: ["procedure", "materials", "analysis", "validation"],
    citationDensity: { min: 0.3, max: 3 },
  },
  results: {
    label: "Results",
    wordCountBounds: { min: 400, max: 1200 },
    requiredElements: ["findings", "data", "statistics", "observations"],
    citationDensity: { min: 0, max: 2 },
  },
  discussion: {
    label: "Discussion",
    wordCountBounds: { min: 500, max: 1500 },
    requiredElements: ["interpretation", "implications", "limitations", "future"],
    citationDensity: { min: 1, max: 4 },
  },
};

export function getSectionProfile(sectionType: SectionType): SectionProfile {
  return SECTION_PROFILES[sectionType];
}
