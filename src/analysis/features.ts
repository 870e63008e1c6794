import { casualFirstPersonTerms, getLexicons, informalTerms } from "./lexicons.js";
import {
  clamp,
  containsAny,
  countOccurrences,
  countWords,
  jaccard,
  mean,
  splitParagraphs,
  splitSentences,
  tokenizeWords,
} from "./textUtils.js";

export type TextFeatures = {
  wordCount: number;
  sentenceCount: number;
  paragraphCount: number;
  /** Words per sentence. */
  avgSentenceLength: number;

  /** Commas, semicolons, colons and subordinating words. */
  clauseMarkerCount: number;
  /** Share of alphabetic tokens with 13 or more letters. */
  longWordRatio: number;

  sentencesWithTransition: number;
  /** Paragraphs, or sentences when the text is a single paragraph. */
  continuityUnitCount: number;
  /** Mean content-word Jaccard overlap between adjacent continuity units. */
  adjacentOverlap: number;

  contractionCount: number;
  informalCount: number;
  casualFirstPersonCount: number;
  exclamationCount: number;
  hedgingCount: number;
  academicTermCount: number;

  numericCitationCount: number;
  authorYearCitationCount: number;
  citationMarkerCount: number;
};

const CONTRACTION_RE = /\b[a-z]+(?:n['’]t|['’](?:re|ve|ll|m|d))\b|\b(?:it|that|there|what|here|let)['’]s\b/gi;
const NUMERIC_CITATION_RE = /\[\d+(?:\s*[-–,]\s*\d+)*\]/g;
const PARENTHETICAL_CITATION_RE = /\([A-Z][^()]{0,60}?,\s*\d{4}[a-z]?\)/g;
const NARRATIVE_CITATION_RE = /\b[A-Z][a-z]+(?: et al\.)? \(\d{4}[a-z]?\)/g;

function contentWords(text: string, stopwords: Set<string>): Set<string> {
  return new Set(tokenizeWords(text).filter((t) => t.length > 2 && !stopwords.has(t)));
}

/**
 * Extract surface statistics for one section of text.
 *
 * Everything here is a pure function of the input string so repeated
 * assessment of the same text always agrees.
 */
export function extractFeatures(input: string): TextFeatures {
  const text = input ?? "";
  const lex = getLexicons();

  const sentences = splitSentences(text);
  const paragraphs = splitParagraphs(text);
  const wordCount = countWords(text);
  const sentenceCount = sentences.length;

  const tokens = tokenizeWords(text);
  const longWords = tokens.filter((t) => t.replace(/['’]/g, "").length >= 13).length;
  const longWordRatio = tokens.length ? clamp(longWords / tokens.length, 0, 1) : 0;

  const punctuationClauses = (text.match(/[,;:]/g) ?? []).length;
  const { count: subordinatorCount } = countOccurrences(text, lex.subordinators);

  const sentencesWithTransition = sentences.filter((s) => containsAny(s, lex.transitions)).length;

  const stopwords = new Set(lex.stopwords);
  const units = paragraphs.length >= 2 ? paragraphs : sentences;
  const unitWords = units.map((u) => contentWords(u, stopwords));
  const overlaps: number[] = [];
  for (let i = 1; i < unitWords.length; i += 1) {
    overlaps.push(jaccard(unitWords[i - 1], unitWords[i]));
  }

  const { count: informalCount } = countOccurrences(text, informalTerms(lex));
  const { count: casualFirstPersonCount } = countOccurrences(text, casualFirstPersonTerms(lex));
  const { count: hedgingCount } = countOccurrences(text, lex.hedgingMarkers);
  const { count: academicTermCount } = countOccurrences(text, lex.academicVocabulary);

  const numericCitationCount = (text.match(NUMERIC_CITATION_RE) ?? []).length;
  const authorYearCitationCount =
    (text.match(PARENTHETICAL_CITATION_RE) ?? []).length + (text.match(NARRATIVE_CITATION_RE) ?? []).length;

  return {
    wordCount,
    sentenceCount,
    paragraphCount: paragraphs.length,
    avgSentenceLength: sentenceCount ? wordCount / sentenceCount : 0,

    clauseMarkerCount: punctuationClauses + subordinatorCount,
    longWordRatio,

    sentencesWithTransition,
    continuityUnitCount: units.length,
    adjacentOverlap: mean(overlaps),

    contractionCount: (text.match(CONTRACTION_RE) ?? []).length,
    informalCount,
    casualFirstPersonCount,
    exclamationCount: (text.match(/!/g) ?? []).length,
    hedgingCount,
    academicTermCount,

    numericCitationCount,
    authorYearCitationCount,
    citationMarkerCount: numericCitationCount + authorYearCitationCount,
  };
}
