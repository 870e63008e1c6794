import fs from "node:fs";
import { z } from "zod";
import { dataFilePath } from "../config/paths.js";
import { getLexicons, type Lexicons } from "../analysis/lexicons.js";
import { containsAny, countWords, escapeRegExp, splitParagraphs, splitSentences } from "../analysis/textUtils.js";
import type { DimensionName } from "../report/schema.js";
import type { GenerateRequest, ReviseRequest, TextProvider } from "./types.js";

export const RULE_BASED_PROVIDER_ID = "rule-based";

const SectionTemplatesSchema = z.object({
  abstract: z.string().min(1),
  introduction: z.string().min(1),
  methods: z.string().min(1),
  results: z.string().min(1),
  discussion: z.string().min(1),
});

export type SectionTemplates = z.infer<typeof SectionTemplatesSchema>;


export function loadSectionTemplates(): SectionTemplates {
  const raw: unknown = JSON.parse(fs.readFileSync(dataFilePath("section-templates.json"), "utf8"));
  return SectionTemplatesSchema.parse(raw);
}

const LONG_SENTENCE_WORDS = 30;
const PARAGRAPH_TRANSITIONS = ["Furthermore, ", "In addition, ", "Moreover, "];

/**
 * Dependency-free backend at the end of every provider chain.
 *
 * `generate` fills a per-section template; `revise` applies mechanical
 * rewrites for the dimensions the suggestions name. It never adds facts or
 * citations, so completeness and citation directives leave the text as is.
 */
export class RuleBasedProvider implements TextProvider {
  readonly id = RULE_BASED_PROVIDER_ID;
  readonly deterministic = true;
  private readonly templates: SectionTemplates;
  private readonly lex: Lexicons;

  constructor(opts: { templates?: SectionTemplates; lexicons?: Lexicons } = {}) {
    this.templates = opts.templates ?? loadSectionTemplates();
    this.lex = opts.lexicons ?? getLexicons();
  }

  async generate(request: GenerateRequest): Promise<string> {
    return fillTemplate(this.templates[request.sectionType], request.topic, request.keyPoints);
  }

  async revise(request: ReviseRequest): Promise<string> {
    const dims = new Set(request.suggestions.map((s) => s.dimension));
    const revised = applyRevisionRules(request.text, dims, this.lex);
    return revised.trim() ? revised : request.text;
  }
}

export function fillTemplate(template: string, topic: string, keyPoints: readonly string[]): string {
  const points = keyPoints.map((p) => p.trim().replace(/[.;]+$/g, "")).filter(Boolean);
  const keyPointSentence = points.length ? `Key considerations include ${joinList(points)}. ` : "";
  return template.replace(/\{topic\}/g, topic.trim()).replace(/\{keyPoints\}/g, keyPointSentence);
}

function joinList(items: string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}

export function applyRevisionRules(text: string, dims: ReadonlySet<DimensionName>, lex: Lexicons = getLexicons()): string {
  let out = text;
  if (dims.has("academicTone")) out = formalizeTone(out, lex);
  if (dims.has("clarity")) out = mapSentences(out, splitLongSentence);
  if (dims.has("coherence")) out = addTransitions(out, lex);
  return out;
}

const CONTRACTIONS: Array<[RegExp, string]> = [
  [/\bcan['’]t\b/gi, "cannot"],
  [/\bwon['’]t\b/gi, "will not"],
  [/\b([a-z]+)n['’]t\b/gi, "$1 not"],
  [/\b([a-z]+)['’]re\b/gi, "$1 are"],
  [/\b([a-z]+)['’]ve\b/gi, "$1 have"],
  [/\b([a-z]+)['’]ll\b/gi, "$1 will"],
  [/\bI['’]m\b/g, "I am"],
  [/\blet['’]s\b/gi, "let us"],
  [/\b(it|that|there|what|here)['’]s\b/gi, "$1 is"],
];

export function formalizeTone(text: string, lex: Lexicons): string {
  let out = text;
  for (const [re, replacement] of CONTRACTIONS) {
    out = out.replace(re, (match: string, ...groups: unknown[]) => {
      const word = typeof groups[0] === "string" ? groups[0] : "";
      return matchCase(match, replacement.replace("$1", word));
    });
  }
  out = replacePhrases(out, lex.casualReplacements);
  out = replacePhrases(out, lex.informalReplacements);
  out = out.replace(/!+(?=\s|$)/g, ".");
  return out.replace(/ {2,}/g, " ");
}

/**
 * Replacement keeps sentence-initial capitals and is lower-case elsewhere.
 * A phrase replaced by nothing hands its capital to the following word.
 */
function replacePhrases(text: string, table: Readonly<Record<string, string>>): string {
  let out = text;
  for (const [phrase, replacement] of Object.entries(table)) {
    const tail = /\s$/.test(phrase) ? "" : "\\b";
    const re = new RegExp(`\\b${escapeRegExp(phrase)}${tail}(\\s*)([A-Za-z]?)`, "gi");
    out = out.replace(re, (_m: string, gap: string, nextChar: string, offset: number, whole: string) => {
      const atSentenceStart = /(^|[.!?]\s+)$/.test(whole.slice(0, offset));
      if (!replacement) return atSentenceStart ? nextChar.toUpperCase() : nextChar;
      return (atSentenceStart ? capitalize(replacement) : replacement) + gap + nextChar;
    });
  }
  return out;
}

function matchCase(original: string, replacement: string): string {
  return /^[A-Z]/.test(original) ? capitalize(replacement) : replacement;
}

function capitalize(s: string): string {
  return s ? s[0].toUpperCase() + s.slice(1) : s;
}

function decapitalize(s: string): string {
  // keep acronyms and "I"
  if (s.length > 1 && /[A-Z]/.test(s[1])) return s;
  if (/^I\b/.test(s)) return s;
  return s ? s[0].toLowerCase() + s.slice(1) : s;
}

function mapSentences(text: string, fn: (sentence: string) => string): string {
  return splitParagraphs(text)
    .map((p) => splitSentences(p).map(fn).join(" "))
    .join("\n\n");
}

const SPLIT_POINTS: Array<{ marker: string; lead: string }> = [
  { marker: "; ", lead: "" },
  { marker: ", but ", lead: "However, " },
  { marker: ", and ", lead: "In addition, " },
  { marker: ", while ", lead: "Meanwhile, " },
];

/** Break one overlong sentence at the clause boundary nearest its middle. */
export function splitLongSentence(sentence: string): string {
  if (countWords(sentence) <= LONG_SENTENCE_WORDS) return sentence;

  const middle = sentence.length / 2;
  let best: { index: number; marker: string; lead: string } | undefined;
  for (const { marker, lead } of SPLIT_POINTS) {
    let from = 0;
    for (;;) {
      const index = sentence.indexOf(marker, from);
      if (index === -1) break;
      if (!best || Math.abs(index - middle) < Math.abs(best.index - middle)) best = { index, marker, lead };
      from = index + marker.length;
    }
  }
  if (!best) return sentence;

  const head = sentence.slice(0, best.index).trim();
  const rest = sentence.slice(best.index + best.marker.length).trim();
  if (countWords(head) < 5 || countWords(rest) < 5) return sentence;

  const second = best.lead ? best.lead + decapitalize(rest) : capitalize(rest);
  return `${head}. ${second}`;
}

/**
 * Open later paragraphs with a connective when they lack one; in a single
 * paragraph, every third sentence.
 */
export function addTransitions(text: string, lex: Lexicons): string {
  const paragraphs = splitParagraphs(text);
  let used = 0;
  const next = () => PARAGRAPH_TRANSITIONS[used++ % PARAGRAPH_TRANSITIONS.length];

  if (paragraphs.length >= 2) {
    return paragraphs
      .map((p, i) => {
        if (i === 0) return p;
        const sentences = splitSentences(p);
        if (!sentences.length || containsAny(sentences[0], lex.transitions)) return p;
        sentences[0] = next() + decapitalize(sentences[0]);
        return sentences.join(" ");
      })
      .join("\n\n");
  }

  const sentences = paragraphs.length ? splitSentences(paragraphs[0]) : [];
  return sentences
    .map((s, i) => (i % 3 === 2 && !containsAny(s, lex.transitions) ? next() + decapitalize(s) : s))
    .join(" ");
}
