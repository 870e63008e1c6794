export function normalizeText(input: string): string {
  return input.replace(/\r\n/g, "\n").replace(/[ \t]+/g, " ").trim();
}

/** Paragraphs are separated by one or more blank lines. */
export function splitParagraphs(input: string): string[] {
  const text = normalizeText(input);
  if (!text) return [];
  return text
    .split(/\n\s*\n/g)
    .map((p) => p.replace(/\s*\n\s*/g, " ").trim())
    .filter(Boolean);
}

/**
 * Sentence splitting on terminal punctuation followed by a capitalised
 * word, so "e.g. the" and "et al., 2020" stay inside one sentence.
 */
export function splitSentences(input: string): string[] {
  const text = normalizeText(input).replace(/\s*\n\s*/g, " ");
  if (!text) return [];
  return text
    .split(/(?<=[.!?])\s+(?=["'(\[]?[A-Z])/g)
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Whitespace-delimited word count, the measure section bounds are expressed in. */
export function countWords(input: string): number {
  const text = normalizeText(input);
  if (!text) return 0;
  return text.split(/\s+/g).length;
}

/** Lower-cased alphabetic tokens (apostrophes kept inside words). */
export function tokenizeWords(input: string): string[] {
  return input.toLowerCase().match(/[a-z]+(?:['’][a-z]+)*/g) ?? [];
}

export function countOccurrences(text: string, needles: readonly string[]): { count: number; hits: string[] } {
  let count = 0;
  const hits: string[] = [];
  for (const n of needles) {
    const needle = n.trim();
    if (!needle) continue;
    const re = new RegExp(`\\b${escapeRegExp(needle)}\\b`, "gi");
    const m = text.match(re);
    if (m?.length) {
      count += m.length;
      hits.push(needle);
    }
  }
  return { count, hits: unique(hits) };
}

export function containsAny(text: string, needles: readonly string[]): boolean {
  return countOccurrences(text, needles).count > 0;
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function unique<T>(arr: T[]): T[] {
  return Array.from(new Set(arr));
}

export function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

export function mean(xs: number[]): number {
  if (!xs.length) return 0;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

export function jaccard(a: Set<string>, b: Set<string>): number {
  if (!a.size || !b.size) return 0;
  let inter = 0;
  for (const x of a) if (b.has(x)) inter += 1;
  const union = a.size + b.size - inter;
  return union ? inter / union : 0;
}

/** Hermite smoothstep on [0, 1]; used to soften score edges. */
export function smoothstep(t: number): number {
  const x = clamp(t, 0, 1);
  return x * x * (3 - 2 * x);
}
