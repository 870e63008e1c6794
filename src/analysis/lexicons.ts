import fs from "node:fs";
import { z } from "zod";
import { dataFilePath } from "../config/paths.js";

const LexiconsSchema = z.object({
  transitions: z.array(z.string().min(1)),
  subordinators: z.array(z.string().min(1)),
  informalReplacements: z.record(z.string()),
  casualReplacements: z.record(z.string()),
  hedgingMarkers: z.array(z.string().min(1)),
  academicVocabulary: z.array(z.string().min(1)),
  stopwords: z.array(z.string().min(1)),
});

export type Lexicons = z.infer<typeof LexiconsSchema>;


let cached: Lexicons | undefined;

/**
 * Word lists shared by feature extraction and the rule-based rewriter.
 * Read once from `data/lexicons.json`.
 */
export function getLexicons(): Lexicons {
  if (!cached) {
    const raw: unknown = JSON.parse(fs.readFileSync(dataFilePath("lexicons.json"), "utf8"));
    cached = LexiconsSchema.parse(raw);
  }
  return cached;
}

export function informalTerms(lex: Lexicons = getLexicons()): string[] {
  return Object.keys(lex.informalReplacements).map((k) => k.trim());
}

export function casualFirstPersonTerms(lex: Lexicons = getLexicons()): string[] {
  return Object.keys(lex.casualReplacements).map((k) => k.replace(/[,\s]+$/g, ""));
}
