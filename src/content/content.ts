import { SECTION_PROFILES, SectionTypeSchema, type SectionType, type WordCountBounds } from "./sections.js";

/**
 * A section of text as handed to the engine. Frozen on creation: revisions
 * produce new values instead of editing this one.
 */
export type Content = {
  readonly text: string;
  readonly sectionType: SectionType;
  readonly wordCountBounds: WordCountBounds;
};

export function createContent(text: string, sectionType: SectionType): Content {
  const type = SectionTypeSchema.parse(sectionType);
  return Object.freeze({
    text,
    sectionType: type,
    wordCountBounds: SECTION_PROFILES[type].wordCountBounds,
  });
}

/** Same section, new text. */
export function withText(content: Content, text: string): Content {
  return createContent(text, content.sectionType);
}
