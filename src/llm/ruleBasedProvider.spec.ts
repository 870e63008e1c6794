import { describe, it, expect } from "vitest";
import { getLexicons } from "../analysis/lexicons.js";
import type { RevisionSuggestion } from "../report/schema.js";
import {
  addTransitions,
  fillTemplate,
  formalizeTone,
  RuleBasedProvider,
  splitLongSentence,
  type SectionTemplates,
} from "./ruleBasedProvider.js";

const lex = getLexicons();

const TEMPLATES: SectionTemplates = {
  abstract: "Abstract on {topic}. {keyPoints}End.",
  introduction: "Introduction to {topic}. {keyPoints}End.",
  methods: "Methods for {topic}. {keyPoints}End.",
  results: "Results on {topic}. {keyPoints}End.",
  discussion: "Discussion of {topic}. {keyPoints}End.",
};

function suggestion(dimension: RevisionSuggestion["dimension"]): RevisionSuggestion {
  return { dimension, severity: "high", directive: "fix it", rationale: "low score" };
}

const LONG_SENTENCE =
  "The first group of participants completed every task within the allotted time and reported high satisfaction with the interface, but the second group struggled with the navigation menu and abandoned several tasks before the end.";

describe("fillTemplate", () => {
  it("inserts the topic and a key-point sentence", () => {
    expect(fillTemplate("About {topic}. {keyPoints}End.", " caching ", ["locality.", "eviction", ""])).toBe(
      "About caching. Key considerations include locality and eviction. End."
    );
  });

  it("drops the key-point sentence when there are none", () => {
    expect(fillTemplate("About {topic}. {keyPoints}End.", "caching", [])).toBe("About caching. End.");
  });
});

describe("formalizeTone", () => {
  it("expands contractions and rewrites casual phrasing", () => {
    expect(formalizeTone("I think it's really good! We can't stop.", lex)).toBe(
      "It appears that it is good. We cannot stop."
    );
  });

  it("capitalises the next word when a sentence opener is removed", () => {
    expect(formalizeTone("In my opinion, the method works.", lex)).toBe("The method works.");
  });
});

describe("splitLongSentence", () => {
  it("splits at the clause boundary nearest the middle", () => {
    expect(splitLongSentence(LONG_SENTENCE)).toBe(
      "The first group of participants completed every task within the allotted time and reported high satisfaction with the interface. However, the second group struggled with the navigation menu and abandoned several tasks before the end."
    );
  });

  it("leaves short sentences alone", () => {
    expect(splitLongSentence("Short, but fine.")).toBe("Short, but fine.");
  });
});

describe("addTransitions", () => {
  it("opens later paragraphs with a connective unless they have one", () => {
    expect(addTransitions("Caching reduces latency.\n\nEviction policies matter.\n\nHowever, cost rises.", lex)).toBe(
      "Caching reduces latency.\n\nFurthermore, eviction policies matter.\n\nHowever, cost rises."
    );
  });
});

describe("RuleBasedProvider", () => {
  const provider = new RuleBasedProvider({ templates: TEMPLATES, lexicons: lex });

  it("is the deterministic fallback", () => {
    expect(provider.id).toBe("rule-based");
    expect(provider.deterministic).toBe(true);
  });

  it("drafts from the section template", async () => {
    const text = await provider.generate({
      topic: "edge caching",
      sectionType: "methods",
      keyPoints: ["request traces"],
      messages: [],
    });
    expect(text).toBe("Methods for edge caching. Key considerations include request traces. End.");
  });

  it("only rewrites for the dimensions it can fix", async () => {
    const text = "We can't stop.";
    const request = { text, sectionType: "results" as const, messages: [] };
    expect(await provider.revise({ ...request, suggestions: [suggestion("completeness")] })).toBe(text);
    expect(await provider.revise({ ...request, suggestions: [suggestion("academicTone")] })).toBe("We cannot stop.");
  });

  it("hands the input back when a rewrite would leave nothing", async () => {
    const request = { sectionType: "abstract" as const, messages: [], suggestions: [suggestion("academicTone")] };
    expect(await provider.revise({ ...request, text: "very " })).toBe("very ");
    expect(await provider.revise({ ...request, text: "" })).toBe("");
  });

  it("loads the bundled templates by default", async () => {
    const text = await new RuleBasedProvider().generate({
      topic: "edge caching",
      sectionType: "methods",
      keyPoints: [],
      messages: [],
    });
    expect(text).toMatch(/^This study followed a systematic procedure to examine edge caching\./);
  });
});
