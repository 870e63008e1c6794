import { z } from "zod";
import { getSectionProfile, type SectionType } from "../content/sections.js";
import type { RevisionSuggestion } from "../report/schema.js";
import type { ChatMessage } from "./types.js";

export const RevisionOutputSchema = z.object({
  revisedText: z.string().min(1),
  changeRationale: z.array(z.string()).optional(),
});

export type RevisionOutput = z.infer<typeof RevisionOutputSchema>;

export const DraftOutputSchema = z.object({
  draftText: z.string().min(1),
});

export type DraftOutput = z.infer<typeof DraftOutputSchema>;

export type RevisionPromptInput = {
  text: string;
  sectionType: SectionType;
  suggestions: readonly RevisionSuggestion[];
};

export type DraftPromptInput = {
  topic: string;
  sectionType: SectionType;
  keyPoints: readonly string[];
};

/** What each section should accomplish when drafted from scratch. */
const SECTION_BRIEFS: Readonly<Record<SectionType, readonly string[]>> = {
  abstract: [
    "Provide context and motivation",
    "Summarise the key findings",
    "Highlight the methodological approach",
    "Identify gaps and future directions",
  ],
  introduction: [
    "Provide background and context",
    "Identify the research problem or gap",
    "State the purpose and objectives",
    "Outline the structure of the paper",
  ],
  methods: [
    "Describe the search strategy or procedure and inclusion criteria",
    "Explain data extraction and the analysis approach",
    "Detail the quality assessment or validation method",
    "Describe any statistical methods used",
  ],
  results: [
    "Summarise the main findings",
    "Present statistical information and trends",
    "Compare and contrast different approaches",
    "Highlight significant patterns and relationships",
  ],
  discussion: [
    "Interpret the findings",
    "Compare them with existing literature",
    "Discuss limitations and implications",
    "Suggest future research directions",
  ],
};

export function buildRevisionMessages(input: RevisionPromptInput): ChatMessage[] {
  const profile = getSectionProfile(input.sectionType);
  const { min, max } = profile.wordCountBounds;

  return [
    {
      role: "system",
      content: [
        "You are an experienced academic editor revising one section of a research paper.",
        "",
        "Rules:",
        "1) Do not invent facts, data, or references. Keep every existing citation marker (e.g. [1], (Author, 2020)) where it is.",
        "2) Keep technical terms, names, and numbers unchanged.",
        "3) Preserve the argument of the original; change how it is written, not what it claims.",
        `4) This is the ${profile.label} section. Aim for ${min}-${max} words and make sure it covers: ${profile.requiredElements.join(", ")}.`,
        "5) Apply every revision directive below in a single rewrite, most severe first.",
        "",
        "Output strict JSON with no extra text:",
        '{ "revisedText": "the full revised section", "changeRationale": ["what changed and why"] }',
      ].join("\n"),
    },
    {
      role: "user",
      content: JSON.stringify(
        {
          sectionType: input.sectionType,
          directives: input.suggestions.map((s) => ({
            dimension: s.dimension,
            severity: s.severity,
            directive: s.directive,
          })),
          text: input.text,
        },
        null,
        2
      ),
    },
  ];
}

export function buildDraftMessages(input: DraftPromptInput): ChatMessage[] {
  const profile = getSectionProfile(input.sectionType);
  const { min, max } = profile.wordCountBounds;
  const brief = SECTION_BRIEFS[input.sectionType].map((b, i) => `${i + 1}. ${b}`);

  return [
    {
      role: "system",
      content: [
        `You write the ${profile.label} section of academic papers in a formal, objective register.`,
        "",
        "The section should:",
        ...brief,
        `${brief.length + 1}. Be ${min}-${max} words long`,
        "",
        "Do not fabricate references; leave citation placeholders such as [1] only where a source is clearly needed.",
        "",
        "Output strict JSON with no extra text:",
        '{ "draftText": "the full section" }',
      ].join("\n"),
    },
    {
      role: "user",
      content: JSON.stringify({ topic: input.topic, keyPoints: input.keyPoints }, null, 2),
    },
  ];
}
