import type { Content } from "../content/content.js";
import { buildRevisionMessages } from "../llm/prompts.js";
import type { CallOptions, InvokeResult, ProviderInvoker } from "../llm/types.js";
import type { RevisionSuggestion } from "../report/schema.js";

/**
 * Applies one batch of directives per call. The content is never modified;
 * the caller wraps the returned text in a new `Content`.
 */
export class Reviser {
  private readonly orchestrator: ProviderInvoker;

  constructor(deps: { orchestrator: ProviderInvoker }) {
    this.orchestrator = deps.orchestrator;
  }

  async revise(
    content: Content,
    suggestions: readonly RevisionSuggestion[],
    options: CallOptions = {}
  ): Promise<InvokeResult> {
    const batch = [...suggestions];
    return this.orchestrator.invoke(
      {
        capability: "revise",
        request: {
          text: content.text,
          sectionType: content.sectionType,
          suggestions: batch,
          messages: buildRevisionMessages({ text: content.text, sectionType: content.sectionType, suggestions: batch }),
        },
      },
      options
    );
  }
}
