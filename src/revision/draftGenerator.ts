import { createContent, type Content } from "../content/content.js";
import type { SectionType } from "../content/sections.js";
import { buildDraftMessages } from "../llm/prompts.js";
import type { CallOptions, InvokeError, ProviderInvoker, Result } from "../llm/types.js";
import type { ProviderId } from "../report/schema.js";

export type DraftRequest = {
  topic: string;
  sectionType: SectionType;
  keyPoints?: string[];
};

export type Draft = {
  content: Content;
  providerId: ProviderId;
};

/** First draft of a section through the `generate` capability. */
export class DraftGenerator {
  private readonly orchestrator: ProviderInvoker;

  constructor(deps: { orchestrator: ProviderInvoker }) {
    this.orchestrator = deps.orchestrator;
  }

  async generate(request: DraftRequest, options: CallOptions = {}): Promise<Result<Draft, InvokeError>> {
    const keyPoints = request.keyPoints ?? [];
    const res = await this.orchestrator.invoke(
      {
        capability: "generate",
        request: {
          topic: request.topic,
          sectionType: request.sectionType,
          keyPoints,
          messages: buildDraftMessages({ topic: request.topic, sectionType: request.sectionType, keyPoints }),
        },
      },
      options
    );
    if (!res.ok) return res;
    return {
      ok: true,
      value: { content: createContent(res.value.text, request.sectionType), providerId: res.value.providerId },
    };
  }
}
