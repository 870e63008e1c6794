import OpenAI from "openai";
import type { AppLogger } from "../logger/index.js";
import type { ChatMessage } from "./types.js";

export type OpenAICompatibleCredentials = {
  apiKey: string;
  baseURL: string;
  model: string;
};

/** The slice of a chat completion this project reads. */
export type ChatCompletionResult = {
  choices: Array<{ message?: { content?: string | null } }>;
  usage?: unknown;
};

export type ChatCompletionCall = (
  body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
  options: { signal?: AbortSignal }
) => Promise<ChatCompletionResult>;

/**
 * OpenAI SDK client for any OpenAI-compatible endpoint (OpenAI itself,
 * Gemini's compatibility layer, self-hosted gateways).
 *
 * SDK-level retries are off: the orchestrator owns retry and fallback.
 */
export function createOpenAICompatibleClient(cfg: OpenAICompatibleCredentials): OpenAI {
  return new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL.replace(/\/+$/, ""), maxRetries: 0 });
}

export function chatCompletionsOf(client: OpenAI): ChatCompletionCall {
  return (body, options) => client.chat.completions.create(body, options);
}

export type ChatJsonOptions = {
  logger: AppLogger;
  complete: ChatCompletionCall;
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Log tag only, e.g. `revise.section`; the prompt body is never logged. */
  purpose: string;
  signal?: AbortSignal;
};

/**
 * Chat completion that should come back as a JSON object.
 *
 * `response_format: json_object` is tried first; endpoints that reject it
 * with a 400 get a second plain request, and the outermost `{...}` is cut
 * out of whatever text comes back.
 */
export async function chatJson(opts: ChatJsonOptions): Promise<{ rawText: string; json: unknown }> {
  const t0 = Date.now();
  const log = opts.logger;

  const basePayload: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
    model: opts.model,
    messages: opts.messages.map(toMessageParam),
    temperature: opts.temperature ?? 0.2,
    max_tokens: opts.maxTokens,
  };

  try {
    const resp = await opts.complete(
      { ...basePayload, response_format: { type: "json_object" } },
      { signal: opts.signal }
    );
    const rawText = resp.choices[0]?.message?.content ?? "";
    const json = safeParseJson(rawText);
    log.debug("LLM chatJson ok", { purpose: opts.purpose, ms: Date.now() - t0, usage: resp.usage });
    return { rawText, json };
  } catch (err) {
    if (!(err instanceof OpenAI.BadRequestError)) throw err;
    log.warn("LLM chatJson response_format rejected; retrying without it", {
      purpose: opts.purpose,
      ms: Date.now() - t0,
      error: { name: err.name, message: err.message },
    });
  }

  const resp2 = await opts.complete(basePayload, { signal: opts.signal });
  const rawText2 = resp2.choices[0]?.message?.content ?? "";
  const json2 = safeParseJson(rawText2);
  log.debug("LLM chatJson ok (fallback)", { purpose: opts.purpose, ms: Date.now() - t0, usage: resp2.usage });
  return { rawText: rawText2, json: json2 };
}

function toMessageParam(m: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "user":
      return { role: "user", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
  }
}

export function safeParseJson(raw: string): unknown {
  const trimmed = raw
    .replace(/```json\n?/g, "")
    .replace(/```\n?/g, "")
    .trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    return JSON.parse(extractFirstJsonObject(trimmed));
  }
}

function extractFirstJsonObject(text: string): string {
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first === -1 || last === -1 || last <= first) {
    throw new SyntaxError("LLM output is not valid JSON");
  }
  return text.slice(first, last + 1);
}
