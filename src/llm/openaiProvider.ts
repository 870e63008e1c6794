import OpenAI from "openai";
import { ZodError } from "zod";
import type { AppLogger } from "../logger/index.js";
import type { ProviderId } from "../report/schema.js";
import {
  chatCompletionsOf,
  chatJson,
  createOpenAICompatibleClient,
  type ChatCompletionCall,
  type OpenAICompatibleCredentials,
} from "./client.js";
import { FatalProviderError, ProviderError, TransientProviderError } from "./errors.js";
import { DraftOutputSchema, RevisionOutputSchema } from "./prompts.js";
import type { CallOptions, GenerateRequest, ReviseRequest, TextProvider } from "./types.js";

export type OpenAICompatibleProviderConfig = OpenAICompatibleCredentials & {
  id: ProviderId;
  maxTokens?: number;
};

export type OpenAICompatibleProviderDeps = {
  logger: AppLogger;
  /** Injected in tests; defaults to the SDK client for `cfg`. */
  complete?: ChatCompletionCall;
};

/**
 * Chat-completions backend. Both capabilities go through `chatJson` and
 * the JSON is validated before any text is handed back.
 */
export class OpenAICompatibleProvider implements TextProvider {
  readonly id: ProviderId;
  readonly deterministic = false;
  private readonly cfg: OpenAICompatibleProviderConfig;
  private readonly logger: AppLogger;
  private readonly complete: ChatCompletionCall;

  constructor(cfg: OpenAICompatibleProviderConfig, deps: OpenAICompatibleProviderDeps) {
    this.id = cfg.id;
    this.cfg = cfg;
    this.logger = deps.logger.child({ providerId: cfg.id });
    this.complete = deps.complete ?? chatCompletionsOf(createOpenAICompatibleClient(cfg));
  }

  async generate(request: GenerateRequest, options: CallOptions): Promise<string> {
    try {
      const { json } = await chatJson({
        logger: this.logger,
        complete: this.complete,
        model: this.cfg.model,
        messages: request.messages,
        temperature: 0.6,
        maxTokens: this.cfg.maxTokens,
        purpose: `generate.${request.sectionType}`,
        signal: options.signal,
      });
      return DraftOutputSchema.parse(json).draftText.trim();
    } catch (err) {
      throw classifyProviderError(this.id, err);
    }
  }

  async revise(request: ReviseRequest, options: CallOptions): Promise<string> {
    try {
      const { json } = await chatJson({
        logger: this.logger,
        complete: this.complete,
        model: this.cfg.model,
        messages: request.messages,
        temperature: 0.4,
        maxTokens: this.cfg.maxTokens,
        purpose: `revise.${request.sectionType}`,
        signal: options.signal,
      });
      return RevisionOutputSchema.parse(json).revisedText.trim();
    } catch (err) {
      throw classifyProviderError(this.id, err);
    }
  }
}

/**
 * Map SDK and parsing failures onto the transient/fatal split the
 * orchestrator retries on.
 */
export function classifyProviderError(providerId: ProviderId, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;

  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new TransientProviderError(providerId, "timeout", err.message, { cause: err });
  }
  if (err instanceof OpenAI.APIUserAbortError) {
    return new TransientProviderError(providerId, "timeout", "Request aborted", { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new TransientProviderError(providerId, "connection", err.message, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status ?? 0;
    if (status === 429) return new TransientProviderError(providerId, "rate_limit", err.message, { cause: err });
    if (status === 408 || status === 409 || status >= 500) {
      return new TransientProviderError(providerId, "server", err.message, { cause: err });
    }
    if (status === 401 || status === 403) {
      return new FatalProviderError(providerId, "auth", err.message, { cause: err });
    }
    return new FatalProviderError(providerId, "bad_request", err.message, { cause: err });
  }
  if (err instanceof SyntaxError || err instanceof ZodError) {
    return new TransientProviderError(providerId, "malformed_output", "Provider output did not match the expected JSON", {
      cause: err,
    });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new FatalProviderError(providerId, "unknown", message, { cause: err });
}
