import type { SectionType } from "../content/sections.js";
import type { ProviderId, RevisionSuggestion } from "../report/schema.js";
import type { CancelledError, ProviderExhaustedError } from "./errors.js";

export type Capability = "generate" | "revise";

export const CAPABILITIES: readonly Capability[] = ["generate", "revise"];

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type GenerateRequest = {
  topic: string;
  sectionType: SectionType;
  keyPoints: string[];
  /** Ready-made prompt for chat backends; rule-based backends use the fields above. */
  messages: ChatMessage[];
};

export type ReviseRequest = {
  text: string;
  sectionType: SectionType;
  suggestions: RevisionSuggestion[];
  messages: ChatMessage[];
};

export type ProviderCall =
  | { capability: "generate"; request: GenerateRequest }
  | { capability: "revise"; request: ReviseRequest };

export type CallOptions = {
  signal?: AbortSignal;
};

/** A text generation backend. */
export interface TextProvider {
  readonly id: ProviderId;
  /** True only for dependency-free backends that cannot fail. */
  readonly deterministic: boolean;
  generate(request: GenerateRequest, options: CallOptions): Promise<string>;
  revise(request: ReviseRequest, options: CallOptions): Promise<string>;
}

export type ProviderRegistry = ReadonlyMap<ProviderId, TextProvider>;

export type ProviderEntry = {
  providerId: ProviderId;
  capabilities: Capability[];
  timeoutMs: number;
  /** Retries after the first attempt, transient failures only. */
  maxRetries: number;
};

/** Tried in order; the last entry must be a deterministic provider. */
export type ProviderConfig = ProviderEntry[];

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type ProviderOutput = {
  text: string;
  providerId: ProviderId;
};

export type InvokeError = ProviderExhaustedError | CancelledError;

export type InvokeResult = Result<ProviderOutput, InvokeError>;

export interface ProviderInvoker {
  invoke(call: ProviderCall, options?: CallOptions): Promise<InvokeResult>;
}
