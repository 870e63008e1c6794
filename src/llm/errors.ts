import type { ProviderId } from "../report/schema.js";
import type { Capability } from "./types.js";

export type ProviderFailureKind =
  | "timeout"
  | "rate_limit"
  | "server"
  | "connection"
  | "malformed_output"
  | "auth"
  | "bad_request"
  | "unknown";

export abstract class ProviderError extends Error {
  abstract readonly code: string;
  readonly providerId: ProviderId;
  readonly kind: ProviderFailureKind;

  constructor(providerId: ProviderId, kind: ProviderFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.providerId = providerId;
    this.kind = kind;
  }
}

/** Timeouts, rate limits, 5xx: worth retrying after a pause. */
export class TransientProviderError extends ProviderError {
  readonly code = "TRANSIENT_PROVIDER_ERROR";

  constructor(providerId: ProviderId, kind: ProviderFailureKind, message: string, options?: { cause?: unknown }) {
    super(providerId, kind, message, options);
    this.name = "TransientProviderError";
  }
}

/** Auth failures, rejected requests: move on to the next provider immediately. */
export class FatalProviderError extends ProviderError {
  readonly code = "FATAL_PROVIDER_ERROR";

  constructor(providerId: ProviderId, kind: ProviderFailureKind, message: string, options?: { cause?: unknown }) {
    super(providerId, kind, message, options);
    this.name = "FatalProviderError";
  }
}

export type AttemptFailure = {
  providerId: ProviderId;
  kind: ProviderFailureKind | "skipped";
  message: string;
};

/** Every configured provider, the deterministic one included, failed. */
export class ProviderExhaustedError extends Error {
  readonly code = "PROVIDER_EXHAUSTED";
  readonly capability: Capability;
  readonly failures: readonly AttemptFailure[];

  constructor(capability: Capability, failures: AttemptFailure[]) {
    super(`All providers failed for capability "${capability}" (${failures.length} failed attempts)`);
    this.name = "ProviderExhaustedError";
    this.capability = capability;
    this.failures = Object.freeze([...failures]);
  }
}

export class CancelledError extends Error {
  readonly code = "CANCELLED";

  constructor(message = "Operation cancelled", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CancelledError";
  }
}

/** Anything a provider throws that is not already classified counts as fatal. */
export function toProviderError(providerId: ProviderId, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new FatalProviderError(providerId, "unknown", message, { cause: err });
}
