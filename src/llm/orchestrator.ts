import { setTimeout as delay } from "node:timers/promises";
import { ConfigurationError } from "../config/errors.js";
import type { AppLogger } from "../logger/index.js";
import type { EngineEventSink, ProviderAttemptOutcome } from "../observability/events.js";
import {
  CancelledError,
  ProviderExhaustedError,
  TransientProviderError,
  toProviderError,
  type AttemptFailure,
} from "./errors.js";
import { ProviderHealthTable } from "./health.js";
import {
  CAPABILITIES,
  type CallOptions,
  type Capability,
  type InvokeResult,
  type ProviderCall,
  type ProviderConfig,
  type ProviderEntry,
  type ProviderInvoker,
  type ProviderRegistry,
  type TextProvider,
} from "./types.js";

export type BackoffOptions = {
  baseDelayMs: number;
  maxDelayMs: number;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type ProviderOrchestratorOptions = {
  entries: ProviderConfig;
  registry: ProviderRegistry;
  logger: AppLogger;
  events?: EngineEventSink;
  /** Shared table; a fresh one is created when omitted. */
  health?: ProviderHealthTable;
  healthOptions?: { unhealthyAfter: number; cooldownMs: number };
  backoff?: BackoffOptions;
  sleep?: Sleep;
  now?: () => number;
};

type ChainLink = {
  entry: ProviderEntry;
  provider: TextProvider;
};

const DEFAULT_BACKOFF: BackoffOptions = { baseDelayMs: 500, maxDelayMs: 8000 };

const defaultSleep: Sleep = async (ms, signal) => {
  if (ms <= 0) return;
  await delay(ms, undefined, { signal });
};

/**
 * Ordered provider fallback with retries, per-call timeouts and a health
 * table.
 *
 * Chain rules (checked in the constructor):
 * - every entry names a registered provider, at most once;
 * - the last link is a deterministic provider serving every capability;
 * - retries are non-negative integers and timeouts positive.
 *
 * Per call:
 * - entries without the requested capability are skipped, as are entries
 *   the shared health table has benched (never the last link);
 * - a transient failure (rate limit, 5xx, timeout, empty output) is retried
 *   up to `maxRetries` times with capped exponential backoff; a fatal one
 *   moves straight to the next entry;
 * - the caller's signal aborts the in-flight attempt and any backoff wait,
 *   and the call returns `CancelledError` without touching later entries.
 *
 * Failures never throw out of `invoke`: the outcome is a `Result`, and
 * `ProviderExhaustedError` carries one line per failed or skipped attempt.
 * Every attempt is reported as a `provider.attempt` event.
 */
export class ProviderOrchestrator implements ProviderInvoker {
  readonly health: ProviderHealthTable;
  private readonly chain: ChainLink[];
  private readonly logger: AppLogger;
  private readonly events?: EngineEventSink;
  private readonly backoff: BackoffOptions;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(opts: ProviderOrchestratorOptions) {
    this.chain = resolveChain(opts.entries, opts.registry);
    this.logger = opts.logger;
    this.events = opts.events;
    this.backoff = opts.backoff ?? DEFAULT_BACKOFF;
    this.sleep = opts.sleep ?? defaultSleep;
    this.now = opts.now ?? Date.now;
    this.health =
      opts.health ??
      new ProviderHealthTable({
        unhealthyAfter: opts.healthOptions?.unhealthyAfter ?? 3,
        cooldownMs: opts.healthOptions?.cooldownMs ?? 60_000,
        now: this.now,
      });
  }

  get providerIds(): string[] {
    return this.chain.map((l) => l.entry.providerId);
  }

  async invoke(call: ProviderCall, options: CallOptions = {}): Promise<InvokeResult> {
    const { signal } = options;
    const failures: AttemptFailure[] = [];
    const lastIndex = this.chain.length - 1;

    for (const [index, { entry, provider }] of this.chain.entries()) {
      const providerId = entry.providerId;

      if (!entry.capabilities.includes(call.capability)) {
        this.emit(providerId, call.capability, 0, "skipped-capability", 0);
        failures.push({ providerId, kind: "skipped", message: `does not serve ${call.capability}` });
        continue;
      }
      // the fallback is never benched
      if (index !== lastIndex && !this.health.isAvailable(providerId)) {
        this.emit(providerId, call.capability, 0, "skipped-unhealthy", 0);
        failures.push({ providerId, kind: "skipped", message: "cooling down after repeated fatal failures" });
        continue;
      }

      for (let attempt = 1; attempt <= entry.maxRetries + 1; attempt += 1) {
        if (signal?.aborted) return this.cancelled(providerId, call.capability, attempt);

        const startedAt = this.now();
        try {
          const text = await this.attempt(provider, entry, call, signal, index === lastIndex);
          this.health.recordSuccess(providerId);
          this.emit(providerId, call.capability, attempt, "success", this.now() - startedAt);
          return { ok: true, value: { text, providerId } };
        } catch (err) {
          const latencyMs = this.now() - startedAt;
          if (err instanceof CancelledError) {
            this.emit(providerId, call.capability, attempt, "cancelled", latencyMs);
            return { ok: false, error: err };
          }

          const failure = toProviderError(providerId, err);
          failures.push({ providerId, kind: failure.kind, message: failure.message });

          if (failure instanceof TransientProviderError) {
            this.emit(providerId, call.capability, attempt, "transient", latencyMs, failure.kind);
            if (attempt <= entry.maxRetries) {
              try {
                await this.sleep(this.backoffDelay(attempt), signal);
              } catch (sleepErr) {
                if (signal?.aborted) return this.cancelled(providerId, call.capability, attempt);
                throw sleepErr;
              }
            }
            continue;
          }

          this.emit(providerId, call.capability, attempt, "fatal", latencyMs, failure.kind);
          if (this.health.recordFatal(providerId)) {
            this.logger.warn("Provider marked unavailable", { providerId, kind: failure.kind });
          }
          break;
        }
      }
    }

    const error = new ProviderExhaustedError(call.capability, failures);
    this.logger.error("All providers failed", {
      capability: call.capability,
      failures: failures.map((f) => ({ providerId: f.providerId, kind: f.kind })),
    });
    return { ok: false, error };
  }

  backoffDelay(attempt: number): number {
    return Math.min(this.backoff.maxDelayMs, this.backoff.baseDelayMs * 2 ** (attempt - 1));
  }

  /**
   * One provider call bounded by the entry's timeout. A timeout aborts the
   * call with a transient error; the caller's signal aborts it with
   * `CancelledError`.
   */
  private async attempt(
    provider: TextProvider,
    entry: ProviderEntry,
    call: ProviderCall,
    signal: AbortSignal | undefined,
    isFallback: boolean
  ): Promise<string> {
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(new CancelledError());
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const timer = setTimeout(() => {
      controller.abort(
        new TransientProviderError(provider.id, "timeout", `No response within ${entry.timeoutMs}ms`)
      );
    }, entry.timeoutMs);

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });

    try {
      const work =
        call.capability === "generate"
          ? provider.generate(call.request, { signal: controller.signal })
          : provider.revise(call.request, { signal: controller.signal });
      const text = await Promise.race([work, aborted]);
      // empty text in gives empty text out; the fallback's answer stands
      if (!text.trim() && !isFallback) {
        throw new TransientProviderError(provider.id, "malformed_output", "Provider returned empty text");
      }
      return text;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private cancelled(providerId: string, capability: Capability, attempt: number): InvokeResult {
    this.emit(providerId, capability, attempt, "cancelled", 0);
    return { ok: false, error: new CancelledError() };
  }

  private emit(
    providerId: string,
    capability: Capability,
    attempt: number,
    outcome: ProviderAttemptOutcome,
    latencyMs: number,
    errorKind?: string
  ): void {
    this.events?.emit({ type: "provider.attempt", providerId, capability, attempt, outcome, latencyMs, errorKind });
  }
}

function resolveChain(entries: ProviderConfig, registry: ProviderRegistry): ChainLink[] {
  if (!entries.length) throw new ConfigurationError("Provider list is empty");

  const seen = new Set<string>();
  const chain = entries.map((entry) => {
    if (seen.has(entry.providerId)) {
      throw new ConfigurationError(`Provider "${entry.providerId}" is listed more than once`);
    }
    seen.add(entry.providerId);

    const provider = registry.get(entry.providerId);
    if (!provider) throw new ConfigurationError(`Provider "${entry.providerId}" is not registered`);
    if (!Number.isInteger(entry.maxRetries) || entry.maxRetries < 0) {
      throw new ConfigurationError(`maxRetries for "${entry.providerId}" must be a non-negative integer`);
    }
    if (!Number.isFinite(entry.timeoutMs) || entry.timeoutMs <= 0) {
      throw new ConfigurationError(`timeoutMs for "${entry.providerId}" must be positive`);
    }
    return { entry: { ...entry, capabilities: [...entry.capabilities] }, provider };
  });

  const last = chain[chain.length - 1];
  if (!last.provider.deterministic) {
    throw new ConfigurationError(
      `The last provider must be a deterministic fallback; "${last.entry.providerId}" is not`
    );
  }
  for (const c of CAPABILITIES) {
    if (!last.entry.capabilities.includes(c)) {
      throw new ConfigurationError(`The deterministic fallback must serve "${c}"`);
    }
  }
  return chain;
}
