import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/** Empty strings in `.env` mean "use the default". */
const blankAsUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const num = (def: number) => z.preprocess(blankAsUndefined, z.coerce.number().finite().default(def));
const int = (def: number) => z.preprocess(blankAsUndefined, z.coerce.number().int().default(def));
const str = (def: string) => z.preprocess(blankAsUndefined, z.string().trim().default(def));

const EnvSchema = z.object({
  PORT: int(8787).pipe(z.number().min(0).max(65535)),

  ENGINE_ACCEPTANCE_THRESHOLD: num(0.8).pipe(z.number().min(0).max(1)),
  ENGINE_MIN_DIMENSION_THRESHOLD: num(0.7).pipe(z.number().min(0).max(1)),
  ENGINE_MAX_ITERATIONS: int(3).pipe(z.number().min(1)),
  ENGINE_NO_IMPROVEMENT_EPSILON: num(0.01).pipe(z.number().min(0)),
  ENGINE_COMPLETENESS_TOLERANCE: num(0.5).pipe(z.number().min(0).max(1)),

  PROVIDER_ORDER: str("openai,gemini,rule-based"),
  PROVIDER_TIMEOUT_MS: int(30_000).pipe(z.number().positive()),
  PROVIDER_MAX_RETRIES: int(2).pipe(z.number().min(0)),
  PROVIDER_UNHEALTHY_AFTER: int(3).pipe(z.number().min(1)),
  PROVIDER_COOLDOWN_MS: int(60_000).pipe(z.number().min(0)),
  PROVIDER_BACKOFF_BASE_MS: int(500).pipe(z.number().min(0)),
  PROVIDER_BACKOFF_MAX_MS: int(8000).pipe(z.number().min(0)),

  OPENAI_API_KEY: str(""),
  OPENAI_BASE_URL: str("https://api.openai.com/v1").pipe(z.string().url()),
  OPENAI_MODEL: str("gpt-4o-mini"),

  GEMINI_API_KEY: str(""),
  GEMINI_BASE_URL: str("https://generativelanguage.googleapis.com/v1beta/openai").pipe(z.string().url()),
  GEMINI_MODEL: str("gemini-2.5-flash"),
});

export type CycleDefaults = {
  acceptanceThreshold: number;
  minDimensionThreshold: number;
  maxIterations: number;
  noImprovementEpsilon: number;
};

export type ChatProviderSettings = {
  apiKey: string;
  baseURL: string;
  model: string;
};

export type EngineConfig = {
  port: number;
  cycle: CycleDefaults;
  completenessTolerance: number;
  providers: {
    order: string[];
    timeoutMs: number;
    maxRetries: number;
    unhealthyAfter: number;
    cooldownMs: number;
    backoff: { baseDelayMs: number; maxDelayMs: number };
    openai: ChatProviderSettings;
    gemini: ChatProviderSettings;
  };
};

/**
 * Read the engine configuration from environment variables (after
 * `dotenv/config` has run in the entry point).
 */
export function loadEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`, { cause: parsed.error });
  }
  const e = parsed.data;

  const order = e.PROVIDER_ORDER.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (!order.length) throw new ConfigurationError("PROVIDER_ORDER names no providers");
  if (e.PROVIDER_BACKOFF_MAX_MS < e.PROVIDER_BACKOFF_BASE_MS) {
    throw new ConfigurationError("PROVIDER_BACKOFF_MAX_MS must not be below PROVIDER_BACKOFF_BASE_MS");
  }

  return {
    port: e.PORT,
    cycle: {
      acceptanceThreshold: e.ENGINE_ACCEPTANCE_THRESHOLD,
      minDimensionThreshold: e.ENGINE_MIN_DIMENSION_THRESHOLD,
      maxIterations: e.ENGINE_MAX_ITERATIONS,
      noImprovementEpsilon: e.ENGINE_NO_IMPROVEMENT_EPSILON,
    },
    completenessTolerance: e.ENGINE_COMPLETENESS_TOLERANCE,
    providers: {
      order,
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
      maxRetries: e.PROVIDER_MAX_RETRIES,
      unhealthyAfter: e.PROVIDER_UNHEALTHY_AFTER,
      cooldownMs: e.PROVIDER_COOLDOWN_MS,
      backoff: { baseDelayMs: e.PROVIDER_BACKOFF_BASE_MS, maxDelayMs: e.PROVIDER_BACKOFF_MAX_MS },
      openai: { apiKey: e.OPENAI_API_KEY, baseURL: e.OPENAI_BASE_URL, model: e.OPENAI_MODEL },
      gemini: { apiKey: e.GEMINI_API_KEY, baseURL: e.GEMINI_BASE_URL, model: e.GEMINI_MODEL },
    },
  };
}

/** Keys copied from `.env.example` without being filled in. */
export function isPlaceholderKey(key: string): boolean {
  const k = key.trim();
  return !k || /^your[_-].*[_-]here$/i.test(k);
}
