import { isPlaceholderKey, type ChatProviderSettings, type EngineConfig } from "../config/env.js";
import { ConfigurationError } from "../config/errors.js";
import type { AppLogger } from "../logger/index.js";
import { OpenAICompatibleProvider } from "./openaiProvider.js";
import { RULE_BASED_PROVIDER_ID, RuleBasedProvider } from "./ruleBasedProvider.js";
import { CAPABILITIES, type ProviderConfig, type ProviderRegistry, type TextProvider } from "./types.js";

const CHAT_PROVIDERS = ["openai", "gemini"] as const;

/**
 * Providers that can actually be called. Chat backends without a real API
 * key are left out, so a fresh checkout runs on the rule-based provider.
 */
export function createProviderRegistry(config: EngineConfig, logger: AppLogger): ProviderRegistry {
  const registry = new Map<string, TextProvider>();

  for (const id of CHAT_PROVIDERS) {
    const settings: ChatProviderSettings = config.providers[id];
    if (isPlaceholderKey(settings.apiKey)) {
      logger.info("Provider not configured; skipping", { providerId: id });
      continue;
    }
    registry.set(id, new OpenAICompatibleProvider({ id, ...settings }, { logger }));
  }
  registry.set(RULE_BASED_PROVIDER_ID, new RuleBasedProvider());
  return registry;
}

/** `PROVIDER_ORDER` narrowed to the registered providers. */
export function buildProviderConfig(config: EngineConfig, registry: ProviderRegistry): ProviderConfig {
  const order = config.providers.order.filter((id) => registry.has(id));
  if (order[order.length - 1] !== RULE_BASED_PROVIDER_ID) {
    throw new ConfigurationError(`PROVIDER_ORDER must end with "${RULE_BASED_PROVIDER_ID}"`);
  }

  return order.map((providerId) =>
    providerId === RULE_BASED_PROVIDER_ID
      ? { providerId, capabilities: [...CAPABILITIES], timeoutMs: config.providers.timeoutMs, maxRetries: 0 }
      : {
          providerId,
          capabilities: [...CAPABILITIES],
          timeoutMs: config.providers.timeoutMs,
          maxRetries: config.providers.maxRetries,
        }
  );
}
