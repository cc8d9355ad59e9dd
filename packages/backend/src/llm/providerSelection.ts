import { providerIds, type AppConfig, type ProviderId } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { ProviderCallLimiter } from "../services/ProviderCallLimiter.js";
import { logger, maskApiKey } from "../utils/logger.js";
import { AnthropicBackend } from "./AnthropicBackend.js";
import { OpenAICompatibleBackend } from "./OpenAICompatibleBackend.js";
import type { ModelBackend } from "./types.js";

export interface ProviderSelection {
  available: Set<ProviderId>;
  priorityOrder: ProviderId[];
  selected: ProviderId;
}

type ProviderConfigKeys = Pick<
  AppConfig,
  | "LLM_PROVIDER_PRIORITY"
  | "OPENAI_API_KEY"
  | "ANTHROPIC_API_KEY"
  | "GOOGLE_API_KEY"
  | "XAI_API_KEY"
>;

export function providerApiKey(config: ProviderConfigKeys, provider: ProviderId): string {
  switch (provider) {
    case "openai":
      return config.OPENAI_API_KEY.trim();
    case "anthropic":
      return config.ANTHROPIC_API_KEY.trim();
    case "gemini":
      return config.GOOGLE_API_KEY.trim();
    case "xai":
      return config.XAI_API_KEY.trim();
  }
}

/**
 * Resolves which providers have credentials and picks the first of them in
 * priority order. Providers missing from the priority list follow it in
 * their default order.
 */
export function resolveProviderSelection(config: ProviderConfigKeys): ProviderSelection {
  const available = new Set(providerIds.filter((provider) => providerApiKey(config, provider).length > 0));
  const priorityOrder = [...new Set([...config.LLM_PROVIDER_PRIORITY, ...providerIds])];
  const selected = priorityOrder.find((provider) => available.has(provider));

  if (!selected) {
    throw new ConfigurationError(
      "No language model credentials configured. Set one of OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_API_KEY or XAI_API_KEY."
    );
  }

  logger.info(
    {
      provider: selected,
      apiKey: maskApiKey(providerApiKey(config, selected)),
      available: [...available]
    },
    "Language model provider selected"
  );
  return { available, priorityOrder, selected };
}

export function createModelBackend(
  selection: ProviderSelection,
  config: AppConfig,
  deps?: { limiter?: ProviderCallLimiter }
): ModelBackend {
  const limiter =
    deps?.limiter ??
    new ProviderCallLimiter(selection.selected, {
      maxConcurrent: config.LLM_MAX_CONCURRENT,
      requestsPerMinute: config.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: config.LLM_TIMEOUT_MS
    });
  const generation = {
    maxTokens: config.LLM_MAX_TOKENS,
    temperature: config.LLM_TEMPERATURE
  };
  const apiKey = providerApiKey(config, selection.selected);

  switch (selection.selected) {
    case "anthropic":
      return new AnthropicBackend({ apiKey, model: config.ANTHROPIC_MODEL, ...generation }, { limiter });
    case "openai":
      return new OpenAICompatibleBackend(
        { provider: "openai", apiKey, baseURL: config.OPENAI_BASE_URL, model: config.OPENAI_MODEL, ...generation },
        { limiter }
      );
    case "gemini":
      return new OpenAICompatibleBackend(
        { provider: "gemini", apiKey, baseURL: config.GEMINI_BASE_URL, model: config.GEMINI_MODEL, ...generation },
        { limiter }
      );
    case "xai":
      return new OpenAICompatibleBackend(
        { provider: "xai", apiKey, baseURL: config.XAI_BASE_URL, model: config.GROK_MODEL, ...generation },
        { limiter }
      );
  }
}
