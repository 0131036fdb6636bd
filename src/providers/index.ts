/**
 * Provider registry.
 *
 * Maps the configured `provider` name onto a backend. Names are matched
 * case-insensitively; anything unknown resolves to the local Ollama
 * backend. Building a provider does no I/O.
 *
 * Usage:
 *   import { selectProvider } from "../providers/index.js";
 *   const provider = selectProvider(config.snapshot());
 *   const result = await provider.generateCommand("list files");
 */
export { OllamaProvider } from "./ollama-provider.js";
export { OpenAIProvider } from "./openai-provider.js";
export { GeminiProvider } from "./gemini-provider.js";
export {
  PROVIDER_NAMES,
  type CommandProvider,
  type ProviderName,
} from "./command-provider.js";
export {
  ERROR_SENTINEL,
  PROVIDER_ERROR_KINDS,
  failed,
  renderResult,
  succeeded,
  type CommandResult,
  type ProviderErrorKind,
} from "./result.js";
export { stripMarkdownFences } from "./prompt.js";

import type { SettingsSnapshot } from "../config/index.js";
import { createLogger } from "../shared/logger.js";
import { PROVIDER_NAMES, type CommandProvider, type ProviderName } from "./command-provider.js";
import { GeminiProvider } from "./gemini-provider.js";
import { OllamaProvider } from "./ollama-provider.js";
import { OpenAIProvider } from "./openai-provider.js";

const logger = createLogger("providers");

/** Settings a provider is built from. */
export type ProviderSettings = Pick<
  SettingsSnapshot,
  "provider" | "api_keys" | "ollama_url" | "model" | "openai_model" | "gemini_model"
>;

type ProviderFactory = (settings: ProviderSettings) => CommandProvider;

const REGISTRY: Record<ProviderName, ProviderFactory> = {
  ollama: (s) => new OllamaProvider({ baseUrl: s.ollama_url, model: s.model }),
  openai: (s) => new OpenAIProvider({ apiKey: s.api_keys.openai, model: s.openai_model }),
  gemini: (s) => new GeminiProvider({ apiKey: s.api_keys.gemini, model: s.gemini_model }),
};

export const DEFAULT_PROVIDER: ProviderName = "ollama";

/** Registered name for `name` (trimmed, any case), or undefined. */
export function resolveProviderName(name: string): ProviderName | undefined {
  const wanted = name.trim().toLowerCase();
  return PROVIDER_NAMES.find((candidate) => candidate === wanted);
}

export function selectProvider(settings: ProviderSettings): CommandProvider {
  const name = resolveProviderName(settings.provider);
  if (name === undefined) {
    logger.warn(
      { requested: settings.provider, using: DEFAULT_PROVIDER },
      "Unknown provider – falling back",
    );
  }
  const provider = REGISTRY[name ?? DEFAULT_PROVIDER](settings);
  logger.debug({ provider: provider.name }, "Provider selected");
  return provider;
}
