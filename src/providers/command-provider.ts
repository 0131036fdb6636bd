import type { CommandResult } from "./result.js";

export const PROVIDER_NAMES = ["ollama", "openai", "gemini"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * CommandProvider – one backend that turns a natural-language request
 * into a terminal command.
 *
 * `generateCommand` resolves for every expected failure (network down,
 * missing key, bad status, malformed body); it does not throw.
 */
export interface CommandProvider {
  readonly kind: ProviderName;
  /** Display name, e.g. "Ollama/llama3.2". */
  readonly name: string;

  generateCommand(query: string, signal?: AbortSignal): Promise<CommandResult>;
}
