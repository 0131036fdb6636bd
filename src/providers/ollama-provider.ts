import { z } from "zod";
import { createLogger } from "../shared/logger.js";
import { errorMessage } from "../shared/errors.js";
import type { CommandProvider } from "./command-provider.js";
import { CANCELLED_MESSAGE, classifyFetchError, postJson } from "./http.js";
import { buildCompletionPrompt, stripMarkdownFences } from "./prompt.js";
import { failed, succeeded, type CommandResult } from "./result.js";

const logger = createLogger("ollama-provider");

const GenerateResponseSchema = z.object({
  response: z.string().optional(),
});

export interface OllamaProviderOptions {
  /** Server root, e.g. http://localhost:11434 */
  baseUrl: string;
  model: string;
  timeoutMs?: number;
}

/**
 * Local Ollama server. Sends a single non-streaming completion request
 * to `{baseUrl}/api/generate`.
 */
export class OllamaProvider implements CommandProvider {
  readonly kind = "ollama";
  readonly name: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: OllamaProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.name = `Ollama/${this.model}`;
  }

  async generateCommand(query: string, signal?: AbortSignal): Promise<CommandResult> {
    const payload = {
      model: this.model,
      prompt: buildCompletionPrompt(query),
      stream: false,
    };

    try {
      const response = await postJson(`${this.baseUrl}/api/generate`, payload, {
        signal,
        timeoutMs: this.timeoutMs,
      });
      if (!response.ok) {
        return failed("remote_error", `Ollama API error (${response.status})`);
      }

      const body = GenerateResponseSchema.safeParse(await response.json());
      if (!body.success) {
        return failed("unexpected", "Malformed response from Ollama");
      }

      const command = stripMarkdownFences(body.data.response ?? "");
      return command ? succeeded(command) : failed("empty_response", "Empty response from Ollama");
    } catch (error) {
      switch (classifyFetchError(error)) {
        case "connection":
          return failed("connection_unavailable", "Ollama not running. Start with 'ollama serve'");
        case "timeout":
          return failed("timeout", "Ollama request timed out");
        case "cancelled":
          return failed("cancelled", CANCELLED_MESSAGE);
        case "other":
          logger.warn({ url: this.baseUrl, error: errorMessage(error) }, "Ollama request failed");
          return failed("unexpected", errorMessage(error));
      }
    }
  }
}
