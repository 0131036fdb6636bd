import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import { createLogger } from "../shared/logger.js";
import { errorMessage } from "../shared/errors.js";
import type { CommandProvider } from "./command-provider.js";
import { CANCELLED_MESSAGE, statusFailure } from "./http.js";
import {
  CHAT_SYSTEM_INSTRUCTION,
  MAX_OUTPUT_TOKENS,
  REQUEST_TIMEOUT_MS,
  TEMPERATURE,
  stripMarkdownFences,
} from "./prompt.js";
import { failed, succeeded, type CommandResult } from "./result.js";

const logger = createLogger("openai-provider");

export interface OpenAIProviderOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

/**
 * OpenAI chat completions. The SDK sends the key as a bearer token; the
 * client is only created once a key is present and a request is made.
 */
export class OpenAIProvider implements CommandProvider {
  readonly kind = "openai";
  readonly name: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private client: OpenAI | undefined;

  constructor(options: OpenAIProviderOptions) {
    this.apiKey = options.apiKey.trim();
    this.model = options.model ?? "gpt-3.5-turbo";
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.name = `OpenAI/${this.model}`;
  }

  async generateCommand(query: string, signal?: AbortSignal): Promise<CommandResult> {
    if (!this.apiKey) {
      return failed("missing_credential", "OpenAI API key not configured. Add in settings.");
    }

    try {
      const response = await this.getClient().chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: CHAT_SYSTEM_INSTRUCTION },
            { role: "user", content: query },
          ],
          temperature: TEMPERATURE,
          max_tokens: MAX_OUTPUT_TOKENS,
        },
        { signal },
      );

      const command = stripMarkdownFences(response.choices[0]?.message?.content ?? "");
      return command ? succeeded(command) : failed("empty_response", "Empty response from OpenAI");
    } catch (error) {
      return this.describeFailure(error);
    }
  }

  private getClient(): OpenAI {
    this.client ??= new OpenAI({
      apiKey: this.apiKey,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
    return this.client;
  }

  private describeFailure(error: unknown): CommandResult {
    // Subclasses first: all of these extend APIError.
    if (error instanceof APIUserAbortError) {
      return failed("cancelled", CANCELLED_MESSAGE);
    }
    if (error instanceof APIConnectionTimeoutError) {
      return failed("timeout", "OpenAI request timed out");
    }
    if (error instanceof APIConnectionError) {
      return failed("connection_unavailable", "Could not reach OpenAI API");
    }
    if (error instanceof APIError && error.status !== undefined) {
      logger.warn({ model: this.model, status: error.status }, "OpenAI returned an error status");
      return statusFailure("OpenAI", error.status);
    }

    logger.warn({ model: this.model, error: errorMessage(error) }, "OpenAI request failed");
    return failed("unexpected", errorMessage(error));
  }
}
