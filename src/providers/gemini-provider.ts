import { z } from "zod";
import { createLogger } from "../shared/logger.js";
import { errorMessage } from "../shared/errors.js";
import type { CommandProvider } from "./command-provider.js";
import { CANCELLED_MESSAGE, classifyFetchError, postJson, statusFailure } from "./http.js";
import {
  MAX_OUTPUT_TOKENS,
  TEMPERATURE,
  buildSingleTurnPrompt,
  stripMarkdownFences,
} from "./prompt.js";
import { failed, succeeded, type CommandResult } from "./result.js";

const logger = createLogger("gemini-provider");

export const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string() })).min(1),
        }),
      }),
    )
    .min(1),
});

export interface GeminiProviderOptions {
  apiKey: string;
  model?: string;
  /** API root; the model route is appended to it. */
  endpoint?: string;
  timeoutMs?: number;
}

/**
 * Google Gemini `generateContent`. The key travels as the `key` query
 * parameter, not as a header.
 */
export class GeminiProvider implements CommandProvider {
  readonly kind = "gemini";
  readonly name: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: GeminiProviderOptions) {
    this.apiKey = options.apiKey.trim();
    this.model = options.model ?? "gemini-pro";
    this.endpoint = (options.endpoint ?? GEMINI_API_BASE).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.name = `Gemini/${this.model}`;
  }

  async generateCommand(query: string, signal?: AbortSignal): Promise<CommandResult> {
    if (!this.apiKey) {
      return failed("missing_credential", "Gemini API key not configured. Add in settings.");
    }

    const route = `${this.endpoint}/models/${encodeURIComponent(this.model)}:generateContent`;
    const url = `${route}?key=${encodeURIComponent(this.apiKey)}`;
    const payload = {
      contents: [{ parts: [{ text: buildSingleTurnPrompt(query) }] }],
      generationConfig: {
        temperature: TEMPERATURE,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
      },
    };

    try {
      const response = await postJson(url, payload, { signal, timeoutMs: this.timeoutMs });
      if (!response.ok) {
        logger.warn({ model: this.model, status: response.status }, "Gemini returned an error status");
        return statusFailure("Gemini", response.status);
      }

      const body = GenerateContentResponseSchema.safeParse(await response.json());
      if (!body.success) {
        return failed("unexpected", "Malformed response from Gemini");
      }

      const text = body.data.candidates[0]?.content.parts[0]?.text ?? "";
      const command = stripMarkdownFences(text);
      return command ? succeeded(command) : failed("empty_response", "Empty response from Gemini");
    } catch (error) {
      switch (classifyFetchError(error)) {
        case "connection":
          return failed("connection_unavailable", "Could not reach Gemini API");
        case "timeout":
          return failed("timeout", "Gemini request timed out");
        case "cancelled":
          return failed("cancelled", CANCELLED_MESSAGE);
        case "other":
          // `route` rather than `url`: the key is part of the query string.
          logger.warn({ route, error: errorMessage(error) }, "Gemini request failed");
          return failed("unexpected", errorMessage(error));
      }
    }
  }
}
