import { z } from "zod";
import { parseHotkey } from "../core/hotkey/hotkeyListener.js";
import { errorMessage } from "../shared/errors.js";

// ── Settings file ─────────────────────────────────────────────────────
export const ApiKeysSchema = z.object({
  openai: z.string(),
  gemini: z.string(),
});
export type ApiKeys = z.infer<typeof ApiKeysSchema>;

export const SettingsSchema = z.object({
  /** Registered provider name; unknown names fall back to the local backend. */
  provider: z.string(),
  api_keys: ApiKeysSchema,
  ollama_url: z.string().url(),
  model: z.string().min(1),
  openai_model: z.string().min(1),
  gemini_model: z.string().min(1),
  /** Must parse as a combo, so a bad value never reaches the listener at startup. */
  hotkey: z.string().superRefine((value, ctx) => {
    try {
      parseHotkey(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
    }
  }),
  /** Loopback port of the control server; 0 disables it. */
  control_port: z.number().int().min(0).max(65535),
});
export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  provider: "ollama",
  api_keys: {
    openai: "",
    gemini: "",
  },
  ollama_url: "http://localhost:11434",
  model: "llama3.2",
  openai_model: "gpt-3.5-turbo",
  gemini_model: "gemini-pro",
  hotkey: "ctrl+space",
  control_port: 48123,
};

// ── Partial updates ───────────────────────────────────────────────────
export const SettingsPatchSchema = SettingsSchema.omit({ api_keys: true })
  .partial()
  .extend({ api_keys: ApiKeysSchema.partial().optional() })
  .strict();
export type SettingsPatch = z.infer<typeof SettingsPatchSchema>;
