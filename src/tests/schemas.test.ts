import { describe, it, expect } from "vitest";
import { CommandQuerySchema, isKillPhrase, KILL_PHRASES } from "../core/schemas/index.js";
import { DEFAULT_SETTINGS, SettingsPatchSchema, SettingsSchema } from "../config/index.js";

describe("Schema Validation", () => {
  it("should trim a command query", () => {
    expect(CommandQuerySchema.parse({ text: "  list files \n" })).toEqual({ text: "list files" });
  });

  it("should reject a blank command query", () => {
    expect(CommandQuerySchema.safeParse({ text: " \t " }).success).toBe(false);
  });

  it("should recognise kill phrases in any case", () => {
    expect(KILL_PHRASES).toEqual(["exit", "quit"]);
    expect(isKillPhrase(" QUIT ")).toBe(true);
    expect(isKillPhrase("exit now")).toBe(false);
  });

  it("should accept the default settings", () => {
    expect(SettingsSchema.parse(DEFAULT_SETTINGS)).toEqual(DEFAULT_SETTINGS);
  });

  it("should reject an out-of-range control port", () => {
    expect(SettingsSchema.safeParse({ ...DEFAULT_SETTINGS, control_port: 70000 }).success).toBe(false);
  });

  it("should accept a partial settings patch with one API key", () => {
    const patch = { model: "llama-test", api_keys: { gemini: "test-secret" } };
    expect(SettingsPatchSchema.parse(patch)).toEqual(patch);
  });

  it("should reject unknown keys in a settings patch", () => {
    expect(SettingsPatchSchema.safeParse({ theme: "dark" }).success).toBe(false);
  });
});
