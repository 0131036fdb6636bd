import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigStore, DEFAULT_SETTINGS } from "../config/index.js";
import { buildControlServer, maskKey, type ControlServer } from "../server/app.js";

describe("maskKey", () => {
  it("should keep only the last four characters", () => {
    expect(maskKey("")).toBe("");
    expect(maskKey("abcd")).toBe("****");
    expect(maskKey("test-key-1234")).toBe("****1234");
  });
});

describe("control server", () => {
  let dir: string;
  let config: ConfigStore;
  let visible: boolean;
  let onQuit: ReturnType<typeof vi.fn>;
  let app: ControlServer;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "cmdlight-server-"));
    config = new ConfigStore(path.join(dir, "config.json"));
    await config.load();
    visible = false;
    onQuit = vi.fn();
    app = buildControlServer({
      config,
      isVisible: () => visible,
      onShow: () => {
        visible = true;
      },
      onHide: () => {
        visible = false;
      },
      onQuit: () => onQuit(),
    });
  });

  afterEach(async () => {
    await app.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function fileContents(): Promise<unknown> {
    return JSON.parse(await fs.readFile(config.filePath, "utf-8"));
  }

  it("GET /health reports the provider and visibility", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("ok");
    expect(body.provider).toBe("ollama");
    expect(body.visible).toBe(false);
    expect(typeof body.timestamp).toBe("string");
  });

  it("POST /show and /hide toggle the surface", async () => {
    const shown = await app.inject({ method: "POST", url: "/show" });
    expect(shown.json()).toEqual({ visible: true });

    const hidden = await app.inject({ method: "POST", url: "/hide" });
    expect(hidden.json()).toEqual({ visible: false });
  });

  it("GET /settings masks API keys", async () => {
    await config.update({ api_keys: { openai: "test-key-openai" } });

    const res = await app.inject({ method: "GET", url: "/settings" });

    expect(res.statusCode).toBe(200);
    expect(res.json().api_keys).toEqual({ openai: "****enai", gemini: "" });
    expect(res.body).not.toContain("test-key-openai");
  });

  it("PATCH /settings persists a normalized provider and merges keys", async () => {
    await config.update({ api_keys: { openai: "test-key-openai" } });

    const res = await app.inject({
      method: "PATCH",
      url: "/settings",
      payload: { provider: " Gemini ", gemini_model: "gemini-test", api_keys: { gemini: "test-secret" } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      provider: "gemini",
      gemini_model: "gemini-test",
      api_keys: { openai: "****enai", gemini: "****cret" },
    });
    expect(config.get("provider")).toBe("gemini");
    expect(config.get("api_keys")).toEqual({ openai: "test-key-openai", gemini: "test-secret" });
    expect(await fileContents()).toMatchObject({ provider: "gemini", gemini_model: "gemini-test" });
  });

  it("PATCH /settings rejects an unregistered provider without saving", async () => {
    const res = await app.inject({
      method: "PATCH",
      url: "/settings",
      payload: { provider: "anthropic" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "Invalid settings",
      issues: [{ path: "provider", message: "provider must be one of: ollama, openai, gemini" }],
    });
    expect(config.get("provider")).toBe("ollama");
    expect(await fileContents()).toMatchObject({ provider: "ollama" });
  });

  it("PATCH /settings rejects unknown keys and bad values", async () => {
    const unknown = await app.inject({ method: "PATCH", url: "/settings", payload: { theme: "dark" } });
    expect(unknown.statusCode).toBe(400);

    const badUrl = await app.inject({
      method: "PATCH",
      url: "/settings",
      payload: { ollama_url: "not a url" },
    });
    expect(badUrl.statusCode).toBe(400);
    expect(badUrl.json().issues[0].path).toBe("ollama_url");
    expect(config.get("ollama_url")).toBe(DEFAULT_SETTINGS.ollama_url);
  });

  it("PATCH /settings rejects a hotkey the listener cannot parse", async () => {
    const res = await app.inject({
      method: "PATCH",
      url: "/settings",
      payload: { hotkey: "win+space" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().issues).toEqual([
      { path: "hotkey", message: 'Unsupported hotkey token(s) in "win+space": win' },
    ]);
    expect(config.get("hotkey")).toBe("ctrl+space");
    expect(await fileContents()).toMatchObject({ hotkey: "ctrl+space" });
  });

  it("POST /settings/reset restores the defaults", async () => {
    await config.update({ provider: "openai", model: "llama-test" });

    const res = await app.inject({ method: "POST", url: "/settings/reset" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(DEFAULT_SETTINGS);
    expect(config.getAll()).toEqual(DEFAULT_SETTINGS);
  });

  it("POST /quit replies before calling onQuit", async () => {
    const res = await app.inject({ method: "POST", url: "/quit" });

    expect(res.json()).toEqual({ status: "shutting down" });
    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(onQuit).toHaveBeenCalledOnce();
  });
});
