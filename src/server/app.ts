import Fastify from "fastify";
import type { ConfigStore, Settings } from "../config/index.js";
import { SettingsPatchSchema } from "../config/index.js";
import { PROVIDER_NAMES, resolveProviderName } from "../providers/index.js";
import { createLogger } from "../shared/logger.js";
import { errorMessage } from "../shared/errors.js";

export interface ControlServerOptions {
  config: ConfigStore;
  isVisible: () => boolean;
  onShow: () => void;
  onHide: () => void;
  onQuit: () => void;
}

/** Settings as returned over HTTP: API keys are masked. */
export type PublicSettings = Omit<Settings, "api_keys"> & {
  api_keys: { openai: string; gemini: string };
};

export function maskKey(key: string): string {
  if (!key) return "";
  return key.length <= 4 ? "****" : `****${key.slice(-4)}`;
}

export function toPublicSettings(settings: Settings): PublicSettings {
  return {
    ...settings,
    api_keys: {
      openai: maskKey(settings.api_keys.openai),
      gemini: maskKey(settings.api_keys.gemini),
    },
  };
}

const SettingsUpdateSchema = SettingsPatchSchema.refine(
  (patch) => patch.provider === undefined || resolveProviderName(patch.provider) !== undefined,
  { message: `provider must be one of: ${PROVIDER_NAMES.join(", ")}`, path: ["provider"] },
);

/**
 * Loopback control server – the launcher's background presence.
 *
 * Stands in for a tray menu: show / hide the surface, read and change
 * settings, quit. Bind it to 127.0.0.1 only.
 */
export function buildControlServer(options: ControlServerOptions) {
  const { config } = options;
  const fastify = Fastify({ loggerInstance: createLogger("control-server") });

  // ── GET /health ───────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return {
      status: "ok",
      provider: config.get("provider"),
      visible: options.isVisible(),
      timestamp: new Date().toISOString(),
    };
  });

  // ── POST /show, POST /hide ────────────────────────────────────────
  fastify.post("/show", async () => {
    options.onShow();
    return { visible: options.isVisible() };
  });

  fastify.post("/hide", async () => {
    options.onHide();
    return { visible: options.isVisible() };
  });

  // ── Settings ──────────────────────────────────────────────────────
  fastify.get("/settings", async () => {
    return toPublicSettings(config.getAll());
  });

  fastify.patch("/settings", async (req, reply) => {
    const parsed = SettingsUpdateSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({
        error: "Invalid settings",
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
    }

    const patch = parsed.data;
    const provider = patch.provider === undefined ? undefined : resolveProviderName(patch.provider);
    try {
      await config.update(provider === undefined ? patch : { ...patch, provider });
      req.log.info({ keys: Object.keys(patch) }, "Settings updated");
      return reply.code(200).send(toPublicSettings(config.getAll()));
    } catch (error) {
      return reply.code(500).send({ error: errorMessage(error) });
    }
  });

  fastify.post("/settings/reset", async (_req, reply) => {
    try {
      await config.reset();
      return reply.code(200).send(toPublicSettings(config.getAll()));
    } catch (error) {
      return reply.code(500).send({ error: errorMessage(error) });
    }
  });

  // ── POST /quit ────────────────────────────────────────────────────
  fastify.post("/quit", async (_req, reply) => {
    // Let the reply go out before the server is torn down.
    setImmediate(options.onQuit);
    return reply.code(200).send({ status: "shutting down" });
  });

  return fastify;
}

export type ControlServer = ReturnType<typeof buildControlServer>;
