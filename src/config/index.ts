import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { createLogger } from "../shared/logger.js";
import { errorCode, errorMessage, isRecord } from "../shared/errors.js";
import {
  DEFAULT_SETTINGS,
  SettingsSchema,
  type Settings,
  type SettingsPatch,
} from "./config.schema.js";

export {
  DEFAULT_SETTINGS,
  SettingsSchema,
  SettingsPatchSchema,
  type ApiKeys,
  type Settings,
  type SettingsPatch,
} from "./config.schema.js";

const logger = createLogger("config");

/** A point-in-time, immutable view of the settings. */
export type SettingsSnapshot = Readonly<Omit<Settings, "api_keys">> & {
  readonly api_keys: Readonly<Settings["api_keys"]>;
};

/** `$CMDLIGHT_CONFIG_PATH`, or `~/.cmdlight/config.json`. */
export function defaultConfigPath(): string {
  const override = process.env["CMDLIGHT_CONFIG_PATH"]?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), ".cmdlight", "config.json");
}

function cloneSettings(settings: Settings): Settings {
  return { ...settings, api_keys: { ...settings.api_keys } };
}

/**
 * Lay a parsed settings file over the defaults so keys added in newer
 * versions get their default without touching what the user already set.
 */
function mergeWithDefaults(parsed: unknown): Record<string, unknown> {
  const defaults = cloneSettings(DEFAULT_SETTINGS);
  if (!isRecord(parsed)) return defaults;

  const apiKeys = isRecord(parsed["api_keys"]) ? parsed["api_keys"] : {};
  return {
    ...defaults,
    ...parsed,
    api_keys: { ...defaults.api_keys, ...apiKeys },
  };
}

/**
 * JSON-file backed settings store.
 *
 * Created explicitly and handed to whoever needs it; the dispatcher only
 * ever reads a {@link ConfigStore.snapshot} per request.
 */
export class ConfigStore {
  readonly filePath: string;
  private settings: Settings = cloneSettings(DEFAULT_SETTINGS);
  /** Keys in the file this version does not know; written back untouched. */
  private extras: Record<string, unknown> = {};
  /** Tail of the write queue; each change builds on the one saved before it. */
  private writes: Promise<void> = Promise.resolve();

  constructor(filePath: string = defaultConfigPath()) {
    this.filePath = filePath;
  }

  /** Create the file with defaults on first run, then read and merge it. */
  async load(): Promise<Settings> {
    await this.ensureExists();
    this.settings = await this.readMerged();
    return this.getAll();
  }

  get<K extends keyof Settings>(key: K, fallback?: Settings[K]): Settings[K] {
    const value = this.settings[key];
    return value === undefined && fallback !== undefined ? fallback : value;
  }

  set<K extends keyof Settings>(key: K, value: Settings[K]): Promise<void> {
    return this.enqueue((current) => SettingsSchema.parse({ ...current, [key]: value }));
  }

  /** Apply several changes at once; `api_keys` is merged key by key. */
  update(patch: SettingsPatch): Promise<void> {
    const { api_keys: apiKeys, ...rest } = patch;
    return this.enqueue((current) =>
      SettingsSchema.parse({
        ...current,
        ...rest,
        api_keys: { ...current.api_keys, ...apiKeys },
      }),
    );
  }

  reset(): Promise<void> {
    return this.enqueue(() => cloneSettings(DEFAULT_SETTINGS));
  }

  getAll(): Settings {
    return cloneSettings(this.settings);
  }

  snapshot(): SettingsSnapshot {
    const copy = cloneSettings(this.settings);
    return Object.freeze({ ...copy, api_keys: Object.freeze(copy.api_keys) });
  }

  // ── File I/O ──────────────────────────────────────────────────────

  private enqueue(build: (current: Settings) => Settings): Promise<void> {
    const run = this.writes.then(() => this.save(build(this.settings)));
    // The caller sees the failure through `run`; the queue moves on.
    this.writes = run.catch(() => undefined);
    return run;
  }

  private async ensureExists(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.writeFile(this.filePath, serialize(DEFAULT_SETTINGS), {
        encoding: "utf-8",
        flag: "wx",
      });
      logger.info({ file: this.filePath }, "Created default settings file");
    } catch (error) {
      if (errorCode(error) !== "EEXIST") throw error;
    }
  }

  private async readMerged(): Promise<Settings> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(this.filePath, "utf-8"));
    } catch (error) {
      logger.warn(
        { file: this.filePath, error: errorMessage(error) },
        "Could not read settings file – using defaults",
      );
      return cloneSettings(DEFAULT_SETTINGS);
    }

    this.extras = unknownKeys(parsed);
    const merged = mergeWithDefaults(parsed);
    const result = SettingsSchema.safeParse(merged);
    if (result.success) return result.data;

    // Reset only the offending keys to their defaults.
    const invalidKeys = new Set(result.error.issues.map((issue) => String(issue.path[0])));
    logger.warn(
      { file: this.filePath, keys: [...invalidKeys] },
      "Invalid settings – falling back to defaults for these keys",
    );
    const defaults: Record<string, unknown> = cloneSettings(DEFAULT_SETTINGS);
    for (const key of invalidKeys) {
      merged[key] = defaults[key];
    }
    const repaired = SettingsSchema.safeParse(merged);
    return repaired.success ? repaired.data : cloneSettings(DEFAULT_SETTINGS);
  }

  private async save(next: Settings): Promise<void> {
    try {
      await fs.writeFile(this.filePath, serialize({ ...this.extras, ...next }), "utf-8");
    } catch (error) {
      logger.error({ file: this.filePath, error: errorMessage(error) }, "Failed to save settings");
      throw error;
    }
    this.settings = next;
  }
}

function unknownKeys(parsed: unknown): Record<string, unknown> {
  if (!isRecord(parsed)) return {};
  return Object.fromEntries(
    Object.entries(parsed).filter(([key]) => !Object.hasOwn(SettingsSchema.shape, key)),
  );
}

function serialize(settings: Record<string, unknown>): string {
  return JSON.stringify(settings, null, 4);
}
