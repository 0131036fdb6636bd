import type { EventEmitter } from "node:events";
import type { Key } from "node:readline";
import { createLogger } from "../../shared/logger.js";

const logger = createLogger("hotkey");

/** Anything emitting readline-style `keypress` events (stdin after `emitKeypressEvents`). */
export type KeySource = Pick<EventEmitter, "on" | "off">;

export type KeypressListener = (str: string | undefined, key: Key | undefined) => void;

export interface Hotkey {
  ctrl: boolean;
  shift: boolean;
  /** alt / option / meta – terminals report all of them as meta. */
  meta: boolean;
  key: string;
}

const MODIFIERS: Record<string, "ctrl" | "shift" | "meta"> = {
  ctrl: "ctrl",
  control: "ctrl",
  shift: "shift",
  alt: "meta",
  option: "meta",
  meta: "meta",
};

const KEY_NAME = /^([a-z0-9]|space|tab|return|escape|f([1-9]|1[0-2]))$/;

/** Parse "ctrl+shift+space" style combos. */
export function parseHotkey(text: string): Hotkey {
  const combo: Hotkey = { ctrl: false, shift: false, meta: false, key: "" };
  const rejected: string[] = [];

  for (const raw of text.toLowerCase().split("+")) {
    const token = raw.trim() === "enter" ? "return" : raw.trim();
    if (!token) continue;

    const modifier = MODIFIERS[token];
    if (modifier) {
      combo[modifier] = true;
    } else if (!combo.key && KEY_NAME.test(token)) {
      combo.key = token;
    } else {
      rejected.push(token);
    }
  }

  if (rejected.length > 0) {
    throw new Error(`Unsupported hotkey token(s) in "${text}": ${rejected.join(", ")}`);
  }
  if (!combo.key) {
    throw new Error(`Hotkey "${text}" names no key`);
  }
  return combo;
}

/** Normalize terminal quirks: NUL is what ctrl+space sends. */
function normalizeKey(str: string | undefined, key: Key | undefined): Key {
  if (str === "\u0000" || key?.sequence === "\u0000") {
    return { name: "space", ctrl: true, meta: false, shift: false };
  }
  if (key?.name === "enter") {
    return { ...key, name: "return" };
  }
  return key ?? {};
}

export function matchesHotkey(
  combo: Hotkey,
  str: string | undefined,
  key: Key | undefined,
): boolean {
  const pressed = normalizeKey(str, key);
  return (
    pressed.name === combo.key &&
    Boolean(pressed.ctrl) === combo.ctrl &&
    Boolean(pressed.shift) === combo.shift &&
    Boolean(pressed.meta) === combo.meta
  );
}

/**
 * Watches a keypress stream for one combo and calls `onToggle` each time
 * it is pressed.
 */
export class HotkeyListener {
  readonly combo: Hotkey;
  private readonly keySource: KeySource;
  private readonly onToggle: () => void;
  private listening = false;

  private readonly handleKeypress: KeypressListener = (str, key) => {
    if (matchesHotkey(this.combo, str, key)) {
      logger.debug("Hotkey pressed");
      this.onToggle();
    }
  };

  constructor(hotkey: string, keySource: KeySource, onToggle: () => void) {
    this.combo = parseHotkey(hotkey);
    this.keySource = keySource;
    this.onToggle = onToggle;
  }

  get isListening(): boolean {
    return this.listening;
  }

  start(): void {
    if (this.listening) return;
    this.keySource.on("keypress", this.handleKeypress);
    this.listening = true;
  }

  stop(): void {
    if (!this.listening) return;
    this.keySource.off("keypress", this.handleKeypress);
    this.listening = false;
  }
}
