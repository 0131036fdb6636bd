import type { Key } from "node:readline";
import type { KeypressListener, KeySource } from "../core/hotkey/hotkeyListener.js";
import type { SpotlightSurface } from "./spotlightSurface.js";

export interface TextOutput {
  write(text: string): unknown;
}

export const PROMPT = "❯ ";
export const INPUT_PLACEHOLDER = "Ask AI for a command...";

const CLEAR_LINE = "\r\x1b[2K";
const DIM = "\x1b[2m";
const INVERSE = "\x1b[7m";
const RESET = "\x1b[0m";

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Spotlight surface drawn on a single terminal line.
 *
 * Reads raw keypresses while visible. Pending locks edits and Enter;
 * Escape still dismisses.
 * Ctrl/meta combinations are left for the hotkey listener.
 */
export class TerminalSpotlight implements SpotlightSurface {
  private readonly keySource: KeySource;
  private readonly output: TextOutput;

  private visible = false;
  private attached = false;
  private buffer = "";
  /** Whole buffer selected: the next keystroke replaces it. */
  private selected = false;
  private pendingText: string | undefined;

  private submitHandler: ((text: string) => void) | undefined;
  private dismissHandler: (() => void) | undefined;

  private readonly handleKeypress: KeypressListener = (str, key) => {
    this.onKey(str, key);
  };

  constructor(keySource: KeySource, output: TextOutput) {
    this.keySource = keySource;
    this.output = output;
  }

  attach(): void {
    if (this.attached) return;
    this.keySource.on("keypress", this.handleKeypress);
    this.attached = true;
  }

  detach(): void {
    if (!this.attached) return;
    this.keySource.off("keypress", this.handleKeypress);
    this.attached = false;
  }

  show(): void {
    this.visible = true;
    this.buffer = "";
    this.selected = false;
    this.render();
  }

  hide(): void {
    if (!this.visible) return;
    this.visible = false;
    this.output.write(CLEAR_LINE);
  }

  isVisible(): boolean {
    return this.visible;
  }

  showPending(placeholder: string): void {
    this.pendingText = placeholder;
    this.render();
  }

  clearPending(): void {
    this.pendingText = undefined;
    this.render();
  }

  showResult(text: string): void {
    if (!this.visible) return;
    this.buffer = text;
    this.selected = true;
    this.render();
  }

  onSubmit(handler: (text: string) => void): void {
    this.submitHandler = handler;
  }

  onDismiss(handler: () => void): void {
    this.dismissHandler = handler;
  }

  /** Current contents of the input line. */
  get text(): string {
    return this.buffer;
  }

  get isEditable(): boolean {
    return this.pendingText === undefined;
  }

  // ── Input ─────────────────────────────────────────────────────────

  private onKey(str: string | undefined, key: Key | undefined): void {
    if (!this.visible) return;
    if (key?.ctrl || key?.meta) return;

    if (key?.name === "escape") {
      this.dismissHandler?.();
      return;
    }
    if (this.pendingText !== undefined) return;

    switch (key?.name) {
      case "return":
      case "enter":
        this.submitHandler?.(this.buffer.trim());
        return;
      case "backspace":
        this.buffer = this.selected ? "" : this.buffer.slice(0, -1);
        this.selected = false;
        this.render();
        return;
    }

    if (str && !CONTROL_CHARS.test(str)) {
      this.buffer = this.selected ? str : this.buffer + str;
      this.selected = false;
      this.render();
    }
  }

  // ── Drawing ───────────────────────────────────────────────────────

  private render(): void {
    if (!this.visible) return;

    let line: string;
    if (this.pendingText !== undefined) {
      line = `${DIM}${this.pendingText}${RESET}`;
    } else if (!this.buffer) {
      line = `${DIM}${INPUT_PLACEHOLDER}${RESET}`;
    } else if (this.selected) {
      line = `${INVERSE}${this.buffer}${RESET}`;
    } else {
      line = this.buffer;
    }
    this.output.write(`${CLEAR_LINE}${PROMPT}${line}`);
  }
}
