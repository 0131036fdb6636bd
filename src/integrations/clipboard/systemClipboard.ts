import clipboard from "clipboardy";
import { createLogger } from "../../shared/logger.js";
import { errorMessage } from "../../shared/errors.js";

const logger = createLogger("clipboard");

export interface ClipboardSink {
  /** Resolves false instead of throwing when the copy fails. */
  copy(text: string): Promise<boolean>;
}

/** OS clipboard via clipboardy (pbcopy, xsel/wl-copy, clip.exe). */
export class SystemClipboard implements ClipboardSink {
  async copy(text: string): Promise<boolean> {
    try {
      await clipboard.write(text);
      return true;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Clipboard copy failed");
      return false;
    }
  }
}
