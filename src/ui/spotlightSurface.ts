import type { PendingDisplay } from "../core/dispatcher/requestDispatcher.js";

/** The floating single-line input the user types requests into. */
export interface SpotlightSurface extends PendingDisplay {
  show(): void;
  hide(): void;
  isVisible(): boolean;
  /** Display result text, selected so typing replaces it. */
  showResult(text: string): void;
  /** Handler for Enter; receives the trimmed input. */
  onSubmit(handler: (text: string) => void): void;
  /** Handler for Escape. */
  onDismiss(handler: () => void): void;
}
