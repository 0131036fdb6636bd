import type { ConfigStore, SettingsSnapshot } from "../../config/index.js";
import type { ClipboardSink } from "../../integrations/clipboard/systemClipboard.js";
import { renderResult, type CommandProvider, type CommandResult } from "../../providers/index.js";
import { buildControlServer, type ControlServer } from "../../server/app.js";
import type { SpotlightSurface } from "../../ui/spotlightSurface.js";
import { createLogger } from "../../shared/logger.js";
import { errorMessage } from "../../shared/errors.js";
import { RequestDispatcher } from "../dispatcher/requestDispatcher.js";
import {
  HotkeyListener,
  matchesHotkey,
  parseHotkey,
  type KeypressListener,
  type KeySource,
} from "../hotkey/hotkeyListener.js";

const logger = createLogger("launcher");

const CTRL_C = parseHotkey("ctrl+c");
const CONTROL_HOST = "127.0.0.1";

/** A surface the launcher can attach to and detach from its key stream. */
export interface AttachableSurface extends SpotlightSurface {
  attach(): void;
  detach(): void;
}

export interface CommandLauncherConfig {
  config: ConfigStore;
  surface: AttachableSurface;
  keySource: KeySource;
  clipboard: ClipboardSink;
  selectProvider?: (settings: SettingsSnapshot) => CommandProvider;
  /** Overrides the `control_port` setting; 0 disables the control server. */
  controlPort?: number;
}

/**
 * CommandLauncher – wires the pieces together:
 *
 *   hotkey ─▶ toggle surface
 *   surface ─▶ dispatcher ─▶ provider ─▶ surface + clipboard
 *   control server ─▶ show / hide / settings / quit
 *
 * Hiding the surface cancels whatever request is in flight.
 */
export class CommandLauncher {
  readonly dispatcher: RequestDispatcher;
  private readonly config: ConfigStore;
  private readonly surface: AttachableSurface;
  private readonly keySource: KeySource;
  private readonly clipboard: ClipboardSink;
  private readonly hotkey: HotkeyListener;
  private readonly controlPort: number;

  private server: ControlServer | undefined;
  private quitting: Promise<void> | undefined;
  private resolveClosed: (() => void) | undefined;
  /** Settles once {@link quit} has finished. */
  readonly closed: Promise<void>;

  private readonly handleInterrupt: KeypressListener = (str, key) => {
    if (matchesHotkey(CTRL_C, str, key)) this.requestQuit();
  };

  constructor(options: CommandLauncherConfig) {
    this.config = options.config;
    this.surface = options.surface;
    this.keySource = options.keySource;
    this.clipboard = options.clipboard;
    this.controlPort = options.controlPort ?? this.config.get("control_port");

    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = () => resolve();
    });

    this.dispatcher = new RequestDispatcher({
      config: this.config,
      display: this.surface,
      onShutdown: () => this.requestQuit(),
      selectProvider: options.selectProvider,
    });
    this.hotkey = new HotkeyListener(this.config.get("hotkey"), this.keySource, () =>
      this.toggle(),
    );
  }

  async start(): Promise<void> {
    this.dispatcher.onResult((result) => this.handleResult(result));
    this.surface.onSubmit((text) => {
      this.dispatcher.submit(text);
    });
    this.surface.onDismiss(() => this.hide());

    this.surface.attach();
    this.hotkey.start();
    this.keySource.on("keypress", this.handleInterrupt);

    if (this.controlPort > 0) {
      await this.startControlServer(this.controlPort);
    }
    logger.info(
      { hotkey: this.config.get("hotkey"), provider: this.config.get("provider") },
      "Launcher started",
    );
  }

  toggle(): void {
    if (this.surface.isVisible()) {
      this.hide();
    } else {
      this.show();
    }
  }

  show(): void {
    this.surface.show();
  }

  hide(): void {
    this.dispatcher.cancelPending();
    this.surface.hide();
  }

  /** Tear everything down; safe to call more than once. */
  quit(): Promise<void> {
    this.quitting ??= this.shutdown();
    return this.quitting;
  }

  private requestQuit(): void {
    this.quit().catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, "Shutdown failed");
    });
  }

  private async shutdown(): Promise<void> {
    logger.info("Shutting down");
    this.hotkey.stop();
    this.keySource.off("keypress", this.handleInterrupt);
    this.hide();
    this.surface.detach();

    try {
      await this.server?.close();
    } finally {
      this.server = undefined;
      this.resolveClosed?.();
    }
  }

  private handleResult(result: CommandResult): void {
    this.surface.showResult(renderResult(result));
    // Error text stays on screen only; the clipboard keeps what it had.
    if (result.ok) {
      this.copyToClipboard(result.command);
    }
  }

  private copyToClipboard(text: string): void {
    this.clipboard.copy(text).then(
      (copied) => {
        if (copied) logger.info({ length: text.length }, "Copied command to clipboard");
      },
      (error: unknown) => {
        logger.warn({ error: errorMessage(error) }, "Clipboard copy failed");
      },
    );
  }

  private async startControlServer(port: number): Promise<void> {
    const server = buildControlServer({
      config: this.config,
      isVisible: () => this.surface.isVisible(),
      onShow: () => this.show(),
      onHide: () => this.hide(),
      onQuit: () => this.requestQuit(),
    });

    try {
      await server.listen({ port, host: CONTROL_HOST });
      this.server = server;
    } catch (error) {
      // Launcher keeps working without it (e.g. port already taken).
      logger.warn({ port, error: errorMessage(error) }, "Control server not started");
      await server.close();
    }
  }
}
