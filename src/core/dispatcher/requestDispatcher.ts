import { v4 as uuidv4 } from "uuid";
import type { SettingsSnapshot } from "../../config/index.js";
import {
  failed,
  selectProvider as selectFromRegistry,
  type CommandProvider,
  type CommandResult,
} from "../../providers/index.js";
import { createLogger } from "../../shared/logger.js";
import { errorMessage } from "../../shared/errors.js";
import { CommandQuerySchema, isKillPhrase, type CommandQuery } from "../schemas/index.js";

const logger = createLogger("dispatcher");

export const PENDING_PLACEHOLDER = "🤔 Thinking...";

/** The part of the interactive surface the dispatcher drives. */
export interface PendingDisplay {
  /** Lock input and show `placeholder` in place of the query. */
  showPending(placeholder: string): void;
  /** Make the input editable again. */
  clearPending(): void;
}

export type ResultSink = (result: CommandResult, query: CommandQuery) => void;

export type SubmitOutcome =
  | { status: "ignored" }
  | { status: "shutdown" }
  | { status: "busy"; pendingRequestId: string }
  | { status: "dispatched"; requestId: string; completion: Promise<void> };

export interface RequestDispatcherConfig {
  config: { snapshot(): SettingsSnapshot };
  display: PendingDisplay;
  /** Called when a kill phrase is submitted. */
  onShutdown: () => void;
  selectProvider?: (settings: SettingsSnapshot) => CommandProvider;
}

interface PendingRequest {
  id: string;
  query: CommandQuery;
  controller: AbortController;
  startedAt: number;
}

/**
 * Request Dispatcher
 *
 * Runs one provider call at a time without blocking the surface and
 * delivers its result to a single sink.
 *
 *   - a second submit while one is in flight is rejected ("busy")
 *   - `cancelPending` aborts the in-flight call; whatever it resolves
 *     to afterwards is dropped
 *   - settings are snapshotted once per request, at dispatch
 */
export class RequestDispatcher {
  private readonly config: RequestDispatcherConfig["config"];
  private readonly display: PendingDisplay;
  private readonly onShutdown: () => void;
  private readonly select: (settings: SettingsSnapshot) => CommandProvider;

  private pending: PendingRequest | undefined;
  private sink: ResultSink | undefined;

  constructor(options: RequestDispatcherConfig) {
    this.config = options.config;
    this.display = options.display;
    this.onShutdown = options.onShutdown;
    this.select = options.selectProvider ?? selectFromRegistry;
  }

  get isPending(): boolean {
    return this.pending !== undefined;
  }

  /** Install the result sink, replacing any previous one. */
  onResult(sink: ResultSink): () => void {
    this.sink = sink;
    return () => {
      if (this.sink === sink) this.sink = undefined;
    };
  }

  submit(text: string): SubmitOutcome {
    const parsed = CommandQuerySchema.safeParse({ text });
    if (!parsed.success) {
      return { status: "ignored" };
    }
    const query = parsed.data;

    if (isKillPhrase(query.text)) {
      logger.info("Kill phrase submitted – shutting down");
      this.onShutdown();
      return { status: "shutdown" };
    }

    if (this.pending) {
      logger.debug({ pendingRequestId: this.pending.id }, "Request already in flight – rejected");
      return { status: "busy", pendingRequestId: this.pending.id };
    }

    const provider = this.select(this.config.snapshot());
    const request: PendingRequest = {
      id: uuidv4(),
      query,
      controller: new AbortController(),
      startedAt: Date.now(),
    };
    this.pending = request;
    this.display.showPending(PENDING_PLACEHOLDER);

    logger.info({ requestId: request.id, provider: provider.name }, "Request dispatched");
    const completion = this.run(provider, request);
    return { status: "dispatched", requestId: request.id, completion };
  }

  /** Abort the in-flight request, if any. Returns whether one was cancelled. */
  cancelPending(): boolean {
    const request = this.pending;
    if (!request) return false;

    this.pending = undefined;
    request.controller.abort();
    this.display.clearPending();
    logger.info({ requestId: request.id }, "Pending request cancelled");
    return true;
  }

  private async run(provider: CommandProvider, request: PendingRequest): Promise<void> {
    let result: CommandResult;
    try {
      result = await provider.generateCommand(request.query.text, request.controller.signal);
    } catch (error) {
      logger.error(
        { requestId: request.id, provider: provider.name, error: errorMessage(error) },
        "Provider threw",
      );
      result = failed("unexpected", errorMessage(error));
    }

    if (this.pending !== request) {
      logger.debug({ requestId: request.id }, "Late result of cancelled request discarded");
      return;
    }

    this.pending = undefined;
    this.display.clearPending();
    logger.info(
      {
        requestId: request.id,
        ok: result.ok,
        kind: result.ok ? undefined : result.kind,
        durationMs: Date.now() - request.startedAt,
      },
      "Request completed",
    );

    try {
      this.sink?.(result, request.query);
    } catch (error) {
      logger.error({ requestId: request.id, error: errorMessage(error) }, "Result sink failed");
    }
  }
}
