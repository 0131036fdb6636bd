import { errorCode } from "../shared/errors.js";
import { failed, type CommandResult } from "./result.js";
import { REQUEST_TIMEOUT_MS } from "./prompt.js";

export interface PostJsonOptions {
  headers?: Record<string, string>;
  /** Caller-side cancellation; combined with the request timeout. */
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** POST a JSON body with a hard timeout. */
export async function postJson(
  url: string,
  body: unknown,
  options: PostJsonOptions = {},
): Promise<Response> {
  const timeout = AbortSignal.timeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...options.headers },
    body: JSON.stringify(body),
    signal,
  });
}

// ── Failure classification ────────────────────────────────────────

export type TransportFailure = "timeout" | "cancelled" | "connection" | "other";

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

function errorName(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("name" in error)) {
    return undefined;
  }
  return typeof error.name === "string" ? error.name : undefined;
}

/** Sort a rejected `fetch` (or body read) into the cases providers report. */
export function classifyFetchError(error: unknown): TransportFailure {
  const name = errorName(error);
  if (name === "TimeoutError") return "timeout";
  if (name === "AbortError") return "cancelled";

  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(cause) ?? errorCode(error);
  if (code !== undefined && CONNECTION_CODES.has(code)) return "connection";

  return "other";
}

/** Map a non-2xx status from a cloud API onto a failure result. */
export function statusFailure(label: string, status: number): CommandResult {
  if (status === 401) return failed("unauthorized", `Invalid ${label} API key`);
  if (status === 429) return failed("rate_limited", `${label} rate limit exceeded`);
  return failed("remote_error", `${label} API error (${status})`);
}

export const CANCELLED_MESSAGE = "Request cancelled";
