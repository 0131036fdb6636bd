/**
 * Outcome of a single provider call.
 *
 * Success and failure are carried as a tagged union; the `# Error:` text
 * convention only exists at display time (see {@link renderResult}).
 */
export type CommandResult =
  | { ok: true; command: string }
  | { ok: false; kind: ProviderErrorKind; message: string };

export const PROVIDER_ERROR_KINDS = [
  "connection_unavailable",
  "timeout",
  "missing_credential",
  "unauthorized",
  "rate_limited",
  "remote_error",
  "empty_response",
  "cancelled",
  "unexpected",
] as const;
export type ProviderErrorKind = (typeof PROVIDER_ERROR_KINDS)[number];

/** Prefix that marks displayed text as an error rather than a command. */
export const ERROR_SENTINEL = "# Error: ";

export function succeeded(command: string): CommandResult {
  return { ok: true, command };
}

export function failed(kind: ProviderErrorKind, message: string): CommandResult {
  return { ok: false, kind, message };
}

/** Text shown to the user for a result. */
export function renderResult(result: CommandResult): string {
  return result.ok ? result.command : `${ERROR_SENTINEL}${result.message}`;
}
