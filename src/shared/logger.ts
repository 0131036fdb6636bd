import pino from "pino";

/**
 * Module logger. Writes to stderr so log lines never land on the
 * terminal line the spotlight surface is drawing on stdout.
 */
export function createLogger(name: string): pino.Logger {
  return pino(
    { name, level: process.env["LOG_LEVEL"] ?? "info" },
    pino.destination(2),
  );
}
