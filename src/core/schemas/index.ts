import { z } from "zod";

// ── CommandQuery ──────────────────────────────────────────────────────
/** A submitted request: trimmed, never empty. */
export const CommandQuerySchema = z.object({
  text: z.string().trim().min(1),
});
export type CommandQuery = z.infer<typeof CommandQuerySchema>;

/** Phrases typed into the surface that quit the application instead. */
export const KILL_PHRASES = ["exit", "quit"] as const;

export function isKillPhrase(text: string): boolean {
  const normalized = text.trim().toLowerCase();
  return KILL_PHRASES.some((phrase) => phrase === normalized);
}
