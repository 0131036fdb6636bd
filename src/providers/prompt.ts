export const SYSTEM_INSTRUCTION =
  "You are a command line expert. The user needs a terminal command. " +
  "Return ONLY the exact command string. Do not use markdown. " +
  "Do not explain. Do not add quotes. " +
  "Example - User: 'list files' -> Response: ls -la";

/** Shorter instruction for chat-style backends that take a separate system message. */
export const CHAT_SYSTEM_INSTRUCTION =
  "You are a command line expert. Return ONLY the exact terminal command, no explanations, no markdown.";

/** Completion-style prompt for the local backend. */
export function buildCompletionPrompt(query: string): string {
  return `${SYSTEM_INSTRUCTION}\nUser: ${query}\nResponse:`;
}

/** Single-turn prompt for backends without a system role. */
export function buildSingleTurnPrompt(query: string): string {
  return (
    "You are a command line expert. Return ONLY the exact terminal command for this request, " +
    `no explanations, no markdown:\n\n${query}`
  );
}

/** Drop ```bash / ``` fence markers a model sometimes wraps its answer in. */
export function stripMarkdownFences(text: string): string {
  return text.replaceAll("```bash", "").replaceAll("```", "").trim();
}

export const REQUEST_TIMEOUT_MS = 30_000;
export const TEMPERATURE = 0.3;
export const MAX_OUTPUT_TOKENS = 100;
