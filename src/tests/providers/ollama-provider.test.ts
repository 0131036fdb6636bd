import { describe, it, expect, beforeEach } from "vitest";
import { OllamaProvider } from "../../providers/ollama-provider.js";
import { buildCompletionPrompt } from "../../providers/prompt.js";
import { renderResult } from "../../providers/result.js";
import {
  connectionRefused,
  hangingFetch,
  jsonResponse,
  namedError,
  sentBody,
  stubFetch,
} from "./helpers.js";

describe("OllamaProvider", () => {
  let fetchMock: ReturnType<typeof stubFetch>;

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  function provider(timeoutMs?: number): OllamaProvider {
    return new OllamaProvider({ baseUrl: "http://localhost:11434", model: "llama3.2", timeoutMs });
  }

  it("should post a non-streaming generate request and return the command", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ response: "ls -la" }));

    const result = await provider().generateCommand("list files");

    expect(result).toEqual({ ok: true, command: "ls -la" });
    expect(fetchMock).toHaveBeenCalledOnce();
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:11434/api/generate");
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe("POST");
    expect(sentBody(fetchMock)).toEqual({
      model: "llama3.2",
      prompt: buildCompletionPrompt("list files"),
      stream: false,
    });
  });

  it("should build the prompt from the instruction and the query", () => {
    expect(buildCompletionPrompt("list files")).toMatch(/^You are a command line expert\./);
    expect(buildCompletionPrompt("list files")).toMatch(/\nUser: list files\nResponse:$/);
  });

  it("should not double the slash of a trailing-slash base URL", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ response: "pwd" }));

    await new OllamaProvider({ baseUrl: "http://127.0.0.1:11434/", model: "m" }).generateCommand("where am i");

    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://127.0.0.1:11434/api/generate");
  });

  it("should strip bash fences from the answer", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ response: "```bash\nls -la\n```" }));

    const result = await provider().generateCommand("list files");

    expect(result).toEqual({ ok: true, command: "ls -la" });
  });

  it("should report an empty answer", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ response: "  ```  " }));

    const result = await provider().generateCommand("list files");

    expect(result).toEqual({
      ok: false,
      kind: "empty_response",
      message: "Empty response from Ollama",
    });
  });

  it("should treat a missing response field as empty", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ done: true }));

    const result = await provider().generateCommand("list files");

    expect(result.ok).toBe(false);
    expect(renderResult(result)).toBe("# Error: Empty response from Ollama");
  });

  it("should tell the user to start Ollama when the connection is refused", async () => {
    fetchMock.mockRejectedValueOnce(connectionRefused());

    const result = await provider().generateCommand("list files");

    expect(result).toEqual({
      ok: false,
      kind: "connection_unavailable",
      message: "Ollama not running. Start with 'ollama serve'",
    });
  });

  it("should time out a request that never answers", async () => {
    fetchMock.mockImplementationOnce(hangingFetch);

    const result = await provider(20).generateCommand("list files");

    expect(result).toEqual({ ok: false, kind: "timeout", message: "Ollama request timed out" });
  });

  it("should report cancellation when the caller aborts", async () => {
    fetchMock.mockImplementationOnce(hangingFetch);
    const controller = new AbortController();

    const pending = provider().generateCommand("list files", controller.signal);
    controller.abort();

    expect(await pending).toEqual({ ok: false, kind: "cancelled", message: "Request cancelled" });
  });

  it("should map a non-2xx status to a remote error", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "model not found" }, 404));

    const result = await provider().generateCommand("list files");

    expect(result).toEqual({ ok: false, kind: "remote_error", message: "Ollama API error (404)" });
  });

  it("should report a body that is not an object as malformed", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse("ls"));

    const result = await provider().generateCommand("list files");

    expect(result).toEqual({
      ok: false,
      kind: "unexpected",
      message: "Malformed response from Ollama",
    });
  });

  it("should surface any other failure with its message", async () => {
    fetchMock.mockRejectedValueOnce(namedError("Error", "socket hang up"));

    const result = await provider().generateCommand("list files");

    expect(renderResult(result)).toBe("# Error: socket hang up");
  });
});
