import { afterEach, describe, expect, it, vi } from "vitest";
import { ProxyAgent } from "undici";
import { OpenAIClient, createOpenAIClientFromEnv } from "../src/papercast/llm/openai.js";
import { LlmError, StubLlmClient } from "../src/papercast/llm/types.js";
import { complete, createLlmClientFromEnv, requireConfigured } from "../src/papercast/llm/index.js";
import { PapercastError } from "../src/papercast/errors.js";

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json", ...headers } });
}

async function generateError(client: OpenAIClient): Promise<LlmError> {
  try {
    await client.generate({ task: "hi" });
  } catch (err) {
    if (err instanceof LlmError) return err;
    throw err;
  }
  throw new Error("expected an LlmError");
}

describe("OpenAIClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const client = (): OpenAIClient =>
    new OpenAIClient({ apiKey: "test-secret", model: "test-model", baseUrl: "http://llm.test/v1/" });

  it("posts a chat completion and returns the text", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({
        choices: [{ message: { content: "[query]: a, b, c" }, finish_reason: "stop" }],
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
        model: "test-model"
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const output = await client().generate({ system: "be brief", task: "keywords please", maxTokens: 64 });

    expect(output).toEqual({
      text: "[query]: a, b, c",
      finishReason: "stop",
      model: "test-model",
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 }
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://llm.test/v1/chat/completions");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "keywords please" }
      ],
      max_tokens: 64,
      temperature: 0.2
    });
  });

  it("maps 429 to a retryable rate_limited error with Retry-After", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: { message: "Too many requests" } }, 429, { "Retry-After": "7" }))
    );

    const err = await generateError(client());
    expect(err.type).toBe("rate_limited");
    expect(err.retryable).toBe(true);
    expect(err.retryAfterMs).toBe(7000);
    expect(err.statusCode).toBe(429);
    expect(err.message).toBe("Too many requests");
  });

  it("maps 401 to a terminal auth_error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ error: { message: "bad key" } }, 401)));

    const err = await generateError(client());
    expect(err.type).toBe("auth_error");
    expect(err.retryable).toBe(false);
  });

  it("detects context length errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: { message: "This model's maximum context length is 8192 tokens" } }, 400))
    );

    expect((await generateError(client())).type).toBe("context_length");
  });

  it("uses a plain-text error body as the message", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("upstream exploded", { status: 502 })));

    const err = await generateError(client());
    expect(err.type).toBe("provider_error");
    expect(err.message).toBe("upstream exploded");
  });

  it("treats an empty completion as a retryable empty_response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [{ message: { content: "  " } }] })));

    const err = await generateError(client());
    expect(err.type).toBe("empty_response");
    expect(err.retryable).toBe(true);
  });

  it("reports a caller abort as aborted", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener("abort", () => {
              const abort = new Error("The operation was aborted");
              abort.name = "AbortError";
              reject(abort);
            });
          })
      )
    );
    const controller = new AbortController();
    const pending = client().generate({ task: "hi", abortSignal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ type: "aborted", retryable: false });
  });
});

describe("client factory", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns null without an API key", () => {
    expect(createOpenAIClientFromEnv({})).toBeNull();
  });

  it("reads model and base url from the environment", () => {
    const llm = createOpenAIClientFromEnv({ OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "local-model" });
    expect(llm?.model).toBe("local-model");
    expect(llm?.isConfigured()).toBe(true);
  });

  it("reads numeric settings and passes the dispatcher to every request", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: "ok" }, finish_reason: "stop" }] })
    );
    vi.stubGlobal("fetch", fetchMock);
    const dispatcher = new ProxyAgent("http://127.0.0.1:3128");

    try {
      const llm = createOpenAIClientFromEnv(
        { OPENAI_API_KEY: "test-secret", OPENAI_MAX_TOKENS: "256", OPENAI_TEMPERATURE: "0" },
        { dispatcher }
      );
      await llm?.generate({ task: "hi" });

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init).toMatchObject({ dispatcher });
      expect(JSON.parse(String(init?.body))).toMatchObject({ model: "gpt-4o-mini", max_tokens: 256, temperature: 0 });
    } finally {
      await dispatcher.close();
    }
  });

  it("rejects a non-numeric timeout with CONFIG_ERROR", () => {
    let error: unknown;
    try {
      createOpenAIClientFromEnv({ OPENAI_API_KEY: "test-secret", OPENAI_TIMEOUT_MS: "soon" });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(PapercastError);
    expect(error).toMatchObject({ code: "CONFIG_ERROR", details: { issues: [{ key: "OPENAI_TIMEOUT_MS" }] } });
  });

  it("falls back to the stub client", async () => {
    const llm = createLlmClientFromEnv({});
    expect(llm).toBeInstanceOf(StubLlmClient);
    expect(() => requireConfigured(llm)).toThrow("Set OPENAI_API_KEY");
    await expect(llm.generate({ task: "x" })).rejects.toBeInstanceOf(LlmError);
  });

  it("complete forwards the prompt and returns the text", async () => {
    const generate = vi.fn(async () => ({ text: "done" }));
    const llm = { provider: "fake", model: "fake", isConfigured: () => true, generate };

    await expect(complete(llm, "prompt", { system: "sys" })).resolves.toBe("done");
    expect(generate).toHaveBeenCalledWith({ task: "prompt", system: "sys" });
  });
});
