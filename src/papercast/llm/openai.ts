/**
 * OpenAI-compatible chat completions client (OpenAI, Azure OpenAI, Ollama,
 * vLLM and other servers exposing `/chat/completions`).
 */

import { z } from "zod";
import type { Dispatcher } from "undici";
import { configError, presentEnv } from "../config.js";
import type { LlmClient, LlmInput, LlmOutput, LlmClientConfig, LlmErrorType } from "./types.js";
import { LlmError } from "./types.js";

const OpenAIEnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2)
});

type ChatMessage = {
  role: "system" | "user";
  content: string;
};

type ChatCompletionResponse = {
  choices?: Array<{
    message?: { content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
  model?: string;
};

type ChatCompletionError = {
  error?: { message?: string };
};

function statusToErrorType(status: number, message: string): LlmErrorType {
  if (status === 401 || status === 403) return "auth_error";
  if (status === 429) return "rate_limited";
  if (status === 400) {
    const lower = message.toLowerCase();
    return lower.includes("context length") || lower.includes("maximum context") ? "context_length" : "invalid_request";
  }
  if (status >= 500) return "provider_error";
  return "unknown";
}

function errorMessageOf(body: string): string | undefined {
  try {
    const parsed = JSON.parse(body) as ChatCompletionError;
    return parsed.error?.message;
  } catch {
    return body.trim() || undefined;
  }
}

function normalizeFinishReason(reason: string | null | undefined): LlmOutput["finishReason"] {
  switch (reason) {
    case "stop":
    case "length":
    case "content_filter":
      return reason;
    case "tool_calls":
    case "function_call":
      return "tool_calls";
    default:
      return undefined;
  }
}

export class OpenAIClient implements LlmClient {
  readonly provider = "openai";
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly defaultTemperature: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(config: LlmClientConfig) {
    if (!config.apiKey) {
      throw new Error("OpenAI client requires apiKey");
    }
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? 60_000;
    this.defaultMaxTokens = config.defaultMaxTokens ?? 2048;
    this.defaultTemperature = config.defaultTemperature ?? 0.2;
    this.dispatcher = config.dispatcher;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async generate(input: LlmInput): Promise<LlmOutput> {
    const messages: ChatMessage[] = [];
    if (input.system) {
      messages.push({ role: "system", content: input.system });
    }
    messages.push({ role: "user", content: input.task });

    const timeoutMs = input.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    input.abortSignal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: input.maxTokens ?? this.defaultMaxTokens,
          temperature: input.temperature ?? this.defaultTemperature
        }),
        signal: controller.signal,
        ...(this.dispatcher !== undefined && { dispatcher: this.dispatcher })
      });

      if (!response.ok) {
        throw await this.toHttpError(response);
      }

      const data = (await response.json()) as ChatCompletionResponse;
      const choice = data.choices?.[0];
      const text = choice?.message?.content ?? "";
      if (!text.trim()) {
        throw new LlmError("empty_response", "Model returned an empty completion", {
          provider: this.provider,
          retryable: true
        });
      }

      const result: LlmOutput = { text };
      const finishReason = normalizeFinishReason(choice?.finish_reason);
      if (finishReason !== undefined) result.finishReason = finishReason;
      if (data.model) result.model = data.model;
      if (data.usage) {
        result.usage = {
          inputTokens: data.usage.prompt_tokens,
          outputTokens: data.usage.completion_tokens,
          totalTokens: data.usage.total_tokens
        };
      }
      return result;
    } catch (err) {
      if (err instanceof LlmError) throw err;
      if (err instanceof Error && err.name === "AbortError") {
        throw timedOut
          ? new LlmError("timeout", `Request timed out after ${timeoutMs}ms`, { provider: this.provider })
          : new LlmError("aborted", "Request cancelled", { provider: this.provider, retryable: false });
      }
      const options = err instanceof Error ? { provider: this.provider, cause: err } : { provider: this.provider };
      throw new LlmError("unknown", err instanceof Error ? err.message : "Unknown error during LLM call", options);
    } finally {
      clearTimeout(timeoutId);
      input.abortSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async toHttpError(response: Response): Promise<LlmError> {
    const status = response.status;
    const message = errorMessageOf(await response.text()) ?? `HTTP ${status}`;
    const type = statusToErrorType(status, message);
    const header = response.headers.get("Retry-After");
    const parsed = header ? Number.parseInt(header, 10) * 1000 : Number.NaN;
    const retryAfterMs = Number.isNaN(parsed) ? (type === "rate_limited" ? 5000 : undefined) : parsed;

    return new LlmError(type, message, {
      provider: this.provider,
      statusCode: status,
      ...(retryAfterMs !== undefined && { retryAfterMs })
    });
  }
}

export type OpenAIEnvOptions = {
  dispatcher?: Dispatcher;
};

/**
 * Create an OpenAI client from environment variables, or null when no key is set.
 * @throws PapercastError CONFIG_ERROR when a variable fails validation
 */
export function createOpenAIClientFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: OpenAIEnvOptions = {}
): OpenAIClient | null {
  const parsed = OpenAIEnvSchema.safeParse(presentEnv(Object.keys(OpenAIEnvSchema.shape), env));
  if (!parsed.success) {
    throw configError(parsed.error);
  }
  const e = parsed.data;
  if (!e.OPENAI_API_KEY) {
    return null;
  }

  return new OpenAIClient({
    apiKey: e.OPENAI_API_KEY,
    model: e.OPENAI_MODEL,
    defaultTimeoutMs: e.OPENAI_TIMEOUT_MS,
    defaultMaxTokens: e.OPENAI_MAX_TOKENS,
    defaultTemperature: e.OPENAI_TEMPERATURE,
    ...(e.OPENAI_BASE_URL !== undefined && { baseUrl: e.OPENAI_BASE_URL }),
    ...(options.dispatcher !== undefined && { dispatcher: options.dispatcher })
  });
}
