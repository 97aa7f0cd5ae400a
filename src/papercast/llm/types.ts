/**
 * Language-model collaborator: one prompt in, one completion out.
 * Provider errors are normalized to LlmError so workflows can classify them.
 */

import type { Dispatcher } from "undici";

export type LlmErrorType =
  | "rate_limited"      // Provider rate limit hit
  | "timeout"           // Request timed out
  | "aborted"           // Caller cancelled
  | "auth_error"        // Invalid API key
  | "invalid_request"   // Malformed request (terminal)
  | "provider_error"    // Provider-side issue (5xx)
  | "context_length"    // Prompt too long for model
  | "empty_response"    // No completion text returned
  | "unknown";

export class LlmError extends Error {
  readonly type: LlmErrorType;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly provider?: string;
  readonly statusCode?: number;

  constructor(
    type: LlmErrorType,
    message: string,
    options?: {
      retryable?: boolean;
      retryAfterMs?: number;
      provider?: string;
      statusCode?: number;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "LlmError";
    this.type = type;
    this.retryable = options?.retryable ?? (type === "rate_limited" || type === "timeout" || type === "provider_error");
    if (options?.retryAfterMs !== undefined) {
      this.retryAfterMs = options.retryAfterMs;
    }
    if (options?.provider !== undefined) {
      this.provider = options.provider;
    }
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.message,
      retryable: this.retryable,
      ...(this.retryAfterMs !== undefined && { retryAfterMs: this.retryAfterMs }),
      ...(this.provider !== undefined && { provider: this.provider }),
      ...(this.statusCode !== undefined && { statusCode: this.statusCode })
    };
  }
}

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens?: number;
};

export type LlmInput = {
  /** Preset / system prompt */
  system?: string;
  /** The prompt */
  task: string;
  maxTokens?: number;
  temperature?: number;
  abortSignal?: AbortSignal;
  timeoutMs?: number;
};

export type LlmOutput = {
  text: string;
  usage?: TokenUsage;
  model?: string;
  finishReason?: "stop" | "length" | "content_filter" | "tool_calls";
};

export type LlmClientConfig = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
  /** undici dispatcher for outbound requests, e.g. a proxy agent */
  dispatcher?: Dispatcher;
};

export interface LlmClient {
  generate(input: LlmInput): Promise<LlmOutput>;

  isConfigured(): boolean;

  readonly provider: string;

  readonly model: string;
}

/**
 * Placeholder used when no provider key is configured. Workflows refuse to run
 * against it (see `requireConfigured`).
 */
export class StubLlmClient implements LlmClient {
  readonly provider = "stub";
  readonly model = "none";

  generate(_input: LlmInput): Promise<LlmOutput> {
    return Promise.reject(
      new LlmError("auth_error", "No language model configured. Set OPENAI_API_KEY.", { provider: this.provider })
    );
  }

  isConfigured(): boolean {
    return false;
  }
}
