export type {
  LlmErrorType,
  TokenUsage,
  LlmInput,
  LlmOutput,
  LlmClientConfig,
  LlmClient
} from "./types.js";

export { LlmError, StubLlmClient } from "./types.js";

export { OpenAIClient, createOpenAIClientFromEnv, type OpenAIEnvOptions } from "./openai.js";

import { PapercastError } from "../errors.js";
import { StubLlmClient } from "./types.js";
import { createOpenAIClientFromEnv, type OpenAIEnvOptions } from "./openai.js";
import type { LlmClient } from "./types.js";

/**
 * Create an LLM client from environment variables.
 * Returns StubLlmClient if no provider key is configured.
 */
export function createLlmClientFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: OpenAIEnvOptions = {}
): LlmClient {
  return createOpenAIClientFromEnv(env, options) ?? new StubLlmClient();
}

/**
 * @throws PapercastError CONFIG_ERROR for a client that cannot generate
 */
export function requireConfigured(client: LlmClient): void {
  if (!client.isConfigured()) {
    throw new PapercastError(
      "CONFIG_ERROR",
      `Language model "${client.provider}" is not configured. Set OPENAI_API_KEY.`
    );
  }
}

export type CompleteOptions = {
  system?: string;
  signal?: AbortSignal;
  maxTokens?: number;
  temperature?: number;
};

/**
 * Prompt in, completion text out.
 */
export async function complete(client: LlmClient, prompt: string, options: CompleteOptions = {}): Promise<string> {
  const output = await client.generate({
    task: prompt,
    ...(options.system !== undefined && { system: options.system }),
    ...(options.signal !== undefined && { abortSignal: options.signal }),
    ...(options.maxTokens !== undefined && { maxTokens: options.maxTokens }),
    ...(options.temperature !== undefined && { temperature: options.temperature })
  });
  return output.text;
}
