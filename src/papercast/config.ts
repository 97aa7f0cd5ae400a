/**
 * Environment-driven configuration, validated with zod.
 */

import { z } from "zod";
import { PapercastError } from "./errors.js";
import type { LogLevel } from "./log.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  PAPERCAST_GATE_TIMEOUT_MS: nonNegativeInt(60_000),
  PAPERCAST_SUMMARY_TIMEOUT_MS: nonNegativeInt(120_000),
  PAPERCAST_LOOKUP_RESULTS: positiveInt(6),
  PAPERCAST_REFERENCE_COUNT: positiveInt(5),
  PAPERCAST_LOOKUP_RETRIES: nonNegativeInt(3),
  PAPERCAST_RETRY_BASE_MS: nonNegativeInt(500),
  PAPERCAST_ARXIV_MAX_CONCURRENT: positiveInt(3),
  PAPERCAST_MAX_CONCURRENT: positiveInt(5),
  PAPERCAST_QUEUE_TIMEOUT_MS: nonNegativeInt(30_000),
  PAPERCAST_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  ARXIV_API_URL: z.string().url().default("http://export.arxiv.org/api/query"),
  PAPERCAST_PROXY_URL: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), "Expected an http(s) proxy URL")
    .optional()
});

export type PapercastConfig = {
  /** Completion gate bound for the reference workflow (0 = unbounded) */
  gateTimeoutMs: number;
  /** Completion gate bound for the summary workflow (0 = unbounded) */
  summaryTimeoutMs: number;
  /** Records fetched per keyword lookup */
  lookupResults: number;
  /** References kept in the synthesized list */
  referenceCount: number;
  /** Retries after the first failed lookup */
  lookupRetries: number;
  /** Base delay for exponential backoff */
  retryBaseMs: number;
  /** Concurrent requests against the arXiv API */
  arxivMaxConcurrent: number;
  /** Concurrent tool calls accepted by the MCP server */
  maxConcurrent: number;
  /** How long an MCP tool call may wait for a slot */
  queueTimeoutMs: number;
  logLevel: LogLevel;
  arxivApiUrl: string;
  /** HTTP(S) proxy for arXiv and model requests. Direct connections when unset */
  proxyUrl?: string;
};

export const DEFAULT_CONFIG: PapercastConfig = loadConfig({});

/**
 * Trimmed values of `keys`, leaving out unset and blank variables so schema
 * defaults apply to them.
 */
export function presentEnv(keys: readonly string[], env: Record<string, string | undefined>): Record<string, string> {
  const present: Record<string, string> = {};
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") present[key] = value.trim();
  }
  return present;
}

export function configError(error: z.ZodError): PapercastError {
  const issues = error.issues.map((i) => ({ key: i.path.join("."), message: i.message }));
  return new PapercastError(
    "CONFIG_ERROR",
    `Invalid configuration: ${issues.map((i) => `${i.key} (${i.message})`).join(", ")}`,
    { issues }
  );
}

/**
 * Build config from an environment map. Unset or empty variables take defaults.
 * @throws PapercastError CONFIG_ERROR when a variable fails validation
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PapercastConfig {
  const parsed = EnvSchema.safeParse(presentEnv(Object.keys(EnvSchema.shape), env));
  if (!parsed.success) {
    throw configError(parsed.error);
  }

  const e = parsed.data;
  return {
    gateTimeoutMs: e.PAPERCAST_GATE_TIMEOUT_MS,
    summaryTimeoutMs: e.PAPERCAST_SUMMARY_TIMEOUT_MS,
    lookupResults: e.PAPERCAST_LOOKUP_RESULTS,
    referenceCount: e.PAPERCAST_REFERENCE_COUNT,
    lookupRetries: e.PAPERCAST_LOOKUP_RETRIES,
    retryBaseMs: e.PAPERCAST_RETRY_BASE_MS,
    arxivMaxConcurrent: e.PAPERCAST_ARXIV_MAX_CONCURRENT,
    maxConcurrent: e.PAPERCAST_MAX_CONCURRENT,
    queueTimeoutMs: e.PAPERCAST_QUEUE_TIMEOUT_MS,
    logLevel: e.PAPERCAST_LOG_LEVEL,
    arxivApiUrl: e.ARXIV_API_URL,
    ...(e.PAPERCAST_PROXY_URL !== undefined && { proxyUrl: e.PAPERCAST_PROXY_URL })
  };
}
