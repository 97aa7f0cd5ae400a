export * from "./papercast/broadcast/index.js";
export * from "./papercast/parsing/index.js";
export * from "./papercast/llm/index.js";
export * from "./papercast/arxiv/index.js";
export * from "./papercast/workflows/index.js";
export { createMcpServer, SERVER_INFO } from "./papercast/mcp/server.js";
export type { McpServerDeps } from "./papercast/mcp/server.js";
export {
  PapercastError,
  isPapercastError,
  toPapercastError,
  toCancelledError,
  okResult,
  errorResult,
  settle
} from "./papercast/errors.js";
export type { PapercastErrorCode, WorkflowResult } from "./papercast/errors.js";
export { loadConfig, DEFAULT_CONFIG } from "./papercast/config.js";
export type { PapercastConfig } from "./papercast/config.js";
export { createLogger, setLogLevel, getLogLevel, setLogSink } from "./papercast/log.js";
export type { Logger, LogLevel, LogSink } from "./papercast/log.js";
export { withRetry, calculateDelay, isRetryable, DEFAULT_RETRY_CONFIG } from "./papercast/utils/retry.js";
export type { RetryConfig, RetryOptions } from "./papercast/utils/retry.js";
export { ConcurrencyLimiter, CapacityExceededError } from "./papercast/utils/concurrencyLimiter.js";
export type { ConcurrencyLimiterOptions } from "./papercast/utils/concurrencyLimiter.js";
export { createProxyDispatcher } from "./papercast/utils/proxy.js";
