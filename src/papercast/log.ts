import process from "node:process";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export type LogSink = (line: string) => void;

/**
 * Log to stderr only (never stdout): the CLI prints results on stdout and the
 * MCP server owns it for JSON-RPC framing.
 */
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

let threshold: LogLevel = "warn";
let sink: LogSink = stderrSink;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Replace the output sink. Returns a function that restores the previous one.
 */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
  child(scope: string): Logger;
};

function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, "silent">, msg: string): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    sink(`[papercast:${scope}] ${level.toUpperCase()} ${msg}`);
  };

  return {
    debug: (msg) => write("debug", msg),
    info: (msg) => write("info", msg),
    warn: (msg) => write("warn", msg),
    error: (msg, err) => write("error", err === undefined ? msg : `${msg}: ${describe(err)}`),
    child: (sub) => createLogger(`${scope}:${sub}`)
  };
}
