#!/usr/bin/env node
import process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./papercast/config.js";
import { toPapercastError } from "./papercast/errors.js";
import { createLlmClientFromEnv } from "./papercast/llm/index.js";
import { createLogger, setLogLevel } from "./papercast/log.js";
import { ArxivClient } from "./papercast/arxiv/client.js";
import { createMcpServer } from "./papercast/mcp/server.js";
import { createProxyDispatcher } from "./papercast/utils/proxy.js";

const log = createLogger("mcp");

// Keep serving after a stray failure; the transport is the process lifetime.
process.on("uncaughtException", (err) => {
  log.error("Uncaught exception (server continues)", err);
});

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection (server continues)", reason);
});

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const dispatcher = createProxyDispatcher(config.proxyUrl);
  if (dispatcher) {
    log.info(`Routing outbound requests through ${config.proxyUrl}`);
  }

  const llm = createLlmClientFromEnv(process.env, dispatcher !== undefined ? { dispatcher } : {});
  if (!llm.isConfigured()) {
    log.warn("OPENAI_API_KEY not set: arxiv.reference and arxiv.summary will fail until it is");
  }
  const search = new ArxivClient({
    baseUrl: config.arxivApiUrl,
    maxConcurrent: config.arxivMaxConcurrent,
    logger: log.child("arxiv"),
    ...(dispatcher !== undefined && { dispatcher })
  });

  const server = createMcpServer({ llm, search, config, logger: log });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("Transport connected, server running");

  await new Promise<void>((resolve) => {
    process.stdin.on("close", () => {
      log.info("stdin closed, shutting down");
      resolve();
    });
    process.stdin.on("end", () => {
      log.info("stdin ended, shutting down");
      resolve();
    });
  });
}

main().catch((err: unknown) => {
  const error = toPapercastError(err);
  process.stderr.write(`[papercast:mcp] Fatal startup error: [${error.code}] ${error.message}\n`);
  process.exit(1);
});
