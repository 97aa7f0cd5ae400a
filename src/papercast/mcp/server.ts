import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { DEFAULT_CONFIG, type PapercastConfig } from "../config.js";
import { toPapercastError, type PapercastError } from "../errors.js";
import type { LlmClient } from "../llm/types.js";
import { createLogger, type Logger } from "../log.js";
import { PAPER_FIELDS, isPaperField, type PaperField, type PaperSearch } from "../arxiv/types.js";
import { ConcurrencyLimiter, CapacityExceededError } from "../utils/concurrencyLimiter.js";
import { queryArxiv } from "../workflows/queryTool.js";
import { ReferenceWorkflow } from "../workflows/referenceWorkflow.js";
import { SummaryWorkflow } from "../workflows/summaryWorkflow.js";

export const SERVER_INFO = { name: "papercast", version: "0.1.0" } as const;

type TextContent = { type: "text"; text: string };
type ToolResponse = { content: TextContent[]; isError?: boolean };

const FieldSchema = z.custom<PaperField>((v) => typeof v === "string" && isPaperField(v), {
  message: `Expected one of: ${PAPER_FIELDS.join(", ")}`
});

const QuerySchema = z.object({
  query: z.string().min(1),
  maxResults: z.number().int().positive().max(50).optional(),
  fields: z.array(FieldSchema).min(1).optional()
});

const ReferenceSchema = z.object({
  query: z.string().min(1),
  referenceCount: z.number().int().positive().max(20).optional(),
  output: z.enum(["text", "structured"]).optional(),
  timeoutMs: z.number().int().nonnegative().optional()
});

const SummarySchema = z.object({
  query: z.string().min(1),
  timeoutMs: z.number().int().nonnegative().optional()
});

const TOOLS: Tool[] = [
  {
    name: "arxiv.query",
    description: "Search arXiv and return one formatted record per line",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string" },
        maxResults: { type: "number" },
        fields: { type: "array", items: { type: "string", enum: [...PAPER_FIELDS] } }
      },
      required: ["query"],
      additionalProperties: false
    }
  },
  {
    name: "arxiv.reference",
    description: "Derive arXiv keywords for a topic, look them up concurrently and return the best references",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string" },
        referenceCount: { type: "number" },
        output: { type: "string", enum: ["text", "structured"] },
        timeoutMs: { type: "number" }
      },
      required: ["query"],
      additionalProperties: false
    }
  },
  {
    name: "arxiv.summary",
    description: "Summarize an arXiv paper: key insights, references and future directions",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string" },
        timeoutMs: { type: "number" }
      },
      required: ["query"],
      additionalProperties: false
    }
  }
];

export type McpServerDeps = {
  llm: LlmClient;
  search: PaperSearch;
  config?: Partial<PapercastConfig>;
  /** Ingress limiter. Built from config when omitted */
  limiter?: ConcurrencyLimiter;
  logger?: Logger;
};

function text(value: string): ToolResponse {
  return { content: [{ type: "text", text: value }] };
}

function toErrorResponse(err: PapercastError): ToolResponse {
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify(err.toJSON(), null, 2) }]
  };
}

function capacityResponse(err: CapacityExceededError): ToolResponse {
  return {
    isError: true,
    content: [
      {
        type: "text",
        text: JSON.stringify({ code: "CAPACITY_EXCEEDED", message: err.message, retryAfterMs: err.retryAfterMs }, null, 2)
      }
    ]
  };
}

/**
 * MCP server exposing the query tool and both workflows. Transport is left to
 * the caller (stdio in the binary, in-memory in tests).
 */
export function createMcpServer(deps: McpServerDeps): Server {
  const config: PapercastConfig = { ...DEFAULT_CONFIG, ...deps.config };
  const log = deps.logger ?? createLogger("mcp");
  const limiter =
    deps.limiter ??
    new ConcurrencyLimiter({ maxConcurrent: config.maxConcurrent, queueTimeoutMs: config.queueTimeoutMs });

  const references = new ReferenceWorkflow({
    llm: deps.llm,
    search: deps.search,
    config,
    logger: log.child("reference")
  });
  const summaries = new SummaryWorkflow({
    llm: deps.llm,
    search: deps.search,
    references,
    config,
    logger: log.child("summary")
  });

  const handlers: Record<string, (args: unknown) => Promise<ToolResponse>> = {
    "arxiv.query": async (args) => {
      const input = QuerySchema.parse(args);
      const result = await queryArxiv(deps.search, input.query, {
        ...(input.maxResults !== undefined && { maxResults: input.maxResults }),
        ...(input.fields !== undefined && { fields: input.fields })
      });
      return text(result.text);
    },
    "arxiv.reference": async (args) => {
      const input = ReferenceSchema.parse(args);
      const result = await references.runSafe(input.query, {
        ...(input.output !== undefined && { output: input.output }),
        ...(input.referenceCount !== undefined && { referenceCount: input.referenceCount }),
        ...(input.timeoutMs !== undefined && { timeoutMs: input.timeoutMs })
      });
      if (result.kind === "error") {
        return { isError: true, content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }
      const { output } = result.result;
      return text(typeof output === "string" ? output : JSON.stringify(output, null, 2));
    },
    "arxiv.summary": async (args) => {
      const input = SummarySchema.parse(args);
      const result = await summaries.runSafe(
        input.query,
        input.timeoutMs !== undefined ? { timeoutMs: input.timeoutMs } : {}
      );
      if (result.kind === "error") {
        return { isError: true, content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }
      return text(result.result.text);
    }
  };

  const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: args } = req.params;
    const handler = handlers[name];
    if (!handler) {
      return { content: [{ type: "text", text: `Unknown tool: ${name}` }], isError: true };
    }

    try {
      return await limiter.run(() => handler(args ?? {}));
    } catch (err) {
      if (err instanceof CapacityExceededError) {
        log.warn(`${name} rejected: ${err.message}`);
        return capacityResponse(err);
      }
      const error = toPapercastError(err);
      log.warn(`${name} failed: [${error.code}] ${error.message}`);
      return toErrorResponse(error);
    }
  });

  return server;
}
