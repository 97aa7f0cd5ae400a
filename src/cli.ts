#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import process from "node:process";
import chalk from "chalk";
import { loadConfig, type PapercastConfig } from "./papercast/config.js";
import { toPapercastError, type PapercastError } from "./papercast/errors.js";
import { createLlmClientFromEnv, type LlmClient } from "./papercast/llm/index.js";
import { createLogger, setLogLevel } from "./papercast/log.js";
import { ArxivClient } from "./papercast/arxiv/client.js";
import { isPaperField, type PaperField } from "./papercast/arxiv/types.js";
import { createProxyDispatcher } from "./papercast/utils/proxy.js";
import { queryArxiv, DEFAULT_QUERY_RESULTS } from "./papercast/workflows/queryTool.js";
import { ReferenceWorkflow } from "./papercast/workflows/referenceWorkflow.js";
import { SummaryWorkflow } from "./papercast/workflows/summaryWorkflow.js";
import type { WorkflowEvent } from "./papercast/workflows/types.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,
  MALFORMED: 20, // Model reply did not match the expected layout
  ERROR: 30,
  CANCELLED: 40 // SIGINT/SIGTERM
} as const;

type RunContext = {
  config: PapercastConfig;
  search: ArxivClient;
  /** Built on first use so `query` runs without model settings */
  llm: () => LlmClient;
  signal: AbortSignal;
};

const log = createLogger("cli");

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

function fieldList(value: string): PaperField[] {
  const fields: PaperField[] = [];
  for (const raw of value.split(",")) {
    const name = raw.trim();
    if (!name) continue;
    if (!isPaperField(name)) {
      throw new InvalidArgumentError(`Unknown field "${name}".`);
    }
    fields.push(name);
  }
  if (fields.length === 0) {
    throw new InvalidArgumentError("Expected at least one field.");
  }
  return fields;
}

function errorToExitCode(error: PapercastError): number {
  switch (error.code) {
    case "MALFORMED_MODEL_OUTPUT":
      return EXIT_CODES.MALFORMED;
    case "CANCELLED":
      return EXIT_CODES.CANCELLED;
    default:
      return EXIT_CODES.ERROR;
  }
}

function traceEvent(event: WorkflowEvent): void {
  switch (event.type) {
    case "handler_completed":
      process.stderr.write(chalk.dim(`  ✓ ${event.source} (${event.durationMs}ms)\n`));
      break;
    case "handler_failed":
      process.stderr.write(chalk.yellow(`  ✗ ${event.source}: [${event.error.code}] ${event.error.message}\n`));
      break;
    case "gate_released":
      process.stderr.write(chalk.dim(`  ${event.completedCount}/${event.requiredCount} complete\n`));
      break;
    default:
      break;
  }
}

/**
 * Load config, wire the arXiv client and cancel on SIGINT/SIGTERM, then run
 * `body` and exit with the mapped code.
 */
async function execute(body: (ctx: RunContext) => Promise<void>): Promise<void> {
  const abortController = new AbortController();
  let cancelled = false;

  const handleSignal = (signal: string): void => {
    if (cancelled) {
      // Force exit on second signal
      process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
      process.exit(EXIT_CODES.CANCELLED);
    }
    cancelled = true;
    process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
    abortController.abort();
  };

  process.on("SIGINT", () => handleSignal("SIGINT"));
  process.on("SIGTERM", () => handleSignal("SIGTERM"));

  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    const dispatcher = createProxyDispatcher(config.proxyUrl);
    const search = new ArxivClient({
      baseUrl: config.arxivApiUrl,
      maxConcurrent: config.arxivMaxConcurrent,
      logger: log.child("arxiv"),
      ...(dispatcher !== undefined && { dispatcher })
    });
    const llm = (): LlmClient => createLlmClientFromEnv(process.env, dispatcher !== undefined ? { dispatcher } : {});

    await body({ config, search, llm, signal: abortController.signal });
    process.exit(cancelled ? EXIT_CODES.CANCELLED : EXIT_CODES.OK);
  } catch (err) {
    const error = toPapercastError(err);
    process.stderr.write(chalk.red(`✗ [${error.code}] ${error.message}\n`));
    process.exit(cancelled ? EXIT_CODES.CANCELLED : errorToExitCode(error));
  }
}

const program = new Command();

program.name("papercast").description("Concurrent arXiv research workflows").version("0.1.0");

program
  .command("query")
  .description("Search arXiv and print one record per line")
  .argument("<text>", "Search query")
  .option("--results <n>", "Number of records", positiveInt, DEFAULT_QUERY_RESULTS)
  .option("--fields <list>", "Comma-separated record fields", fieldList)
  .option("--json", "Output records as JSON", false)
  .action(async (text: string, opts: { results: number; fields?: PaperField[]; json: boolean }) => {
    await execute(async ({ search, signal }) => {
      const result = await queryArxiv(search, text, {
        maxResults: opts.results,
        signal,
        ...(opts.fields !== undefined && { fields: opts.fields })
      });
      if (opts.json) {
        process.stdout.write(JSON.stringify(result.records, null, 2) + "\n");
      } else {
        process.stdout.write(result.text + "\n");
      }
    });
  });

program
  .command("references")
  .description("Derive keywords, look them up concurrently and list the best references")
  .argument("<text>", "Topic or paper description")
  .option("--count <n>", "References to keep", positiveInt)
  .option("--timeout <ms>", "Completion gate bound in ms (0 = none)", nonNegativeInt)
  .option("--json", "Output the parsed reference list as JSON", false)
  .option("--verbose", "Trace lookups on stderr", false)
  .action(
    async (text: string, opts: { count?: number; timeout?: number; json: boolean; verbose: boolean }) => {
      await execute(async ({ config, search, llm, signal }) => {
        const workflow = new ReferenceWorkflow({ llm: llm(), search, config });
        process.stderr.write(chalk.blue(`Looking up references for "${text}"\n`));

        const common = {
          signal,
          ...(opts.count !== undefined && { referenceCount: opts.count }),
          ...(opts.timeout !== undefined && { timeoutMs: opts.timeout }),
          ...(opts.verbose && { events: { onEvent: traceEvent } })
        };
        if (opts.json) {
          const result = await workflow.run(text, { ...common, output: "structured" });
          process.stdout.write(JSON.stringify(result.output, null, 2) + "\n");
        } else {
          const result = await workflow.run(text, common);
          process.stdout.write(result.output + "\n");
        }
      });
    }
  );

program
  .command("summary")
  .description("Summarize an arXiv paper with insights, references and future directions")
  .argument("<text>", "Paper title or search query")
  .option("--timeout <ms>", "Completion gate bound in ms (0 = none)", nonNegativeInt)
  .option("--verbose", "Trace section writers on stderr", false)
  .action(async (text: string, opts: { timeout?: number; verbose: boolean }) => {
    await execute(async ({ config, search, llm, signal }) => {
      const workflow = new SummaryWorkflow({ llm: llm(), search, config });
      process.stderr.write(chalk.blue(`Summarizing "${text}"\n`));

      const result = await workflow.run(text, {
        signal,
        ...(opts.timeout !== undefined && { timeoutMs: opts.timeout }),
        ...(opts.verbose && { events: { onEvent: traceEvent } })
      });
      process.stdout.write(result.text + "\n");
      process.stderr.write(chalk.green(`✓ Done in ${result.durationMs}ms\n`));
    });
  });

await program.parseAsync(process.argv);
