/**
 * Reference lookup workflow.
 *
 *   DERIVE_KEYWORDS -> DISPATCH -> WAIT_FOR_COMPLETION -> SYNTHESIZE -> DONE
 *
 * The model derives three arXiv keywords; each is published on the run's
 * lookup topic, where one handler searches arXiv and records the formatted
 * hits. Once all three lookups are in, the model picks the best references.
 */

import { WorkflowScope } from "../broadcast/scope.js";
import { DEFAULT_CONFIG, type PapercastConfig } from "../config.js";
import { PapercastError, settle, toCancelledError, toPapercastError, type WorkflowResult } from "../errors.js";
import { complete, requireConfigured, type LlmClient } from "../llm/index.js";
import { createLogger, type Logger } from "../log.js";
import { formatRecords } from "../arxiv/format.js";
import type { PaperField, PaperSearch } from "../arxiv/types.js";
import { parseKeywords } from "../parsing/keywords.js";
import { parseReferences, type Reference } from "../parsing/references.js";
import { ARXIV_ASSISTANT_PRESET, keywordPrompt, synthesisPrompt } from "../prompts.js";
import { withRetry } from "../utils/retry.js";
import { emitEvent, isoNow, newRunId } from "./events.js";
import { linkedController } from "./signals.js";
import type { ReferenceOutput, ReferenceResult, ReferenceRunOptions } from "./types.js";

export const LOOKUP_TOPIC = "reference.lookup";
export const KEYWORD_COUNT = 3;
const LOOKUP_FIELDS: readonly PaperField[] = ["entry_id", "title"];

export type ReferenceWorkflowDeps = {
  llm: LlmClient;
  search: PaperSearch;
  config?: Partial<PapercastConfig>;
  logger?: Logger;
};

export class ReferenceWorkflow {
  private readonly llm: LlmClient;
  private readonly search: PaperSearch;
  private readonly config: PapercastConfig;
  private readonly log: Logger;

  constructor(deps: ReferenceWorkflowDeps) {
    this.llm = deps.llm;
    this.search = deps.search;
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
    this.log = deps.logger ?? createLogger("reference");
  }

  run(query: string, options: ReferenceRunOptions & { output: "structured" }): Promise<ReferenceResult<Reference[]>>;
  run(query: string, options?: ReferenceRunOptions & { output?: "text" }): Promise<ReferenceResult<string>>;
  run(query: string, options?: ReferenceRunOptions): Promise<ReferenceResult<ReferenceOutput>>;
  async run(query: string, options: ReferenceRunOptions = {}): Promise<ReferenceResult<ReferenceOutput>> {
    if (!query.trim()) {
      throw new PapercastError("BAD_REQUEST", "Query must not be empty");
    }
    requireConfigured(this.llm);

    const runId = newRunId();
    const startTime = Date.now();
    const events = options.events;
    const { controller, release } = linkedController(options.signal);
    const signal = controller.signal;

    emitEvent(events, { type: "run_started", timestamp: isoNow(), runId, workflow: "reference", query });

    try {
      const result = await this.execute(query, options, runId, signal);
      emitEvent(events, {
        type: "run_completed",
        timestamp: isoNow(),
        runId,
        workflow: "reference",
        resultKind: "ok",
        durationMs: Date.now() - startTime
      });
      return { ...result, runId, durationMs: Date.now() - startTime };
    } catch (err) {
      const error = signal.aborted ? toCancelledError(err) : toPapercastError(err);
      this.log.warn(`run ${runId} failed: [${error.code}] ${error.message}`);
      emitEvent(events, {
        type: "run_completed",
        timestamp: isoNow(),
        runId,
        workflow: "reference",
        resultKind: "error",
        durationMs: Date.now() - startTime,
        error: { code: error.code, message: error.message }
      });
      throw error;
    } finally {
      release();
    }
  }

  /**
   * Like `run`, but never throws: failures come back as an error envelope.
   */
  runSafe(query: string, options: ReferenceRunOptions = {}): Promise<WorkflowResult<ReferenceResult<ReferenceOutput>>> {
    return settle(() => this.run(query, options));
  }

  private async execute(
    query: string,
    options: ReferenceRunOptions,
    runId: string,
    signal: AbortSignal
  ): Promise<Omit<ReferenceResult<ReferenceOutput>, "runId" | "durationMs">> {
    const referenceCount = options.referenceCount ?? this.config.referenceCount;
    const timeoutMs = options.timeoutMs ?? this.config.gateTimeoutMs;

    // DERIVE_KEYWORDS
    const keywordReply = await complete(this.llm, keywordPrompt(query, referenceCount, KEYWORD_COUNT), {
      system: ARXIV_ASSISTANT_PRESET,
      signal
    });
    const parsed = parseKeywords(keywordReply);
    if (parsed.length < KEYWORD_COUNT) {
      throw new PapercastError(
        "MALFORMED_MODEL_OUTPUT",
        `Expected ${KEYWORD_COUNT} keywords, got ${parsed.length}`,
        { reply: keywordReply, keywords: parsed }
      );
    }
    const keywords = parsed.slice(0, KEYWORD_COUNT);
    this.log.debug(`run ${runId} keywords: ${keywords.join(" | ")}`);

    // DISPATCH
    const scope = new WorkflowScope<string>({
      signal,
      logger: this.log.child(runId.slice(0, 8)),
      sourceOf: (info) => info.payload
    });
    scope.on(LOOKUP_TOPIC, async (keyword, context) => {
      const started = Date.now();
      try {
        const records = await withRetry(
          () =>
            this.search.search(keyword, {
              maxResults: this.config.lookupResults,
              fields: LOOKUP_FIELDS,
              signal: context.signal
            }),
          {
            retries: this.config.lookupRetries,
            baseDelayMs: this.config.retryBaseMs,
            signal: context.signal,
            onRetry: (err, attempt, delayMs) =>
              this.log.info(`lookup "${keyword}" retry ${attempt} in ${delayMs}ms: ${toPapercastError(err).message}`)
          }
        );
        // Recorded once, after the final attempt, so retries never double-count.
        scope.accumulator.record(formatRecords(records), keyword);
        emitEvent(options.events, {
          type: "handler_completed",
          timestamp: isoNow(),
          runId,
          workflow: "reference",
          topic: context.topic,
          source: keyword,
          durationMs: Date.now() - started
        });
      } catch (err) {
        const error = toPapercastError(err);
        emitEvent(options.events, {
          type: "handler_failed",
          timestamp: isoNow(),
          runId,
          workflow: "reference",
          topic: context.topic,
          source: keyword,
          durationMs: Date.now() - started,
          error: { code: error.code, message: error.message }
        });
        throw error;
      }
    });
    for (const keyword of keywords) {
      scope.dispatch(LOOKUP_TOPIC, keyword);
    }

    // WAIT_FOR_COMPLETION
    const snapshot = await scope.gate(keywords.length, timeoutMs, options.failurePolicy);
    emitEvent(options.events, {
      type: "gate_released",
      timestamp: isoNow(),
      runId,
      workflow: "reference",
      requiredCount: keywords.length,
      completedCount: snapshot.completedCount,
      failedCount: snapshot.failures.length
    });
    if (snapshot.completedCount === 0) {
      throw new PapercastError("LOOKUP_FAILURE", "Every keyword lookup failed", {
        failures: snapshot.failures.map((f) => ({ source: f.source, code: f.error.code, message: f.error.message }))
      });
    }

    // SYNTHESIZE
    const reply = await complete(this.llm, synthesisPrompt(snapshot.text, referenceCount), {
      system: ARXIV_ASSISTANT_PRESET,
      signal
    });
    const references = parseReferences(reply);

    return {
      output: options.output === "structured" ? references : reply.trim(),
      keywords,
      completedCount: snapshot.completedCount,
      failedCount: snapshot.failures.length
    };
  }
}
