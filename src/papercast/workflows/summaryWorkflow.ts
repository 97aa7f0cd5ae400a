/**
 * Paper summary workflow: looks up one paper, then fans out three section
 * writers on a shared topic (key insights, references, future directions) and
 * joins them once all three have recorded.
 */

import { WorkflowScope } from "../broadcast/scope.js";
import { DEFAULT_CONFIG, type PapercastConfig } from "../config.js";
import { PapercastError, settle, toCancelledError, toPapercastError, type WorkflowResult } from "../errors.js";
import { complete, requireConfigured, type LlmClient } from "../llm/index.js";
import { createLogger, type Logger } from "../log.js";
import { formatRecord } from "../arxiv/format.js";
import type { PaperField, PaperRecordView, PaperSearch } from "../arxiv/types.js";
import { directionsPrompt, insightsPrompt } from "../prompts.js";
import { withRetry } from "../utils/retry.js";
import { emitEvent, isoNow, newRunId } from "./events.js";
import { ReferenceWorkflow } from "./referenceWorkflow.js";
import { linkedController } from "./signals.js";
import type { SummaryResult, SummaryRunOptions, SummarySectionName } from "./types.js";

export const SUMMARY_TOPIC = "summary.sections";
const PAPER_FIELDS: readonly PaperField[] = ["title", "summary"];

export const SECTION_HEADINGS: Record<SummarySectionName, string> = {
  insights: "## Key insights",
  references: "## References",
  directions: "## Future directions"
};

export type SummaryWorkflowDeps = {
  llm: LlmClient;
  search: PaperSearch;
  /** Used for the references section. Built from llm/search/config when omitted */
  references?: ReferenceWorkflow;
  config?: Partial<PapercastConfig>;
  logger?: Logger;
};

type SectionWriter = {
  name: SummarySectionName;
  write: (paper: string, signal: AbortSignal) => Promise<string>;
};

export class SummaryWorkflow {
  private readonly llm: LlmClient;
  private readonly search: PaperSearch;
  private readonly references: ReferenceWorkflow;
  private readonly config: PapercastConfig;
  private readonly log: Logger;

  constructor(deps: SummaryWorkflowDeps) {
    this.llm = deps.llm;
    this.search = deps.search;
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
    this.log = deps.logger ?? createLogger("summary");
    this.references =
      deps.references ??
      new ReferenceWorkflow({
        llm: deps.llm,
        search: deps.search,
        config: this.config,
        logger: this.log.child("references")
      });
  }

  async run(query: string, options: SummaryRunOptions = {}): Promise<SummaryResult> {
    if (!query.trim()) {
      throw new PapercastError("BAD_REQUEST", "Query must not be empty");
    }
    requireConfigured(this.llm);

    const runId = newRunId();
    const startTime = Date.now();
    const { controller, release } = linkedController(options.signal);

    emitEvent(options.events, { type: "run_started", timestamp: isoNow(), runId, workflow: "summary", query });

    try {
      const result = await this.execute(query, options, runId, controller.signal);
      emitEvent(options.events, {
        type: "run_completed",
        timestamp: isoNow(),
        runId,
        workflow: "summary",
        resultKind: "ok",
        durationMs: Date.now() - startTime
      });
      return { ...result, runId, durationMs: Date.now() - startTime };
    } catch (err) {
      const error = controller.signal.aborted ? toCancelledError(err) : toPapercastError(err);
      this.log.warn(`run ${runId} failed: [${error.code}] ${error.message}`);
      emitEvent(options.events, {
        type: "run_completed",
        timestamp: isoNow(),
        runId,
        workflow: "summary",
        resultKind: "error",
        durationMs: Date.now() - startTime,
        error: { code: error.code, message: error.message }
      });
      throw error;
    } finally {
      release();
    }
  }

  runSafe(query: string, options: SummaryRunOptions = {}): Promise<WorkflowResult<SummaryResult>> {
    return settle(() => this.run(query, options));
  }

  private async lookupPaper(query: string, signal: AbortSignal): Promise<PaperRecordView> {
    const records = await withRetry(
      () => this.search.search(query, { maxResults: 1, fields: PAPER_FIELDS, signal }),
      { retries: this.config.lookupRetries, baseDelayMs: this.config.retryBaseMs, signal }
    );
    const paper = records[0];
    if (!paper) {
      throw new PapercastError("PAPER_NOT_FOUND", `No arXiv paper matched "${query}"`, { query });
    }
    return paper;
  }

  private writers(): SectionWriter[] {
    return [
      {
        name: "insights",
        write: (paper, signal) => complete(this.llm, insightsPrompt(paper), { signal })
      },
      {
        name: "references",
        write: async (paper, signal) => {
          const result = await this.references.run(paper, { signal, timeoutMs: this.config.gateTimeoutMs });
          return result.output;
        }
      },
      {
        name: "directions",
        write: (paper, signal) => complete(this.llm, directionsPrompt(paper), { signal })
      }
    ];
  }

  private async execute(
    query: string,
    options: SummaryRunOptions,
    runId: string,
    signal: AbortSignal
  ): Promise<Omit<SummaryResult, "runId" | "durationMs">> {
    const paper = await this.lookupPaper(query, signal);
    const metadata = formatRecord(paper);
    const writers = this.writers();

    const scope = new WorkflowScope<string>({
      signal,
      logger: this.log.child(runId.slice(0, 8)),
      sourceOf: (info) => writers[info.index]?.name ?? `${info.topic}#${info.index}`
    });
    for (const writer of writers) {
      scope.on(SUMMARY_TOPIC, async (paperText, context) => {
        const started = Date.now();
        try {
          const body = await writer.write(paperText, context.signal);
          scope.accumulator.record(`${SECTION_HEADINGS[writer.name]}\n${body.trim()}`, writer.name);
          emitEvent(options.events, {
            type: "handler_completed",
            timestamp: isoNow(),
            runId,
            workflow: "summary",
            topic: context.topic,
            source: writer.name,
            durationMs: Date.now() - started
          });
        } catch (err) {
          const error = toPapercastError(err);
          emitEvent(options.events, {
            type: "handler_failed",
            timestamp: isoNow(),
            runId,
            workflow: "summary",
            topic: context.topic,
            source: writer.name,
            durationMs: Date.now() - started,
            error: { code: error.code, message: error.message }
          });
          throw error;
        }
      });
    }
    scope.dispatch(SUMMARY_TOPIC, metadata);

    const snapshot = await scope.gate(writers.length, options.timeoutMs ?? this.config.summaryTimeoutMs);
    emitEvent(options.events, {
      type: "gate_released",
      timestamp: isoNow(),
      runId,
      workflow: "summary",
      requiredCount: writers.length,
      completedCount: snapshot.completedCount,
      failedCount: snapshot.failures.length
    });

    // Sections appear in registration order, whatever order they finished in.
    const sectionText = (name: SummarySectionName): string => {
      const fragment = snapshot.fragments.find((f) => f.source === name);
      if (!fragment) {
        throw new PapercastError("INTERNAL", `Section "${name}" missing after the gate opened`);
      }
      return fragment.text;
    };
    const sections: Record<SummarySectionName, string> = {
      insights: sectionText("insights"),
      references: sectionText("references"),
      directions: sectionText("directions")
    };

    return {
      text: [metadata, sections.insights, sections.references, sections.directions].join("\n\n"),
      paper,
      sections,
      completedCount: snapshot.completedCount
    };
  }
}
