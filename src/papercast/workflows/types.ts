/**
 * Workflow result and event contracts.
 */

import type { PapercastErrorCode } from "../errors.js";
import type { FailurePolicy } from "../broadcast/accumulator.js";
import type { Reference } from "../parsing/references.js";
import type { PaperRecordView } from "../arxiv/types.js";

export type WorkflowName = "reference" | "summary";

export type ReferenceOutputFormat = "text" | "structured";

export type ReferenceRunOptions = {
  /** "text" (default) returns the validated model reply; "structured" the parsed list */
  output?: ReferenceOutputFormat;
  /** References to keep in the synthesized list */
  referenceCount?: number;
  /** Completion gate bound in ms (0 = unbounded) */
  timeoutMs?: number;
  failurePolicy?: FailurePolicy;
  signal?: AbortSignal;
  events?: WorkflowEventOptions;
};

export type ReferenceResult<TOutput> = {
  runId: string;
  output: TOutput;
  keywords: string[];
  /** Lookup handlers that completed */
  completedCount: number;
  /** Lookup handlers that failed (only non-zero under the tolerate policy) */
  failedCount: number;
  durationMs: number;
};

export type ReferenceOutput = string | Reference[];

export type SummaryRunOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
  events?: WorkflowEventOptions;
};

export type SummarySectionName = "insights" | "references" | "directions";

export type SummaryResult = {
  runId: string;
  /** Paper metadata followed by the three sections, in that order */
  text: string;
  paper: PaperRecordView;
  sections: Record<SummarySectionName, string>;
  completedCount: number;
  durationMs: number;
};

// ============================================================================
// Workflow Events
// ============================================================================

export type WorkflowEventBase = {
  timestamp: string;
  runId: string;
  workflow: WorkflowName;
};

export type RunStartedEvent = WorkflowEventBase & {
  type: "run_started";
  query: string;
};

export type HandlerCompletedEvent = WorkflowEventBase & {
  type: "handler_completed";
  topic: string;
  source: string;
  durationMs: number;
};

export type HandlerFailedEvent = WorkflowEventBase & {
  type: "handler_failed";
  topic: string;
  source: string;
  durationMs: number;
  error: { code: PapercastErrorCode; message: string };
};

export type GateReleasedEvent = WorkflowEventBase & {
  type: "gate_released";
  requiredCount: number;
  completedCount: number;
  failedCount: number;
};

export type RunCompletedEvent = WorkflowEventBase & {
  type: "run_completed";
  resultKind: "ok" | "error";
  durationMs: number;
  error?: { code: PapercastErrorCode; message: string };
};

export type WorkflowEvent =
  | RunStartedEvent
  | HandlerCompletedEvent
  | HandlerFailedEvent
  | GateReleasedEvent
  | RunCompletedEvent;

export type WorkflowEventHandler = (event: WorkflowEvent) => void | Promise<void>;

export type WorkflowEventOptions = {
  onEvent?: WorkflowEventHandler;
  /** Set false to skip per-handler events */
  emitHandlerEvents?: boolean;
};
