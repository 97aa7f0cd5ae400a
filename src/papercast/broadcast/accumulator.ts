/**
 * Per-invocation aggregation state shared by the handlers of one workflow run,
 * plus the completion gate the orchestrator waits on.
 *
 * The gate is notify-on-change: every mutation re-evaluates pending waiters,
 * so there is no polling loop and timeouts are native timers.
 */

import { PapercastError, toPapercastError, type PapercastErrorCode } from "../errors.js";

export type Fragment = {
  text: string;
  /** Handler or sub-query that produced the fragment */
  source?: string;
};

export type HandlerFailure = {
  source?: string;
  error: PapercastError;
};

export type AccumulatorSnapshot = {
  fragments: Fragment[];
  completedCount: number;
  failures: HandlerFailure[];
  /** Fragments joined with newlines, in append order */
  text: string;
};

/**
 * - `fail-fast`: any recorded failure rejects the wait with GATE_FAILED.
 * - `tolerate`: a failure counts as an attempted completion; the gate opens once
 *   completed + failed reaches the required count.
 */
export type FailurePolicy = "fail-fast" | "tolerate";

export type WaitOptions = {
  /** 0 disables the timeout */
  timeoutMs: number;
  signal?: AbortSignal;
  failurePolicy?: FailurePolicy;
};

type Waiter = () => void;

export class Accumulator {
  private readonly fragments: Fragment[] = [];
  private readonly failures: HandlerFailure[] = [];
  private completed = 0;
  private readonly waiters = new Set<Waiter>();

  get completedCount(): number {
    return this.completed;
  }

  get failureCount(): number {
    return this.failures.length;
  }

  append(text: string, source?: string): void {
    this.fragments.push(source === undefined ? { text } : { text, source });
    this.notify();
  }

  increment(): void {
    this.completed++;
    this.notify();
  }

  /**
   * Append a fragment and count the handler as completed in one step, so a
   * waiter never observes the count without the text.
   */
  record(text: string, source?: string): void {
    this.fragments.push(source === undefined ? { text } : { text, source });
    this.completed++;
    this.notify();
  }

  fail(error: unknown, source?: string): void {
    const normalized = toPapercastError(error);
    this.failures.push(source === undefined ? { error: normalized } : { error: normalized, source });
    this.notify();
  }

  snapshot(): AccumulatorSnapshot {
    const fragments = this.fragments.map((f) => ({ ...f }));
    return {
      fragments,
      completedCount: this.completed,
      failures: [...this.failures],
      text: fragments.map((f) => f.text).join("\n")
    };
  }

  /**
   * Suspend until `completedCount >= requiredCount`.
   * @throws PapercastError GATE_TIMEOUT, GATE_FAILED or CANCELLED
   */
  waitUntil(requiredCount: number, options: WaitOptions): Promise<AccumulatorSnapshot> {
    const policy = options.failurePolicy ?? "fail-fast";
    const { timeoutMs, signal } = options;

    return new Promise<AccumulatorSnapshot>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      let settled = false;

      const cleanup = (): void => {
        settled = true;
        this.waiters.delete(check);
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const fail = (code: PapercastErrorCode, message: string, extra: Record<string, unknown>): void => {
        cleanup();
        reject(
          new PapercastError(code, message, {
            requiredCount,
            completedCount: this.completed,
            ...extra
          })
        );
      };

      const check: Waiter = () => {
        if (settled) return;
        if (this.completed >= requiredCount) {
          cleanup();
          resolve(this.snapshot());
          return;
        }
        if (this.failures.length === 0) return;
        if (policy === "fail-fast") {
          fail("GATE_FAILED", `${this.failures.length} handler(s) failed before the gate opened`, {
            failures: this.failures.map((f) => ({ source: f.source, code: f.error.code, message: f.error.message }))
          });
          return;
        }
        if (this.completed + this.failures.length >= requiredCount) {
          cleanup();
          resolve(this.snapshot());
        }
      };

      const onAbort = (): void => {
        if (!settled) fail("CANCELLED", "Cancelled while waiting for handlers", {});
      };

      if (signal?.aborted) {
        fail("CANCELLED", "Cancelled while waiting for handlers", {});
        return;
      }

      check();
      if (settled) return;

      this.waiters.add(check);
      signal?.addEventListener("abort", onAbort, { once: true });
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          fail("GATE_TIMEOUT", `Completion gate not reached within ${timeoutMs}ms`, { timeoutMs });
        }, timeoutMs);
      }
    });
  }

  /** Pending waitUntil calls */
  get waiting(): number {
    return this.waiters.size;
  }

  private notify(): void {
    for (const waiter of [...this.waiters]) waiter();
  }
}
