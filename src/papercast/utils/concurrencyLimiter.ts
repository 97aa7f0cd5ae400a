import { PapercastError } from "../errors.js";

/**
 * Error thrown when a queued task gives up waiting for a slot.
 */
export class CapacityExceededError extends Error {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super(message);
    this.name = "CapacityExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ConcurrencyLimiterOptions = {
  maxConcurrent: number;
  /** Timeout for waiting in queue (ms). 0 = no timeout */
  queueTimeoutMs?: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
  detach?: () => void;
};

/**
 * Runs at most `maxConcurrent` tasks at once; the rest wait in FIFO order.
 * Used to bound outbound arXiv requests and inbound MCP tool calls.
 */
export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private currentCount = 0;
  private readonly queue: Waiter[] = [];

  constructor(options: number | ConcurrencyLimiterOptions) {
    if (typeof options === "number") {
      this.maxConcurrent = options;
      this.queueTimeoutMs = 0;
    } else {
      this.maxConcurrent = options.maxConcurrent;
      this.queueTimeoutMs = options.queueTimeoutMs ?? 0;
    }
    if (!Number.isInteger(this.maxConcurrent) || this.maxConcurrent < 1) {
      throw new Error("maxConcurrent must be at least 1");
    }
  }

  get running(): number {
    return this.currentCount;
  }

  get queued(): number {
    return this.queue.length;
  }

  get atCapacity(): boolean {
    return this.currentCount >= this.maxConcurrent;
  }

  /**
   * Run a task once a slot is free.
   * @throws CapacityExceededError if the queue wait times out
   * @throws PapercastError CANCELLED if `signal` aborts while waiting
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      throw new PapercastError("CANCELLED", "Cancelled before a slot was acquired");
    }
    if (this.currentCount >= this.maxConcurrent) {
      await this.waitForSlot(signal);
    }

    this.currentCount++;
    try {
      return await task();
    } finally {
      this.currentCount--;
      this.releaseNext();
    }
  }

  private releaseNext(): void {
    const next = this.queue.shift();
    if (!next) return;
    if (next.timeoutId) clearTimeout(next.timeoutId);
    next.detach?.();
    next.resolve();
  }

  private waitForSlot(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const entry: Waiter = { resolve, reject };
      const leave = (err: Error): void => {
        const idx = this.queue.indexOf(entry);
        if (idx !== -1) this.queue.splice(idx, 1);
        if (entry.timeoutId) clearTimeout(entry.timeoutId);
        entry.detach?.();
        reject(err);
      };

      if (this.queueTimeoutMs > 0) {
        entry.timeoutId = setTimeout(() => {
          leave(
            new CapacityExceededError(
              `Queue wait exceeded ${this.queueTimeoutMs}ms timeout`,
              this.queueTimeoutMs
            )
          );
        }, this.queueTimeoutMs);
      }

      if (signal) {
        const onAbort = (): void => leave(new PapercastError("CANCELLED", "Cancelled while waiting for a slot"));
        signal.addEventListener("abort", onAbort, { once: true });
        entry.detach = () => signal.removeEventListener("abort", onAbort);
      }

      this.queue.push(entry);
    });
  }

  /**
   * Reject every waiting task with a capacity error.
   */
  clearQueue(): number {
    const waiting = this.queue.splice(0, this.queue.length);
    for (const entry of waiting) {
      if (entry.timeoutId) clearTimeout(entry.timeoutId);
      entry.detach?.();
      entry.reject(new CapacityExceededError("Queue cleared", 1000));
    }
    return waiting.length;
  }
}
