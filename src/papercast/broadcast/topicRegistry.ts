/**
 * Topic registry: named topics, each with an ordered list of handlers.
 *
 * `publish` starts every handler registered on the topic at that moment, all
 * concurrently, and never rejects. A failing handler is logged, handed to
 * `onHandlerError`, and does not affect its siblings.
 */

import { toPapercastError, type PapercastError } from "../errors.js";
import { createLogger, type Logger } from "../log.js";
import { ConcurrencyLimiter } from "../utils/concurrencyLimiter.js";

export type HandlerContext = {
  topic: string;
  /** Position of the handler in the topic's list at publish time */
  index: number;
  /** The registry's signal. Never aborts when the registry was built without one */
  signal: AbortSignal;
};

export type TopicHandler<TPayload> = (payload: TPayload, context: HandlerContext) => void | Promise<void>;

export type HandlerOutcome = {
  topic: string;
  index: number;
  status: "fulfilled" | "rejected";
  error?: PapercastError;
  durationMs: number;
};

export type PublishReport = {
  topic: string;
  outcomes: HandlerOutcome[];
  fulfilled: number;
  rejected: number;
};

export type HandlerErrorInfo<TPayload> = {
  topic: string;
  index: number;
  payload: TPayload;
};

export type TopicRegistryOptions<TPayload = string> = {
  /** Upper bound on handlers of this registry running at once. Unbounded when omitted */
  maxConcurrentHandlers?: number;
  onHandlerError?: (error: PapercastError, info: HandlerErrorInfo<TPayload>) => void;
  signal?: AbortSignal;
  logger?: Logger;
};

type Registration<TPayload> = {
  handler: TopicHandler<TPayload>;
};

export class TopicRegistry<TPayload = string> {
  private readonly topicsByName = new Map<string, Array<Registration<TPayload>>>();
  private readonly limiter: ConcurrencyLimiter | undefined;
  private readonly onHandlerError: TopicRegistryOptions<TPayload>["onHandlerError"];
  private readonly signal: AbortSignal;
  private readonly log: Logger;

  constructor(options: TopicRegistryOptions<TPayload> = {}) {
    this.limiter =
      options.maxConcurrentHandlers !== undefined
        ? new ConcurrencyLimiter(options.maxConcurrentHandlers)
        : undefined;
    this.onHandlerError = options.onHandlerError;
    this.signal = options.signal ?? new AbortController().signal;
    this.log = options.logger ?? createLogger("topics");
  }

  /**
   * Append `handler` to `topic`, creating the topic if needed. No deduplication:
   * the same function registered twice runs twice per publish.
   * Returns a function that removes this registration only.
   */
  register(topic: string, handler: TopicHandler<TPayload>): () => boolean {
    let list = this.topicsByName.get(topic);
    if (!list) {
      list = [];
      this.topicsByName.set(topic, list);
    }
    const registration: Registration<TPayload> = { handler };
    list.push(registration);
    this.log.debug(`registered handler #${list.length - 1} on ${topic}`);

    return () => {
      const current = this.topicsByName.get(topic);
      if (!current) return false;
      const idx = current.indexOf(registration);
      if (idx === -1) return false;
      current.splice(idx, 1);
      return true;
    };
  }

  /**
   * Invoke every handler currently registered on `topic` with `payload`.
   * Handlers added while this publish is in flight run from the next publish on.
   */
  async publish(topic: string, payload: TPayload): Promise<PublishReport> {
    const handlers = [...(this.topicsByName.get(topic) ?? [])];
    if (handlers.length === 0) {
      this.log.debug(`publish on ${topic}: no handlers`);
      return { topic, outcomes: [], fulfilled: 0, rejected: 0 };
    }

    this.log.debug(`publish on ${topic}: ${handlers.length} handler(s)`);
    const outcomes = await Promise.all(
      handlers.map((registration, index) => this.invoke(topic, index, registration.handler, payload))
    );
    const rejected = outcomes.filter((o) => o.status === "rejected").length;
    return { topic, outcomes, fulfilled: outcomes.length - rejected, rejected };
  }

  handlerCount(topic: string): number {
    return this.topicsByName.get(topic)?.length ?? 0;
  }

  topics(): string[] {
    return [...this.topicsByName.keys()];
  }

  /**
   * Drop all handlers for `topic`, or for every topic when omitted.
   */
  clear(topic?: string): void {
    if (topic === undefined) {
      this.topicsByName.clear();
    } else {
      this.topicsByName.delete(topic);
    }
  }

  private async invoke(
    topic: string,
    index: number,
    handler: TopicHandler<TPayload>,
    payload: TPayload
  ): Promise<HandlerOutcome> {
    const context: HandlerContext = { topic, index, signal: this.signal };
    const start = Date.now();
    // Defer to a microtask so a synchronous throw is handled like a rejection
    // and no handler runs inside the publisher's stack frame.
    const call = async (): Promise<void> => {
      await Promise.resolve();
      await handler(payload, context);
    };

    try {
      if (this.limiter) {
        await this.limiter.run(call);
      } else {
        await call();
      }
      return { topic, index, status: "fulfilled", durationMs: Date.now() - start };
    } catch (err) {
      const error = toPapercastError(err);
      this.log.warn(`handler #${index} on ${topic} failed: [${error.code}] ${error.message}`);
      this.reportFailure(error, { topic, index, payload });
      return { topic, index, status: "rejected", error, durationMs: Date.now() - start };
    }
  }

  private reportFailure(error: PapercastError, info: HandlerErrorInfo<TPayload>): void {
    if (!this.onHandlerError) return;
    try {
      this.onHandlerError(error, info);
    } catch (hookErr) {
      this.log.error(`onHandlerError hook threw for ${info.topic}#${info.index}`, hookErr);
    }
  }
}
