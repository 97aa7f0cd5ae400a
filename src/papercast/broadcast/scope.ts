import { Accumulator, type AccumulatorSnapshot, type FailurePolicy } from "./accumulator.js";
import { TopicRegistry, type HandlerErrorInfo, type PublishReport, type TopicHandler } from "./topicRegistry.js";
import { createLogger, type Logger } from "../log.js";

export type WorkflowScopeOptions<TPayload = string> = {
  signal?: AbortSignal;
  maxConcurrentHandlers?: number;
  logger?: Logger;
  /** Label for a failed invocation on the accumulator. Defaults to `topic#index` */
  sourceOf?: (info: HandlerErrorInfo<TPayload>) => string;
};

/**
 * One workflow invocation's private registry and accumulator. Handler failures
 * reported by the registry are recorded on the accumulator, which trips the gate.
 * Nothing registered here is visible to any other invocation.
 */
export class WorkflowScope<TPayload = string> {
  readonly accumulator = new Accumulator();
  readonly registry: TopicRegistry<TPayload>;
  private readonly signal: AbortSignal | undefined;
  private readonly inflight: Array<Promise<PublishReport>> = [];

  constructor(options: WorkflowScopeOptions<TPayload> = {}) {
    this.signal = options.signal;
    const logger = options.logger ?? createLogger("scope");
    const sourceOf = options.sourceOf ?? ((info: HandlerErrorInfo<TPayload>) => `${info.topic}#${info.index}`);
    this.registry = new TopicRegistry<TPayload>({
      logger,
      ...(options.signal !== undefined && { signal: options.signal }),
      ...(options.maxConcurrentHandlers !== undefined && { maxConcurrentHandlers: options.maxConcurrentHandlers }),
      onHandlerError: (error, info) => this.accumulator.fail(error, sourceOf(info))
    });
  }

  on(topic: string, handler: TopicHandler<TPayload>): () => boolean {
    return this.registry.register(topic, handler);
  }

  /**
   * Start the topic's handlers without waiting for them. Completion is observed
   * through `gate`.
   */
  dispatch(topic: string, payload: TPayload): void {
    this.inflight.push(this.registry.publish(topic, payload));
  }

  gate(
    requiredCount: number,
    timeoutMs: number,
    failurePolicy: FailurePolicy = "fail-fast"
  ): Promise<AccumulatorSnapshot> {
    return this.accumulator.waitUntil(requiredCount, {
      timeoutMs,
      failurePolicy,
      ...(this.signal !== undefined && { signal: this.signal })
    });
  }

  /**
   * Settle every dispatched publish. Waits for each handler to finish, so abort
   * the scope's signal first to stop stragglers.
   */
  async drain(): Promise<PublishReport[]> {
    return Promise.all(this.inflight);
  }
}
