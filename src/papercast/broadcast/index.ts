export { Accumulator } from "./accumulator.js";
export type { AccumulatorSnapshot, Fragment, HandlerFailure, FailurePolicy, WaitOptions } from "./accumulator.js";

export { TopicRegistry } from "./topicRegistry.js";
export type {
  TopicHandler,
  HandlerContext,
  HandlerOutcome,
  HandlerErrorInfo,
  PublishReport,
  TopicRegistryOptions
} from "./topicRegistry.js";

export { WorkflowScope } from "./scope.js";
export type { WorkflowScopeOptions } from "./scope.js";
