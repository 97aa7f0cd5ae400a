export { ReferenceWorkflow, LOOKUP_TOPIC, KEYWORD_COUNT } from "./referenceWorkflow.js";
export type { ReferenceWorkflowDeps } from "./referenceWorkflow.js";
export { SummaryWorkflow, SUMMARY_TOPIC, SECTION_HEADINGS } from "./summaryWorkflow.js";
export type { SummaryWorkflowDeps } from "./summaryWorkflow.js";
export { queryArxiv, DEFAULT_QUERY_RESULTS } from "./queryTool.js";
export type { QueryOptions, QueryResult } from "./queryTool.js";
export { emitEvent } from "./events.js";
export type * from "./types.js";
