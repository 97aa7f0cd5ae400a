export { ArxivClient, parseArxivFeed } from "./client.js";
export type { ArxivClientOptions } from "./client.js";
export { projectRecord, formatRecord, formatRecords } from "./format.js";
export { PAPER_FIELDS, isPaperField } from "./types.js";
export type { PaperRecord, PaperField, PaperRecordView, PaperSearch, SearchOptions } from "./types.js";
