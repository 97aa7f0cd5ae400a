import { PapercastError } from "../errors.js";
import { formatRecords } from "../arxiv/format.js";
import type { PaperField, PaperRecordView, PaperSearch } from "../arxiv/types.js";

export const DEFAULT_QUERY_RESULTS = 5;

export type QueryOptions = {
  maxResults?: number;
  fields?: readonly PaperField[];
  signal?: AbortSignal;
};

export type QueryResult = {
  text: string;
  records: PaperRecordView[];
};

/**
 * Plain arXiv search: one formatted record per line.
 */
export async function queryArxiv(search: PaperSearch, query: string, options: QueryOptions = {}): Promise<QueryResult> {
  if (!query.trim()) {
    throw new PapercastError("BAD_REQUEST", "Query must not be empty");
  }
  const records = await search.search(query, {
    maxResults: options.maxResults ?? DEFAULT_QUERY_RESULTS,
    ...(options.fields !== undefined && { fields: options.fields }),
    ...(options.signal !== undefined && { signal: options.signal })
  });
  return { text: formatRecords(records), records };
}
