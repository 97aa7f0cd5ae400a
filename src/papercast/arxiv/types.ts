/**
 * A paper as returned by the arXiv Atom API.
 */
export type PaperRecord = {
  /** Abstract page URL, e.g. http://arxiv.org/abs/1706.03762v7 */
  entry_id: string;
  title: string;
  summary: string;
  authors: string[];
  published: string;
  updated: string;
  primary_category: string;
  categories: string[];
  pdf_url: string;
  comment: string;
  journal_ref: string;
  doi: string;
};

export type PaperField = keyof PaperRecord;

export const PAPER_FIELDS: readonly PaperField[] = [
  "entry_id",
  "title",
  "summary",
  "authors",
  "published",
  "updated",
  "primary_category",
  "categories",
  "pdf_url",
  "comment",
  "journal_ref",
  "doi"
];

/** A record projected onto the requested fields */
export type PaperRecordView = Partial<PaperRecord>;

export type SearchOptions = {
  maxResults: number;
  /** Fields to keep, in output order. All fields when omitted */
  fields?: readonly PaperField[];
  signal?: AbortSignal;
};

/**
 * Lookup collaborator used by the workflows. Read-only.
 */
export interface PaperSearch {
  search(query: string, options: SearchOptions): Promise<PaperRecordView[]>;
}

export function isPaperField(value: string): value is PaperField {
  return PAPER_FIELDS.some((f) => f === value);
}
