/**
 * arXiv export API client. Queries `search_query=all:<query>` and parses the
 * Atom feed into PaperRecords.
 */

import { XMLParser } from "fast-xml-parser";
import type { Dispatcher } from "undici";
import { PapercastError } from "../errors.js";
import { createLogger, type Logger } from "../log.js";
import { ConcurrencyLimiter } from "../utils/concurrencyLimiter.js";
import { projectRecord } from "./format.js";
import type { PaperRecord, PaperRecordView, PaperSearch, SearchOptions } from "./types.js";

type ParsedLink = { href?: string; rel?: string; title?: string; type?: string };
type ParsedTerm = { term?: string };
type ParsedAuthor = { name?: unknown };

type ParsedEntry = {
  id?: unknown;
  title?: unknown;
  summary?: unknown;
  published?: unknown;
  updated?: unknown;
  author?: ParsedAuthor[];
  link?: ParsedLink[];
  category?: ParsedTerm[];
  primary_category?: ParsedTerm;
  comment?: unknown;
  journal_ref?: unknown;
  doi?: unknown;
};

type ParsedFeed = {
  feed?: {
    entry?: ParsedEntry[];
  };
};

const ARRAY_TAGS = new Set(["entry", "author", "link", "category"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name) => ARRAY_TAGS.has(name)
});

function text(value: unknown): string {
  if (typeof value === "string") return value.replace(/\s+/g, " ").trim();
  if (typeof value === "number") return String(value);
  if (value && typeof value === "object" && "#text" in value) return text(value["#text"]);
  return "";
}

function toRecord(entry: ParsedEntry): PaperRecord {
  const links = entry.link ?? [];
  const pdf = links.find((l) => l.title === "pdf" || l.type === "application/pdf");
  return {
    entry_id: text(entry.id),
    title: text(entry.title),
    summary: text(entry.summary),
    authors: (entry.author ?? []).map((a) => text(a.name)).filter(Boolean),
    published: text(entry.published),
    updated: text(entry.updated),
    primary_category: entry.primary_category?.term ?? "",
    categories: (entry.category ?? []).map((c) => c.term ?? "").filter(Boolean),
    pdf_url: pdf?.href ?? "",
    comment: text(entry.comment),
    journal_ref: text(entry.journal_ref),
    doi: text(entry.doi)
  };
}

/**
 * Parse an arXiv Atom feed. The API reports bad queries as a feed whose single
 * entry has an `/api/errors` id; those become LOOKUP_FAILURE.
 */
export function parseArxivFeed(xml: string): PaperRecord[] {
  let doc: ParsedFeed;
  try {
    doc = parser.parse(xml) as ParsedFeed;
  } catch (err) {
    throw new PapercastError("LOOKUP_FAILURE", "arXiv returned an unparseable feed", { retryable: false }, { cause: err });
  }
  if (!doc.feed) {
    throw new PapercastError("LOOKUP_FAILURE", "arXiv response is not an Atom feed", { retryable: false });
  }

  const records = (doc.feed.entry ?? []).map(toRecord);
  const apiError = records.find((r) => r.entry_id.includes("/api/errors"));
  if (apiError) {
    throw new PapercastError("LOOKUP_FAILURE", `arXiv rejected the query: ${apiError.summary || apiError.title}`, {
      retryable: false
    });
  }
  return records;
}

export type ArxivClientOptions = {
  baseUrl?: string;
  /** Concurrent requests. Ignored when `limiter` is given */
  maxConcurrent?: number;
  limiter?: ConcurrencyLimiter;
  timeoutMs?: number;
  /** undici dispatcher for the feed requests, e.g. a proxy agent */
  dispatcher?: Dispatcher;
  logger?: Logger;
};

export class ArxivClient implements PaperSearch {
  private readonly baseUrl: string;
  private readonly limiter: ConcurrencyLimiter;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly log: Logger;

  constructor(options: ArxivClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? "http://export.arxiv.org/api/query";
    this.limiter = options.limiter ?? new ConcurrencyLimiter(options.maxConcurrent ?? 3);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.dispatcher = options.dispatcher;
    this.log = options.logger ?? createLogger("arxiv");
  }

  buildUrl(query: string, maxResults: number): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set("search_query", `all:${query.trim()}`);
    url.searchParams.set("start", "0");
    url.searchParams.set("max_results", String(maxResults));
    return url.toString();
  }

  /**
   * @throws PapercastError LOOKUP_FAILURE (details.retryable marks 429/5xx/network errors)
   */
  async search(query: string, options: SearchOptions): Promise<PaperRecordView[]> {
    if (!query.trim()) {
      throw new PapercastError("BAD_REQUEST", "Search query must not be empty");
    }
    if (!Number.isInteger(options.maxResults) || options.maxResults < 1) {
      throw new PapercastError("BAD_REQUEST", `maxResults must be a positive integer, got ${options.maxResults}`);
    }

    const url = this.buildUrl(query, options.maxResults);
    const xml = await this.limiter.run(() => this.fetchFeed(url, options.signal), options.signal);
    const records = parseArxivFeed(xml).slice(0, options.maxResults);
    this.log.debug(`"${query}" -> ${records.length} record(s)`);
    return records.map((r) => projectRecord(r, options.fields));
  }

  private async fetchFeed(url: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        ...(this.dispatcher !== undefined && { dispatcher: this.dispatcher })
      });
      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new PapercastError("LOOKUP_FAILURE", `arXiv responded with HTTP ${response.status}`, {
          status: response.status,
          retryable,
          url
        });
      }
      return await response.text();
    } catch (err) {
      if (err instanceof PapercastError) throw err;
      if (signal?.aborted) {
        throw new PapercastError("CANCELLED", "arXiv lookup cancelled", undefined, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new PapercastError("LOOKUP_FAILURE", `arXiv request failed: ${message}`, { retryable: true, url }, { cause: err });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
