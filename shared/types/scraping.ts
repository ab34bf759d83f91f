/**
 * One normalised piece of discovered content. `link` is the identity key
 * across every layer (merge, enrichment, registry).
 */
export interface ResultItem {
  title: string;
  link: string;
  thumbnail: string;
  source: string;
  description?: string;
  author?: string;
  publishedDate?: string;
  duration?: string;
  views?: string;
  /** 1-based page within the source that produced the item */
  pageNumber?: number;
  metadata: Record<string, unknown>;
}

/** Loosely-shaped record as it comes off a page or a remote API */
export type RawItem = Record<string, unknown>;

export interface AiAnalysis {
  relevanceScore: number;
  contentType: string;
  tags: string[];
}

/** Frozen once a run completes */
export interface RunMetadata {
  readonly keywords: string;
  readonly targetDomain?: string;
  /** ISO-8601 UTC, second precision */
  readonly scrapedAt: string;
  readonly totalResults: number;
  readonly sourcesUsed: readonly string[];
  readonly executionTimeSeconds: number;
}

export interface ScrapeResponse {
  results: ResultItem[];
  metadata: RunMetadata;
}

export interface ScrapeRequest {
  keywords: string;
  targetDomain?: string;
  maxPages?: number;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
