/**
 * Shared types and interfaces for the scraping system
 */

import type { RawItem, ResultItem } from '@shared/types/scraping';

/**
 * Capability every content source provides. `scrape` resolves to an empty
 * list on failure instead of rejecting.
 */
export interface SourceAdapter {
  readonly name: string;
  scrape(keywords: string, targetDomain?: string, maxPages?: number): Promise<ResultItem[]>;
  format(raw: RawItem, sourceOverride?: string): ResultItem;
}

export interface MergeOptions {
  targetDomain?: string;
  limit?: number;
}

export type AdapterOutcome =
  | { status: 'ok'; adapter: string; items: ResultItem[] }
  | { status: 'failed'; adapter: string; reason: string };

/** Minimal page surface the browser adapter drives; puppeteer backs it in production */
export interface ScrapePage {
  goto(url: string): Promise<void>;
  url(): string;
  content(): Promise<string>;
  /** Resolve once the selector matches; reject after `timeoutMs` */
  waitFor(selector: string, timeoutMs: number): Promise<void>;
  /** Whether any element matches the selector on the current page */
  exists(selector: string): Promise<boolean>;
  /** Click the first match and wait for the next page to settle */
  clickAndWait(selector: string): Promise<void>;
  wait(ms: number): Promise<void>;
  close(): Promise<void>;
}

export type PageFactory = () => Promise<ScrapePage>;
