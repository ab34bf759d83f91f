import { isPlainObject, type RawItem, type ResultItem } from '@shared/types/scraping';
import { log } from 'backend/utils/log';
import { errorLogger, type ErrorLogger } from 'backend/services/error-logging/error-logger';
import type { SourceAdapter } from '../types';

export const DEFAULT_TITLE = 'Untitled Content';

function readString(raw: RawItem, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

function readPageNumber(raw: RawItem): number | undefined {
  for (const key of ['pageNumber', 'page_number']) {
    const value = raw[key];
    const num = typeof value === 'string' ? Number(value) : value;
    if (typeof num === 'number' && Number.isInteger(num) && num > 0) return num;
  }
  return undefined;
}

/**
 * Normalise an arbitrary record into a ResultItem. Required fields get
 * defaults; optional fields are copied only when they carry a value.
 */
export function formatResult(raw: RawItem, source: string): ResultItem {
  const item: ResultItem = {
    title: readString(raw, 'title') ?? DEFAULT_TITLE,
    link: typeof raw.link === 'string' ? raw.link.trim() : '',
    thumbnail: typeof raw.thumbnail === 'string' ? raw.thumbnail.trim() : '',
    source,
    metadata: {},
  };

  const description = readString(raw, 'description');
  if (description) item.description = description;
  const author = readString(raw, 'author');
  if (author) item.author = author;
  const publishedDate = readString(raw, 'publishedDate', 'published_date', 'uploadDate', 'upload_date');
  if (publishedDate) item.publishedDate = publishedDate;
  const duration = readString(raw, 'duration');
  if (duration) item.duration = duration;
  const views = readString(raw, 'views');
  if (views) item.views = views;
  const pageNumber = readPageNumber(raw);
  if (pageNumber !== undefined) item.pageNumber = pageNumber;
  if (isPlainObject(raw.metadata)) item.metadata = { ...raw.metadata };

  return item;
}

/**
 * Base for every source. Subclasses implement `collect`; `scrape` contains
 * any failure so a broken source only ever yields an empty list.
 */
export abstract class BaseAdapter implements SourceAdapter {
  protected constructor(
    readonly name: string,
    protected readonly errors: ErrorLogger = errorLogger,
  ) {}

  protected abstract collect(keywords: string, targetDomain: string | undefined, maxPages: number): Promise<ResultItem[]>;

  async scrape(keywords: string, targetDomain?: string, maxPages = 3): Promise<ResultItem[]> {
    try {
      const items = await this.collect(keywords, targetDomain, maxPages);
      log(`[${this.name}] Collected ${items.length} items for "${keywords}"`, 'scraper');
      return items;
    } catch (error) {
      this.errors.logCaught(error, { component: this.name, operation: 'scrape', url: targetDomain });
      return [];
    }
  }

  format(raw: RawItem, sourceOverride?: string): ResultItem {
    return formatResult(raw, sourceOverride ?? this.name);
  }
}
