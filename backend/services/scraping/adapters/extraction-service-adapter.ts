import { isPlainObject, type RawItem, type ResultItem } from '@shared/types/scraping';
import { log } from 'backend/utils/log';
import { ConfigurationError } from 'backend/services/error-logging/errors';
import type { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { FirecrawlClient, type CrawlOptions, type CrawledPage, type ExtractRequest } from '../clients/firecrawl-client';
import { BaseAdapter } from './base-adapter';
import { CONTENT_ITEM_SCHEMA } from './extraction-schemas';

/** The part of the Firecrawl client the adapter depends on */
export interface ExtractionServiceClient {
  crawl(url: string, options: CrawlOptions): Promise<CrawledPage[]>;
  extract(request: ExtractRequest): Promise<unknown>;
}

export interface ExtractionServiceAdapterOptions {
  name?: string;
  apiKey?: string;
  apiUrl?: string;
  client?: ExtractionServiceClient;
  /** Items kept per strategy page; crawl mode keeps `min(3, maxResults)` per page requested */
  maxResults?: number;
  /** Pause between consecutive extract calls */
  strategyDelayMs?: number;
  errors?: ErrorLogger;
}

/**
 * Extract prompts that stand in for result pages when no domain is targeted
 */
export function queryStrategies(query: string, maxPages: number): string[] {
  const strategies = [
    query,
    `recent ${query} news and trends`,
    `detailed analysis of ${query}`,
    `tutorials and guides about ${query}`,
    `reviews and opinions about ${query}`,
  ];
  return strategies.slice(0, Math.max(0, maxPages));
}

/**
 * Turn whatever an extract call returned into a list of records. Lists keep
 * their object members, an object holding a list under `results` or `items`
 * yields that list, anything else is empty.
 */
export function coerceItemList(payload: unknown): RawItem[] {
  if (Array.isArray(payload)) {
    return payload.filter(isPlainObject);
  }
  if (isPlainObject(payload)) {
    for (const key of ['results', 'items']) {
      const nested = payload[key];
      if (Array.isArray(nested)) return nested.filter(isPlainObject);
    }
  }
  return [];
}

function mentionsKeywords(content: string, keywords: string): boolean {
  const tokens = keywords.toLowerCase().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return true;
  const haystack = content.toLowerCase();
  return tokens.some((token) => haystack.includes(token));
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Source backed by a managed crawl/extract service. Crawls the target domain
 * when one is given; otherwise issues one extract prompt per simulated page.
 */
export class ExtractionServiceAdapter extends BaseAdapter {
  private readonly client: ExtractionServiceClient;
  private readonly strategyDelayMs: number;
  private readonly maxResults: number;

  constructor(options: ExtractionServiceAdapterOptions) {
    super(options.name ?? 'firecrawl', options.errors);
    if (!options.apiKey) {
      throw new ConfigurationError(`${this.name}: API key is required`);
    }
    this.client = options.client ?? new FirecrawlClient({ apiKey: options.apiKey, apiUrl: options.apiUrl });
    this.strategyDelayMs = options.strategyDelayMs ?? 500;
    this.maxResults = options.maxResults ?? 10;
  }

  protected async collect(keywords: string, targetDomain: string | undefined, maxPages: number): Promise<ResultItem[]> {
    if (targetDomain) {
      return await this.crawlDomain(targetDomain, keywords, maxPages);
    }
    return await this.extractByStrategies(keywords, maxPages);
  }

  private async crawlDomain(domain: string, keywords: string, maxPages: number): Promise<ResultItem[]> {
    const url = /^https?:\/\//i.test(domain) ? domain : `https://${domain}`;
    log(`[${this.name}] Crawling ${url}`, 'scraper');

    const pages = await this.client.crawl(url, { limit: maxPages * 10, allowBackwardLinks: true });
    const results: ResultItem[] = [];
    const cap = maxPages * Math.min(3, this.maxResults);

    for (const [index, page] of pages.slice(0, maxPages * 5).entries()) {
      if (!mentionsKeywords(page.markdown ?? '', keywords)) continue;

      results.push(
        this.format({
          title: page.metadata?.title || 'Untitled Page',
          link: page.metadata?.sourceURL ?? page.metadata?.url ?? '',
          thumbnail: page.metadata?.ogImage ?? '',
          description: page.metadata?.description,
          pageNumber: index + 1,
        }),
      );
      if (results.length >= cap) break;
    }

    return results;
  }

  private async extractByStrategies(query: string, maxPages: number): Promise<ResultItem[]> {
    const results: ResultItem[] = [];
    const seen = new Set<string>();
    const strategies = queryStrategies(query, maxPages);

    for (const [index, prompt] of strategies.entries()) {
      if (index > 0 && this.strategyDelayMs > 0) await sleep(this.strategyDelayMs);

      try {
        log(`[${this.name}] Extracting page ${index + 1} with prompt "${prompt}"`, 'scraper', 'debug');
        const payload = await this.client.extract({ urls: [], prompt, schema: CONTENT_ITEM_SCHEMA, useAgent: true });

        let kept = 0;
        for (const raw of coerceItemList(payload)) {
          if (kept >= this.maxResults) break;
          const link = raw.link;
          if (typeof link !== 'string' || link === '' || seen.has(link)) continue;
          seen.add(link);
          results.push(this.format({ ...raw, pageNumber: index + 1 }));
          kept++;
        }
      } catch (error) {
        this.errors.logCaught(error, { component: this.name, operation: `extract page ${index + 1}` });
      }
    }

    return results;
  }
}
