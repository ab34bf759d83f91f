import type { ZodType, ZodTypeDef } from 'zod';
import { log } from 'backend/utils/log';
import { errorLogger, type ErrorLogger } from 'backend/services/error-logging/error-logger';
import type { LinkRegistry } from 'backend/services/link-registry/link-registry';
import type { ExtractRequest } from 'backend/services/scraping/clients/firecrawl-client';
import { coerceItemList } from 'backend/services/scraping/adapters/extraction-service-adapter';
import { LINK_SCHEMA, REFERENCE_SCHEMA, VIDEO_SCHEMA } from 'backend/services/scraping/adapters/extraction-schemas';
import type { ArtifactWriter } from './artifact-writer';
import {
  linkRecordSchema,
  referenceRecordSchema,
  videoRecordSchema,
  type LinkRecord,
  type ReferenceRecord,
  type VideoRecord,
} from './records';

export interface ExtractClient {
  extract(request: ExtractRequest): Promise<unknown>;
}

export interface DomainExtractorOptions {
  client: ExtractClient;
  registry: LinkRegistry;
  writer: ArtifactWriter;
  /** Name recorded against every link this extractor registers */
  registrant?: string;
  errors?: ErrorLogger;
}

export interface CombinedExtraction {
  keyword: string;
  domain: string;
  timestamp: string;
  references: ReferenceRecord[];
  videos: VideoRecord[];
  links: LinkRecord[];
  stats: {
    totalReferences: number;
    totalVideos: number;
    totalLinks: number;
    totalResults: number;
  };
}

export function normalizeDomain(domain: string): string {
  const trimmed = domain.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Per-page targets for link extraction; the last one repeats for extra pages
 */
export function linkPageStrategies(keyword: string, domain: string, pages: number): Array<{ url: string; prompt: string }> {
  const base = normalizeDomain(domain);
  const strategies = [
    {
      url: base,
      prompt: `Extract all links related to '${keyword}' from the homepage. Focus on primary navigation links and important sections.`,
    },
    {
      url: `${base}/search?q=${keyword.trim().split(/\s+/).join('+')}`,
      prompt: `Extract all links related to '${keyword}' from search results. Find links that weren't on the homepage.`,
    },
    {
      url: `${base}/blog`,
      prompt: `Extract all blog posts or news articles related to '${keyword}'. Find recent content links.`,
    },
    {
      url: `${base}/about`,
      prompt: `Extract all team, company, or about-related links that mention '${keyword}'.`,
    },
  ];
  return Array.from({ length: Math.max(0, pages) }, (_, index) => strategies[Math.min(index, strategies.length - 1)]);
}

export function pageFallbackUrl(domain: string, page: number): string {
  const base = normalizeDomain(domain);
  return base.includes('?') ? `${base}&page=${page}` : `${base}?page=${page}`;
}

function parseRecords<T>(payload: unknown, schema: ZodType<T, ZodTypeDef, unknown>): T[] {
  const records: T[] = [];
  for (const raw of coerceItemList(payload)) {
    const parsed = schema.safeParse(raw);
    if (parsed.success) records.push(parsed.data);
  }
  return records;
}

/**
 * Runs the three batch extraction categories against one domain. Every
 * category drops links the registry has already handed to someone else and
 * registers the ones it keeps.
 */
export class DomainExtractor {
  private readonly client: ExtractClient;
  private readonly registry: LinkRegistry;
  private readonly writer: ArtifactWriter;
  private readonly registrant: string;
  private readonly errors: ErrorLogger;

  constructor(options: DomainExtractorOptions) {
    this.client = options.client;
    this.registry = options.registry;
    this.writer = options.writer;
    this.registrant = options.registrant ?? 'extract-data';
    this.errors = options.errors ?? errorLogger;
  }

  async extractReferences(keyword: string, domain: string): Promise<ReferenceRecord[]> {
    const references = await this.extractRecords(
      'references',
      {
        urls: [`${normalizeDomain(domain)}/*`],
        prompt: `Extract all references and content related to ${keyword}. Ensure that the title, content, and thumbnail images (if available) are included for each reference.`,
        schema: REFERENCE_SCHEMA,
      },
      referenceRecordSchema,
    );

    const kept = this.keepNew(references, (reference) => reference.url);
    this.writer.writeCategory('references', keyword, domain, { keyword, domain, references: kept });
    return kept;
  }

  async extractVideos(keyword: string, domain: string): Promise<VideoRecord[]> {
    const videos = await this.extractRecords(
      'videos',
      {
        urls: [normalizeDomain(domain)],
        prompt: `Extract all videos that include the keyword "${keyword}" in the page content. For each, include title, URL, thumbnail image URL, duration, views, and upload date.`,
        schema: VIDEO_SCHEMA,
      },
      videoRecordSchema,
    );

    const kept = this.keepNew(videos, (video) => video.url);
    this.writer.writeCategory('videos', keyword, domain, { keyword, domain, videos: kept });
    return kept;
  }

  async extractLinks(keyword: string, domain: string, pages = 3): Promise<LinkRecord[]> {
    const seen = new Set<string>();
    const results: LinkRecord[] = [];

    for (const [index, strategy] of linkPageStrategies(keyword, domain, pages).entries()) {
      const pageNumber = index + 1;
      let records: LinkRecord[];

      try {
        records = await this.extractLinkPage(strategy.url, strategy.prompt, pageNumber);
      } catch (error) {
        this.errors.logCaught(error, { component: 'batch-extract', operation: `links page ${pageNumber}`, url: strategy.url });
        const fallbackUrl = pageFallbackUrl(domain, pageNumber);
        try {
          records = await this.extractLinkPage(
            fallbackUrl,
            `Extract any links related to '${keyword}' from page ${pageNumber} that haven't been seen yet.`,
            pageNumber,
          );
        } catch (fallbackError) {
          this.errors.logCaught(fallbackError, { component: 'batch-extract', operation: `links page ${pageNumber} fallback`, url: fallbackUrl });
          continue;
        }
      }

      const unique = records.filter((record) => {
        if (seen.has(record.link)) return false;
        seen.add(record.link);
        return true;
      });
      const kept = this.keepNew(unique, (record) => record.link);
      log(`[BatchExtract] Page ${pageNumber}: ${unique.length} unique links, ${kept.length} new`, 'batch-extract');
      results.push(...kept);
    }

    this.writer.writeCategory('links', keyword, domain, { keyword, domain, links: results });
    return results;
  }

  async extractAll(keyword: string, domain: string, pages = 3): Promise<CombinedExtraction> {
    log(`[BatchExtract] Starting extraction for "${keyword}" on ${domain}`, 'batch-extract');

    const references = await this.extractReferences(keyword, domain);
    const videos = await this.extractVideos(keyword, domain);
    const links = await this.extractLinks(keyword, domain, pages);

    const combined: CombinedExtraction = {
      keyword,
      domain,
      timestamp: new Date().toISOString(),
      references,
      videos,
      links,
      stats: {
        totalReferences: references.length,
        totalVideos: videos.length,
        totalLinks: links.length,
        totalResults: references.length + videos.length + links.length,
      },
    };
    this.writer.writeCombined(keyword, domain, combined);
    return combined;
  }

  private async extractRecords<T>(
    category: string,
    request: ExtractRequest,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T[]> {
    try {
      const records = parseRecords(await this.client.extract(request), schema);
      log(`[BatchExtract] ${category}: ${records.length} extracted`, 'batch-extract');
      return records;
    } catch (error) {
      this.errors.logCaught(error, { component: 'batch-extract', operation: category, url: request.urls[0] });
      return [];
    }
  }

  private async extractLinkPage(url: string, prompt: string, pageNumber: number): Promise<LinkRecord[]> {
    const payload = await this.client.extract({ urls: [url], prompt, schema: LINK_SCHEMA });
    return parseRecords(payload, linkRecordSchema).map((record) => ({ ...record, pageNumber }));
  }

  /**
   * Keep records whose URL the registry still considers new for this
   * registrant, then register those URLs. Records without a URL are dropped.
   */
  private keepNew<T>(records: T[], urlOf: (record: T) => string | undefined): T[] {
    const urls = [...new Set(records.map(urlOf).filter((url): url is string => Boolean(url)))];
    const fresh = new Set(this.registry.filterNew(urls, this.registrant));
    const kept = records.filter((record) => {
      const url = urlOf(record);
      return url !== undefined && fresh.has(url);
    });
    this.registry.register([...fresh], this.registrant);
    return kept;
  }
}
