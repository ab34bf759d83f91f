import type { ResultItem } from '@shared/types/scraping';
import { log } from 'backend/utils/log';
import type { ErrorLogger } from 'backend/services/error-logging/error-logger';
import type { PageFactory, ScrapePage } from '../types';
import { BaseAdapter } from './base-adapter';
import { parsePage } from './page-parser';
import { selectProfile, type SelectorProfile } from './selector-profiles';

export const RESULT_CONTAINER_TIMEOUT_MS = 10000;

export interface BrowserSearchAdapterOptions {
  name: string;
  /** Prefix the encoded keywords are appended to when no domain is targeted */
  searchBaseUrl: string;
  openPage: PageFactory;
  maxResults?: number;
  /** Pause before reading each page so client-side rendering can finish */
  settleMs?: number;
  errors?: ErrorLogger;
}

/**
 * Build the URL a run starts from: the target domain's homepage, or the
 * search engine's results page for the keywords.
 */
export function buildStartUrl(searchBaseUrl: string, keywords: string, targetDomain?: string): string {
  if (targetDomain) {
    return /^https?:\/\//i.test(targetDomain) ? targetDomain : `https://${targetDomain}`;
  }
  return `${searchBaseUrl}${encodeURIComponent(keywords)}`;
}

/**
 * Drives a headless browser through up to `maxPages` result pages and
 * extracts links with the selector profile that matches each page.
 */
export class BrowserSearchAdapter extends BaseAdapter {
  private readonly searchBaseUrl: string;
  private readonly openPage: PageFactory;
  private readonly maxResults: number;
  private readonly settleMs: number;

  constructor(options: BrowserSearchAdapterOptions) {
    super(options.name, options.errors);
    this.searchBaseUrl = options.searchBaseUrl;
    this.openPage = options.openPage;
    this.maxResults = options.maxResults ?? 10;
    this.settleMs = options.settleMs ?? 2000;
  }

  protected async collect(keywords: string, targetDomain: string | undefined, maxPages: number): Promise<ResultItem[]> {
    const startUrl = buildStartUrl(this.searchBaseUrl, keywords, targetDomain);
    const page = await this.openPage();
    const items: ResultItem[] = [];

    try {
      log(`[${this.name}] Navigating to ${startUrl}`, 'scraper', 'debug');
      await page.goto(startUrl);

      for (let pageNumber = 1; pageNumber <= maxPages; pageNumber++) {
        await page.wait(this.settleMs);
        const pageUrl = page.url();
        const profile = selectProfile(pageUrl);
        items.push(...(await this.extractPage(page, profile, pageNumber, targetDomain)));

        if (pageNumber === maxPages) break;

        const control = await this.findPaginationControl(page, profile);
        if (!control) {
          log(`[${this.name}] No pagination control on page ${pageNumber}, stopping`, 'scraper', 'debug');
          break;
        }
        await page.clickAndWait(control);
      }
    } catch (error) {
      if (items.length === 0) throw error;
      this.errors.logCaught(error, { component: this.name, operation: 'paginate', url: startUrl });
    } finally {
      await page.close().catch((closeError: unknown) => {
        this.errors.logCaught(closeError, { component: this.name, operation: 'close-page' });
      });
    }

    return items;
  }

  private async extractPage(
    page: ScrapePage,
    profile: SelectorProfile,
    pageNumber: number,
    targetDomain: string | undefined,
  ): Promise<ResultItem[]> {
    if (profile.name !== 'generic') {
      await this.waitForResults(page, profile.resultContainer);
    }

    try {
      const html = await page.content();
      const raw = parsePage(html, profile, {
        pageUrl: page.url(),
        pageNumber,
        targetDomain,
        maxResults: this.maxResults,
      });
      log(`[${this.name}] Extracted ${raw.length} items from page ${pageNumber} (${profile.name})`, 'scraper');
      return raw.map((record) => this.format(record));
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.errors.logParsingError(err.message, { component: this.name, operation: 'extract-page', url: page.url() }, err);
      return [];
    }
  }

  /**
   * Give the result list time to render. A miss is logged and extraction
   * still runs against whatever is on the page.
   */
  private async waitForResults(page: ScrapePage, selector: string): Promise<void> {
    try {
      await page.waitFor(selector, RESULT_CONTAINER_TIMEOUT_MS);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.errors.logPuppeteerError(
        `Result container ${selector} did not appear: ${err.message}`,
        { component: this.name, operation: 'wait-for-results', url: page.url() },
        err,
      );
    }
  }

  private async findPaginationControl(page: ScrapePage, profile: SelectorProfile): Promise<string | null> {
    for (const selector of [...profile.nextPage, ...profile.loadMore]) {
      if (await page.exists(selector)) return selector;
    }
    return null;
  }
}
