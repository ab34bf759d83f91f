import type { Page } from 'puppeteer-core';
import { log } from "backend/utils/log";
import { errorMessage } from "backend/services/error-logging/errors";
import type { ScrapePage } from '../types';
import { BrowserManager } from './browser-manager';

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
];

export function generateUserAgent(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

const DEFAULT_HEADERS: Record<string, string> = {
  'Accept-Language': 'en-US,en;q=0.9',
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Upgrade-Insecure-Requests': '1',
};

const NAVIGATION_TIMEOUT_MS = 30000;
const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Hide the most common automation fingerprints
 */
async function applyStealthMode(page: Page): Promise<void> {
  await page.evaluateOnNewDocument(() => {
    Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
  });
}

export async function setupPage(): Promise<Page> {
  const page = await BrowserManager.createPage();

  await page.setViewport({ width: 1920, height: 1080 });
  await page.setUserAgent(generateUserAgent());
  await page.setExtraHTTPHeaders(DEFAULT_HEADERS);
  page.setDefaultNavigationTimeout(NAVIGATION_TIMEOUT_MS);
  page.setDefaultTimeout(DEFAULT_TIMEOUT_MS);
  await applyStealthMode(page);

  log(`[PageSetup][setupPage] Page ready`, "scraper", "debug");
  return page;
}

/**
 * Wrap a puppeteer page in the narrow surface the browser adapter drives
 */
export function toScrapePage(page: Page): ScrapePage {
  return {
    async goto(url) {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS });
    },
    async waitFor(selector, timeoutMs) {
      const handle = await page.waitForSelector(selector, { timeout: timeoutMs });
      await handle?.dispose();
    },
    url: () => page.url(),
    content: () => page.content(),
    async exists(selector) {
      const handle = await page.$(selector);
      if (!handle) return false;
      await handle.dispose();
      return true;
    },
    async clickAndWait(selector) {
      // "Load more" controls do not navigate, so a missed navigation falls back to network idle
      const navigation = page
        .waitForNavigation({ waitUntil: 'networkidle2', timeout: 10000 })
        .then(() => true, () => false);
      await page.click(selector);
      if (!(await navigation)) {
        await page.waitForNetworkIdle({ idleTime: 500, timeout: 10000 }).catch((error: unknown) => {
          log(`[PageSetup][clickAndWait] Network did not settle: ${errorMessage(error)}`, "scraper", "debug");
        });
      }
    },
    wait: (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)),
    close: () => page.close(),
  };
}

/**
 * Page factory for browser-backed sources
 */
export function createPuppeteerPageFactory(): () => Promise<ScrapePage> {
  return async () => toScrapePage(await setupPage());
}
