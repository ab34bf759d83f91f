import puppeteer, { type Browser, type Page } from "puppeteer-core";
import * as fs from "fs";
import { log } from "backend/utils/log";
import { ConfigurationError, errorMessage } from "backend/services/error-logging/errors";

/**
 * Common install locations for Chrome and Chromium
 */
const KNOWN_CHROME_PATHS = [
  "/usr/bin/google-chrome",
  "/usr/bin/google-chrome-stable",
  "/usr/bin/chromium",
  "/usr/bin/chromium-browser",
  "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
  "/Applications/Chromium.app/Contents/MacOS/Chromium",
];

/**
 * Find a Chrome executable for puppeteer-core, which ships without one
 */
export function findChromePath(configuredPath?: string, exists: (path: string) => boolean = fs.existsSync): string {
  if (configuredPath) {
    if (exists(configuredPath)) {
      log(`[BrowserManager][findChromePath] Using configured Chrome: ${configuredPath}`, "scraper", "debug");
      return configuredPath;
    }
    throw new ConfigurationError(`Configured Chrome executable not found: ${configuredPath}`);
  }

  for (const path of KNOWN_CHROME_PATHS) {
    if (exists(path)) {
      log(`[BrowserManager][findChromePath] Using system Chrome: ${path}`, "scraper", "debug");
      return path;
    }
  }

  throw new ConfigurationError(
    "Could not find Chrome executable; set PUPPETEER_EXECUTABLE_PATH",
  );
}

const BASE_BROWSER_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-accelerated-2d-canvas",
  "--disable-gpu",
  "--window-size=1920x1080",
  "--disable-blink-features=AutomationControlled",
  "--disable-extensions",
  "--mute-audio",
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-background-networking",
  "--disable-default-apps",
  "--disable-sync",
  "--lang=en-US,en",
];

const HEALTH_CHECK_TIMEOUT_MS = 5000;

/**
 * Shared browser instance. One browser serves every browser-backed source;
 * each scrape opens its own page.
 */
export class BrowserManager {
  private static browser: Browser | null = null;
  private static creationPromise: Promise<Browser> | null = null;
  private static isShuttingDown = false;
  private static executablePath: string | undefined;

  static configure(options: { executablePath?: string }) {
    this.executablePath = options.executablePath;
  }

  /**
   * Get or create the browser, replacing it when it stops responding
   */
  static async getBrowser(): Promise<Browser> {
    if (this.isShuttingDown) {
      throw new Error("Browser manager is shutting down");
    }

    if (this.browser) {
      if (await this.healthCheck()) {
        return this.browser;
      }
      log(`[BrowserManager][getBrowser] Browser unresponsive, replacing it`, "scraper", "warn");
      await this.closeBrowser();
    }

    // Concurrent callers share one launch
    if (this.creationPromise) {
      return await this.creationPromise;
    }

    this.creationPromise = this.createNewBrowser();
    try {
      this.browser = await this.creationPromise;
      return this.browser;
    } finally {
      this.creationPromise = null;
    }
  }

  private static async createNewBrowser(): Promise<Browser> {
    const executablePath = findChromePath(this.executablePath);
    log(`[BrowserManager][createNewBrowser] Launching browser`, "scraper");

    const browser = await puppeteer.launch({
      headless: true,
      executablePath,
      args: BASE_BROWSER_ARGS,
      protocolTimeout: 180000,
    });

    browser.on("disconnected", () => {
      log(`[BrowserManager] Browser disconnected`, "scraper", "warn");
      this.browser = null;
    });

    return browser;
  }

  static async createPage(): Promise<Page> {
    const browser = await this.getBrowser();
    return await browser.newPage();
  }

  static async healthCheck(): Promise<boolean> {
    if (!this.browser) return false;

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        this.browser.version(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error("Browser health check timed out")), HEALTH_CHECK_TIMEOUT_MS);
        }),
      ]);
      return true;
    } catch (error) {
      log(`[BrowserManager][healthCheck] ${errorMessage(error)}`, "scraper-error", "error");
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  static async closeBrowser(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (!browser) return;

    try {
      await browser.close();
      log(`[BrowserManager][closeBrowser] Browser closed`, "scraper");
    } catch (error) {
      log(`[BrowserManager][closeBrowser] Error closing browser: ${errorMessage(error)}`, "scraper-error", "error");
    }
  }

  static async shutdown(): Promise<void> {
    this.isShuttingDown = true;
    await this.closeBrowser();
  }
}
