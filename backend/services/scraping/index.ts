import type { SourceSettings } from 'backend/config/settings';
import { ConfigurationError } from 'backend/services/error-logging/errors';
import type { AdapterFactory } from './coordinator';
import { BrowserSearchAdapter } from './adapters/browser-search-adapter';
import { ExtractionServiceAdapter } from './adapters/extraction-service-adapter';
import { createPuppeteerPageFactory } from './core/page-setup';

export const browserAdapterFactory: AdapterFactory = (source, settings) => {
  if (!source.searchBaseUrl) {
    throw new ConfigurationError(`${source.name}: browser sources need a search URL`);
  }
  return new BrowserSearchAdapter({
    name: source.name,
    searchBaseUrl: source.searchBaseUrl,
    openPage: createPuppeteerPageFactory(),
    maxResults: source.maxResults,
    settleMs: settings.browserSettleMs,
  });
};

export const extractionAdapterFactory: AdapterFactory = (source, settings) =>
  new ExtractionServiceAdapter({
    name: source.name,
    apiKey: settings.firecrawlApiKey,
    apiUrl: settings.firecrawlApiUrl,
    maxResults: source.maxResults,
  });

export const defaultAdapterFactories: Record<SourceSettings['kind'], AdapterFactory> = {
  browser: browserAdapterFactory,
  extraction: extractionAdapterFactory,
};
