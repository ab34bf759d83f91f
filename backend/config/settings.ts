import path from 'path';
import { z } from 'zod';
import type { LogLevel } from 'backend/utils/log';
import { ConfigurationError } from 'backend/services/error-logging/errors';

export type SourceKind = 'browser' | 'extraction';

export interface SourceSettings {
  name: string;
  kind: SourceKind;
  enabled: boolean;
  /** Search URL prefix the encoded keywords are appended to; browser sources only */
  searchBaseUrl?: string;
  maxResults: number;
}

export interface Settings {
  port: number;
  logLevel: LogLevel;
  firecrawlApiKey?: string;
  firecrawlApiUrl: string;
  openaiApiKey?: string;
  openaiModel: string;
  maxPages: number;
  enrichmentEnabled: boolean;
  outputDir: string;
  linkRegistryFile: string;
  requestTimeoutMs: number;
  puppeteerExecutablePath?: string;
  browserSettleMs: number;
  /** Browser origins allowed to call the API */
  corsOrigins: string[];
  sources: SourceSettings[];
}

/** Every source the service knows how to build */
export const KNOWN_SOURCES: ReadonlyArray<Omit<SourceSettings, 'enabled' | 'maxResults'>> = [
  { name: 'google', kind: 'browser', searchBaseUrl: 'https://www.google.com/search?q=' },
  { name: 'duckduckgo', kind: 'browser', searchBaseUrl: 'https://duckduckgo.com/?q=' },
  { name: 'firecrawl', kind: 'extraction' },
];

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('true')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  FIRECRAWL_API_KEY: optionalString,
  FIRECRAWL_API_URL: z.string().url().default('https://api.firecrawl.dev'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MAX_PAGES: z.coerce.number().int().min(1).max(10).default(3),
  MAX_RESULTS_PER_SOURCE: z.coerce.number().int().positive().default(10),
  ENABLED_SOURCES: z.string().default('google,duckduckgo,firecrawl'),
  ENRICHMENT_ENABLED: booleanFlag,
  OUTPUT_DIR: z.string().min(1).default('outputs'),
  LINK_REGISTRY_FILE: optionalString,
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  PUPPETEER_EXECUTABLE_PATH: optionalString,
  BROWSER_SETTLE_MS: z.coerce.number().int().min(0).default(2000),
  CORS_ORIGINS: z.string().default('http://localhost:5173'),
});

/**
 * Read and validate settings from the environment. Values are read once;
 * changes to the environment afterwards have no effect on the returned object.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;

  const enabledNames = new Set(
    values.ENABLED_SOURCES.split(',')
      .map((name) => name.trim().toLowerCase())
      .filter((name) => name !== ''),
  );

  const sources: SourceSettings[] = KNOWN_SOURCES.map((source) => ({
    ...source,
    enabled: enabledNames.has(source.name),
    maxResults: values.MAX_RESULTS_PER_SOURCE,
  }));

  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    firecrawlApiKey: values.FIRECRAWL_API_KEY,
    firecrawlApiUrl: values.FIRECRAWL_API_URL.replace(/\/+$/, ''),
    openaiApiKey: values.OPENAI_API_KEY,
    openaiModel: values.OPENAI_MODEL,
    maxPages: values.MAX_PAGES,
    enrichmentEnabled: values.ENRICHMENT_ENABLED,
    outputDir: values.OUTPUT_DIR,
    linkRegistryFile: values.LINK_REGISTRY_FILE ?? path.join(values.OUTPUT_DIR, 'link_registry.json'),
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    puppeteerExecutablePath: values.PUPPETEER_EXECUTABLE_PATH,
    browserSettleMs: values.BROWSER_SETTLE_MS,
    corsOrigins: values.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    sources,
  };
}
