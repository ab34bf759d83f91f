import { z } from 'zod';
import { log } from 'backend/utils/log';
import { ConfigurationError, errorMessage } from 'backend/services/error-logging/errors';

export interface FirecrawlClientOptions {
  apiKey: string;
  apiUrl?: string;
  retries?: number;
  /** Base delay for exponential backoff between retries */
  backoffMs?: number;
  pollIntervalMs?: number;
  /** Give up polling an async job after this long */
  jobTimeoutMs?: number;
}

export interface CrawlOptions {
  limit: number;
  allowBackwardLinks?: boolean;
}

export interface ExtractRequest {
  urls: string[];
  prompt: string;
  schema?: Record<string, unknown>;
  /** Let the service browse on its own to find sources for the prompt */
  useAgent?: boolean;
}

const crawledPageSchema = z.object({
  markdown: z.string().optional(),
  metadata: z
    .object({
      title: z.string().optional(),
      description: z.string().optional(),
      sourceURL: z.string().optional(),
      url: z.string().optional(),
      ogImage: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type CrawledPage = z.infer<typeof crawledPageSchema>;

const jobStartSchema = z.object({
  success: z.boolean(),
  id: z.string().optional(),
  data: z.unknown().optional(),
  status: z.string().optional(),
  error: z.string().optional(),
});

const crawlStatusSchema = z.object({
  success: z.boolean().optional(),
  status: z.string(),
  data: z.array(crawledPageSchema).optional(),
  error: z.string().optional(),
});

const extractStatusSchema = z.object({
  success: z.boolean().optional(),
  status: z.string(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});

class HttpStatusError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Thin client for the Firecrawl REST API. Crawl and extract are async jobs
 * on the service side; both methods start the job and poll it to completion.
 */
export class FirecrawlClient {
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly pollIntervalMs: number;
  private readonly jobTimeoutMs: number;

  constructor(options: FirecrawlClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('Firecrawl API key is required');
    }
    this.apiKey = options.apiKey;
    this.apiUrl = (options.apiUrl ?? 'https://api.firecrawl.dev').replace(/\/+$/, '');
    this.retries = options.retries ?? 3;
    this.backoffMs = options.backoffMs ?? 100;
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.jobTimeoutMs = options.jobTimeoutMs ?? 300000;
  }

  async crawl(url: string, options: CrawlOptions): Promise<CrawledPage[]> {
    const started = jobStartSchema.parse(
      await this.request('POST', '/v1/crawl', {
        url,
        limit: options.limit,
        allowBackwardLinks: options.allowBackwardLinks ?? true,
        scrapeOptions: { formats: ['markdown'], onlyMainContent: true },
      }),
    );
    if (!started.success || !started.id) {
      throw new Error(`Crawl start failed: ${started.error ?? 'Unknown error'}`);
    }

    const crawlId = started.id;
    const status = await this.poll(`crawl ${crawlId}`, async () =>
      crawlStatusSchema.parse(await this.request('GET', `/v1/crawl/${crawlId}`)),
    );
    return status.data ?? [];
  }

  async extract(request: ExtractRequest): Promise<unknown> {
    const started = jobStartSchema.parse(
      await this.request('POST', '/v1/extract', {
        urls: request.urls,
        prompt: request.prompt,
        ...(request.schema ? { schema: request.schema } : {}),
        ...(request.useAgent ? { agent: { model: 'FIRE-1' } } : {}),
      }),
    );
    if (!started.success) {
      throw new Error(`Extract start failed: ${started.error ?? 'Unknown error'}`);
    }
    // Some deployments answer synchronously
    if (!started.id) {
      return started.data;
    }

    const extractId = started.id;
    const status = await this.poll(`extract ${extractId}`, async () =>
      extractStatusSchema.parse(await this.request('GET', `/v1/extract/${extractId}`)),
    );
    return status.data;
  }

  private async poll<T extends { status: string; error?: string }>(label: string, check: () => Promise<T>): Promise<T> {
    const startTime = Date.now();

    while (true) {
      const status = await check();
      if (status.status === 'completed') {
        return status;
      }
      if (status.status === 'failed' || status.status === 'cancelled') {
        throw new Error(`Firecrawl ${label} ${status.status}: ${status.error ?? 'Unknown error'}`);
      }
      if (Date.now() - startTime > this.jobTimeoutMs) {
        throw new Error(`Firecrawl ${label} timed out after ${this.jobTimeoutMs}ms`);
      }
      log(`[Firecrawl] ${label} is ${status.status}, polling again`, 'scraper', 'debug');
      await sleep(this.pollIntervalMs);
    }
  }

  /**
   * Issue a request, retrying network failures, 429s and 5xx responses with
   * exponential backoff
   */
  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    let lastError: unknown;

    for (let attempt = 0; attempt < this.retries; attempt++) {
      try {
        const response = await fetch(`${this.apiUrl}${path}`, {
          method,
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: body === undefined ? undefined : JSON.stringify(body),
        });

        if (!response.ok) {
          const text = await response.text();
          throw new HttpStatusError(response.status, `HTTP ${response.status} from Firecrawl ${path}: ${text.slice(0, 200)}`);
        }
        return await response.json();
      } catch (error) {
        lastError = error;
        const retryable = !(error instanceof HttpStatusError) || error.status === 429 || error.status >= 500;
        if (!retryable || attempt + 1 === this.retries) break;

        const delay = this.backoffMs * 2 ** attempt;
        log(`[Firecrawl] ${method} ${path} failed (${errorMessage(error)}), retrying in ${delay}ms`, 'scraper', 'warn');
        await sleep(delay);
      }
    }

    throw lastError instanceof Error ? lastError : new Error(errorMessage(lastError));
  }
}
