import type { ResultItem, RunMetadata, ScrapeResponse } from '@shared/types/scraping';
import type { Settings, SourceSettings } from 'backend/config/settings';
import { log } from 'backend/utils/log';
import { errorMessage } from 'backend/services/error-logging/errors';
import { mergeResults } from './merger';
import type { AdapterOutcome, SourceAdapter } from './types';

export type AdapterFactory = (source: SourceSettings, settings: Settings) => SourceAdapter;

export interface CoordinatorOptions {
  /** Wall clock used for `scrapedAt` */
  now?: () => Date;
  /** Monotonic clock in milliseconds used for `executionTimeSeconds` */
  monotonicMs?: () => number;
}

/**
 * Build one adapter per enabled source. A source whose factory is missing or
 * throws is left out with a warning; the rest still run.
 */
export function buildAdapters(
  settings: Settings,
  factories: Partial<Record<SourceSettings['kind'], AdapterFactory>>,
): SourceAdapter[] {
  const adapters: SourceAdapter[] = [];

  for (const source of settings.sources) {
    if (!source.enabled) continue;

    const factory = factories[source.kind];
    if (!factory) {
      log(`[Coordinator] No adapter factory for ${source.name} (${source.kind}), skipping`, 'coordinator', 'warn');
      continue;
    }

    try {
      adapters.push(factory(source, settings));
      log(`[Coordinator] Initialized ${source.name} adapter`, 'coordinator', 'debug');
    } catch (error) {
      log(`[Coordinator] Failed to initialize ${source.name}: ${errorMessage(error)}`, 'coordinator', 'warn');
    }
  }

  return adapters;
}

/** Second-precision UTC timestamp, e.g. 2024-05-01T10:00:00Z */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Fans a query out to every adapter at once and merges what comes back.
 * One adapter failing never affects the items of another.
 */
export class ScraperCoordinator {
  private readonly now: () => Date;
  private readonly monotonicMs: () => number;

  constructor(
    private readonly adapters: readonly SourceAdapter[],
    options: CoordinatorOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.monotonicMs = options.monotonicMs ?? (() => performance.now());
  }

  get sourceNames(): string[] {
    return this.adapters.map((adapter) => adapter.name);
  }

  async run(keywords: string, targetDomain?: string, maxPages = 3): Promise<ScrapeResponse> {
    const scrapedAt = formatTimestamp(this.now());
    const started = this.monotonicMs();

    log(`[Coordinator] Scraping "${keywords}" across ${this.adapters.length} sources`, 'coordinator');

    // Wrapping in an async function turns a synchronous throw into a rejection
    const settled = await Promise.allSettled(
      this.adapters.map(async (adapter) => adapter.scrape(keywords, targetDomain, maxPages)),
    );

    const outcomes: AdapterOutcome[] = settled.map((result, index) => {
      const adapter = this.adapters[index].name;
      if (result.status === 'rejected') {
        return { status: 'failed', adapter, reason: errorMessage(result.reason) };
      }
      if (!Array.isArray(result.value)) {
        return { status: 'failed', adapter, reason: 'adapter returned a non-list value' };
      }
      return { status: 'ok', adapter, items: result.value };
    });

    const collected: ResultItem[] = [];
    const sourcesUsed: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'failed') {
        log(`[Coordinator] Error from ${outcome.adapter}: ${outcome.reason}`, 'coordinator', 'error');
        continue;
      }
      if (outcome.items.length > 0) sourcesUsed.push(outcome.adapter);
      collected.push(...outcome.items);
    }

    const results = mergeResults(collected, { targetDomain });
    const executionTimeSeconds = Math.round(Math.max(0, this.monotonicMs() - started) / 10) / 100;

    const metadata: RunMetadata = Object.freeze({
      keywords,
      ...(targetDomain ? { targetDomain } : {}),
      scrapedAt,
      totalResults: results.length,
      sourcesUsed: Object.freeze([...sourcesUsed]),
      executionTimeSeconds,
    });

    log(
      `[Coordinator] Completed in ${executionTimeSeconds}s: ${results.length} results from ${sourcesUsed.join(', ') || 'no sources'}`,
      'coordinator',
    );
    return { results, metadata };
  }
}
