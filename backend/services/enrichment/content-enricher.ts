import type { ResultItem } from '@shared/types/scraping';
import type { Settings } from 'backend/config/settings';
import { log } from 'backend/utils/log';
import { errorMessage } from 'backend/services/error-logging/errors';
import { FallbackEnrichmentStrategy } from './fallback-strategy';
import { OpenAIAnalysisClient } from './openai-client';
import { RemoteEnrichmentStrategy } from './remote-strategy';
import type { AnalysisClient, EnrichmentStrategy } from './types';

export class ContentEnricher {
  constructor(readonly strategy: EnrichmentStrategy) {}

  /**
   * Annotate every item; length and order are preserved
   */
  async enhance(items: readonly ResultItem[], keywords: string): Promise<ResultItem[]> {
    if (items.length === 0) return [];
    log(`[Enrichment] Enhancing ${items.length} items with ${this.strategy.name} strategy`, 'enrichment');
    return await this.strategy.enhance(items, keywords);
  }
}

/**
 * Use remote analysis when a key is configured and the client builds;
 * otherwise the deterministic fallback
 */
export function createContentEnricher(
  settings: Pick<Settings, 'openaiApiKey' | 'openaiModel'>,
  buildClient: (apiKey: string, model: string) => AnalysisClient = (apiKey, model) =>
    new OpenAIAnalysisClient({ apiKey, model }),
): ContentEnricher {
  if (!settings.openaiApiKey) {
    log(`[Enrichment] No OpenAI API key configured, using fallback analysis`, 'enrichment', 'warn');
    return new ContentEnricher(new FallbackEnrichmentStrategy());
  }

  try {
    return new ContentEnricher(new RemoteEnrichmentStrategy(buildClient(settings.openaiApiKey, settings.openaiModel)));
  } catch (error) {
    log(`[Enrichment] OpenAI client unavailable (${errorMessage(error)}), using fallback analysis`, 'enrichment', 'warn');
    return new ContentEnricher(new FallbackEnrichmentStrategy());
  }
}
