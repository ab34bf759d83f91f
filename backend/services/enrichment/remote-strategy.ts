import type { AiAnalysis, ResultItem } from '@shared/types/scraping';
import { log } from 'backend/utils/log';
import { errorLogger, type ErrorLogger } from 'backend/services/error-logging/error-logger';
import { analysisReplySchema, parseStructuredReply } from './reply-parser';
import { AI_ANALYSIS_KEY, type AnalysisClient, type EnrichmentStrategy } from './types';

export const ENRICHMENT_BATCH_SIZE = 5;

const SYSTEM_PROMPT = 'You are an AI assistant that analyzes web content and provides structured data.';

export function buildAnalysisPrompt(item: ResultItem, keywords: string): string {
  let content = `Title: ${item.title}\n`;
  if (item.description) {
    content += `Description: ${item.description}\n`;
  }

  return `Analyze this content related to the search query "${keywords}":

${content}
Provide a JSON response with these fields:
1. relevance_score (0-100): How relevant this content is to the query
2. content_type: The likely type (article, video, product, etc.)
3. enhanced_description: A better description if the original is missing or poor
4. tags: Up to 5 relevant tags or keywords

JSON format only.`;
}

/**
 * Annotates items through a remote model, a handful at a time. An item whose
 * call or reply fails comes back unchanged.
 */
export class RemoteEnrichmentStrategy implements EnrichmentStrategy {
  readonly name = 'remote';

  constructor(
    private readonly client: AnalysisClient,
    private readonly errors: ErrorLogger = errorLogger,
    private readonly batchSize = ENRICHMENT_BATCH_SIZE,
  ) {}

  async enhance(items: readonly ResultItem[], keywords: string): Promise<ResultItem[]> {
    const enhanced: ResultItem[] = [];

    for (let i = 0; i < items.length; i += this.batchSize) {
      const batch = items.slice(i, i + this.batchSize);
      const batchResults = await Promise.allSettled(batch.map((item) => this.enhanceItem(item, keywords)));

      batchResults.forEach((result, index) => {
        if (result.status === 'fulfilled') {
          enhanced.push(result.value);
          return;
        }
        this.errors.logCaught(result.reason, { component: 'enrichment', operation: 'analyze', url: batch[index].link });
        enhanced.push({ ...batch[index], metadata: { ...batch[index].metadata } });
      });
    }

    log(`[Enrichment] Analyzed ${items.length} items in batches of ${this.batchSize}`, 'enrichment');
    return enhanced;
  }

  private async enhanceItem(item: ResultItem, keywords: string): Promise<ResultItem> {
    if (item.title.length < 3) {
      return { ...item, metadata: { ...item.metadata } };
    }

    const reply = await this.client.complete(SYSTEM_PROMPT, buildAnalysisPrompt(item, keywords));
    const parsed = analysisReplySchema.parse(parseStructuredReply(reply));

    const analysis: AiAnalysis = {
      relevanceScore: parsed.relevance_score,
      contentType: parsed.content_type,
      tags: parsed.tags,
    };

    const updated: ResultItem = { ...item, metadata: { ...item.metadata, [AI_ANALYSIS_KEY]: analysis } };
    if (!item.description && parsed.enhanced_description) {
      updated.description = parsed.enhanced_description;
    }
    return updated;
  }
}
