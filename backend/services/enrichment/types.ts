import type { ResultItem } from '@shared/types/scraping';

/**
 * A way of annotating items with `metadata.ai_analysis`. Implementations
 * return one item per input, in order, and never mutate their input.
 */
export interface EnrichmentStrategy {
  readonly name: string;
  enhance(items: readonly ResultItem[], keywords: string): Promise<ResultItem[]>;
}

/** Text-in, text-out completion backend */
export interface AnalysisClient {
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export const AI_ANALYSIS_KEY = 'ai_analysis';
export const MAX_TAGS = 5;
