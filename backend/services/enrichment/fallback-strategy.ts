import type { AiAnalysis, ResultItem } from '@shared/types/scraping';
import { AI_ANALYSIS_KEY, MAX_TAGS, type EnrichmentStrategy } from './types';

const CONTENT_TYPE_RULES: ReadonlyArray<[string, string[]]> = [
  ['video', ['youtube']],
  ['article', ['wikipedia']],
  ['image', ['.jpg', '.png', '.gif']],
  ['document', ['.pdf', '.doc']],
];

export function keywordTokens(keywords: string): string[] {
  return keywords
    .split(/\s+/)
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token.length > 2);
}

export function classifyByUrl(link: string): string {
  const url = link.toLowerCase();
  for (const [contentType, markers] of CONTENT_TYPE_RULES) {
    if (markers.some((marker) => url.includes(marker))) return contentType;
  }
  return 'webpage';
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Deterministic stand-in for remote analysis: keyword counts for relevance,
 * URL markers for content type.
 */
export class FallbackEnrichmentStrategy implements EnrichmentStrategy {
  readonly name = 'fallback';

  async enhance(items: readonly ResultItem[], keywords: string): Promise<ResultItem[]> {
    const tokens = keywordTokens(keywords);
    return items.map((item) => this.annotate(item, tokens));
  }

  annotate(item: ResultItem, tokens: string[]): ResultItem {
    const title = item.title.toLowerCase();
    const description = (item.description ?? '').toLowerCase();

    let keywordCount = 0;
    for (const token of tokens) {
      keywordCount += countOccurrences(title, token) + countOccurrences(description, token);
    }

    const analysis: AiAnalysis = {
      relevanceScore: Math.min(100, keywordCount * 10),
      contentType: classifyByUrl(item.link),
      tags: tokens.slice(0, MAX_TAGS),
    };

    return {
      ...item,
      metadata: { ...item.metadata, processed: true, [AI_ANALYSIS_KEY]: analysis },
    };
  }
}
