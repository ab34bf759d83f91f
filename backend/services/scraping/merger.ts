import type { ResultItem } from '@shared/types/scraping';
import type { MergeOptions } from './types';

export const DEFAULT_MERGE_LIMIT = 50;

/**
 * Collapse items from several sources into one list: empty links dropped,
 * first occurrence of each link kept, optional domain substring filter,
 * truncated to `limit`. Input order decides precedence.
 */
export function mergeResults(items: readonly ResultItem[], options: MergeOptions = {}): ResultItem[] {
  const limit = options.limit ?? DEFAULT_MERGE_LIMIT;
  const seen = new Set<string>();
  const merged: ResultItem[] = [];

  for (const item of items) {
    if (merged.length >= limit) break;
    if (!item.link || seen.has(item.link)) continue;
    seen.add(item.link);

    if (options.targetDomain && !item.link.includes(options.targetDomain)) continue;
    merged.push(item);
  }

  return merged;
}
