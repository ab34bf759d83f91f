import * as cheerio from 'cheerio';
import type { RawItem } from '@shared/types/scraping';
import type { SelectorProfile } from './selector-profiles';

export interface ParseOptions {
  pageUrl: string;
  pageNumber: number;
  targetDomain?: string;
  maxResults: number;
}

/**
 * Resolve an href against the page it was found on. Fragment-only and
 * javascript: hrefs yield null.
 */
export function resolveHref(href: string, pageUrl: string): string | null {
  const trimmed = href.trim();
  if (trimmed === '' || trimmed.startsWith('#') || trimmed.toLowerCase().startsWith('javascript')) {
    return null;
  }
  try {
    return new URL(trimmed, pageUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Extract raw result records from one page of HTML with a selector profile
 */
export function parsePage(html: string, profile: SelectorProfile, options: ParseOptions): RawItem[] {
  const $ = cheerio.load(html);
  const results: RawItem[] = [];

  const accept = (link: string) => !options.targetDomain || link.includes(options.targetDomain);

  if (profile.name === 'generic') {
    $(profile.links).each((_, element) => {
      if (results.length >= options.maxResults) return false;

      const link = resolveHref($(element).attr('href') ?? '', options.pageUrl);
      if (!link || !accept(link)) return;

      const title = $(element).text().trim();
      results.push({
        title: title || 'No title',
        link,
        thumbnail: '',
        pageNumber: options.pageNumber,
      });
    });
    return results;
  }

  $(profile.resultItems).each((_, element) => {
    if (results.length >= options.maxResults) return false;

    const container = $(element);
    const href = container.find(profile.link).first().attr('href') ?? '';
    const link = resolveHref(href, options.pageUrl) ?? '';
    if (!link || !accept(link)) return;

    results.push({
      title: container.find(profile.title).first().text().trim() || 'No title',
      link,
      thumbnail: '',
      description: container.find(profile.description).first().text().trim(),
      pageNumber: options.pageNumber,
    });
  });

  return results;
}
