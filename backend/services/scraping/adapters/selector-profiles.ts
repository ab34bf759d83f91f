export type ProfileName = 'generic' | 'google' | 'duckduckgo';

interface BaseProfile {
  name: ProfileName;
  /** Tried in order; the first one present on the page is clicked */
  nextPage: string[];
  loadMore: string[];
}

export interface GenericProfile extends BaseProfile {
  name: 'generic';
  links: string;
}

export interface SearchEngineProfile extends BaseProfile {
  name: 'google' | 'duckduckgo';
  resultContainer: string;
  resultItems: string;
  title: string;
  link: string;
  description: string;
}

export type SelectorProfile = GenericProfile | SearchEngineProfile;

export const SELECTOR_PROFILES: Record<ProfileName, SelectorProfile> = {
  generic: {
    name: 'generic',
    links: 'a[href]',
    nextPage: ['a::-p-text(Next)', 'a.next', 'a.pagination-next', 'a[rel="next"]'],
    loadMore: ['button::-p-text(Load more)', 'button::-p-text(Show more)'],
  },
  google: {
    name: 'google',
    resultContainer: '#search',
    resultItems: '.g',
    title: 'h3',
    link: 'a[href]',
    description: '.VwiC3b',
    nextPage: ['#pnnext'],
    loadMore: [],
  },
  duckduckgo: {
    name: 'duckduckgo',
    resultContainer: '.results',
    resultItems: '.result',
    title: '.result__title',
    link: '.result__title a[href]',
    description: '.result__snippet',
    nextPage: ['.result--more'],
    loadMore: [],
  },
};

/**
 * Pick the selector profile for a page by its host
 */
export function selectProfile(pageUrl: string): SelectorProfile {
  let host = '';
  try {
    host = new URL(pageUrl).hostname;
  } catch {
    return SELECTOR_PROFILES.generic;
  }

  if (host.includes('google.com')) return SELECTOR_PROFILES.google;
  if (host.includes('duckduckgo.com')) return SELECTOR_PROFILES.duckduckgo;
  return SELECTOR_PROFILES.generic;
}
