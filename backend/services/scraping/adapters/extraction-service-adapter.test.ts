import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import { ErrorLogger } from 'backend/services/error-logging/error-logger'
import { ConfigurationError } from 'backend/services/error-logging/errors'
import type { CrawledPage } from '../clients/firecrawl-client'
import {
  ExtractionServiceAdapter,
  coerceItemList,
  queryStrategies,
  type ExtractionServiceClient,
} from './extraction-service-adapter'

interface FakeClient {
  crawl: Mock<ExtractionServiceClient['crawl']>
  extract: Mock<ExtractionServiceClient['extract']>
}

function fakeClient(overrides: Partial<FakeClient> = {}): FakeClient {
  return {
    crawl: vi.fn<ExtractionServiceClient['crawl']>(async () => []),
    extract: vi.fn<ExtractionServiceClient['extract']>(async () => []),
    ...overrides,
  }
}

function adapterWith(client: ExtractionServiceClient, maxResults?: number) {
  return new ExtractionServiceAdapter({
    apiKey: 'test-secret',
    client,
    maxResults,
    strategyDelayMs: 0,
    errors: new ErrorLogger(),
  })
}

describe('queryStrategies', () => {
  it('issues at most five prompts in a fixed order', () => {
    expect(queryStrategies('cats', 3)).toEqual(['cats', 'recent cats news and trends', 'detailed analysis of cats'])
    expect(queryStrategies('cats', 9)).toHaveLength(5)
    expect(queryStrategies('cats', 5)[4]).toBe('reviews and opinions about cats')
  })
})

describe('coerceItemList', () => {
  it('accepts lists and wrapped lists, rejects everything else', () => {
    expect(coerceItemList([{ link: 'a' }, 'junk', null])).toEqual([{ link: 'a' }])
    expect(coerceItemList({ results: [{ link: 'b' }] })).toEqual([{ link: 'b' }])
    expect(coerceItemList({ items: [{ link: 'c' }] })).toEqual([{ link: 'c' }])
    expect(coerceItemList({ link: 'd' })).toEqual([])
    expect(coerceItemList('text')).toEqual([])
    expect(coerceItemList(undefined)).toEqual([])
  })
})

describe('ExtractionServiceAdapter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('refuses to construct without an API key', () => {
    expect(() => new ExtractionServiceAdapter({ client: fakeClient() })).toThrow(ConfigurationError)
  })

  it('extracts one page per strategy, skipping linkless and repeated items', async () => {
    const client = fakeClient({
      extract: vi
        .fn<ExtractionServiceClient['extract']>()
        .mockResolvedValueOnce({ results: [{ title: 'A', link: 'https://a.com' }, { title: 'No link' }] })
        .mockResolvedValueOnce([{ title: 'A again', link: 'https://a.com' }, { title: 'B', link: 'https://b.com', published_date: '2024-05-01' }]),
    })

    const items = await adapterWith(client).scrape('cats', undefined, 2)

    expect(items).toEqual([
      { title: 'A', link: 'https://a.com', thumbnail: '', source: 'firecrawl', pageNumber: 1, metadata: {} },
      { title: 'B', link: 'https://b.com', thumbnail: '', source: 'firecrawl', publishedDate: '2024-05-01', pageNumber: 2, metadata: {} },
    ])
    expect(client.extract).toHaveBeenCalledTimes(2)
    expect(client.extract.mock.calls[1][0]).toMatchObject({ prompt: 'recent cats news and trends', useAgent: true, urls: [] })
  })

  it('keeps going when one strategy fails', async () => {
    const client = fakeClient({
      extract: vi
        .fn<ExtractionServiceClient['extract']>()
        .mockRejectedValueOnce(new Error('HTTP 500 from Firecrawl /v1/extract'))
        .mockResolvedValueOnce([{ title: 'B', link: 'https://b.com' }]),
    })

    const items = await adapterWith(client).scrape('cats', undefined, 2)

    expect(items.map((item) => [item.link, item.pageNumber])).toEqual([['https://b.com', 2]])
  })

  it('crawls the target domain and keeps pages that mention the keywords', async () => {
    const pages: CrawledPage[] = [
      { markdown: 'All about Cats', metadata: { title: 'Cats', sourceURL: 'https://example.com/cats' } },
      { markdown: 'Only dogs here', metadata: { title: 'Dogs', sourceURL: 'https://example.com/dogs' } },
      { markdown: 'cat videos', metadata: { sourceURL: 'https://example.com/videos', description: 'Clips' } },
    ]
    const client = fakeClient({ crawl: vi.fn<ExtractionServiceClient['crawl']>(async () => pages) })

    const items = await adapterWith(client).scrape('cat', 'example.com', 1)

    expect(client.crawl).toHaveBeenCalledWith('https://example.com', { limit: 10, allowBackwardLinks: true })
    expect(items).toEqual([
      { title: 'Cats', link: 'https://example.com/cats', thumbnail: '', source: 'firecrawl', pageNumber: 1, metadata: {} },
      {
        title: 'Untitled Page',
        link: 'https://example.com/videos',
        thumbnail: '',
        source: 'firecrawl',
        description: 'Clips',
        pageNumber: 3,
        metadata: {},
      },
    ])
  })

  it('caps crawl results at three per page requested', async () => {
    const pages: CrawledPage[] = Array.from({ length: 8 }, (_, index) => ({
      markdown: 'cats',
      metadata: { sourceURL: `https://example.com/${index}` },
    }))
    const client = fakeClient({ crawl: vi.fn<ExtractionServiceClient['crawl']>(async () => pages) })

    const items = await adapterWith(client).scrape('cats', 'example.com', 1)

    expect(items).toHaveLength(3)
  })

  it('caps crawl results by the per-source result limit', async () => {
    const pages: CrawledPage[] = Array.from({ length: 8 }, (_, index) => ({
      markdown: 'cats',
      metadata: { sourceURL: `https://example.com/${index}` },
    }))
    const client = fakeClient({ crawl: vi.fn<ExtractionServiceClient['crawl']>(async () => pages) })

    const items = await adapterWith(client, 2).scrape('cats', 'example.com', 2)

    expect(items.map((item) => item.link)).toEqual([
      'https://example.com/0',
      'https://example.com/1',
      'https://example.com/2',
      'https://example.com/3',
    ])
  })

  it('keeps at most the per-source result limit from each strategy page', async () => {
    const client = fakeClient({
      extract: vi
        .fn<ExtractionServiceClient['extract']>()
        .mockResolvedValueOnce([
          { title: 'A', link: 'https://a.com' },
          { title: 'B', link: 'https://b.com' },
          { title: 'C', link: 'https://c.com' },
        ])
        .mockResolvedValueOnce([
          { title: 'A again', link: 'https://a.com' },
          { title: 'D', link: 'https://d.com' },
          { title: 'E', link: 'https://e.com' },
          { title: 'F', link: 'https://f.com' },
        ]),
    })

    const items = await adapterWith(client, 2).scrape('cats', undefined, 2)

    expect(items.map((item) => [item.link, item.pageNumber])).toEqual([
      ['https://a.com', 1],
      ['https://b.com', 1],
      ['https://d.com', 2],
      ['https://e.com', 2],
    ])
  })

  it('resolves to an empty list when the crawl fails', async () => {
    const client = fakeClient({
      crawl: vi.fn<ExtractionServiceClient['crawl']>(async () => {
        throw new Error('Firecrawl crawl abc failed: quota')
      }),
    })

    await expect(adapterWith(client).scrape('cats', 'example.com')).resolves.toEqual([])
  })
})
