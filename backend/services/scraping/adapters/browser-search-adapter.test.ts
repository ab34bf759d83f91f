import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ErrorLogger } from 'backend/services/error-logging/error-logger'
import type { ScrapePage } from '../types'
import { InMemoryErrorLoggingStorage } from 'backend/services/error-logging/storage'
import { BrowserSearchAdapter, RESULT_CONTAINER_TIMEOUT_MS, buildStartUrl } from './browser-search-adapter'

interface FakePageOptions {
  /** HTML served for each visited page, in order */
  pages: string[]
  /** Selectors reported as present */
  controls?: string[]
  failGotoWith?: Error
  failClickOnPage?: number
  /** Selectors that never appear */
  missingSelectors?: string[]
}

function createFakePage(options: FakePageOptions) {
  let index = 0
  let currentUrl = ''
  const page = {
    goto: vi.fn(async (url: string) => {
      if (options.failGotoWith) throw options.failGotoWith
      currentUrl = url
    }),
    url: () => currentUrl,
    content: vi.fn(async () => options.pages[index] ?? ''),
    waitFor: vi.fn(async (selector: string, _timeoutMs: number) => {
      if ((options.missingSelectors ?? []).includes(selector)) throw new Error(`Waiting for selector \`${selector}\` failed`)
    }),
    exists: vi.fn(async (selector: string) => (options.controls ?? []).includes(selector) && index < options.pages.length - 1),
    clickAndWait: vi.fn(async () => {
      if (options.failClickOnPage === index + 1) throw new Error('Navigation timeout of 10000 ms exceeded')
      index++
    }),
    wait: vi.fn(async () => {}),
    close: vi.fn(async () => {}),
  } satisfies ScrapePage
  return page
}

const pageOne = '<a href="https://example.com/a">A</a><a href="https://example.com/b">B</a>'
const pageTwo = '<a href="https://example.com/c">C</a>'
const googleResults = '<div id="search"><div class="g"><a href="https://a.example.com/1"><h3>First hit</h3></a></div></div>'

describe('buildStartUrl', () => {
  it('uses the target domain with a scheme when given', () => {
    expect(buildStartUrl('https://www.google.com/search?q=', 'cats', 'example.com')).toBe('https://example.com')
    expect(buildStartUrl('https://www.google.com/search?q=', 'cats', 'http://example.com/x')).toBe('http://example.com/x')
  })

  it('encodes keywords onto the search base url', () => {
    expect(buildStartUrl('https://duckduckgo.com/?q=', 'cat videos & more')).toBe(
      'https://duckduckgo.com/?q=cat%20videos%20%26%20more',
    )
  })
})

describe('BrowserSearchAdapter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  function adapterFor(page: ScrapePage, maxResults = 10, errors = new ErrorLogger()) {
    return new BrowserSearchAdapter({
      name: 'google',
      searchBaseUrl: 'https://www.google.com/search?q=',
      openPage: async () => page,
      maxResults,
      settleMs: 0,
      errors,
    })
  }

  it('follows pagination controls up to maxPages and tags page numbers', async () => {
    const page = createFakePage({ pages: [pageOne, pageTwo], controls: ['a.next'] })
    const items = await adapterFor(page).scrape('cats', 'example.com', 3)

    expect(items.map((item) => [item.link, item.pageNumber, item.source])).toEqual([
      ['https://example.com/a', 1, 'google'],
      ['https://example.com/b', 1, 'google'],
      ['https://example.com/c', 2, 'google'],
    ])
    expect(page.goto).toHaveBeenCalledWith('https://example.com')
    expect(page.clickAndWait).toHaveBeenCalledTimes(1)
    expect(page.clickAndWait).toHaveBeenCalledWith('a.next')
    expect(page.close).toHaveBeenCalledTimes(1)
  })

  it('treats a page without pagination controls as the last one', async () => {
    const page = createFakePage({ pages: [pageOne, pageTwo] })
    const items = await adapterFor(page).scrape('cats', 'example.com', 3)

    expect(items.map((item) => item.link)).toEqual(['https://example.com/a', 'https://example.com/b'])
    expect(page.clickAndWait).not.toHaveBeenCalled()
  })

  it('does not paginate past maxPages', async () => {
    const page = createFakePage({ pages: [pageOne, pageTwo], controls: ['a.next'] })
    const items = await adapterFor(page).scrape('cats', 'example.com', 1)

    expect(items).toHaveLength(2)
    expect(page.exists).not.toHaveBeenCalled()
  })

  it('returns partial results when a later page fails', async () => {
    const page = createFakePage({ pages: [pageOne, pageTwo], controls: ['a.next'], failClickOnPage: 1 })
    const items = await adapterFor(page).scrape('cats', 'example.com', 3)

    expect(items.map((item) => item.link)).toEqual(['https://example.com/a', 'https://example.com/b'])
    expect(page.close).toHaveBeenCalledTimes(1)
  })

  it('resolves to an empty list when the first navigation fails', async () => {
    const page = createFakePage({ pages: [pageOne], failGotoWith: new Error('net::ERR_NAME_NOT_RESOLVED') })

    await expect(adapterFor(page).scrape('cats', 'example.com')).resolves.toEqual([])
    expect(page.close).toHaveBeenCalledTimes(1)
  })

  it('caps results per page', async () => {
    const page = createFakePage({ pages: [pageOne] })
    const items = await adapterFor(page, 1).scrape('cats', 'example.com', 1)

    expect(items.map((item) => item.link)).toEqual(['https://example.com/a'])
  })

  it('waits for the search engine result container before reading the page', async () => {
    const page = createFakePage({ pages: [googleResults] })
    const items = await adapterFor(page).scrape('cats', undefined, 1)

    expect(page.goto).toHaveBeenCalledWith('https://www.google.com/search?q=cats')
    expect(page.waitFor).toHaveBeenCalledWith('#search', RESULT_CONTAINER_TIMEOUT_MS)
    expect(items.map((item) => item.link)).toEqual(['https://a.example.com/1'])
  })

  it('logs a missing result container and still extracts', async () => {
    const storage = new InMemoryErrorLoggingStorage()
    const page = createFakePage({ pages: [googleResults], missingSelectors: ['#search'] })
    const items = await adapterFor(page, 10, new ErrorLogger(storage)).scrape('cats', undefined, 1)

    expect(items.map((item) => item.link)).toEqual(['https://a.example.com/1'])
    expect(storage.getErrorLogs()).toHaveLength(1)
    expect(storage.getErrorLogs()[0]).toMatchObject({
      component: 'google',
      operation: 'wait-for-results',
      errorType: 'puppeteer',
      url: 'https://www.google.com/search?q=cats',
    })
  })

  it('does not wait on pages read with the generic profile', async () => {
    const page = createFakePage({ pages: [pageOne] })
    await adapterFor(page).scrape('cats', 'example.com', 1)

    expect(page.waitFor).not.toHaveBeenCalled()
  })
})
