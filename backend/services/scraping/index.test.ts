import { describe, it, expect, vi, afterEach } from 'vitest'
import { loadSettings } from 'backend/config/settings'
import { buildAdapters } from './coordinator'
import { defaultAdapterFactories } from './index'
import { BrowserSearchAdapter } from './adapters/browser-search-adapter'
import { ExtractionServiceAdapter } from './adapters/extraction-service-adapter'

describe('defaultAdapterFactories', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  it('builds a browser adapter per search engine and the extraction adapter when keyed', () => {
    const settings = loadSettings({ FIRECRAWL_API_KEY: 'test-secret' })
    const adapters = buildAdapters(settings, defaultAdapterFactories)

    expect(adapters.map((adapter) => adapter.name)).toEqual(['google', 'duckduckgo', 'firecrawl'])
    expect(adapters[0]).toBeInstanceOf(BrowserSearchAdapter)
    expect(adapters[2]).toBeInstanceOf(ExtractionServiceAdapter)
  })

  it('leaves out the extraction adapter without an API key', () => {
    const adapters = buildAdapters(loadSettings({}), defaultAdapterFactories)

    expect(adapters.map((adapter) => adapter.name)).toEqual(['google', 'duckduckgo'])
  })

  it('applies the per-source result limit to the extraction adapter', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const body = {
      success: true,
      data: { results: [{ title: 'A', link: 'https://a.com' }, { title: 'B', link: 'https://b.com' }] },
    }
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify(body), { status: 200 })))

    const settings = loadSettings({
      FIRECRAWL_API_KEY: 'test-secret',
      ENABLED_SOURCES: 'firecrawl',
      MAX_RESULTS_PER_SOURCE: '1',
    })
    const [adapter] = buildAdapters(settings, defaultAdapterFactories)
    const items = await adapter.scrape('cats', undefined, 1)

    expect(items.map((item) => item.link)).toEqual(['https://a.com'])
  })
})
