import { describe, it, expect } from 'vitest'
import type { ResultItem } from '@shared/types/scraping'
import { FallbackEnrichmentStrategy, classifyByUrl, keywordTokens } from './fallback-strategy'

function item(overrides: Partial<ResultItem>): ResultItem {
  return { title: 'T', link: 'https://example.com', thumbnail: '', source: 's', metadata: {}, ...overrides }
}

describe('keywordTokens', () => {
  it('keeps lower-cased tokens longer than two characters', () => {
    expect(keywordTokens('  The AI of  Cats ')).toEqual(['the', 'cats'])
  })
})

describe('classifyByUrl', () => {
  it('checks markers in a fixed order', () => {
    expect(classifyByUrl('https://www.YouTube.com/watch?v=1')).toBe('video')
    expect(classifyByUrl('https://en.wikipedia.org/wiki/Cat')).toBe('article')
    expect(classifyByUrl('https://cdn.site.com/cat.PNG')).toBe('image')
    expect(classifyByUrl('https://site.com/report.pdf')).toBe('document')
    expect(classifyByUrl('https://youtube.com/thumb.jpg')).toBe('video')
    expect(classifyByUrl('https://site.com/')).toBe('webpage')
  })
})

describe('FallbackEnrichmentStrategy', () => {
  const strategy = new FallbackEnrichmentStrategy()

  it('scores a youtube cat video', async () => {
    const [enhanced] = await strategy.enhance([item({ title: 'cat', link: 'https://youtube.com/x' })], 'cat video')

    expect(enhanced.metadata).toEqual({
      processed: true,
      ai_analysis: { relevanceScore: 10, contentType: 'video', tags: ['cat', 'video'] },
    })
  })

  it('counts every occurrence across title and description and caps at 100', async () => {
    const [some, many] = await strategy.enhance(
      [
        item({ title: 'Cats, cats and more CATS', description: 'a cat' }),
        item({ title: 'cat '.repeat(20) }),
      ],
      'cat',
    )

    expect(some.metadata.ai_analysis).toEqual({ relevanceScore: 40, contentType: 'webpage', tags: ['cat'] })
    expect(many.metadata.ai_analysis).toEqual({ relevanceScore: 100, contentType: 'webpage', tags: ['cat'] })
  })

  it('keeps at most five tags and preserves existing metadata without mutating input', async () => {
    const original = item({ metadata: { origin: 'crawl' } })
    const [enhanced] = await strategy.enhance([original], 'one two three four five six seven')

    expect(enhanced.metadata).toMatchObject({ origin: 'crawl', processed: true })
    expect(enhanced.metadata.ai_analysis).toMatchObject({ tags: ['one', 'two', 'three', 'four', 'five'] })
    expect(original.metadata).toEqual({ origin: 'crawl' })
  })

  it('returns an empty list for no items', async () => {
    await expect(strategy.enhance([], 'cats')).resolves.toEqual([])
  })
})
