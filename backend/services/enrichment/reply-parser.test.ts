import { describe, it, expect } from 'vitest'
import { analysisReplySchema, parseStructuredReply } from './reply-parser'

describe('parseStructuredReply', () => {
  it('reads bare JSON', () => {
    expect(parseStructuredReply(' {"a": 1} ')).toEqual({ a: 1 })
  })

  it('reads a json fence surrounded by prose', () => {
    expect(parseStructuredReply('Here you go:\n```json\n{"a": 2}\n```\nThanks')).toEqual({ a: 2 })
  })

  it('reads a bare fence', () => {
    expect(parseStructuredReply('```\n{"a": 3}\n```')).toEqual({ a: 3 })
  })

  it('throws on non-JSON text', () => {
    expect(() => parseStructuredReply('I cannot help with that')).toThrow(SyntaxError)
  })
})

describe('analysisReplySchema', () => {
  it('fills defaults for missing fields', () => {
    expect(analysisReplySchema.parse({})).toEqual({ relevance_score: 0, content_type: 'unknown', tags: [] })
  })

  it('clamps scores and trims tags to five strings', () => {
    const reply = analysisReplySchema.parse({
      relevance_score: '140',
      content_type: 'video',
      enhanced_description: ' Funny cats ',
      tags: ['a', 2, 'b', 'c', '', 'd', 'e', 'f'],
    })

    expect(reply).toEqual({
      relevance_score: 100,
      content_type: 'video',
      enhanced_description: 'Funny cats',
      tags: ['a', 'b', 'c', 'd', 'e'],
    })
  })

  it('rejects a reply that is not an object', () => {
    expect(analysisReplySchema.safeParse(['x']).success).toBe(false)
  })
})
