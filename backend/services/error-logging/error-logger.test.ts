import { describe, it, expect, vi, afterEach } from 'vitest'
import { ErrorLogger, inferErrorType } from './error-logger'
import { InMemoryErrorLoggingStorage } from './storage'
import { ConfigurationError, DeadlineExceededError } from './errors'

describe('inferErrorType', () => {
  it('classifies by error name and message', () => {
    expect(inferErrorType(new ConfigurationError('missing key'))).toBe('configuration')
    expect(inferErrorType(new DeadlineExceededError(50))).toBe('timeout')
    expect(inferErrorType(new Error('fetch failed'))).toBe('network')
    expect(inferErrorType(new Error('Navigation failed because browser has disconnected'))).toBe('puppeteer')
    expect(inferErrorType(new SyntaxError('Unexpected token } in JSON'))).toBe('parsing')
    expect(inferErrorType(new Error('something odd'))).toBe('unknown')
  })
})

describe('ErrorLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('stores entries and reports stats by type', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const logger = new ErrorLogger(new InMemoryErrorLoggingStorage())

    logger.logNetworkError('HTTP 502', { component: 'firecrawl', operation: 'extract' })
    logger.logCaught('plain string failure', { component: 'google', operation: 'scrape' })

    expect(logger.stats()).toEqual({ totalErrors: 2, errorsByType: { network: 1, unknown: 1 } })
    expect(logger.recent({ limit: 1 })[0]).toMatchObject({
      component: 'google',
      errorType: 'unknown',
      errorMessage: 'plain string failure',
    })
  })

  it('keeps only the newest entries up to capacity', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const storage = new InMemoryErrorLoggingStorage(2)
    const logger = new ErrorLogger(storage)

    logger.logAIError('one', { component: 'a', operation: 'x' })
    logger.logAIError('two', { component: 'a', operation: 'x' })
    logger.logAIError('three', { component: 'a', operation: 'x' })

    expect(storage.getErrorLogs().map((entry) => entry.errorMessage)).toEqual(['two', 'three'])
  })

  it('filters recent entries by type and component', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const logger = new ErrorLogger(new InMemoryErrorLoggingStorage())

    logger.logNetworkError('HTTP 502', { component: 'firecrawl', operation: 'extract' })
    logger.logPuppeteerError('Target closed', { component: 'google', operation: 'paginate' })
    logger.logNetworkError('HTTP 503', { component: 'google', operation: 'scrape' })

    expect(logger.recent({ errorType: 'network' }).map((entry) => entry.errorMessage)).toEqual(['HTTP 502', 'HTTP 503'])
    expect(logger.recent({ component: 'google' }).map((entry) => entry.errorMessage)).toEqual(['Target closed', 'HTTP 503'])
    expect(logger.recent({ errorType: 'network', component: 'google' }).map((entry) => entry.errorMessage)).toEqual(['HTTP 503'])
  })
})
