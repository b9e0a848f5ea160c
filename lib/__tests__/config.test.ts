import { describe, it, expect } from 'vitest'
import { loadConfig, validateConfig } from '../config'

describe('config', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      openai: { apiKey: undefined, model: 'o4-mini', timeoutMs: 45000 },
      gbif: {
        baseUrl: 'https://api.gbif.org/v1',
        basisOfRecord: 'PRESERVED_SPECIMEN',
        timeoutMs: 15000,
        institutionKey: undefined,
      },
      retry: { maxAttempts: 3, baseDelayMs: 400, maxDelayMs: 4000, jitter: 0.25 },
      search: { maxQueryLength: 500 },
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_MODEL: 'gpt-4.1-mini',
      INSTITUTION_KEY: ' X123 ',
      GBIF_API_BASE: 'https://api.gbif-uat.org/v1/',
      GBIF_BASIS_OF_RECORD: 'FOSSIL_SPECIMEN',
      RETRY_MAX_ATTEMPTS: '5',
    })

    expect(config.openai.apiKey).toBe('test-secret')
    expect(config.openai.model).toBe('gpt-4.1-mini')
    expect(config.gbif.institutionKey).toBe('X123')
    expect(config.gbif.baseUrl).toBe('https://api.gbif-uat.org/v1')
    expect(config.gbif.basisOfRecord).toBe('FOSSIL_SPECIMEN')
    expect(config.retry.maxAttempts).toBe(5)
  })

  it('treats a blank institution key as unset', () => {
    expect(loadConfig({ INSTITUTION_KEY: '   ' }).gbif.institutionKey).toBeUndefined()
  })

  it('accepts a complete configuration', () => {
    expect(validateConfig(loadConfig({ OPENAI_API_KEY: 'test-secret' }))).toBe(true)
  })

  it('requires an API key', () => {
    expect(() => validateConfig(loadConfig({}))).toThrow('Configuration validation failed:\nOPENAI_API_KEY must be set')
  })

  it('lists every problem at once', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      RETRY_MAX_ATTEMPTS: '2.5',
      INSTITUTION_KEY: 'two keys',
    })

    expect(() => validateConfig(config)).toThrow(
      'Configuration validation failed:\n' +
        'RETRY_MAX_ATTEMPTS should be a whole number of at least 1\n' +
        'INSTITUTION_KEY should be a single GRSciColl identifier',
    )
  })
})
