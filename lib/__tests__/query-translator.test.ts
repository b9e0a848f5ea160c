import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { APICallError } from 'ai'
import { QUERY_TRANSLATION_AGENT_PROMPT, buildTranslationPrompt } from '../agent-prompts'
import { TranslationError, ValidationError, isAbortError } from '../errors'
import {
  LanguageModelQueryTranslator,
  interpretModelOutput,
  type CompletionRequest,
  type StructuredCompletion,
} from '../query-translator'
import { noDelayPolicy, testContext } from './fixtures'

const NOTHING = {
  taxon: null,
  location: null,
  continent: null,
  country: null,
  stateProvince: null,
  dateFrom: null,
  dateTo: null,
  collector: null,
  institution: null,
  collection: null,
  hasImage: null,
}

function modelReturning(...outputs: unknown[]) {
  const complete = vi.fn<StructuredCompletion>()
  for (const output of outputs) {
    complete.mockResolvedValueOnce(output)
  }
  return complete
}

function translatorFor(complete: StructuredCompletion, timeoutMs = 1000) {
  return new LanguageModelQueryTranslator(complete, { retry: noDelayPolicy, timeoutMs })
}

describe('query-translator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('interpretModelOutput', () => {
    it('drops nulls and blank strings', () => {
      expect(interpretModelOutput({ ...NOTHING, taxon: '  ', location: 'Toronto' })).toEqual({ location: 'Toronto' })
    })

    it('keeps hasImage false as an explicit value', () => {
      expect(interpretModelOutput({ ...NOTHING, taxon: 'Quercus', hasImage: false })).toEqual({
        taxon: 'Quercus',
        hasImage: false,
      })
    })

    it('rejects responses that are not objects', () => {
      expect(() => interpretModelOutput(['taxon'])).toThrow(ValidationError)
      expect(() => interpretModelOutput('Blue Jay')).toThrow('Invalid parameters: model response is not an object')
    })

    it('rejects an empty interpretation', () => {
      expect(() => interpretModelOutput(NOTHING)).toThrow('Invalid parameters: no search parameters were recognised')
    })
  })

  describe('LanguageModelQueryTranslator', () => {
    it('translates a taxon and locality query', async () => {
      const complete = modelReturning({ ...NOTHING, taxon: 'Cyanocitta cristata', location: 'Toronto' })

      const params = await translatorFor(complete).translate('Blue Jays in Toronto', testContext())

      expect(params).toEqual({ taxon: 'Cyanocitta cristata', location: 'Toronto' })
      expect(complete).toHaveBeenCalledWith(
        expect.objectContaining({
          system: QUERY_TRANSLATION_AGENT_PROMPT,
          prompt: buildTranslationPrompt('Blue Jays in Toronto'),
        }),
      )
    })

    it('translates a collector and a single year into a date range', async () => {
      const complete = modelReturning({
        ...NOTHING,
        collector: 'Darwin',
        dateFrom: '1835-01-01',
        dateTo: '1835-12-31',
      })

      const params = await translatorFor(complete).translate('specimens collected by Darwin in 1835', testContext())

      expect(params).toEqual({ collector: 'Darwin', dateFrom: '1835-01-01', dateTo: '1835-12-31' })
    })

    it('retries when the model returns invalid parameters', async () => {
      const complete = modelReturning(
        { ...NOTHING, dateFrom: '2000-01-01', dateTo: '1990-12-31' },
        { ...NOTHING, dateFrom: '1990-01-01', dateTo: '2000-12-31' },
      )

      const params = await translatorFor(complete).translate('between 1990 and 2000', testContext())

      expect(complete).toHaveBeenCalledTimes(2)
      expect(params).toEqual({ dateFrom: '1990-01-01', dateTo: '2000-12-31' })
    })

    it('fails with TranslationError after the configured attempts', async () => {
      const complete = vi.fn<StructuredCompletion>().mockResolvedValue(NOTHING)

      const error = await translatorFor(complete)
        .translate('asdfghjkl', testContext())
        .catch((caught: unknown) => caught)

      expect(complete).toHaveBeenCalledTimes(3)
      expect(error).toBeInstanceOf(TranslationError)
      if (error instanceof TranslationError) {
        expect(error.attempts).toBe(3)
        expect(error.message).toBe('Could not interpret query')
      }
    })

    it('does not retry requests the provider rejected outright', async () => {
      const complete = vi.fn<StructuredCompletion>().mockRejectedValue(
        new APICallError({
          message: 'Incorrect API key provided',
          url: 'https://api.openai.test/v1/responses',
          requestBodyValues: {},
          statusCode: 401,
          isRetryable: false,
        }),
      )

      const error = await translatorFor(complete)
        .translate('Blue Jays in Toronto', testContext())
        .catch((caught: unknown) => caught)

      expect(complete).toHaveBeenCalledTimes(1)
      expect(error).toBeInstanceOf(TranslationError)
      if (error instanceof TranslationError) {
        expect(error.attempts).toBe(1)
      }
    })

    it('retries calls that exceed the time limit', async () => {
      const hanging = vi.fn(
        ({ signal }: CompletionRequest) =>
          new Promise<unknown>((_resolve, reject) => {
            signal.addEventListener('abort', () => reject(signal.reason), { once: true })
          }),
      )

      const error = await translatorFor(hanging, 10)
        .translate('Blue Jays in Toronto', testContext())
        .catch((caught: unknown) => caught)

      expect(hanging).toHaveBeenCalledTimes(3)
      expect(error).toBeInstanceOf(TranslationError)
    })

    it('propagates cancellation by the caller', async () => {
      const controller = new AbortController()
      controller.abort()
      const complete = vi.fn(async ({ signal }: CompletionRequest): Promise<unknown> => {
        throw signal.reason
      })

      const error = await translatorFor(complete)
        .translate('Blue Jays in Toronto', testContext(controller.signal))
        .catch((caught: unknown) => caught)

      expect(isAbortError(error)).toBe(true)
      expect(complete).toHaveBeenCalledTimes(1)
    })
  })
})
