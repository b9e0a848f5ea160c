import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { SearchError, TranslationError } from '../errors'
import type { NameResolution, NameResolver } from '../name-resolver'
import type { OccurrenceSearcher } from '../occurrence-search'
import type { QueryTranslator } from '../query-translator'
import {
  MESSAGES,
  applyManualCodes,
  fetchOccurrencePage,
  runSearchPipeline,
  type SearchPipelineDependencies,
} from '../search-pipeline'
import type { CandidateParameters } from '../search-schema'
import { emptyPage, testContext } from './fixtures'

function dependencies(interpreted: CandidateParameters, institutionKey?: string) {
  const translate = vi.fn<QueryTranslator['translate']>().mockResolvedValue(interpreted)
  const resolve = vi.fn<NameResolver['resolve']>()
  const search = vi.fn<OccurrenceSearcher['search']>().mockResolvedValue(emptyPage({ count: 12 }))
  const deps: SearchPipelineDependencies = {
    translator: { translate },
    resolver: { resolve },
    searcher: { search },
    institutionKey,
  }
  return { deps, translate, resolve, search }
}

describe('search-pipeline', () => {
  const ctx = testContext()

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('runSearchPipeline', () => {
    it('searches with the interpreted parameters when no names need resolving', async () => {
      const { deps, resolve, search } = dependencies({ taxon: 'Cyanocitta cristata', location: 'Toronto' })

      const outcome = await runSearchPipeline({ query: 'Blue Jays in Toronto' }, ctx, deps)

      expect(resolve).not.toHaveBeenCalled()
      expect(search).toHaveBeenCalledWith({ taxon: 'Cyanocitta cristata', location: 'Toronto' }, 0, ctx)
      expect(outcome).toEqual({
        status: 'ok',
        interpreted: { taxon: 'Cyanocitta cristata', location: 'Toronto' },
        resolved: { taxon: 'Cyanocitta cristata', location: 'Toronto' },
        resolutions: [],
        page: emptyPage({ count: 12 }),
      })
    })

    it('replaces names with resolved keys', async () => {
      const { deps, resolve, search } = dependencies({
        taxon: 'Corvus corax',
        institution: 'Royal Ontario Museum',
        collection: 'Ornithology',
      })
      resolve.mockImplementation(async (kind, name) => ({
        kind,
        query: name,
        status: 'matched',
        key: `${kind}-key`,
        label: name,
      }))

      await runSearchPipeline({ query: 'ravens in the ROM ornithology collection' }, ctx, deps)

      expect(resolve).toHaveBeenCalledWith('institution', 'Royal Ontario Museum', ctx)
      expect(resolve).toHaveBeenCalledWith('collection', 'Ornithology', ctx)
      expect(search).toHaveBeenCalledWith(
        { taxon: 'Corvus corax', institutionKey: 'institution-key', collectionKey: 'collection-key' },
        0,
        ctx,
      )
    })

    it('looks up the institution and the collection at the same time', async () => {
      const { deps, resolve, search } = dependencies({ institution: 'Bell Museum', collection: 'Herpetology' })
      const pending: Array<(resolution: NameResolution) => void> = []
      resolve.mockImplementation(
        () =>
          new Promise<NameResolution>((done) => {
            pending.push(done)
          }),
      )

      const outcome = runSearchPipeline({ query: 'Bell Museum herpetology' }, ctx, deps)
      await vi.waitFor(() => expect(resolve).toHaveBeenCalledTimes(2))
      pending[0]({ kind: 'institution', query: 'Bell Museum', status: 'matched', key: 'bell', label: 'Bell Museum' })
      pending[1]({ kind: 'collection', query: 'Herpetology', status: 'not-found' })

      await expect(outcome).resolves.toMatchObject({ status: 'ok', resolved: { institutionKey: 'bell' } })
      expect(search).toHaveBeenCalledWith({ institutionKey: 'bell' }, 0, ctx)
    })

    it('drops names that cannot be resolved', async () => {
      const { deps, resolve, search } = dependencies({ taxon: 'Corvus', institution: 'Nowhere Museum' })
      resolve.mockResolvedValue({ kind: 'institution', query: 'Nowhere Museum', status: 'not-found' })

      const outcome = await runSearchPipeline({ query: 'ravens at the Nowhere Museum' }, ctx, deps)

      const [params] = search.mock.calls[0]
      expect(params).toEqual({ taxon: 'Corvus' })
      expect('institutionKey' in params).toBe(false)
      expect(outcome).toMatchObject({
        status: 'ok',
        resolutions: [{ kind: 'institution', query: 'Nowhere Museum', status: 'not-found' }],
      })
    })

    it('continues without the constraint when a lookup fails', async () => {
      const { deps, resolve, search } = dependencies({ taxon: 'Corvus', collection: 'Birds' })
      resolve.mockResolvedValue({ kind: 'collection', query: 'Birds', status: 'failed', reason: 'HTTP 503' })

      await runSearchPipeline({ query: 'ravens in the bird collection' }, ctx, deps)

      expect(search).toHaveBeenCalledWith({ taxon: 'Corvus' }, 0, ctx)
    })

    it('applies the configured institution key over anything resolved', async () => {
      const { deps, resolve, search } = dependencies({ taxon: 'Corvus', institution: 'Royal Ontario Museum' }, 'X123')
      resolve.mockResolvedValue({
        kind: 'institution',
        query: 'Royal Ontario Museum',
        status: 'matched',
        key: 'rom-key',
        label: 'Royal Ontario Museum',
      })

      const outcome = await runSearchPipeline({ query: 'ravens at the ROM' }, ctx, deps)

      expect(search).toHaveBeenCalledWith({ taxon: 'Corvus', institutionKey: 'X123' }, 0, ctx)
      expect(outcome).toMatchObject({ status: 'ok', resolved: { institutionKey: 'X123' } })
    })

    it('adds the configured institution key to queries that name none', async () => {
      const { deps, search } = dependencies({ taxon: 'Corvus' }, 'X123')

      await runSearchPipeline({ query: 'ravens' }, ctx, deps)

      expect(search).toHaveBeenCalledWith({ taxon: 'Corvus', institutionKey: 'X123' }, 0, ctx)
    })

    it('adds manual codes when no institution key is configured', async () => {
      const { deps, search } = dependencies({ taxon: 'Corvus' })

      await runSearchPipeline({ query: 'ravens', institutionCode: ' BBM ', collectionCode: '' }, ctx, deps)

      expect(search).toHaveBeenCalledWith({ taxon: 'Corvus', institutionCode: 'BBM' }, 0, ctx)
    })

    it('reports a translation failure without searching', async () => {
      const { deps, translate, search } = dependencies({})
      translate.mockRejectedValue(new TranslationError('Could not interpret query', 3))

      const outcome = await runSearchPipeline({ query: 'asdfghjkl' }, ctx, deps)

      expect(outcome).toEqual({ status: 'translation-failed', message: MESSAGES.translationFailed })
      expect(search).not.toHaveBeenCalled()
    })

    it('reports a search failure with its status', async () => {
      const { deps, search } = dependencies({ taxon: 'Corvus' })
      search.mockRejectedValue(new SearchError(503, 'GBIF is not responding, please try again.'))

      const outcome = await runSearchPipeline({ query: 'ravens' }, ctx, deps)

      expect(outcome).toEqual({ status: 'search-failed', httpStatus: 503, message: MESSAGES.searchFailed })
    })

    it('propagates unexpected errors', async () => {
      const { deps, translate } = dependencies({})
      translate.mockRejectedValue(new RangeError('boom'))

      await expect(runSearchPipeline({ query: 'ravens' }, ctx, deps)).rejects.toThrow(RangeError)
    })
  })

  describe('applyManualCodes', () => {
    it('ignores manual codes when an institution key is configured', () => {
      expect(applyManualCodes({ taxon: 'Corvus' }, { institutionCode: 'BBM' }, 'X123')).toEqual({ taxon: 'Corvus' })
    })
  })

  describe('fetchOccurrencePage', () => {
    it('re-applies the configured institution key on every page', async () => {
      const { deps, search } = dependencies({}, 'X123')

      const outcome = await fetchOccurrencePage({ taxon: 'Corvus', institutionKey: 'other' }, 600, ctx, deps)

      expect(search).toHaveBeenCalledWith({ taxon: 'Corvus', institutionKey: 'X123' }, 600, ctx)
      expect(outcome).toEqual({ status: 'ok', page: emptyPage({ count: 12 }) })
    })

    it('reports search failures', async () => {
      const { deps, search } = dependencies({})
      search.mockRejectedValue(new SearchError(400, 'Offset must be a non-negative multiple of 300'))

      await expect(fetchOccurrencePage({ taxon: 'Corvus' }, 150, ctx, deps)).resolves.toEqual({
        status: 'search-failed',
        httpStatus: 400,
        message: MESSAGES.searchFailed,
      })
    })
  })
})
