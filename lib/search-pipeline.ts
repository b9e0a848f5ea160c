import { CONFIG, type AppConfig } from './config';
import { SearchError, TranslationError, errorMessage } from './errors';
import { createNameResolver, type NameResolution, type NameResolver } from './name-resolver';
import { createOccurrenceSearcher, type OccurrenceSearcher, type SearchResult } from './occurrence-search';
import { createQueryTranslator, type QueryTranslator } from './query-translator';
import type { SearchContext } from './search-context';
import {
  validateResolved,
  type CandidateParameters,
  type ResolvedParameters,
  type SchemaValidation,
} from './search-schema';

export const MESSAGES = {
  translationFailed: 'Could not interpret your query. Please try rephrasing it.',
  searchFailed: 'Search failed, please try again.',
  noRecords: 'No records found for your query.',
} as const;

export interface SearchPipelineDependencies {
  translator: QueryTranslator;
  resolver: NameResolver;
  searcher: OccurrenceSearcher;
  /** Process-wide INSTITUTION_KEY; overrides whatever the query resolved to. */
  institutionKey?: string;
}

export interface SearchRequest {
  query: string;
  /** Manual codes from the configuration panel, ignored when an institution key is configured. */
  institutionCode?: string;
  collectionCode?: string;
}

export type SearchFailure =
  | { status: 'translation-failed'; message: string }
  | { status: 'search-failed'; httpStatus: number; message: string };

export type SearchOutcome =
  | {
      status: 'ok';
      interpreted: CandidateParameters;
      resolved: ResolvedParameters;
      resolutions: NameResolution[];
      page: SearchResult;
    }
  | SearchFailure;

export type PageOutcome = { status: 'ok'; page: SearchResult } | Extract<SearchFailure, { status: 'search-failed' }>;

/**
 * Replaces institution and collection names with GRSciColl keys. Both lookups
 * run at the same time; a name that does not resolve is left out entirely.
 */
export async function resolveParameters(
  candidate: CandidateParameters,
  resolver: NameResolver,
  ctx: SearchContext,
): Promise<{ resolved: ResolvedParameters; resolutions: NameResolution[] }> {
  const { institution, collection, ...rest } = candidate;

  const [institutionResolution, collectionResolution] = await Promise.all([
    institution !== undefined ? resolver.resolve('institution', institution, ctx) : undefined,
    collection !== undefined ? resolver.resolve('collection', collection, ctx) : undefined,
  ]);

  const resolved: ResolvedParameters = { ...rest };
  if (institutionResolution?.status === 'matched') {
    resolved.institutionKey = institutionResolution.key;
  }
  if (collectionResolution?.status === 'matched') {
    resolved.collectionKey = collectionResolution.key;
  }

  const resolutions = [institutionResolution, collectionResolution].filter(
    (resolution): resolution is NameResolution => resolution !== undefined,
  );
  return { resolved, resolutions };
}

export function applyManualCodes(
  params: ResolvedParameters,
  request: Pick<SearchRequest, 'institutionCode' | 'collectionCode'>,
  institutionKey?: string,
): ResolvedParameters {
  if (institutionKey) return params;
  const institutionCode = request.institutionCode?.trim();
  const collectionCode = request.collectionCode?.trim();
  return {
    ...params,
    ...(institutionCode ? { institutionCode } : {}),
    ...(collectionCode ? { collectionCode } : {}),
  };
}

/** Final override before every search. */
export function applyInstitutionScope(params: ResolvedParameters, institutionKey?: string): ResolvedParameters {
  return institutionKey ? { ...params, institutionKey } : params;
}

function searchFailure(error: SearchError): Extract<SearchFailure, { status: 'search-failed' }> {
  return { status: 'search-failed', httpStatus: error.status, message: MESSAGES.searchFailed };
}

/**
 * translate → resolve → search, strictly in that order. TranslationError and
 * SearchError become outcomes for the page; anything else propagates.
 */
export async function runSearchPipeline(
  request: SearchRequest,
  ctx: SearchContext,
  deps: SearchPipelineDependencies,
): Promise<SearchOutcome> {
  let interpreted: CandidateParameters;
  try {
    interpreted = await deps.translator.translate(request.query, ctx);
  } catch (error) {
    if (error instanceof TranslationError) {
      return { status: 'translation-failed', message: MESSAGES.translationFailed };
    }
    throw error;
  }

  const { resolved: fromQuery, resolutions } = await resolveParameters(interpreted, deps.resolver, ctx);
  const resolved = applyInstitutionScope(applyManualCodes(fromQuery, request, deps.institutionKey), deps.institutionKey);

  try {
    const page = await deps.searcher.search(resolved, 0, ctx);
    if (page.count === 0) {
      console.log(`📭 [${ctx.requestId}] ${MESSAGES.noRecords}`);
    }
    return { status: 'ok', interpreted, resolved, resolutions, page };
  } catch (error) {
    if (error instanceof SearchError) {
      console.error(`❌ [${ctx.requestId}] Search failed (${error.status}): ${errorMessage(error)}`);
      return searchFailure(error);
    }
    throw error;
  }
}

/**
 * Checks parameters sent back by the browser for a page turn. Only keys a
 * lookup could have produced are accepted; a configured institution key is
 * dropped first, since it is applied again before the search.
 */
export function validatePageParameters(input: unknown, institutionKey?: string): SchemaValidation<ResolvedParameters> {
  if (institutionKey && typeof input === 'object' && input !== null && !Array.isArray(input)) {
    return validateResolved(Object.fromEntries(Object.entries(input).filter(([field]) => field !== 'institutionKey')));
  }
  return validateResolved(input);
}

/**
 * Page turns re-issue the search with a new offset; nothing is cached.
 */
export async function fetchOccurrencePage(
  params: ResolvedParameters,
  offset: number,
  ctx: SearchContext,
  deps: Pick<SearchPipelineDependencies, 'searcher' | 'institutionKey'>,
): Promise<PageOutcome> {
  try {
    const page = await deps.searcher.search(applyInstitutionScope(params, deps.institutionKey), offset, ctx);
    return { status: 'ok', page };
  } catch (error) {
    if (error instanceof SearchError) {
      return searchFailure(error);
    }
    throw error;
  }
}

export function createSearchPipelineDependencies(config: AppConfig = CONFIG): SearchPipelineDependencies {
  return {
    translator: createQueryTranslator(config),
    resolver: createNameResolver(config),
    searcher: createOccurrenceSearcher(config),
    institutionKey: config.gbif.institutionKey,
  };
}
