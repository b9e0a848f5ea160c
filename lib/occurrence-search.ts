import { z } from 'zod';
import { CONFIG, type AppConfig } from './config';
import { SearchError, errorMessage, isAbortError } from './errors';
import { HttpStatusError, failureStatus, fetchJson, isTransientFailure } from './http';
import { GBIF_MAX_PAGING_DEPTH, PAGE_SIZE, isValidOffset } from './pagination';
import { RetryExhaustedError, withRetry, type RetryPolicy } from './retry';
import type { SearchContext } from './search-context';
import { formatEventDate, type ResolvedParameters } from './search-schema';

export interface OccurrenceRecord {
  key: string;
  link: string;
  catalogNumber?: string;
  scientificName?: string;
  eventDate?: string;
  recordedBy?: string;
  locality?: string;
  country?: string;
  institutionCode?: string;
  collectionCode?: string;
  imageUrl?: string;
  imageCount: number;
}

export interface SearchResult {
  records: OccurrenceRecord[];
  count: number;
  offset: number;
  limit: number;
  endOfRecords: boolean;
  /** The GBIF request behind this page, for the "raw results" link. */
  apiUrl: string;
}

export interface OccurrenceSearcher {
  search(params: ResolvedParameters, offset: number, ctx: SearchContext): Promise<SearchResult>;
}

const occurrenceSchema = z.object({
  key: z.union([z.number(), z.string()]).transform(String),
  catalogNumber: z.string().optional(),
  scientificName: z.string().optional(),
  eventDate: z.string().optional(),
  recordedBy: z.string().optional(),
  locality: z.string().optional(),
  country: z.string().optional(),
  institutionCode: z.string().optional(),
  collectionCode: z.string().optional(),
  media: z
    .array(z.object({ identifier: z.string().optional() }))
    .optional()
    .default([]),
});

const occurrenceSearchResponseSchema = z.object({
  offset: z.number(),
  limit: z.number(),
  endOfRecords: z.boolean().default(true),
  count: z.number().default(0),
  results: z.array(occurrenceSchema).default([]),
});

type GbifOccurrence = z.infer<typeof occurrenceSchema>;

export function toOccurrenceRecord(occurrence: GbifOccurrence): OccurrenceRecord {
  const images = occurrence.media.flatMap((item) => (item.identifier ? [item.identifier] : []));
  return {
    key: occurrence.key,
    link: `https://www.gbif.org/occurrence/${occurrence.key}`,
    catalogNumber: occurrence.catalogNumber,
    scientificName: occurrence.scientificName,
    eventDate: occurrence.eventDate,
    recordedBy: occurrence.recordedBy,
    locality: occurrence.locality,
    country: occurrence.country,
    institutionCode: occurrence.institutionCode,
    collectionCode: occurrence.collectionCode,
    imageUrl: images[0],
    imageCount: images.length,
  };
}

/**
 * Query string for GBIF /occurrence/search. Parameter order is fixed so the
 * same parameters always produce the same URL.
 */
export function buildOccurrenceQuery(
  params: ResolvedParameters,
  offset: number,
  basisOfRecord?: string,
): URLSearchParams {
  const query = new URLSearchParams();
  const set = (name: string, value: string | undefined) => {
    if (value !== undefined) query.set(name, value);
  };

  set('scientificName', params.taxon);
  set('locality', params.location);
  set('continent', params.continent);
  set('country', params.country);
  set('stateProvince', params.stateProvince);
  set('recordedBy', params.collector);
  set('eventDate', formatEventDate(params.dateFrom, params.dateTo));
  // GBIF has no "without media" filter, so false leaves images unconstrained
  set('mediaType', params.hasImage ? 'StillImage' : undefined);
  set('institutionKey', params.institutionKey);
  set('collectionKey', params.collectionKey);
  set('institutionCode', params.institutionCode);
  set('collectionCode', params.collectionCode);
  set('basisOfRecord', basisOfRecord);
  query.set('limit', String(PAGE_SIZE));
  query.set('offset', String(offset));
  return query;
}

export interface GbifOccurrenceSearcherOptions {
  baseUrl: string;
  basisOfRecord?: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

export class GbifOccurrenceSearcher implements OccurrenceSearcher {
  constructor(private readonly options: GbifOccurrenceSearcherOptions) {}

  async search(params: ResolvedParameters, offset: number, ctx: SearchContext): Promise<SearchResult> {
    if (!isValidOffset(offset)) {
      throw new SearchError(400, `Offset must be a non-negative multiple of ${PAGE_SIZE}`);
    }

    const query = buildOccurrenceQuery(params, offset, this.options.basisOfRecord);
    const beyondPagingDepth = offset + PAGE_SIZE > GBIF_MAX_PAGING_DEPTH;
    if (beyondPagingDepth) {
      // GBIF refuses these offsets, so only the count is requested
      query.set('limit', '0');
      query.set('offset', '0');
    }
    const apiUrl = `${this.options.baseUrl}/occurrence/search?${query.toString()}`;

    console.log(`🌐 [${ctx.requestId}] FETCHING GBIF occurrences from:`, apiUrl);

    let body: unknown;
    try {
      body = await withRetry(
        () => fetchJson(apiUrl, { timeoutMs: this.options.timeoutMs, signal: ctx.signal }),
        this.options.retry,
        {
          label: 'GBIF occurrence search',
          signal: ctx.signal,
          shouldRetry: isTransientFailure,
        },
      );
    } catch (error) {
      if (ctx.signal?.aborted || isAbortError(error)) {
        throw error;
      }
      console.error(`❌ [${ctx.requestId}] GBIF occurrence search failed:`, errorMessage(error));
      if (error instanceof RetryExhaustedError) {
        throw new SearchError(failureStatus(error) ?? 503, 'GBIF is not responding, please try again.', {
          cause: error,
        });
      }
      if (error instanceof HttpStatusError) {
        throw new SearchError(error.status, `GBIF rejected the search (HTTP ${error.status}).`, { cause: error });
      }
      throw new SearchError(502, 'GBIF search request failed.', { cause: error });
    }

    const parsed = occurrenceSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      console.error(`❌ [${ctx.requestId}] Unexpected GBIF response:`, parsed.error.issues[0]);
      throw new SearchError(502, 'Unexpected response from GBIF.');
    }

    const page = parsed.data;
    console.log(`✅ [${ctx.requestId}] GBIF occurrences SUCCESS: ${page.results.length} records (total: ${page.count})`);

    if (beyondPagingDepth) {
      return { records: [], count: page.count, offset, limit: PAGE_SIZE, endOfRecords: true, apiUrl };
    }

    return {
      records: page.results.map(toOccurrenceRecord),
      count: page.count,
      offset: page.offset,
      limit: page.limit,
      endOfRecords: page.endOfRecords,
      apiUrl,
    };
  }
}

export function createOccurrenceSearcher(config: AppConfig = CONFIG): OccurrenceSearcher {
  return new GbifOccurrenceSearcher({
    baseUrl: config.gbif.baseUrl,
    basisOfRecord: config.gbif.basisOfRecord,
    timeoutMs: config.gbif.timeoutMs,
    retry: config.retry,
  });
}
