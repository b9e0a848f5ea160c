import type { RetryPolicy } from '../retry';
import type { SearchContext } from '../search-context';
import type { SearchResult } from '../occurrence-search';

export const GBIF_BASE = 'https://api.gbif.test/v1';

export const noDelayPolicy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 0,
  maxDelayMs: 0,
  jitter: 0,
};

export function testContext(signal?: AbortSignal): SearchContext {
  return { requestId: 'test', signal };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function emptyPage(overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    records: [],
    count: 0,
    offset: 0,
    limit: 300,
    endOfRecords: true,
    apiUrl: `${GBIF_BASE}/occurrence/search?limit=300&offset=0`,
    ...overrides,
  };
}
