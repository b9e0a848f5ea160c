/**
 * Per-request state threaded through translate → resolve → search.
 * Nothing here is shared between requests.
 */
export interface SearchContext {
  readonly requestId: string;
  readonly signal?: AbortSignal;
}

export function createSearchContext(signal?: AbortSignal): SearchContext {
  return {
    requestId: crypto.randomUUID().slice(0, 8),
    signal,
  };
}
