"use client";

import { useCallback, useEffect, useRef, useState } from 'react';
import { isAbortError } from '@/lib/errors';
import type { SearchResult } from '@/lib/occurrence-search';
import { RequestSequencer } from '@/lib/request-sequencer';
import type { PageOutcome, SearchOutcome, SearchRequest } from '@/lib/search-pipeline';

type ApiError = { error: string };
type Interpretation = Extract<SearchOutcome, { status: 'ok' }>;

export type SearchFailureKind = 'translation' | 'search' | 'request';

export interface SearchFailureState {
  kind: SearchFailureKind;
  message: string;
}

interface UseOccurrenceSearchReturn {
  interpretation: Interpretation | null;
  page: SearchResult | null;
  isSearching: boolean;
  isPaging: boolean;
  failure: SearchFailureState | null;
  search: (request: SearchRequest) => Promise<void>;
  goToOffset: (offset: number) => Promise<void>;
}

const GENERIC_FAILURE = 'Sorry, something went wrong. Please try again.';

async function postJson<T>(url: string, body: unknown, signal: AbortSignal): Promise<T | ApiError> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
    signal,
  });
  try {
    const data: T | ApiError = await response.json();
    return data;
  } catch (parseError) {
    console.error('Failed to parse response:', parseError);
    return { error: GENERIC_FAILURE };
  }
}

function isApiError<T extends object>(data: T | ApiError): data is ApiError {
  return 'error' in data;
}

/**
 * Runs the natural-language search for this browser tab. Only the most
 * recently submitted query or page turn is ever shown.
 */
export function useOccurrenceSearch(): UseOccurrenceSearchReturn {
  const sequencerRef = useRef<RequestSequencer | null>(null);
  const [interpretation, setInterpretation] = useState<Interpretation | null>(null);
  const [page, setPage] = useState<SearchResult | null>(null);
  const [isSearching, setIsSearching] = useState(false);
  const [isPaging, setIsPaging] = useState(false);
  const [failure, setFailure] = useState<SearchFailureState | null>(null);

  const sequencer = useCallback((): RequestSequencer => {
    if (!sequencerRef.current) {
      sequencerRef.current = new RequestSequencer();
    }
    return sequencerRef.current;
  }, []);

  useEffect(() => {
    return () => {
      // Cancel any pending request on unmount
      sequencerRef.current?.cancel();
    };
  }, []);

  const search = useCallback(
    async (request: SearchRequest) => {
      const { id, signal } = sequencer().begin();
      setIsSearching(true);
      setIsPaging(false);
      setFailure(null);
      setInterpretation(null);
      setPage(null);

      try {
        const data = await postJson<SearchOutcome>('/api/search', request, signal);
        if (!sequencer().isCurrent(id)) return;

        if (isApiError(data)) {
          setFailure({ kind: 'request', message: data.error });
        } else if (data.status === 'ok') {
          setInterpretation(data);
          setPage(data.page);
        } else if (data.status === 'translation-failed') {
          setFailure({ kind: 'translation', message: data.message });
        } else {
          setFailure({ kind: 'search', message: data.message });
        }
      } catch (error) {
        if (isAbortError(error) || !sequencer().isCurrent(id)) return;
        console.error('Search request failed:', error);
        setFailure({ kind: 'request', message: GENERIC_FAILURE });
      } finally {
        if (sequencer().isCurrent(id)) setIsSearching(false);
      }
    },
    [sequencer],
  );

  const goToOffset = useCallback(
    async (offset: number) => {
      if (!interpretation) return;
      const { id, signal } = sequencer().begin();
      setIsPaging(true);
      setFailure(null);

      try {
        const data = await postJson<PageOutcome>(
          '/api/gbif/occurrences',
          { parameters: interpretation.resolved, offset },
          signal,
        );
        if (!sequencer().isCurrent(id)) return;

        if (isApiError(data)) {
          setFailure({ kind: 'request', message: data.error });
        } else if (data.status === 'ok') {
          setPage(data.page);
        } else {
          setFailure({ kind: 'search', message: data.message });
        }
      } catch (error) {
        if (isAbortError(error) || !sequencer().isCurrent(id)) return;
        console.error('Page request failed:', error);
        setFailure({ kind: 'request', message: GENERIC_FAILURE });
      } finally {
        if (sequencer().isCurrent(id)) setIsPaging(false);
      }
    },
    [interpretation, sequencer],
  );

  return { interpretation, page, isSearching, isPaging, failure, search, goToOffset };
}
