"use client";

import { useState, type FormEvent } from 'react';
import { InterpretedParameters } from '@/components/interpreted-parameters';
import { OccurrenceTable } from '@/components/occurrence-table';
import { PaginationControls } from '@/components/pagination-controls';
import { SearchProgressLoader } from '@/components/search-progress-loader';
import { SearchStatus } from '@/components/search-status';
import { useOccurrenceSearch } from '@/hooks/use-occurrence-search';

interface OccurrenceSearchProps {
  /** True when INSTITUTION_KEY scopes every search, which hides the manual code inputs. */
  institutionScoped: boolean;
  maxQueryLength: number;
}

export function OccurrenceSearch({ institutionScoped, maxQueryLength }: OccurrenceSearchProps) {
  const [query, setQuery] = useState('');
  const [submittedQuery, setSubmittedQuery] = useState('');
  const [institutionCode, setInstitutionCode] = useState('');
  const [collectionCode, setCollectionCode] = useState('');
  const { interpretation, page, isSearching, isPaging, failure, search, goToOffset } = useOccurrenceSearch();

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const trimmed = query.trim();
    if (!trimmed) return;
    setSubmittedQuery(trimmed);
    void search({
      query: trimmed,
      ...(institutionScoped ? {} : { institutionCode, collectionCode }),
    });
  };

  return (
    <div className="space-y-6">
      <form onSubmit={handleSubmit} className="space-y-3">
        <h2 className="text-xl font-bold text-green-800">Search</h2>
        <label htmlFor="query" className="block text-sm font-medium text-green-700">
          Enter your specimen search query
        </label>
        <div className="flex gap-3">
          <input
            id="query"
            type="text"
            value={query}
            maxLength={maxQueryLength}
            onChange={(event) => setQuery(event.target.value)}
            placeholder="e.g. Blue Jays from Toronto"
            className="flex-1 px-4 py-2 rounded-lg border border-green-300 focus:outline-none focus:ring-2 focus:ring-green-500"
          />
          <button
            type="submit"
            disabled={!query.trim()}
            className="px-6 py-2 bg-green-600 hover:bg-green-700 disabled:bg-gray-300 text-white font-bold rounded-lg transition-colors"
          >
            SEARCH
          </button>
        </div>

        {!institutionScoped && (
          <details className="rounded-lg border border-green-200 bg-white/60 p-3">
            <summary className="cursor-pointer text-sm font-medium text-green-700">Manual configuration options</summary>
            <p className="mt-2 text-sm text-gray-600">
              If you would like to filter your results to a particular institution or collection, enter those codes
              below. The search will also try to find them in your query, but that can be unreliable.
            </p>
            <div className="mt-3 grid grid-cols-2 gap-3">
              <label className="text-sm text-green-700">
                Institution Code
                <input
                  type="text"
                  value={institutionCode}
                  onChange={(event) => setInstitutionCode(event.target.value)}
                  placeholder="e.g. BBM"
                  className="mt-1 w-full px-3 py-1.5 rounded-lg border border-green-300"
                />
              </label>
              <label className="text-sm text-green-700">
                Collection Code
                <input
                  type="text"
                  value={collectionCode}
                  onChange={(event) => setCollectionCode(event.target.value)}
                  placeholder="e.g. CTC"
                  className="mt-1 w-full px-3 py-1.5 rounded-lg border border-green-300"
                />
              </label>
            </div>
          </details>
        )}
      </form>

      {isSearching && <SearchProgressLoader query={submittedQuery} />}

      {failure && <SearchStatus kind={failure.kind} message={failure.message} />}

      {interpretation && (
        <InterpretedParameters
          interpreted={interpretation.interpreted}
          resolutions={interpretation.resolutions}
          institutionScoped={institutionScoped}
        />
      )}

      {page && page.records.length === 0 && !failure && <SearchStatus kind="empty" />}

      {page && page.records.length > 0 && (
        <div className={isPaging ? 'opacity-60 transition-opacity' : undefined}>
          <OccurrenceTable page={page} />
          <PaginationControls
            offset={page.offset}
            total={page.count}
            isLoading={isPaging}
            onNavigate={(offset) => void goToOffset(offset)}
          />
        </div>
      )}
    </div>
  );
}
