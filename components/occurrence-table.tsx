"use client";

import { downloadCsv } from '@/lib/csv-export';
import type { SearchResult } from '@/lib/occurrence-search';

interface OccurrenceTableProps {
  page: SearchResult;
}

export function OccurrenceTable({ page }: OccurrenceTableProps) {
  const first = page.offset + 1;
  const last = page.offset + page.records.length;

  return (
    <section className="bg-white/80 rounded-xl border border-green-200 shadow-sm p-4">
      <div className="flex items-center justify-between mb-3">
        <p className="text-sm text-green-700">
          Showing <strong>{first.toLocaleString()}–{last.toLocaleString()}</strong> of{' '}
          <strong>{page.count.toLocaleString()}</strong> specimens
        </p>
        <button
          type="button"
          onClick={() => downloadCsv(page)}
          className="px-3 py-1.5 text-sm bg-green-600 hover:bg-green-700 text-white rounded-lg transition-colors"
        >
          ⬇️ Download CSV
        </button>
      </div>

      <div className="overflow-x-auto">
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-green-800 border-b border-green-200">
              <th className="py-2 pr-3">Record</th>
              <th className="py-2 pr-3">Catalog number</th>
              <th className="py-2 pr-3">Scientific name</th>
              <th className="py-2 pr-3">Event date</th>
              <th className="py-2 pr-3">Recorded by</th>
              <th className="py-2 pr-3">Locality</th>
              <th className="py-2 pr-3">Institution</th>
              <th className="py-2">Image</th>
            </tr>
          </thead>
          <tbody>
            {page.records.map((record) => (
              <tr key={record.key} className="border-b border-green-50 align-top">
                <td className="py-1.5 pr-3">
                  <a href={record.link} target="_blank" rel="noreferrer" className="text-blue-700 hover:underline">
                    View record
                  </a>
                </td>
                <td className="py-1.5 pr-3">{record.catalogNumber}</td>
                <td className="py-1.5 pr-3 italic">{record.scientificName}</td>
                <td className="py-1.5 pr-3 whitespace-nowrap">{record.eventDate}</td>
                <td className="py-1.5 pr-3">{record.recordedBy}</td>
                <td className="py-1.5 pr-3">{record.locality}</td>
                <td className="py-1.5 pr-3">
                  {[record.institutionCode, record.collectionCode].filter(Boolean).join(' / ')}
                </td>
                <td className="py-1.5">
                  {record.imageUrl && (
                    <a href={record.imageUrl} target="_blank" rel="noreferrer" className="text-blue-700 hover:underline">
                      View image{record.imageCount > 1 ? ` (${record.imageCount})` : ''}
                    </a>
                  )}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <p className="mt-3 text-sm">
        <a href={page.apiUrl} target="_blank" rel="noreferrer" className="font-semibold text-blue-700 hover:underline">
          Open raw GBIF search results
        </a>
      </p>
    </section>
  );
}
