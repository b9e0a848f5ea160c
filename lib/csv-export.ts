import type { OccurrenceRecord, SearchResult } from './occurrence-search';
import { pageNumber } from './pagination';

const COLUMNS = [
  'link',
  'catalogNumber',
  'scientificName',
  'eventDate',
  'recordedBy',
  'locality',
  'country',
  'institutionCode',
  'collectionCode',
  'imageUrl',
] as const satisfies readonly (keyof OccurrenceRecord)[];

function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(records: OccurrenceRecord[]): string {
  const lines = [COLUMNS.join(',')];
  for (const record of records) {
    lines.push(COLUMNS.map((column) => escapeCsvField(record[column] ?? '')).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

export function csvFileName(offset: number): string {
  return `gbif-specimens-page-${pageNumber(offset)}.csv`;
}

/** Browser only: saves the page as a CSV file. */
export function downloadCsv(page: SearchResult): void {
  const blob = new Blob([toCsv(page.records)], { type: 'text/csv;charset=utf-8' });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = csvFileName(page.offset);
  anchor.click();
  // Revoking in the same tick can cancel the download
  setTimeout(() => URL.revokeObjectURL(url), 0);
}
