// Fixed by the product: every results page holds 300 records
export const PAGE_SIZE = 300;

// GBIF refuses occurrence searches where offset + limit exceeds this
export const GBIF_MAX_PAGING_DEPTH = 100_000;

export function isValidOffset(offset: number): boolean {
  return Number.isInteger(offset) && offset >= 0 && offset % PAGE_SIZE === 0;
}

export function pageCount(total: number): number {
  return Math.ceil(Math.max(0, total) / PAGE_SIZE);
}

/** Records on the final page; 0 when there are no records at all. */
export function lastPageSize(total: number): number {
  if (total <= 0) return 0;
  const remainder = total % PAGE_SIZE;
  return remainder === 0 ? PAGE_SIZE : remainder;
}

/** 1-based page number for display. */
export function pageNumber(offset: number): number {
  return Math.floor(offset / PAGE_SIZE) + 1;
}

export function hasPreviousPage(offset: number): boolean {
  return offset >= PAGE_SIZE;
}

export function hasNextPage(offset: number, total: number): boolean {
  const next = offset + PAGE_SIZE;
  return next < total && next + PAGE_SIZE <= GBIF_MAX_PAGING_DEPTH;
}
