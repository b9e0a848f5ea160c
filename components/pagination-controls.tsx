import { PAGE_SIZE, hasNextPage, hasPreviousPage, pageCount, pageNumber } from '@/lib/pagination';

type PaginationControlsProps = {
  offset: number;
  total: number;
  isLoading?: boolean;
  onNavigate: (offset: number) => void;
};

export function PaginationControls({ offset, total, isLoading = false, onNavigate }: PaginationControlsProps) {
  const prevDisabled = !hasPreviousPage(offset) || isLoading;
  const nextDisabled = !hasNextPage(offset, total) || isLoading;
  const buttonClass = (disabled: boolean) =>
    `px-4 py-2 rounded-lg text-sm font-medium transition-colors ${
      disabled ? 'bg-gray-100 text-gray-400 cursor-not-allowed' : 'bg-green-600 hover:bg-green-700 text-white'
    }`;

  return (
    <nav aria-label="Results pages" className="flex items-center justify-center gap-4 mt-4">
      <button
        type="button"
        disabled={prevDisabled}
        className={buttonClass(prevDisabled)}
        onClick={() => onNavigate(offset - PAGE_SIZE)}
      >
        ← Previous
      </button>
      <span className="text-sm text-slate-500">
        Page {pageNumber(offset)} of {pageCount(total)}
      </span>
      <button
        type="button"
        disabled={nextDisabled}
        className={buttonClass(nextDisabled)}
        onClick={() => onNavigate(offset + PAGE_SIZE)}
      >
        Next →
      </button>
    </nav>
  );
}
