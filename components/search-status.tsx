import type { SearchFailureKind } from '@/hooks/use-occurrence-search';

type SearchStatusProps =
  | { kind: SearchFailureKind; message: string }
  | { kind: 'empty'; message?: string };

const STATUS_CONFIG = {
  translation: {
    icon: '🤔',
    title: 'Could not interpret query',
    tone: 'border-orange-200 text-orange-800',
  },
  search: {
    icon: '🌩️',
    title: 'Search failed',
    tone: 'border-red-200 text-red-800',
  },
  request: {
    icon: '⚠️',
    title: 'Something went wrong',
    tone: 'border-red-200 text-red-800',
  },
  empty: {
    icon: '📭',
    title: 'No records found',
    tone: 'border-green-200 text-green-800',
  },
} as const;

export function SearchStatus(props: SearchStatusProps) {
  const config = STATUS_CONFIG[props.kind];
  const message = props.message ?? 'No specimens matched your query. Try a broader description.';

  return (
    <div
      role={props.kind === 'empty' ? 'status' : 'alert'}
      className={`w-full max-w-lg mx-auto p-6 bg-white/80 backdrop-blur-sm rounded-xl border shadow-lg text-center ${config.tone}`}
    >
      <div className="text-3xl mb-2">{config.icon}</div>
      <h3 className="text-lg font-semibold">{config.title}</h3>
      <p className="text-sm mt-1">{message}</p>
    </div>
  );
}
