import { z } from 'zod';
import { CONFIG, type AppConfig } from './config';
import { ResolutionFailed, errorMessage, isAbortError, type NameKind } from './errors';
import { fetchJson, isTransientFailure } from './http';
import { withRetry, type RetryPolicy } from './retry';
import type { SearchContext } from './search-context';

export type NameResolution =
  | { kind: NameKind; query: string; status: 'matched'; key: string; label: string }
  | { kind: NameKind; query: string; status: 'not-found' }
  | { kind: NameKind; query: string; status: 'failed'; reason: string };

export interface NameResolver {
  resolve(kind: NameKind, name: string, ctx: SearchContext): Promise<NameResolution>;
}

// GRSciColl search responses, trimmed to what we read
const grscicollSearchSchema = z.object({
  count: z.number().optional(),
  results: z
    .array(
      z.object({
        key: z.string().uuid(),
        code: z.string().optional(),
        name: z.string().optional(),
      }),
    )
    .default([]),
});

export interface GrscicollResolverOptions {
  baseUrl: string;
  timeoutMs: number;
  retry: RetryPolicy;
  /** How many ranked candidates to ask for; only the first is used. */
  candidateLimit?: number;
}

/**
 * Maps an institution or collection name to its GRSciColl key.
 *
 * The search endpoint ranks by relevance, so the first result wins. A miss or
 * a failed lookup never blocks the search: the constraint is simply dropped.
 */
export class GrscicollNameResolver implements NameResolver {
  constructor(private readonly options: GrscicollResolverOptions) {}

  async resolve(kind: NameKind, name: string, ctx: SearchContext): Promise<NameResolution> {
    const query = name.trim();
    if (!query) {
      return { kind, query, status: 'not-found' };
    }

    const params = new URLSearchParams({
      q: query,
      limit: String(this.options.candidateLimit ?? 5),
    });
    const url = `${this.options.baseUrl}/grscicoll/${kind}/search?${params.toString()}`;

    console.log(`🏛️ [${ctx.requestId}] Resolving ${kind} "${query}"`);

    try {
      const body = await withRetry(
        () => fetchJson(url, { timeoutMs: this.options.timeoutMs, signal: ctx.signal }),
        this.options.retry,
        {
          label: `GRSciColl ${kind} lookup`,
          signal: ctx.signal,
          shouldRetry: isTransientFailure,
        },
      );

      const { results } = grscicollSearchSchema.parse(body);
      if (results.length === 0) {
        console.log(`❌ [${ctx.requestId}] No ${kind} matches "${query}", dropping the constraint`);
        return { kind, query, status: 'not-found' };
      }

      const [best] = results;
      if (results.length > 1) {
        console.log(`⚖️ [${ctx.requestId}] ${results.length} ${kind} candidates for "${query}", taking the first`);
      }
      const label = [best.name, best.code ? `(${best.code})` : undefined].filter(Boolean).join(' ') || best.key;
      console.log(`✅ [${ctx.requestId}] ${kind} "${query}" → ${best.key}`);
      return { kind, query, status: 'matched', key: best.key, label };
    } catch (error) {
      if (ctx.signal?.aborted || isAbortError(error)) {
        throw error;
      }
      const failure = new ResolutionFailed(kind, query, { cause: error });
      console.warn(`⚠️ [${ctx.requestId}] ${failure.message}: ${errorMessage(error)}`);
      return { kind, query, status: 'failed', reason: errorMessage(error) };
    }
  }
}

export function createNameResolver(config: AppConfig = CONFIG): NameResolver {
  return new GrscicollNameResolver({
    baseUrl: config.gbif.baseUrl,
    timeoutMs: config.gbif.timeoutMs,
    retry: config.retry,
  });
}
