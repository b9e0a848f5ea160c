/**
 * JSON-over-HTTP helper with a mandatory per-call timeout.
 */

import { RetryExhaustedError } from './retry';

const USER_AGENT = 'Specimen-Search/1.0 (natural language GBIF search)';

export class TimeoutError extends Error {
  constructor(
    readonly target: string,
    readonly timeoutMs: number,
  ) {
    super(`Request to ${target} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string,
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
  }
}

export interface FetchJsonOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs `run` with a signal that aborts after `timeoutMs` or when the caller's
 * signal aborts. Only the former is reported as a TimeoutError.
 */
export async function withTimeout<T>(
  target: string,
  timeoutMs: number,
  signal: AbortSignal | undefined,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forwardAbort();
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  try {
    return await run(controller.signal);
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError(target, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', forwardAbort);
  }
}

export async function fetchJson(url: string, { timeoutMs, signal }: FetchJsonOptions): Promise<unknown> {
  return withTimeout(url, timeoutMs, signal, async (requestSignal) => {
    const response = await fetch(url, {
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
      cache: 'no-store',
      signal: requestSignal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new HttpStatusError(response.status, url, text.slice(0, 500));
    }

    const body: unknown = await response.json();
    return body;
  });
}

/**
 * Timeouts, dropped connections, rate limiting and server errors.
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof HttpStatusError) {
    return error.status >= 500 || error.status === 429 || error.status === 408;
  }
  // fetch rejects with a TypeError when the connection itself fails
  return error instanceof TypeError;
}

export function failureStatus(error: unknown): number | undefined {
  const cause = error instanceof RetryExhaustedError ? error.lastError : error;
  return cause instanceof HttpStatusError ? cause.status : undefined;
}
