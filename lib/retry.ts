/**
 * Bounded exponential backoff shared by every network-calling stage.
 *
 * Each call site supplies its own policy and decides which failures are worth
 * another attempt; everything else about the loop is identical.
 */

import { errorMessage, isAbortError } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay added at random, 0 disables jitter. */
  jitter: number;
}

export interface RetryOptions {
  /** Shown in log lines, e.g. "GBIF occurrence search". */
  label: string;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  random?: () => number;
}

export class RetryExhaustedError extends Error {
  constructor(
    label: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`${label} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
  }
}

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jittered = exponential * (1 + policy.jitter * random());
  return Math.round(Math.min(policy.maxDelayMs, jittered));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const { label, signal, shouldRetry = () => true, onRetry, random } = options;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      // A cancelled request is never retried
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      if (!shouldRetry(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < maxAttempts) {
        const delayMs = backoffDelay(policy, attempt, random);
        if (onRetry) {
          onRetry(error, attempt, delayMs);
        } else {
          console.warn(`🔁 ${label} attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms:`, errorMessage(error));
        }
        await sleep(delayMs, signal);
      }
    }
  }

  throw new RetryExhaustedError(label, maxAttempts, lastError);
}
