/**
 * Error kinds raised by the search pipeline.
 *
 * Only TranslationError and SearchError are ever shown to the user.
 * ResolutionFailed is absorbed by the pipeline and the search continues
 * without the unresolved constraint.
 */

export type NameKind = 'institution' | 'collection';

export class ValidationError extends Error {
  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'ValidationError';
  }
}

export class TranslationError extends Error {
  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TranslationError';
  }
}

export class ResolutionFailed extends Error {
  constructor(
    readonly kind: NameKind,
    readonly query: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not resolve ${kind} "${query}"`, options);
    this.name = 'ResolutionFailed';
  }
}

export class SearchError extends Error {
  constructor(
    readonly status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SearchError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
