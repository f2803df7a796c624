/**
 * Store Errors
 *
 * "No data" is never an error: reads return null or an empty array.
 * These classes cover the cases where the store could not do its job.
 */

export type HistoryErrorCode = 'persistence-unavailable' | 'invalid-observation';

export abstract class HistoryError extends Error {
  abstract readonly code: HistoryErrorCode;
}

/**
 * The database could not be reached, locked, or rejected the statement.
 * Callers may degrade to current-price-only calculation on this error.
 */
export class PersistenceUnavailableError extends HistoryError {
  readonly code = 'persistence-unavailable' as const;

  constructor(readonly operation: string, options?: { cause?: unknown }) {
    super(`Price history unavailable during ${operation}: ${describeCause(options?.cause)}`, options);
    this.name = 'PersistenceUnavailableError';
  }
}

export class InvalidObservationError extends HistoryError {
  readonly code = 'invalid-observation' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidObservationError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
