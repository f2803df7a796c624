/**
 * Engine errors. Each carries a `code` so callers can branch without
 * instanceof checks across package boundaries.
 */

export type StopLossErrorCode = 'invalid-parameter' | 'insufficient-data' | 'cannot-compute';

export abstract class StopLossError extends Error {
  abstract readonly code: StopLossErrorCode;
}

/** A caller-supplied percentage, period, multiplier or price is out of range */
export class InvalidParameterError extends StopLossError {
  readonly code = 'invalid-parameter' as const;

  constructor(readonly parameter: string, message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

/** Not enough history to compute an indicator over the requested window */
export class InsufficientDataError extends StopLossError {
  readonly code = 'insufficient-data' as const;

  constructor(message: string, readonly required: number, readonly available: number) {
    super(message);
    this.name = 'InsufficientDataError';
  }
}

/** A strategy's mandatory anchor is missing */
export class CannotComputeError extends StopLossError {
  readonly code = 'cannot-compute' as const;

  constructor(message: string) {
    super(message);
    this.name = 'CannotComputeError';
  }
}
