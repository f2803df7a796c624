import { InsufficientDataError, InvalidParameterError } from '../errors.js';

export const MOVING_AVERAGE_PERIOD = 50;

/**
 * Mean of the last `period` values.
 */
export function calculateSMA(values: readonly number[], period: number): number {
  if (!Number.isInteger(period) || period < 1) {
    throw new InvalidParameterError('period', `SMA period must be a positive integer, got ${period}`);
  }
  if (values.length < period) {
    throw new InsufficientDataError(
      `SMA(${period}) needs ${period} values, got ${values.length}`,
      period,
      values.length
    );
  }

  const window = values.slice(values.length - period);
  return window.reduce((a, b) => a + b, 0) / period;
}
