/**
 * Average True Range
 *
 * Simple moving average of the last `period` True Range values. No Wilder
 * smoothing and no rounding.
 */

import { InsufficientDataError, InvalidParameterError } from '../errors.js';
import type { PriceBar } from '../types/index.js';

export const DEFAULT_ATR_PERIOD = 14;

/**
 * Largest of the day's range and the two gaps against the prior close.
 */
export function trueRange(high: number, low: number, previousClose: number): number {
  return Math.max(
    high - low,
    Math.abs(high - previousClose),
    Math.abs(low - previousClose)
  );
}

/**
 * ATR over the trailing `period` bars of an ascending series. Needs
 * `period + 1` bars since each True Range reads the previous close.
 */
export function calculateATR(series: readonly PriceBar[], period: number = DEFAULT_ATR_PERIOD): number {
  if (!Number.isInteger(period) || period < 1) {
    throw new InvalidParameterError('period', `ATR period must be a positive integer, got ${period}`);
  }

  const required = period + 1;
  if (series.length < required) {
    throw new InsufficientDataError(
      `ATR(${period}) needs ${required} bars, got ${series.length}`,
      required,
      series.length
    );
  }

  let sum = 0;
  for (let i = series.length - period; i < series.length; i++) {
    const { high, low } = series[i];
    if (low === null) {
      throw new InsufficientDataError(
        `ATR(${period}) window has a bar without a low price`,
        required,
        series.length - i
      );
    }
    sum += trueRange(high, low, series[i - 1].close);
  }

  return sum / period;
}
