/**
 * Market data contract
 */

import type { PriceSnapshot } from '@stop-loss/calculator';
import type { PriceObservationInput, TradeDate } from '@stop-loss/history';

export interface MarketDataProvider {
  /** Live quote; rejects with MarketDataError when the ticker cannot be priced */
  getCurrentSnapshot(ticker: string): Promise<PriceSnapshot>;
  /** Daily bars from `startDate` to `endDate` inclusive, oldest first; may be empty */
  getHistoricalSeries(ticker: string, startDate: TradeDate, endDate: TradeDate): Promise<PriceObservationInput[]>;
}

export class MarketDataError extends Error {
  readonly code = 'upstream' as const;

  constructor(readonly ticker: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarketDataError';
  }
}
