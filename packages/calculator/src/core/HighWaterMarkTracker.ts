/**
 * High-Water Mark Tracker
 *
 * Highest price seen per ticker during one process. Used as the trailing
 * anchor when stored history cannot be read. Emits `hwm:updated`
 * (ticker, high) when a ticker reaches a new high.
 */

import { EventEmitter } from 'events';

export class HighWaterMarkTracker extends EventEmitter {
  private highs: Map<string, number> = new Map();

  /**
   * Record a price and return the ticker's high so far.
   */
  observe(ticker: string, price: number): number {
    const key = ticker.toUpperCase();
    const previous = this.highs.get(key);

    if (previous === undefined || price > previous) {
      this.highs.set(key, price);
      this.emit('hwm:updated', key, price);
      return price;
    }

    return previous;
  }

  get(ticker: string): number | null {
    return this.highs.get(ticker.toUpperCase()) ?? null;
  }

  /**
   * Forget one ticker, or every ticker when none is given.
   */
  reset(ticker?: string): void {
    if (ticker === undefined) {
      this.highs.clear();
    } else {
      this.highs.delete(ticker.toUpperCase());
    }
  }
}
