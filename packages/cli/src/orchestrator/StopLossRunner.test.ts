import { describe, it, expect, beforeEach } from 'vitest';
import type { Pool } from 'pg';
import { HighWaterMarkTracker, InvalidParameterError, type PriceSnapshot } from '@stop-loss/calculator';
import { PriceHistoryStore, addDays, type PriceObservationInput, type TradeDate } from '@stop-loss/history';
import { createMemoryPool } from '@stop-loss/history/testing';
import { MarketDataError, type MarketDataProvider } from '../feeds/types.js';
import { SMA_FETCH_DAYS, StopLossRunner, atrFetchDays, type RunRequest, type TickerOutcome, type TickerSuccess } from './StopLossRunner.js';

const NOW = new Date(2024, 5, 14, 12, 0);
const TODAY = '2024-06-14';

class FakeMarketData implements MarketDataProvider {
  quotes = new Map<string, Partial<PriceSnapshot>>();
  history = new Map<string, PriceObservationInput[]>();
  quoteErrors = new Map<string, Error>();
  historyFails = false;
  quoteCalls: string[] = [];
  historyCalls: Array<{ ticker: string; start: TradeDate; end: TradeDate }> = [];

  async getCurrentSnapshot(ticker: string): Promise<PriceSnapshot> {
    this.quoteCalls.push(ticker);
    const failure = this.quoteErrors.get(ticker);
    if (failure) throw failure;
    const quote = this.quotes.get(ticker);
    if (!quote || quote.currentPrice === undefined) {
      throw new MarketDataError(ticker, `Could not fetch price for ${ticker}`);
    }
    return {
      ticker,
      currency: 'USD',
      timestamp: NOW,
      ...quote,
      currentPrice: quote.currentPrice,
    };
  }

  async getHistoricalSeries(ticker: string, start: TradeDate, end: TradeDate): Promise<PriceObservationInput[]> {
    this.historyCalls.push({ ticker, start, end });
    if (this.historyFails) {
      throw new MarketDataError(ticker, 'HTTP 503');
    }
    return (this.history.get(ticker) ?? []).filter((bar) => bar.date >= start && bar.date <= end);
  }
}

function request(overrides: Partial<RunRequest> = {}): RunRequest {
  return {
    tickers: ['AAPL'],
    mode: 'simple',
    percentage: 5,
    atrPeriod: 14,
    atrMultiplier: 2,
    useWeek52High: false,
    syncHistory: false,
    trailingLookbackDays: 90,
    ...overrides,
  };
}

/** `count` daily bars ending today with a constant 5-point range */
function flatBars(ticker: string, count: number): PriceObservationInput[] {
  return Array.from({ length: count }, (_, i) => ({
    ticker,
    date: addDays(TODAY, i - count + 1),
    open: 101,
    high: 105,
    low: 100,
    close: 102,
    volume: 1_000,
  }));
}

function expectOk(outcome: TickerOutcome | undefined): TickerSuccess {
  if (outcome?.status !== 'ok') {
    throw new Error(`expected success, got ${JSON.stringify(outcome)}`);
  }
  return outcome;
}

describe('StopLossRunner', () => {
  let pool: Pool;
  let store: PriceHistoryStore;
  let marketData: FakeMarketData;

  beforeEach(async () => {
    pool = createMemoryPool();
    store = await PriceHistoryStore.open(pool);
    marketData = new FakeMarketData();
    marketData.quotes.set('AAPL', { currentPrice: 150 });
  });

  function runner(tracker?: HighWaterMarkTracker, cache?: Map<string, PriceSnapshot>): StopLossRunner {
    return new StopLossRunner({ marketData, store, tracker, cache, now: () => NOW });
  }

  describe('simple mode', () => {
    it('should compute the stop and record the quote as today\'s bar', async () => {
      const summary = await runner().run(request());

      const outcome = expectOk(summary.outcomes[0]);
      expect(outcome.result.stopLossPrice).toBeCloseTo(142.5, 10);
      expect(outcome.result.dollarRisk).toBeCloseTo(7.5, 10);
      expect(outcome.degraded).toBe(false);
      expect(await store.latestDate('AAPL')).toBe(TODAY);
    });

    it('should continue past a ticker that cannot be priced', async () => {
      marketData.quotes.set('MSFT', { currentPrice: 400 });

      const summary = await runner().run(request({ tickers: ['AAPL', 'NOPE', 'MSFT'] }));

      expect(summary.succeeded).toBe(2);
      expect(summary.failed).toBe(1);
      expect(summary.outcomes.map((o) => o.status)).toEqual(['ok', 'failed', 'ok']);
      expect(summary.outcomes[1]).toEqual({
        status: 'failed',
        ticker: 'NOPE',
        kind: 'upstream',
        message: 'Could not fetch price for NOPE',
      });
    });

    it('should fail only the ticker whose quote request throws an untyped error', async () => {
      marketData.quotes.set('MSFT', { currentPrice: 400 });
      marketData.quoteErrors.set('BAD', new Error('socket hang up'));

      const summary = await runner().run(request({ tickers: ['AAPL', 'BAD', 'MSFT'] }));

      expect(summary.succeeded).toBe(2);
      expect(summary.outcomes[1]).toEqual({
        status: 'failed',
        ticker: 'BAD',
        kind: 'upstream',
        message: 'socket hang up',
      });
      expect(expectOk(summary.outcomes[2]).result.basePrice).toBe(400);
    });

    it('should backfill history for the 50-day average when too few closes are stored', async () => {
      marketData.history.set('AAPL', Array.from({ length: 60 }, (_, i) => ({
        ticker: 'AAPL',
        date: addDays(TODAY, i - 60),
        open: 100,
        high: 101,
        low: 99,
        close: 100,
        volume: 1_000,
      })));
      marketData.quotes.set('AAPL', { currentPrice: 110 });

      const summary = await runner().run(request({ syncHistory: true }));

      expect(marketData.historyCalls).toEqual([
        { ticker: 'AAPL', start: addDays(TODAY, -SMA_FETCH_DAYS), end: addDays(TODAY, -1) },
      ]);
      // 49 fetched closes of 100 and today's 110
      const { result } = expectOk(summary.outcomes[0]);
      expect(result.movingAvg50).toBeCloseTo(100.2, 10);
      expect(result.guidance).toBe('keep_current');
    });

    it('should leave the 50-day average unset when syncing is off', async () => {
      const summary = await runner().run(request());

      const { result } = expectOk(summary.outcomes[0]);
      expect(result.movingAvg50).toBeNull();
      expect(result.guidance).toBe('not_applicable');
      expect(marketData.historyCalls).toEqual([]);
    });

    it('should normalise and deduplicate tickers', async () => {
      const summary = await runner().run(request({ tickers: [' aapl', 'AAPL', ''] }));

      expect(summary.outcomes).toHaveLength(1);
      expect(marketData.quoteCalls).toEqual(['AAPL']);
    });

    it('should reuse cached quotes within one invocation', async () => {
      const cache = new Map<string, PriceSnapshot>();
      const first = runner(undefined, cache);

      await first.run(request());
      await first.run(request({ percentage: 10 }));

      expect(marketData.quoteCalls).toEqual(['AAPL']);
    });

    it('should anchor to the 52-week high when asked', async () => {
      marketData.quotes.set('AAPL', { currentPrice: 190, week52High: 200 });

      const summary = await runner().run(request({ useWeek52High: true }));

      const { result } = expectOk(summary.outcomes[0]);
      expect(result.anchor).toBe('week52High');
      expect(result.basePrice).toBe(200);
      expect(result.stopLossPrice).toBeCloseTo(190, 10);
    });

    it('should fall back to the current price with a warning when no 52-week high is known', async () => {
      const summary = await runner().run(request({ useWeek52High: true }));

      const outcome = expectOk(summary.outcomes[0]);
      expect(outcome.result.week52Unavailable).toBe(true);
      expect(outcome.result.basePrice).toBe(150);
      expect(outcome.warnings).toEqual(['52-week high unavailable, using current price']);
    });

    it('should reject invalid parameters before fetching anything', async () => {
      await expect(runner().run(request({ percentage: 120 }))).rejects.toBeInstanceOf(InvalidParameterError);
      await expect(runner().run(request({ atrPeriod: 0 }))).rejects.toBeInstanceOf(InvalidParameterError);
      await expect(runner().run(request({ sinceDate: '2024-13-01' }))).rejects.toBeInstanceOf(InvalidParameterError);
      expect(marketData.quoteCalls).toEqual([]);
    });
  });

  describe('trailing mode', () => {
    it('should trail the stored high-water mark', async () => {
      await store.upsertMany([
        { ticker: 'AAPL', date: '2024-06-10', high: 160, close: 158 },
        { ticker: 'AAPL', date: '2024-06-11', high: 155, close: 152 },
      ]);

      const summary = await runner().run(request({ mode: 'trailing' }));

      const { result } = expectOk(summary.outcomes[0]);
      expect(result.basePrice).toBe(160);
      expect(result.stopLossPrice).toBeCloseTo(152, 10);
    });

    it('should include the current quote in the high-water mark', async () => {
      await store.upsert({ ticker: 'AAPL', date: '2024-06-10', high: 140, close: 139 });

      const summary = await runner().run(request({ mode: 'trailing' }));

      expect(expectOk(summary.outcomes[0]).result.basePrice).toBe(150);
    });

    it('should fetch the lookback window on the first run', async () => {
      await runner().run(request({ mode: 'trailing', syncHistory: true }));

      // the lookback window already covers the 50-day average, so no backfill follows
      expect(marketData.historyCalls).toEqual([{ ticker: 'AAPL', start: '2024-03-16', end: TODAY }]);
    });

    it('should start the first fetch at sinceDate when given', async () => {
      await runner().run(request({ mode: 'trailing', syncHistory: true, sinceDate: '2024-01-02' }));

      expect(marketData.historyCalls[0].start).toBe('2024-01-02');
    });

    it('should only fetch bars after the latest stored date', async () => {
      await store.upsert({ ticker: 'AAPL', date: '2024-06-10', high: 151, close: 150 });

      await runner().run(request({ mode: 'trailing', syncHistory: true }));

      expect(marketData.historyCalls).toEqual([
        { ticker: 'AAPL', start: '2024-06-11', end: TODAY },
        // too short for the 50-day average, so one backfill follows
        { ticker: 'AAPL', start: addDays(TODAY, -SMA_FETCH_DAYS), end: addDays(TODAY, -1) },
      ]);
    });

    it('should skip the fetch when history is already current', async () => {
      await store.upsert({ ticker: 'AAPL', date: TODAY, high: 151, close: 150 });

      await runner().run(request({ mode: 'trailing', syncHistory: true }));

      // only the 50-day average backfill, never a fetch past today
      expect(marketData.historyCalls).toEqual([
        { ticker: 'AAPL', start: addDays(TODAY, -SMA_FETCH_DAYS), end: addDays(TODAY, -1) },
      ]);
    });

    it('should store fetched bars and use them for the high-water mark', async () => {
      marketData.history.set('AAPL', [
        { ticker: 'AAPL', date: '2024-05-01', open: 170, high: 180, low: 168, close: 175, volume: 10 },
        { ticker: 'AAPL', date: '2024-05-02', open: 175, high: 176, low: 160, close: 162, volume: 10 },
      ]);

      const summary = await runner().run(request({ mode: 'trailing', syncHistory: true }));

      expect(expectOk(summary.outcomes[0]).result.stopLossPrice).toBeCloseTo(171, 10);
      expect(await store.getHistory('AAPL')).toHaveLength(3);
    });

    it('should warn and carry on when the history fetch fails', async () => {
      marketData.historyFails = true;

      const summary = await runner().run(request({ mode: 'trailing', syncHistory: true }));

      const outcome = expectOk(summary.outcomes[0]);
      expect(outcome.result.basePrice).toBe(150);
      expect(outcome.warnings).toEqual(['Could not fetch history: HTTP 503']);
    });
  });

  describe('atr mode', () => {
    it('should compute ATR from stored bars', async () => {
      await store.upsertMany(flatBars('AAPL', 15));
      marketData.quotes.set('AAPL', { currentPrice: 102 });

      const summary = await runner().run(request({ mode: 'atr' }));

      const { result } = expectOk(summary.outcomes[0]);
      expect(result.atr).toBeCloseTo(5, 10);
      expect(result.atrMultiplier).toBe(2);
      expect(result.stopLossPrice).toBeCloseTo(92, 10);
    });

    it('should fail the ticker when there are too few bars and syncing is off', async () => {
      const summary = await runner().run(request({ mode: 'atr' }));

      expect(summary.outcomes[0]).toMatchObject({ status: 'failed', ticker: 'AAPL', kind: 'insufficient-data' });
    });

    it('should fetch the ATR window on the first run', async () => {
      marketData.history.set('AAPL', flatBars('AAPL', 20));
      marketData.quotes.set('AAPL', { currentPrice: 102 });

      const summary = await runner().run(request({ mode: 'atr', syncHistory: true }));

      expect(marketData.historyCalls[0]).toEqual({
        ticker: 'AAPL',
        start: addDays(TODAY, -atrFetchDays(14)),
        end: TODAY,
      });
      expect(expectOk(summary.outcomes[0]).result.stopLossPrice).toBeCloseTo(92, 10);
    });

    it('should refetch a full window once when stored bars are too few', async () => {
      await store.upsertMany(flatBars('AAPL', 15).slice(10));
      marketData.history.set('AAPL', flatBars('AAPL', 15));
      marketData.quotes.set('AAPL', { currentPrice: 102 });

      const summary = await runner().run(request({ mode: 'atr', syncHistory: true }));

      // stored history is current, so the only fetch is the refill
      expect(marketData.historyCalls.map((c) => c.start)).toEqual([addDays(TODAY, -180)]);
      expect(expectOk(summary.outcomes[0]).result.atr).toBeCloseTo(5, 10);
    });
  });

  describe('history failures', () => {
    it('should degrade to the session high when the store fails', async () => {
      const tracker = new HighWaterMarkTracker();
      tracker.observe('AAPL', 170);
      marketData.quotes.set('MSFT', { currentPrice: 400 });
      await pool.query('DROP TABLE price_history');

      const active = runner(tracker);
      const summary = await active.run(request({ mode: 'trailing', tickers: ['AAPL', 'MSFT'] }));

      const aapl = expectOk(summary.outcomes[0]);
      expect(aapl.degraded).toBe(true);
      expect(aapl.result.stopLossPrice).toBeCloseTo(161.5, 10);
      expect(aapl.warnings).toContain('No stored high-water mark, using session high');

      const msft = expectOk(summary.outcomes[1]);
      expect(msft.degraded).toBe(true);
      expect(msft.result.basePrice).toBe(400);
      expect(active.historyAvailable).toBe(false);
    });

    it('should fail ATR tickers when the store is unavailable', async () => {
      await pool.query('DROP TABLE price_history');

      const summary = await runner().run(request({ mode: 'atr' }));

      expect(summary.outcomes[0]).toMatchObject({ status: 'failed', kind: 'insufficient-data' });
    });

    it('should run simple mode without a store', async () => {
      const summary = await new StopLossRunner({ marketData, store: null, now: () => NOW }).run(request());

      const outcome = expectOk(summary.outcomes[0]);
      expect(outcome.degraded).toBe(false);
      expect(outcome.result.stopLossPrice).toBeCloseTo(142.5, 10);
    });
  });
});
