/**
 * Stop-Loss Runner
 *
 * Runs one batch of tickers: quote, incremental history sync, stored
 * aggregates, engine. Each ticker succeeds or fails on its own. When the
 * history store fails, the rest of the batch continues without it and the
 * affected results are flagged as degraded.
 */

import { pino } from 'pino';
import {
  HighWaterMarkTracker,
  InsufficientDataError,
  InvalidParameterError,
  MOVING_AVERAGE_PERIOD,
  StopLossError,
  calculateATR,
  calculateSMA,
  evaluateStopLoss,
  type PriceSnapshot,
  type StopLossErrorCode,
  type StopLossResult,
  type StopLossStrategy,
  type Week52HighAnchor,
} from '@stop-loss/calculator';
import {
  HistoryError,
  PersistenceUnavailableError,
  addDays,
  isTradeDate,
  toTradeDate,
  type HistoryErrorCode,
  type PriceHistoryStore,
  type PriceObservation,
  type PriceObservationInput,
  type TradeDate,
} from '@stop-loss/history';
import { MarketDataError, type MarketDataProvider } from '../feeds/types.js';

const logger = pino({ name: 'stop-loss-runner', level: process.env.LOG_LEVEL ?? 'info' });

// ============================================
// Types
// ============================================

export type CalculationMode = 'simple' | 'trailing' | 'atr';

export interface RunRequest {
  tickers: string[];
  mode: CalculationMode;
  percentage: number;
  atrPeriod: number;
  atrMultiplier: number;
  /** Start of the trailing window and of the first history fetch */
  sinceDate?: TradeDate;
  /** Measure simple and ATR stops from the 52-week high */
  useWeek52High: boolean;
  /** Fetch missing daily bars before calculating */
  syncHistory: boolean;
  /** First-fetch depth for trailing mode without sinceDate */
  trailingLookbackDays: number;
}

export type FailureKind = StopLossErrorCode | HistoryErrorCode | 'upstream';

export interface TickerSuccess {
  status: 'ok';
  ticker: string;
  result: StopLossResult;
  warnings: string[];
  /** Computed without stored history after a persistence failure */
  degraded: boolean;
}

export interface TickerFailure {
  status: 'failed';
  ticker: string;
  kind: FailureKind;
  message: string;
}

export type TickerOutcome = TickerSuccess | TickerFailure;

export interface RunSummary {
  outcomes: TickerOutcome[];
  succeeded: number;
  failed: number;
}

export interface RunnerDependencies {
  marketData: MarketDataProvider;
  /** null when history is disabled */
  store: PriceHistoryStore | null;
  tracker?: HighWaterMarkTracker;
  /** Snapshot cache for this invocation */
  cache?: Map<string, PriceSnapshot>;
  now?: () => Date;
}

interface TickerContext {
  warnings: string[];
  degraded: boolean;
  /** Earliest start of a history fetch already attempted for this ticker */
  fetchedFrom?: TradeDate;
}

/** Minimum first fetch for ATR; the period needs trading days, not calendar days */
const MIN_ATR_FETCH_DAYS = 180;

/** Calendar days that hold the trading days of one 50-day average */
export const SMA_FETCH_DAYS = 75;

export function atrFetchDays(period: number): number {
  return Math.max(period * 3, MIN_ATR_FETCH_DAYS);
}

export function validateRunRequest(request: RunRequest): void {
  if (!Number.isFinite(request.percentage) || request.percentage < 0 || request.percentage > 100) {
    throw new InvalidParameterError('percentage', `Percentage must be between 0 and 100, got ${request.percentage}`);
  }
  if (!Number.isInteger(request.atrPeriod) || request.atrPeriod < 1) {
    throw new InvalidParameterError('atrPeriod', `ATR period must be a positive integer, got ${request.atrPeriod}`);
  }
  if (!Number.isFinite(request.atrMultiplier) || request.atrMultiplier <= 0) {
    throw new InvalidParameterError('atrMultiplier', `ATR multiplier must be positive, got ${request.atrMultiplier}`);
  }
  if (!Number.isInteger(request.trailingLookbackDays) || request.trailingLookbackDays < 1) {
    throw new InvalidParameterError(
      'trailingLookbackDays',
      `Trailing lookback must be a positive number of days, got ${request.trailingLookbackDays}`
    );
  }
  if (request.sinceDate !== undefined && !isTradeDate(request.sinceDate)) {
    throw new InvalidParameterError('sinceDate', `Invalid date format: ${request.sinceDate}. Use YYYY-MM-DD`);
  }
}

// ============================================
// Runner
// ============================================

export class StopLossRunner {
  private readonly marketData: MarketDataProvider;
  private readonly tracker: HighWaterMarkTracker;
  private readonly cache: Map<string, PriceSnapshot>;
  private readonly now: () => Date;
  private store: PriceHistoryStore | null;
  private storeFailure: PersistenceUnavailableError | null = null;

  constructor(deps: RunnerDependencies) {
    this.marketData = deps.marketData;
    this.store = deps.store;
    this.tracker = deps.tracker ?? new HighWaterMarkTracker();
    this.cache = deps.cache ?? new Map();
    this.now = deps.now ?? (() => new Date());

    this.tracker.on('hwm:updated', (ticker: string, high: number) => {
      logger.debug({ ticker, high }, 'Session high updated');
    });
  }

  /**
   * Whether stored history is still in use for this runner.
   */
  get historyAvailable(): boolean {
    return this.store !== null;
  }

  async run(request: RunRequest): Promise<RunSummary> {
    validateRunRequest(request);

    const tickers = [...new Set(request.tickers.map((t) => t.trim().toUpperCase()).filter((t) => t.length > 0))];
    const outcomes: TickerOutcome[] = [];

    for (const ticker of tickers) {
      outcomes.push(await this.processTicker(ticker, request));
    }

    const succeeded = outcomes.filter((o) => o.status === 'ok').length;
    logger.debug({ mode: request.mode, succeeded, total: outcomes.length }, 'Batch complete');

    return { outcomes, succeeded, failed: outcomes.length - succeeded };
  }

  // ============================================
  // Per-ticker Flow
  // ============================================

  private async processTicker(ticker: string, request: RunRequest): Promise<TickerOutcome> {
    const ctx: TickerContext = { warnings: [], degraded: false };

    let snapshot: PriceSnapshot;
    try {
      snapshot = await this.getSnapshot(ticker);
    } catch (error) {
      if (error instanceof MarketDataError) {
        return this.toFailure(ticker, error);
      }
      logger.warn({ ticker, err: error }, 'Quote retrieval failed');
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'failed', ticker, kind: 'upstream', message };
    }

    try {
      if (request.mode !== 'simple' && request.syncHistory) {
        await this.syncHistory(ticker, request, ctx);
      }

      await this.withStore(ctx, (store) => store.recordCurrentPrice({
        ticker,
        price: snapshot.currentPrice,
        timestamp: snapshot.timestamp,
        week52High: snapshot.week52High ?? null,
        week52Low: snapshot.week52Low ?? null,
      }));
      this.tracker.observe(ticker, snapshot.currentPrice);

      const strategy = await this.buildStrategy(ticker, snapshot, request, ctx);
      const movingAvg50 = snapshot.movingAvg50 ?? await this.storedMovingAverage(ticker, request, ctx);
      const result = evaluateStopLoss({ snapshot, strategy, movingAvg50 });

      if (result.week52Unavailable) {
        ctx.warnings.push('52-week high unavailable, using current price');
      }

      return { status: 'ok', ticker, result, warnings: ctx.warnings, degraded: ctx.degraded };
    } catch (error) {
      return this.toFailure(ticker, error);
    }
  }

  private async getSnapshot(ticker: string): Promise<PriceSnapshot> {
    const cached = this.cache.get(ticker);
    if (cached) return cached;

    const snapshot = await this.marketData.getCurrentSnapshot(ticker);
    this.cache.set(ticker, snapshot);
    return snapshot;
  }

  private async buildStrategy(
    ticker: string,
    snapshot: PriceSnapshot,
    request: RunRequest,
    ctx: TickerContext
  ): Promise<StopLossStrategy> {
    switch (request.mode) {
      case 'simple':
        return {
          kind: 'simple',
          percentage: request.percentage,
          anchor: await this.week52Anchor(ticker, snapshot, request, ctx),
        };

      case 'trailing': {
        const stored = await this.withStore(ctx, (store) => store.highWaterMark(ticker, request.sinceDate));
        let highWaterMark = stored ?? null;
        if (highWaterMark === null) {
          highWaterMark = this.tracker.get(ticker);
          if (highWaterMark !== null) {
            ctx.warnings.push('No stored high-water mark, using session high');
          }
        }
        return { kind: 'trailing', percentage: request.percentage, highWaterMark };
      }

      case 'atr': {
        const atr = await this.loadAtr(ticker, request, ctx);
        return {
          kind: 'atr',
          atr,
          multiplier: request.atrMultiplier,
          percentage: request.percentage,
          anchor: await this.week52Anchor(ticker, snapshot, request, ctx),
        };
      }
    }
  }

  private async week52Anchor(
    ticker: string,
    snapshot: PriceSnapshot,
    request: RunRequest,
    ctx: TickerContext
  ): Promise<Week52HighAnchor | undefined> {
    if (!request.useWeek52High) return undefined;

    const stored = await this.withStore(ctx, (store) => store.latestWeek52High(ticker));
    return { type: 'week52High', price: stored ?? snapshot.week52High ?? null };
  }

  // ============================================
  // History
  // ============================================

  /**
   * Fetch bars after the latest stored date, or an initial window on the
   * first run. A retrieval failure only costs this ticker its new bars.
   */
  private async syncHistory(ticker: string, request: RunRequest, ctx: TickerContext): Promise<void> {
    if (this.store === null) return;

    const today = toTradeDate(this.now());
    const latest = await this.withStore(ctx, (store) => store.latestDate(ticker));
    if (latest === undefined) return;

    let start: TradeDate;
    if (latest !== null) {
      start = addDays(latest, 1);
      if (start > today) return;
    } else {
      const days = request.mode === 'atr' ? atrFetchDays(request.atrPeriod) : request.trailingLookbackDays;
      start = request.sinceDate ?? addDays(today, -days);
    }

    await this.fetchAndStore(ticker, start, today, ctx);
  }

  private async fetchAndStore(
    ticker: string,
    start: TradeDate,
    end: TradeDate,
    ctx: TickerContext,
    skipDates: ReadonlySet<TradeDate> = new Set()
  ): Promise<number> {
    if (ctx.fetchedFrom === undefined || start < ctx.fetchedFrom) {
      ctx.fetchedFrom = start;
    }

    let bars: PriceObservationInput[];
    try {
      bars = await this.marketData.getHistoricalSeries(ticker, start, end);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ ticker, start, end, err: error }, 'Could not fetch history');
      ctx.warnings.push(`Could not fetch history: ${message}`);
      return 0;
    }

    const fresh = bars.filter((bar) => !skipDates.has(bar.date));
    const written = await this.withStore(ctx, (store) => store.upsertMany(fresh));
    if (written !== undefined && written > 0) {
      logger.debug({ ticker, start, end, rows: written }, 'Stored new history');
    }
    return written ?? 0;
  }

  /**
   * ATR from stored bars. With too few bars, fetch a full initial window
   * once and retry before giving up.
   */
  private async loadAtr(ticker: string, request: RunRequest, ctx: TickerContext): Promise<number> {
    const period = request.atrPeriod;

    const bars = await this.withStore(ctx, (store) => store.recentHistory(ticker, period + 1));
    if (bars === undefined) {
      throw new InsufficientDataError(`ATR mode requires stored history for ${ticker}`, period + 1, 0);
    }

    try {
      return calculateATR(bars, period);
    } catch (error) {
      if (!(error instanceof InsufficientDataError) || !request.syncHistory) {
        throw error;
      }
    }

    logger.info({ ticker, period }, 'Insufficient data for ATR, fetching history');
    // today's row already holds the live price; a fetched bar must not replace it
    const yesterday = addDays(toTradeDate(this.now()), -1);
    await this.fetchAndStore(ticker, addDays(yesterday, 1 - atrFetchDays(period)), yesterday, ctx);

    const refetched: PriceObservation[] | undefined = await this.withStore(
      ctx,
      (store) => store.recentHistory(ticker, period + 1)
    );
    return calculateATR(refetched ?? bars, period);
  }

  /**
   * 50-day average of stored closes. When syncing and too few are stored,
   * fetch one window of daily bars unless an earlier fetch already covered it.
   */
  private async storedMovingAverage(ticker: string, request: RunRequest, ctx: TickerContext): Promise<number | null> {
    const recent = () => this.withStore(ctx, (store) => store.recentHistory(ticker, MOVING_AVERAGE_PERIOD));

    let bars = await recent();
    if (bars === undefined) return null;

    if (bars.length < MOVING_AVERAGE_PERIOD && request.syncHistory) {
      const today = toTradeDate(this.now());
      const start = addDays(today, -SMA_FETCH_DAYS);
      if (ctx.fetchedFrom === undefined || ctx.fetchedFrom > start) {
        logger.debug({ ticker, stored: bars.length }, 'Too few closes for the 50-day average, fetching history');
        // rows already stored may carry 52-week values a fetched bar lacks
        const stored = new Set(bars.map((bar) => bar.date));
        await this.fetchAndStore(ticker, start, addDays(today, -1), ctx, stored);
        bars = await recent();
      }
    }

    if (bars === undefined || bars.length < MOVING_AVERAGE_PERIOD) {
      return null;
    }
    return calculateSMA(bars.map((bar) => bar.close), MOVING_AVERAGE_PERIOD);
  }

  // ============================================
  // Store Access
  // ============================================

  /**
   * Run `fn` against the store. Returns undefined when history is disabled
   * or has failed; the first failure disables it for the rest of the batch.
   */
  private async withStore<T>(ctx: TickerContext, fn: (store: PriceHistoryStore) => Promise<T>): Promise<T | undefined> {
    if (this.store === null) {
      if (this.storeFailure !== null) ctx.degraded = true;
      return undefined;
    }

    try {
      return await fn(this.store);
    } catch (error) {
      if (!(error instanceof PersistenceUnavailableError)) {
        throw error;
      }

      logger.warn({ err: error, operation: error.operation }, 'Price history unavailable, continuing without it');
      this.storeFailure = error;
      this.store = null;
      ctx.degraded = true;
      ctx.warnings.push(`History unavailable: ${error.message}`);
      return undefined;
    }
  }

  private toFailure(ticker: string, error: unknown): TickerFailure {
    if (error instanceof MarketDataError) {
      return { status: 'failed', ticker, kind: error.code, message: error.message };
    }
    if (error instanceof StopLossError || error instanceof HistoryError) {
      return { status: 'failed', ticker, kind: error.code, message: error.message };
    }
    throw error;
  }
}
