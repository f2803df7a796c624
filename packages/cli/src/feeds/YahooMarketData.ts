/**
 * Yahoo Finance market data
 *
 * Quotes and daily bars from the public chart endpoint. Responses are
 * validated before use; a ticker Yahoo cannot price surfaces as
 * MarketDataError so the caller can carry on with the rest of the batch.
 */

import axios, { type AxiosInstance } from 'axios';
import { pino } from 'pino';
import { z } from 'zod';
import type { PriceSnapshot } from '@stop-loss/calculator';
import { parseTradeDate, type PriceObservationInput, type TradeDate } from '@stop-loss/history';
import { MarketDataError, type MarketDataProvider } from './types.js';

const logger = pino({ name: 'yahoo-market-data', level: process.env.LOG_LEVEL ?? 'info' });

const YAHOO_API_URL = process.env.YAHOO_API_URL || 'https://query1.finance.yahoo.com';

// ============================================
// Response Schema
// ============================================

const nullableNumber = z.number().nullable().optional();
const seriesSchema = z.array(z.number().nullable()).optional();

const chartResultSchema = z.object({
  meta: z.object({
    symbol: z.string().optional(),
    currency: z.string().nullable().optional(),
    regularMarketPrice: nullableNumber,
    previousClose: nullableNumber,
    chartPreviousClose: nullableNumber,
    fiftyTwoWeekHigh: nullableNumber,
    fiftyTwoWeekLow: nullableNumber,
    fiftyDayAverage: nullableNumber,
    gmtoffset: z.number().optional(),
  }),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(z.object({
      open: seriesSchema,
      high: seriesSchema,
      low: seriesSchema,
      close: seriesSchema,
      volume: seriesSchema,
    })).optional(),
  }).optional(),
});

const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable(),
    error: z.object({ code: z.string().optional(), description: z.string().optional() }).nullable().optional(),
  }),
});

export type ChartResult = z.infer<typeof chartResultSchema>;

// ============================================
// Parsing
// ============================================

function extractResult(ticker: string, body: unknown): ChartResult {
  const parsed = chartResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new MarketDataError(ticker, `Unexpected chart response for ${ticker}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const { result, error } = parsed.data.chart;
  if (error) {
    throw new MarketDataError(ticker, `Yahoo rejected ${ticker}: ${error.description ?? error.code ?? 'unknown error'}`);
  }
  if (!result || result.length === 0) {
    throw new MarketDataError(ticker, `No chart data for ${ticker}`);
  }
  return result[0];
}

function lastClose(result: ChartResult): number | null {
  const closes = result.indicators?.quote?.[0]?.close ?? [];
  for (let i = closes.length - 1; i >= 0; i--) {
    const close = closes[i];
    if (close !== null) return close;
  }
  return null;
}

/**
 * Build a snapshot from a chart response. Price falls back from the live
 * market price to the latest bar's close, then to the previous close.
 */
export function parseSnapshot(ticker: string, body: unknown, now: Date = new Date()): PriceSnapshot {
  const result = extractResult(ticker, body);
  const { meta } = result;
  const currentPrice = meta.regularMarketPrice ?? lastClose(result) ?? meta.previousClose ?? meta.chartPreviousClose ?? null;

  if (currentPrice === null) {
    throw new MarketDataError(ticker, `Could not fetch price for ${ticker}`);
  }

  return {
    ticker: ticker.toUpperCase(),
    currentPrice,
    currency: meta.currency ?? 'USD',
    movingAvg50: meta.fiftyDayAverage ?? null,
    week52High: meta.fiftyTwoWeekHigh ?? null,
    week52Low: meta.fiftyTwoWeekLow ?? null,
    previousClose: meta.previousClose ?? meta.chartPreviousClose ?? null,
    timestamp: now,
  };
}

/**
 * Convert chart bars to observations on the exchange's calendar date.
 * Bars missing a high or close are dropped.
 */
export function parseHistory(ticker: string, body: unknown): PriceObservationInput[] {
  const result = extractResult(ticker, body);
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators?.quote?.[0];
  if (!quote) return [];

  const offsetSeconds = result.meta.gmtoffset ?? 0;
  const symbol = ticker.toUpperCase();
  const observations: PriceObservationInput[] = [];

  timestamps.forEach((ts, i) => {
    const high = quote.high?.[i] ?? null;
    const close = quote.close?.[i] ?? null;
    if (high === null || close === null) {
      return;
    }

    const volume = quote.volume?.[i] ?? null;
    observations.push({
      ticker: symbol,
      date: new Date((ts + offsetSeconds) * 1000).toISOString().slice(0, 10),
      open: quote.open?.[i] ?? null,
      high,
      low: quote.low?.[i] ?? null,
      close,
      volume: volume === null ? null : Math.round(volume),
    });
  });

  return observations;
}

// ============================================
// Provider
// ============================================

export interface YahooMarketDataOptions {
  baseURL?: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

export class YahooMarketData implements MarketDataProvider {
  private client: AxiosInstance;

  constructor(options: YahooMarketDataOptions = {}) {
    this.client = options.client ?? axios.create({
      baseURL: options.baseURL ?? YAHOO_API_URL,
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Accept': 'application/json',
        'User-Agent': 'Mozilla/5.0 (compatible; stop-loss-cli)',
      },
    });
  }

  async getCurrentSnapshot(ticker: string): Promise<PriceSnapshot> {
    // one day, so chartPreviousClose is yesterday's close
    const body = await this.fetchChart(ticker, { range: '1d', interval: '1d' });
    return parseSnapshot(ticker, body);
  }

  async getHistoricalSeries(ticker: string, startDate: TradeDate, endDate: TradeDate): Promise<PriceObservationInput[]> {
    const period1 = Math.floor(parseTradeDate(startDate).getTime() / 1000);
    // period2 is exclusive; extend to the end of endDate
    const period2 = Math.floor(parseTradeDate(endDate).getTime() / 1000) + 24 * 60 * 60;

    const body = await this.fetchChart(ticker, {
      period1: String(period1),
      period2: String(period2),
      interval: '1d',
      events: 'history',
    });

    const observations = parseHistory(ticker, body)
      .filter((row) => row.date >= startDate && row.date <= endDate);

    logger.debug({ ticker, startDate, endDate, bars: observations.length }, 'Fetched daily history');
    return observations;
  }

  private async fetchChart(ticker: string, params: Record<string, string>): Promise<unknown> {
    const symbol = ticker.trim().toUpperCase();

    try {
      const response = await this.client.get<unknown>(`/v8/finance/chart/${encodeURIComponent(symbol)}`, { params });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        // Yahoo answers unknown symbols with 404 and a chart.error body
        const body: unknown = error.response.data;
        const parsed = chartResponseSchema.safeParse(body);
        if (parsed.success && parsed.data.chart.error) {
          return body;
        }
        throw new MarketDataError(symbol, `Failed to fetch price for ${symbol}: HTTP ${error.response.status}`, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new MarketDataError(symbol, `Failed to fetch price for ${symbol}: ${message}`, { cause: error });
    }
  }
}
