/**
 * Price History Store
 *
 * Deduplicated daily OHLC archive keyed by (ticker, trade_date). Writes are
 * full-row upserts; reads are the aggregates the stop-loss strategies need.
 * Every operation runs in its own transaction on a pooled client.
 */

import type { Pool, PoolClient } from 'pg';
import { pino } from 'pino';
import { query, withTransaction } from '../database/connection.js';
import { InvalidObservationError } from '../errors.js';
import type {
  CurrentPriceReading,
  PriceObservation,
  PriceObservationInput,
  TradeDate,
} from '../types/index.js';
import { isTradeDate, toTradeDate } from '../utils/dates.js';
import { ensureSchema, PRICE_HISTORY_TABLE } from './schema.js';

const logger = pino({ name: 'price-history-store', level: process.env.LOG_LEVEL ?? 'info' });

// ============================================
// Row Mapping
// ============================================

interface PriceHistoryRow {
  ticker: string;
  trade_date: string;
  open: number | string | null;
  high: number | string;
  low: number | string | null;
  close: number | string;
  volume: number | string | null;
  week52_high: number | string | null;
  week52_low: number | string | null;
}

const SELECT_COLUMNS = 'ticker, trade_date, open, high, low, close, volume, week52_high, week52_low';

const UPSERT_SQL = `
  INSERT INTO ${PRICE_HISTORY_TABLE} (${SELECT_COLUMNS})
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
  ON CONFLICT (ticker, trade_date) DO UPDATE SET
    open = EXCLUDED.open,
    high = EXCLUDED.high,
    low = EXCLUDED.low,
    close = EXCLUDED.close,
    volume = EXCLUDED.volume,
    week52_high = EXCLUDED.week52_high,
    week52_low = EXCLUDED.week52_low
`;

// BIGINT and NUMERIC columns arrive as strings from node-postgres
function toNumber(value: number | string): number {
  return typeof value === 'number' ? value : Number(value);
}

function toNullableNumber(value: number | string | null): number | null {
  return value === null ? null : toNumber(value);
}

function mapRow(row: PriceHistoryRow): PriceObservation {
  return {
    ticker: row.ticker,
    date: row.trade_date,
    open: toNullableNumber(row.open),
    high: toNumber(row.high),
    low: toNullableNumber(row.low),
    close: toNumber(row.close),
    volume: toNullableNumber(row.volume),
    week52High: toNullableNumber(row.week52_high),
    week52Low: toNullableNumber(row.week52_low),
  };
}

export function normalizeTicker(ticker: string): string {
  const normalized = ticker.trim().toUpperCase();
  if (!normalized) {
    throw new InvalidObservationError('Ticker must not be empty');
  }
  return normalized;
}

function checkDate(date: TradeDate): TradeDate {
  if (!isTradeDate(date)) {
    throw new InvalidObservationError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  return date;
}

function checkOptional(field: string, value: number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (!Number.isFinite(value)) {
    throw new InvalidObservationError(`${field} must be a finite number, got ${value}`);
  }
  return value;
}

/**
 * Validate an input row and fill omitted fields with null.
 */
function normalizeObservation(input: PriceObservationInput): PriceObservation {
  const ticker = normalizeTicker(input.ticker);
  const date = checkDate(input.date);

  if (!Number.isFinite(input.high) || !Number.isFinite(input.close)) {
    throw new InvalidObservationError(
      `high and close are required for ${ticker} on ${date} (high=${input.high}, close=${input.close})`
    );
  }

  const volume = checkOptional('volume', input.volume);
  if (volume !== null && !Number.isInteger(volume)) {
    throw new InvalidObservationError(`volume must be an integer, got ${volume}`);
  }

  return {
    ticker,
    date,
    open: checkOptional('open', input.open),
    high: input.high,
    low: checkOptional('low', input.low),
    close: input.close,
    volume,
    week52High: checkOptional('week52High', input.week52High),
    week52Low: checkOptional('week52Low', input.week52Low),
  };
}

async function writeObservation(client: PoolClient, observation: PriceObservation): Promise<void> {
  await query(client, UPSERT_SQL, [
    observation.ticker,
    observation.date,
    observation.open,
    observation.high,
    observation.low,
    observation.close,
    observation.volume,
    observation.week52High,
    observation.week52Low,
  ]);
}

// ============================================
// Store Class
// ============================================

export class PriceHistoryStore {
  private constructor(private readonly pool: Pool) {}

  /**
   * Ensure the schema once for this handle and return a ready store.
   */
  static async open(pool: Pool): Promise<PriceHistoryStore> {
    await ensureSchema(pool);
    return new PriceHistoryStore(pool);
  }

  // ============================================
  // Writes
  // ============================================

  /**
   * Insert the row or replace every field of the existing (ticker, date) row.
   */
  async upsert(input: PriceObservationInput): Promise<void> {
    const observation = normalizeObservation(input);
    await withTransaction(this.pool, 'upsert', (client) => writeObservation(client, observation));
  }

  /**
   * Upsert a batch atomically. Returns the number of rows written.
   */
  async upsertMany(inputs: readonly PriceObservationInput[]): Promise<number> {
    if (inputs.length === 0) return 0;

    const observations = inputs.map(normalizeObservation);
    await withTransaction(this.pool, 'upsertMany', async (client) => {
      for (const observation of observations) {
        await writeObservation(client, observation);
      }
    });

    logger.debug({ ticker: observations[0].ticker, rows: observations.length }, 'Stored price history');
    return observations.length;
  }

  /**
   * Write a live price as the row for its calendar day. An existing row for
   * that day keeps its open and volume, widens high/low to include the price,
   * and takes the price as close.
   */
  async recordCurrentPrice(reading: CurrentPriceReading): Promise<void> {
    const ticker = normalizeTicker(reading.ticker);
    const date = toTradeDate(reading.timestamp);
    const price = reading.price;

    if (!Number.isFinite(price)) {
      throw new InvalidObservationError(`Current price for ${ticker} must be a finite number, got ${price}`);
    }

    const week52High = checkOptional('week52High', reading.week52High);
    const week52Low = checkOptional('week52Low', reading.week52Low);

    await withTransaction(this.pool, 'recordCurrentPrice', async (client) => {
      const result = await query<PriceHistoryRow>(
        client,
        `SELECT ${SELECT_COLUMNS} FROM ${PRICE_HISTORY_TABLE} WHERE ticker = $1 AND trade_date = $2`,
        [ticker, date]
      );
      const existing = result.rows.length > 0 ? mapRow(result.rows[0]) : null;

      const observation: PriceObservation = existing
        ? {
            ...existing,
            high: Math.max(existing.high, price),
            low: existing.low === null ? price : Math.min(existing.low, price),
            close: price,
            week52High: week52High ?? existing.week52High,
            week52Low: week52Low ?? existing.week52Low,
          }
        : {
            ticker,
            date,
            open: price,
            high: price,
            low: price,
            close: price,
            volume: null,
            week52High,
            week52Low,
          };

      await writeObservation(client, observation);
    });
  }

  /**
   * Remove every stored row for a ticker. Returns the number deleted.
   */
  async deleteHistory(ticker: string): Promise<number> {
    const symbol = normalizeTicker(ticker);
    const result = await withTransaction(this.pool, 'deleteHistory', (client) =>
      query<{ trade_date: string }>(
        client,
        `DELETE FROM ${PRICE_HISTORY_TABLE} WHERE ticker = $1 RETURNING trade_date`,
        [symbol]
      )
    );
    return result.rows.length;
  }

  // ============================================
  // Reads
  // ============================================

  /**
   * Most recent stored date, used to fetch only newer bars.
   */
  async latestDate(ticker: string): Promise<TradeDate | null> {
    const symbol = normalizeTicker(ticker);
    const result = await withTransaction(this.pool, 'latestDate', (client) =>
      query<{ trade_date: string }>(
        client,
        `SELECT trade_date FROM ${PRICE_HISTORY_TABLE} WHERE ticker = $1 ORDER BY trade_date DESC LIMIT 1`,
        [symbol]
      )
    );
    return result.rows.length > 0 ? result.rows[0].trade_date : null;
  }

  /**
   * Highest `high` for the ticker, optionally from `sinceDate` on.
   */
  async highWaterMark(ticker: string, sinceDate?: TradeDate): Promise<number | null> {
    const symbol = normalizeTicker(ticker);
    let sql = `SELECT MAX(high) AS high_water_mark FROM ${PRICE_HISTORY_TABLE} WHERE ticker = $1`;
    const params: unknown[] = [symbol];

    if (sinceDate !== undefined) {
      sql += ' AND trade_date >= $2';
      params.push(checkDate(sinceDate));
    }

    const result = await withTransaction(this.pool, 'highWaterMark', (client) =>
      query<{ high_water_mark: number | string | null }>(client, sql, params)
    );
    return result.rows.length > 0 ? toNullableNumber(result.rows[0].high_water_mark) : null;
  }

  /**
   * The 52-week high reported on the most recent row that has one. The
   * reported value falls as old peaks leave the window, so this is
   * deliberately not a MAX over the column.
   */
  async latestWeek52High(ticker: string): Promise<number | null> {
    const symbol = normalizeTicker(ticker);
    const result = await withTransaction(this.pool, 'latestWeek52High', (client) =>
      query<{ week52_high: number | string }>(
        client,
        `SELECT week52_high FROM ${PRICE_HISTORY_TABLE}
         WHERE ticker = $1 AND week52_high IS NOT NULL
         ORDER BY trade_date DESC LIMIT 1`,
        [symbol]
      )
    );
    return result.rows.length > 0 ? toNumber(result.rows[0].week52_high) : null;
  }

  /**
   * The last `lookbackDays` stored rows, oldest first.
   */
  async recentHistory(ticker: string, lookbackDays: number): Promise<PriceObservation[]> {
    const symbol = normalizeTicker(ticker);
    if (!Number.isInteger(lookbackDays) || lookbackDays < 1) {
      throw new InvalidObservationError(`lookbackDays must be a positive integer, got ${lookbackDays}`);
    }

    // validated above, safe to inline
    const result = await withTransaction(this.pool, 'recentHistory', (client) =>
      query<PriceHistoryRow>(
        client,
        `SELECT ${SELECT_COLUMNS} FROM ${PRICE_HISTORY_TABLE}
         WHERE ticker = $1
         ORDER BY trade_date DESC LIMIT ${lookbackDays}`,
        [symbol]
      )
    );
    return result.rows.map(mapRow).reverse();
  }

  /**
   * Full stored series for a ticker, oldest first.
   */
  async getHistory(ticker: string, sinceDate?: TradeDate): Promise<PriceObservation[]> {
    const symbol = normalizeTicker(ticker);
    let sql = `SELECT ${SELECT_COLUMNS} FROM ${PRICE_HISTORY_TABLE} WHERE ticker = $1`;
    const params: unknown[] = [symbol];

    if (sinceDate !== undefined) {
      sql += ' AND trade_date >= $2';
      params.push(checkDate(sinceDate));
    }
    sql += ' ORDER BY trade_date ASC';

    const result = await withTransaction(this.pool, 'getHistory', (client) =>
      query<PriceHistoryRow>(client, sql, params)
    );
    return result.rows.map(mapRow);
  }

  async hasData(ticker: string): Promise<boolean> {
    const symbol = normalizeTicker(ticker);
    const result = await withTransaction(this.pool, 'hasData', (client) =>
      query(client, `SELECT 1 FROM ${PRICE_HISTORY_TABLE} WHERE ticker = $1 LIMIT 1`, [symbol])
    );
    return result.rows.length > 0;
  }
}
