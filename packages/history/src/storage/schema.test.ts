import { describe, it, expect } from 'vitest';
import { createMemoryPool } from '../testing/memoryPool.js';
import { ensureSchema } from './schema.js';
import { PriceHistoryStore } from './PriceHistoryStore.js';

describe('ensureSchema', () => {
  it('should be safe to run repeatedly', async () => {
    const pool = createMemoryPool();

    await ensureSchema(pool);
    await ensureSchema(pool);
    const store = await PriceHistoryStore.open(pool);

    await store.upsert({ ticker: 'AAPL', date: '2024-01-01', high: 10, close: 9, week52High: 12 });
    expect(await store.latestWeek52High('AAPL')).toBe(12);
  });

  it('should upgrade a table created before the 52-week columns existed', async () => {
    const pool = createMemoryPool();
    await pool.query(`
      CREATE TABLE price_history (
        ticker TEXT NOT NULL,
        trade_date TEXT NOT NULL,
        open DOUBLE PRECISION,
        high DOUBLE PRECISION NOT NULL,
        low DOUBLE PRECISION,
        close DOUBLE PRECISION NOT NULL,
        volume BIGINT,
        PRIMARY KEY (ticker, trade_date)
      )
    `);
    await pool.query(
      `INSERT INTO price_history (ticker, trade_date, open, high, low, close, volume)
       VALUES ('AAPL', '2023-12-29', 190, 194, 189, 192, 42000000)`
    );

    const store = await PriceHistoryStore.open(pool);

    const [legacy] = await store.getHistory('AAPL');
    expect(legacy).toEqual({
      ticker: 'AAPL',
      date: '2023-12-29',
      open: 190,
      high: 194,
      low: 189,
      close: 192,
      volume: 42000000,
      week52High: null,
      week52Low: null,
    });

    await store.upsert({ ticker: 'AAPL', date: '2024-01-02', high: 196, close: 195, week52High: 199.62 });
    expect(await store.latestWeek52High('AAPL')).toBe(199.62);
    expect(await store.highWaterMark('AAPL')).toBe(196);
  });

  it('should add only the columns a partially upgraded table lacks', async () => {
    const pool = createMemoryPool();
    await pool.query(`
      CREATE TABLE price_history (
        ticker TEXT NOT NULL,
        trade_date TEXT NOT NULL,
        open DOUBLE PRECISION,
        high DOUBLE PRECISION NOT NULL,
        low DOUBLE PRECISION,
        close DOUBLE PRECISION NOT NULL,
        volume BIGINT,
        week52_high DOUBLE PRECISION,
        PRIMARY KEY (ticker, trade_date)
      )
    `);

    await ensureSchema(pool);

    const store = await PriceHistoryStore.open(pool);
    await store.upsert({ ticker: 'MSFT', date: '2024-01-02', high: 376, close: 370, week52High: 384.3, week52Low: 245.6 });
    const [row] = await store.getHistory('MSFT');
    expect(row.week52High).toBe(384.3);
    expect(row.week52Low).toBe(245.6);
  });
});
