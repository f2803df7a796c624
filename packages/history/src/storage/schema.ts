/**
 * Price history schema
 *
 * The table is created with its first column set; every column added since
 * is listed in ADDED_COLUMNS. Existing tables and columns are read from
 * information_schema first, so only missing pieces are created and a store
 * from an older release is upgraded in place without touching existing rows.
 */

import type { Pool, PoolClient } from 'pg';
import { pino } from 'pino';
import { query, withTransaction } from '../database/connection.js';

const logger = pino({ name: 'price-history-schema', level: process.env.LOG_LEVEL ?? 'info' });

export const PRICE_HISTORY_TABLE = 'price_history';

// The primary key doubles as the (ticker, trade_date) lookup index
const CREATE_TABLE = `
  CREATE TABLE ${PRICE_HISTORY_TABLE} (
    ticker TEXT NOT NULL,
    trade_date TEXT NOT NULL,
    open DOUBLE PRECISION,
    high DOUBLE PRECISION NOT NULL,
    low DOUBLE PRECISION,
    close DOUBLE PRECISION NOT NULL,
    volume BIGINT,
    PRIMARY KEY (ticker, trade_date)
  )
`;

export interface ColumnMigration {
  name: string;
  definition: string;
}

/** Nullable columns introduced after the first release, oldest first */
export const ADDED_COLUMNS: readonly ColumnMigration[] = [
  { name: 'week52_high', definition: 'DOUBLE PRECISION' },
  { name: 'week52_low', definition: 'DOUBLE PRECISION' },
];

interface ColumnRow {
  column_name: string;
}

async function existingColumns(client: PoolClient): Promise<Set<string>> {
  const result = await query<ColumnRow>(
    client,
    `SELECT column_name FROM information_schema.columns WHERE table_name = $1`,
    [PRICE_HISTORY_TABLE]
  );
  return new Set(result.rows.map((row) => row.column_name));
}

/**
 * Create the table if missing and add any columns an older table lacks.
 * Safe to run on every startup.
 */
export async function ensureSchema(pool: Pool): Promise<void> {
  const added = await withTransaction(pool, 'ensureSchema', async (client) => {
    let columns = await existingColumns(client);
    if (columns.size === 0) {
      await query(client, CREATE_TABLE);
      logger.info({ table: PRICE_HISTORY_TABLE }, 'Created price history table');
      columns = await existingColumns(client);
    }

    const missing = ADDED_COLUMNS.filter((column) => !columns.has(column.name));
    for (const column of missing) {
      await query(client, `ALTER TABLE ${PRICE_HISTORY_TABLE} ADD COLUMN ${column.name} ${column.definition}`);
    }
    return missing.map((column) => column.name);
  });

  if (added.length > 0) {
    logger.info({ columns: added }, 'Added price history columns');
  }
  logger.debug({ table: PRICE_HISTORY_TABLE }, 'Price history schema ensured');
}
