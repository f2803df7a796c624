/**
 * @stop-loss/history
 *
 * Durable daily OHLC archive used by the trailing and ATR strategies.
 */

export type {
  TradeDate,
  PriceObservation,
  PriceObservationInput,
  CurrentPriceReading,
  DatabaseConfig,
} from './types/index.js';

export {
  type HistoryErrorCode,
  HistoryError,
  PersistenceUnavailableError,
  InvalidObservationError,
} from './errors.js';

export {
  createPool,
  withTransaction,
  closePool,
} from './database/connection.js';

export {
  PRICE_HISTORY_TABLE,
  ADDED_COLUMNS,
  type ColumnMigration,
  ensureSchema,
} from './storage/schema.js';

export { PriceHistoryStore, normalizeTicker } from './storage/PriceHistoryStore.js';

export { toTradeDate, isTradeDate, parseTradeDate, addDays } from './utils/dates.js';
