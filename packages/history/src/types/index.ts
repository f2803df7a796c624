/**
 * Price history types
 */

/** Calendar date in `YYYY-MM-DD` form */
export type TradeDate = string;

export interface PriceObservation {
  ticker: string;
  date: TradeDate;
  open: number | null;
  high: number;
  low: number | null;
  close: number;
  volume: number | null;
  /** 52-week high as reported on this date, not derived from stored rows */
  week52High: number | null;
  week52Low: number | null;
}

/**
 * Write-side shape: only `ticker`, `date`, `high` and `close` are required.
 * Omitted fields are stored as NULL (upserts replace the whole row).
 */
export type PriceObservationInput =
  Pick<PriceObservation, 'ticker' | 'date' | 'high' | 'close'> &
  Partial<Omit<PriceObservation, 'ticker' | 'date' | 'high' | 'close'>>;

/** Latest price reading written as the day's row by `recordCurrentPrice` */
export interface CurrentPriceReading {
  ticker: string;
  price: number;
  timestamp: Date;
  week52High?: number | null;
  week52Low?: number | null;
}

export interface DatabaseConfig {
  connectionString: string;
  ssl?: boolean | { rejectUnauthorized: boolean };
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}
