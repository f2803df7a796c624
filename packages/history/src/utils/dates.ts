import type { TradeDate } from '../types/index.js';

const TRADE_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Local calendar date of `date` as `YYYY-MM-DD`.
 */
export function toTradeDate(date: Date): TradeDate {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function isTradeDate(value: string): boolean {
  const match = TRADE_DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const parsed = new Date(Number(year), Number(month) - 1, Number(day));
  return parsed.getFullYear() === Number(year)
    && parsed.getMonth() === Number(month) - 1
    && parsed.getDate() === Number(day);
}

/**
 * Local midnight of a `YYYY-MM-DD` string. Throws on malformed input.
 */
export function parseTradeDate(value: TradeDate): Date {
  if (!isTradeDate(value)) {
    throw new RangeError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  const [year, month, day] = value.split('-').map(Number);
  return new Date(year, month - 1, day);
}

export function addDays(value: TradeDate, days: number): TradeDate {
  const date = parseTradeDate(value);
  date.setDate(date.getDate() + days);
  return toTradeDate(date);
}
