/**
 * History Commands
 *
 * Inspect or clear the stored daily bars for one ticker.
 */

import { isTradeDate, normalizeTicker, type PriceHistoryStore } from '@stop-loss/history';
import { bold, cyan, dim, green, red, renderHistory } from '../utils/display.js';

export interface HistoryContext {
  store: PriceHistoryStore;
  print: (line: string) => void;
}

export async function showHistory(ticker: string, since: string | undefined, ctx: HistoryContext): Promise<number> {
  if (since !== undefined && !isTradeDate(since)) {
    ctx.print(red(`Error: Invalid date format: ${since}. Use YYYY-MM-DD`));
    return 1;
  }

  const symbol = normalizeTicker(ticker);
  const rows = await ctx.store.getHistory(symbol, since);

  if (rows.length === 0) {
    ctx.print(dim(`No stored history for ${symbol}`));
    return 0;
  }

  const highWaterMark = await ctx.store.highWaterMark(symbol, since);

  ctx.print('\n' + bold(cyan(`═══ ${symbol} PRICE HISTORY ═══`)) + '\n');
  ctx.print(renderHistory(rows));
  ctx.print(`${rows.length} rows, ${rows[0].date} to ${rows[rows.length - 1].date}`);
  if (highWaterMark !== null) {
    ctx.print(`High-water mark: ${highWaterMark.toFixed(2)}`);
  }
  return 0;
}

export async function clearHistory(ticker: string, ctx: HistoryContext): Promise<number> {
  const symbol = normalizeTicker(ticker);
  const deleted = await ctx.store.deleteHistory(symbol);
  ctx.print(green(`Deleted ${deleted} rows for ${symbol}`));
  return 0;
}
