/**
 * CLI Display Utilities
 *
 * Colors, tables and the stop-loss results layout.
 */

import Table from 'cli-table3';
import type { Guidance, StopLossResult, StrategyKind } from '@stop-loss/calculator';
import { GUIDANCE_LABELS } from '@stop-loss/calculator';
import type { PriceObservation } from '@stop-loss/history';
import type { TickerOutcome } from '../../orchestrator/StopLossRunner.js';

// ============================================
// Color Helpers (ANSI codes for compatibility)
// ============================================

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

export function red(text: string): string {
  return `${colors.red}${text}${colors.reset}`;
}

export function green(text: string): string {
  return `${colors.green}${text}${colors.reset}`;
}

export function yellow(text: string): string {
  return `${colors.yellow}${text}${colors.reset}`;
}

export function cyan(text: string): string {
  return `${colors.cyan}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return `${colors.bright}${text}${colors.reset}`;
}

export function dim(text: string): string {
  return `${colors.dim}${text}${colors.reset}`;
}

export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

// ============================================
// Formatting Helpers
// ============================================

export function formatMoney(currency: string, value: number): string {
  return `${currency} ${value.toFixed(2)}`;
}

const STRATEGY_LABELS: Record<StrategyKind, string> = {
  trailing: '🔄 Trailing',
  atr: '📈 ATR',
  simple: '📊 Simple',
};

export function strategyLabel(kind: StrategyKind): string {
  return STRATEGY_LABELS[kind];
}

/**
 * Distance rule: `2.00× ATR` for ATR stops, the percentage otherwise.
 */
export function formatStopMethod(result: StopLossResult): string {
  if (result.strategy === 'atr' && result.atrMultiplier !== null) {
    return `${result.atrMultiplier.toFixed(2)}× ATR`;
  }
  return `${result.percentage.toFixed(2)}%`;
}

export function formatGuidance(guidance: Guidance): string {
  const label = GUIDANCE_LABELS[guidance];
  switch (guidance) {
    case 'above_current':
      return red(label);
    case 'raise_stop':
      return yellow(label);
    case 'keep_current':
      return green(label);
    case 'not_applicable':
      return label;
  }
}

// ============================================
// Table Helpers
// ============================================

export function createTable(headers: string[]): Table.Table {
  return new Table({
    head: headers.map(h => cyan(h)),
    style: { head: [], border: [] },
    chars: {
      'top': '─', 'top-mid': '┬', 'top-left': '┌', 'top-right': '┐',
      'bottom': '─', 'bottom-mid': '┴', 'bottom-left': '└', 'bottom-right': '┘',
      'left': '│', 'left-mid': '├', 'mid': '─', 'mid-mid': '┼',
      'right': '│', 'right-mid': '┤', 'middle': '│',
    },
  });
}

// ============================================
// Results Layout
// ============================================

export interface ResultsLayout {
  headers: string[];
  rows: string[][];
}

/**
 * Headers and cells for a batch. The 52-week column appears only when some
 * result was anchored to a 52-week high. Failed tickers get an error row.
 */
export function buildResultsLayout(outcomes: readonly TickerOutcome[]): ResultsLayout {
  const showWeek52 = outcomes.some((o) => o.status === 'ok' && o.result.week52High !== null);

  const headers = ['Ticker', 'Current Price'];
  if (showWeek52) headers.push('52-Week High');
  headers.push('50-Day SMA', 'Stop-Loss Price', 'Type', 'Stop Method', 'Risk/Share', 'Guidance');

  const rows = outcomes.map((outcome) => {
    if (outcome.status === 'failed') {
      const row = [outcome.ticker, red('ERROR')];
      if (showWeek52) row.push(red('N/A'));
      row.push(red('N/A'), red('N/A'), red('N/A'), red('N/A'), red(outcome.message.slice(0, 30)), red('N/A'));
      return row;
    }

    const { result } = outcome;
    const stopColor = result.stopLossPrice > result.currentPrice ? red : green;
    const row = [result.ticker, formatMoney(result.currency, result.currentPrice)];
    if (showWeek52) {
      row.push(result.week52High === null ? 'N/A' : cyan(formatMoney(result.currency, result.week52High)));
    }
    row.push(
      result.movingAvg50 === null ? 'N/A' : formatMoney(result.currency, result.movingAvg50),
      stopColor(formatMoney(result.currency, result.stopLossPrice)),
      strategyLabel(result.strategy),
      formatStopMethod(result),
      formatMoney(result.currency, result.dollarRisk),
      formatGuidance(result.guidance),
    );
    return row;
  });

  return { headers, rows };
}

export function renderResults(outcomes: readonly TickerOutcome[]): string {
  const { headers, rows } = buildResultsLayout(outcomes);
  const table = createTable(headers);
  table.push(...rows);
  return table.toString();
}

export function renderHistory(rows: readonly PriceObservation[]): string {
  const table = createTable(['Date', 'Open', 'High', 'Low', 'Close', 'Volume', '52W High', '52W Low']);
  const cell = (value: number | null): string => (value === null ? dim('-') : value.toFixed(2));

  for (const row of rows) {
    table.push([
      row.date,
      cell(row.open),
      cell(row.high),
      cell(row.low),
      cell(row.close),
      row.volume === null ? dim('-') : String(row.volume),
      cell(row.week52High),
      cell(row.week52Low),
    ]);
  }
  return table.toString();
}
