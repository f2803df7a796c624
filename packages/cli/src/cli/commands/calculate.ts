/**
 * Calculate Command
 *
 * Resolves flags against the config file, runs the batch, prints the table.
 */

import { pino } from 'pino';
import { InvalidParameterError, type PriceSnapshot } from '@stop-loss/calculator';
import { isTradeDate, type PriceHistoryStore } from '@stop-loss/history';
import type { AppConfig } from '../../config/loader.js';
import type { MarketDataProvider } from '../../feeds/types.js';
import {
  StopLossRunner,
  type CalculationMode,
  type RunRequest,
  type RunSummary,
} from '../../orchestrator/StopLossRunner.js';
import { bold, cyan, dim, green, red, renderResults, yellow } from '../utils/display.js';

const logger = pino({ name: 'calculate', level: process.env.LOG_LEVEL ?? 'info' });

export interface CalculateFlags {
  percentage?: number;
  trailing?: boolean;
  simple?: boolean;
  atr?: boolean;
  atrPeriod?: number;
  atrMultiplier?: number;
  since?: string;
  /** false with --no-history */
  history: boolean;
  week52High?: boolean;
}

/** Bad flags or missing input; reported without a stack and exits 1 */
export class UsageError extends Error {
  readonly code = 'usage' as const;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function resolveMode(flags: CalculateFlags, config: AppConfig): CalculationMode {
  const selected = [flags.simple, flags.trailing, flags.atr].filter(Boolean).length;
  if (selected > 1) {
    throw new UsageError('Only one mode (--simple, --trailing, --atr) can be specified.');
  }

  if (flags.atr) return 'atr';
  if (flags.trailing) return 'trailing';
  if (flags.simple) return 'simple';
  return config.trailingEnabled ? 'trailing' : 'simple';
}

/**
 * Merge command-line arguments over the config file. Arguments win.
 */
export function buildRunRequest(tickers: string[], flags: CalculateFlags, config: AppConfig): RunRequest {
  const tickerList = tickers.length > 0 ? tickers : config.tickers;
  if (tickerList.length === 0) {
    throw new UsageError('No tickers specified. Add them to the config file or pass them as arguments.');
  }

  if (flags.since !== undefined && !isTradeDate(flags.since)) {
    throw new UsageError(`Invalid date format: ${flags.since}. Use YYYY-MM-DD`);
  }

  return {
    tickers: tickerList,
    mode: resolveMode(flags, config),
    percentage: flags.percentage ?? config.stopLossPercentage,
    atrPeriod: flags.atrPeriod ?? config.atrPeriod,
    atrMultiplier: flags.atrMultiplier ?? config.atrMultiplier,
    sinceDate: flags.since,
    useWeek52High: flags.week52High ?? false,
    syncHistory: flags.history,
    trailingLookbackDays: config.trailingLookbackDays,
  };
}

export interface CalculateContext {
  config: AppConfig;
  marketData: MarketDataProvider;
  /** Resolves to null when history is disabled or the database cannot be opened */
  openStore: () => Promise<PriceHistoryStore | null>;
  print: (line: string) => void;
  now?: () => Date;
}

export function formatSummary(summary: RunSummary): string {
  const total = summary.outcomes.length;
  const text = `Successfully calculated ${summary.succeeded}/${total} stop-losses`;
  return summary.succeeded === total ? green(text) : yellow(text);
}

/**
 * Run `calculate` and return the process exit code. Per-ticker failures are
 * shown in the table and do not change the exit code.
 */
export async function runCalculate(
  tickers: string[],
  flags: CalculateFlags,
  ctx: CalculateContext
): Promise<number> {
  let request: RunRequest;
  try {
    request = buildRunRequest(tickers, flags, ctx.config);
  } catch (error) {
    if (error instanceof UsageError) {
      ctx.print(red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  }

  const store = flags.history ? await ctx.openStore() : null;
  if (flags.history && store === null) {
    ctx.print(yellow('Price history unavailable, calculating from current prices only'));
  }

  const runner = new StopLossRunner({
    marketData: ctx.marketData,
    store,
    cache: new Map<string, PriceSnapshot>(),
    now: ctx.now,
  });

  ctx.print(cyan(`Calculating ${request.mode} stop-losses for ${request.tickers.length} ticker(s)...`));
  logger.debug({ request }, 'Running batch');

  let summary: RunSummary;
  try {
    summary = await runner.run(request);
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      ctx.print(red(`Error: ${error.message}`));
      return 1;
    }
    throw error;
  }

  ctx.print('');
  ctx.print(renderResults(summary.outcomes));
  ctx.print('');

  for (const outcome of summary.outcomes) {
    if (outcome.status !== 'ok') continue;
    for (const warning of outcome.warnings) {
      ctx.print(yellow(`  Warning (${outcome.ticker}): ${warning}`));
    }
  }
  if (summary.outcomes.some((o) => o.status === 'ok' && o.degraded)) {
    ctx.print(dim('  Some results were computed without stored history.'));
  }

  ctx.print(bold(formatSummary(summary)));
  return 0;
}
