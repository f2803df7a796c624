#!/usr/bin/env node
/**
 * Stop-Loss CLI
 *
 * Usage:
 *   stop-loss calculate AAPL GOOGL MSFT
 *   stop-loss calculate --percentage 7.5 --trailing
 *   stop-loss calculate --trailing --since 2024-01-01
 *   stop-loss calculate --atr --atr-multiplier 2.5
 *   stop-loss calculate -w --simple -p 8
 *   stop-loss history show AAPL --since 2024-01-01
 *   stop-loss history clear AAPL
 */

import { Command, InvalidArgumentError } from 'commander';
import type { Pool } from 'pg';
import { pino } from 'pino';
import {
  PersistenceUnavailableError,
  PriceHistoryStore,
  closePool,
  createPool,
} from '@stop-loss/history';
import { ConfigError, loadConfig, type AppConfig } from '../config/loader.js';
import { YahooMarketData } from '../feeds/YahooMarketData.js';
import { VERSION } from '../version.js';
import { runCalculate, type CalculateFlags } from './commands/calculate.js';
import { clearHistory, showHistory, type HistoryContext } from './commands/history.js';
import { green, red } from './utils/display.js';

const logger = pino({
  name: 'stop-loss',
  level: process.env.LOG_LEVEL ?? 'info',
  transport: {
    target: 'pino-pretty',
    options: { colorize: true },
  },
});

const print = (line: string): void => console.log(line);

// ============================================
// Argument Parsers
// ============================================

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

// ============================================
// Database
// ============================================

/**
 * Open a pool for one command and close it when the command finishes.
 */
async function withDatabase<T>(config: AppConfig, fn: (pool: Pool) => Promise<T>): Promise<T> {
  const pool = createPool({ connectionString: config.databaseUrl });
  try {
    return await fn(pool);
  } finally {
    await closePool(pool);
  }
}

async function withStore(config: AppConfig, fn: (ctx: HistoryContext) => Promise<number>): Promise<number> {
  return withDatabase(config, async (pool) => fn({ store: await PriceHistoryStore.open(pool), print }));
}

// ============================================
// CLI Program
// ============================================

const program = new Command();

program
  .name('stop-loss')
  .description('Stop-loss calculator with trailing, ATR and 52-week-high strategies')
  .version(VERSION);

interface CalculateCliOptions extends CalculateFlags {
  config?: string;
}

program
  .command('calculate')
  .description('Calculate stop-loss prices for the configured or given tickers')
  .argument('[tickers...]', 'Ticker symbols (override the config file)')
  .option('-c, --config <path>', 'Path to the configuration file')
  .option('-p, --percentage <pct>', 'Stop-loss percentage (overrides config)', parseNumber)
  .option('-t, --trailing', 'Use trailing stop-loss')
  .option('-s, --simple', 'Use simple stop-loss')
  .option('-a, --atr', 'Use ATR-based stop-loss')
  .option('-P, --atr-period <days>', 'ATR calculation period (trading days)', parseInteger)
  .option('-m, --atr-multiplier <n>', 'ATR multiplier for stop-loss distance', parseNumber)
  .option('-d, --since <date>', 'Start date for trailing calculation (YYYY-MM-DD)')
  .option('-H, --no-history', 'Skip stored history and historical data fetching')
  .option('-w, --week52-high', 'Base calculations on the 52-week high instead of the current price')
  .action(async (tickers: string[], options: CalculateCliOptions) => {
    const config = loadConfig({ path: options.config });

    process.exitCode = await withDatabase(config, (pool) => runCalculate(tickers, options, {
      config,
      marketData: new YahooMarketData(),
      print,
      openStore: async () => {
        try {
          return await PriceHistoryStore.open(pool);
        } catch (error) {
          if (error instanceof PersistenceUnavailableError) {
            logger.warn({ err: error }, 'Could not open price history');
            return null;
          }
          throw error;
        }
      },
    }));
  });

const history = program
  .command('history')
  .description('Inspect or clear stored price history');

history
  .command('show')
  .description('Show stored daily bars for a ticker')
  .argument('<ticker>', 'Ticker symbol')
  .option('-c, --config <path>', 'Path to the configuration file')
  .option('-d, --since <date>', 'First date to show (YYYY-MM-DD)')
  .action(async (ticker: string, options: { config?: string; since?: string }) => {
    const config = loadConfig({ path: options.config });
    process.exitCode = await withStore(config, (ctx) => showHistory(ticker, options.since, ctx));
  });

history
  .command('clear')
  .description('Delete stored daily bars for a ticker')
  .argument('<ticker>', 'Ticker symbol')
  .option('-c, --config <path>', 'Path to the configuration file')
  .action(async (ticker: string, options: { config?: string }) => {
    const config = loadConfig({ path: options.config });
    process.exitCode = await withStore(config, (ctx) => clearHistory(ticker, ctx));
  });

program
  .command('version')
  .description('Show version information')
  .action(() => {
    print(`trailing-stop-loss version ${green(VERSION)}`);
  });

// ============================================
// Main
// ============================================

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    print(red(`Error: ${error.message}`));
  } else if (error instanceof PersistenceUnavailableError) {
    print(red(`Error: ${error.message}`));
  } else {
    logger.error({ err: error }, 'Command failed');
  }
  process.exitCode = 1;
});
