/**
 * @stop-loss/cli
 *
 * Market data, configuration and batch orchestration for the stop-loss
 * command line.
 */

export { MarketDataError, type MarketDataProvider } from './feeds/types.js';
export {
  YahooMarketData,
  parseSnapshot,
  parseHistory,
  type YahooMarketDataOptions,
  type ChartResult,
} from './feeds/YahooMarketData.js';

export {
  DEFAULT_CONFIG_FILE,
  ConfigError,
  loadConfig,
  type AppConfig,
  type LoadConfigOptions,
} from './config/loader.js';

export {
  StopLossRunner,
  atrFetchDays,
  validateRunRequest,
  type CalculationMode,
  type RunRequest,
  type RunnerDependencies,
  type FailureKind,
  type TickerOutcome,
  type TickerSuccess,
  type TickerFailure,
  type RunSummary,
} from './orchestrator/StopLossRunner.js';

export {
  runCalculate,
  buildRunRequest,
  resolveMode,
  UsageError,
  type CalculateFlags,
  type CalculateContext,
} from './cli/commands/calculate.js';

export { VERSION } from './version.js';
