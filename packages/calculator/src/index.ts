/**
 * @stop-loss/calculator
 *
 * Stop-loss engine: simple, trailing and ATR strategies, 52-week-high
 * anchoring, guidance classification.
 */

export type {
  PriceSnapshot,
  PriceBar,
  StrategyKind,
  AnchorKind,
  Guidance,
  Week52HighAnchor,
  SimpleStrategy,
  TrailingStrategy,
  AtrStrategy,
  StopLossStrategy,
  StopLossRequest,
  StopLossResult,
} from './types/index.js';

export {
  type StopLossErrorCode,
  StopLossError,
  InvalidParameterError,
  InsufficientDataError,
  CannotComputeError,
} from './errors.js';

export {
  evaluateStopLoss,
  calculateSimple,
  calculateTrailing,
  calculateATRStopLoss,
} from './core/StopLossCalculator.js';

export { GUIDANCE_LABELS, classifyGuidance } from './core/Guidance.js';

export { HighWaterMarkTracker } from './core/HighWaterMarkTracker.js';

export { DEFAULT_ATR_PERIOD, trueRange, calculateATR } from './indicators/AverageTrueRange.js';

export { MOVING_AVERAGE_PERIOD, calculateSMA } from './indicators/MovingAverage.js';
