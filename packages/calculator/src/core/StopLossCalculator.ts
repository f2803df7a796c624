/**
 * Stop-Loss Calculator
 *
 * Pure functions over a price snapshot. Strategies differ only in the base
 * price and the distance formula; the 52-week-high anchor is resolved once,
 * outside the per-strategy branch.
 *
 *   simple:   stop = base * (1 - pct / 100)       base = current | 52w high
 *   trailing: stop = hwm  * (1 - pct / 100)
 *   atr:      stop = base - atr * multiplier      base = current | 52w high
 *
 * Risk is always measured from the current price and may be negative.
 */

import { CannotComputeError, InvalidParameterError } from '../errors.js';
import type {
  AnchorKind,
  AtrStrategy,
  PriceSnapshot,
  SimpleStrategy,
  StopLossRequest,
  StopLossResult,
  StopLossStrategy,
  StrategyKind,
  TrailingStrategy,
  Week52HighAnchor,
} from '../types/index.js';
import { classifyGuidance } from './Guidance.js';

// ============================================
// Validation
// ============================================

function assertPercentage(percentage: number): void {
  if (!Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
    throw new InvalidParameterError('percentage', `Percentage must be between 0 and 100, got ${percentage}`);
  }
}

function assertMultiplier(multiplier: number): void {
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new InvalidParameterError('multiplier', `ATR multiplier must be positive, got ${multiplier}`);
  }
}

function assertAtr(atr: number): void {
  if (!Number.isFinite(atr) || atr < 0) {
    throw new InvalidParameterError('atr', `ATR must be a non-negative number, got ${atr}`);
  }
}

function assertPrice(parameter: string, price: number): void {
  if (!Number.isFinite(price) || price <= 0) {
    throw new InvalidParameterError(parameter, `${parameter} must be a positive price, got ${price}`);
  }
}

// ============================================
// Anchor Resolution
// ============================================

interface ResolvedBase {
  basePrice: number;
  anchor: AnchorKind;
  week52High: number | null;
  week52Unavailable: boolean;
}

function resolveBase(snapshot: PriceSnapshot, anchor: Week52HighAnchor | undefined): ResolvedBase {
  if (anchor === undefined) {
    return { basePrice: snapshot.currentPrice, anchor: 'current', week52High: null, week52Unavailable: false };
  }

  if (anchor.price === null) {
    return { basePrice: snapshot.currentPrice, anchor: 'current', week52High: null, week52Unavailable: true };
  }

  assertPrice('week52High', anchor.price);
  return { basePrice: anchor.price, anchor: 'week52High', week52High: anchor.price, week52Unavailable: false };
}

function percentBelow(base: number, percentage: number): number {
  return base * (1 - percentage / 100);
}

// ============================================
// Strategy Evaluation
// ============================================

interface Computed {
  stopLossPrice: number;
  percentage: number;
  atr: number | null;
  atrMultiplier: number | null;
  base: ResolvedBase;
}

function computeSimple(snapshot: PriceSnapshot, strategy: SimpleStrategy): Computed {
  assertPercentage(strategy.percentage);
  const base = resolveBase(snapshot, strategy.anchor);

  return {
    stopLossPrice: percentBelow(base.basePrice, strategy.percentage),
    percentage: strategy.percentage,
    atr: null,
    atrMultiplier: null,
    base,
  };
}

function computeTrailing(snapshot: PriceSnapshot, strategy: TrailingStrategy): Computed {
  assertPercentage(strategy.percentage);

  if (strategy.highWaterMark === null) {
    throw new CannotComputeError(`No high-water mark available for ${snapshot.ticker}; trailing stop cannot be computed`);
  }
  assertPrice('highWaterMark', strategy.highWaterMark);

  return {
    stopLossPrice: percentBelow(strategy.highWaterMark, strategy.percentage),
    percentage: strategy.percentage,
    atr: null,
    atrMultiplier: null,
    base: {
      basePrice: strategy.highWaterMark,
      anchor: 'highWaterMark',
      week52High: null,
      week52Unavailable: false,
    },
  };
}

function computeAtr(snapshot: PriceSnapshot, strategy: AtrStrategy): Computed {
  assertAtr(strategy.atr);
  assertMultiplier(strategy.multiplier);
  const base = resolveBase(snapshot, strategy.anchor);

  return {
    stopLossPrice: base.basePrice - strategy.atr * strategy.multiplier,
    percentage: strategy.percentage ?? 0,
    atr: strategy.atr,
    atrMultiplier: strategy.multiplier,
    base,
  };
}

function compute(snapshot: PriceSnapshot, strategy: StopLossStrategy): Computed {
  switch (strategy.kind) {
    case 'simple':
      return computeSimple(snapshot, strategy);
    case 'trailing':
      return computeTrailing(snapshot, strategy);
    case 'atr':
      return computeAtr(snapshot, strategy);
    default: {
      const unknown: never = strategy;
      throw new InvalidParameterError('strategy', `Unknown strategy ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Evaluate one stop-loss request.
 */
export function evaluateStopLoss(request: StopLossRequest): StopLossResult {
  const { snapshot, strategy } = request;
  assertPrice('currentPrice', snapshot.currentPrice);

  const computed = compute(snapshot, strategy);
  const movingAvg50 = request.movingAvg50 ?? snapshot.movingAvg50 ?? null;
  const kind: StrategyKind = strategy.kind;

  return {
    ticker: snapshot.ticker,
    currentPrice: snapshot.currentPrice,
    stopLossPrice: computed.stopLossPrice,
    currency: snapshot.currency,
    strategy: kind,
    percentage: computed.percentage,
    atr: computed.atr,
    atrMultiplier: computed.atrMultiplier,
    dollarRisk: snapshot.currentPrice - computed.stopLossPrice,
    basePrice: computed.base.basePrice,
    anchor: computed.base.anchor,
    week52High: computed.base.week52High,
    week52Unavailable: computed.base.week52Unavailable,
    movingAvg50,
    guidance: classifyGuidance(computed.stopLossPrice, snapshot.currentPrice, movingAvg50),
  };
}

// ============================================
// Direct Entry Points
// ============================================

function toAnchor(basePrice: number | null | undefined): Week52HighAnchor | undefined {
  return basePrice === undefined ? undefined : { type: 'week52High', price: basePrice };
}

/**
 * Percentage below the current price, or below `basePrice` (the 52-week high)
 * when given. Passing `null` requests the 52-week anchor with no value known.
 */
export function calculateSimple(
  snapshot: PriceSnapshot,
  percentage: number,
  movingAvg50?: number | null,
  basePrice?: number | null
): StopLossResult {
  return evaluateStopLoss({
    snapshot,
    strategy: { kind: 'simple', percentage, anchor: toAnchor(basePrice) },
    movingAvg50,
  });
}

export function calculateTrailing(
  snapshot: PriceSnapshot,
  percentage: number,
  highWaterMark: number | null | undefined,
  movingAvg50?: number | null
): StopLossResult {
  return evaluateStopLoss({
    snapshot,
    strategy: { kind: 'trailing', percentage, highWaterMark: highWaterMark ?? null },
    movingAvg50,
  });
}

/**
 * `atr * multiplier` below the base price. `percentage` is carried onto the
 * result for display and plays no part in the formula.
 */
export function calculateATRStopLoss(
  snapshot: PriceSnapshot,
  percentage: number,
  atr: number,
  multiplier: number,
  basePrice?: number | null,
  movingAvg50?: number | null
): StopLossResult {
  return evaluateStopLoss({
    snapshot,
    strategy: { kind: 'atr', atr, multiplier, percentage, anchor: toAnchor(basePrice) },
    movingAvg50,
  });
}
