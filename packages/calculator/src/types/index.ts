/**
 * Stop-loss engine types
 */

/** Live quote for one ticker */
export interface PriceSnapshot {
  ticker: string;
  currentPrice: number;
  currency: string;
  movingAvg50?: number | null;
  week52High?: number | null;
  week52Low?: number | null;
  previousClose?: number | null;
  timestamp: Date;
}

/**
 * The fields True Range reads. Stored observations satisfy this shape;
 * `low` may be missing on partial rows.
 */
export interface PriceBar {
  high: number;
  low: number | null;
  close: number;
}

export type StrategyKind = 'simple' | 'trailing' | 'atr';

/** Which price the stop distance was measured from */
export type AnchorKind = 'current' | 'week52High' | 'highWaterMark';

export type Guidance = 'above_current' | 'raise_stop' | 'keep_current' | 'not_applicable';

/**
 * Measure from the 52-week high instead of the current price. `price` is null
 * when no 52-week value is known; the engine then falls back to the current
 * price and flags the result.
 */
export interface Week52HighAnchor {
  type: 'week52High';
  price: number | null;
}

export interface SimpleStrategy {
  kind: 'simple';
  /** Distance below the base price, 0-100 */
  percentage: number;
  anchor?: Week52HighAnchor;
}

export interface TrailingStrategy {
  kind: 'trailing';
  percentage: number;
  highWaterMark: number | null;
}

export interface AtrStrategy {
  kind: 'atr';
  atr: number;
  multiplier: number;
  /** Recorded on the result only */
  percentage?: number;
  anchor?: Week52HighAnchor;
}

export type StopLossStrategy = SimpleStrategy | TrailingStrategy | AtrStrategy;

export interface StopLossRequest {
  snapshot: PriceSnapshot;
  strategy: StopLossStrategy;
  /** Overrides `snapshot.movingAvg50` when given */
  movingAvg50?: number | null;
}

export interface StopLossResult {
  ticker: string;
  currentPrice: number;
  stopLossPrice: number;
  currency: string;
  strategy: StrategyKind;
  percentage: number;
  atr: number | null;
  atrMultiplier: number | null;
  /** currentPrice - stopLossPrice; negative when the stop sits above the live price */
  dollarRisk: number;
  basePrice: number;
  anchor: AnchorKind;
  /** 52-week high used as the anchor, null when the anchor was not applied */
  week52High: number | null;
  /** A 52-week anchor was requested but no value was available */
  week52Unavailable: boolean;
  movingAvg50: number | null;
  guidance: Guidance;
}
