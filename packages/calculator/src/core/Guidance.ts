import type { Guidance } from '../types/index.js';

export const GUIDANCE_LABELS: Record<Guidance, string> = {
  above_current: '⚠️ Above current',
  raise_stop: 'Raise stop',
  keep_current: 'Keep current',
  not_applicable: 'N/A',
};

/**
 * Compare a stop against the live price and the 50-day average. A stop
 * above the live price wins over any moving-average signal.
 */
export function classifyGuidance(
  stopLossPrice: number,
  currentPrice: number,
  movingAvg50?: number | null
): Guidance {
  if (stopLossPrice > currentPrice) {
    return 'above_current';
  }
  if (movingAvg50 === undefined || movingAvg50 === null) {
    return 'not_applicable';
  }
  return stopLossPrice < movingAvg50 ? 'raise_stop' : 'keep_current';
}
