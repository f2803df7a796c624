import { describe, it, expect } from 'vitest';
import type { StopLossResult } from '@stop-loss/calculator';
import type { TickerOutcome } from '../../orchestrator/StopLossRunner.js';
import { buildResultsLayout, formatStopMethod, renderResults, stripAnsi } from './display.js';

function result(overrides: Partial<StopLossResult> = {}): StopLossResult {
  return {
    ticker: 'AAPL',
    currentPrice: 150,
    stopLossPrice: 142.5,
    currency: 'USD',
    strategy: 'simple',
    percentage: 5,
    atr: null,
    atrMultiplier: null,
    dollarRisk: 7.5,
    basePrice: 150,
    anchor: 'current',
    week52High: null,
    week52Unavailable: false,
    movingAvg50: null,
    guidance: 'not_applicable',
    ...overrides,
  };
}

function ok(r: StopLossResult): TickerOutcome {
  return { status: 'ok', ticker: r.ticker, result: r, warnings: [], degraded: false };
}

describe('display', () => {
  describe('buildResultsLayout', () => {
    it('should format a simple result row', () => {
      const { headers, rows } = buildResultsLayout([ok(result())]);

      expect(headers).toEqual([
        'Ticker', 'Current Price', '50-Day SMA', 'Stop-Loss Price', 'Type', 'Stop Method', 'Risk/Share', 'Guidance',
      ]);
      expect(rows[0].map(stripAnsi)).toEqual([
        'AAPL', 'USD 150.00', 'N/A', 'USD 142.50', '📊 Simple', '5.00%', 'USD 7.50', 'N/A',
      ]);
    });

    it('should add the 52-week column when any result has one', () => {
      const anchored = result({ ticker: 'MSFT', week52High: 288.62, anchor: 'week52High' });
      const { headers, rows } = buildResultsLayout([ok(result()), ok(anchored)]);

      expect(headers[2]).toBe('52-Week High');
      expect(stripAnsi(rows[0][2])).toBe('N/A');
      expect(stripAnsi(rows[1][2])).toBe('USD 288.62');
    });

    it('should show negative risk and the above-current warning', () => {
      const above = result({
        currentPrice: 259.04,
        stopLossPrice: 265.5304,
        dollarRisk: -6.4904,
        percentage: 8,
        guidance: 'above_current',
      });
      const [row] = buildResultsLayout([ok(above)]).rows;

      expect(stripAnsi(row[3])).toBe('USD 265.53');
      expect(stripAnsi(row[6])).toBe('USD -6.49');
      expect(stripAnsi(row[7])).toBe('⚠️ Above current');
    });

    it('should keep failed tickers in the table', () => {
      const failed: TickerOutcome = {
        status: 'failed',
        ticker: 'NOPE',
        kind: 'upstream',
        message: 'Could not fetch price for NOPE',
      };
      const { headers, rows } = buildResultsLayout([ok(result()), failed]);

      expect(rows[1]).toHaveLength(headers.length);
      expect(rows[1].map(stripAnsi)).toEqual([
        'NOPE', 'ERROR', 'N/A', 'N/A', 'N/A', 'N/A', 'Could not fetch price for NOPE', 'N/A',
      ]);
    });
  });

  describe('formatStopMethod', () => {
    it('should describe ATR stops by multiplier', () => {
      expect(formatStopMethod(result({ strategy: 'atr', atr: 5, atrMultiplier: 2 }))).toBe('2.00× ATR');
    });

    it('should describe trailing stops by percentage', () => {
      expect(formatStopMethod(result({ strategy: 'trailing', percentage: 7.5 }))).toBe('7.50%');
    });
  });

  it('should render a table containing each ticker', () => {
    const output = stripAnsi(renderResults([ok(result()), ok(result({ ticker: 'GOOGL' }))]));

    expect(output).toContain('│ AAPL');
    expect(output).toContain('│ GOOGL');
  });
});
