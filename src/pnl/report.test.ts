import { describe, it, expect } from 'vitest';

import { toDecimal, ZERO } from '../utils/decimal.js';

import {
  formatDuration,
  formatTradeLine,
  formatPortfolioSummary,
  formatRecentTrades,
} from './report.js';
import type { PaperTrade, PortfolioSummary } from './types.js';

function trade(overrides: Partial<PaperTrade> = {}): PaperTrade {
  return {
    timestamp: new Date('2026-03-01T14:05:09Z'),
    coin: 'BTC',
    action: 'OPEN',
    side: 'buy',
    size: toDecimal(2),
    price: toDecimal(50000),
    realizedPnl: ZERO,
    positionSize: toDecimal(2),
    unrealizedPnl: ZERO,
    ...overrides,
  };
}

function summary(overrides: Partial<PortfolioSummary> = {}): PortfolioSummary {
  return {
    startTime: new Date('2026-03-01T12:00:00Z'),
    sessionDurationMs: 3_725_000,
    totalRealizedPnl: toDecimal(150),
    totalUnrealizedPnl: toDecimal(-50),
    totalPnl: toDecimal(100),
    totalTrades: 4,
    activePositions: 0,
    avgPnlPerTrade: toDecimal(25),
    availableCapital: toDecimal(10100),
    currentExposure: ZERO,
    maxExposure: toDecimal(20200),
    positions: [],
    ...overrides,
  };
}

describe('Report Formatting', () => {
  describe('formatDuration', () => {
    it('should print seconds only under a minute', () => {
      expect(formatDuration(45_000)).toBe('45s');
    });

    it('should print minutes and seconds', () => {
      expect(formatDuration(125_000)).toBe('2m5s');
    });

    it('should print hours, minutes and seconds', () => {
      expect(formatDuration(3_603_000)).toBe('1h0m3s');
    });

    it('should round to the nearest second', () => {
      expect(formatDuration(1_600)).toBe('2s');
    });
  });

  describe('formatTradeLine', () => {
    it('should describe an opening trade', () => {
      expect(formatTradeLine(trade())).toBe(
        'OPEN BUY 2.00 BTC @ $50000.00 | Position: +2.00 BTC | Unrealized: $0.00'
      );
    });

    it('should include realized PnL when non-zero', () => {
      const line = formatTradeLine(
        trade({
          action: 'REDUCE',
          side: 'sell',
          size: toDecimal(1),
          price: toDecimal(58000),
          realizedPnl: toDecimal('4666.666'),
          positionSize: toDecimal(2),
          unrealizedPnl: toDecimal('9333.34'),
        })
      );
      expect(line).toBe(
        'REDUCE SELL 1.00 BTC @ $58000.00 | Position: +2.00 BTC | Realized: $4666.67 | Unrealized: $9333.34'
      );
    });

    it('should print a flat position as FLAT', () => {
      const line = formatTradeLine(
        trade({ action: 'CLOSE', side: 'sell', positionSize: ZERO, realizedPnl: toDecimal(-20) })
      );
      expect(line).toBe('CLOSE SELL 2.00 BTC @ $50000.00 | Position: FLAT | Realized: $-20.00 | Unrealized: $0.00');
    });

    it('should print shorts without a plus sign', () => {
      const line = formatTradeLine(trade({ side: 'sell', positionSize: toDecimal(-2) }));
      expect(line).toBe('OPEN SELL 2.00 BTC @ $50000.00 | Position: -2.00 BTC | Unrealized: $0.00');
    });
  });

  describe('formatPortfolioSummary', () => {
    it('should print totals without a positions table when flat', () => {
      const lines = formatPortfolioSummary(summary()).split('\n');

      expect(lines).toEqual([
        '='.repeat(80),
        'PAPER TRADING PORTFOLIO SUMMARY',
        '='.repeat(80),
        'Session Duration: 1h2m5s',
        'Total Realized PnL: $150.00',
        'Total Unrealized PnL: $-50.00',
        'Total Portfolio PnL: $100.00',
        'Total Trades: 4',
        'Active Positions: 0',
        'Avg PnL per Trade: $25.00',
        'Available Capital: $10100.00',
        'Exposure: $0.00 / $20200.00',
        '='.repeat(80),
      ]);
    });

    it('should omit the average when no trades were made', () => {
      const text = formatPortfolioSummary(summary({ totalTrades: 0, avgPnlPerTrade: null }));
      expect(text).not.toContain('Avg PnL per Trade');
    });

    it('should list active positions', () => {
      const text = formatPortfolioSummary(
        summary({
          activePositions: 1,
          positions: [
            {
              coin: 'ETH',
              size: toDecimal('-1.5'),
              avgEntryPrice: toDecimal(3000),
              lastPrice: toDecimal(2900),
              realizedPnl: ZERO,
              unrealizedPnl: toDecimal(150),
              pnlPercent: toDecimal('-3.3333'),
              tradeCount: 1,
            },
          ],
        })
      );
      const lines = text.split('\n');

      expect(lines).toContain('ACTIVE POSITIONS:');
      expect(lines).toContain(
        'ETH      | -1.50 | Avg: $3000.00 | Last: $2900.00 | PnL: $150.00 (-3.33%)'
      );
    });
  });

  describe('formatRecentTrades', () => {
    it('should return an empty string when there are no trades', () => {
      expect(formatRecentTrades([], 10)).toBe('');
    });

    it('should list the last trades with UTC times', () => {
      const text = formatRecentTrades(
        [
          trade(),
          trade({
            timestamp: new Date('2026-03-01T15:30:00Z'),
            action: 'CLOSE',
            side: 'sell',
            price: toDecimal(51000),
            realizedPnl: toDecimal(2000),
            positionSize: ZERO,
          }),
        ],
        1
      );

      expect(text.split('\n')).toEqual([
        'LAST 1 TRADES:',
        '-'.repeat(80),
        '15:30:00 | CLOSE SELL 2.00 BTC @ $51000.00 | PnL: $2000.00',
      ]);
    });
  });
});
