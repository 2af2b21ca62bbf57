import { describe, it, expect } from 'vitest';

import { toDecimal, ZERO } from '../utils/decimal.js';

import {
  parseClosedPnl,
  calculateRealizedPnl,
  calculateUnrealizedPnl,
  calculateTotalUnrealizedPnl,
} from './calculator.js';
import { createPosition } from './ledger.js';
import type { Position } from './types.js';

function position(coin: string, size: string, avg: string, last: string = avg): Position {
  return {
    ...createPosition(coin),
    size: toDecimal(size),
    avgEntryPrice: toDecimal(avg),
    totalCostBasis: toDecimal(size).abs().times(avg),
    lastPrice: toDecimal(last),
  };
}

describe('PnL Calculator', () => {
  describe('parseClosedPnl', () => {
    it('should parse a decimal string', () => {
      expect(parseClosedPnl('125.5').toString()).toBe('125.5');
      expect(parseClosedPnl('-3.25').toString()).toBe('-3.25');
    });

    it('should fall back to zero for malformed input', () => {
      expect(parseClosedPnl('').isZero()).toBe(true);
      expect(parseClosedPnl('n/a').isZero()).toBe(true);
      expect(parseClosedPnl('NaN').isZero()).toBe(true);
    });

    it('should fall back to zero when absent', () => {
      expect(parseClosedPnl(undefined).isZero()).toBe(true);
      expect(parseClosedPnl(null).isZero()).toBe(true);
    });
  });

  describe('calculateRealizedPnl', () => {
    it('should realize nothing on OPEN or ADD, even with a venue figure', () => {
      const long = position('BTC', '1', '50000');
      expect(calculateRealizedPnl(long, toDecimal(1), toDecimal(60000), toDecimal(99), 'ADD').isZero()).toBe(true);
      expect(
        calculateRealizedPnl(createPosition('BTC'), toDecimal(1), toDecimal(60000), toDecimal(99), 'OPEN').isZero()
      ).toBe(true);
    });

    it('should take a non-zero venue figure verbatim', () => {
      const long = position('BTC', '2', '50000');
      const pnl = calculateRealizedPnl(long, toDecimal(-1), toDecimal(58000), toDecimal('123.45'), 'REDUCE');
      expect(pnl.toString()).toBe('123.45');
    });

    it('should compute a long reduction from the entry price', () => {
      const long = position('BTC', '2', '50000');
      const pnl = calculateRealizedPnl(long, toDecimal(-1), toDecimal(58000), ZERO, 'REDUCE');
      expect(pnl.toString()).toBe('8000');
    });

    it('should compute a short reduction from the entry price', () => {
      const short = position('ETH', '-4', '3000');
      const pnl = calculateRealizedPnl(short, toDecimal(1), toDecimal(2800), ZERO, 'REDUCE');
      expect(pnl.toString()).toBe('200');
    });

    it('should report losses as negative', () => {
      const long = position('BTC', '1', '50000');
      const pnl = calculateRealizedPnl(long, toDecimal(-1), toDecimal(45000), ZERO, 'CLOSE');
      expect(pnl.toString()).toBe('-5000');
    });

    it('should cap a reversal at the open size', () => {
      const long = position('BTC', '2', '50000');
      const pnl = calculateRealizedPnl(long, toDecimal(-5), toDecimal(51000), ZERO, 'REVERSE');
      expect(pnl.toString()).toBe('2000');
    });

    it('should realize nothing from a flat position', () => {
      const flat = createPosition('BTC');
      expect(calculateRealizedPnl(flat, toDecimal(-1), toDecimal(50000), ZERO, 'REDUCE').isZero()).toBe(true);
    });

    it('should realize nothing without an entry price', () => {
      const noEntry = position('BTC', '1', '0');
      expect(calculateRealizedPnl(noEntry, toDecimal(-1), toDecimal(50000), ZERO, 'CLOSE').isZero()).toBe(true);
    });
  });

  describe('calculateUnrealizedPnl', () => {
    it('should mark a long to the last price', () => {
      expect(calculateUnrealizedPnl(position('BTC', '2', '50000', '51000')).toString()).toBe('2000');
    });

    it('should let a short gain as the price falls', () => {
      expect(calculateUnrealizedPnl(position('ETH', '-3', '3000', '2900')).toString()).toBe('300');
    });

    it('should be zero for a flat position', () => {
      expect(calculateUnrealizedPnl(createPosition('BTC')).isZero()).toBe(true);
    });

    it('should be zero without an entry price', () => {
      expect(calculateUnrealizedPnl(position('BTC', '1', '0', '50000')).isZero()).toBe(true);
    });
  });

  describe('calculateTotalUnrealizedPnl', () => {
    it('should sum every position', () => {
      const positions = new Map<string, Position>([
        ['BTC', position('BTC', '1', '50000', '50500')],
        ['ETH', position('ETH', '-2', '3000', '3100')],
        ['SOL', createPosition('SOL')],
      ]);
      expect(calculateTotalUnrealizedPnl(positions).toString()).toBe('300');
    });
  });
});
