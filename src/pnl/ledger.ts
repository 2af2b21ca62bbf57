import { type Decimal, ZERO, signOf } from '../utils/decimal.js';

import type { Position } from './types.js';

export function createPosition(coin: string): Position {
  return {
    coin,
    size: ZERO,
    avgEntryPrice: ZERO,
    totalCostBasis: ZERO,
    realizedPnl: ZERO,
    lastPrice: ZERO,
    tradeCount: 0,
    openTime: null,
  };
}

/**
 * Apply one committed trade of signed `tradeSize` at `price` to `position`,
 * in place. Must run exactly once per committed trade.
 *
 * Cost basis rules:
 * - flat afterwards: entry price and cost basis reset to zero
 * - opened from flat, or flipped through zero: the surviving size is a fresh
 *   lot at `price`
 * - same direction, larger: cost basis grows and the entry price becomes the
 *   volume-weighted average
 * - same direction, smaller: entry price and cost basis are left as they are
 */
export function applyTradeToPosition(
  position: Position,
  tradeSize: Decimal,
  price: Decimal,
  realizedPnl: Decimal,
  now: Date = new Date()
): void {
  const oldSize = position.size;
  const newSize = oldSize.plus(tradeSize);
  const oldSign = signOf(oldSize);
  const newSign = signOf(newSize);

  position.realizedPnl = position.realizedPnl.plus(realizedPnl);

  if (newSign === 0) {
    position.avgEntryPrice = ZERO;
    position.totalCostBasis = ZERO;
  } else if (oldSign === 0) {
    position.avgEntryPrice = price;
    position.totalCostBasis = price.times(tradeSize.abs());
    position.openTime = now;
  } else if (oldSign !== newSign) {
    position.avgEntryPrice = price;
    position.totalCostBasis = price.times(newSize.abs());
    position.openTime = now;
  } else if (signOf(tradeSize) === oldSign) {
    position.totalCostBasis = position.totalCostBasis.plus(price.times(tradeSize.abs()));
    position.avgEntryPrice = position.totalCostBasis.dividedBy(newSize.abs());
  }

  position.size = newSize;
  position.tradeCount += 1;
}
