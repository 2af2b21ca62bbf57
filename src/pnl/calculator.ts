import { Decimal, ZERO, signOf, sum, tryParseDecimal } from '../utils/decimal.js';

import { isSizeIncreasing } from './classifier.js';
import type { Position, PositionAction } from './types.js';

/**
 * Parse the venue's string-encoded closed PnL. Anything that is not a finite
 * number (empty, garbage, "NaN") is treated as zero.
 */
export function parseClosedPnl(raw: string | null | undefined): Decimal {
  if (raw === null || raw === undefined) return ZERO;
  return tryParseDecimal(raw) ?? ZERO;
}

/**
 * Realized PnL for a trade of signed `tradeSize` at `execPrice` against the
 * position as it stood before the trade.
 *
 * OPEN and ADD never realize anything, whatever the venue reports. For
 * REDUCE, CLOSE and REVERSE a non-zero venue figure is taken verbatim;
 * otherwise it is computed from the average entry price over the quantity
 * actually taken off (never more than the open size).
 */
export function calculateRealizedPnl(
  position: Position,
  tradeSize: Decimal,
  execPrice: Decimal,
  venueClosedPnl: Decimal,
  action: PositionAction
): Decimal {
  if (isSizeIncreasing(action)) return ZERO;

  if (!venueClosedPnl.isZero()) return venueClosedPnl;

  const positionSign = signOf(position.size);
  const tradeSign = signOf(tradeSize);
  if (positionSign === 0 || tradeSign === positionSign) return ZERO;
  if (!position.avgEntryPrice.greaterThan(0)) return ZERO;

  const reducedQty = Decimal.min(tradeSize.abs(), position.size.abs());
  const pnlPerUnit =
    positionSign > 0
      ? execPrice.minus(position.avgEntryPrice)
      : position.avgEntryPrice.minus(execPrice);

  return pnlPerUnit.times(reducedQty);
}

/**
 * Mark-to-last-price PnL of the open exposure. The signed size makes this
 * direction-agnostic: a short gains as the price falls.
 */
export function calculateUnrealizedPnl(position: Position): Decimal {
  if (position.size.isZero() || position.avgEntryPrice.isZero()) return ZERO;
  return position.lastPrice.minus(position.avgEntryPrice).times(position.size);
}

export function calculateTotalUnrealizedPnl(positions: ReadonlyMap<string, Position>): Decimal {
  return sum(Array.from(positions.values()).map(calculateUnrealizedPnl));
}
