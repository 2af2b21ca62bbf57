import { Decimal, ZERO, sum } from '../utils/decimal.js';

import { calculateTotalUnrealizedPnl } from './calculator.js';
import type { CapitalState, Position } from './types.js';

/**
 * Bankroll plus everything the session has made or lost so far, realized or
 * floating. Recomputed on every call: capacity follows the session's PnL.
 */
export function calculateAvailableCapital(state: CapitalState): Decimal {
  return state.bankroll
    .plus(state.totalRealizedPnl)
    .plus(calculateTotalUnrealizedPnl(state.positions));
}

export function calculateMaxExposure(state: CapitalState): Decimal {
  return calculateAvailableCapital(state).times(state.leverage);
}

/**
 * Notional of all open positions marked at their last price, optionally
 * leaving one coin out.
 */
export function calculateCurrentExposure(
  positions: ReadonlyMap<string, Position>,
  excludeCoin?: string
): Decimal {
  const notionals: Decimal[] = [];
  for (const position of positions.values()) {
    if (position.coin === excludeCoin || position.size.isZero()) continue;
    notionals.push(position.size.abs().times(position.lastPrice));
  }
  return sum(notionals);
}

/**
 * Hard limit check. `size` is the position the coin would hold after the
 * trade; the coin's current exposure is replaced by it rather than added.
 */
export function validatePositionSize(
  state: CapitalState,
  coin: string,
  size: Decimal,
  price: Decimal
): boolean {
  const otherExposure = calculateCurrentExposure(state.positions, coin);
  const prospective = otherExposure.plus(size.times(price).abs());
  return prospective.lessThanOrEqualTo(calculateMaxExposure(state));
}

/**
 * Quantity that spends `baseNotional` at `price`, shrunk to whatever
 * exposure capacity is left. Zero when nothing is left.
 */
export function calculateDynamicTradeSize(
  state: CapitalState,
  baseNotional: Decimal,
  price: Decimal
): Decimal {
  if (!price.greaterThan(0)) return ZERO;

  const remainingCapacity = calculateMaxExposure(state).minus(
    calculateCurrentExposure(state.positions)
  );
  if (!remainingCapacity.greaterThan(0)) return ZERO;

  return Decimal.min(baseNotional, remainingCapacity).dividedBy(price);
}
