import { type Decimal, signOf } from '../utils/decimal.js';

import type { PositionAction } from './types.js';

/**
 * Classify the transition from `oldSize` to `newSize` (both signed).
 *
 * Equal sizes match none of the five transitions and fall back to ADD; the
 * session drops net-zero batches before classifying, so that branch is not
 * reached from processFill.
 */
export function classifyAction(oldSize: Decimal, newSize: Decimal): PositionAction {
  const oldSign = signOf(oldSize);
  const newSign = signOf(newSize);

  if (oldSign === 0 && newSign !== 0) return 'OPEN';
  if (oldSign !== 0 && newSign === 0) return 'CLOSE';
  if (oldSign !== newSign) return 'REVERSE';

  const oldAbs = oldSize.abs();
  const newAbs = newSize.abs();
  if (newAbs.greaterThan(oldAbs)) return 'ADD';
  if (newAbs.lessThan(oldAbs)) return 'REDUCE';

  return 'ADD';
}

export function isSizeIncreasing(action: PositionAction): boolean {
  return action === 'OPEN' || action === 'ADD';
}
