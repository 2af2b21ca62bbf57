/**
 * Fill Aggregator
 *
 * Buffers fills per coin and releases them as one netted trade once the
 * buffered dollar volume reaches the volume threshold, or once the batch has
 * been open for the minimum trade interval, whichever comes first.
 *
 * Buffered volume decays exponentially while it waits: after a 10 second
 * grace period the volume is multiplied by (1 - decayRate)^minutes, measured
 * from when the batch started. A batch whose volume decays below $1 is
 * dropped without being committed.
 */

import { Decimal, ZERO } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';
import type { AggregatedTrade, Fill } from '../pnl/types.js';

const DECAY_GRACE_MS = 10_000;
const DECAY_FLOOR = new Decimal(1);

export interface FillAggregatorOptions {
  /** Dollar volume that commits a batch. Zero commits every fill. */
  volumeThreshold: Decimal;
  minTradeIntervalMs: number;
  /** Fraction of pending volume lost per minute, 0 to 1. */
  volumeDecayRate: Decimal;
}

interface PendingBatch {
  fills: Fill[];
  volume: Decimal;
  startedAt: number;
}

/**
 * Net a batch of fills for one coin. Returns null for an empty batch.
 *
 * The execution price is the volume-weighted average over the absolute
 * size of every fill, so a batch mixing buys and sells still prices at a
 * level its fills actually traded at.
 */
export function aggregateFills(coin: string, fills: readonly Fill[]): AggregatedTrade | null {
  const last = fills[fills.length - 1];
  if (!last) return null;

  let netSize = ZERO;
  let grossSize = ZERO;
  let notional = ZERO;
  let closedPnl = ZERO;

  for (const fill of fills) {
    const signed = fill.side === 'buy' ? fill.size : fill.size.negated();
    netSize = netSize.plus(signed);
    grossSize = grossSize.plus(fill.size);
    notional = notional.plus(fill.size.times(fill.price));
    closedPnl = closedPnl.plus(fill.closedPnl);
  }

  if (grossSize.isZero()) return null;

  return {
    coin,
    size: netSize,
    price: notional.dividedBy(grossSize),
    lastPrice: last.price,
    closedPnl,
    time: last.time,
    fills: [...fills],
  };
}

export class FillAggregator {
  private readonly pending = new Map<string, PendingBatch>();
  private options: FillAggregatorOptions;

  constructor(options: FillAggregatorOptions) {
    this.options = { ...options };
  }

  setVolumeThreshold(threshold: Decimal): void {
    this.options = { ...this.options, volumeThreshold: threshold };
  }

  setMinTradeInterval(intervalMs: number): void {
    this.options = { ...this.options, minTradeIntervalMs: intervalMs };
  }

  /**
   * Buffer `fill` and return the netted batch if this fill triggers a
   * commit. The coin's buffer is empty again afterwards.
   */
  add(fill: Fill, now: number): AggregatedTrade | null {
    this.applyVolumeDecay(fill.coin, now);

    let batch = this.pending.get(fill.coin);
    if (!batch) {
      batch = { fills: [], volume: ZERO, startedAt: now };
      this.pending.set(fill.coin, batch);
    }

    batch.fills.push(fill);
    batch.volume = batch.volume.plus(fill.size.times(fill.price));

    const dueByVolume = batch.volume.greaterThanOrEqualTo(this.options.volumeThreshold);
    const dueByTime = now - batch.startedAt >= this.options.minTradeIntervalMs;
    if (!dueByVolume && !dueByTime) {
      logger.debug(
        { coin: fill.coin, pendingFills: batch.fills.length, pendingVolume: batch.volume.toFixed(2) },
        'Fill buffered'
      );
      return null;
    }

    this.pending.delete(fill.coin);
    return aggregateFills(fill.coin, batch.fills);
  }

  getPendingVolume(coin: string): Decimal {
    return this.pending.get(coin)?.volume ?? ZERO;
  }

  getPendingFills(coin: string): Fill[] {
    return [...(this.pending.get(coin)?.fills ?? [])];
  }

  private applyVolumeDecay(coin: string, now: number): void {
    const batch = this.pending.get(coin);
    if (!batch || batch.volume.isZero()) return;

    const elapsedMs = now - batch.startedAt;
    if (elapsedMs < DECAY_GRACE_MS) return;

    const minutes = elapsedMs / 60_000;
    const decayFactor = new Decimal(1).minus(this.options.volumeDecayRate).pow(minutes);
    batch.volume = batch.volume.times(decayFactor);

    if (batch.volume.lessThan(DECAY_FLOOR)) {
      logger.debug(
        { coin, droppedFills: batch.fills.length, elapsedMs },
        'Pending volume decayed away, dropping buffered fills'
      );
      this.pending.delete(coin);
    }
  }
}
