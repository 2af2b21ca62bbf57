/**
 * Paper Trading Session
 *
 * Owns every position, the trade history and the session totals, and is the
 * single entry point that turns an incoming fill into ledger state:
 *
 *   fill ─▶ aggregator ─▶ exposure guard ─▶ classify ─▶ realized PnL
 *        ─▶ ledger update ─▶ totals + history ─▶ journal / trade log
 *
 * processFill runs start to finish without yielding, so on the event loop it
 * is one critical section: no other fill, summary or snapshot read can
 * observe a half-applied trade. Sinks are called synchronously and start
 * their own I/O; nothing the session does waits on them.
 */

import { Decimal, type DecimalInput, ZERO, signOf, sum } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';
import { classifyAction } from '../pnl/classifier.js';
import { calculateRealizedPnl, calculateUnrealizedPnl } from '../pnl/calculator.js';
import {
  calculateAvailableCapital,
  calculateCurrentExposure,
  calculateDynamicTradeSize,
  calculateMaxExposure,
  validatePositionSize,
} from '../pnl/exposure.js';
import { applyTradeToPosition, createPosition } from '../pnl/ledger.js';
import { formatTradeLine } from '../pnl/report.js';
import type {
  AccountSnapshot,
  AggregatedTrade,
  CapitalState,
  Fill,
  PaperTrade,
  PaperTradeSink,
  PortfolioSummary,
  Position,
  PositionSummary,
} from '../pnl/types.js';

import { FillAggregator } from './fill-aggregator.js';

export interface PaperTradingSessionOptions {
  bankroll: DecimalInput;
  leverage: DecimalInput;
  /** Target notional per copied trade. Omit to validate fills at their own size. */
  baseNotional?: DecimalInput;
  /** Forces hard validation even when a base notional is set. */
  disableDynamicSizing?: boolean;
  volumeThreshold: DecimalInput;
  minTradeIntervalMs: number;
  volumeDecayRate: DecimalInput;
  sinks?: PaperTradeSink[];
}

export class PaperTradingSession {
  readonly startTime: Date;

  private readonly bankroll: Decimal;
  private readonly leverage: Decimal;
  private readonly baseNotional: Decimal | null;
  private readonly aggregator: FillAggregator;
  private readonly sinks: PaperTradeSink[];

  private readonly positions = new Map<string, Position>();
  private readonly tradeHistory: PaperTrade[] = [];
  private totalRealizedPnl = ZERO;
  private totalTrades = 0;

  constructor(options: PaperTradingSessionOptions, startTime: Date = new Date()) {
    const bankroll = new Decimal(options.bankroll);
    const leverage = new Decimal(options.leverage);
    const volumeThreshold = new Decimal(options.volumeThreshold);
    const volumeDecayRate = new Decimal(options.volumeDecayRate);

    if (!bankroll.greaterThan(0)) {
      throw new Error(`Bankroll must be positive, got ${bankroll.toString()}`);
    }
    if (leverage.lessThan(1)) {
      throw new Error(`Leverage must be at least 1, got ${leverage.toString()}`);
    }
    if (volumeThreshold.lessThan(0)) {
      throw new Error(`Volume threshold must not be negative, got ${volumeThreshold.toString()}`);
    }
    if (volumeDecayRate.lessThan(0) || volumeDecayRate.greaterThan(1)) {
      throw new Error(`Volume decay rate must be between 0 and 1, got ${volumeDecayRate.toString()}`);
    }
    if (options.minTradeIntervalMs < 0) {
      throw new Error(`Minimum trade interval must not be negative, got ${options.minTradeIntervalMs}`);
    }

    const baseNotional =
      options.baseNotional === undefined || options.disableDynamicSizing
        ? null
        : new Decimal(options.baseNotional);
    if (baseNotional && !baseNotional.greaterThan(0)) {
      throw new Error(`Base notional must be positive, got ${baseNotional.toString()}`);
    }

    this.startTime = startTime;
    this.bankroll = bankroll;
    this.leverage = leverage;
    this.baseNotional = baseNotional;
    this.sinks = [...(options.sinks ?? [])];
    this.aggregator = new FillAggregator({
      volumeThreshold,
      minTradeIntervalMs: options.minTradeIntervalMs,
      volumeDecayRate,
    });
  }

  get dynamicSizing(): boolean {
    return this.baseNotional !== null;
  }

  /**
   * Feed one fill through the pipeline. Returns the trade recorded when the
   * fill completed a batch, or null when the fill was ignored, buffered,
   * rejected by the exposure guard or sized to zero.
   */
  processFill(fill: Fill, now: number = Date.now()): PaperTrade | null {
    if (fill.size.isZero()) return null;

    const batch = this.aggregator.add(fill, now);
    if (!batch) return null;

    return this.commit(batch, now);
  }

  setVolumeThreshold(threshold: DecimalInput): void {
    this.aggregator.setVolumeThreshold(new Decimal(threshold));
  }

  setMinTradeInterval(intervalMs: number): void {
    this.aggregator.setMinTradeInterval(intervalMs);
  }

  getPosition(coin: string): Position | undefined {
    const position = this.positions.get(coin);
    return position ? { ...position } : undefined;
  }

  getPositions(): Position[] {
    return Array.from(this.positions.values(), position => ({ ...position }));
  }

  getTradeHistory(): PaperTrade[] {
    return [...this.tradeHistory];
  }

  getRecentTrades(count: number): PaperTrade[] {
    if (count <= 0) return [];
    return this.tradeHistory.slice(-count);
  }

  getTotalTrades(): number {
    return this.totalTrades;
  }

  getTotalRealizedPnl(): Decimal {
    return this.totalRealizedPnl;
  }

  getPendingVolume(coin: string): Decimal {
    return this.aggregator.getPendingVolume(coin);
  }

  getPendingFills(coin: string): Fill[] {
    return this.aggregator.getPendingFills(coin);
  }

  getAvailableCapital(): Decimal {
    return calculateAvailableCapital(this.capitalState());
  }

  getMaxExposure(): Decimal {
    return calculateMaxExposure(this.capitalState());
  }

  getCurrentExposure(): Decimal {
    return calculateCurrentExposure(this.positions);
  }

  getPortfolioSummary(now: number = Date.now()): PortfolioSummary {
    const positions: PositionSummary[] = [];

    for (const position of this.positions.values()) {
      if (position.size.isZero()) continue;
      const pnlPercent = position.avgEntryPrice.greaterThan(0)
        ? position.lastPrice.minus(position.avgEntryPrice).dividedBy(position.avgEntryPrice).times(100)
        : ZERO;

      positions.push({
        coin: position.coin,
        size: position.size,
        avgEntryPrice: position.avgEntryPrice,
        lastPrice: position.lastPrice,
        realizedPnl: position.realizedPnl,
        unrealizedPnl: calculateUnrealizedPnl(position),
        pnlPercent,
        tradeCount: position.tradeCount,
      });
    }
    positions.sort((a, b) => a.coin.localeCompare(b.coin));

    const totalUnrealizedPnl = sum(positions.map(p => p.unrealizedPnl));
    const totalPnl = this.totalRealizedPnl.plus(totalUnrealizedPnl);
    const state = this.capitalState();

    return {
      startTime: this.startTime,
      sessionDurationMs: Math.max(0, now - this.startTime.getTime()),
      totalRealizedPnl: this.totalRealizedPnl,
      totalUnrealizedPnl,
      totalPnl,
      totalTrades: this.totalTrades,
      activePositions: positions.length,
      avgPnlPerTrade: this.totalTrades > 0 ? totalPnl.dividedBy(this.totalTrades) : null,
      availableCapital: calculateAvailableCapital(state),
      currentExposure: calculateCurrentExposure(this.positions),
      maxExposure: calculateMaxExposure(state),
      positions,
    };
  }

  createAccountSnapshot(now: number = Date.now()): AccountSnapshot {
    const positions = Array.from(this.positions.values())
      .filter(position => !position.size.isZero())
      .map(position => ({
        coin: position.coin,
        size: position.size,
        avgPrice: position.avgEntryPrice,
        lastPrice: position.lastPrice,
        realized: position.realizedPnl,
        unrealized: calculateUnrealizedPnl(position),
        marketValue: position.size.times(position.lastPrice),
      }));

    return {
      time: new Date(now),
      totalPnl: this.totalRealizedPnl.plus(sum(positions.map(p => p.unrealized))),
      realizedPnl: this.totalRealizedPnl,
      numTrades: this.totalTrades,
      positions,
    };
  }

  private capitalState(): CapitalState {
    return {
      bankroll: this.bankroll,
      leverage: this.leverage,
      totalRealizedPnl: this.totalRealizedPnl,
      positions: this.positions,
    };
  }

  private commit(batch: AggregatedTrade, now: number): PaperTrade | null {
    if (batch.size.isZero()) {
      logger.debug(
        { coin: batch.coin, fills: batch.fills.length },
        'Buffered fills net to zero, nothing to commit'
      );
      return null;
    }

    const tradeSize = this.sizeTrade(batch);
    if (tradeSize === null) return null;

    const position = this.getOrCreatePosition(batch.coin);
    const oldSize = position.size;
    const action = classifyAction(oldSize, oldSize.plus(tradeSize));
    const realizedPnl = calculateRealizedPnl(position, tradeSize, batch.price, batch.closedPnl, action);

    applyTradeToPosition(position, tradeSize, batch.price, realizedPnl, new Date(now));
    position.lastPrice = batch.lastPrice;

    this.totalTrades += 1;
    this.totalRealizedPnl = this.totalRealizedPnl.plus(realizedPnl);

    const trade: PaperTrade = {
      timestamp: new Date(batch.time),
      coin: batch.coin,
      action,
      side: signOf(tradeSize) > 0 ? 'buy' : 'sell',
      size: tradeSize.abs(),
      price: batch.price,
      realizedPnl,
      positionSize: position.size,
      unrealizedPnl: calculateUnrealizedPnl(position),
    };
    this.tradeHistory.push(trade);

    logger.info(
      {
        coin: trade.coin,
        action: trade.action,
        side: trade.side,
        size: trade.size.toString(),
        price: trade.price.toString(),
        realizedPnl: trade.realizedPnl.toFixed(2),
        unrealizedPnl: trade.unrealizedPnl.toFixed(2),
        fills: batch.fills.length,
      },
      formatTradeLine(trade)
    );

    this.notifySinks(batch.fills, trade, now);
    return trade;
  }

  /**
   * Signed size to book for `batch`, or null when the exposure guard
   * refuses it.
   *
   * Sizing and validation price the batch at its last fill, which is where
   * the position is marked afterwards. The batch still books at its average
   * price, so the resulting unrealized PnL is checked too: the projected
   * state after the trade must stay within the exposure limit.
   */
  private sizeTrade(batch: AggregatedTrade): Decimal | null {
    const state = this.capitalState();

    if (this.baseNotional) {
      const quantity = calculateDynamicTradeSize(state, this.baseNotional, batch.lastPrice);
      const signed = signOf(batch.size) > 0 ? quantity : quantity.negated();
      const sized = quantity.isZero() ? null : this.fitToHeadroom(batch, signed);
      if (!sized) {
        logger.warn(
          {
            coin: batch.coin,
            currentExposure: calculateCurrentExposure(this.positions).toFixed(2),
            maxExposure: calculateMaxExposure(state).toFixed(2),
          },
          'No exposure capacity left, skipping trade'
        );
        return null;
      }
      return sized;
    }

    const currentSize = this.positions.get(batch.coin)?.size ?? ZERO;
    const prospectiveSize = currentSize.plus(batch.size);
    if (
      !validatePositionSize(state, batch.coin, prospectiveSize, batch.lastPrice) ||
      this.projectedHeadroom(batch, batch.size).lessThan(0)
    ) {
      logger.warn(
        {
          coin: batch.coin,
          size: batch.size.toString(),
          price: batch.lastPrice.toString(),
          maxExposure: calculateMaxExposure(state).toFixed(2),
        },
        'Trade would exceed maximum exposure, rejecting'
      );
      return null;
    }
    return batch.size;
  }

  /**
   * Shrink `tradeSize` until the projected state fits under the limit.
   * Headroom is linear in the trade size while the trade only opens or
   * extends the position, so one interpolation between no trade and the
   * full size lands on the limit; the result is rounded toward zero and
   * re-checked.
   */
  private fitToHeadroom(batch: AggregatedTrade, tradeSize: Decimal): Decimal | null {
    const full = this.projectedHeadroom(batch, tradeSize);
    if (!full.lessThan(0)) return tradeSize;

    const none = this.projectedHeadroom(batch, ZERO);
    if (!none.greaterThan(0)) return null;

    const fitted = tradeSize
      .times(none.dividedBy(none.minus(full)))
      .toSignificantDigits(12, Decimal.ROUND_DOWN);
    if (fitted.isZero() || this.projectedHeadroom(batch, fitted).lessThan(0)) return null;
    return fitted;
  }

  /**
   * Maximum exposure minus current exposure as they would stand after
   * booking `tradeSize` of `batch`, with the coin marked at the batch's last
   * price. Negative when the trade would breach the limit.
   */
  private projectedHeadroom(batch: AggregatedTrade, tradeSize: Decimal): Decimal {
    const current = this.positions.get(batch.coin) ?? createPosition(batch.coin);
    const action = classifyAction(current.size, current.size.plus(tradeSize));
    const realizedPnl = tradeSize.isZero()
      ? ZERO
      : calculateRealizedPnl(current, tradeSize, batch.price, batch.closedPnl, action);

    const projected: Position = { ...current };
    if (!tradeSize.isZero()) {
      applyTradeToPosition(projected, tradeSize, batch.price, realizedPnl);
    }
    projected.lastPrice = batch.lastPrice;

    const positions = new Map(this.positions);
    positions.set(batch.coin, projected);
    const state: CapitalState = {
      bankroll: this.bankroll,
      leverage: this.leverage,
      totalRealizedPnl: this.totalRealizedPnl.plus(realizedPnl),
      positions,
    };

    return calculateMaxExposure(state).minus(calculateCurrentExposure(positions));
  }

  private getOrCreatePosition(coin: string): Position {
    let position = this.positions.get(coin);
    if (!position) {
      position = createPosition(coin);
      this.positions.set(coin, position);
    }
    return position;
  }

  private notifySinks(fills: Fill[], trade: PaperTrade, now: number): void {
    if (this.sinks.length === 0) return;

    const snapshot = this.createAccountSnapshot(now);
    for (const sink of this.sinks) {
      try {
        for (const fill of fills) {
          sink.saveFill(fill, trade.action, trade.realizedPnl, trade.unrealizedPnl);
        }
        sink.saveAccount(snapshot);
      } catch (error) {
        logger.error(
          { error: error instanceof Error ? error.message : String(error), coin: trade.coin },
          'Trade sink failed'
        );
      }
    }
  }
}
