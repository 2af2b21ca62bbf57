import type { Decimal } from '../utils/decimal.js';

export type Side = 'buy' | 'sell';

export type PositionAction = 'OPEN' | 'ADD' | 'REDUCE' | 'CLOSE' | 'REVERSE';

/**
 * One execution reported for the monitored account, already parsed at the
 * venue boundary. `closedPnl` is zero when the venue string was malformed.
 */
export interface Fill {
  coin: string;
  side: Side;
  size: Decimal;
  price: Decimal;
  closedPnl: Decimal;
  time: number;
  hash: string;
}

export interface Position {
  coin: string;
  /** Signed: positive is long, negative is short, zero is flat. */
  size: Decimal;
  avgEntryPrice: Decimal;
  totalCostBasis: Decimal;
  realizedPnl: Decimal;
  lastPrice: Decimal;
  tradeCount: number;
  openTime: Date | null;
}

/**
 * A batch of buffered fills for one coin, netted into a single trade.
 */
export interface AggregatedTrade {
  coin: string;
  /** Net signed size across the batch. */
  size: Decimal;
  /** Volume-weighted execution price. */
  price: Decimal;
  lastPrice: Decimal;
  closedPnl: Decimal;
  time: number;
  fills: Fill[];
}

export interface PaperTrade {
  timestamp: Date;
  coin: string;
  action: PositionAction;
  side: Side;
  size: Decimal;
  price: Decimal;
  realizedPnl: Decimal;
  positionSize: Decimal;
  unrealizedPnl: Decimal;
}

export interface CapitalState {
  bankroll: Decimal;
  leverage: Decimal;
  totalRealizedPnl: Decimal;
  positions: ReadonlyMap<string, Position>;
}

export interface PositionSummary {
  coin: string;
  size: Decimal;
  avgEntryPrice: Decimal;
  lastPrice: Decimal;
  realizedPnl: Decimal;
  unrealizedPnl: Decimal;
  pnlPercent: Decimal;
  tradeCount: number;
}

export interface PortfolioSummary {
  startTime: Date;
  sessionDurationMs: number;
  totalRealizedPnl: Decimal;
  totalUnrealizedPnl: Decimal;
  totalPnl: Decimal;
  totalTrades: number;
  activePositions: number;
  avgPnlPerTrade: Decimal | null;
  availableCapital: Decimal;
  currentExposure: Decimal;
  maxExposure: Decimal;
  positions: PositionSummary[];
}

export interface AccountPositionSnapshot {
  coin: string;
  size: Decimal;
  avgPrice: Decimal;
  lastPrice: Decimal;
  realized: Decimal;
  unrealized: Decimal;
  marketValue: Decimal;
}

export interface AccountSnapshot {
  time: Date;
  totalPnl: Decimal;
  realizedPnl: Decimal;
  numTrades: number;
  positions: AccountPositionSnapshot[];
}

/**
 * Receives every committed trade. Implementations own their failures: the
 * session never waits on them and never sees their errors.
 */
export interface PaperTradeSink {
  saveFill(fill: Fill, action: PositionAction, realizedPnl: Decimal, unrealizedPnl: Decimal): void;
  saveAccount(snapshot: AccountSnapshot): void;
}
