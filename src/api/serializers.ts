import type { PaperTrade, PortfolioSummary, Position } from '../pnl/types.js';

// Decimals go over the wire as strings so no precision is lost to JSON numbers

export function serializePosition(position: Position) {
  return {
    coin: position.coin,
    size: position.size.toString(),
    avg_entry_price: position.avgEntryPrice.toString(),
    total_cost_basis: position.totalCostBasis.toString(),
    realized_pnl: position.realizedPnl.toString(),
    last_price: position.lastPrice.toString(),
    trade_count: position.tradeCount,
    open_time: position.openTime ? position.openTime.getTime() : null,
  };
}

export function serializeTrade(trade: PaperTrade) {
  return {
    timestamp: trade.timestamp.getTime(),
    coin: trade.coin,
    action: trade.action,
    side: trade.side === 'buy' ? 'BUY' : 'SELL',
    size: trade.size.toString(),
    price: trade.price.toString(),
    realized_pnl: trade.realizedPnl.toString(),
    position_size: trade.positionSize.toString(),
    unrealized_pnl: trade.unrealizedPnl.toString(),
  };
}

export function serializeSummary(summary: PortfolioSummary) {
  return {
    start_time: summary.startTime.getTime(),
    session_duration_ms: summary.sessionDurationMs,
    total_realized_pnl: summary.totalRealizedPnl.toString(),
    total_unrealized_pnl: summary.totalUnrealizedPnl.toString(),
    total_pnl: summary.totalPnl.toString(),
    total_trades: summary.totalTrades,
    active_positions: summary.activePositions,
    avg_pnl_per_trade: summary.avgPnlPerTrade ? summary.avgPnlPerTrade.toString() : null,
    available_capital: summary.availableCapital.toString(),
    current_exposure: summary.currentExposure.toString(),
    max_exposure: summary.maxExposure.toString(),
    positions: summary.positions.map(p => ({
      coin: p.coin,
      size: p.size.toString(),
      avg_entry_price: p.avgEntryPrice.toString(),
      last_price: p.lastPrice.toString(),
      realized_pnl: p.realizedPnl.toString(),
      unrealized_pnl: p.unrealizedPnl.toString(),
      pnl_percent: p.pnlPercent.toFixed(2),
      trade_count: p.tradeCount,
    })),
  };
}
