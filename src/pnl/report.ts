import { type Decimal, formatUsd, signOf } from '../utils/decimal.js';

import type { PaperTrade, PortfolioSummary } from './types.js';

const HEAVY_RULE = '='.repeat(80);
const LIGHT_RULE = '-'.repeat(60);

export interface PortfolioReader {
  getPortfolioSummary(now?: number): PortfolioSummary;
  getRecentTrades(count: number): PaperTrade[];
}

function formatSignedSize(size: Decimal): string {
  const text = size.toFixed(2);
  return signOf(size) > 0 ? `+${text}` : text;
}

/** Compact duration, e.g. 45s, 2m5s, 1h0m3s. */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

export function formatTradeLine(trade: PaperTrade): string {
  const position =
    signOf(trade.positionSize) === 0
      ? 'Position: FLAT'
      : `Position: ${formatSignedSize(trade.positionSize)} ${trade.coin}`;

  const pnl: string[] = [];
  if (!trade.realizedPnl.isZero()) {
    pnl.push(`Realized: ${formatUsd(trade.realizedPnl)}`);
  }
  pnl.push(`Unrealized: ${formatUsd(trade.unrealizedPnl)}`);

  return [
    `${trade.action} ${trade.side.toUpperCase()} ${trade.size.toFixed(2)} ${trade.coin} @ ${formatUsd(trade.price)}`,
    position,
    pnl.join(' | '),
  ].join(' | ');
}

export function formatPortfolioSummary(summary: PortfolioSummary): string {
  const lines = [
    HEAVY_RULE,
    'PAPER TRADING PORTFOLIO SUMMARY',
    HEAVY_RULE,
    `Session Duration: ${formatDuration(summary.sessionDurationMs)}`,
    `Total Realized PnL: ${formatUsd(summary.totalRealizedPnl)}`,
    `Total Unrealized PnL: ${formatUsd(summary.totalUnrealizedPnl)}`,
    `Total Portfolio PnL: ${formatUsd(summary.totalPnl)}`,
    `Total Trades: ${summary.totalTrades}`,
    `Active Positions: ${summary.activePositions}`,
  ];

  if (summary.avgPnlPerTrade) {
    lines.push(`Avg PnL per Trade: ${formatUsd(summary.avgPnlPerTrade)}`);
  }
  lines.push(
    `Available Capital: ${formatUsd(summary.availableCapital)}`,
    `Exposure: ${formatUsd(summary.currentExposure)} / ${formatUsd(summary.maxExposure)}`
  );

  if (summary.positions.length > 0) {
    lines.push('', 'ACTIVE POSITIONS:', LIGHT_RULE);
    for (const p of summary.positions) {
      lines.push(
        `${p.coin.padEnd(8)} | ${formatSignedSize(p.size)} | Avg: ${formatUsd(p.avgEntryPrice)} | ` +
          `Last: ${formatUsd(p.lastPrice)} | PnL: ${formatUsd(p.unrealizedPnl)} (${p.pnlPercent.toFixed(2)}%)`
      );
    }
  }

  lines.push(HEAVY_RULE);
  return lines.join('\n');
}

/** Empty string when there is nothing to list. */
export function formatRecentTrades(trades: PaperTrade[], count: number): string {
  const recent = count > 0 ? trades.slice(-count) : [];
  if (recent.length === 0) return '';

  const lines = [`LAST ${count} TRADES:`, '-'.repeat(80)];
  for (const trade of recent) {
    lines.push(
      `${trade.timestamp.toISOString().slice(11, 19)} | ${trade.action} ${trade.side.toUpperCase()} ` +
        `${trade.size.toFixed(2)} ${trade.coin} @ ${formatUsd(trade.price)} | PnL: ${formatUsd(trade.realizedPnl)}`
    );
  }
  return lines.join('\n');
}

export function printPortfolioSummary(reader: PortfolioReader): void {
  process.stdout.write(`\n${formatPortfolioSummary(reader.getPortfolioSummary())}\n`);
}

export function printRecentTrades(reader: PortfolioReader, count: number): void {
  const text = formatRecentTrades(reader.getRecentTrades(count), count);
  if (text) {
    process.stdout.write(`\n${text}\n`);
  }
}
