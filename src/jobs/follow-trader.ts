/**
 * Follow Trader Job
 *
 * Forwards newly observed fills of the monitored account into the paper
 * trading session. Per polled batch:
 *   1. forget registry entries older than the retention window
 *   2. skip fills already forwarded on an earlier poll
 *   3. stop after maxFillsPerCheck new fills; the rest wait for the next poll
 *   4. skip fills below the copy threshold (left unmarked)
 *   5. mark and hand the rest to the session
 */

import { Observable } from 'rxjs';
import { map, tap } from 'rxjs/operators';

import { parseHyperliquidFill } from '../hyperliquid/client.js';
import { printPortfolioSummary } from '../pnl/report.js';
import type { PaperTradingSession } from '../state/paper-trading-session.js';
import type { ProcessedFillRegistry } from '../state/processed-fills.js';
import type { FillsBatch } from '../streams/sources/fills.stream.js';
import { Decimal, type DecimalInput } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';

export interface FollowTraderOptions {
  copyThreshold: DecimalInput;
  maxFillsPerCheck: number;
  processedFillTtlMs: number;
  /** Print the portfolio summary each time the trade count hits a multiple of this. */
  summaryEveryTrades: number;
}

export interface FollowStats {
  received: number;
  forwarded: number;
  duplicates: number;
  belowThreshold: number;
  invalid: number;
  deferred: number;
}

export function processFillsBatch(
  session: PaperTradingSession,
  registry: ProcessedFillRegistry,
  batch: FillsBatch,
  options: FollowTraderOptions,
  now: number = Date.now()
): FollowStats {
  const copyThreshold = new Decimal(options.copyThreshold);
  const stats: FollowStats = {
    received: batch.fills.length,
    forwarded: 0,
    duplicates: 0,
    belowThreshold: 0,
    invalid: 0,
    deferred: 0,
  };

  registry.prune(now - options.processedFillTtlMs);

  for (const [index, raw] of batch.fills.entries()) {
    if (stats.forwarded >= options.maxFillsPerCheck) {
      stats.deferred = batch.fills.length - index;
      logger.info(
        { maxFillsPerCheck: options.maxFillsPerCheck, deferred: stats.deferred },
        'Reached maximum fills per check, deferring remaining fills'
      );
      break;
    }

    if (registry.has(raw.hash)) {
      stats.duplicates++;
      continue;
    }

    const fill = parseHyperliquidFill(raw);
    if (!fill) {
      // Marked so a malformed fill is reported once, not on every poll
      registry.markProcessed(raw.hash, raw.time);
      stats.invalid++;
      logger.warn({ hash: raw.hash, coin: raw.coin, sz: raw.sz, px: raw.px }, 'Skipping malformed fill');
      continue;
    }

    if (fill.size.times(fill.price).lessThan(copyThreshold)) {
      stats.belowThreshold++;
      continue;
    }

    registry.markProcessed(fill.hash, fill.time);
    logger.info(
      {
        coin: fill.coin,
        side: fill.side,
        size: fill.size.toString(),
        price: fill.price.toString(),
        hash: fill.hash.slice(0, 10),
      },
      'New fill detected'
    );
    session.processFill(fill, now);
    stats.forwarded++;
  }

  return stats;
}

export function followTrader$(
  fills$: Observable<FillsBatch>,
  session: PaperTradingSession,
  registry: ProcessedFillRegistry,
  options: FollowTraderOptions
): Observable<FollowStats> {
  return fills$.pipe(
    map(batch => processFillsBatch(session, registry, batch, options)),
    tap(stats => {
      if (stats.forwarded === 0) return;

      logger.info(stats, 'Processed new fills');
      const totalTrades = session.getTotalTrades();
      if (totalTrades > 0 && totalTrades % options.summaryEveryTrades === 0) {
        printPortfolioSummary(session);
      }
    })
  );
}
