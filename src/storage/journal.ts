/**
 * Trade Journal
 *
 * Append-only JSON-lines record of the paper session, one file per UTC day:
 *   <dataDir>/fills/YYYYMMDD.jl     one line per fill of each committed trade
 *   <dataDir>/accounts/YYYYMMDD.jl  one account snapshot per committed trade
 *
 * Writes are queued in call order and never reported back to the session;
 * a failed write is logged and the queue moves on.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { AccountSnapshot, Fill, PaperTradeSink, PositionAction } from '../pnl/types.js';
import type { Decimal } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';

type JournalKind = 'fills' | 'accounts';

export function formatJournalDay(time: number): string {
  return new Date(time).toISOString().slice(0, 10).replace(/-/g, '');
}

async function appendJsonLine(file: string, record: object): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await appendFile(file, `${JSON.stringify(record)}\n`, 'utf8');
}

export class TradeJournal implements PaperTradeSink {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly dataDir: string) {}

  saveFill(fill: Fill, action: PositionAction, realizedPnl: Decimal, unrealizedPnl: Decimal): void {
    const time = Date.now();
    this.append('fills', time, {
      time,
      coin: fill.coin,
      side: fill.side === 'buy' ? 'B' : 'A',
      size: fill.size.toNumber(),
      price: fill.price.toNumber(),
      action,
      realized_pnl: realizedPnl.toNumber(),
      unrealized_pnl: unrealizedPnl.toNumber(),
      volume_usd: fill.size.times(fill.price).toNumber(),
    });
  }

  saveAccount(snapshot: AccountSnapshot): void {
    const time = snapshot.time.getTime();
    const positions: Record<string, Record<string, number>> = {};
    for (const p of snapshot.positions) {
      positions[p.coin] = {
        size: p.size.toNumber(),
        avg_price: p.avgPrice.toNumber(),
        last_price: p.lastPrice.toNumber(),
        realized: p.realized.toNumber(),
        unrealized: p.unrealized.toNumber(),
        market_val: p.marketValue.toNumber(),
      };
    }

    this.append('accounts', time, {
      time,
      total_pnl: snapshot.totalPnl.toNumber(),
      realized_pnl: snapshot.realizedPnl.toNumber(),
      positions,
      num_trades: snapshot.numTrades,
    });
  }

  /** Resolves once every write queued so far has finished or failed. */
  flush(): Promise<void> {
    return this.queue;
  }

  private append(kind: JournalKind, time: number, record: object): void {
    const file = path.join(this.dataDir, kind, `${formatJournalDay(time)}.jl`);

    this.queue = this.queue
      .then(() => appendJsonLine(file, record))
      .catch((error: unknown) => {
        logger.warn(
          { error: error instanceof Error ? error.message : String(error), file },
          'Failed to write journal record'
        );
      });
  }
}
