/**
 * Paper Copy Trader - Main Entry Point
 *
 * Mirrors the trades of one Hyperliquid account into a simulated portfolio:
 * 1. Polls the venue for the account's recent fills
 * 2. Drops fills already seen and fills below the copy threshold
 * 3. Aggregates, sizes and books the rest in the paper session
 * 4. Journals every committed trade and serves the portfolio over HTTP
 *
 * Data Flow:
 * ┌──────────────────────────────────────────────────────────────────────┐
 * │  Fills Poll ──▶ Follow Trader Job ──▶ Paper Session ──▶ Trade Journal │
 * │                                             │                        │
 * │  API Server ◀───────────────────────────────┘                        │
 * └──────────────────────────────────────────────────────────────────────┘
 */

import type { FastifyInstance } from 'fastify';
import { Subject, Subscription } from 'rxjs';
import { takeUntil } from 'rxjs/operators';

import { createServer, startServer, stopServer } from './api/server.js';
import { isValidAddress } from './hyperliquid/client.js';
import { followTrader$ } from './jobs/follow-trader.js';
import { printPortfolioSummary, printRecentTrades } from './pnl/report.js';
import type { PaperTradeSink } from './pnl/types.js';
import { PaperTradingSession } from './state/paper-trading-session.js';
import { ProcessedFillRegistry } from './state/processed-fills.js';
import { TradeJournal } from './storage/journal.js';
import { createFillsStream } from './streams/sources/fills.stream.js';
import { config } from './utils/config.js';
import { logger } from './utils/logger.js';

const shutdown$ = new Subject<void>();
let pipelineSubscription: Subscription | null = null;
let shuttingDown = false;

async function bootstrap(): Promise<void> {
  logger.info('Starting Paper Copy Trader...');

  if (!isValidAddress(config.TARGET_ACCOUNT)) {
    throw new Error(`Invalid target account address: ${config.TARGET_ACCOUNT}`);
  }

  const journal = config.JOURNAL_ENABLED ? new TradeJournal(config.DATA_DIR) : null;
  const sinks: PaperTradeSink[] = journal ? [journal] : [];

  const session = new PaperTradingSession({
    bankroll: config.BANKROLL,
    leverage: config.LEVERAGE,
    baseNotional: config.BASE_NOTIONAL,
    disableDynamicSizing: config.DISABLE_DYNAMIC_SIZING,
    volumeThreshold: config.VOLUME_THRESHOLD,
    minTradeIntervalMs: config.MIN_TRADE_INTERVAL_MS,
    volumeDecayRate: config.VOLUME_DECAY_RATE,
    sinks,
  });

  logger.info(
    {
      target: config.TARGET_ACCOUNT,
      testnet: config.HYPERLIQUID_USE_TESTNET,
      bankroll: config.BANKROLL,
      leverage: config.LEVERAGE,
      copyThreshold: config.COPY_THRESHOLD,
      sizing: session.dynamicSizing ? `dynamic ($${config.BASE_NOTIONAL} per trade)` : 'hard validation',
      pollInterval: config.POLL_INTERVAL_MS,
      journal: journal ? config.DATA_DIR : 'disabled',
    },
    'Configuration'
  );

  const fills$ = createFillsStream({
    address: config.TARGET_ACCOUNT,
    pollIntervalMs: config.POLL_INTERVAL_MS,
    lookbackMs: config.FILLS_LOOKBACK_MS,
    retry: {
      maxRetries: config.MAX_RETRIES,
      initialDelay: config.RETRY_DELAY_MS,
    },
  });

  pipelineSubscription = followTrader$(fills$, session, new ProcessedFillRegistry(), {
    copyThreshold: config.COPY_THRESHOLD,
    maxFillsPerCheck: config.MAX_FILLS_PER_CHECK,
    processedFillTtlMs: config.PROCESSED_FILL_TTL_MS,
    summaryEveryTrades: config.SUMMARY_EVERY_TRADES,
  })
    .pipe(takeUntil(shutdown$))
    .subscribe({
      error: (err: unknown) =>
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Pipeline error'),
      complete: () => logger.info('Pipeline completed'),
    });
  logger.info('Copy trading pipeline started');

  let app: FastifyInstance | null = null;
  if (config.API_ENABLED) {
    app = await createServer(session);
    await startServer(app, config.PORT);
  }

  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    shutdown$.next();
    shutdown$.complete();
    pipelineSubscription?.unsubscribe();

    if (app) {
      await stopServer(app);
    }
    if (journal) {
      await journal.flush();
    }

    printPortfolioSummary(session);
    printRecentTrades(session, config.RECENT_TRADES_COUNT);

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    gracefulShutdown(signal).catch((error: unknown) => {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

bootstrap().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start application');
  process.exit(1);
});
