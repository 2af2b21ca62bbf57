import type { FastifyInstance } from 'fastify';
import { register, Gauge, collectDefaultMetrics } from 'prom-client';

import type { PaperTradingSession } from '../../state/paper-trading-session.js';

collectDefaultMetrics({ register });

let observed: PaperTradingSession | null = null;

new Gauge({
  name: 'paper_trade_count',
  help: 'Trades committed by the paper session',
  collect() {
    this.set(observed?.getTotalTrades() ?? 0);
  },
});

new Gauge({
  name: 'paper_open_positions',
  help: 'Positions with non-zero size',
  collect() {
    this.set(observed?.getPositions().filter(p => !p.size.isZero()).length ?? 0);
  },
});

new Gauge({
  name: 'paper_realized_pnl_usd',
  help: 'Cumulative realized PnL of the paper session',
  collect() {
    this.set(observed?.getTotalRealizedPnl().toNumber() ?? 0);
  },
});

new Gauge({
  name: 'paper_exposure_usd',
  help: 'Notional of open positions at last price',
  collect() {
    this.set(observed?.getCurrentExposure().toNumber() ?? 0);
  },
});

export interface MetricsRouteOptions {
  session: PaperTradingSession;
}

export async function metricsRoute(
  fastify: FastifyInstance,
  options: MetricsRouteOptions
): Promise<void> {
  observed = options.session;

  fastify.get('/metrics', async (_request, reply) => {
    const metrics = await register.metrics();
    return reply
      .header('Content-Type', register.contentType)
      .send(metrics);
  });
}
