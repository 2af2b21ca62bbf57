import type { FastifyInstance } from 'fastify';

import type { PaperTradingSession } from '../../../state/paper-trading-session.js';
import { serializePosition, serializeSummary } from '../../serializers.js';

export interface SessionRouteOptions {
  session: PaperTradingSession;
}

export async function portfolioRoutes(
  fastify: FastifyInstance,
  options: SessionRouteOptions
): Promise<void> {
  const { session } = options;

  /**
   * GET /v1/portfolio
   * Session totals, capital usage and every open position
   */
  fastify.get('/portfolio', async () => {
    return serializeSummary(session.getPortfolioSummary());
  });

  /**
   * GET /v1/positions/:coin
   * Ledger entry for one coin, including flat positions that have traded
   */
  fastify.get<{ Params: { coin: string } }>('/positions/:coin', async (request, reply) => {
    const position = session.getPosition(request.params.coin);
    if (!position) {
      return reply.status(404).send({ error: `No position for ${request.params.coin}` });
    }
    return serializePosition(position);
  });
}
