import type { FastifyInstance } from 'fastify';

import { serializeTrade } from '../../serializers.js';

import type { SessionRouteOptions } from './portfolio.js';

export async function tradesRoutes(
  fastify: FastifyInstance,
  options: SessionRouteOptions
): Promise<void> {
  fastify.get<{ Querystring: { limit?: string } }>('/trades/recent', async (request) => {
    const limitNum = Math.min(Math.max(parseInt(request.query.limit || '20') || 20, 1), 100);
    const trades = options.session.getRecentTrades(limitNum);

    return {
      trades: trades.map(serializeTrade),
      count: trades.length,
      total: options.session.getTotalTrades(),
    };
  });
}
