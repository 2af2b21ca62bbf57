import fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import type { PaperTradingSession } from '../state/paper-trading-session.js';
import { logger } from '../utils/logger.js';

import { healthRoutes } from './routes/health.js';
import { metricsRoute } from './routes/metrics.js';
import { portfolioRoutes, tradesRoutes } from './routes/v1/index.js';

export async function createServer(session: PaperTradingSession): Promise<FastifyInstance> {
  const app = fastify({
    logger: false,
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET'],
  });

  app.addHook('onRequest', async request => {
    logger.debug({ method: request.method, url: request.url }, 'Incoming request');
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  app.setErrorHandler((error, _request, reply) => {
    logger.error({ error: error.message, stack: error.stack }, 'Request error');

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: statusCode >= 500 ? 'Internal server error' : error.message,
    });
  });

  await app.register(healthRoutes);
  await app.register(metricsRoute, { session });

  await app.register(
    async function v1Routes(instance) {
      await instance.register(portfolioRoutes, { session });
      await instance.register(tradesRoutes, { session });
    },
    { prefix: '/v1' }
  );

  app.get('/', async () => {
    return {
      name: 'Paper Copy Trader API',
      version: '1.0.0',
    };
  });

  return app;
}

export async function startServer(app: FastifyInstance, port: number): Promise<void> {
  try {
    await app.listen({ port, host: '0.0.0.0' });
    logger.info({ port }, 'Server started');
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    throw error;
  }
}

export async function stopServer(app: FastifyInstance): Promise<void> {
  await app.close();
  logger.info('Server stopped');
}
