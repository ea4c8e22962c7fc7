import Fastify from 'fastify';
import marketRoutes, { type MarketRoutesOptions } from './marketRoutes.js';
import { errorHandler } from './errors.js';

export interface ServerOptions extends MarketRoutesOptions {
  logRequests?: boolean;
}

export async function createServer(opts: ServerOptions) {
  const app = Fastify({
    logger: opts.logRequests ? { level: process.env.LOG_LEVEL ?? 'info' } : false,
  });

  app.setErrorHandler(errorHandler);

  // Health check
  app.get('/health', async () => ({
    ok: true,
    session: opts.session.running ? 'running' : 'stopped',
    instruments: opts.index.size,
    symbols: opts.session.ticks.size,
  }));

  await app.register(marketRoutes, {
    session: opts.session,
    index: opts.index,
    timeZone: opts.timeZone,
  });

  return app;
}
