// src/index.ts
import 'dotenv/config';
import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';
import { loadSymbolIndex } from './core/instruments/masterFile.js';
import { createFyersSession } from './brokers/fyers/session.js';
import { createServer } from './api/server.js';
import { closeAgents } from './infra/http/agent.js';

process.on('unhandledRejection', (err) => {
  logger.error({ err }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Uncaught exception');
  process.exit(1);
});

(async () => {
  logger.info({ underlyings: cfg.instruments.underlyings }, 'Booting application');

  // a partial index is useless; any parse error aborts startup
  const index = await loadSymbolIndex(cfg.instruments.source, {
    underlyings: cfg.instruments.underlyings,
    timeZone: cfg.instruments.timeZone,
  });

  const session = createFyersSession(cfg, index);
  session.start();

  const app = await createServer({
    session,
    index,
    timeZone: cfg.instruments.timeZone,
    logRequests: true,
  });
  await app.listen({ host: cfg.host, port: cfg.port });
  logger.info({ host: cfg.host, port: cfg.port }, 'Feed service listening');

  // Graceful shutdown hooks
  const shutdown = async (sig: string) => {
    try {
      logger.info({ sig }, 'Shutting down gracefully');
      await app.close();
      await session.stop();
      await closeAgents();
      process.exit(0);
    } catch (e) {
      logger.error({ e }, 'Error during shutdown');
      process.exit(1);
    }
  };

  (['SIGINT', 'SIGTERM'] as const).forEach((sig) => {
    process.on(sig, () => void shutdown(sig));
  });
})().catch((err) => {
  logger.error({ err }, 'Startup failed');
  process.exit(1);
});
