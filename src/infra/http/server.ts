import dotenv from 'dotenv';
import type { Server } from 'node:http';
import type { Logger } from 'pino';
import { loadConfig, type Config } from '../config.js';
import { createLogger } from '../logger.js';
import { InMemoryUserRepo } from '../db/userRepo.js';
import { UserQueries } from '../../application/users/queries.js';
import { createApp } from './app.js';

dotenv.config();

function bootstrap(): Server | null {
  let config: Config;
  let logger: Logger;
  try {
    config = loadConfig();
    logger = createLogger({ logDir: config.logDir, level: config.logLevel });
  } catch (err) {
    // No logger yet (or no sink for it): report on stderr and serve nothing.
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
    return null;
  }

  const app = createApp({
    queries: new UserQueries(new InMemoryUserRepo()),
    logger,
    requestTimeoutMs: config.requestTimeoutMs,
    trustProxy: config.trustProxy,
  });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, 'server listening');
  });

  server.on('error', (err) => {
    logger.fatal({ err }, 'http listener failed');
    process.exitCode = 1;
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'error while closing listener');
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}

export const server = bootstrap();
