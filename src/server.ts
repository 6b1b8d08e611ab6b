// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
if (process.env.NODE_ENV !== 'production') {
  dotenv.config({ path: '.env.local' });
  dotenv.config();
}

import { createServer } from 'http';
import { loadConfig } from './config/env';
import { createSessionSetup } from './config/session';
import { createDataStore } from './store';
import { createServices, seedDemoData } from './services';
import { createApp } from './app';
import { logger } from './utils/logger';

const start = async (): Promise<void> => {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const store = createDataStore(config);
  const services = createServices(store, {
    saltRounds: config.saltRounds,
    session: { secure: config.isProduction },
  });

  if (config.seedDemo) {
    await seedDemoData(store, services.passwords);
  }

  const sessionSetup = createSessionSetup(config);
  await sessionSetup.ready();

  const app = createApp(services, {
    sessionMiddleware: sessionSetup.sessionMiddleware,
    isProduction: config.isProduction,
    frontendUrl: config.frontendUrl,
  });
  const server = createServer(app);

  server.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/health`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      sessionSetup
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close session store', {
            error: error instanceof Error ? error.message : 'Unknown error',
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

start().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : 'Unknown error',
  });
  process.exit(1);
});
