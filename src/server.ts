import 'reflect-metadata';
import type { Server } from 'node:http';

import { app } from './app';
import { env } from './config/env';
import { plannerContainer } from './container';
import { describeError, logger } from './core/shared/logger';
import { AppDataSource } from './database/data-source';

const bootstrap = async (): Promise<void> => {
  if (env.STORAGE_DRIVER === 'postgres') {
    await AppDataSource.initialize();
    logger.info('database_connected', {
      host: env.DB_HOST,
      database: env.DB_NAME,
    });
  }

  await plannerContainer.warmUp();

  const server: Server = app.listen(env.PORT, () => {
    logger.info('server_started', {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      storageDriver: env.STORAGE_DRIVER,
      generationProvider: plannerContainer.config.provider?.kind ?? 'offline',
    });
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('shutdown_signal_received', { signal });

    server.close((error) => {
      if (error) {
        logger.error('shutdown_failed', { signal, error: error.message });
        process.exit(1);
        return;
      }

      const closeDatabase = AppDataSource.isInitialized ? AppDataSource.destroy() : Promise.resolve();

      closeDatabase
        .then(() => {
          logger.info('shutdown_complete', { signal });
          process.exit(0);
        })
        .catch((closeError: unknown) => {
          logger.error('shutdown_failed', { signal, error: describeError(closeError) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

void bootstrap().catch((error: unknown) => {
  logger.error('bootstrap_failed', { error: describeError(error) });
  process.exit(1);
});
