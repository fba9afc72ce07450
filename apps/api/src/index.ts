/**
 * API Server Entry Point
 *
 * Opens the SQLite database, builds the sync services and serves the
 * gateway until SIGINT or SIGTERM.
 */

import { closeDatabase, checkDatabaseHealth, createGatewayServices, openDatabase } from '@adsync/core';
import { logger as bootLogger } from '@adsync/utils';
import { createServer } from './server.js';
import { ConfigError, loadConfig, loadEnvFile } from './config/index.js';
import { createApiLogger } from './lib/logger.js';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const logger = createApiLogger(config);

  const db = openDatabase(config.databasePath);
  const services = createGatewayServices(db, { logger });
  const server = await createServer({
    config,
    services,
    logger,
    checkDatabase: () => checkDatabaseHealth(db),
  });

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.once(signal, () => {
      logger.info({ signal }, 'Received shutdown signal');

      server.close().then(
        () => {
          closeDatabase(db);
          logger.info('Server closed gracefully');
          process.exit(0);
        },
        (err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  // Start server
  await server.listen({
    host: config.host,
    port: config.port,
  });

  logger.info({
    port: config.port,
    env: config.nodeEnv,
    database: config.databasePath,
  }, 'API server started');
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    bootLogger.fatal({ issues: err.issues }, 'Invalid environment configuration');
  } else {
    bootLogger.fatal({ err }, 'Failed to start server');
  }
  process.exit(1);
});
