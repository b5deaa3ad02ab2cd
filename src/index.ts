import { loadConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';
import { createDatabaseClient } from './db/client.js';
import { ensureSchema } from './db/bootstrap.js';
import { DrizzleThreatStore } from './core/store/ThreatStore.js';
import { ThreatService } from './services/ThreatService.js';
import { createServer } from './api/server.js';

async function main(): Promise<void> {
  // Load configuration
  const config = loadConfig();
  const isDev = config.NODE_ENV === 'development';
  const logger = createLogger(config.LOG_LEVEL, isDev);

  logger.info({ env: config.NODE_ENV }, 'Starting IOC registry...');

  const database = createDatabaseClient(config.DATABASE_URL, {
    poolMax: config.DATABASE_POOL_MAX,
    connectTimeout: config.DATABASE_CONNECT_TIMEOUT,
  });
  await ensureSchema(database.db);
  logger.info({ engine: database.engine }, 'Threat store ready');

  const threatService = new ThreatService(new DrizzleThreatStore(database.db), logger);

  const apiServer = await createServer(
    { isDev, corsOrigins: config.CORS_ALLOWED_ORIGINS },
    { threatService, logger },
  );

  await apiServer.listen({ port: config.PORT, host: config.HOST });
  logger.info({ port: config.PORT, host: config.HOST }, 'IOC registry API server started');

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down gracefully...');

    try {
      await apiServer.close();
      logger.info('API server closed');
    } catch (err) {
      logger.error({ err }, 'Error closing API server');
    }

    try {
      await database.close();
      logger.info('Database disconnected');
    } catch (err) {
      logger.error({ err }, 'Error disconnecting database');
    }

    logger.info('IOC registry shut down successfully');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });
}

main().catch((err) => {
  process.stderr.write(`Fatal startup error: ${String(err)}\n`);
  process.exit(1);
});
