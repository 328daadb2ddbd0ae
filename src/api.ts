/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { createLogger, PRETTY_TRANSPORT } from './infra/logger/index.js';
import {
  makeDbHealthChecker,
  makeStorageHealthChecker,
  makeUnconfiguredHealthChecker,
} from './modules/health/index.js';
import {
  makeEventRecorder,
  makeLocalBlobStorage,
  makeSongRepo,
  makeUnavailableSongRepo,
} from './modules/songs/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'songshare-server',
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, songs: config.songs } }, 'Starting API server');

  // Initialize dependencies
  const db = initDatabase(config);
  if (db === undefined) {
    logger.warn('DATABASE_URL not configured - song store unavailable');
  }

  const songRepo = db !== undefined ? makeSongRepo({ db, logger }) : makeUnavailableSongRepo();
  const blobStorage = await makeLocalBlobStorage({
    rootDir: config.storage.uploadDir,
    logger,
  });
  const eventRecorder = makeEventRecorder({ songRepo, logger });

  const healthCheckers = [
    db !== undefined
      ? makeDbHealthChecker(db, { name: 'database' })
      : makeUnconfiguredHealthChecker('database', 'Database not configured'),
    makeStorageHealthChecker(config.storage.uploadDir, { name: 'uploads' }),
  ];

  // Fastify creates its own request logger from the same settings
  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: PRETTY_TRANSPORT }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      logger,
      songRepo,
      blobStorage,
      eventRecorder,
      healthCheckers,
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      // Flushes pending event recordings (onClose hook) before the pool goes away
      await app.close();
      await db?.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
