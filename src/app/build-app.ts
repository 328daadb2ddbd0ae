/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import multipart from '@fastify/multipart';
import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import {
  cryptoRandomSource,
  makeEventRecorder,
  makeSongRoutes,
  type BlobStorage,
  type EventRecorder,
  type RandomSource,
  type SongRepository,
  type SongsConfig,
} from '../modules/songs/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

/** Form fields besides the file: title, artist, description */
const MAX_MULTIPART_FIELDS = 10;
const MAX_MULTIPART_FIELD_BYTES = 64 * 1024;

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Logger for repositories and background work (Fastify keeps its own request logger) */
  logger: Logger;
  songRepo: SongRepository;
  blobStorage: BlobStorage;
  /** Defaults to the crypto-backed source */
  random?: RandomSource;
  /** Defaults to a background recorder over `songRepo` */
  eventRecorder?: EventRecorder;
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Songs module configuration derived from the application config
 */
export const toSongsConfig = (config: AppConfig): SongsConfig => ({
  publicBaseUrl: config.songs.publicBaseUrl,
  slugStrategy: config.songs.slugStrategy,
  slugMaxAttempts: config.songs.slugMaxAttempts,
  maxUploadBytes: config.storage.maxUploadBytes,
});

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;
  const { config, logger, songRepo, blobStorage } = deps;

  if (
    config === undefined ||
    logger === undefined ||
    songRepo === undefined ||
    blobStorage === undefined
  ) {
    throw new Error('Missing required dependencies: config, logger, songRepo, blobStorage');
  }

  const songsConfig = toSongsConfig(config);
  const random = deps.random ?? cryptoRandomSource;
  const eventRecorder = deps.eventRecorder ?? makeEventRecorder({ songRepo, logger });

  const app = fastifyLib({
    trustProxy: config.server.trustProxy,
    ...fastifyOptions,
  });

  await registerSecurityHeaders(app, config);
  await registerCors(app, config);

  // One slack byte so an upload of exactly the cap is told apart from a larger one
  await app.register(multipart, {
    throwFileSizeLimit: false,
    limits: {
      fileSize: songsConfig.maxUploadBytes + 1,
      files: 1,
      fields: MAX_MULTIPART_FIELDS,
      fieldSize: MAX_MULTIPART_FIELD_BYTES,
    },
  });

  // Pending view/download recordings finish before the app reports closed
  app.addHook('onClose', async () => {
    await eventRecorder.flush();
  });

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(
    makeSongRoutes({
      songRepo,
      blobStorage,
      random,
      eventRecorder,
      config: songsConfig,
      logger,
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Known HTTP errors (multipart limits, malformed bodies, ...)
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
