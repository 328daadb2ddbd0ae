/**
 * Songs Module REST Routes
 *
 * - POST /api/songs/upload: Upload an audio file with metadata (multipart)
 * - GET /api/songs: Newest songs
 * - GET /api/songs/:slug: Song metadata (counts a view)
 * - GET /api/songs/:slug/download: Song file (counts a download)
 * - GET /api/analytics/overview: Totals, top songs and recent downloads
 */

import { buildContentDisposition } from './content-disposition.js';
import {
  AnalyticsOverviewResponseSchema,
  ErrorResponseSchema,
  GetSongResponseSchema,
  LimitQuerySchema,
  ListSongsResponseSchema,
  SongParamsSchema,
  UploadSongResponseSchema,
  type LimitQuery,
  type SongParams,
} from './schemas.js';
import {
  createInvalidInputError,
  getHttpStatusForError,
  toPublicError,
  type SongError,
} from '../../core/errors.js';
import { downloadSong } from '../../core/usecases/download-song.js';
import { getAnalyticsOverview } from '../../core/usecases/get-analytics-overview.js';
import { getSong } from '../../core/usecases/get-song.js';
import { listRecentSongs } from '../../core/usecases/list-recent-songs.js';
import { publishSong, type SongFields } from '../../core/usecases/publish-song.js';
import { stageUpload, type StagedUpload } from '../../core/usecases/stage-upload.js';

import type { BlobStorage, EventRecorder, SongRepository } from '../../core/ports.js';
import type { RandomSource, RequestContext, SongsConfig } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for song routes.
 */
export interface MakeSongRoutesDeps {
  songRepo: SongRepository;
  blobStorage: BlobStorage;
  random: RandomSource;
  eventRecorder: EventRecorder;
  config: SongsConfig;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: SongError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    ...toPublicError(error),
  });
}

const headerOrNull = (value: string | undefined): string | null =>
  value !== undefined && value !== '' ? value : null;

const toRequestContext = (request: FastifyRequest): RequestContext => ({
  userAgent: headerOrNull(request.headers['user-agent']),
  ipAddress: headerOrNull(request.ip),
  referer: headerOrNull(request.headers.referer),
});

const assignField = (fields: SongFields, name: string, value: unknown): void => {
  if (typeof value !== 'string') {
    return;
  }
  switch (name) {
    case 'title':
      fields.title = value;
      break;
    case 'artist':
      fields.artist = value;
      break;
    case 'description':
      fields.description = value;
      break;
    default:
      // Unknown fields are ignored
      break;
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates song REST routes.
 * Expects @fastify/multipart to be registered on the parent instance.
 */
export const makeSongRoutes = (deps: MakeSongRoutesDeps): FastifyPluginAsync => {
  const { songRepo, blobStorage, random, eventRecorder, config, logger } = deps;
  const log = logger.child({ routes: 'songs' });

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/songs/upload - Upload a song
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      '/api/songs/upload',
      {
        schema: {
          response: {
            201: UploadSongResponseSchema,
            400: ErrorResponseSchema,
            413: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!request.isMultipart()) {
          return sendError(
            reply,
            createInvalidInputError('file', 'Expected a multipart/form-data request')
          );
        }

        const fields: SongFields = {};
        let staged: StagedUpload | undefined;
        let failure: SongError | undefined;

        // Fields may arrive before or after the file
        try {
          for await (const part of request.parts()) {
            if (part.type === 'field') {
              assignField(fields, part.fieldname, part.value);
              continue;
            }

            if (part.fieldname !== 'file' || staged !== undefined || failure !== undefined) {
              part.file.resume();
              continue;
            }

            const stageResult = await stageUpload(
              { blobStorage, maxUploadBytes: config.maxUploadBytes },
              { filename: part.filename, mimeType: part.mimetype, stream: part.file }
            );
            if (stageResult.isErr()) {
              failure = stageResult.error;
            } else {
              staged = stageResult.value;
            }
          }
        } catch (error) {
          if (staged !== undefined) {
            const removeResult = await blobStorage.remove(staged.location);
            if (removeResult.isErr()) {
              log.error({ err: removeResult.error }, 'Failed to remove staged upload');
            }
          }
          throw error;
        }

        if (failure !== undefined) {
          return sendError(reply, failure);
        }

        if (staged === undefined) {
          return sendError(reply, createInvalidInputError('file', "Field 'file' is required"));
        }

        const result = await publishSong(
          { songRepo, blobStorage, random, config, logger: log },
          { fields, staged }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const { song, urls } = result.value;
        return reply.status(201).send({
          ok: true,
          data: {
            id: song.id,
            slug: song.slug,
            downloadUrl: urls.downloadUrl,
            metaUrl: urls.metaUrl,
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/songs - Newest songs
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: LimitQuery }>(
      '/api/songs',
      {
        schema: {
          querystring: LimitQuerySchema,
          response: {
            200: ListSongsResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await listRecentSongs({ songRepo, config }, { limit: request.query.limit });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { songs: result.value } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/songs/:slug - Song metadata
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: SongParams }>(
      '/api/songs/:slug',
      {
        // HEAD would count a view or download without anything being fetched
        exposeHeadRoute: false,
        schema: {
          params: SongParamsSchema,
          response: {
            200: GetSongResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getSong(
          { songRepo, eventRecorder, config },
          { slug: request.params.slug, context: toRequestContext(request) }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/songs/:slug/download - Song file
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: SongParams }>(
      '/api/songs/:slug/download',
      {
        // HEAD would count a view or download without anything being fetched
        exposeHeadRoute: false,
        schema: {
          params: SongParamsSchema,
          response: {
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await downloadSong(
          { songRepo, blobStorage, eventRecorder, logger: log },
          { slug: request.params.slug, context: toRequestContext(request) }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const download = result.value;
        return reply
          .status(200)
          .header('content-type', download.mimeType)
          .header('content-length', String(download.sizeBytes))
          .header('content-disposition', buildContentDisposition(download.filename))
          .send(download.stream);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/analytics/overview - Analytics overview
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: LimitQuery }>(
      '/api/analytics/overview',
      {
        schema: {
          querystring: LimitQuerySchema,
          response: {
            200: AnalyticsOverviewResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getAnalyticsOverview({ songRepo }, { limit: request.query.limit });

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
