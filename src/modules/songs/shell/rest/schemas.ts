/**
 * Songs Module REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 * Response schemas double as serializers: fields missing here are not sent.
 */

import { Type, type Static } from '@sinclair/typebox';

import { MAX_LIST_LIMIT } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Slug path params. Malformed slugs are answered with 404 by the use cases,
 * so no pattern is enforced here.
 */
export const SongParamsSchema = Type.Object(
  {
    slug: Type.String({ description: 'Share identifier returned by the upload' }),
  },
  { additionalProperties: false }
);

export type SongParams = Static<typeof SongParamsSchema>;

export const LimitQuerySchema = Type.Object(
  {
    limit: Type.Optional(
      Type.Integer({
        minimum: 1,
        maximum: MAX_LIST_LIMIT,
        description: 'Maximum number of entries per list',
      })
    ),
  },
  { additionalProperties: false }
);

export type LimitQuery = Static<typeof LimitQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const NullableString = Type.Union([Type.String(), Type.Null()]);

export const PublicSongSchema = Type.Object({
  slug: Type.String(),
  title: Type.String(),
  artist: Type.String(),
  description: NullableString,
  mimeType: Type.String(),
  sizeBytes: Type.Integer({ minimum: 0 }),
  originalFilename: Type.String(),
  downloadCount: Type.Integer({ minimum: 0 }),
  viewCount: Type.Integer({ minimum: 0 }),
  downloadUrl: Type.String(),
  metaUrl: Type.String(),
  createdAt: Type.String({ format: 'date-time' }),
});

export const UploadSongResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    id: Type.String(),
    slug: Type.String(),
    downloadUrl: Type.String(),
    metaUrl: Type.String(),
  }),
});

export const GetSongResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: PublicSongSchema,
});

export const ListSongsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    songs: Type.Array(PublicSongSchema),
  }),
});

export const AnalyticsOverviewResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    totalSongs: Type.Integer({ minimum: 0 }),
    totalDownloads: Type.Integer({ minimum: 0 }),
    totalViews: Type.Integer({ minimum: 0 }),
    topSongs: Type.Array(
      Type.Object({
        slug: Type.String(),
        title: Type.String(),
        artist: Type.String(),
        downloadCount: Type.Integer({ minimum: 0 }),
        viewCount: Type.Integer({ minimum: 0 }),
      })
    ),
    recentDownloads: Type.Array(
      Type.Object({
        slug: Type.String(),
        eventType: Type.Union([Type.Literal('view'), Type.Literal('download')]),
        songTitle: NullableString,
        userAgent: NullableString,
        ipAddress: NullableString,
        referer: NullableString,
        occurredAt: Type.String({ format: 'date-time' }),
      })
    ),
  }),
});

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});
