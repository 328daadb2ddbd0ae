/**
 * Song Repository Implementation
 *
 * Kysely-based implementation for the songs and song_events tables.
 */

import { sql, type Selectable } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidInputError,
  createSlugConflictError,
  createStoreUnavailableError,
  type SongError,
} from '../../core/errors.js';

import type { SongRepository } from '../../core/ports.js';
import type {
  NewSong,
  NewSongEvent,
  Song,
  SongCounter,
  SongEvent,
  SongEventType,
} from '../../core/types.js';
import type { SongsDbClient } from '@/infra/database/client.js';
import type { SongEvents, Songs } from '@/infra/database/songs/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SongRepoOptions {
  db: SongsDbClient;
  logger: Logger;
}

const COUNTER_COLUMNS = {
  downloads: 'download_count',
  views: 'view_count',
} as const satisfies Record<SongCounter, keyof Songs>;

/** PostgreSQL unique_violation */
const UNIQUE_VIOLATION = '23505';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;

const counterUpdate = (counter: SongCounter, delta: number) =>
  counter === 'downloads'
    ? { download_count: sql<number>`download_count + ${delta}`, updated_at: sql<Date>`NOW()` }
    : { view_count: sql<number>`view_count + ${delta}`, updated_at: sql<Date>`NOW()` };

const mapSongRow = (row: Selectable<Songs>): Song => ({
  id: row.id,
  slug: row.slug,
  title: row.title,
  artist: row.artist,
  description: row.description,
  storedLocation: row.stored_location,
  originalFilename: row.original_filename,
  mimeType: row.mime_type,
  sizeBytes: Number(row.size_bytes),
  downloadCount: row.download_count,
  viewCount: row.view_count,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

const mapEventRow = (row: Selectable<SongEvents>): SongEvent => ({
  id: row.id,
  slug: row.slug,
  eventType: row.event_type,
  songTitle: row.song_title,
  userAgent: row.user_agent,
  ipAddress: row.ip_address,
  referer: row.referer,
  occurredAt: new Date(row.occurred_at),
});

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kysely-based Song Repository.
 */
class KyselySongRepo implements SongRepository {
  private readonly db: SongsDbClient;
  private readonly log: Logger;

  constructor(options: SongRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'SongRepo' });
  }

  async insert(song: NewSong): Promise<Result<Song, SongError>> {
    this.log.debug({ slug: song.slug }, 'Inserting song');

    try {
      const row = await this.db
        .insertInto('songs')
        .values({
          slug: song.slug,
          title: song.title,
          artist: song.artist,
          description: song.description,
          stored_location: song.storedLocation,
          original_filename: song.originalFilename,
          mime_type: song.mimeType,
          size_bytes: song.sizeBytes,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return ok(mapSongRow(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.log.debug({ slug: song.slug }, 'Slug already taken');
        return err(createSlugConflictError(song.slug));
      }
      this.log.error({ err: error, slug: song.slug }, 'Failed to insert song');
      return err(createStoreUnavailableError('Failed to insert song', error));
    }
  }

  async existsBySlug(slug: string): Promise<Result<boolean, SongError>> {
    try {
      const row = await this.db
        .selectFrom('songs')
        .select('id')
        .where('slug', '=', slug)
        .executeTakeFirst();

      return ok(row !== undefined);
    } catch (error) {
      this.log.error({ err: error, slug }, 'Failed to check slug');
      return err(createStoreUnavailableError('Failed to check slug', error));
    }
  }

  async findBySlug(slug: string): Promise<Result<Song | null, SongError>> {
    this.log.debug({ slug }, 'Finding song by slug');

    try {
      const row = await this.db
        .selectFrom('songs')
        .selectAll()
        .where('slug', '=', slug)
        .executeTakeFirst();

      return ok(row !== undefined ? mapSongRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, slug }, 'Failed to find song by slug');
      return err(createStoreUnavailableError('Failed to find song by slug', error));
    }
  }

  async listRecent(limit: number): Promise<Result<Song[], SongError>> {
    try {
      const rows = await this.db
        .selectFrom('songs')
        .selectAll()
        .orderBy('created_at', 'desc')
        .orderBy('id', 'desc')
        .limit(limit)
        .execute();

      return ok(rows.map(mapSongRow));
    } catch (error) {
      this.log.error({ err: error, limit }, 'Failed to list recent songs');
      return err(createStoreUnavailableError('Failed to list recent songs', error));
    }
  }

  async incrementCounter(
    slug: string,
    counter: SongCounter,
    delta: number
  ): Promise<Result<boolean, SongError>> {
    if (!Number.isInteger(delta) || delta <= 0) {
      return err(createInvalidInputError('delta', 'Counter delta must be a positive integer'));
    }

    try {
      // Single UPDATE so concurrent increments never lose a count
      const result = await this.db
        .updateTable('songs')
        .set(counterUpdate(counter, delta))
        .where('slug', '=', slug)
        .executeTakeFirst();

      return ok(result.numUpdatedRows > 0n);
    } catch (error) {
      this.log.error({ err: error, slug, counter }, 'Failed to increment counter');
      return err(createStoreUnavailableError('Failed to increment counter', error));
    }
  }

  async insertEvent(event: NewSongEvent): Promise<Result<SongEvent, SongError>> {
    try {
      const row = await this.db
        .insertInto('song_events')
        .values({
          slug: event.slug,
          event_type: event.eventType,
          song_title: event.songTitle,
          user_agent: event.userAgent,
          ip_address: event.ipAddress,
          referer: event.referer,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return ok(mapEventRow(row));
    } catch (error) {
      this.log.error({ err: error, slug: event.slug }, 'Failed to insert song event');
      return err(createStoreUnavailableError('Failed to insert song event', error));
    }
  }

  async aggregateSum(counter: SongCounter): Promise<Result<number, SongError>> {
    const column = COUNTER_COLUMNS[counter];

    try {
      const row = await this.db
        .selectFrom('songs')
        .select(sql<string>`COALESCE(SUM(${sql.ref(column)}), 0)`.as('total'))
        .executeTakeFirst();

      // SUM over INTEGER is BIGINT, which pg returns as a string
      return ok(row !== undefined ? Number.parseInt(String(row.total), 10) : 0);
    } catch (error) {
      this.log.error({ err: error, counter }, 'Failed to sum counter');
      return err(createStoreUnavailableError('Failed to sum counter', error));
    }
  }

  async count(): Promise<Result<number, SongError>> {
    try {
      const row = await this.db
        .selectFrom('songs')
        .select(sql<string>`count(*)`.as('count'))
        .executeTakeFirst();

      return ok(row !== undefined ? Number.parseInt(String(row.count), 10) : 0);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to count songs');
      return err(createStoreUnavailableError('Failed to count songs', error));
    }
  }

  async listTopByCounter(counter: SongCounter, limit: number): Promise<Result<Song[], SongError>> {
    const column = COUNTER_COLUMNS[counter];

    try {
      const rows = await this.db
        .selectFrom('songs')
        .selectAll()
        .orderBy(column, 'desc')
        .orderBy('id', 'asc')
        .limit(limit)
        .execute();

      return ok(rows.map(mapSongRow));
    } catch (error) {
      this.log.error({ err: error, counter, limit }, 'Failed to list top songs');
      return err(createStoreUnavailableError('Failed to list top songs', error));
    }
  }

  async listRecentEvents(
    eventType: SongEventType,
    limit: number
  ): Promise<Result<SongEvent[], SongError>> {
    try {
      const rows = await this.db
        .selectFrom('song_events')
        .selectAll()
        .where('event_type', '=', eventType)
        .orderBy('occurred_at', 'desc')
        .orderBy('id', 'desc')
        .limit(limit)
        .execute();

      return ok(rows.map(mapEventRow));
    } catch (error) {
      this.log.error({ err: error, eventType, limit }, 'Failed to list recent events');
      return err(createStoreUnavailableError('Failed to list recent events', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Unavailable Store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Stand-in used when no database is configured.
 * Every operation fails with StoreUnavailableError.
 */
export const makeUnavailableSongRepo = (
  message = 'Database not configured'
): SongRepository => {
  const unavailable = <T>(): Promise<Result<T, SongError>> =>
    Promise.resolve<Result<T, SongError>>(
      err({ ...createStoreUnavailableError(message), retryable: false })
    );

  return {
    insert: () => unavailable(),
    existsBySlug: () => unavailable(),
    findBySlug: () => unavailable(),
    listRecent: () => unavailable(),
    incrementCounter: () => unavailable(),
    insertEvent: () => unavailable(),
    aggregateSum: () => unavailable(),
    count: () => unavailable(),
    listTopByCounter: () => unavailable(),
    listRecentEvents: () => unavailable(),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeSongRepo = (options: SongRepoOptions): SongRepository => {
  return new KyselySongRepo(options);
};
