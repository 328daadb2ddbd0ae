/**
 * Test fakes and mocks
 */

import { Readable } from 'node:stream';

import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
} from 'kysely';
import { ok, err, type Result } from 'neverthrow';
import pinoLib, { type Logger } from 'pino';

import {
  createFileTooLargeError,
  type BlobStorageError,
  type FileTooLargeError,
  type SongError,
} from '@/modules/songs/core/errors.js';
import type {
  BlobReadHandle,
  BlobStorage,
  EventRecorder,
  RecordEventInput,
  SongRepository,
  StoreBlobOptions,
  StoredBlob,
} from '@/modules/songs/core/ports.js';
import type {
  NewSong,
  NewSongEvent,
  RandomSource,
  Song,
  SongCounter,
  SongEvent,
  SongEventType,
} from '@/modules/songs/core/types.js';

// =============================================================================
// Logger
// =============================================================================

export const makeTestLogger = (): Logger => pinoLib({ level: 'silent' });

// =============================================================================
// Kysely Fakes
// =============================================================================

export interface FakeQueryResponse {
  rows?: Record<string, unknown>[];
  numAffectedRows?: bigint;
}

interface FakeKyselyDbOptions {
  /** Every query fails with this value */
  failWithError?: unknown;
  /** Every query is delayed by this many ms */
  delayMs?: number;
  /** Rows returned for a query (default: no rows) */
  respond?: (query: CompiledQuery) => FakeQueryResponse;
}

class RecordingConnection implements DatabaseConnection {
  readonly queries: CompiledQuery[] = [];

  constructor(private readonly options: FakeKyselyDbOptions) {}

  async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
    this.queries.push(compiledQuery);
    const { failWithError, delayMs = 0, respond } = this.options;

    if (delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
    if (failWithError !== undefined) {
      throw failWithError;
    }

    const response = respond?.(compiledQuery) ?? {};
    return {
      // The fake answers for whatever row shape the query expects
      rows: (response.rows ?? []) as R[],
      ...(response.numAffectedRows !== undefined && { numAffectedRows: response.numAffectedRows }),
    };
  }

  streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
    throw new Error('Streaming is not supported by the fake connection');
  }
}

class RecordingDriver implements Driver {
  constructor(private readonly connection: RecordingConnection) {}

  async init(): Promise<void> {
    // nothing to set up
  }

  async acquireConnection(): Promise<DatabaseConnection> {
    return this.connection;
  }

  async beginTransaction(): Promise<void> {
    // transactions are not modelled
  }

  async commitTransaction(): Promise<void> {
    // transactions are not modelled
  }

  async rollbackTransaction(): Promise<void> {
    // transactions are not modelled
  }

  async releaseConnection(): Promise<void> {
    // single shared connection
  }

  async destroy(): Promise<void> {
    // nothing to tear down
  }
}

/**
 * Real Kysely instance over a driver that records compiled queries instead
 * of talking to PostgreSQL.
 */
export const makeRecordingKysely = <T>(
  options: FakeKyselyDbOptions = {}
): { db: Kysely<T>; queries: CompiledQuery[] } => {
  const connection = new RecordingConnection(options);
  const driver = new RecordingDriver(connection);

  const db = new Kysely<T>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => driver,
      createIntrospector: (instance) => new PostgresIntrospector(instance),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

  return { db, queries: connection.queries };
};

/**
 * Kysely client for the database health checker tests.
 */
export const makeFakeKyselyDb = <T>(options: FakeKyselyDbOptions = {}): Kysely<T> => {
  return makeRecordingKysely<T>({
    respond: () => ({ rows: [{ '?column?': 1 }] }),
    ...options,
  }).db;
};

// =============================================================================
// Song Repository Fake
// =============================================================================

type SongRepoOperation = keyof SongRepository;

interface FakeSongRepoOptions {
  /** Initial songs to seed the store with */
  songs?: Song[];
  /** Initial events to seed the log with */
  events?: SongEvent[];
  /** Every operation fails with StoreUnavailableError */
  simulateDbError?: boolean;
  /** Only these operations fail with StoreUnavailableError */
  failingOperations?: SongRepoOperation[];
  /** These operations reject instead of returning a Result */
  throwingOperations?: SongRepoOperation[];
  /** Clock for created_at / occurred_at */
  now?: () => Date;
}

export interface FakeSongRepo extends SongRepository {
  /** Current songs in insertion order */
  allSongs(): Song[];
  /** Current event log in insertion order */
  allEvents(): SongEvent[];
}

/**
 * Creates a fake song repository for testing.
 *
 * Every operation yields to the event loop before touching the store, so
 * concurrent callers interleave the way they would against a database.
 * The slug uniqueness and atomic increments match the SQL implementation.
 */
export const makeFakeSongRepo = (options: FakeSongRepoOptions = {}): FakeSongRepo => {
  const songs = new Map<string, Song>();
  const events: SongEvent[] = [];
  const now = options.now ?? (() => new Date());
  const failing = new Set<SongRepoOperation>(options.failingOperations ?? []);
  const throwing = new Set<SongRepoOperation>(options.throwingOperations ?? []);
  let nextSongId = 1;
  let nextEventId = 1;

  for (const song of options.songs ?? []) {
    songs.set(song.slug, { ...song });
    nextSongId = Math.max(nextSongId, Number(song.id) + 1);
  }
  for (const event of options.events ?? []) {
    events.push({ ...event });
    nextEventId = Math.max(nextEventId, Number(event.id) + 1);
  }

  /** Resolves to an error Result when the operation is set up to fail */
  const guard = async (operation: SongRepoOperation): Promise<Result<never, SongError> | null> => {
    await Promise.resolve();
    if (throwing.has(operation)) {
      throw new Error(`Simulated ${operation} crash`);
    }
    if (options.simulateDbError === true || failing.has(operation)) {
      return err({
        type: 'StoreUnavailableError',
        message: 'Simulated database error',
        retryable: true,
      });
    }
    return null;
  };

  const counterValue = (song: Song, counter: SongCounter): number =>
    counter === 'downloads' ? song.downloadCount : song.viewCount;

  const byNewest = (a: { id: string }, b: { id: string }): number => Number(b.id) - Number(a.id);

  return {
    insert: async (newSong: NewSong): Promise<Result<Song, SongError>> => {
      const failure = await guard('insert');
      if (failure !== null) return failure;

      if (songs.has(newSong.slug)) {
        return err({
          type: 'SlugConflictError',
          message: `Slug '${newSong.slug}' is already taken`,
          slug: newSong.slug,
        });
      }

      const createdAt = now();
      const song: Song = {
        ...newSong,
        id: String(nextSongId++),
        downloadCount: 0,
        viewCount: 0,
        createdAt,
        updatedAt: createdAt,
      };
      songs.set(song.slug, song);
      return ok({ ...song });
    },

    existsBySlug: async (slug: string): Promise<Result<boolean, SongError>> => {
      const failure = await guard('existsBySlug');
      if (failure !== null) return failure;
      return ok(songs.has(slug));
    },

    findBySlug: async (slug: string): Promise<Result<Song | null, SongError>> => {
      const failure = await guard('findBySlug');
      if (failure !== null) return failure;
      const song = songs.get(slug);
      return ok(song !== undefined ? { ...song } : null);
    },

    listRecent: async (limit: number): Promise<Result<Song[], SongError>> => {
      const failure = await guard('listRecent');
      if (failure !== null) return failure;
      const sorted = [...songs.values()].sort(
        (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || byNewest(a, b)
      );
      return ok(sorted.slice(0, limit).map((song) => ({ ...song })));
    },

    incrementCounter: async (
      slug: string,
      counter: SongCounter,
      delta: number
    ): Promise<Result<boolean, SongError>> => {
      const failure = await guard('incrementCounter');
      if (failure !== null) return failure;

      if (!Number.isInteger(delta) || delta <= 0) {
        return err({
          type: 'InvalidInputError',
          message: 'Counter delta must be a positive integer',
          field: 'delta',
        });
      }

      // Read and write happen in one synchronous step, like a single UPDATE
      const song = songs.get(slug);
      if (song === undefined) {
        return ok(false);
      }
      songs.set(slug, {
        ...song,
        downloadCount: counter === 'downloads' ? song.downloadCount + delta : song.downloadCount,
        viewCount: counter === 'views' ? song.viewCount + delta : song.viewCount,
        updatedAt: now(),
      });
      return ok(true);
    },

    insertEvent: async (newEvent: NewSongEvent): Promise<Result<SongEvent, SongError>> => {
      const failure = await guard('insertEvent');
      if (failure !== null) return failure;
      const event: SongEvent = { ...newEvent, id: String(nextEventId++), occurredAt: now() };
      events.push(event);
      return ok({ ...event });
    },

    aggregateSum: async (counter: SongCounter): Promise<Result<number, SongError>> => {
      const failure = await guard('aggregateSum');
      if (failure !== null) return failure;
      let total = 0;
      for (const song of songs.values()) {
        total += counterValue(song, counter);
      }
      return ok(total);
    },

    count: async (): Promise<Result<number, SongError>> => {
      const failure = await guard('count');
      if (failure !== null) return failure;
      return ok(songs.size);
    },

    listTopByCounter: async (
      counter: SongCounter,
      limit: number
    ): Promise<Result<Song[], SongError>> => {
      const failure = await guard('listTopByCounter');
      if (failure !== null) return failure;
      const sorted = [...songs.values()].sort(
        (a, b) => counterValue(b, counter) - counterValue(a, counter) || Number(a.id) - Number(b.id)
      );
      return ok(sorted.slice(0, limit).map((song) => ({ ...song })));
    },

    listRecentEvents: async (
      eventType: SongEventType,
      limit: number
    ): Promise<Result<SongEvent[], SongError>> => {
      const failure = await guard('listRecentEvents');
      if (failure !== null) return failure;
      const matching = events
        .filter((event) => event.eventType === eventType)
        .sort((a, b) => b.occurredAt.getTime() - a.occurredAt.getTime() || byNewest(a, b));
      return ok(matching.slice(0, limit).map((event) => ({ ...event })));
    },

    allSongs: () => [...songs.values()].map((song) => ({ ...song })),
    allEvents: () => events.map((event) => ({ ...event })),
  };
};

// =============================================================================
// Blob Storage Fake
// =============================================================================

interface FakeBlobStorageOptions {
  /** store() fails with BlobStorageError */
  failStore?: boolean;
  /** remove() fails with BlobStorageError */
  failRemove?: boolean;
}

export interface FakeBlobStorage extends BlobStorage {
  files: Map<string, Buffer>;
}

/**
 * In-memory blob storage. Reads every upload to its end, like the disk
 * implementation, even past the size cap.
 */
export const makeFakeBlobStorage = (options: FakeBlobStorageOptions = {}): FakeBlobStorage => {
  const files = new Map<string, Buffer>();
  let nextBlob = 1;

  const storageError = (message: string): BlobStorageError => ({
    type: 'BlobStorageError',
    message,
  });

  return {
    files,

    store: async (
      content: Readable,
      storeOptions: StoreBlobOptions
    ): Promise<Result<StoredBlob, BlobStorageError | FileTooLargeError>> => {
      const chunks: Buffer[] = [];
      let total = 0;
      for await (const chunk of content) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        total += buffer.length;
        if (total <= storeOptions.maxBytes) {
          chunks.push(buffer);
        }
      }

      if (options.failStore === true) {
        return err(storageError('Simulated storage failure'));
      }
      if (total > storeOptions.maxBytes) {
        return err(createFileTooLargeError(storeOptions.maxBytes));
      }

      const location = `blob-${String(nextBlob++)}${storeOptions.extension}`;
      files.set(location, Buffer.concat(chunks));
      return ok({ location, sizeBytes: total });
    },

    exists: async (location: string): Promise<Result<boolean, BlobStorageError>> => {
      return ok(files.has(location));
    },

    openForRead: async (
      location: string
    ): Promise<Result<BlobReadHandle | null, BlobStorageError>> => {
      const content = files.get(location);
      if (content === undefined) {
        return ok(null);
      }
      return ok({ stream: Readable.from([content]), sizeBytes: content.length });
    },

    remove: async (location: string): Promise<Result<void, BlobStorageError>> => {
      if (options.failRemove === true) {
        return err(storageError('Simulated remove failure'));
      }
      files.delete(location);
      return ok(undefined);
    },
  };
};

// =============================================================================
// Random Source Fake
// =============================================================================

/**
 * Deterministic random source. Hands out the given values in order and keeps
 * repeating the last one once they run out.
 */
export const makeSequenceRandom = (
  hexValues: string[],
  tokens: string[] = ['token-0000000']
): RandomSource & { hexCalls: number } => {
  const pick = (values: string[], index: number): string =>
    values[Math.min(index, values.length - 1)] ?? '';

  let tokenCalls = 0;
  const source = {
    hexCalls: 0,
    hex: (length: number): string => pick(hexValues, source.hexCalls++).slice(0, length),
    urlSafeToken: (): string => pick(tokens, tokenCalls++),
  };
  return source;
};

// =============================================================================
// Event Recorder Fake
// =============================================================================

export interface RecordingEventRecorder extends EventRecorder {
  recorded: RecordEventInput[];
}

export const makeRecordingEventRecorder = (): RecordingEventRecorder => {
  const recorded: RecordEventInput[] = [];
  return {
    recorded,
    record: (input) => {
      recorded.push(input);
    },
    flush: async () => {
      // recording is synchronous
    },
  };
};
