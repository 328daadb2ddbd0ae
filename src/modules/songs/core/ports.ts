/**
 * Songs Module - Port Interfaces
 *
 * Defines the record store, blob storage and event recorder contracts that the
 * shell layer must implement.
 */

import type { BlobStorageError, FileTooLargeError, SongError } from './errors.js';
import type {
  NewSong,
  NewSongEvent,
  RequestContext,
  Song,
  SongCounter,
  SongEvent,
  SongEventType,
} from './types.js';
import type { Result } from 'neverthrow';
import type { Readable } from 'node:stream';

// ─────────────────────────────────────────────────────────────────────────────
// Song Repository
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Record store for songs and their event log.
 * Every backend failure surfaces as StoreUnavailableError.
 */
export interface SongRepository {
  /**
   * Inserts a song with zeroed counters.
   * Returns SlugConflictError when the slug is already taken.
   */
  insert(song: NewSong): Promise<Result<Song, SongError>>;

  existsBySlug(slug: string): Promise<Result<boolean, SongError>>;

  findBySlug(slug: string): Promise<Result<Song | null, SongError>>;

  /** Newest first */
  listRecent(limit: number): Promise<Result<Song[], SongError>>;

  /**
   * Adds `delta` to a counter in a single atomic statement.
   * @returns whether a song matched the slug
   */
  incrementCounter(
    slug: string,
    counter: SongCounter,
    delta: number
  ): Promise<Result<boolean, SongError>>;

  insertEvent(event: NewSongEvent): Promise<Result<SongEvent, SongError>>;

  /** Sum of a counter over all songs; 0 when there are none */
  aggregateSum(counter: SongCounter): Promise<Result<number, SongError>>;

  count(): Promise<Result<number, SongError>>;

  /** Highest counter first, ties in insertion order */
  listTopByCounter(counter: SongCounter, limit: number): Promise<Result<Song[], SongError>>;

  /** Newest first */
  listRecentEvents(eventType: SongEventType, limit: number): Promise<Result<SongEvent[], SongError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Blob Storage
// ─────────────────────────────────────────────────────────────────────────────

export interface StoreBlobOptions {
  /** File extension including the dot, or '' */
  extension: string;
  maxBytes: number;
}

export interface StoredBlob {
  location: string;
  sizeBytes: number;
}

export interface BlobReadHandle {
  stream: Readable;
  sizeBytes: number;
}

/**
 * Storage for uploaded audio files.
 */
export interface BlobStorage {
  /**
   * Streams the content to durable storage.
   * Nothing is left behind when the write fails or exceeds `maxBytes`.
   */
  store(
    content: Readable,
    options: StoreBlobOptions
  ): Promise<Result<StoredBlob, BlobStorageError | FileTooLargeError>>;

  exists(location: string): Promise<Result<boolean, BlobStorageError>>;

  /**
   * Opens a blob for reading.
   * @returns null when the blob does not exist
   */
  openForRead(location: string): Promise<Result<BlobReadHandle | null, BlobStorageError>>;

  remove(location: string): Promise<Result<void, BlobStorageError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Event Recorder
// ─────────────────────────────────────────────────────────────────────────────

export interface RecordEventInput {
  slug: string;
  eventType: SongEventType;
  songTitle: string | null;
  context: RequestContext;
}

/**
 * Fire-and-forget recording of views and downloads.
 */
export interface EventRecorder {
  /** Starts recording without waiting for it; never throws */
  record(input: RecordEventInput): void;

  /** Resolves once every recording started so far has settled */
  flush(): Promise<void>;
}
