/**
 * Songs Module - Public API
 *
 * Upload audio, share it by slug, count views and downloads.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Song,
  NewSong,
  SongEvent,
  NewSongEvent,
  SongEventType,
  SongCounter,
  SlugStrategy,
  PublicSong,
  SongUrls,
  SongsConfig,
  RequestContext,
  RandomSource,
} from './core/types.js';

export {
  SLUG_SUFFIX_LENGTH,
  TOKEN_BYTES,
  DEFAULT_OVERVIEW_LIMIT,
  EMPTY_REQUEST_CONTEXT,
  isValidSlug,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { SongError } from './core/errors.js';

export {
  SONG_ERROR_HTTP_STATUS,
  getHttpStatusForError,
  toPublicError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type {
  SongRepository,
  BlobStorage,
  EventRecorder,
  RecordEventInput,
} from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { generateSlug } from './core/usecases/generate-slug.js';
export { stageUpload, type StagedUpload } from './core/usecases/stage-upload.js';
export { publishSong, type SongFields } from './core/usecases/publish-song.js';
export { getSong } from './core/usecases/get-song.js';
export { downloadSong, type SongDownload } from './core/usecases/download-song.js';
export { recordEvent } from './core/usecases/record-event.js';
export {
  getAnalyticsOverview,
  type AnalyticsOverview,
} from './core/usecases/get-analytics-overview.js';
export { listRecentSongs } from './core/usecases/list-recent-songs.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeSongRepo,
  makeUnavailableSongRepo,
  type SongRepoOptions,
} from './shell/repo/song-repo.js';
export {
  makeLocalBlobStorage,
  type LocalBlobStorageOptions,
} from './shell/storage/local-blob-storage.js';
export { cryptoRandomSource } from './shell/crypto/random-source.js';
export { makeEventRecorder, type EventRecorderOptions } from './shell/events/event-recorder.js';
export { makeSongRoutes, type MakeSongRoutesDeps } from './shell/rest/routes.js';
