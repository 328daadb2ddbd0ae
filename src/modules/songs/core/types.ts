/**
 * Songs Module - Core Types
 *
 * Domain types and constants for song sharing.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Hex characters appended to a readable slug */
export const SLUG_SUFFIX_LENGTH = 6;

/** Readable base used when title and artist leave nothing after normalization */
export const DEFAULT_SLUG_BASE = 'song';

export const MAX_SLUG_BASE_LENGTH = 80;

/** Random bytes behind a token slug (base64url → 14 characters) */
export const TOKEN_BYTES = 10;

/** Shape every slug ever issued satisfies */
export const SLUG_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const MAX_TITLE_LENGTH = 200;
export const MAX_ARTIST_LENGTH = 200;
export const MAX_DESCRIPTION_LENGTH = 2000;

export const DEFAULT_OVERVIEW_LIMIT = 10;
export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

export const ALLOWED_AUDIO_MIME_TYPES: readonly string[] = [
  'audio/mpeg',
  'audio/wav',
  'audio/x-wav',
  'audio/flac',
  'audio/aac',
  'audio/ogg',
  'audio/mp4',
  'audio/x-m4a',
];

/** Accepted when the client sends a generic or missing content type */
export const ALLOWED_AUDIO_EXTENSIONS: readonly string[] = [
  '.mp3',
  '.wav',
  '.flac',
  '.aac',
  '.ogg',
  '.m4a',
  '.mp4',
];

export const FALLBACK_MIME_TYPE = 'application/octet-stream';

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

export type SongEventType = 'view' | 'download';

/** Counter columns on a song */
export type SongCounter = 'downloads' | 'views';

export type SlugStrategy = 'readable' | 'token';

/**
 * A shared song as stored.
 */
export interface Song {
  id: string;
  slug: string;
  title: string;
  artist: string;
  description: string | null;
  /** Opaque blob reference, never sent to clients */
  storedLocation: string;
  originalFilename: string;
  mimeType: string;
  sizeBytes: number;
  downloadCount: number;
  viewCount: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Input for inserting a song. Counters start at zero.
 */
export interface NewSong {
  slug: string;
  title: string;
  artist: string;
  description: string | null;
  storedLocation: string;
  originalFilename: string;
  mimeType: string;
  sizeBytes: number;
}

/**
 * One entry of the append-only event log.
 */
export interface SongEvent {
  id: string;
  slug: string;
  eventType: SongEventType;
  songTitle: string | null;
  userAgent: string | null;
  ipAddress: string | null;
  referer: string | null;
  occurredAt: Date;
}

export interface NewSongEvent {
  slug: string;
  eventType: SongEventType;
  songTitle: string | null;
  userAgent: string | null;
  ipAddress: string | null;
  referer: string | null;
}

/**
 * Request metadata captured for the event log.
 */
export interface RequestContext {
  userAgent: string | null;
  ipAddress: string | null;
  referer: string | null;
}

export const EMPTY_REQUEST_CONTEXT: RequestContext = {
  userAgent: null,
  ipAddress: null,
  referer: null,
};

/**
 * What clients see of a song.
 */
export interface PublicSong {
  slug: string;
  title: string;
  artist: string;
  description: string | null;
  mimeType: string;
  sizeBytes: number;
  originalFilename: string;
  downloadCount: number;
  viewCount: number;
  downloadUrl: string;
  metaUrl: string;
  createdAt: string;
}

export interface SongUrls {
  downloadUrl: string;
  metaUrl: string;
}

/**
 * Configuration for the songs module.
 */
export interface SongsConfig {
  /** Prefix for returned URLs; relative paths when undefined */
  publicBaseUrl: string | undefined;
  slugStrategy: SlugStrategy;
  slugMaxAttempts: number;
  maxUploadBytes: number;
}

/**
 * Source of randomness for slug generation.
 */
export interface RandomSource {
  /** `length` lowercase hex characters */
  hex(length: number): string;
  /** URL-safe token from `bytes` random bytes */
  urlSafeToken(bytes: number): string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isValidSlug = (slug: string): boolean => SLUG_PATTERN.test(slug);

export const counterForEvent = (eventType: SongEventType): SongCounter =>
  eventType === 'download' ? 'downloads' : 'views';

/**
 * Limits outside 1..MAX_LIST_LIMIT are clamped; undefined takes the default.
 */
export const clampLimit = (limit: number | undefined, fallback: number): number => {
  if (limit === undefined || !Number.isFinite(limit)) {
    return fallback;
  }
  return Math.min(MAX_LIST_LIMIT, Math.max(1, Math.floor(limit)));
};
