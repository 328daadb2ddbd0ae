/**
 * Songs Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Record store could not be reached or failed a query.
 */
export interface StoreUnavailableError {
  readonly type: 'StoreUnavailableError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * Blob storage failed to write, read or delete a file.
 */
export interface BlobStorageError {
  readonly type: 'BlobStorageError';
  readonly message: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Missing or malformed request field.
 */
export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
}

/**
 * Upload exceeded the configured size cap.
 */
export interface FileTooLargeError {
  readonly type: 'FileTooLargeError';
  readonly message: string;
  readonly maxBytes: number;
}

/**
 * No song with this slug.
 */
export interface SongNotFoundError {
  readonly type: 'SongNotFoundError';
  readonly message: string;
  readonly slug: string;
}

/**
 * The song exists but its file is gone.
 */
export interface SongFileMissingError {
  readonly type: 'SongFileMissingError';
  readonly message: string;
  readonly slug: string;
}

/**
 * Insert hit the unique slug constraint.
 */
export interface SlugConflictError {
  readonly type: 'SlugConflictError';
  readonly message: string;
  readonly slug: string;
}

/**
 * Every slug candidate within the attempt cap was taken.
 */
export interface CollisionRetryExhaustedError {
  readonly type: 'CollisionRetryExhaustedError';
  readonly message: string;
  readonly attempts: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type SongError =
  | StoreUnavailableError
  | BlobStorageError
  | InvalidInputError
  | FileTooLargeError
  | SongNotFoundError
  | SongFileMissingError
  | SlugConflictError
  | CollisionRetryExhaustedError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createStoreUnavailableError = (
  message: string,
  cause?: unknown
): StoreUnavailableError => ({
  type: 'StoreUnavailableError',
  message,
  retryable: true,
  cause,
});

export const createBlobStorageError = (message: string, cause?: unknown): BlobStorageError => ({
  type: 'BlobStorageError',
  message,
  cause,
});

export const createInvalidInputError = (field: string, message: string): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
});

export const createFileTooLargeError = (maxBytes: number): FileTooLargeError => ({
  type: 'FileTooLargeError',
  message: `File exceeds the maximum upload size of ${String(maxBytes)} bytes`,
  maxBytes,
});

export const createSongNotFoundError = (slug: string): SongNotFoundError => ({
  type: 'SongNotFoundError',
  message: 'Song not found',
  slug,
});

export const createSongFileMissingError = (slug: string): SongFileMissingError => ({
  type: 'SongFileMissingError',
  message: 'File not found',
  slug,
});

export const createSlugConflictError = (slug: string): SlugConflictError => ({
  type: 'SlugConflictError',
  message: `Slug '${slug}' is already taken`,
  slug,
});

export const createCollisionRetryExhaustedError = (
  attempts: number
): CollisionRetryExhaustedError => ({
  type: 'CollisionRetryExhaustedError',
  message: `Could not find a free slug after ${String(attempts)} attempts`,
  attempts,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to HTTP status codes.
 */
export const SONG_ERROR_HTTP_STATUS: Record<SongError['type'], number> = {
  StoreUnavailableError: 500,
  BlobStorageError: 500,
  InvalidInputError: 400,
  FileTooLargeError: 413,
  SongNotFoundError: 404,
  SongFileMissingError: 404,
  SlugConflictError: 500,
  CollisionRetryExhaustedError: 500,
};

export const getHttpStatusForError = (error: SongError): number => {
  return SONG_ERROR_HTTP_STATUS[error.type];
};

/**
 * Error as sent to clients.
 * A missing file is reported exactly like a missing song.
 */
export const toPublicError = (error: SongError): { error: string; message: string } => {
  if (error.type === 'SongFileMissingError') {
    return { error: 'SongNotFoundError', message: 'Song not found' };
  }
  return { error: error.type, message: error.message };
};
