/**
 * Publish Song Use Case
 *
 * Turns a staged upload into a shareable song: validates the metadata,
 * mints a slug and inserts the record. On any failure the staged blob is
 * removed, so no orphan file or record is left behind.
 */

import { ok, err, type Result } from 'neverthrow';

import { mintSlug } from './generate-slug.js';
import {
  createCollisionRetryExhaustedError,
  createInvalidInputError,
  type InvalidInputError,
  type SongError,
} from '../errors.js';
import {
  MAX_ARTIST_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  MAX_TITLE_LENGTH,
  type RandomSource,
  type Song,
  type SongsConfig,
  type SongUrls,
} from '../types.js';
import { buildSongUrls } from '../urls.js';

import type { StagedUpload } from './stage-upload.js';
import type { BlobStorage, SongRepository } from '../ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PublishSongDeps {
  songRepo: SongRepository;
  blobStorage: BlobStorage;
  random: RandomSource;
  config: Pick<SongsConfig, 'publicBaseUrl' | 'slugStrategy' | 'slugMaxAttempts'>;
  logger: Logger;
}

/** Raw form fields as received */
export interface SongFields {
  title?: string | undefined;
  artist?: string | undefined;
  description?: string | undefined;
}

export interface PublishSongInput {
  fields: SongFields;
  staged: StagedUpload;
}

export interface PublishSongResult {
  song: Song;
  urls: SongUrls;
}

interface ValidSongFields {
  title: string;
  artist: string;
  description: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

const requireText = (
  field: string,
  value: string | undefined,
  maxLength: number
): Result<string, InvalidInputError> => {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') {
    return err(createInvalidInputError(field, `Field '${field}' is required`));
  }
  if (trimmed.length > maxLength) {
    return err(
      createInvalidInputError(
        field,
        `Field '${field}' must be at most ${String(maxLength)} characters`
      )
    );
  }
  return ok(trimmed);
};

/**
 * Trims the fields; title and artist are required, an empty description becomes null.
 */
export const validateSongFields = (
  fields: SongFields
): Result<ValidSongFields, InvalidInputError> => {
  const titleResult = requireText('title', fields.title, MAX_TITLE_LENGTH);
  if (titleResult.isErr()) {
    return err(titleResult.error);
  }

  const artistResult = requireText('artist', fields.artist, MAX_ARTIST_LENGTH);
  if (artistResult.isErr()) {
    return err(artistResult.error);
  }

  const description = fields.description?.trim() ?? '';
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    return err(
      createInvalidInputError(
        'description',
        `Field 'description' must be at most ${String(MAX_DESCRIPTION_LENGTH)} characters`
      )
    );
  }

  return ok({
    title: titleResult.value,
    artist: artistResult.value,
    description: description !== '' ? description : null,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Inserts the song, minting a new slug whenever a concurrent upload claimed
 * the previous one between the existence check and the insert.
 *
 * Existence checks and insert conflicts draw from one budget of
 * `slugMaxAttempts` candidates.
 */
const insertWithFreshSlug = async (
  deps: PublishSongDeps,
  fields: ValidSongFields,
  staged: StagedUpload
): Promise<Result<Song, SongError>> => {
  const { songRepo, logger } = deps;
  const maxAttempts = Math.max(1, deps.config.slugMaxAttempts);
  let used = 0;

  while (used < maxAttempts) {
    const slugResult = await mintSlug(deps, fields, maxAttempts - used);
    if (slugResult.isErr()) {
      return slugResult.error.type === 'CollisionRetryExhaustedError'
        ? err(createCollisionRetryExhaustedError(maxAttempts))
        : err(slugResult.error);
    }

    const { slug, attempts } = slugResult.value;
    used += attempts;

    const insertResult = await songRepo.insert({
      slug,
      title: fields.title,
      artist: fields.artist,
      description: fields.description,
      storedLocation: staged.location,
      originalFilename: staged.originalFilename,
      mimeType: staged.mimeType,
      sizeBytes: staged.sizeBytes,
    });

    if (insertResult.isOk()) {
      return ok(insertResult.value);
    }

    if (insertResult.error.type !== 'SlugConflictError') {
      return err(insertResult.error);
    }

    logger.debug({ slug, attempt: used }, 'Slug claimed concurrently, retrying');
  }

  return err(createCollisionRetryExhaustedError(maxAttempts));
};

const discardStaged = async (deps: PublishSongDeps, staged: StagedUpload): Promise<void> => {
  const removeResult = await deps.blobStorage.remove(staged.location);
  if (removeResult.isErr()) {
    deps.logger.error(
      { err: removeResult.error, location: staged.location },
      'Failed to remove staged upload'
    );
  }
};

export const publishSong = async (
  deps: PublishSongDeps,
  input: PublishSongInput
): Promise<Result<PublishSongResult, SongError>> => {
  const { staged } = input;

  const fieldsResult = validateSongFields(input.fields);
  if (fieldsResult.isErr()) {
    await discardStaged(deps, staged);
    return err(fieldsResult.error);
  }

  const songResult = await insertWithFreshSlug(deps, fieldsResult.value, staged);
  if (songResult.isErr()) {
    await discardStaged(deps, staged);
    return err(songResult.error);
  }

  const song = songResult.value;
  deps.logger.info({ slug: song.slug, sizeBytes: song.sizeBytes }, 'Song published');

  return ok({ song, urls: buildSongUrls(deps.config.publicBaseUrl, song.slug) });
};
