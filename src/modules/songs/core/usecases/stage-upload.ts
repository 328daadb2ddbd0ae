/**
 * Stage Upload Use Case
 *
 * Validates an incoming audio file and streams it to blob storage.
 * The staged blob becomes a song once `publishSong` succeeds.
 */

import { ok, err, type Result } from 'neverthrow';

import { checkAudioFile } from '../media.js';

import type { SongError } from '../errors.js';
import type { BlobStorage } from '../ports.js';
import type { Readable } from 'node:stream';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface StageUploadDeps {
  blobStorage: BlobStorage;
  maxUploadBytes: number;
}

export interface StageUploadInput {
  filename: string;
  mimeType: string | undefined;
  stream: Readable;
}

export interface StagedUpload {
  location: string;
  sizeBytes: number;
  originalFilename: string;
  mimeType: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

export const stageUpload = async (
  deps: StageUploadDeps,
  input: StageUploadInput
): Promise<Result<StagedUpload, SongError>> => {
  const { blobStorage, maxUploadBytes } = deps;

  const audioResult = checkAudioFile(input.mimeType, input.filename);
  if (audioResult.isErr()) {
    // The rest of the request cannot be read until the file part is consumed
    input.stream.resume();
    return err(audioResult.error);
  }

  const audio = audioResult.value;

  const storeResult = await blobStorage.store(input.stream, {
    extension: audio.extension,
    maxBytes: maxUploadBytes,
  });
  if (storeResult.isErr()) {
    return err(storeResult.error);
  }

  return ok({
    location: storeResult.value.location,
    sizeBytes: storeResult.value.sizeBytes,
    originalFilename: audio.originalFilename,
    mimeType: audio.mimeType,
  });
};
