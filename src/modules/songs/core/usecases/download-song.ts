/**
 * Download Song Use Case
 *
 * Opens a song's file for streaming and records a download.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createSongFileMissingError,
  createSongNotFoundError,
  type SongError,
} from '../errors.js';
import { isValidSlug, type RequestContext } from '../types.js';

import type { BlobStorage, EventRecorder, SongRepository } from '../ports.js';
import type { Readable } from 'node:stream';
import type { Logger } from 'pino';

export interface DownloadSongDeps {
  songRepo: SongRepository;
  blobStorage: BlobStorage;
  eventRecorder: EventRecorder;
  logger: Logger;
}

export interface DownloadSongInput {
  slug: string;
  context: RequestContext;
}

export interface SongDownload {
  stream: Readable;
  sizeBytes: number;
  mimeType: string;
  filename: string;
}

/**
 * Flow:
 * 1. Load the song; unknown or malformed slug → SongNotFoundError
 * 2. Check and open the blob; missing → SongFileMissingError
 * 3. Fire-and-forget: record a download (only once the file is open)
 */
export const downloadSong = async (
  deps: DownloadSongDeps,
  input: DownloadSongInput
): Promise<Result<SongDownload, SongError>> => {
  const { songRepo, blobStorage, eventRecorder, logger } = deps;
  const { slug, context } = input;

  if (!isValidSlug(slug)) {
    return err(createSongNotFoundError(slug));
  }

  const songResult = await songRepo.findBySlug(slug);
  if (songResult.isErr()) {
    return err(songResult.error);
  }

  const song = songResult.value;
  if (song === null) {
    return err(createSongNotFoundError(slug));
  }

  const existsResult = await blobStorage.exists(song.storedLocation);
  if (existsResult.isErr()) {
    return err(existsResult.error);
  }
  if (!existsResult.value) {
    logger.warn({ slug, location: song.storedLocation }, 'Song file missing from storage');
    return err(createSongFileMissingError(slug));
  }

  const openResult = await blobStorage.openForRead(song.storedLocation);
  if (openResult.isErr()) {
    return err(openResult.error);
  }

  const handle = openResult.value;
  if (handle === null) {
    logger.warn({ slug, location: song.storedLocation }, 'Song file vanished before open');
    return err(createSongFileMissingError(slug));
  }

  eventRecorder.record({ slug, eventType: 'download', songTitle: song.title, context });

  return ok({
    stream: handle.stream,
    sizeBytes: handle.sizeBytes,
    mimeType: song.mimeType,
    filename: song.originalFilename,
  });
};
