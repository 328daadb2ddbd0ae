/**
 * Get Song Use Case
 *
 * Looks up a song's public metadata and records a view.
 */

import { ok, err, type Result } from 'neverthrow';

import { createSongNotFoundError, type SongError } from '../errors.js';
import { isValidSlug, type PublicSong, type RequestContext, type SongsConfig } from '../types.js';
import { toPublicSong } from '../urls.js';

import type { EventRecorder, SongRepository } from '../ports.js';

export interface GetSongDeps {
  songRepo: SongRepository;
  eventRecorder: EventRecorder;
  config: Pick<SongsConfig, 'publicBaseUrl'>;
}

export interface GetSongInput {
  slug: string;
  context: RequestContext;
}

/**
 * Flow:
 * 1. Reject malformed slugs as not found without querying the store
 * 2. Load the song
 * 3. Fire-and-forget: record a view
 * 4. Return the public view (counters as read, before this view)
 */
export const getSong = async (
  deps: GetSongDeps,
  input: GetSongInput
): Promise<Result<PublicSong, SongError>> => {
  const { songRepo, eventRecorder, config } = deps;
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

  eventRecorder.record({ slug, eventType: 'view', songTitle: song.title, context });

  return ok(toPublicSong(song, config.publicBaseUrl));
};
