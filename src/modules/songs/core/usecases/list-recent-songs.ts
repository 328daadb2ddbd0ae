/**
 * List Recent Songs Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { clampLimit, DEFAULT_LIST_LIMIT, type PublicSong, type SongsConfig } from '../types.js';
import { toPublicSong } from '../urls.js';

import type { SongError } from '../errors.js';
import type { SongRepository } from '../ports.js';

export interface ListRecentSongsDeps {
  songRepo: SongRepository;
  config: Pick<SongsConfig, 'publicBaseUrl'>;
}

export interface ListRecentSongsInput {
  limit?: number | undefined;
}

/**
 * Newest songs first. Listing does not count as a view.
 */
export const listRecentSongs = async (
  deps: ListRecentSongsDeps,
  input: ListRecentSongsInput = {}
): Promise<Result<PublicSong[], SongError>> => {
  const limit = clampLimit(input.limit, DEFAULT_LIST_LIMIT);

  const songsResult = await deps.songRepo.listRecent(limit);
  if (songsResult.isErr()) {
    return err(songsResult.error);
  }

  return ok(songsResult.value.map((song) => toPublicSong(song, deps.config.publicBaseUrl)));
};
