import type { Song, PublicSong, SongUrls } from './types.js';

const trimTrailingSlashes = (value: string): string => value.replace(/\/+$/, '');

/**
 * Builds the metadata and download URLs for a slug.
 * Relative paths when no public base URL is configured.
 */
export const buildSongUrls = (publicBaseUrl: string | undefined, slug: string): SongUrls => {
  const base = publicBaseUrl !== undefined ? trimTrailingSlashes(publicBaseUrl) : '';
  const metaUrl = `${base}/api/songs/${encodeURIComponent(slug)}`;
  return {
    metaUrl,
    downloadUrl: `${metaUrl}/download`,
  };
};

export const toPublicSong = (song: Song, publicBaseUrl: string | undefined): PublicSong => ({
  slug: song.slug,
  title: song.title,
  artist: song.artist,
  description: song.description,
  mimeType: song.mimeType,
  sizeBytes: song.sizeBytes,
  originalFilename: song.originalFilename,
  downloadCount: song.downloadCount,
  viewCount: song.viewCount,
  ...buildSongUrls(publicBaseUrl, song.slug),
  createdAt: song.createdAt.toISOString(),
});
