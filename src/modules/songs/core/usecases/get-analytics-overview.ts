/**
 * Get Analytics Overview Use Case
 *
 * Aggregates totals, the most downloaded songs and the latest downloads.
 * Recomputed from the record store on every call.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  clampLimit,
  DEFAULT_OVERVIEW_LIMIT,
  type SongEventType,
} from '../types.js';

import type { SongError } from '../errors.js';
import type { SongRepository } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GetAnalyticsOverviewDeps {
  songRepo: SongRepository;
}

export interface GetAnalyticsOverviewInput {
  /** Size of the top and recent lists (default 10, clamped to 1..100) */
  limit?: number | undefined;
}

export interface TopSong {
  slug: string;
  title: string;
  artist: string;
  downloadCount: number;
  viewCount: number;
}

export interface RecentEvent {
  slug: string;
  eventType: SongEventType;
  songTitle: string | null;
  userAgent: string | null;
  ipAddress: string | null;
  referer: string | null;
  occurredAt: string;
}

export interface AnalyticsOverview {
  totalSongs: number;
  totalDownloads: number;
  totalViews: number;
  topSongs: TopSong[];
  recentDownloads: RecentEvent[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * All five queries run in parallel; any failure fails the whole overview.
 */
export const getAnalyticsOverview = async (
  deps: GetAnalyticsOverviewDeps,
  input: GetAnalyticsOverviewInput = {}
): Promise<Result<AnalyticsOverview, SongError>> => {
  const { songRepo } = deps;
  const limit = clampLimit(input.limit, DEFAULT_OVERVIEW_LIMIT);

  const [countResult, downloadsResult, viewsResult, topResult, recentResult] = await Promise.all([
    songRepo.count(),
    songRepo.aggregateSum('downloads'),
    songRepo.aggregateSum('views'),
    songRepo.listTopByCounter('downloads', limit),
    songRepo.listRecentEvents('download', limit),
  ]);

  if (countResult.isErr()) return err(countResult.error);
  if (downloadsResult.isErr()) return err(downloadsResult.error);
  if (viewsResult.isErr()) return err(viewsResult.error);
  if (topResult.isErr()) return err(topResult.error);
  if (recentResult.isErr()) return err(recentResult.error);

  return ok({
    totalSongs: countResult.value,
    totalDownloads: downloadsResult.value,
    totalViews: viewsResult.value,
    topSongs: topResult.value.map((song) => ({
      slug: song.slug,
      title: song.title,
      artist: song.artist,
      downloadCount: song.downloadCount,
      viewCount: song.viewCount,
    })),
    recentDownloads: recentResult.value.map((event) => ({
      slug: event.slug,
      eventType: event.eventType,
      songTitle: event.songTitle,
      userAgent: event.userAgent,
      ipAddress: event.ipAddress,
      referer: event.referer,
      occurredAt: event.occurredAt.toISOString(),
    })),
  });
};
