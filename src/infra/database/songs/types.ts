import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Database-generated timestamp (optional on insert)
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

// pg returns BIGINT columns as strings
export type BigIntColumn = ColumnType<string, number | string, number | string>;

// Songs Table
// Counters only move up; the CHECK constraints reject negative values.
export interface Songs {
  id: Generated<string>; // BIGSERIAL -> string
  slug: string;
  title: string;
  artist: string;
  description: string | null;
  stored_location: string;
  original_filename: string;
  mime_type: string;
  size_bytes: BigIntColumn;
  download_count: Generated<number>;
  view_count: Generated<number>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

// Song Events Table
// Append-only log; `slug` is a plain reference without a foreign key.
export interface SongEvents {
  id: Generated<string>; // BIGSERIAL -> string
  slug: string;
  event_type: 'view' | 'download';
  song_title: string | null;
  user_agent: string | null;
  ip_address: string | null;
  referer: string | null;
  occurred_at: GeneratedTimestamp;
}

export interface SongsDatabase {
  songs: Songs;
  song_events: SongEvents;
}
