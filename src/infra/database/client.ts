import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { SongsDatabase } from './songs/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type SongsDbClient = Kysely<SongsDatabase>;

/**
 * Create a Kysely instance for a database URL
 */
const createClient = <T>(connectionString: string): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the songs database client.
 * Returns undefined when DATABASE_URL is not configured.
 */
export const initDatabase = (config: AppConfig): SongsDbClient | undefined => {
  const { url } = config.database;

  if (url === undefined || url === '') {
    return undefined;
  }

  return createClient<SongsDatabase>(url);
};

export type { Songs, SongEvents, SongsDatabase } from './songs/types.js';
