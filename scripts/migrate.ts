/**
 * Applies the songs schema to DATABASE_URL.
 *
 * Usage:
 *   DATABASE_URL=postgres://... npm run db:migrate
 */

import fs from 'node:fs/promises';

import pg from 'pg';

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';

const SCHEMA_URL = new URL('../src/infra/database/songs/schema.sql', import.meta.url);

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'migrate',
    pretty: config.logger.pretty,
  });

  const connectionString = config.database.url;
  if (connectionString === undefined) {
    throw new Error('DATABASE_URL is required to apply the schema');
  }

  const schema = await fs.readFile(SCHEMA_URL, 'utf-8');

  // Raw pg client: the schema file holds several statements
  const client = new pg.Client({ connectionString });
  await client.connect();

  try {
    await client.query(schema);
    logger.info('Songs schema applied');
  } finally {
    await client.end();
  }
};

await main().catch((error: unknown) => {
  console.error('Migration failed:', error);
  process.exit(1);
});
