import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import debug from 'debug';
import * as schema from './schema';

const log = debug('blog:db');

/** Any drizzle PostgreSQL database over the blog schema, whatever the driver. */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export function createDatabase(databaseUrl: string): { db: Database; pool: Pool } {
  // Parse the DATABASE_URL to check if SSL is required
  const requiresSsl = databaseUrl.includes('sslmode=require') || databaseUrl.includes('neon.tech');

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: requiresSsl ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // Timeout for initial connection
  });

  pool.on('error', (err) => {
    console.error('Unexpected error on idle client', err);
  });

  pool.on('connect', () => {
    log('New client connected to the pool');
  });

  pool.on('remove', () => {
    log('Client removed from the pool');
  });

  return { db: drizzle(pool, { schema }), pool };
}

export * from './schema';
