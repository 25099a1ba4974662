import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { config } from '@api/config';
import * as schema from './schema';

/**
 * Any drizzle Postgres database carrying this schema. Transactions opened on
 * it satisfy the same type, so helpers can take either.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

const pool = new pg.Pool({ connectionString: config.database.url });

export const db: Database = drizzle(pool, { schema });

export async function closeDatabase(): Promise<void> {
  await pool.end();
}
