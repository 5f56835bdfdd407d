import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string) {
  const sql = postgres(databaseUrl, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];

/** Either the root client or a transaction; both run the same queries. */
export type DbExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

export type DbConnection = ReturnType<typeof createDbClient>['sql'];
