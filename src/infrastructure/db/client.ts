import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';
import { EXECUTIONS_DDL } from './schema.js';

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
export type SqlClient = ReturnType<typeof createDbClient>['sql'];

/**
 * Ensures tables exist (lightweight migration via raw SQL).
 * drizzle-kit owns real migrations; this covers a fresh local database.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  for (const statement of EXECUTIONS_DDL) {
    await sql.unsafe(statement);
  }
}
