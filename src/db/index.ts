import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';
import pg from 'pg';
import SQLite from 'better-sqlite3';
import type { Database } from './schema.js';
import { createSchema } from './schema.js';

export type Db = Kysely<Database>;

export interface DatabaseOptions {
  poolSize?: number;
}

const SQLITE_PREFIX = 'sqlite:';

export function isSqliteUrl(url: string): boolean {
  return url.startsWith(SQLITE_PREFIX) || url === ':memory:' || url.endsWith('.db') || url.endsWith('.sqlite');
}

function sqliteFilename(url: string): string {
  const filename = url.startsWith(SQLITE_PREFIX) ? url.slice(SQLITE_PREFIX.length) : url;
  return filename.replace(/^\/\//, '') || ':memory:';
}

// Connection pool for PostgreSQL, a single handle for SQLite. Callers own the
// returned instance and release it with closeDatabase.
export function createDatabase(url: string, options: DatabaseOptions = {}): Db {
  if (isSqliteUrl(url)) {
    const sqlite = new SQLite(sqliteFilename(url));
    sqlite.pragma('foreign_keys = ON');
    sqlite.pragma('journal_mode = WAL');

    return new Kysely<Database>({
      dialect: new SqliteDialect({ database: sqlite }),
    });
  }

  return new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: new pg.Pool({
        connectionString: url,
        max: options.poolSize ?? 10,
      }),
    }),
  });
}

export async function initializeDatabase(db: Db): Promise<void> {
  await createSchema(db);
}

export async function closeDatabase(db: Db): Promise<void> {
  await db.destroy();
}
