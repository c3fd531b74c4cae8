import pgPromise from 'pg-promise';
import { loadSettings, type DatabaseSettings } from '../config/settings';

/**
 * Shared pg-promise root. Its `as` formatters and `helpers` are pure and
 * usable without a connection.
 */
export const pgp = pgPromise();

let db: pgPromise.IDatabase<{}> | null = null;

/**
 * Get the pg-promise database instance (lazy-initialized)
 */
export function getDb(config: DatabaseSettings = loadSettings().database): pgPromise.IDatabase<{}> {
  if (db) return db;

  db = pgp({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max,
  });

  console.log(`[DB] Pool created for ${config.user}@${config.host}:${config.port}/${config.database}`);
  return db;
}

/**
 * Close the database connection (for graceful shutdown)
 */
export async function closeDb(): Promise<void> {
  if (db) {
    pgp.end();
    db = null;
    console.log('[DB] Pool closed');
  }
}
