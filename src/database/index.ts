import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { formatError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';
import * as schema from './schema';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * An open database: the raw better-sqlite3 handle (pragmas, migrations, close)
 * and the drizzle instance every service queries through.
 */
export interface DatabaseConnection {
  sqlite: Database.Database;
  db: AppDatabase;
}

export const createDatabase = (path: string): DatabaseConnection => {
  const sqlite = new Database(path);
  log.info('Database connection established.', { path });

  try {
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('synchronous = NORMAL');
    sqlite.pragma('foreign_keys = ON');
    sqlite.pragma('busy_timeout = 5000');
    sqlite.pragma('temp_store = MEMORY');
    log.debug('Applied database PRAGMA settings.');
  } catch (error) {
    sqlite.close();
    log.error("Error applying PRAGMA settings", { error: formatError(error) });
    throw error;
  }

  return { sqlite, db: drizzle(sqlite, { schema }) };
};

export const closeDatabase = (connection: DatabaseConnection): void => {
  try {
    connection.sqlite.close();
    log.info('Database connection closed.');
  } catch (error) {
    log.error("Error closing database connection", { error: formatError(error) });
  }
};

export { schema };
