import type Database from 'better-sqlite3';
import { formatError } from '@/utils/error-formatter';
import { log } from '@/utils/logger';

interface Migration {
  version: number;
  description: string;
  statements: string[];
}

// Column names and types must stay in line with schema.ts
const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Initialize users and subscriptions',
    statements: [
      `CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        email TEXT NOT NULL DEFAULT '',
        platformUserId TEXT NOT NULL UNIQUE,
        createdAt INTEGER NOT NULL,
        updatedAt INTEGER NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS subscriptions (
        id TEXT PRIMARY KEY,
        userId TEXT NOT NULL REFERENCES users(id),
        transactionId TEXT NOT NULL UNIQUE,
        productId TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'recorded',
        expiresAt INTEGER NOT NULL,
        createdAt INTEGER NOT NULL,
        updatedAt INTEGER NOT NULL
      )`,
      'CREATE INDEX IF NOT EXISTS idx_subscriptions_userId_expiresAt ON subscriptions(userId, expiresAt)',
    ],
  },
];

export const TARGET_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

export const getSchemaVersion = (sqlite: Database.Database): number => {
  const version = sqlite.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
};

/**
 * Applies every migration newer than the database's user_version, each in its own transaction.
 */
export const runMigrations = (sqlite: Database.Database): void => {
  const currentVersion = getSchemaVersion(sqlite);
  log.info("Current database schema version", { currentVersion, targetVersion: TARGET_SCHEMA_VERSION });

  if (currentVersion >= TARGET_SCHEMA_VERSION) {
    log.info('Database schema is up to date.');
    return;
  }

  for (const migration of MIGRATIONS) {
    if (migration.version <= currentVersion) continue;

    log.info(`Running migration: ${migration.description} (v${migration.version - 1} -> v${migration.version})...`);
    const apply = sqlite.transaction(() => {
      for (const statement of migration.statements) {
        sqlite.exec(statement);
      }
      // PRAGMA does not accept bound parameters
      sqlite.pragma(`user_version = ${migration.version}`);
    });

    try {
      apply();
    } catch (error) {
      log.error("Migration failed", { version: migration.version, error: formatError(error) });
      throw error;
    }
  }

  log.info('Database migrations completed.', { version: TARGET_SCHEMA_VERSION });
};
