import * as fs from 'node:fs';
import * as path from 'node:path';
import Database, { type Database as SQLiteDatabase } from 'better-sqlite3';
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';
import { createLogger } from '../lib/logging/logger.js';

export type { SQLiteDatabase };

const log = createLogger('DB');

export const IN_MEMORY = ':memory:';

export interface DatabaseOptions {
  /** SQL run once the connection is open, e.g. `CREATE TABLE IF NOT EXISTS`. */
  migrationSql?: string;
}

export interface DatabaseHandle {
  sqlite: SQLiteDatabase;
  db: BetterSQLite3Database;
  close: () => void;
}

const runMigration = (sqlite: SQLiteDatabase, migrationSql: string): void => {
  try {
    sqlite.exec(migrationSql);
    log.debug('Schema migration completed');
  } catch (error) {
    log.error('Schema migration failed', { error });
    throw error;
  }
};

/**
 * Opens a SQLite database wrapped by drizzle. Pass `:memory:` for an
 * in-process database; file databases get their directory created and WAL
 * journaling.
 */
export const createDatabase = (
  filename: string = IN_MEMORY,
  options: DatabaseOptions = {}
): DatabaseHandle => {
  if (filename !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const sqlite = new Database(filename);
  if (filename !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');

  if (options.migrationSql) {
    try {
      runMigration(sqlite, options.migrationSql);
    } catch (error) {
      sqlite.close();
      throw error;
    }
  }

  return {
    sqlite,
    db: drizzle(sqlite),
    close: () => sqlite.close(),
  };
};
