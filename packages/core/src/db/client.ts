/**
 * SQLite Client
 *
 * Opens a better-sqlite3 connection, wraps it in drizzle and makes sure the
 * tables exist. One handle is shared by every repository of a process.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Sqlite from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { sql } from 'drizzle-orm';
import * as schema from './schema.js';
import { logger } from '../logger.js';

export type Database = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  sqlite: Sqlite.Database;
}

export const IN_MEMORY = ':memory:';

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL,
  email TEXT NOT NULL UNIQUE,
  password TEXT NOT NULL,
  role TEXT NOT NULL DEFAULT 'user' CHECK (role IN ('admin', 'moderator', 'user')),
  refresh_token TEXT,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS contacts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  first_name TEXT NOT NULL,
  last_name TEXT NOT NULL,
  email TEXT NOT NULL UNIQUE,
  phone TEXT,
  birthday TEXT NOT NULL,
  notes TEXT,
  user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS contacts_first_name_idx ON contacts (first_name);
CREATE INDEX IF NOT EXISTS contacts_last_name_idx ON contacts (last_name);
`;

export interface OpenDatabaseOptions {
  /** Log every statement at debug level */
  logQueries?: boolean;
}

/**
 * Open (and if needed create) the database at `filename`.
 * Pass `:memory:` for a throwaway database.
 */
export function openDatabase(filename: string, options: OpenDatabaseOptions = {}): DatabaseHandle {
  if (filename !== IN_MEMORY) {
    mkdirSync(dirname(filename), { recursive: true });
  }

  const sqlite = new Sqlite(filename);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(SCHEMA_DDL);

  const db = drizzle(sqlite, {
    schema,
    logger: options.logQueries
      ? {
          logQuery: (query: string, params: unknown[]) => {
            logger.debug({ query, params }, 'Database query executed');
          },
        }
      : false,
  });

  logger.info({ filename }, 'Database opened');
  return { db, sqlite };
}

/**
 * Close the connection. Safe to call twice.
 */
export function closeDatabase(handle: DatabaseHandle): void {
  if (!handle.sqlite.open) {
    return;
  }
  try {
    handle.sqlite.close();
    logger.info('Database closed');
  } catch (error) {
    logger.error({ error: (error as Error).message }, 'Error closing database');
    throw error;
  }
}

/**
 * Health check for the database connection
 */
export function checkDatabaseHealth(handle: DatabaseHandle): boolean {
  try {
    handle.db.run(sql`SELECT 1`);
    return true;
  } catch (error) {
    logger.error({ error: (error as Error).message }, 'Database health check failed');
    return false;
  }
}
