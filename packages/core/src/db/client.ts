/**
 * SQLite Connection
 *
 * One better-sqlite3 connection per process, shared by every repository.
 * Statements are synchronous, so a transaction never interleaves with
 * another request on the same connection.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../logger.js';
import { initSchema } from './schema.js';

export type DatabaseConnection = Database.Database;

/**
 * Open (or create) the database and ensure the schema.
 * Pass ':memory:' for an isolated in-memory database.
 */
export function openDatabase(path: string): DatabaseConnection {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');
  // Wait on SQLITE_BUSY instead of failing, e.g. while the CLI imports.
  db.pragma('busy_timeout = 5000');

  initSchema(db);
  logger.debug({ path }, 'Database opened');
  return db;
}

export function closeDatabase(db: DatabaseConnection): void {
  if (db.open) {
    db.close();
    logger.debug('Database closed');
  }
}

/**
 * Health check for database connection
 */
export function checkDatabaseHealth(db: DatabaseConnection): boolean {
  try {
    db.prepare('SELECT 1').get();
    return true;
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Database health check failed');
    return false;
  }
}
