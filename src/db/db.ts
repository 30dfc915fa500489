import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runMigrations } from './migrate.js';

export type Db = Database.Database;

/**
 * Open a database file (or ':memory:'), apply pragmas and bring the schema
 * up to date. The caller owns the handle and must close it.
 */
export function openDb(dbPath: string): Db {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  let db: Db;
  try {
    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
  } catch (err) {
    throw new DbError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: errorMessage(err),
    });
  }

  try {
    runMigrations(db);
  } catch (err) {
    db.close();
    throw err;
  }

  logger.debug({ path: resolved }, 'Database opened');
  return db;
}
