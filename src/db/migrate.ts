import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Apply every `*.sql` file in lexical order that is not yet recorded in
 * `_migrations`. Each file runs in its own transaction.
 */
export function runMigrations(db: Database.Database, dir: string = getMigrationsDir()): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  const already = new Set(rows.map((r) => r.name));
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  const applied: string[] = [];
  for (const name of listMigrationFiles(dir)) {
    if (already.has(name)) continue;
    const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
    try {
      db.transaction(() => {
        db.exec(sql);
        record.run(name);
      })();
    } catch (err) {
      throw new DbError(`Migration failed: ${name}`, { migration: name, cause: errorMessage(err) });
    }
    applied.push(name);
    logger.info({ migration: name }, 'Migration applied');
  }

  return { applied, skipped: [...already] };
}
