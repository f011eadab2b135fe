import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  /** Files applied by this call, in order. */
  applied: string[];
  /** Files that were already recorded. */
  skipped: string[];
}

const MIGRATION_FILE = /^\d+_[\w-]+\.sql$/;

export const DEFAULT_MIGRATIONS_DIR = path.join(getPackageRoot(), 'src', 'db', 'migrations');

/** Numbered `.sql` files (`001_init.sql`) in apply order. */
export function listMigrations(dir: string): string[] {
  let files: string[];
  try {
    files = fs.readdirSync(dir);
  } catch (err) {
    throw new DbError(`Cannot read migrations from ${dir}: ${errorMessage(err)}`, { dir });
  }
  return files.filter((f) => MIGRATION_FILE.test(f)).sort();
}

/**
 * Applies every migration not yet recorded in `_migrations`. Each file runs in
 * one transaction with its record, so a failing file leaves nothing behind.
 */
export function runMigrations(db: Database.Database, dir: string = DEFAULT_MIGRATIONS_DIR): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    );
  `);

  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  const recorded = new Set(rows.map((r) => r.name));
  const record = db.prepare('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)');
  const result: MigrationResult = { applied: [], skipped: [] };

  for (const name of listMigrations(dir)) {
    if (recorded.has(name)) {
      result.skipped.push(name);
      continue;
    }

    try {
      const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
      db.transaction(() => {
        db.exec(sql);
        record.run(name, new Date().toISOString());
      })();
    } catch (err) {
      throw new DbError(`Migration ${name} failed: ${errorMessage(err)}`, { migration: name });
    }

    result.applied.push(name);
    logger.info({ migration: name }, 'Migration applied');
  }

  return result;
}
