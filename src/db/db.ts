import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const MEMORY_DB = ':memory:';

/**
 * A database handle owned by one unit of work (one extractor run, one
 * request). `close()` releases it.
 */
export interface Session {
  db: Database.Database;
  close(): void;
}

export type SessionFactory = () => Session;

export function openDb(dbPath: string): Database.Database {
  const resolved = dbPath === MEMORY_DB ? MEMORY_DB : resolvePath(dbPath);

  if (resolved !== MEMORY_DB) {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  try {
    const db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
    logger.debug({ path: resolved }, 'Database opened');
    return db;
  } catch (err) {
    throw new DbError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Sessions for a file database are independent connections. An in-memory
 * database only exists inside its connection, so every session shares
 * `primary` and closing a session leaves it open.
 */
export function createSessionFactory(dbPath: string, primary: Database.Database): SessionFactory {
  if (dbPath === MEMORY_DB) {
    return () => ({ db: primary, close: () => undefined });
  }
  return () => {
    const db = openDb(dbPath);
    return { db, close: () => db.close() };
  };
}

export function sharedSession(db: Database.Database): SessionFactory {
  return () => ({ db, close: () => undefined });
}
