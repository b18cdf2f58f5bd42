import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createTables } from './schema.js';

/**
 * Open (or create) the job database and initialize its tables.
 * `:memory:` opens a throwaway database.
 */
export function getDb(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  createTables(db);
  return db;
}
