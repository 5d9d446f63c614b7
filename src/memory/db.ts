import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.levelbias', 'levelbias.sqlite');
const INSTANCES = new Map<string, Database.Database>();

function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

export function resolveDatabasePath(dbPath?: string): string {
  return dbPath ?? process.env.LEVELBIAS_DB_PATH ?? DEFAULT_DB_PATH;
}

/** One connection per path. Each memory module creates its own tables. */
export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = resolveDatabasePath(dbPath);

  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    return existing;
  }

  ensureDirectory(resolvedPath);

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');

  INSTANCES.set(resolvedPath, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  const resolvedPath = resolveDatabasePath(dbPath);
  const db = INSTANCES.get(resolvedPath);
  if (!db) return;
  db.close();
  INSTANCES.delete(resolvedPath);
}
