import type { CachedLevelPrice, LevelPriceCache } from '../levels/engine.js';
import { checkCacheExpiry } from '../levels/expiry.js';
import { isLevelName, normalizeInstrument } from '../levels/catalog.js';
import type { LevelName, ResolvedPrices } from '../types/index.js';
import { openDatabase } from './db.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PriceCacheEntry {
  instrument: string;
  level: LevelName;
  price: number;
  /** Epoch ms of the analysis that observed the price. */
  recordedAt: number;
  lastAccessed: number;
}

function ensurePriceCacheTable(): void {
  const db = openDatabase();
  db.exec(`
    CREATE TABLE IF NOT EXISTS price_cache (
      instrument TEXT NOT NULL,
      level TEXT NOT NULL,
      price REAL NOT NULL,
      recorded_at INTEGER NOT NULL,
      last_accessed INTEGER NOT NULL,
      PRIMARY KEY (instrument, level)
    );
  `);
}

function rowToEntry(row: Record<string, unknown>): PriceCacheEntry | null {
  const level = String(row.level ?? '');
  if (!isLevelName(level)) return null;
  return {
    instrument: String(row.instrument ?? ''),
    level,
    price: Number(row.price ?? 0),
    recordedAt: Number(row.recorded_at ?? 0),
    lastAccessed: Number(row.last_accessed ?? 0),
  };
}

/** Store window-resolved prices observed at `recordedAt`. Returns rows written. */
export function updatePriceCache(
  instrument: string,
  prices: ResolvedPrices,
  recordedAt: number,
  now: number = Date.now()
): number {
  ensurePriceCacheTable();
  const db = openDatabase();
  const upsert = db.prepare(`
    INSERT INTO price_cache (instrument, level, price, recorded_at, last_accessed)
    VALUES (@instrument, @level, @price, @recordedAt, @now)
    ON CONFLICT(instrument, level) DO UPDATE SET
      price = excluded.price,
      recorded_at = excluded.recorded_at,
      last_accessed = excluded.last_accessed
  `);
  const key = normalizeInstrument(instrument);
  let written = 0;
  const write = db.transaction(() => {
    for (const [level, resolved] of prices) {
      if (resolved.source !== 'window') continue;
      upsert.run({ instrument: key, level, price: resolved.price, recordedAt, now });
      written += 1;
    }
  });
  write();
  return written;
}

export function getCachedPrice(
  instrument: string,
  level: LevelName,
  at: number,
  timeZone: string,
  now: number = Date.now()
): CachedLevelPrice | null {
  ensurePriceCacheTable();
  const db = openDatabase();
  const key = normalizeInstrument(instrument);
  const row = db
    .prepare('SELECT price, recorded_at FROM price_cache WHERE instrument = ? AND level = ?')
    .get(key, level) as Record<string, unknown> | undefined;
  if (!row) return null;

  const check = checkCacheExpiry(level, Number(row.recorded_at ?? 0), at, timeZone);
  if (check.valid) {
    db.prepare(
      'UPDATE price_cache SET last_accessed = ? WHERE instrument = ? AND level = ?'
    ).run(now, key, level);
  }
  return { price: Number(row.price ?? 0), valid: check.valid, reason: check.reason };
}

export function createSqlitePriceCache(instrument: string, timeZone: string): LevelPriceCache {
  return {
    lookup: (level, at) => getCachedPrice(instrument, level, at, timeZone),
  };
}

/** Remove entries not read or written in `days`. Returns rows removed. */
export function cleanupPriceCache(days: number, now: number = Date.now()): number {
  ensurePriceCacheTable();
  const db = openDatabase();
  const result = db
    .prepare('DELETE FROM price_cache WHERE last_accessed < ?')
    .run(now - days * DAY_MS);
  return result.changes;
}

export function clearPriceCache(instrument?: string): number {
  ensurePriceCacheTable();
  const db = openDatabase();
  if (instrument === undefined) {
    return db.prepare('DELETE FROM price_cache').run().changes;
  }
  return db
    .prepare('DELETE FROM price_cache WHERE instrument = ?')
    .run(normalizeInstrument(instrument)).changes;
}

export function listPriceCache(instrument?: string): PriceCacheEntry[] {
  ensurePriceCacheTable();
  const db = openDatabase();
  const rows = db
    .prepare(
      `
        SELECT instrument, level, price, recorded_at, last_accessed
        FROM price_cache
        WHERE (@instrument IS NULL OR instrument = @instrument)
        ORDER BY instrument, level
      `
    )
    .all({
      instrument: instrument === undefined ? null : normalizeInstrument(instrument),
    }) as Record<string, unknown>[];
  return rows.flatMap((row) => rowToEntry(row) ?? []);
}
