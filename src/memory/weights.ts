import {
  assertValidWeights,
  getDefaultWeights,
  isLevelName,
  resolveCatalogKey,
  toLevelWeights,
} from '../levels/catalog.js';
import type { LevelWeights } from '../types/index.js';
import { openDatabase } from './db.js';
import { diffWeights, recordWeightChange, type WeightChange } from './weight_audit.js';

function ensureLevelWeightsTable(): void {
  const db = openDatabase();
  db.exec(`
    CREATE TABLE IF NOT EXISTS level_weights (
      instrument TEXT NOT NULL,
      level TEXT NOT NULL,
      weight REAL NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (instrument, level)
    );
  `);
}

/** Weights saved for the instrument's catalog, or null when none are stored. */
export function getStoredWeights(instrument: string): LevelWeights | null {
  ensureLevelWeightsTable();
  const db = openDatabase();
  const rows = db
    .prepare('SELECT level, weight FROM level_weights WHERE instrument = ?')
    .all(resolveCatalogKey(instrument)) as Record<string, unknown>[];
  if (rows.length === 0) return null;

  const weights: LevelWeights = {};
  for (const row of rows) {
    const level = String(row.level ?? '');
    if (isLevelName(level)) weights[level] = Number(row.weight ?? 0);
  }
  return weights;
}

/** Stored weights, else configured weights, else catalog defaults. */
export function getWeights(
  instrument: string,
  configured?: Record<string, number>
): LevelWeights {
  return (
    getStoredWeights(instrument) ??
    (configured ? toLevelWeights(configured) : getDefaultWeights(instrument))
  );
}

/**
 * Replace the stored weight map after validating it. Changes are measured
 * against the weights currently in effect (`configured` included). Returns
 * the levels that changed; nothing is written when none did. The new map and
 * its audit entries are written in one transaction.
 */
export function setWeights(
  instrument: string,
  weights: Record<string, number>,
  reason?: string,
  configured?: Record<string, number>
): WeightChange[] {
  const key = resolveCatalogKey(instrument);
  assertValidWeights(key, weights);

  const next = toLevelWeights(weights);
  const changes = diffWeights(getWeights(key, configured), next);
  if (changes.length === 0) return changes;

  const db = openDatabase();
  const upsert = db.prepare(`
    INSERT INTO level_weights (instrument, level, weight, updated_at)
    VALUES (@instrument, @level, @weight, @updatedAt)
    ON CONFLICT(instrument, level) DO UPDATE SET
      weight = excluded.weight,
      updated_at = excluded.updated_at
  `);
  const updatedAt = new Date().toISOString();
  const write = db.transaction((entries: Array<[string, number]>) => {
    for (const [level, weight] of entries) {
      upsert.run({ instrument: key, level, weight, updatedAt });
    }
    recordWeightChange(key, changes, reason);
  });
  write(Object.entries(weights));
  return changes;
}

/**
 * Drop stored weights so the configured weights, else the catalog defaults,
 * apply again.
 */
export function resetWeights(
  instrument: string,
  reason = 'reset to defaults',
  configured?: Record<string, number>
): WeightChange[] {
  const key = resolveCatalogKey(instrument);
  const stored = getStoredWeights(key);
  if (!stored) return [];

  const changes = diffWeights(
    stored,
    configured ? toLevelWeights(configured) : getDefaultWeights(key)
  );
  const db = openDatabase();
  const reset = db.transaction(() => {
    db.prepare('DELETE FROM level_weights WHERE instrument = ?').run(key);
    recordWeightChange(key, changes, reason);
  });
  reset();
  return changes;
}
