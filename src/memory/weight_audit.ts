import { isLevelName, resolveCatalogKey } from '../levels/catalog.js';
import type { LevelName, LevelWeights } from '../types/index.js';
import { openDatabase } from './db.js';

/** Weight differences at or below this are not recorded. */
export const WEIGHT_CHANGE_EPSILON = 1e-5;

export interface WeightChange {
  level: LevelName;
  oldWeight: number | null;
  newWeight: number;
}

export interface WeightChangeRecord extends WeightChange {
  id: number;
  instrument: string;
  reason: string | null;
  createdAt: string;
}

export interface WeightChangeSummary {
  totalChanges: number;
  levelsChanged: number;
  lastChangeAt: string | null;
}

function ensureWeightChangesTable(): void {
  const db = openDatabase();
  db.exec(`
    CREATE TABLE IF NOT EXISTS weight_changes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      instrument TEXT NOT NULL,
      level TEXT NOT NULL,
      old_weight REAL,
      new_weight REAL NOT NULL,
      reason TEXT,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_weight_changes_instrument ON weight_changes(instrument, created_at);
  `);
}

function rowToChange(row: Record<string, unknown>): WeightChangeRecord | null {
  const level = String(row.level ?? '');
  if (!isLevelName(level)) return null;
  return {
    id: Number(row.id ?? 0),
    instrument: String(row.instrument ?? ''),
    level,
    oldWeight: row.old_weight == null ? null : Number(row.old_weight),
    newWeight: Number(row.new_weight ?? 0),
    reason: row.reason == null ? null : String(row.reason),
    createdAt: String(row.created_at ?? ''),
  };
}

/** Levels in `next` whose weight differs from `previous`. */
export function diffWeights(previous: LevelWeights, next: LevelWeights): WeightChange[] {
  const changes: WeightChange[] = [];
  for (const [level, newWeight] of Object.entries(next)) {
    if (newWeight === undefined || !isLevelName(level)) continue;
    const oldWeight = previous[level] ?? null;
    if (oldWeight !== null && Math.abs(oldWeight - newWeight) <= WEIGHT_CHANGE_EPSILON) continue;
    changes.push({ level, oldWeight, newWeight });
  }
  return changes;
}

export function recordWeightChange(
  instrument: string,
  changes: readonly WeightChange[],
  reason?: string
): void {
  if (changes.length === 0) return;
  ensureWeightChangesTable();
  const db = openDatabase();
  const insert = db.prepare(`
    INSERT INTO weight_changes (instrument, level, old_weight, new_weight, reason, created_at)
    VALUES (@instrument, @level, @oldWeight, @newWeight, @reason, @createdAt)
  `);
  const createdAt = new Date().toISOString();
  const write = db.transaction((rows: readonly WeightChange[]) => {
    for (const change of rows) {
      insert.run({
        instrument,
        level: change.level,
        oldWeight: change.oldWeight,
        newWeight: change.newWeight,
        reason: reason ?? null,
        createdAt,
      });
    }
  });
  write(changes);
}

export interface ListWeightChangesOptions {
  /** Any code or alias; matched on its catalog key. */
  instrument?: string;
  /** Only changes made within this many days. */
  days?: number;
  limit?: number;
}

export function listWeightChanges(options: ListWeightChangesOptions = {}): WeightChangeRecord[] {
  ensureWeightChangesTable();
  const db = openDatabase();
  const rows = db
    .prepare(
      `
        SELECT id, instrument, level, old_weight, new_weight, reason, created_at
        FROM weight_changes
        WHERE (@instrument IS NULL OR instrument = @instrument)
          AND (@since IS NULL OR created_at >= @since)
        ORDER BY created_at DESC, id DESC
        LIMIT @limit
      `
    )
    .all({
      instrument: options.instrument === undefined ? null : resolveCatalogKey(options.instrument),
      since:
        options.days === undefined
          ? null
          : new Date(Date.now() - options.days * 24 * 60 * 60 * 1000).toISOString(),
      limit: options.limit ?? 50,
    }) as Record<string, unknown>[];
  return rows.flatMap((row) => rowToChange(row) ?? []);
}

export function summarizeWeightChanges(instrument?: string): WeightChangeSummary {
  ensureWeightChangesTable();
  const db = openDatabase();
  const row = db
    .prepare(
      `
        SELECT COUNT(*) AS total, COUNT(DISTINCT level) AS levels, MAX(created_at) AS last_change
        FROM weight_changes
        WHERE (@instrument IS NULL OR instrument = @instrument)
      `
    )
    .get({
      instrument: instrument === undefined ? null : resolveCatalogKey(instrument),
    }) as Record<string, unknown> | undefined;
  return {
    totalChanges: Number(row?.total ?? 0),
    levelsChanged: Number(row?.levels ?? 0),
    lastChangeAt: row?.last_change == null ? null : String(row.last_change),
  };
}

function csvField(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function weightChangesToCsv(changes: readonly WeightChangeRecord[]): string {
  const lines = ['created_at,instrument,level,old_weight,new_weight,reason'];
  for (const change of changes) {
    lines.push(
      [
        change.createdAt,
        change.instrument,
        change.level,
        change.oldWeight,
        change.newWeight,
        change.reason,
      ]
        .map(csvField)
        .join(',')
    );
  }
  return lines.join('\n');
}
