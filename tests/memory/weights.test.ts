import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { getCatalog, getDefaultWeights, WeightConfigurationError } from '../../src/levels/catalog.js';
import { closeDatabase, openDatabase } from '../../src/memory/db.js';
import {
  diffWeights,
  listWeightChanges,
  summarizeWeightChanges,
  weightChangesToCsv,
} from '../../src/memory/weight_audit.js';
import { getStoredWeights, getWeights, resetWeights, setWeights } from '../../src/memory/weights.js';

function equalWeights(instrument: string): Record<string, number> {
  const names = getCatalog(instrument).map((t) => t.name);
  return Object.fromEntries(names.map((name) => [name, 1 / names.length]));
}

beforeEach(() => {
  const dir = mkdtempSync(join(tmpdir(), 'levelbias-weights-'));
  process.env.LEVELBIAS_DB_PATH = join(dir, 'test.sqlite');
});

afterEach(() => {
  closeDatabase();
  delete process.env.LEVELBIAS_DB_PATH;
});

describe('level weights store', () => {
  it('falls back to configured and then default weights', () => {
    expect(getStoredWeights('US100')).toBeNull();
    expect(getWeights('US100')).toEqual(getDefaultWeights('US100'));
    expect(getWeights('US100', { daily_midnight: 1, unknown: 2 })).toEqual({ daily_midnight: 1 });
  });

  it('stores validated weights and records each change', () => {
    const changes = setWeights('US100', equalWeights('US100'), 'equal split');
    expect(changes).toHaveLength(20);
    expect(changes[0]).toEqual({ level: 'daily_midnight', oldWeight: 0.1339, newWeight: 0.05 });

    expect(getStoredWeights('US100')).toEqual(equalWeights('US100'));
    expect(getWeights('US100', { daily_midnight: 1 })).toEqual(equalWeights('US100'));

    const history = listWeightChanges({ instrument: 'US100' });
    expect(history).toHaveLength(20);
    expect(history.every((entry) => entry.reason === 'equal split')).toBe(true);
    expect(summarizeWeightChanges('US100')).toMatchObject({ totalChanges: 20, levelsChanged: 20 });
  });

  it('records nothing when weights do not change', () => {
    setWeights('UK100', equalWeights('UK100'));
    expect(setWeights('UK100', equalWeights('UK100'))).toEqual([]);
    expect(listWeightChanges({ instrument: 'UK100' })).toHaveLength(15);
  });

  it('filters history by age', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2025-11-01T12:00:00Z'));
    setWeights('UK100', equalWeights('UK100'), 'old split');
    vi.setSystemTime(new Date('2025-11-19T12:00:00Z'));
    resetWeights('UK100');

    expect(listWeightChanges({ instrument: 'UK100', limit: 100 })).toHaveLength(30);
    const recent = listWeightChanges({ instrument: 'UK100', days: 7, limit: 100 });
    expect(recent).toHaveLength(15);
    expect(recent.every((entry) => entry.reason === 'reset to defaults')).toBe(true);
    vi.useRealTimers();
  });

  it('rejects invalid maps without storing them', () => {
    expect(() => setWeights('UK100', { daily_midnight: 1 })).toThrow(WeightConfigurationError);
    expect(getStoredWeights('UK100')).toBeNull();
  });

  it('stores aliases under their catalog', () => {
    setWeights('US500', equalWeights('ES'));
    expect(getStoredWeights('ES')).toEqual(equalWeights('ES'));
    expect(listWeightChanges({ instrument: 'ES' })).toHaveLength(20);
  });

  it('finds history by alias', () => {
    setWeights('US500', equalWeights('ES'), 'alias');
    expect(listWeightChanges({ instrument: 'us500' })).toHaveLength(20);
    expect(summarizeWeightChanges('us500')).toMatchObject({ totalChanges: 20, levelsChanged: 20 });
  });

  it('measures changes against configured weights', () => {
    const configured = equalWeights('ES');
    expect(setWeights('ES', equalWeights('ES'), 'same as config', configured)).toEqual([]);
    expect(getStoredWeights('ES')).toBeNull();

    setWeights('UK100', equalWeights('UK100'), 'equal split');
    expect(resetWeights('UK100', 'back to config', equalWeights('UK100'))).toEqual([]);
    expect(getStoredWeights('UK100')).toBeNull();
  });

  it('leaves weights untouched when the audit write fails', () => {
    listWeightChanges();
    openDatabase().exec(`
      CREATE TRIGGER reject_weight_changes BEFORE INSERT ON weight_changes
      BEGIN
        SELECT RAISE(ABORT, 'audit unavailable');
      END;
    `);

    expect(() => setWeights('UK100', equalWeights('UK100'))).toThrow('audit unavailable');
    expect(getStoredWeights('UK100')).toBeNull();
  });

  it('resets to defaults', () => {
    setWeights('US100', equalWeights('US100'));
    const changes = resetWeights('US100');
    expect(changes).toHaveLength(20);
    expect(changes[0]).toEqual({ level: 'daily_midnight', oldWeight: 0.05, newWeight: 0.1339 });
    expect(getStoredWeights('US100')).toBeNull();
    expect(resetWeights('US100')).toEqual([]);
  });
});

describe('weight audit', () => {
  it('ignores differences at or below 1e-5', () => {
    expect(
      diffWeights({ daily_midnight: 0.1, weekly_open: 0.2 }, { daily_midnight: 0.100001, weekly_open: 0.3 })
    ).toEqual([{ level: 'weekly_open', oldWeight: 0.2, newWeight: 0.3 }]);
    expect(diffWeights({}, { monthly_open: 0.1 })).toEqual([
      { level: 'monthly_open', oldWeight: null, newWeight: 0.1 },
    ]);
  });

  it('exports changes as CSV', () => {
    expect(
      weightChangesToCsv([
        {
          id: 1,
          instrument: 'US100',
          level: 'daily_midnight',
          oldWeight: null,
          newWeight: 0.2,
          reason: 'tuned, after review',
          createdAt: '2025-11-19T15:00:00.000Z',
        },
      ])
    ).toBe(
      'created_at,instrument,level,old_weight,new_weight,reason\n' +
        '2025-11-19T15:00:00.000Z,US100,daily_midnight,,0.2,"tuned, after review"'
    );
  });
});
