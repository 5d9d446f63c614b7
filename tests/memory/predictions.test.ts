import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { zonedTimeToInstant } from '../../src/core/timezone.js';
import { PredictionEngine } from '../../src/levels/engine.js';
import { closeDatabase } from '../../src/memory/db.js';
import {
  deletePrediction,
  getPrediction,
  getPredictionStats,
  listPredictions,
  predictionIdFor,
  savePrediction,
} from '../../src/memory/predictions.js';
import type { Candle } from '../../src/types/index.js';
import { bar } from '../helpers/candles.js';

const ny = (day: number, hour: number, minute = 0): number =>
  zonedTimeToInstant({ year: 2025, month: 11, day, hour, minute }, 'America/New_York');

const HISTORY: Candle[] = [
  bar(ny(18, 21), 102, 104, 101, 103),
  bar(ny(19, 0), 103, 103.5, 102.5, 103),
  bar(ny(19, 9, 30), 105, 108, 104, 107),
  bar(ny(19, 15), 107, 107, 106, 106.5),
];

const engine = new PredictionEngine({ instrument: 'US100' });

beforeEach(() => {
  const dir = mkdtempSync(join(tmpdir(), 'levelbias-predictions-'));
  process.env.LEVELBIAS_DB_PATH = join(dir, 'test.sqlite');
});

afterEach(() => {
  closeDatabase();
  delete process.env.LEVELBIAS_DB_PATH;
});

describe('prediction history', () => {
  it('keys predictions by instrument and local data time', () => {
    const result = engine.analyze(HISTORY);
    expect(predictionIdFor(result)).toBe('US100_2025-11-19_15-00-00');
    expect(savePrediction(result)).toBe('US100_2025-11-19_15-00-00');
    expect(getPrediction('US100_2025-11-19_15-00-00')).toEqual(result);
  });

  it('lists newest data first with filters', () => {
    savePrediction(engine.analyze(HISTORY, { timestamp: '2025-11-19T10:00:00' }));
    savePrediction(engine.analyze(HISTORY));
    savePrediction(new PredictionEngine({ instrument: 'ES' }).analyze(HISTORY));

    expect(listPredictions().map((p) => p.id)).toEqual([
      'US100_2025-11-19_15-00-00',
      'ES_2025-11-19_14-00-00',
      'US100_2025-11-19_10-00-00',
    ]);
    expect(listPredictions({ instrument: 'es' }).map((p) => p.id)).toEqual([
      'ES_2025-11-19_14-00-00',
    ]);
    expect(listPredictions({ to: ny(19, 12) }).map((p) => p.id)).toEqual([
      'US100_2025-11-19_10-00-00',
    ]);
    expect(listPredictions({ from: ny(19, 12), limit: 1 }).map((p) => p.id)).toEqual([
      'US100_2025-11-19_15-00-00',
    ]);
  });

  it('replaces a rerun of the same bar', () => {
    savePrediction(engine.analyze(HISTORY));
    savePrediction(engine.analyze(HISTORY));
    expect(listPredictions()).toHaveLength(1);
  });

  it('deletes predictions', () => {
    const id = savePrediction(engine.analyze(HISTORY));
    expect(deletePrediction(id)).toBe(true);
    expect(deletePrediction(id)).toBe(false);
    expect(getPrediction(id)).toBeNull();
  });

  it('summarizes the history', () => {
    const first = engine.analyze(HISTORY, { timestamp: '2025-11-19T10:00:00' });
    const second = engine.analyze(HISTORY);
    savePrediction(first);
    savePrediction(second);

    const stats = getPredictionStats();
    expect(stats.total).toBe(2);
    expect(stats.bullish + stats.bearish).toBe(2);
    expect(stats.averageConfidence).toBeCloseTo(
      (first.analysis.confidence + second.analysis.confidence) / 2,
      8
    );
    expect(stats.byInstrument).toEqual({ US100: 2 });
    expect(stats.firstTimestamp).toBe('2025-11-19T10:00:00-05:00');
    expect(stats.lastTimestamp).toBe('2025-11-19T15:00:00-05:00');
    expect(getPredictionStats('UK100').total).toBe(0);
  });
});
