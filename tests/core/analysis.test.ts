import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { runAnalysis } from '../../src/core/analysis.js';
import { parseConfig } from '../../src/core/config.js';
import { Logger } from '../../src/core/logger.js';
import { zonedTimeToInstant } from '../../src/core/timezone.js';
import { getCatalog } from '../../src/levels/catalog.js';
import { closeDatabase } from '../../src/memory/db.js';
import { listPriceCache } from '../../src/memory/price_cache.js';
import { getPrediction, listPredictions } from '../../src/memory/predictions.js';
import { setWeights } from '../../src/memory/weights.js';
import type { Candle } from '../../src/types/index.js';
import { bar } from '../helpers/candles.js';

const ny = (day: number, hour: number, minute = 0): number =>
  zonedTimeToInstant({ year: 2025, month: 11, day, hour, minute }, 'America/New_York');

const HISTORY: Candle[] = [
  bar(ny(10, 10), 90, 95, 85, 92),
  bar(ny(14, 12), 92, 99, 91, 97),
  bar(ny(17, 0), 100, 101, 99, 100),
  bar(ny(18, 21), 102, 104, 101, 103),
  bar(ny(19, 0), 103, 103.5, 102.5, 103),
  bar(ny(19, 5), 104, 106, 103, 105),
  bar(ny(19, 9, 30), 105, 108, 104, 107),
  bar(ny(19, 15), 107, 107, 106, 106.5),
];

let lines: string[] = [];
const logger = new Logger('debug', (line) => lines.push(line));

beforeEach(() => {
  lines = [];
  const dir = mkdtempSync(join(tmpdir(), 'levelbias-analysis-'));
  process.env.LEVELBIAS_DB_PATH = join(dir, 'test.sqlite');
});

afterEach(() => {
  closeDatabase();
  delete process.env.LEVELBIAS_DB_PATH;
});

describe('runAnalysis', () => {
  it('analyzes, caches window prices and records the prediction', () => {
    const outcome = runAnalysis(parseConfig({}), { history: HISTORY }, logger);

    expect(outcome.result.metadata.instrument).toBe('US100');
    expect(outcome.predictionId).toBe('US100_2025-11-19_15-00-00');
    expect(outcome.cachedLevels).toBe(18);
    expect(listPriceCache('US100')).toHaveLength(18);
    expect(getPrediction('US100_2025-11-19_15-00-00')).toEqual(outcome.result);
    expect(lines.some((line) => line.includes('[DEBUG] Analyzing 8 candle(s) for US100'))).toBe(true);
  });

  it('uses the configured default instrument and timezone', () => {
    const config = parseConfig({
      engine: { defaultInstrument: 'ES', timezones: { ES: 'America/New_York' } },
    });
    const { result } = runAnalysis(config, { history: HISTORY, save: false }, logger);
    expect(result.metadata.instrument).toBe('ES');
    expect(result.metadata.timezone).toBe('America/New_York');
  });

  it('respects save and cache switches', () => {
    const outcome = runAnalysis(
      parseConfig({}),
      { history: HISTORY, save: false, useCache: false },
      logger
    );
    expect(outcome.predictionId).toBeNull();
    expect(outcome.cachedLevels).toBe(0);
    expect(listPredictions()).toEqual([]);
    expect(listPriceCache()).toEqual([]);
  });

  it('skips the cache when disabled in config', () => {
    const config = parseConfig({ cache: { enabled: false }, predictions: { autoSave: false } });
    const outcome = runAnalysis(config, { history: HISTORY }, logger);
    expect(outcome.cachedLevels).toBe(0);
    expect(outcome.predictionId).toBeNull();
  });

  it('does not record empty analyses', () => {
    const outcome = runAnalysis(parseConfig({}), { history: [] }, logger);
    expect(outcome.result.levels).toEqual([]);
    expect(outcome.predictionId).toBeNull();
  });

  it('analyzes with stored weights', () => {
    const names = getCatalog('US100').map((t) => t.name);
    setWeights('US100', Object.fromEntries(names.map((name) => [name, 1 / names.length])));
    const { result } = runAnalysis(parseConfig({}), { history: HISTORY, save: false }, logger);
    expect(result.levels.every((level) => level.baseWeight === 0.05)).toBe(true);
  });
});
