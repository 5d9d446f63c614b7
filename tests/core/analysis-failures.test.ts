import { describe, it, expect, vi } from 'vitest';

vi.mock('../../src/memory/weights.js', () => ({
  getWeights: () => {
    throw new Error('database is locked');
  },
}));

vi.mock('../../src/memory/price_cache.js', () => ({
  createSqlitePriceCache: () => ({
    lookup: () => {
      throw new Error('database is locked');
    },
  }),
  updatePriceCache: () => {
    throw new Error('database is locked');
  },
}));

vi.mock('../../src/memory/predictions.js', () => ({
  savePrediction: () => {
    throw new Error('disk I/O error');
  },
}));

import { runAnalysis } from '../../src/core/analysis.js';
import { parseConfig } from '../../src/core/config.js';
import { Logger } from '../../src/core/logger.js';
import { flat } from '../helpers/candles.js';

const HISTORY = [flat(Date.UTC(2025, 10, 19, 15), 100)];

function capture(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger('warn', (line) => lines.push(line)), lines };
}

describe('runAnalysis persistence failures', () => {
  it('logs failed writes and still returns the result', () => {
    const { logger, lines } = capture();
    const outcome = runAnalysis(parseConfig({}), { history: HISTORY, useCache: true }, logger);

    expect(outcome.result.metadata.dataPoints).toBe(1);
    expect(outcome.predictionId).toBeNull();
    expect(outcome.cachedLevels).toBe(0);
    expect(lines.at(-2)).toContain('[WARN] Price cache update failed: Error: database is locked');
    expect(lines.at(-1)).toContain('[WARN] Saving prediction failed: Error: disk I/O error');
  });

  it('treats unreadable cache entries as misses', () => {
    const { logger, lines } = capture();
    const { result } = runAnalysis(parseConfig({}), { history: HISTORY, save: false }, logger);

    expect(result.levels.length).toBeGreaterThan(0);
    expect(result.levels.some((level) => level.source === 'cache')).toBe(false);
    const readFailures = lines.filter((line) =>
      line.includes('[WARN] Price cache read failed: Error: database is locked')
    );
    expect(readFailures.length).toBeGreaterThan(0);
  });

  it('falls back to configured or default weights when stored weights cannot be read', () => {
    const { logger, lines } = capture();
    const { result } = runAnalysis(
      parseConfig({ cache: { enabled: false } }),
      { history: HISTORY, save: false },
      logger
    );

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[WARN] Stored weights read failed: Error: database is locked');
    expect(result.levels.find((level) => level.name === 'daily_midnight')?.baseWeight).toBe(0.1339);
  });
});
