import { describe, it, expect } from 'vitest';

import {
  assertValidWeights,
  defaultTimezone,
  getCatalog,
  getDefaultWeights,
  resolveCatalogKey,
  sumWeights,
  toLevelWeights,
  validateWeights,
  WeightConfigurationError,
} from '../../src/levels/catalog.js';

function defaultWeightMap(instrument: string): Record<string, number> {
  return Object.fromEntries(getCatalog(instrument).map((t) => [t.name, t.baseWeight]));
}

function completeWeights(instrument: string): Record<string, number> {
  const names = getCatalog(instrument).map((t) => t.name);
  const each = 1 / names.length;
  return Object.fromEntries(names.map((name) => [name, each]));
}

describe('level catalogs', () => {
  it('defines 20 levels for US100 and ES and 15 for UK100', () => {
    expect(getCatalog('US100')).toHaveLength(20);
    expect(getCatalog('ES')).toHaveLength(20);
    expect(getCatalog('UK100')).toHaveLength(15);
  });

  it('gates session range levels by local hour', () => {
    const gates = getCatalog('US100').flatMap((t) =>
      t.availability === 'CONDITIONAL' ? [[t.name, t.gatingHour]] : []
    );
    expect(gates).toEqual([
      ['asian_range_high', 0],
      ['asian_range_low', 0],
      ['london_range_high', 11],
      ['london_range_low', 11],
      ['ny_range_high', 14],
      ['ny_range_low', 14],
    ]);
  });

  it('uses Chicago session levels for ES', () => {
    const names = getCatalog('ES').map((t) => t.name);
    expect(names).toContain('chicago_open');
    expect(names).toContain('chicago_range_high');
    expect(names).not.toContain('ny_open');
  });

  it('has no conditional levels for UK100', () => {
    const catalog = getCatalog('UK100');
    expect(catalog.every((t) => t.availability === 'ALWAYS_AVAILABLE')).toBe(true);
    expect(catalog.map((t) => t.name)).not.toContain('asian_range_high');
  });

  it('resolves aliases and unknown instruments', () => {
    expect(resolveCatalogKey(' us500 ')).toBe('ES');
    expect(resolveCatalogKey('GER40')).toBe('US100');
    expect(resolveCatalogKey('BTC')).toBe('US100');
    expect(defaultTimezone('es')).toBe('America/Chicago');
    expect(defaultTimezone('GER40')).toBe('Europe/Berlin');
    expect(defaultTimezone('BTC')).toBe('America/New_York');
  });

  it('returns frozen templates and overrides weights on a copy', () => {
    const base = getCatalog('US100');
    expect(Object.isFrozen(base)).toBe(true);
    expect(Object.isFrozen(base[0])).toBe(true);

    const custom = getCatalog('US100', { daily_midnight: 0.5 });
    expect(custom[0]?.baseWeight).toBe(0.5);
    expect(getCatalog('US100')[0]?.baseWeight).toBe(0.1339);
  });

  it('sums default weights', () => {
    expect(sumWeights(getDefaultWeights('US100'))).toBeCloseTo(1.0002, 10);
    expect(sumWeights(getDefaultWeights('UK100'))).toBeCloseTo(0.8271, 10);
  });

  it('drops unknown names when converting weight maps', () => {
    expect(toLevelWeights({ daily_midnight: 0.2, bogus: 0.8 })).toEqual({ daily_midnight: 0.2 });
  });
});

describe('validateWeights', () => {
  it('accepts complete maps summing to one within tolerance', () => {
    expect(validateWeights('US100', completeWeights('US100')).valid).toBe(true);
    expect(validateWeights('US100', defaultWeightMap('US100')).valid).toBe(true);
  });

  it('rejects unknown levels', () => {
    const weights = { ...completeWeights('UK100'), ny_open: 0 };
    expect(validateWeights('UK100', weights)).toEqual({
      valid: false,
      message: 'Unknown levels for UK100: ny_open',
    });
  });

  it('rejects incomplete maps', () => {
    const { monthly_open: _dropped, ...rest } = completeWeights('UK100');
    expect(validateWeights('UK100', rest)).toEqual({
      valid: false,
      message: 'Missing levels for UK100: monthly_open',
    });
  });

  it('rejects sums off by more than 0.001', () => {
    const check = validateWeights('UK100', defaultWeightMap('UK100'));
    expect(check).toEqual({ valid: false, message: 'Weights sum to 0.8271, must be 1.0' });
    expect(() => assertValidWeights('UK100', defaultWeightMap('UK100'))).toThrow(
      WeightConfigurationError
    );
  });

  it('rejects weights outside 0..1', () => {
    const weights = { ...completeWeights('UK100'), daily_midnight: -0.1 };
    expect(validateWeights('UK100', weights).message).toBe(
      'Weights must be between 0 and 1: daily_midnight'
    );
  });
});
