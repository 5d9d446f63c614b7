import { LEVEL_NAMES, type LevelName, type LevelTemplate, type LevelWeights } from '../types/index.js';

export type CatalogKey = 'US100' | 'ES' | 'UK100';

/** Allowed distance of a configured weight map's sum from 1.0. */
export const WEIGHT_SUM_TOLERANCE = 0.001;

export class WeightConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WeightConfigurationError';
  }
}

export const CATALOG_KEYS: readonly CatalogKey[] = ['US100', 'ES', 'UK100'];

const always = (name: LevelName, baseWeight: number): LevelTemplate =>
  Object.freeze({
    name,
    baseWeight,
    availability: 'ALWAYS_AVAILABLE' as const,
  });

const gated = (name: LevelName, baseWeight: number, gatingHour: number): LevelTemplate =>
  Object.freeze({
    name,
    baseWeight,
    availability: 'CONDITIONAL' as const,
    gatingHour,
  });

const CATALOGS: Readonly<Record<CatalogKey, readonly LevelTemplate[]>> = Object.freeze({
  US100: [
    always('daily_midnight', 0.1339),
    always('previous_hourly', 0.0822),
    always('2h_open', 0.052),
    always('4h_open', 0.065),
    always('ny_open', 0.0779),
    always('ny_preopen', 0.0391),
    always('prev_day_high', 0.026),
    always('prev_day_low', 0.026),
    always('weekly_open', 0.065),
    always('weekly_high', 0.026),
    always('weekly_low', 0.026),
    always('prev_week_high', 0.052),
    always('prev_week_low', 0.052),
    always('monthly_open', 0.0391),
    gated('asian_range_high', 0.0279, 0),
    gated('asian_range_low', 0.0279, 0),
    gated('london_range_high', 0.052, 11),
    gated('london_range_low', 0.052, 11),
    gated('ny_range_high', 0.0391, 14),
    gated('ny_range_low', 0.0391, 14),
  ],
  ES: [
    always('daily_midnight', 0.1339),
    always('previous_hourly', 0.0822),
    always('2h_open', 0.052),
    always('4h_open', 0.065),
    always('chicago_open', 0.0779),
    always('chicago_preopen', 0.0391),
    always('prev_day_high', 0.026),
    always('prev_day_low', 0.026),
    always('weekly_open', 0.065),
    always('weekly_high', 0.026),
    always('weekly_low', 0.026),
    always('prev_week_high', 0.052),
    always('prev_week_low', 0.052),
    always('monthly_open', 0.0391),
    gated('asian_range_high', 0.0279, 0),
    gated('asian_range_low', 0.0279, 0),
    gated('london_range_high', 0.052, 11),
    gated('london_range_low', 0.052, 11),
    gated('chicago_range_high', 0.0391, 14),
    gated('chicago_range_low', 0.0391, 14),
  ],
  // No Asian or NY range levels; the London range votes all day.
  UK100: [
    always('daily_midnight', 0.1339),
    always('previous_hourly', 0.0822),
    always('2h_open', 0.052),
    always('4h_open', 0.065),
    always('london_open', 0.0779),
    always('prev_day_high', 0.026),
    always('prev_day_low', 0.026),
    always('weekly_open', 0.065),
    always('weekly_high', 0.026),
    always('weekly_low', 0.026),
    always('prev_week_high', 0.052),
    always('prev_week_low', 0.052),
    always('monthly_open', 0.0391),
    always('london_range_high', 0.052),
    always('london_range_low', 0.052),
  ],
});

const CATALOG_ALIASES: Record<string, CatalogKey> = {
  US100: 'US100',
  ES: 'ES',
  US500: 'ES',
  UK100: 'UK100',
};

const INSTRUMENT_TIMEZONES: Record<string, string> = {
  US100: 'America/New_York',
  ES: 'America/Chicago',
  US500: 'America/Chicago',
  UK100: 'Europe/London',
  GER40: 'Europe/Berlin',
};

export const DEFAULT_TIMEZONE = 'America/New_York';

export function normalizeInstrument(instrument: string): string {
  return instrument.trim().toUpperCase();
}

/** Catalog an instrument code analyzes with; unknown codes use US100. */
export function resolveCatalogKey(instrument: string): CatalogKey {
  return CATALOG_ALIASES[normalizeInstrument(instrument)] ?? 'US100';
}

export function defaultTimezone(instrument: string): string {
  return INSTRUMENT_TIMEZONES[normalizeInstrument(instrument)] ?? DEFAULT_TIMEZONE;
}

export function listCatalogKeys(): CatalogKey[] {
  return [...CATALOG_KEYS];
}

/**
 * Ordered level templates for an instrument. `weights` replaces base weights
 * by level name; names outside the catalog are ignored.
 */
export function getCatalog(instrument: string, weights?: LevelWeights): readonly LevelTemplate[] {
  const templates = CATALOGS[resolveCatalogKey(instrument)];
  if (!weights) {
    return templates;
  }
  return Object.freeze(
    templates.map((template) => {
      const override = weights[template.name];
      return Object.freeze(override === undefined ? template : { ...template, baseWeight: override });
    })
  );
}

export function getDefaultWeights(instrument: string): LevelWeights {
  const weights: LevelWeights = {};
  for (const template of CATALOGS[resolveCatalogKey(instrument)]) {
    weights[template.name] = template.baseWeight;
  }
  return weights;
}

const LEVEL_NAME_SET: ReadonlySet<string> = new Set(LEVEL_NAMES);

export function isLevelName(name: string): name is LevelName {
  return LEVEL_NAME_SET.has(name);
}

/** Keep the entries of a loose name → weight map that name known levels. */
export function toLevelWeights(weights: Record<string, number>): LevelWeights {
  const result: LevelWeights = {};
  for (const [name, value] of Object.entries(weights)) {
    if (isLevelName(name)) result[name] = value;
  }
  return result;
}

export function sumWeights(weights: LevelWeights): number {
  return Object.values(weights).reduce<number>((sum, value) => sum + (value ?? 0), 0);
}

export function validateWeights(
  instrument: string,
  weights: Record<string, number>
): { valid: boolean; message: string } {
  const expected = new Set<string>(CATALOGS[resolveCatalogKey(instrument)].map((t) => t.name));
  const provided = Object.keys(weights);

  const unknown = provided.filter((name) => !expected.has(name));
  if (unknown.length > 0) {
    return { valid: false, message: `Unknown levels for ${instrument}: ${unknown.join(', ')}` };
  }
  const missing = [...expected].filter((name) => !(name in weights));
  if (missing.length > 0) {
    return { valid: false, message: `Missing levels for ${instrument}: ${missing.join(', ')}` };
  }
  const outOfRange = provided.filter((name) => {
    const value = weights[name];
    return value === undefined || !Number.isFinite(value) || value < 0 || value > 1;
  });
  if (outOfRange.length > 0) {
    return { valid: false, message: `Weights must be between 0 and 1: ${outOfRange.join(', ')}` };
  }

  const total = Object.values(weights).reduce((sum, value) => sum + value, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    return { valid: false, message: `Weights sum to ${total.toFixed(4)}, must be 1.0` };
  }
  return { valid: true, message: 'Weights are valid' };
}

export function assertValidWeights(instrument: string, weights: Record<string, number>): void {
  const check = validateWeights(instrument, weights);
  if (!check.valid) {
    throw new WeightConfigurationError(check.message);
  }
}
