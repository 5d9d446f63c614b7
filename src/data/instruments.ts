import { basename } from 'node:path';

import {
  defaultTimezone,
  getCatalog,
  normalizeInstrument,
  resolveCatalogKey,
  type CatalogKey,
} from '../levels/catalog.js';

const FILENAME_TOKENS: Record<string, string> = {
  NQ: 'US100',
  US100: 'US100',
  NDX: 'US100',
  NASDAQ: 'US100',
  ES: 'ES',
  SPX: 'ES',
  SP500: 'ES',
  US500: 'ES',
  UK100: 'UK100',
  FTSE: 'UK100',
  GER40: 'GER40',
  DAX: 'GER40',
};

const DESCRIPTIONS: Record<string, string> = {
  US100: 'Nasdaq 100',
  ES: 'S&P 500 E-mini',
  US500: 'S&P 500',
  UK100: 'FTSE 100',
  GER40: 'DAX 40',
};

export interface InstrumentMatch {
  instrument: string;
  timezone: string;
  /** False when no filename token matched and the default was used. */
  matched: boolean;
}

export interface InstrumentInfo {
  code: string;
  description: string;
  timezone: string;
  catalog: CatalogKey;
  levelCount: number;
}

/** Guess the instrument from tokens in a data file name, e.g. `nq_1h_2025.csv`. */
export function identifyInstrument(filename: string): InstrumentMatch {
  const stem = basename(filename).replace(/\.[^.]*$/, '');
  const tokens = stem.toUpperCase().split(/[^A-Z0-9]+/);
  for (const token of tokens) {
    const instrument = FILENAME_TOKENS[token];
    if (instrument) {
      return { instrument, timezone: defaultTimezone(instrument), matched: true };
    }
  }
  return { instrument: 'US100', timezone: defaultTimezone('US100'), matched: false };
}

export function getInstrumentInfo(code: string): InstrumentInfo {
  const normalized = normalizeInstrument(code);
  return {
    code: normalized,
    description: DESCRIPTIONS[normalized] ?? 'Unknown instrument',
    timezone: defaultTimezone(normalized),
    catalog: resolveCatalogKey(normalized),
    levelCount: getCatalog(normalized).length,
  };
}
