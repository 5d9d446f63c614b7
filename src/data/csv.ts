import { readFileSync } from 'node:fs';

import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import { parseTimestamp } from '../core/timezone.js';
import type { Candle } from '../types/index.js';

export class CsvFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CsvFormatError';
  }
}

const TIME_COLUMNS = ['time', 'timestamp', 'datetime', 'date'] as const;
const PRICE_COLUMNS = ['open', 'high', 'low', 'close'] as const;
/** Epoch values at or above this are milliseconds, below it seconds. */
const EPOCH_MS_THRESHOLD = 1e11;

const RecordsSchema = z.array(z.record(z.string(), z.string()));
const PriceSchema = z.coerce.number().finite();

export interface CsvLoadOptions {
  /** Zone for timestamps without an offset. Defaults to UTC. */
  timezone?: string;
}

function parseTime(value: string, timeZone: string): number | null {
  if (/^\d+(\.\d+)?$/.test(value)) {
    const epoch = Number(value);
    return epoch >= EPOCH_MS_THRESHOLD ? Math.round(epoch) : Math.round(epoch * 1000);
  }
  return parseTimestamp(value, timeZone);
}

/**
 * Parse OHLC rows into candles sorted by time. Header names are matched
 * case-insensitively; later rows win on duplicate timestamps.
 */
export function parseCsvHistory(text: string, options: CsvLoadOptions = {}): Candle[] {
  const timeZone = options.timezone ?? 'UTC';
  let parsed: unknown;
  try {
    parsed = parse(text, {
      columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CsvFormatError(`Malformed CSV: ${reason}`);
  }

  const records = RecordsSchema.safeParse(parsed);
  if (!records.success) {
    throw new CsvFormatError('Malformed CSV: expected a header row and data rows');
  }
  const rows = records.data;
  const first = rows[0];
  if (!first) return [];

  const timeColumn = TIME_COLUMNS.find((name) => name in first);
  const missing = PRICE_COLUMNS.filter((name) => !(name in first));
  if (!timeColumn || missing.length > 0) {
    const absent = [...(timeColumn ? [] : ['time']), ...missing];
    throw new CsvFormatError(`Missing required columns: ${absent.join(', ')}`);
  }

  const byTime = new Map<number, Candle>();
  rows.forEach((row, index) => {
    const line = index + 2;
    const rawTime = row[timeColumn] ?? '';
    const time = parseTime(rawTime, timeZone);
    if (time === null) {
      throw new CsvFormatError(`Row ${line}: invalid time "${rawTime}"`);
    }
    const prices = PRICE_COLUMNS.map((name) => {
      const value = PriceSchema.safeParse(row[name]);
      if (!value.success || row[name] === '') {
        throw new CsvFormatError(`Row ${line}: invalid ${name} "${row[name] ?? ''}"`);
      }
      return value.data;
    });
    const [open = 0, high = 0, low = 0, close = 0] = prices;
    byTime.set(time, { time, open, high, low, close });
  });

  return [...byTime.values()].sort((a, b) => a.time - b.time);
}

export function loadCsvHistory(path: string, options: CsvLoadOptions = {}): Candle[] {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CsvFormatError(`Cannot read ${path}: ${reason}`);
  }
  return parseCsvHistory(text, options);
}
