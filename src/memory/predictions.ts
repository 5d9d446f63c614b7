import { z } from 'zod';

import { parseTimestamp } from '../core/timezone.js';
import { normalizeInstrument } from '../levels/catalog.js';
import { LEVEL_NAMES, type PredictionResult } from '../types/index.js';
import { openDatabase } from './db.js';

const LevelAnalysisSchema = z.object({
  name: z.enum(LEVEL_NAMES),
  type: z.enum(['ALWAYS_AVAILABLE', 'CONDITIONAL']),
  price: z.number(),
  position: z.enum(['BELOW', 'ABOVE', 'AT']),
  distancePercent: z.number(),
  baseWeight: z.number(),
  normalizedWeight: z.number(),
  depreciation: z.number(),
  effectiveWeight: z.number(),
  direction: z.enum(['BULLISH', 'BEARISH', 'NEUTRAL']),
  source: z.enum(['window', 'fallback', 'cache']),
});

const PredictionResultSchema = z.object({
  metadata: z.object({
    instrument: z.string(),
    timezone: z.string(),
    timestamp: z.string(),
    currentPrice: z.number(),
    dataPoints: z.number(),
  }),
  analysis: z.object({
    bias: z.enum(['BULLISH', 'BEARISH']),
    confidence: z.number(),
    bullishWeight: z.number(),
    bearishWeight: z.number(),
  }),
  weights: z.object({
    availableLevels: z.number(),
    totalLevels: z.number(),
    utilization: z.number(),
  }),
  levels: z.array(LevelAnalysisSchema),
});

export interface PredictionSummary {
  id: string;
  instrument: string;
  timestamp: string;
  bias: 'BULLISH' | 'BEARISH';
  confidence: number;
  currentPrice: number;
  createdAt: string;
}

export interface PredictionStats {
  total: number;
  bullish: number;
  bearish: number;
  averageConfidence: number;
  byInstrument: Record<string, number>;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
}

export interface ListPredictionsOptions {
  instrument?: string;
  /** Inclusive lower bound on the data timestamp, epoch ms. */
  from?: number;
  /** Inclusive upper bound on the data timestamp, epoch ms. */
  to?: number;
  limit?: number;
}

function ensurePredictionsTable(): void {
  const db = openDatabase();
  db.exec(`
    CREATE TABLE IF NOT EXISTS predictions (
      id TEXT PRIMARY KEY,
      instrument TEXT NOT NULL,
      data_timestamp TEXT NOT NULL,
      data_time INTEGER NOT NULL,
      bias TEXT NOT NULL,
      confidence REAL NOT NULL,
      current_price REAL NOT NULL,
      result_json TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_predictions_instrument ON predictions(instrument, data_time);
  `);
}

/** `US100_2025-11-19_09-30-00` from the result's local data timestamp. */
export function predictionIdFor(result: PredictionResult): string {
  const local = result.metadata.timestamp.slice(0, 19).replace('T', '_').replace(/:/g, '-');
  return `${normalizeInstrument(result.metadata.instrument)}_${local}`;
}

function rowToSummary(row: Record<string, unknown>): PredictionSummary {
  return {
    id: String(row.id ?? ''),
    instrument: String(row.instrument ?? ''),
    timestamp: String(row.data_timestamp ?? ''),
    bias: row.bias === 'BEARISH' ? 'BEARISH' : 'BULLISH',
    confidence: Number(row.confidence ?? 0),
    currentPrice: Number(row.current_price ?? 0),
    createdAt: String(row.created_at ?? ''),
  };
}

/** Store a result under its prediction id, replacing an earlier run of the same bar. */
export function savePrediction(result: PredictionResult): string {
  ensurePredictionsTable();
  const db = openDatabase();
  const id = predictionIdFor(result);
  const dataTime = parseTimestamp(result.metadata.timestamp, result.metadata.timezone) ?? 0;
  db.prepare(
    `
      INSERT INTO predictions (
        id, instrument, data_timestamp, data_time, bias, confidence, current_price, result_json, created_at
      ) VALUES (
        @id, @instrument, @timestamp, @dataTime, @bias, @confidence, @currentPrice, @resultJson, @createdAt
      )
      ON CONFLICT(id) DO UPDATE SET
        bias = excluded.bias,
        confidence = excluded.confidence,
        current_price = excluded.current_price,
        result_json = excluded.result_json,
        created_at = excluded.created_at
    `
  ).run({
    id,
    instrument: normalizeInstrument(result.metadata.instrument),
    timestamp: result.metadata.timestamp,
    dataTime,
    bias: result.analysis.bias,
    confidence: result.analysis.confidence,
    currentPrice: result.metadata.currentPrice,
    resultJson: JSON.stringify(result),
    createdAt: new Date().toISOString(),
  });
  return id;
}

/** Newest data timestamp first. */
export function listPredictions(options: ListPredictionsOptions = {}): PredictionSummary[] {
  ensurePredictionsTable();
  const db = openDatabase();
  const rows = db
    .prepare(
      `
        SELECT id, instrument, data_timestamp, bias, confidence, current_price, created_at
        FROM predictions
        WHERE (@instrument IS NULL OR instrument = @instrument)
          AND (@from IS NULL OR data_time >= @from)
          AND (@to IS NULL OR data_time <= @to)
        ORDER BY data_time DESC, id DESC
        LIMIT @limit
      `
    )
    .all({
      instrument: options.instrument === undefined ? null : normalizeInstrument(options.instrument),
      from: options.from ?? null,
      to: options.to ?? null,
      limit: options.limit ?? 20,
    }) as Record<string, unknown>[];
  return rows.map(rowToSummary);
}

export function getPrediction(id: string): PredictionResult | null {
  ensurePredictionsTable();
  const db = openDatabase();
  const row = db.prepare('SELECT result_json FROM predictions WHERE id = ?').get(id) as
    | Record<string, unknown>
    | undefined;
  if (!row) return null;
  const parsed: unknown = JSON.parse(String(row.result_json ?? 'null'));
  const result = PredictionResultSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export function deletePrediction(id: string): boolean {
  ensurePredictionsTable();
  const db = openDatabase();
  return db.prepare('DELETE FROM predictions WHERE id = ?').run(id).changes > 0;
}

export function getPredictionStats(instrument?: string): PredictionStats {
  ensurePredictionsTable();
  const db = openDatabase();
  const filter = { instrument: instrument === undefined ? null : normalizeInstrument(instrument) };
  const totals = db
    .prepare(
      `
        SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN bias = 'BULLISH' THEN 1 ELSE 0 END) AS bullish,
          SUM(CASE WHEN bias = 'BEARISH' THEN 1 ELSE 0 END) AS bearish,
          AVG(confidence) AS avg_confidence
        FROM predictions
        WHERE (@instrument IS NULL OR instrument = @instrument)
      `
    )
    .get(filter) as Record<string, unknown> | undefined;

  const first = db
    .prepare(
      `
        SELECT data_timestamp FROM predictions
        WHERE (@instrument IS NULL OR instrument = @instrument)
        ORDER BY data_time ASC LIMIT 1
      `
    )
    .get(filter) as Record<string, unknown> | undefined;
  const last = db
    .prepare(
      `
        SELECT data_timestamp FROM predictions
        WHERE (@instrument IS NULL OR instrument = @instrument)
        ORDER BY data_time DESC LIMIT 1
      `
    )
    .get(filter) as Record<string, unknown> | undefined;

  const perInstrument = db
    .prepare(
      `
        SELECT instrument, COUNT(*) AS count FROM predictions
        WHERE (@instrument IS NULL OR instrument = @instrument)
        GROUP BY instrument ORDER BY instrument
      `
    )
    .all(filter) as Record<string, unknown>[];

  const byInstrument: Record<string, number> = {};
  for (const row of perInstrument) {
    byInstrument[String(row.instrument ?? '')] = Number(row.count ?? 0);
  }

  return {
    total: Number(totals?.total ?? 0),
    bullish: Number(totals?.bullish ?? 0),
    bearish: Number(totals?.bearish ?? 0),
    averageConfidence: Number(totals?.avg_confidence ?? 0),
    byInstrument,
    firstTimestamp: first ? String(first.data_timestamp ?? '') : null,
    lastTimestamp: last ? String(last.data_timestamp ?? '') : null,
  };
}
