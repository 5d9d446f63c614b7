/**
 * Core type definitions for levelbias
 */

// ============================================================================
// Price Data
// ============================================================================

/** One OHLC bar. `time` is the bar's opening instant in epoch milliseconds. */
export interface Candle {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
}

/** Candles in ascending time order. */
export type PriceHistory = readonly Candle[];

// ============================================================================
// Reference Levels
// ============================================================================

export const LEVEL_NAMES = [
  'daily_midnight',
  'previous_hourly',
  '2h_open',
  '4h_open',
  'ny_open',
  'ny_preopen',
  'chicago_open',
  'chicago_preopen',
  'london_open',
  'prev_day_high',
  'prev_day_low',
  'weekly_open',
  'weekly_high',
  'weekly_low',
  'prev_week_high',
  'prev_week_low',
  'monthly_open',
  'asian_range_high',
  'asian_range_low',
  'london_range_high',
  'london_range_low',
  'ny_range_high',
  'ny_range_low',
  'chicago_range_high',
  'chicago_range_low',
] as const;

export type LevelName = (typeof LEVEL_NAMES)[number];

export type Availability = 'ALWAYS_AVAILABLE' | 'CONDITIONAL';

export type LevelTemplate =
  | {
      name: LevelName;
      baseWeight: number;
      availability: 'ALWAYS_AVAILABLE';
    }
  | {
      name: LevelName;
      baseWeight: number;
      availability: 'CONDITIONAL';
      /** Local hour-of-day from which the level may vote. */
      gatingHour: number;
    };

export type LevelWeights = Partial<Record<LevelName, number>>;

/**
 * Where a level's price came from: its own time window, the latest candle
 * because the window was empty, or the price cache.
 */
export type PriceSource = 'window' | 'fallback' | 'cache';

export interface ResolvedPrice {
  price: number;
  source: PriceSource;
}

export type ResolvedPrices = Map<LevelName, ResolvedPrice>;

// ============================================================================
// Analysis Output
// ============================================================================

export type Bias = 'BULLISH' | 'BEARISH';
export type LevelDirection = 'BULLISH' | 'BEARISH' | 'NEUTRAL';
export type LevelPosition = 'ABOVE' | 'BELOW' | 'AT';

export interface LevelAnalysis {
  name: LevelName;
  type: Availability;
  price: number;
  position: LevelPosition;
  distancePercent: number;
  baseWeight: number;
  normalizedWeight: number;
  depreciation: number;
  effectiveWeight: number;
  direction: LevelDirection;
  source: PriceSource;
}

export interface PredictionResult {
  metadata: {
    instrument: string;
    timezone: string;
    timestamp: string;
    currentPrice: number;
    dataPoints: number;
  };
  analysis: {
    bias: Bias;
    confidence: number;
    bullishWeight: number;
    bearishWeight: number;
  };
  weights: {
    availableLevels: number;
    totalLevels: number;
    utilization: number;
  };
  levels: LevelAnalysis[];
}
