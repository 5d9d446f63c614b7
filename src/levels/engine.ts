/**
 * Prediction Engine
 *
 * Resolves reference level prices, selects the levels that may vote at the
 * analysis instant, weights them and aggregates the vote into a bias. Every
 * run works on fresh per-level state built from the frozen catalog.
 */

import { formatZonedIso, parseTimestamp, toZoned } from '../core/timezone.js';
import type {
  LevelAnalysis,
  LevelName,
  LevelTemplate,
  LevelWeights,
  PredictionResult,
  PriceHistory,
  ResolvedPrices,
} from '../types/index.js';
import { aggregateBias, utilization } from './aggregate.js';
import { defaultTimezone, getCatalog, normalizeInstrument } from './catalog.js';
import { resolveLevelPrices } from './resolver.js';
import {
  applyDepreciation,
  normalizeWeights,
  selectAvailableLevels,
  type WeightedLevel,
} from './weighting.js';

/**
 * `latest` keeps the latest-candle price for levels whose window was empty;
 * `omit` leaves them unresolved so they cannot vote.
 */
export type FallbackPolicy = 'latest' | 'omit';

export type TimestampInput = string | number | Date;

export interface CachedLevelPrice {
  price: number;
  valid: boolean;
  reason: string;
}

/**
 * Source of previously observed level prices. Consulted only for levels the
 * current history could not price from their own window.
 */
export interface LevelPriceCache {
  lookup(level: LevelName, at: number): CachedLevelPrice | null;
}

export interface EngineOptions {
  instrument?: string;
  timezone?: string;
  weights?: LevelWeights;
  fallbackPolicy?: FallbackPolicy;
  priceCache?: LevelPriceCache;
  now?: () => number;
}

export interface AnalyzeOptions {
  timestamp?: TimestampInput | null;
}

export interface PredictionRun {
  result: PredictionResult;
  /** Analysis instant, or null when the history was empty. */
  at: number | null;
  prices: ResolvedPrices;
}

function toLevelAnalysis(level: WeightedLevel): LevelAnalysis {
  return {
    name: level.template.name,
    type: level.template.availability,
    price: level.price,
    position: level.position,
    distancePercent: level.distancePercent,
    baseWeight: level.template.baseWeight,
    normalizedWeight: level.normalizedWeight,
    depreciation: level.depreciation,
    effectiveWeight: level.effectiveWeight,
    direction: level.direction,
    source: level.source,
  };
}

export class PredictionEngine {
  readonly instrument: string;
  readonly timezone: string;
  readonly catalog: readonly LevelTemplate[];
  private readonly fallbackPolicy: FallbackPolicy;
  private readonly priceCache?: LevelPriceCache;
  private readonly now: () => number;

  constructor(options: EngineOptions = {}) {
    this.instrument = normalizeInstrument(options.instrument ?? 'US100');
    this.timezone = options.timezone ?? defaultTimezone(this.instrument);
    this.catalog = getCatalog(this.instrument, options.weights);
    this.fallbackPolicy = options.fallbackPolicy ?? 'latest';
    this.priceCache = options.priceCache;
    this.now = options.now ?? Date.now;
  }

  analyze(history: PriceHistory, options: AnalyzeOptions = {}): PredictionResult {
    return this.run(history, options).result;
  }

  run(history: PriceHistory, options: AnalyzeOptions = {}): PredictionRun {
    const last = history[history.length - 1];
    const requested = this.parseTimestamp(options.timestamp);
    if (!last) {
      return {
        result: this.emptyResult(requested ?? this.now()),
        at: null,
        prices: new Map(),
      };
    }

    const at = requested ?? last.time;
    const prices = resolveLevelPrices(history, this.catalog, { at, timezone: this.timezone });
    if (this.fallbackPolicy === 'omit') {
      for (const [name, resolved] of prices) {
        if (resolved.source === 'fallback') prices.delete(name);
      }
    }
    this.mergeCachedPrices(prices, at);

    const available = selectAvailableLevels(
      this.catalog,
      prices,
      toZoned(at, this.timezone).hour
    );
    if (available.length === 0) {
      return { result: this.emptyResult(at), at, prices };
    }

    const currentPrice = last.close;
    const weighted = applyDepreciation(normalizeWeights(available), currentPrice);
    const summary = aggregateBias(weighted);

    return {
      at,
      prices,
      result: {
        metadata: {
          instrument: this.instrument,
          timezone: this.timezone,
          timestamp: formatZonedIso(at, this.timezone),
          currentPrice,
          dataPoints: history.length,
        },
        analysis: summary,
        weights: {
          availableLevels: weighted.length,
          totalLevels: this.catalog.length,
          utilization: utilization(weighted.length, this.catalog.length),
        },
        levels: weighted.map(toLevelAnalysis),
      },
    };
  }

  private parseTimestamp(input: TimestampInput | null | undefined): number | null {
    if (input === undefined || input === null) return null;
    if (input instanceof Date) {
      const time = input.getTime();
      return Number.isFinite(time) ? time : null;
    }
    if (typeof input === 'number') {
      return Number.isFinite(input) ? input : null;
    }
    return parseTimestamp(input, this.timezone);
  }

  /** Cached prices fill unresolved or fallback-priced levels only. */
  private mergeCachedPrices(prices: ResolvedPrices, at: number): void {
    if (!this.priceCache) return;
    for (const template of this.catalog) {
      const current = prices.get(template.name);
      if (current?.source === 'window') continue;
      const cached = this.priceCache.lookup(template.name, at);
      if (cached?.valid) {
        prices.set(template.name, { price: cached.price, source: 'cache' });
      }
    }
  }

  private emptyResult(at: number): PredictionResult {
    return {
      metadata: {
        instrument: this.instrument,
        timezone: this.timezone,
        timestamp: formatZonedIso(at, this.timezone),
        currentPrice: 0,
        dataPoints: 0,
      },
      analysis: {
        bias: 'BULLISH',
        confidence: 0,
        bullishWeight: 0,
        bearishWeight: 0,
      },
      weights: {
        availableLevels: 0,
        totalLevels: this.catalog.length,
        utilization: 0,
      },
      levels: [],
    };
  }
}

export function analyze(
  history: PriceHistory,
  instrument: string,
  timezone?: string,
  timestamp?: TimestampInput | null
): PredictionResult {
  return new PredictionEngine({ instrument, timezone }).analyze(history, { timestamp });
}
