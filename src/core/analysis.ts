import { PredictionEngine, type LevelPriceCache, type TimestampInput } from '../levels/engine.js';
import {
  getDefaultWeights,
  normalizeInstrument,
  resolveCatalogKey,
  toLevelWeights,
} from '../levels/catalog.js';
import { createSqlitePriceCache, updatePriceCache } from '../memory/price_cache.js';
import { savePrediction } from '../memory/predictions.js';
import { getWeights } from '../memory/weights.js';
import type { LevelWeights, PredictionResult, PriceHistory } from '../types/index.js';
import { resolveTimezone, type LevelBiasConfig } from './config.js';
import type { Logger } from './logger.js';

export interface AnalysisRequest {
  history: PriceHistory;
  instrument?: string;
  timezone?: string;
  timestamp?: TimestampInput | null;
  /** Read and refresh the price cache. Ignored when the cache is disabled. */
  useCache?: boolean;
  /** Defaults to `predictions.autoSave`. */
  save?: boolean;
}

export interface AnalysisOutcome {
  result: PredictionResult;
  predictionId: string | null;
  cachedLevels: number;
}

/** Stored weights, or configured/default weights when the store cannot be read. */
function loadWeights(
  instrument: string,
  configured: Record<string, number> | undefined,
  logger: Logger
): LevelWeights {
  try {
    return getWeights(instrument, configured);
  } catch (err) {
    logger.warn('Stored weights read failed', err);
    return configured ? toLevelWeights(configured) : getDefaultWeights(instrument);
  }
}

/** A cache whose failed lookups are logged and treated as misses. */
function tolerantCache(cache: LevelPriceCache, logger: Logger): LevelPriceCache {
  return {
    lookup(level, at) {
      try {
        return cache.lookup(level, at);
      } catch (err) {
        logger.warn('Price cache read failed', err);
        return null;
      }
    },
  };
}

/**
 * Full analysis run: stored weights, cache merge, engine, cache write-back
 * and prediction history. Persistence failures, reads included, are logged;
 * the result is still returned.
 */
export function runAnalysis(
  config: LevelBiasConfig,
  request: AnalysisRequest,
  logger: Logger
): AnalysisOutcome {
  const instrument = normalizeInstrument(request.instrument ?? config.engine.defaultInstrument);
  const timezone = request.timezone ?? resolveTimezone(instrument, config);
  const useCache = config.cache.enabled && (request.useCache ?? true);
  const configured = config.weights[resolveCatalogKey(instrument)];

  const engine = new PredictionEngine({
    instrument,
    timezone,
    weights: loadWeights(instrument, configured, logger),
    fallbackPolicy: config.engine.fallbackPolicy,
    priceCache: useCache
      ? tolerantCache(createSqlitePriceCache(instrument, timezone), logger)
      : undefined,
  });

  logger.debug(`Analyzing ${request.history.length} candle(s) for ${instrument} in ${timezone}`);
  const { result, at, prices } = engine.run(request.history, { timestamp: request.timestamp });

  let cachedLevels = 0;
  if (useCache && at !== null) {
    try {
      cachedLevels = updatePriceCache(instrument, prices, at);
    } catch (err) {
      logger.warn('Price cache update failed', err);
    }
  }

  let predictionId: string | null = null;
  if ((request.save ?? config.predictions.autoSave) && result.metadata.dataPoints > 0) {
    try {
      predictionId = savePrediction(result);
    } catch (err) {
      logger.warn('Saving prediction failed', err);
    }
  }

  logger.info(
    `${instrument} ${result.analysis.bias} ${result.analysis.confidence.toFixed(2)}% ` +
      `(${result.weights.availableLevels}/${result.weights.totalLevels} levels)`
  );
  return { result, predictionId, cachedLevels };
}

