/**
 * levelbias - reference-level directional bias analysis
 *
 * Main entry point for the levelbias library.
 */

import { runAnalysis, type AnalysisOutcome, type AnalysisRequest } from './core/analysis.js';
import { loadConfig, type LevelBiasConfig } from './core/config.js';
import { Logger } from './core/logger.js';
import { loadCsvHistory } from './data/csv.js';
import { identifyInstrument } from './data/instruments.js';

// Re-export types
export * from './types/index.js';

export {
  PredictionEngine,
  analyze,
  type AnalyzeOptions,
  type CachedLevelPrice,
  type EngineOptions,
  type FallbackPolicy,
  type LevelPriceCache,
  type PredictionRun,
  type TimestampInput,
} from './levels/engine.js';
export {
  CATALOG_KEYS,
  WEIGHT_SUM_TOLERANCE,
  WeightConfigurationError,
  assertValidWeights,
  defaultTimezone,
  getCatalog,
  getDefaultWeights,
  validateWeights,
  type CatalogKey,
} from './levels/catalog.js';
export { toDisplayResult, formatCsv, formatSummary } from './levels/format.js';
export { buildDataQualityReport, type DataQualityReport } from './levels/quality.js';
export { checkCacheExpiry, type ExpiryCheck } from './levels/expiry.js';
export { CsvFormatError, loadCsvHistory, parseCsvHistory } from './data/csv.js';
export { getInstrumentInfo, identifyInstrument } from './data/instruments.js';
export { ConfigError, loadConfig, parseConfig, type LevelBiasConfig } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { runAnalysis, type AnalysisOutcome, type AnalysisRequest } from './core/analysis.js';

// Version
export const VERSION = '0.1.0';

/**
 * Configured client for programmatic access.
 *
 * @example
 * ```typescript
 * import { LevelBias } from 'levelbias';
 *
 * const client = new LevelBias({ configPath: '~/.levelbias/config.yaml' });
 * const { result } = client.analyzeFile('./data/nq_1h.csv');
 * console.log(result.analysis.bias, result.analysis.confidence);
 * ```
 */
export class LevelBias {
  private readonly configPath?: string;
  private config: LevelBiasConfig | null = null;
  private logger: Logger | null = null;

  constructor(options?: { configPath?: string; logger?: Logger }) {
    this.configPath = options?.configPath;
    this.logger = options?.logger ?? null;
  }

  getConfig(): LevelBiasConfig {
    if (!this.config) {
      const config = loadConfig(this.configPath);
      if (config.memory.dbPath) {
        process.env.LEVELBIAS_DB_PATH = config.memory.dbPath;
      }
      this.config = config;
    }
    return this.config;
  }

  analyze(request: AnalysisRequest): AnalysisOutcome {
    return runAnalysis(this.getConfig(), request, this.getLogger());
  }

  /** Analyze a CSV file; the instrument is taken from the file name unless given. */
  analyzeFile(path: string, request: Omit<AnalysisRequest, 'history'> = {}): AnalysisOutcome {
    const detected = identifyInstrument(path);
    return this.analyze({
      ...request,
      instrument: request.instrument ?? (detected.matched ? detected.instrument : undefined),
      history: loadCsvHistory(path),
    });
  }

  private getLogger(): Logger {
    if (!this.logger) {
      this.logger = new Logger(this.getConfig().logging.level);
    }
    return this.logger;
  }
}
