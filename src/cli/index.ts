#!/usr/bin/env node
import 'dotenv/config';
/**
 * levelbias CLI
 *
 * Directional bias analysis of intraday price history against reference levels.
 */

import { readFileSync, writeFileSync } from 'node:fs';

import { Command } from 'commander';
import { z } from 'zod';

import { VERSION } from '../index.js';
import { runAnalysis } from '../core/analysis.js';
import { loadConfig, resolveTimezone, type LevelBiasConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { parseTimestamp } from '../core/timezone.js';
import { getInstrumentInfo, identifyInstrument } from '../data/instruments.js';
import { loadCsvHistory } from '../data/csv.js';
import {
  getCatalog,
  getDefaultWeights,
  listCatalogKeys,
  resolveCatalogKey,
  sumWeights,
} from '../levels/catalog.js';
import { formatCsv, formatLevelTable, formatSummary, toDisplayResult } from '../levels/format.js';
import { buildDataQualityReport } from '../levels/quality.js';
import { cleanupPriceCache, clearPriceCache, listPriceCache } from '../memory/price_cache.js';
import {
  deletePrediction,
  getPrediction,
  getPredictionStats,
  listPredictions,
} from '../memory/predictions.js';
import {
  listWeightChanges,
  summarizeWeightChanges,
  weightChangesToCsv,
} from '../memory/weight_audit.js';
import { getStoredWeights, getWeights, resetWeights, setWeights } from '../memory/weights.js';

interface AnalyzeCommandOptions {
  instrument?: string;
  timezone?: string;
  timestamp?: string;
  format: string;
  cache: boolean;
  save: boolean;
  quality?: boolean;
}

const WeightFileSchema = z.record(z.string(), z.number());

const program = new Command();
let cachedConfig: LevelBiasConfig | null = null;

function getConfig(): LevelBiasConfig {
  if (!cachedConfig) {
    const { config: path } = program.opts<{ config?: string }>();
    cachedConfig = loadConfig(path);
    if (cachedConfig.memory.dbPath) {
      process.env.LEVELBIAS_DB_PATH = cachedConfig.memory.dbPath;
    }
  }
  return cachedConfig;
}

function getLogger(): Logger {
  return new Logger(getConfig().logging.level);
}

/** Print failures and exit non-zero instead of surfacing a stack trace. */
function guarded<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
      process.exitCode = 1;
    }
  };
}

function parsePositiveInt(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${label} must be a positive integer.`);
  }
  return parsed;
}

program
  .name('levelbias')
  .description('Reference-level directional bias for index futures')
  .version(VERSION)
  .option('-c, --config <path>', 'Config file path');

// ============================================================================
// Analysis
// ============================================================================

program
  .command('analyze <file>')
  .description('Analyze an OHLC CSV file')
  .option('-i, --instrument <code>', 'Instrument code (default: from file name)')
  .option('-z, --timezone <zone>', 'IANA timezone (default: per instrument)')
  .option('-t, --timestamp <iso>', 'Analysis timestamp (default: last candle)')
  .option('-f, --format <format>', 'summary | json | csv', 'summary')
  .option('--no-cache', 'Do not read or refresh the price cache')
  .option('--no-save', 'Do not record the prediction')
  .option('--quality', 'Print a data quality report')
  .action(
    guarded((file: string, options: AnalyzeCommandOptions) => {
      const config = getConfig();
      if (!['summary', 'json', 'csv'].includes(options.format)) {
        throw new Error('Format must be summary, json or csv.');
      }
      const detected = identifyInstrument(file);
      const instrument = options.instrument ?? (detected.matched ? detected.instrument : undefined);
      const history = loadCsvHistory(file);

      const { result, predictionId } = runAnalysis(
        config,
        {
          history,
          instrument,
          timezone: options.timezone,
          timestamp: options.timestamp,
          useCache: options.cache,
          save: options.save && config.predictions.autoSave,
        },
        getLogger()
      );

      if (options.format === 'json') {
        console.log(JSON.stringify(toDisplayResult(result), null, 2));
      } else if (options.format === 'csv') {
        console.log(formatCsv(result));
      } else {
        console.log(formatSummary(result));
        console.log('');
        console.log('LEVELS');
        console.log('-'.repeat(50));
        console.log(formatLevelTable(result));
        if (predictionId) {
          console.log('');
          console.log(`Saved as ${predictionId}`);
        }
      }

      if (options.quality) {
        const report = buildDataQualityReport(result, history);
        console.error('');
        console.error('DATA QUALITY');
        console.error('-'.repeat(50));
        for (const note of report.notes) {
          console.error(`${note.severity === 'warning' ? 'WARN' : 'INFO'} ${note.message}`);
        }
      }
    })
  );

program
  .command('levels [instrument]')
  .description('Show the reference level catalog for an instrument')
  .action(
    guarded((instrument?: string) => {
      const codes = instrument ? [instrument] : listCatalogKeys();
      for (const code of codes) {
        const info = getInstrumentInfo(code);
        console.log(`${info.code} (${info.description}, ${info.timezone})`);
        console.log('─'.repeat(60));
        for (const template of getCatalog(info.code)) {
          const gate =
            template.availability === 'CONDITIONAL' ? ` from ${template.gatingHour}:00` : '';
          console.log(
            `${template.name.padEnd(20)} ${template.baseWeight.toFixed(4)} ${template.availability}${gate}`
          );
        }
        console.log('');
      }
    })
  );

// ============================================================================
// Weights
// ============================================================================

const weights = program.command('weights').description('Level weight management');

weights
  .command('show <instrument>')
  .description('Show effective weights')
  .action(
    guarded((instrument: string) => {
      const config = getConfig();
      const info = getInstrumentInfo(instrument);
      const configured = config.weights[info.catalog];
      const stored = getStoredWeights(instrument);
      const effective = getWeights(instrument, configured);
      const source = stored ? 'stored' : configured ? 'config' : 'defaults';
      console.log(`Weights for ${info.code} (${source})`);
      console.log('─'.repeat(40));
      for (const [level, weight] of Object.entries(effective)) {
        console.log(`${level.padEnd(20)} ${(weight ?? 0).toFixed(4)}`);
      }
      console.log(`${'total'.padEnd(20)} ${sumWeights(effective).toFixed(4)}`);
    })
  );

weights
  .command('set <instrument> <file>')
  .description('Replace weights from a JSON file of level → weight')
  .option('-r, --reason <text>', 'Reason recorded in the change history')
  .action(
    guarded((instrument: string, file: string, options: { reason?: string }) => {
      const parsed = WeightFileSchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')));
      if (!parsed.success) {
        throw new Error('Weights file must be a JSON object of level name to number.');
      }
      const config = getConfig();
      const changes = setWeights(
        instrument,
        parsed.data,
        options.reason,
        config.weights[resolveCatalogKey(instrument)]
      );
      console.log(`Updated ${changes.length} weight(s) for ${resolveCatalogKey(instrument)}.`);
    })
  );

weights
  .command('reset <instrument>')
  .description('Restore configured or default weights')
  .action(
    guarded((instrument: string) => {
      const config = getConfig();
      const changes = resetWeights(
        instrument,
        undefined,
        config.weights[resolveCatalogKey(instrument)]
      );
      console.log(`Reset ${changes.length} weight(s) for ${resolveCatalogKey(instrument)}.`);
    })
  );

weights
  .command('history [instrument]')
  .description('Show weight change history')
  .option('-l, --limit <number>', 'Limit results', '20')
  .option('-d, --days <number>', 'Only changes from the last N days')
  .action(
    guarded((instrument: string | undefined, options: { limit: string; days?: string }) => {
      getConfig();
      const changes = listWeightChanges({
        instrument,
        days: options.days ? parsePositiveInt(options.days, 'Days') : undefined,
        limit: parsePositiveInt(options.limit, 'Limit'),
      });
      const summary = summarizeWeightChanges(instrument);
      console.log(
        `Weight changes: ${summary.totalChanges} across ${summary.levelsChanged} level(s)` +
          (summary.lastChangeAt ? `, last ${summary.lastChangeAt}` : '')
      );
      console.log('─'.repeat(80));
      for (const change of changes) {
        const before = change.oldWeight === null ? '-' : change.oldWeight.toFixed(4);
        console.log(
          `${change.createdAt} | ${change.instrument} | ${change.level} | ${before} → ${change.newWeight.toFixed(4)} | ${change.reason ?? ''}`
        );
      }
    })
  );

weights
  .command('export [instrument]')
  .description('Export weight change history as CSV')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .action(
    guarded((instrument: string | undefined, options: { output?: string }) => {
      getConfig();
      const csv = weightChangesToCsv(
        listWeightChanges({ instrument, limit: 100000 })
      );
      if (options.output) {
        writeFileSync(options.output, `${csv}\n`, 'utf-8');
        console.log(`Wrote ${options.output}`);
      } else {
        console.log(csv);
      }
    })
  );

weights
  .command('defaults <instrument>')
  .description('Show built-in default weights')
  .action(
    guarded((instrument: string) => {
      console.log(JSON.stringify(getDefaultWeights(instrument), null, 2));
    })
  );

// ============================================================================
// Predictions
// ============================================================================

const predictions = program.command('predictions').description('Prediction history');

predictions
  .command('list')
  .description('List recorded predictions')
  .option('-i, --instrument <code>', 'Filter by instrument')
  .option('--from <iso>', 'Earliest data timestamp')
  .option('--to <iso>', 'Latest data timestamp')
  .option('-l, --limit <number>', 'Limit results')
  .action(
    guarded((options: { instrument?: string; from?: string; to?: string; limit?: string }) => {
      const config = getConfig();
      const zone = resolveTimezone(options.instrument ?? config.engine.defaultInstrument, config);
      const bound = (value: string | undefined, label: string): number | undefined => {
        if (value === undefined) return undefined;
        const parsed = parseTimestamp(value, zone);
        if (parsed === null) throw new Error(`Invalid ${label} timestamp: ${value}`);
        return parsed;
      };
      const records = listPredictions({
        instrument: options.instrument,
        from: bound(options.from, 'from'),
        to: bound(options.to, 'to'),
        limit: options.limit
          ? parsePositiveInt(options.limit, 'Limit')
          : config.predictions.historyLimit,
      });

      console.log('Recorded Predictions');
      console.log('─'.repeat(80));
      for (const record of records) {
        console.log(
          `${record.id} | ${record.bias} | ${record.confidence.toFixed(2)}% | ${record.currentPrice.toFixed(2)}`
        );
      }
    })
  );

predictions
  .command('show <id>')
  .description('Show a recorded prediction')
  .option('--json', 'Print the full result as JSON')
  .action(
    guarded((id: string, options: { json?: boolean }) => {
      getConfig();
      const result = getPrediction(id);
      if (!result) {
        console.log(`Prediction not found: ${id}`);
        return;
      }
      if (options.json) {
        console.log(JSON.stringify(toDisplayResult(result), null, 2));
        return;
      }
      console.log(formatSummary(result));
      console.log('');
      console.log(formatLevelTable(result));
    })
  );

predictions
  .command('delete <id>')
  .description('Delete a recorded prediction')
  .action(
    guarded((id: string) => {
      getConfig();
      console.log(deletePrediction(id) ? `Deleted ${id}` : `Prediction not found: ${id}`);
    })
  );

predictions
  .command('stats')
  .description('Prediction history statistics')
  .option('-i, --instrument <code>', 'Filter by instrument')
  .action(
    guarded((options: { instrument?: string }) => {
      getConfig();
      const stats = getPredictionStats(options.instrument);
      console.log('Prediction Stats');
      console.log('─'.repeat(40));
      console.log(`Total: ${stats.total}`);
      console.log(`Bullish: ${stats.bullish}`);
      console.log(`Bearish: ${stats.bearish}`);
      console.log(`Average confidence: ${stats.averageConfidence.toFixed(2)}%`);
      if (stats.firstTimestamp && stats.lastTimestamp) {
        console.log(`Range: ${stats.firstTimestamp} → ${stats.lastTimestamp}`);
      }
      for (const [instrument, count] of Object.entries(stats.byInstrument)) {
        console.log(`  ${instrument}: ${count}`);
      }
    })
  );

// ============================================================================
// Price Cache
// ============================================================================

const cache = program.command('cache').description('Level price cache');

cache
  .command('show [instrument]')
  .description('List cached level prices')
  .action(
    guarded((instrument?: string) => {
      getConfig();
      const entries = listPriceCache(instrument);
      if (entries.length === 0) {
        console.log('Price cache is empty.');
        return;
      }
      for (const entry of entries) {
        console.log(
          `${entry.instrument} | ${entry.level.padEnd(20)} | ${entry.price.toFixed(2)} | ` +
            `${new Date(entry.recordedAt).toISOString()}`
        );
      }
    })
  );

cache
  .command('clear [instrument]')
  .description('Remove cached prices')
  .action(
    guarded((instrument?: string) => {
      getConfig();
      console.log(`Removed ${clearPriceCache(instrument)} cached price(s).`);
    })
  );

cache
  .command('cleanup')
  .description('Remove cached prices not used recently')
  .option('-d, --days <number>', 'Retention days (default: cache.retentionDays)')
  .action(
    guarded((options: { days?: string }) => {
      const config = getConfig();
      const days = options.days
        ? parsePositiveInt(options.days, 'Days')
        : config.cache.retentionDays;
      console.log(`Removed ${cleanupPriceCache(days)} stale cached price(s).`);
    })
  );

// ============================================================================
// Parse and Run
// ============================================================================

program.parse();
