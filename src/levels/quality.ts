import type { LevelName, PredictionResult, PriceHistory, PriceSource } from '../types/index.js';
import { getCatalog } from './catalog.js';

const CRITICAL_LEVELS: readonly LevelName[] = ['daily_midnight', 'ny_open', '4h_open', '2h_open'];
const LOW_COVERAGE_PERCENT = 70;

export interface QualityNote {
  severity: 'info' | 'warning';
  message: string;
}

export interface DataQualityReport {
  coveragePercent: number;
  sources: Record<PriceSource, number>;
  gaps: number;
  notes: QualityNote[];
}

function countGaps(history: PriceHistory): number {
  const first = history[0];
  const second = history[1];
  if (!first || !second) return 0;
  const expected = second.time - first.time;
  let gaps = 0;
  for (let i = 2; i < history.length; i += 1) {
    const current = history[i];
    const previous = history[i - 1];
    if (current && previous && current.time - previous.time !== expected) gaps += 1;
  }
  return gaps;
}

export function buildDataQualityReport(
  result: PredictionResult,
  history: PriceHistory
): DataQualityReport {
  const { availableLevels, totalLevels } = result.weights;
  const coveragePercent = totalLevels > 0 ? (availableLevels / totalLevels) * 100 : 0;
  const sources: Record<PriceSource, number> = { window: 0, fallback: 0, cache: 0 };
  for (const level of result.levels) {
    sources[level.source] += 1;
  }

  const notes: QualityNote[] = [
    {
      severity: 'info',
      message: `Reference level coverage: ${availableLevels}/${totalLevels} (${coveragePercent.toFixed(1)}%)`,
    },
    {
      severity: 'info',
      message: `Price sources: ${sources.window} from history windows, ${sources.fallback} from latest candle, ${sources.cache} from cache`,
    },
  ];

  if (coveragePercent < LOW_COVERAGE_PERCENT) {
    notes.push({
      severity: 'warning',
      message: `Low level coverage (${coveragePercent.toFixed(1)}%). Analysis may be less reliable.`,
    });
  }

  const defined = new Set(getCatalog(result.metadata.instrument).map((t) => t.name));
  const weak = CRITICAL_LEVELS.filter((name) => {
    if (!defined.has(name)) return false;
    const level = result.levels.find((entry) => entry.name === name);
    return !level || level.source === 'fallback';
  });
  if (weak.length > 0) {
    notes.push({
      severity: 'warning',
      message: `Critical levels missing or priced from the latest candle: ${weak.join(', ')}`,
    });
  }

  const gaps = countGaps(history);
  if (gaps > 0) {
    notes.push({
      severity: 'warning',
      message: `Data has ${gaps} time gap(s) (may indicate incomplete data)`,
    });
  }

  return { coveragePercent, sources, gaps, notes };
}
