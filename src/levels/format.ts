import type { LevelAnalysis, PredictionResult } from '../types/index.js';

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Rounded copy of a result for display and export. */
export function toDisplayResult(result: PredictionResult): PredictionResult {
  return {
    metadata: { ...result.metadata, currentPrice: round(result.metadata.currentPrice, 2) },
    analysis: {
      bias: result.analysis.bias,
      confidence: round(result.analysis.confidence, 2),
      bullishWeight: round(result.analysis.bullishWeight, 4),
      bearishWeight: round(result.analysis.bearishWeight, 4),
    },
    weights: { ...result.weights, utilization: round(result.weights.utilization, 4) },
    levels: result.levels.map(
      (level): LevelAnalysis => ({
        ...level,
        price: round(level.price, 2),
        distancePercent: round(level.distancePercent, 3),
        baseWeight: round(level.baseWeight, 4),
        normalizedWeight: round(level.normalizedWeight, 4),
        depreciation: round(level.depreciation, 3),
        effectiveWeight: round(level.effectiveWeight, 4),
      })
    ),
  };
}

export const CSV_HEADER = 'name,price,position,distance_percent,effective_weight,direction';

export function formatCsv(result: PredictionResult): string {
  const display = toDisplayResult(result);
  const lines = [CSV_HEADER];
  for (const level of display.levels) {
    lines.push(
      [
        level.name,
        level.price,
        level.position,
        level.distancePercent,
        level.effectiveWeight,
        level.direction,
      ].join(',')
    );
  }
  return lines.join('\n');
}

export function formatSummary(result: PredictionResult): string {
  const { metadata, analysis, weights } = result;
  const rule = '='.repeat(50);
  const divider = '-'.repeat(50);
  return [
    `PREDICTION ANALYSIS - ${metadata.instrument}`,
    rule,
    `Timestamp: ${metadata.timestamp}`,
    `Current Price: ${metadata.currentPrice.toFixed(2)}`,
    `Data Points: ${metadata.dataPoints}`,
    '',
    'ANALYSIS RESULTS',
    divider,
    `Directional Bias: ${analysis.bias}`,
    `Confidence Score: ${analysis.confidence.toFixed(2)}%`,
    `Bullish Weight: ${analysis.bullishWeight.toFixed(4)}`,
    `Bearish Weight: ${analysis.bearishWeight.toFixed(4)}`,
    '',
    'WEIGHT UTILIZATION',
    divider,
    `Available Levels: ${weights.availableLevels}/${weights.totalLevels}`,
    `Utilization Rate: ${(weights.utilization * 100).toFixed(2)}%`,
  ].join('\n');
}

export function formatLevelTable(result: PredictionResult): string {
  if (result.levels.length === 0) {
    return 'No levels available.';
  }
  return toDisplayResult(result)
    .levels.map(
      (level) =>
        `- ${level.name.padEnd(18)} ${level.price.toFixed(2).padStart(10)} ` +
        `${level.direction.padEnd(7)} dist=${level.distancePercent.toFixed(3)}% ` +
        `w=${level.effectiveWeight.toFixed(4)} [${level.source}]`
    )
    .join('\n');
}
