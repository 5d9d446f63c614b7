import type { Bias } from '../types/index.js';
import type { WeightedLevel } from './weighting.js';

export interface BiasSummary {
  bias: Bias;
  /** 0-100 */
  confidence: number;
  bullishWeight: number;
  bearishWeight: number;
}

/**
 * Sum effective weight per side. NEUTRAL levels do not vote. Ties, including
 * no votes at all, resolve to BULLISH.
 */
export function aggregateBias(levels: readonly WeightedLevel[]): BiasSummary {
  let bullishWeight = 0;
  let bearishWeight = 0;
  for (const level of levels) {
    if (level.direction === 'BULLISH') bullishWeight += level.effectiveWeight;
    else if (level.direction === 'BEARISH') bearishWeight += level.effectiveWeight;
  }

  const total = bullishWeight + bearishWeight;
  const confidence = total > 0 ? (Math.max(bullishWeight, bearishWeight) / total) * 100 : 0;

  return {
    bias: bullishWeight >= bearishWeight ? 'BULLISH' : 'BEARISH',
    confidence,
    bullishWeight,
    bearishWeight,
  };
}

export function utilization(availableCount: number, totalCount: number): number {
  return totalCount > 0 ? availableCount / totalCount : 0;
}
