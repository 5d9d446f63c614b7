import type {
  LevelDirection,
  LevelPosition,
  LevelTemplate,
  PriceSource,
  ResolvedPrices,
} from '../types/index.js';

/** Distance (percent of price) at which a level reaches the weight floor. */
export const DEPRECIATION_RANGE_PERCENT = 5;
export const DEPRECIATION_FLOOR = 0.1;
/** Relative band around a level price treated as "at" the level. */
export const DIRECTION_TOLERANCE = 0.0001;

export interface AvailableLevel {
  template: LevelTemplate;
  price: number;
  source: PriceSource;
}

export interface NormalizedLevel extends AvailableLevel {
  normalizedWeight: number;
}

export interface WeightedLevel extends NormalizedLevel {
  distancePercent: number;
  depreciation: number;
  effectiveWeight: number;
  direction: LevelDirection;
  position: LevelPosition;
}

/**
 * Catalog levels that may vote at `localHour`, in catalog order. A level
 * needs a resolved price; a conditional level also needs its gating hour to
 * have been reached.
 */
export function selectAvailableLevels(
  catalog: readonly LevelTemplate[],
  prices: ResolvedPrices,
  localHour: number
): AvailableLevel[] {
  const available: AvailableLevel[] = [];
  for (const template of catalog) {
    const resolved = prices.get(template.name);
    if (!resolved) continue;
    if (template.availability === 'CONDITIONAL' && localHour < template.gatingHour) continue;
    available.push({ template, price: resolved.price, source: resolved.source });
  }
  return available;
}

export function normalizeWeights(levels: readonly AvailableLevel[]): NormalizedLevel[] {
  const total = levels.reduce((sum, level) => sum + level.template.baseWeight, 0);
  if (total <= 0) {
    return levels.map((level) => ({ ...level, normalizedWeight: 0 }));
  }
  return levels.map((level) => ({
    ...level,
    normalizedWeight: level.template.baseWeight / total,
  }));
}

export function distancePercent(currentPrice: number, levelPrice: number): number {
  if (currentPrice === 0) return 0;
  return Math.abs((currentPrice - levelPrice) / currentPrice) * 100;
}

/** 1.0 at the level, falling linearly to the floor at 5% away. */
export function depreciationFor(distance: number): number {
  if (distance <= 0) return 1;
  if (distance >= DEPRECIATION_RANGE_PERCENT) return DEPRECIATION_FLOOR;
  return 1 - (distance / DEPRECIATION_RANGE_PERCENT) * (1 - DEPRECIATION_FLOOR);
}

export function classifyDirection(
  currentPrice: number,
  levelPrice: number
): { direction: LevelDirection; position: LevelPosition } {
  const tolerance = Math.abs(levelPrice) * DIRECTION_TOLERANCE;
  if (currentPrice > levelPrice + tolerance) {
    return { direction: 'BULLISH', position: 'BELOW' };
  }
  if (currentPrice < levelPrice - tolerance) {
    return { direction: 'BEARISH', position: 'ABOVE' };
  }
  return { direction: 'NEUTRAL', position: 'AT' };
}

export function applyDepreciation(
  levels: readonly NormalizedLevel[],
  currentPrice: number
): WeightedLevel[] {
  return levels.map((level) => {
    const distance = distancePercent(currentPrice, level.price);
    const depreciation = depreciationFor(distance);
    return {
      ...level,
      ...classifyDirection(currentPrice, level.price),
      distancePercent: distance,
      depreciation,
      effectiveWeight: level.normalizedWeight * depreciation,
    };
  });
}
