/**
 * Level Price Resolver
 *
 * Slices the price history into the time windows each reference level is
 * defined over and reduces every window to one price. Windows are computed
 * around the analysis instant in the instrument's timezone; the Chicago
 * session levels are always computed on Chicago time.
 *
 * An empty window degrades to the latest candle (source `fallback`) so a
 * non-empty history always prices every catalog level.
 */

import {
  addDays,
  toZoned,
  zonedTimeToInstant,
  type CivilDate,
} from '../core/timezone.js';
import type {
  Candle,
  LevelName,
  LevelTemplate,
  PriceHistory,
  ResolvedPrice,
  ResolvedPrices,
} from '../types/index.js';

const CHICAGO_TIMEZONE = 'America/Chicago';

/** Rows back from the last candle, assuming one-minute bars. */
const TWO_HOUR_ROWS = 120;
const FOUR_HOUR_ROWS = 240;

export interface TimeWindow {
  start: number;
  /** Exclusive; open-ended windows run to the end of the history. */
  end?: number;
}

interface SessionClock {
  at(dayOffset: number, hour: number, minute?: number): number;
  weekStart(weeksBack: number): number;
  monthStart(): number;
}

interface Clocks {
  local: SessionClock;
  chicago: SessionClock;
}

type LevelRule =
  | { kind: 'first_open'; window: (clocks: Clocks) => TimeWindow }
  | { kind: 'max_high'; window: (clocks: Clocks) => TimeWindow }
  | { kind: 'min_low'; window: (clocks: Clocks) => TimeWindow }
  | { kind: 'rows_back'; rows: number }
  | { kind: 'previous_candle' };

function createClock(instant: number, timeZone: string): SessionClock {
  const zoned = toZoned(instant, timeZone);
  const today: CivilDate = { year: zoned.year, month: zoned.month, day: zoned.day };
  const at = (dayOffset: number, hour: number, minute = 0): number =>
    zonedTimeToInstant({ ...addDays(today, dayOffset), hour, minute }, timeZone);
  return {
    at,
    weekStart: (weeksBack) => at(-zoned.weekday - 7 * weeksBack, 0),
    monthStart: () => zonedTimeToInstant({ year: today.year, month: today.month, day: 1 }, timeZone),
  };
}

const openWindow = (window: (clocks: Clocks) => TimeWindow): LevelRule => ({ kind: 'first_open', window });
const highWindow = (window: (clocks: Clocks) => TimeWindow): LevelRule => ({ kind: 'max_high', window });
const lowWindow = (window: (clocks: Clocks) => TimeWindow): LevelRule => ({ kind: 'min_low', window });

const currentDay = ({ local }: Clocks): TimeWindow => ({ start: local.at(0, 0) });
const previousDay = ({ local }: Clocks): TimeWindow => ({ start: local.at(-1, 0), end: local.at(0, 0) });
const currentWeek = ({ local }: Clocks): TimeWindow => ({ start: local.weekStart(0) });
const previousWeek = ({ local }: Clocks): TimeWindow => ({
  start: local.weekStart(1),
  end: local.weekStart(0),
});
const asianRange = ({ local }: Clocks): TimeWindow => ({ start: local.at(-1, 20), end: local.at(0, 0) });
const londonRange = ({ local }: Clocks): TimeWindow => ({ start: local.at(0, 3), end: local.at(0, 11) });
const nyRange = ({ local }: Clocks): TimeWindow => ({ start: local.at(0, 9, 30), end: local.at(0, 14) });
const chicagoRange = ({ chicago }: Clocks): TimeWindow => ({
  start: chicago.at(0, 8, 30),
  end: chicago.at(0, 14),
});

const LEVEL_RULES: Record<LevelName, LevelRule> = {
  daily_midnight: openWindow(currentDay),
  previous_hourly: { kind: 'previous_candle' },
  '2h_open': { kind: 'rows_back', rows: TWO_HOUR_ROWS },
  '4h_open': { kind: 'rows_back', rows: FOUR_HOUR_ROWS },
  ny_open: openWindow(({ local }) => ({ start: local.at(0, 9, 30), end: local.at(0, 16) })),
  ny_preopen: openWindow(({ local }) => ({ start: local.at(0, 4), end: local.at(0, 9, 30) })),
  chicago_open: openWindow(({ chicago }) => ({
    start: chicago.at(0, 8, 30),
    end: chicago.at(0, 15),
  })),
  chicago_preopen: openWindow(({ chicago }) => ({
    start: chicago.at(-1, 17),
    end: chicago.at(0, 8, 30),
  })),
  london_open: openWindow(({ local }) => ({ start: local.at(0, 8) })),
  prev_day_high: highWindow(previousDay),
  prev_day_low: lowWindow(previousDay),
  weekly_open: openWindow(currentWeek),
  weekly_high: highWindow(currentWeek),
  weekly_low: lowWindow(currentWeek),
  prev_week_high: highWindow(previousWeek),
  prev_week_low: lowWindow(previousWeek),
  monthly_open: openWindow(({ local }) => ({ start: local.monthStart() })),
  asian_range_high: highWindow(asianRange),
  asian_range_low: lowWindow(asianRange),
  london_range_high: highWindow(londonRange),
  london_range_low: lowWindow(londonRange),
  ny_range_high: highWindow(nyRange),
  ny_range_low: lowWindow(nyRange),
  chicago_range_high: highWindow(chicagoRange),
  chicago_range_low: lowWindow(chicagoRange),
};

/** Index of the first candle at or after `instant`. */
function lowerBound(history: PriceHistory, instant: number): number {
  let lo = 0;
  let hi = history.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const candle = history[mid];
    if (candle !== undefined && candle.time < instant) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export function sliceWindow(history: PriceHistory, window: TimeWindow): PriceHistory {
  const from = lowerBound(history, window.start);
  const to = window.end === undefined ? history.length : lowerBound(history, window.end);
  return history.slice(from, Math.max(from, to));
}

function fromWindow(price: number): ResolvedPrice {
  return { price, source: 'window' };
}

function fromFallback(price: number): ResolvedPrice {
  return { price, source: 'fallback' };
}

function resolveRule(
  rule: LevelRule,
  history: PriceHistory,
  clocks: Clocks,
  last: Candle
): ResolvedPrice {
  switch (rule.kind) {
    case 'previous_candle': {
      const previous = history[history.length - 2];
      return previous ? fromWindow(previous.open) : fromFallback(last.open);
    }
    case 'rows_back': {
      const anchor = history.length > rule.rows ? history[history.length - rule.rows] : undefined;
      if (anchor) return fromWindow(anchor.open);
      return fromFallback(history[0]?.open ?? last.open);
    }
    case 'first_open': {
      const first = sliceWindow(history, rule.window(clocks))[0];
      return first ? fromWindow(first.open) : fromFallback(last.open);
    }
    case 'max_high': {
      const candles = sliceWindow(history, rule.window(clocks));
      if (candles.length === 0) return fromFallback(last.high);
      return fromWindow(candles.reduce((max, c) => (c.high > max ? c.high : max), -Infinity));
    }
    case 'min_low': {
      const candles = sliceWindow(history, rule.window(clocks));
      if (candles.length === 0) return fromFallback(last.low);
      return fromWindow(candles.reduce((min, c) => (c.low < min ? c.low : min), Infinity));
    }
  }
}

export interface ResolveOptions {
  /** Analysis instant, epoch milliseconds. */
  at: number;
  timezone: string;
}

/**
 * Price every level in `catalog`. An empty history yields an empty map.
 */
export function resolveLevelPrices(
  history: PriceHistory,
  catalog: readonly LevelTemplate[],
  options: ResolveOptions
): ResolvedPrices {
  const prices: ResolvedPrices = new Map();
  const last = history[history.length - 1];
  if (!last) {
    return prices;
  }

  const clocks: Clocks = {
    local: createClock(options.at, options.timezone),
    chicago: createClock(options.at, CHICAGO_TIMEZONE),
  };

  for (const level of catalog) {
    prices.set(level.name, resolveRule(LEVEL_RULES[level.name], history, clocks, last));
  }
  return prices;
}
