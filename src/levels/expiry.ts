import { addDays, sameCivilDate, toZoned, type CivilDate } from '../core/timezone.js';
import type { LevelName } from '../types/index.js';

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_MAX_AGE_MS = 7 * 24 * HOUR_MS;

export interface ExpiryCheck {
  valid: boolean;
  reason: string;
}

const ROLLING_HOURS: Partial<Record<LevelName, number>> = {
  '4h_open': 4,
  '2h_open': 2,
  previous_hourly: 1,
};

const SAME_DAY_LEVELS: ReadonlySet<LevelName> = new Set<LevelName>([
  'daily_midnight',
  'ny_open',
  'ny_preopen',
  'chicago_open',
  'chicago_preopen',
  'london_open',
]);

/** Local hour from which a cached session range is considered complete. */
const RANGE_CLOSE_HOUR: Partial<Record<LevelName, number>> = {
  asian_range_high: 1,
  asian_range_low: 1,
  london_range_high: 11,
  london_range_low: 11,
  ny_range_high: 14,
  ny_range_low: 14,
  chicago_range_high: 14,
  chicago_range_low: 14,
};

function weekStart(date: CivilDate & { weekday: number }): CivilDate {
  return addDays(date, -date.weekday);
}

/**
 * Whether a level price recorded at `cachedAt` may still stand in for the
 * level at `now`, judged on the instrument's local calendar.
 */
export function checkCacheExpiry(
  level: LevelName,
  cachedAt: number,
  now: number,
  timeZone: string
): ExpiryCheck {
  const cached = toZoned(cachedAt, timeZone);
  const current = toZoned(now, timeZone);
  const sameDay = sameCivilDate(cached, current);

  const rolling = ROLLING_HOURS[level];
  if (rolling !== undefined) {
    const valid = now - cachedAt <= rolling * HOUR_MS;
    return { valid, reason: valid ? `within ${rolling}h window` : `older than ${rolling}h` };
  }

  if (SAME_DAY_LEVELS.has(level)) {
    return { valid: sameDay, reason: sameDay ? 'same trading day' : 'new trading day' };
  }

  if (level === 'prev_day_high' || level === 'prev_day_low') {
    const valid = sameCivilDate(cached, addDays(current, -1));
    return { valid, reason: valid ? 'recorded yesterday' : 'not recorded yesterday' };
  }

  if (level === 'weekly_open' || level === 'weekly_high' || level === 'weekly_low') {
    const valid = sameCivilDate(weekStart(cached), weekStart(current));
    return { valid, reason: valid ? 'same week' : 'new week' };
  }

  if (level === 'prev_week_high' || level === 'prev_week_low') {
    const valid = sameCivilDate(weekStart(cached), addDays(weekStart(current), -7));
    return { valid, reason: valid ? 'recorded last week' : 'not recorded last week' };
  }

  if (level === 'monthly_open') {
    const valid = cached.year === current.year && cached.month === current.month;
    return { valid, reason: valid ? 'same month' : 'new month' };
  }

  const closeHour = RANGE_CLOSE_HOUR[level];
  if (closeHour !== undefined) {
    if (!sameDay) return { valid: false, reason: 'new trading day' };
    const valid = current.hour < closeHour;
    return {
      valid,
      reason: valid ? 'session range still forming' : 'session range complete',
    };
  }

  const valid = now - cachedAt <= DEFAULT_MAX_AGE_MS;
  return { valid, reason: valid ? 'within 7 days' : 'older than 7 days' };
}
