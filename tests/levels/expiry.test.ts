import { describe, it, expect } from 'vitest';

import { zonedTimeToInstant } from '../../src/core/timezone.js';
import { checkCacheExpiry } from '../../src/levels/expiry.js';
import type { LevelName } from '../../src/types/index.js';

const NY = 'America/New_York';

const at = (month: number, day: number, hour: number, minute = 0): number =>
  zonedTimeToInstant({ year: 2025, month, day, hour, minute }, NY);

const valid = (level: LevelName, cachedAt: number, now: number): boolean =>
  checkCacheExpiry(level, cachedAt, now, NY).valid;

describe('checkCacheExpiry', () => {
  it('expires rolling opens after their period', () => {
    expect(valid('4h_open', at(11, 19, 10), at(11, 19, 13, 59))).toBe(true);
    expect(valid('4h_open', at(11, 19, 10), at(11, 19, 14))).toBe(true);
    expect(valid('4h_open', at(11, 19, 10), at(11, 19, 14) + 1)).toBe(false);
    expect(valid('2h_open', at(11, 19, 10), at(11, 19, 11, 30))).toBe(true);
    expect(valid('previous_hourly', at(11, 19, 10), at(11, 19, 11, 1))).toBe(false);
    expect(checkCacheExpiry('4h_open', at(11, 19, 10), at(11, 19, 15), NY).reason).toBe(
      'older than 4h'
    );
  });

  it('keeps daily and session opens for the local day', () => {
    expect(valid('daily_midnight', at(11, 19, 0), at(11, 19, 23, 59))).toBe(true);
    expect(valid('daily_midnight', at(11, 19, 0), at(11, 20, 0, 1))).toBe(false);
    expect(valid('ny_open', at(11, 19, 9, 30), at(11, 19, 15))).toBe(true);
    expect(valid('chicago_preopen', at(11, 18, 20), at(11, 19, 8))).toBe(false);
  });

  it('accepts previous-day extremes only when recorded yesterday', () => {
    expect(valid('prev_day_high', at(11, 18, 12), at(11, 19, 9))).toBe(true);
    expect(valid('prev_day_low', at(11, 18, 12), at(11, 20, 9))).toBe(false);
    expect(valid('prev_day_low', at(11, 19, 1), at(11, 19, 9))).toBe(false);
  });

  it('compares weeks by their Monday', () => {
    expect(valid('weekly_open', at(11, 17, 9), at(11, 23, 23))).toBe(true);
    expect(valid('weekly_high', at(11, 17, 9), at(11, 24, 0, 30))).toBe(false);
    expect(valid('prev_week_high', at(11, 14, 16), at(11, 19, 10))).toBe(true);
    expect(valid('prev_week_low', at(11, 7, 16), at(11, 19, 10))).toBe(false);
  });

  it('keeps the monthly open for the calendar month', () => {
    expect(valid('monthly_open', at(11, 1, 0), at(11, 30, 23))).toBe(true);
    expect(valid('monthly_open', at(11, 30, 23), at(12, 1, 0, 30))).toBe(false);
  });

  it('keeps session ranges only while the range is still forming', () => {
    expect(valid('asian_range_high', at(11, 19, 0, 10), at(11, 19, 0, 45))).toBe(true);
    expect(checkCacheExpiry('asian_range_low', at(11, 19, 0, 10), at(11, 19, 2), NY)).toEqual({
      valid: false,
      reason: 'session range complete',
    });
    expect(valid('london_range_high', at(11, 19, 5), at(11, 19, 10, 59))).toBe(true);
    expect(valid('ny_range_high', at(11, 19, 10), at(11, 19, 13))).toBe(true);
    expect(valid('chicago_range_low', at(11, 19, 10), at(11, 19, 14))).toBe(false);
    expect(checkCacheExpiry('ny_range_low', at(11, 18, 10), at(11, 19, 10), NY)).toEqual({
      valid: false,
      reason: 'new trading day',
    });
  });
});
