/**
 * Wall-clock arithmetic in IANA timezones on top of Intl.
 *
 * Instants are epoch milliseconds. Local wall times that fall into a DST gap
 * or overlap resolve against the zone's standard (non-DST) offset.
 */

const DAY_MS = 24 * 60 * 60 * 1000;
const FORMATTERS = new Map<string, Intl.DateTimeFormat>();

export interface CivilDate {
  year: number;
  month: number;
  day: number;
}

export interface WallTime extends CivilDate {
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
}

export interface ZonedDateTime extends CivilDate {
  hour: number;
  minute: number;
  second: number;
  /** 0 = Monday ... 6 = Sunday */
  weekday: number;
}

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = FORMATTERS.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    FORMATTERS.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function weekdayOf(date: CivilDate): number {
  const sundayBased = new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
  return (sundayBased + 6) % 7;
}

export function addDays(date: CivilDate, days: number): CivilDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

export function sameCivilDate(a: CivilDate, b: CivilDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

export function toZoned(instant: number, timeZone: string): ZonedDateTime {
  const parts = getFormatter(timeZone).formatToParts(new Date(instant));
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((entry) => entry.type === type);
    return part ? Number(part.value) : 0;
  };
  const date = { year: read('year'), month: read('month'), day: read('day') };
  return {
    ...date,
    // Some ICU builds still print midnight as 24 under h23
    hour: read('hour') % 24,
    minute: read('minute'),
    second: read('second'),
    weekday: weekdayOf(date),
  };
}

/** UTC offset of `timeZone` at `instant`, in milliseconds (east positive). */
export function offsetAt(instant: number, timeZone: string): number {
  const zoned = toZoned(instant, timeZone);
  const wall = Date.UTC(
    zoned.year,
    zoned.month - 1,
    zoned.day,
    zoned.hour,
    zoned.minute,
    zoned.second
  );
  return wall - Math.floor(instant / 1000) * 1000;
}

/** Instant at which the wall clock in `timeZone` shows `time`. */
export function zonedTimeToInstant(time: WallTime, timeZone: string): number {
  const wall = Date.UTC(
    time.year,
    time.month - 1,
    time.day,
    time.hour ?? 0,
    time.minute ?? 0,
    time.second ?? 0,
    time.millisecond ?? 0
  );
  const before = offsetAt(wall - DAY_MS, timeZone);
  const after = offsetAt(wall + DAY_MS, timeZone);
  const candidates = [...new Set([before, after])].filter(
    (offset) => offsetAt(wall - offset, timeZone) === offset
  );
  const [only] = candidates;
  if (candidates.length === 1 && only !== undefined) {
    return wall - only;
  }
  return wall - Math.min(before, after);
}

function pad(value: number, width = 2): string {
  return String(Math.abs(value)).padStart(width, '0');
}

/** ISO-8601 with the zone's offset, e.g. `2025-11-19T09:30:00-05:00`. */
export function formatZonedIso(instant: number, timeZone: string): string {
  const zoned = toZoned(instant, timeZone);
  const offsetMinutes = Math.round(offsetAt(instant, timeZone) / 60000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const millis = ((instant % 1000) + 1000) % 1000;
  const fraction = millis > 0 ? `.${pad(millis, 3)}` : '';
  return (
    `${pad(zoned.year, 4)}-${pad(zoned.month)}-${pad(zoned.day)}` +
    `T${pad(zoned.hour)}:${pad(zoned.minute)}:${pad(zoned.second)}${fraction}` +
    `${sign}${pad(Math.trunc(offsetMinutes / 60))}:${pad(offsetMinutes % 60)}`
  );
}

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function parseOffset(token: string): number {
  if (token.toUpperCase() === 'Z') return 0;
  const sign = token.startsWith('-') ? -1 : 1;
  const digits = token.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes) * 60000;
}

/**
 * Parse an ISO-like timestamp. Strings without an offset are wall time in
 * `timeZone`. Returns null for anything that is not a real calendar instant.
 */
export function parseTimestamp(input: string, timeZone: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(input.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const time: WallTime = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: h === undefined ? 0 : Number(h),
    minute: mi === undefined ? 0 : Number(mi),
    second: s === undefined ? 0 : Number(s),
    millisecond: frac === undefined ? 0 : Number(frac.slice(0, 3).padEnd(3, '0')),
  };

  const check = new Date(Date.UTC(time.year, time.month - 1, time.day));
  if (
    check.getUTCFullYear() !== time.year ||
    check.getUTCMonth() + 1 !== time.month ||
    check.getUTCDate() !== time.day ||
    (time.hour ?? 0) > 23 ||
    (time.minute ?? 0) > 59 ||
    (time.second ?? 0) > 59
  ) {
    return null;
  }

  if (zone !== undefined) {
    const wall = Date.UTC(
      time.year,
      time.month - 1,
      time.day,
      time.hour,
      time.minute,
      time.second,
      time.millisecond
    );
    return wall - parseOffset(zone);
  }
  return zonedTimeToInstant(time, timeZone);
}
