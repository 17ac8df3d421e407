import { isValid, parse } from 'date-fns';
import { formatInTimeZone, getTimezoneOffset } from 'date-fns-tz';
import { DayWindow } from '../types/models/calendar';
import { InvalidTimezoneError } from '../utils/errors/report-errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const DEFAULT_TIMEZONE = '+05:30';

/**
 * True for a real calendar date written as YYYY-MM-DD
 */
export const isValidReportDate = (date: string): boolean =>
  DATE_PATTERN.test(date) && isValid(parse(date, 'yyyy-MM-dd', new Date(0)));

/**
 * Formats an offset in minutes as ±HH:MM
 */
export const formatOffset = (minutes: number): string => {
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const mins = String(abs % 60).padStart(2, '0');
  return `${sign}${hours}:${mins}`;
};

/**
 * Resolves an offset (±HH:MM, ±HHMM, ±HH, Z) or an IANA zone to minutes east
 * of UTC. Named zones are resolved at `at`.
 */
export const resolveOffsetMinutes = (timezone: string, at: Date = new Date()): number => {
  const trimmed = timezone.trim();
  const offsetMs = trimmed.length > 0 ? getTimezoneOffset(trimmed, at) : Number.NaN;
  if (Number.isNaN(offsetMs)) {
    throw new InvalidTimezoneError(timezone);
  }
  return Math.round(offsetMs / MINUTE_MS);
};

const pickTimezone = (timezone: string | null | undefined, fallback: string): string =>
  timezone && timezone.trim().length > 0 ? timezone : fallback;

/**
 * Converts a calendar date in a fixed regional offset into the UTC interval
 * [local midnight, next local midnight).
 */
export const resolveDayWindow = (
  date: string,
  timezone?: string | null,
  fallback: string = DEFAULT_TIMEZONE,
): DayWindow => {
  if (!isValidReportDate(date)) {
    throw new RangeError(`Invalid report date "${date}"`);
  }

  const [year, month, day] = date.split('-').map(Number);
  const utcMidnight = Date.UTC(year, month - 1, day);
  // Named zones take the offset in force at midday of the report date
  const offsetMinutes = resolveOffsetMinutes(
    pickTimezone(timezone, fallback),
    new Date(utcMidnight + DAY_MS / 2),
  );
  const start = new Date(utcMidnight - offsetMinutes * MINUTE_MS);

  return {
    date,
    start,
    end: new Date(start.getTime() + DAY_MS),
    offset: formatOffset(offsetMinutes),
    offsetMinutes,
  };
};

/**
 * Today's calendar date (YYYY-MM-DD) in the given timezone
 */
export const todayIn = (
  timezone: string | null | undefined,
  now: Date,
  fallback: string = DEFAULT_TIMEZONE,
): string => {
  const offset = formatOffset(resolveOffsetMinutes(pickTimezone(timezone, fallback), now));
  return formatInTimeZone(now, offset, 'yyyy-MM-dd');
};

/**
 * Formats an instant in the window's offset
 */
export const formatInWindow = (
  instant: Date,
  window: DayWindow,
  pattern: string = 'dd/MM/yyyy HH:mm',
): string => formatInTimeZone(instant, window.offset, pattern);

/**
 * Hour of day (0-23) of an instant in the window's offset
 */
export const hourInWindow = (instant: Date, window: DayWindow): number =>
  new Date(instant.getTime() + window.offsetMinutes * MINUTE_MS).getUTCHours();

/**
 * The window's date as DD/MM/YYYY
 */
export const displayDate = (window: DayWindow): string => window.date.split('-').reverse().join('/');
