/**
 * String formats checked by the record validator.
 *
 * `date` accepts calendar dates in three spellings:
 *   - `YYYY-MM-DD`
 *   - ISO-8601 date-time (`YYYY-MM-DDTHH:MM[:SS[.fff]][Z|±HH:MM]`, `T` in either case)
 *   - `MM/DD/YYYY[, HH:MM:SS]`, the form written for sessions read from EDF files
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|z|[+-]\d{2}:?\d{2})?$/;
const OFFSET = /^([+-])(\d{2}):?(\d{2})$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/** A calendar date with an optional time of day. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
  time: { hours: number; minutes: number; seconds: number } | null;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toNumber(part: string | undefined): number {
  return part === undefined ? 0 : Number(part);
}

function build(
  year: string | undefined,
  month: string | undefined,
  day: string | undefined,
  time: [string | undefined, string | undefined, string | undefined] | null,
): CalendarDate | null {
  const y = toNumber(year);
  const m = toNumber(month);
  const d = toNumber(day);
  if (m < 1 || m > 12 || d < 1 || d > daysInMonth(y, m)) {
    return null;
  }
  if (!time || time[0] === undefined) {
    return { year: y, month: m, day: d, time: null };
  }
  const hours = toNumber(time[0]);
  const minutes = toNumber(time[1]);
  const seconds = toNumber(time[2]);
  if (hours > 23 || minutes > 59 || seconds > 60) {
    return null;
  }
  return { year: y, month: m, day: d, time: { hours, minutes, seconds } };
}

/**
 * Parse a calendar date in any accepted spelling.
 * Returns null when the string is not a date or names a day the calendar lacks.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const iso = ISO_DATE.exec(value);
  if (iso) {
    return build(iso[1], iso[2], iso[3], null);
  }
  const isoTime = ISO_DATE_TIME.exec(value);
  if (isoTime) {
    return build(isoTime[1], isoTime[2], isoTime[3], [isoTime[4], isoTime[5], isoTime[6]]);
  }
  const us = US_DATE.exec(value);
  if (us) {
    return build(us[3], us[1], us[2], [us[4], us[5], us[6]]);
  }
  return null;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

/**
 * A point in time at full precision: whole UTC epoch seconds, a leap-second
 * flag (second 60 sorts after second 59 of the same minute) and the
 * fractional digits without trailing zeros.
 */
export interface Instant {
  seconds: number;
  leap: boolean;
  fraction: string;
}

function offsetMinutes(zone: string | undefined): number | null {
  if (zone === undefined || zone === 'Z' || zone === 'z') return 0;
  const match = OFFSET.exec(zone);
  if (!match) return null;
  const hours = toNumber(match[2]);
  const minutes = toNumber(match[3]);
  if (hours > 23 || minutes > 59) return null;
  const total = hours * 60 + minutes;
  return match[1] === '-' ? -total : total;
}

/**
 * Parse an ISO-8601 / RFC 3339 date-time into an instant. Separators and
 * `Z` are case-insensitive; a missing offset reads as UTC. Returns null for
 * strings without a time of day.
 */
export function parseInstant(value: string): Instant | null {
  const match = ISO_DATE_TIME.exec(value);
  if (!match) return null;
  const date = build(match[1], match[2], match[3], [match[4], match[5], match[6]]);
  const offset = offsetMinutes(match[8]);
  if (!date?.time || offset === null) return null;
  const { hours, minutes, seconds } = date.time;
  const leap = seconds === 60;
  const utcMillis = Date.UTC(date.year, date.month - 1, date.day, hours, minutes, leap ? 59 : seconds);
  return {
    seconds: utcMillis / 1000 - offset * 60,
    leap,
    fraction: (match[7] ?? '').replace(/0+$/, ''),
  };
}

/** Negative when `a` is earlier than `b`, zero when equal, positive when later. */
export function compareInstants(a: Instant, b: Instant): number {
  if (a.seconds !== b.seconds) return a.seconds - b.seconds;
  if (a.leap !== b.leap) return a.leap ? 1 : -1;
  const width = Math.max(a.fraction.length, b.fraction.length);
  const left = a.fraction.padEnd(width, '0');
  const right = b.fraction.padEnd(width, '0');
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Canonical spelling of a date string.
 *
 * ISO spellings are already canonical and come back unchanged; the
 * `MM/DD/YYYY` form becomes `YYYY-MM-DD` (plus `THH:MM:SS` when it carries
 * a time). Returns null for strings that are not dates.
 */
export function canonicalDate(value: string): string | null {
  const parsed = parseCalendarDate(value);
  if (!parsed) return null;
  if (!US_DATE.test(value)) return value;
  const date = `${pad(parsed.year, 4)}-${pad(parsed.month)}-${pad(parsed.day)}`;
  if (!parsed.time) return date;
  const { hours, minutes, seconds } = parsed.time;
  return `${date}T${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Email check: exactly one "@" with non-empty local and domain parts.
 */
export function isEmail(value: string): boolean {
  const parts = value.split('@');
  return parts.length === 2 && parts[0] !== '' && parts[1] !== '';
}
