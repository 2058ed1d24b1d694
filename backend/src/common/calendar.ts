/**
 * Calendar date helpers
 *
 * Dates are plain `YYYY-MM-DD` strings interpreted in UTC, the same
 * shape used for asOfDate keys across the service.
 */

export type Weekday =
  | 'MONDAY'
  | 'TUESDAY'
  | 'WEDNESDAY'
  | 'THURSDAY'
  | 'FRIDAY'
  | 'SATURDAY'
  | 'SUNDAY';

export const WEEKDAYS: readonly Weekday[] = [
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
  'SUNDAY',
] as const;

// Date#getUTCDay order: 0 = Sunday
const UTC_DAY_TO_WEEKDAY: readonly Weekday[] = [
  'SUNDAY',
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
];

const MS_PER_DAY = 86_400_000;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarParts {
  year: number;
  month: number; // 1..12
  day: number; // 1..31
}

/**
 * Parse a `YYYY-MM-DD` string. Returns null for anything that is not a
 * real calendar day (2025-02-30 included).
 */
export function parseCalendarDate(value: string | null | undefined): CalendarParts | null {
  if (typeof value !== 'string') return null;
  const m = DATE_RE.exec(value);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function isCalendarDate(value: unknown): value is string {
  return typeof value === 'string' && parseCalendarDate(value) !== null;
}

export function daysInMonth(year: number, month: number): number {
  // day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function epochDay(parts: CalendarParts): number {
  return Math.floor(Date.UTC(parts.year, parts.month - 1, parts.day) / MS_PER_DAY);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: CalendarParts, to: CalendarParts): number {
  return epochDay(to) - epochDay(from);
}

export function weekdayOf(parts: CalendarParts): Weekday {
  const utcDay = new Date(Date.UTC(parts.year, parts.month - 1, parts.day)).getUTCDay();
  return UTC_DAY_TO_WEEKDAY[utcDay];
}

export function isLastDayOfMonth(parts: CalendarParts): boolean {
  return parts.day === daysInMonth(parts.year, parts.month);
}

/**
 * Lexicographic compare works for zero-padded ISO dates.
 */
export function compareCalendarDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function startOfUtcDay(parts: CalendarParts): Date {
  return new Date(Date.UTC(parts.year, parts.month - 1, parts.day));
}

export function addDays(value: string, days: number): string {
  const parts = parseCalendarDate(value);
  if (!parts) throw new RangeError(`Invalid calendar date: ${value}`);
  const shifted = new Date(startOfUtcDay(parts).getTime() + days * MS_PER_DAY);
  return shifted.toISOString().slice(0, 10);
}
