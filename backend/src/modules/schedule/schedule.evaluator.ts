/**
 * REPORT SCHEDULE — DUE-DATE EVALUATOR
 *
 * Pure: no I/O, no mutation. Total: a malformed spec is "not due",
 * never an exception. Integrity is checked when a spec is registered
 * (see schedule.validation.ts), not here.
 */

import {
  CalendarParts,
  addDays,
  compareCalendarDates,
  daysBetween,
  isLastDayOfMonth,
  parseCalendarDate,
  weekdayOf,
} from '../../common/calendar.js';
import type { Logger } from '../../common/host.deps.js';
import { CronDelegate, LAST_DAY_OF_MONTH, ScheduleSpec } from './schedule.types.js';

export interface EvaluateOptions {
  cron: CronDelegate;
  logger?: Logger;
}

/**
 * Is the schedule due on the calendar day `today` (YYYY-MM-DD)?
 */
export function isDueToday(spec: ScheduleSpec, today: string, options: EvaluateOptions): boolean {
  const day = parseCalendarDate(today);
  if (!day) return false;

  if (!isWithinActiveWindow(spec, today)) return false;

  switch (spec.frequency) {
    case 'DAILY':
      return isDailyDue(spec, day);
    case 'WEEKLY':
      return isWeeklyDue(spec, day);
    case 'MONTHLY':
      return isMonthlyDue(spec, day);
    case 'CUSTOM_CRON':
      return isCronDue(spec, today, options);
    default:
      return false;
  }
}

/**
 * Status ACTIVE and today inside [startDate, endDate].
 */
export function isWithinActiveWindow(spec: ScheduleSpec, today: string): boolean {
  if (spec.status !== 'ACTIVE') return false;

  if (spec.startDate !== null) {
    if (!parseCalendarDate(spec.startDate)) return false;
    if (compareCalendarDates(today, spec.startDate) < 0) return false;
  }
  if (spec.endDate !== null) {
    if (!parseCalendarDate(spec.endDate)) return false;
    if (compareCalendarDates(today, spec.endDate) > 0) return false;
  }
  return true;
}

/**
 * The schedule can never fire again once today is past its end date.
 * A malformed `today` is never past anything.
 */
export function isExpired(spec: ScheduleSpec, today: string): boolean {
  if (spec.endDate === null || !parseCalendarDate(today)) return false;
  return compareCalendarDates(today, spec.endDate) > 0;
}

/** How far ahead `nextDueDate` looks before giving up */
export const NEXT_DUE_HORIZON_DAYS = 366;

/**
 * First day on or after `from` the schedule is due, or null when there is
 * none within `horizonDays` (or the schedule ends first).
 */
export function nextDueDate(
  spec: ScheduleSpec,
  from: string,
  options: EvaluateOptions,
  horizonDays: number = NEXT_DUE_HORIZON_DAYS,
): string | null {
  if (!parseCalendarDate(from) || spec.status !== 'ACTIVE') return null;

  let day = from;
  if (spec.startDate !== null && parseCalendarDate(spec.startDate) && compareCalendarDates(day, spec.startDate) < 0) {
    day = spec.startDate;
  }

  for (let i = 0; i < horizonDays; i++) {
    if (isExpired(spec, day)) return null;
    if (isDueToday(spec, day, options)) return day;
    day = addDays(day, 1);
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════
// FREQUENCY RULES
// ═══════════════════════════════════════════════════════════════

function isDailyDue(spec: ScheduleSpec, day: CalendarParts): boolean {
  const interval = spec.intervalDays;
  if (interval === null || interval <= 1) return true;
  if (!Number.isInteger(interval)) return false;

  // no anchor to count from
  const start = parseCalendarDate(spec.startDate);
  if (!start) return true;

  return daysBetween(start, day) % interval === 0;
}

function isWeeklyDue(spec: ScheduleSpec, day: CalendarParts): boolean {
  if (spec.daysOfWeek.length === 0) return false;
  return spec.daysOfWeek.includes(weekdayOf(day));
}

function isMonthlyDue(spec: ScheduleSpec, day: CalendarParts): boolean {
  const target = spec.dayOfMonth;
  if (target === null) return false;
  if (target === LAST_DAY_OF_MONTH) return isLastDayOfMonth(day);
  return day.day === target;
}

function isCronDue(spec: ScheduleSpec, today: string, options: EvaluateOptions): boolean {
  const expression = spec.cronExpression;
  if (expression === null || expression.trim() === '') return false;

  try {
    return options.cron.isDue(expression, today);
  } catch (err) {
    options.logger?.warn(
      { cronExpression: expression, today, error: err instanceof Error ? err.message : String(err) },
      'Cron delegate failed, treating schedule as not due',
    );
    return false;
  }
}
