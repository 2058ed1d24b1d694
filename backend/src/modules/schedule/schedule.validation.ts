/**
 * REPORT SCHEDULE — SPEC VALIDATION
 *
 * Runs when a spec is registered or replaced. Collects every problem
 * instead of stopping at the first one.
 */

import { AppError } from '../../common/errors.js';
import { WEEKDAYS, compareCalendarDates, isCalendarDate } from '../../common/calendar.js';
import {
  CronDelegate,
  LAST_DAY_OF_MONTH,
  SCHEDULE_FREQUENCIES,
  SCHEDULE_STATUSES,
  ScheduleSpec,
} from './schedule.types.js';

const TIME_OF_DAY_RE = /^([01]\d|2[0-3]):[0-5]\d$/;

export class MalformedScheduleError extends AppError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('MALFORMED_SCHEDULE', `Malformed schedule: ${problems.join('; ')}`, 400, { problems });
    this.name = 'MalformedScheduleError';
    this.problems = problems;
  }
}

export function collectScheduleProblems(spec: ScheduleSpec, cron: CronDelegate): string[] {
  const problems: string[] = [];

  if (!SCHEDULE_FREQUENCIES.includes(spec.frequency)) {
    problems.push(`unknown frequency '${String(spec.frequency)}'`);
  }
  if (!SCHEDULE_STATUSES.includes(spec.status)) {
    problems.push(`unknown status '${String(spec.status)}'`);
  }

  // Dates
  if (spec.startDate !== null && !isCalendarDate(spec.startDate)) {
    problems.push(`startDate '${spec.startDate}' is not a YYYY-MM-DD date`);
  }
  if (spec.endDate !== null && !isCalendarDate(spec.endDate)) {
    problems.push(`endDate '${spec.endDate}' is not a YYYY-MM-DD date`);
  }
  if (
    spec.startDate !== null &&
    spec.endDate !== null &&
    isCalendarDate(spec.startDate) &&
    isCalendarDate(spec.endDate) &&
    compareCalendarDates(spec.endDate, spec.startDate) < 0
  ) {
    problems.push('endDate is before startDate');
  }
  if (spec.timeOfDay !== null && !TIME_OF_DAY_RE.test(spec.timeOfDay)) {
    problems.push(`timeOfDay '${spec.timeOfDay}' is not HH:mm`);
  }

  // Frequency-specific fields
  switch (spec.frequency) {
    case 'DAILY':
      if (spec.intervalDays !== null && (!Number.isInteger(spec.intervalDays) || spec.intervalDays < 1)) {
        problems.push('intervalDays must be an integer >= 1');
      }
      break;
    case 'WEEKLY':
      if (spec.daysOfWeek.length === 0) {
        problems.push('WEEKLY schedule needs at least one day of week');
      }
      for (const day of spec.daysOfWeek) {
        if (!WEEKDAYS.includes(day)) problems.push(`unknown day of week '${String(day)}'`);
      }
      break;
    case 'MONTHLY':
      if (spec.dayOfMonth === null) {
        problems.push('MONTHLY schedule needs dayOfMonth');
      } else if (
        spec.dayOfMonth !== LAST_DAY_OF_MONTH &&
        (!Number.isInteger(spec.dayOfMonth) || spec.dayOfMonth < 1 || spec.dayOfMonth > 31)
      ) {
        problems.push(`dayOfMonth must be 1..31 or '${LAST_DAY_OF_MONTH}'`);
      }
      break;
    case 'CUSTOM_CRON':
      if (spec.cronExpression === null || spec.cronExpression.trim() === '') {
        problems.push('CUSTOM_CRON schedule needs cronExpression');
      } else if (!cron.validate(spec.cronExpression)) {
        problems.push(`cronExpression '${spec.cronExpression}' is not valid`);
      }
      break;
  }

  return problems;
}

export function validateScheduleSpec(spec: ScheduleSpec, cron: CronDelegate): ScheduleSpec {
  const problems = collectScheduleProblems(spec, cron);
  if (problems.length > 0) {
    throw new MalformedScheduleError(problems);
  }
  return spec;
}
