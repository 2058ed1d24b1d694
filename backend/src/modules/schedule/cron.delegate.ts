/**
 * CUSTOM_CRON delegate
 *
 * Day-level cron evaluation for the schedule evaluator. Occurrence
 * lookup goes through cron-parser; node-cron's validator gates which
 * expressions are accepted, so anything registered here can also be
 * handed to node-cron.
 */

import cron from 'node-cron';
import cronParser from 'cron-parser';
import { parseCalendarDate, startOfUtcDay } from '../../common/calendar.js';
import type { CronDelegate } from './schedule.types.js';

const MS_PER_DAY = 86_400_000;

export class CronParserDelegate implements CronDelegate {
  /**
   * Due when the expression has at least one occurrence inside the UTC
   * day `date`.
   */
  isDue(cronExpression: string, date: string): boolean {
    const parts = parseCalendarDate(date);
    if (!parts) return false;

    const dayStart = startOfUtcDay(parts).getTime();
    const interval = cronParser.parseExpression(cronExpression, {
      currentDate: new Date(dayStart - 1000),
      endDate: new Date(dayStart + MS_PER_DAY - 1),
      utc: true,
    });
    return interval.hasNext();
  }

  validate(cronExpression: string): boolean {
    if (!cron.validate(cronExpression)) return false;
    try {
      cronParser.parseExpression(cronExpression, { utc: true });
      return true;
    } catch {
      return false;
    }
  }
}

export const cronParserDelegate = new CronParserDelegate();
