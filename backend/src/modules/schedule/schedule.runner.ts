/**
 * REPORT SCHEDULE — DAILY RUNNER
 *
 * One node-cron tick per day walks every schedule:
 * - schedules past their end date are marked COMPLETED
 * - due schedules not yet run for the day are dispatched, then recorded
 *
 * A dispatch failure is logged, kept in the schedule's run history and
 * reported in the tick result; the day stays unrecorded so a manual
 * re-run picks it up.
 *
 * Days before a schedule's last run are skipped unless the tick is a
 * backfill. Days after the clock's today are refused.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { ValidationError, errorMessage } from '../../common/errors.js';
import { Clock, Logger, systemClock } from '../../common/host.deps.js';
import { compareCalendarDates, isCalendarDate } from '../../common/calendar.js';
import { isDueToday, isExpired } from './schedule.evaluator.js';
import { hasRunOn, type ScheduleService } from './schedule.service.js';
import type {
  CronDelegate,
  ReportJobDispatcher,
  ScheduledReport,
  ScheduleTickResult,
  ScheduleTickStep,
} from './schedule.types.js';

export interface ScheduleRunnerConfig {
  service: ScheduleService;
  dispatcher: ReportJobDispatcher;
  cron: CronDelegate;
  tickCron?: string;
  clock?: Clock;
  logger: Logger;
}

export interface TickOptions {
  /** Run a day earlier than a schedule's last run */
  backfill?: boolean;
}

export class ScheduleRunner {
  private readonly service: ScheduleService;
  private readonly dispatcher: ReportJobDispatcher;
  private readonly cron: CronDelegate;
  private readonly tickCron: string;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private task: ScheduledTask | null = null;
  private running = false;
  private lastResult: ScheduleTickResult | null = null;

  constructor(config: ScheduleRunnerConfig) {
    this.service = config.service;
    this.dispatcher = config.dispatcher;
    this.cron = config.cron;
    this.tickCron = config.tickCron ?? '10 0 * * *';
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger;
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  start(): void {
    if (this.task) return;

    this.task = cron.schedule(
      this.tickCron,
      async () => {
        try {
          await this.tick();
        } catch (err) {
          this.logger.error({ error: errorMessage(err) }, 'Schedule tick crashed');
        }
      },
      { timezone: 'UTC' },
    );
    this.logger.info({ tickCron: this.tickCron }, 'Schedule runner started');
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    this.logger.info({}, 'Schedule runner stopped');
  }

  getStatus(): { started: boolean; running: boolean; tickCron: string; lastResult: ScheduleTickResult | null } {
    return {
      started: this.task !== null,
      running: this.running,
      tickCron: this.tickCron,
      lastResult: this.lastResult,
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // TICK
  // ═══════════════════════════════════════════════════════════════

  /**
   * Returns null when a tick is already in progress.
   */
  async tick(runDate: string = this.clock.today(), options: TickOptions = {}): Promise<ScheduleTickResult | null> {
    if (!isCalendarDate(runDate)) {
      throw new ValidationError(`Invalid run date: ${runDate}`);
    }
    const today = this.clock.today();
    if (compareCalendarDates(runDate, today) > 0) {
      throw new ValidationError(`Run date ${runDate} is after today (${today})`, { runDate, today });
    }
    const backfill = options.backfill ?? false;

    if (this.running) {
      this.logger.warn({ runDate }, 'Schedule tick already running, skipping');
      return null;
    }

    this.running = true;
    const startedAt = this.clock.utcNow();
    const steps: ScheduleTickStep[] = [];

    try {
      const schedules = await this.service.list();
      for (const schedule of schedules) {
        steps.push(await this.processSchedule(schedule, runDate, backfill));
      }
    } finally {
      this.running = false;
    }

    const finishedAt = this.clock.utcNow();
    const result: ScheduleTickResult = {
      runDate,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      dispatched: steps.filter((s) => s.status === 'DISPATCHED').length,
      completed: steps.filter((s) => s.status === 'COMPLETED').length,
      failed: steps.filter((s) => s.status === 'FAILED').length,
      steps,
    };
    this.lastResult = result;

    this.logger.info(
      { runDate, dispatched: result.dispatched, completed: result.completed, failed: result.failed },
      'Schedule tick finished',
    );
    return result;
  }

  private async processSchedule(schedule: ScheduledReport, runDate: string, backfill: boolean): Promise<ScheduleTickStep> {
    const { scheduleId, spec } = schedule;

    try {
      if ((spec.status === 'ACTIVE' || spec.status === 'PAUSED') && isExpired(spec, runDate)) {
        await this.service.changeStatus(scheduleId, 'complete');
        return { scheduleId, status: 'COMPLETED', reason: 'END_DATE_PASSED' };
      }

      if (!isDueToday(spec, runDate, { cron: this.cron, logger: this.logger })) {
        return { scheduleId, status: 'SKIPPED', reason: 'NOT_DUE' };
      }
      if (hasRunOn(schedule, runDate)) {
        return { scheduleId, status: 'SKIPPED', reason: 'ALREADY_RUN' };
      }
      if (!backfill && schedule.lastRunDate !== null && compareCalendarDates(runDate, schedule.lastRunDate) < 0) {
        return { scheduleId, status: 'SKIPPED', reason: 'BEFORE_LAST_RUN' };
      }

      await this.dispatcher.dispatch(schedule, runDate);
      await this.service.recordRun(scheduleId, runDate);
      return { scheduleId, status: 'DISPATCHED' };
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error({ scheduleId, runDate, error }, 'Schedule dispatch failed');
      await this.recordFailure(scheduleId, runDate, error);
      return { scheduleId, status: 'FAILED', error };
    }
  }

  private async recordFailure(scheduleId: string, runDate: string, error: string): Promise<void> {
    try {
      await this.service.recordFailure(scheduleId, runDate, error);
    } catch (err) {
      this.logger.warn({ scheduleId, runDate, error: errorMessage(err) }, 'Could not record failed run');
    }
  }
}

/**
 * Dispatcher that only logs; the report renderer plugs in its own.
 */
export function createLoggingDispatcher(logger: Logger): ReportJobDispatcher {
  return {
    dispatch: async (schedule, runDate) => {
      logger.info(
        { scheduleId: schedule.scheduleId, reportId: schedule.reportId, runDate, outputFormat: schedule.outputFormat },
        'Report job due',
      );
    },
  };
}
