/**
 * REPORT SCHEDULE — SERVICE
 *
 * Owns the schedule aggregate. Every mutation for one scheduleId runs
 * under a per-id lock: load, compute the new value, save with the
 * loaded revision.
 */

import { v4 as uuid } from 'uuid';
import { AppError, NotFoundError, ValidationError } from '../../common/errors.js';
import { KeyedLock } from '../../common/keyed-lock.js';
import { Clock, Logger, systemClock } from '../../common/host.deps.js';
import { compareCalendarDates, isCalendarDate } from '../../common/calendar.js';
import { isDueToday, nextDueDate } from './schedule.evaluator.js';
import { validateScheduleSpec } from './schedule.validation.js';
import {
  CronDelegate,
  OUTPUT_FORMATS,
  RUN_HISTORY_LIMIT,
  RegisterScheduleInput,
  ReportExecution,
  ScheduledReport,
  ScheduleRepository,
  ScheduleSpecInput,
  ScheduleStatus,
  createScheduleSpec,
} from './schedule.types.js';

// ═══════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════

export class ScheduleStateError extends AppError {
  constructor(scheduleId: string, from: ScheduleStatus, action: string) {
    super('INVALID_SCHEDULE_STATE', `Cannot ${action} schedule ${scheduleId} in status ${from}`, 409, {
      scheduleId,
      status: from,
      action,
    });
    this.name = 'ScheduleStateError';
  }
}

// Which statuses each status change may start from
const STATUS_CHANGES: Record<'pause' | 'resume' | 'disable' | 'complete', { from: ScheduleStatus[]; to: ScheduleStatus }> = {
  pause: { from: ['ACTIVE'], to: 'PAUSED' },
  resume: { from: ['PAUSED'], to: 'ACTIVE' },
  disable: { from: ['ACTIVE', 'PAUSED', 'COMPLETED'], to: 'DISABLED' },
  complete: { from: ['ACTIVE', 'PAUSED'], to: 'COMPLETED' },
};

export type ScheduleStatusAction = keyof typeof STATUS_CHANGES;

/**
 * A successful run for `runDate` is on record.
 */
export function hasRunOn(schedule: ScheduledReport, runDate: string): boolean {
  return schedule.lastRunDate === runDate || schedule.history.some((e) => e.success && e.runDate === runDate);
}

function appendExecution(history: readonly ReportExecution[], entry: ReportExecution): ReportExecution[] {
  return [entry, ...history].slice(0, RUN_HISTORY_LIMIT);
}

export interface ScheduleServiceDeps {
  repository: ScheduleRepository;
  cron: CronDelegate;
  clock?: Clock;
  logger: Logger;
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class ScheduleService {
  private readonly repository: ScheduleRepository;
  private readonly cron: CronDelegate;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly lock = new KeyedLock();

  constructor(deps: ScheduleServiceDeps) {
    this.repository = deps.repository;
    this.cron = deps.cron;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger;
  }

  async register(input: RegisterScheduleInput): Promise<ScheduledReport> {
    if (!input.reportId || !input.name || !input.createdBy) {
      throw new ValidationError('reportId, name and createdBy are required');
    }
    const outputFormat = input.outputFormat ?? 'PDF';
    if (!OUTPUT_FORMATS.includes(outputFormat)) {
      throw new ValidationError(`Unknown output format: ${String(outputFormat)}`);
    }

    const spec = validateScheduleSpec(createScheduleSpec(input.spec), this.cron);
    const now = this.clock.utcNow().toISOString();
    const schedule: ScheduledReport = {
      scheduleId: uuid(),
      reportId: input.reportId,
      name: input.name,
      outputFormat,
      spec,
      lastRunDate: null,
      runCount: 0,
      history: [],
      createdAt: now,
      createdBy: input.createdBy,
      updatedAt: now,
      revision: 0,
    };

    await this.repository.save(schedule, null);
    this.logger.info(
      { scheduleId: schedule.scheduleId, reportId: schedule.reportId, frequency: spec.frequency },
      'Schedule registered',
    );
    return schedule;
  }

  async get(scheduleId: string): Promise<ScheduledReport> {
    const schedule = await this.repository.load(scheduleId);
    if (!schedule) throw new NotFoundError('Schedule', scheduleId);
    return schedule;
  }

  async list(filter: { reportId?: string; status?: ScheduleStatus } = {}): Promise<ScheduledReport[]> {
    const all = await this.repository.list();
    return all.filter(
      (s) =>
        (filter.reportId === undefined || s.reportId === filter.reportId) &&
        (filter.status === undefined || s.spec.status === filter.status),
    );
  }

  /**
   * Swap the whole spec. Status carries over unless the new spec sets one.
   */
  async replaceSpec(scheduleId: string, input: ScheduleSpecInput): Promise<ScheduledReport> {
    return this.mutate(scheduleId, (current) => {
      if (current.spec.status === 'DISABLED') {
        throw new ScheduleStateError(scheduleId, current.spec.status, 'edit');
      }
      const spec = validateScheduleSpec(
        createScheduleSpec({ ...input, status: input.status ?? current.spec.status }),
        this.cron,
      );
      return { ...current, spec };
    });
  }

  async changeStatus(scheduleId: string, action: ScheduleStatusAction): Promise<ScheduledReport> {
    const change = STATUS_CHANGES[action];
    const updated = await this.mutate(scheduleId, (current) => {
      if (!change.from.includes(current.spec.status)) {
        throw new ScheduleStateError(scheduleId, current.spec.status, action);
      }
      return { ...current, spec: { ...current.spec, status: change.to } };
    });
    this.logger.info({ scheduleId, action, status: change.to }, 'Schedule status changed');
    return updated;
  }

  /**
   * Due-check for one schedule on `date` (defaults to the clock's today).
   */
  async isDue(scheduleId: string, date?: string): Promise<{ scheduleId: string; date: string; due: boolean }> {
    const day = this.resolveDate(date);
    const schedule = await this.get(scheduleId);
    return { scheduleId, date: day, due: isDueToday(schedule.spec, day, { cron: this.cron, logger: this.logger }) };
  }

  async nextRun(scheduleId: string, from?: string): Promise<{ scheduleId: string; from: string; nextRun: string | null }> {
    const day = this.resolveDate(from);
    const schedule = await this.get(scheduleId);
    return { scheduleId, from: day, nextRun: nextDueDate(schedule.spec, day, { cron: this.cron, logger: this.logger }) };
  }

  async listDue(date?: string): Promise<ScheduledReport[]> {
    const day = this.resolveDate(date);
    const all = await this.repository.list();
    return all.filter((s) => isDueToday(s.spec, day, { cron: this.cron, logger: this.logger }));
  }

  /**
   * Record a dispatched run. Returns null when a successful run for that
   * day is already on record. `lastRunDate` only moves forward.
   */
  async recordRun(scheduleId: string, runDate: string): Promise<ScheduledReport | null> {
    const day = this.resolveDate(runDate);
    const executedAt = this.clock.utcNow().toISOString();
    const { schedule, changed } = await this.apply(scheduleId, (current) => {
      if (hasRunOn(current, day)) return current;
      const lastRunDate =
        current.lastRunDate === null || compareCalendarDates(day, current.lastRunDate) > 0 ? day : current.lastRunDate;
      return {
        ...current,
        lastRunDate,
        runCount: current.runCount + 1,
        history: appendExecution(current.history, { runDate: day, executedAt, success: true, error: null }),
      };
    });
    return changed ? schedule : null;
  }

  async recordFailure(scheduleId: string, runDate: string, error: string): Promise<ScheduledReport> {
    const day = this.resolveDate(runDate);
    const executedAt = this.clock.utcNow().toISOString();
    return this.mutate(scheduleId, (current) => ({
      ...current,
      history: appendExecution(current.history, { runDate: day, executedAt, success: false, error }),
    }));
  }

  private resolveDate(date: string | undefined): string {
    const day = date ?? this.clock.today();
    if (!isCalendarDate(day)) {
      throw new ValidationError(`Invalid date: ${day}`);
    }
    return day;
  }

  private async mutate(
    scheduleId: string,
    fn: (current: ScheduledReport) => ScheduledReport,
  ): Promise<ScheduledReport> {
    const { schedule } = await this.apply(scheduleId, fn);
    return schedule;
  }

  /**
   * Returning `current` itself from `fn` means "no change": nothing is saved.
   */
  private async apply(
    scheduleId: string,
    fn: (current: ScheduledReport) => ScheduledReport,
  ): Promise<{ schedule: ScheduledReport; changed: boolean }> {
    return this.lock.runExclusive(scheduleId, async () => {
      const current = await this.get(scheduleId);
      const next = fn(current);
      if (next === current) return { schedule: current, changed: false };

      const saved: ScheduledReport = {
        ...next,
        updatedAt: this.clock.utcNow().toISOString(),
        revision: current.revision + 1,
      };
      await this.repository.save(saved, current.revision);
      return { schedule: saved, changed: true };
    });
  }
}
