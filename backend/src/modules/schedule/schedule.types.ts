/**
 * REPORT SCHEDULE — TYPES
 */

import type { Weekday } from '../../common/calendar.js';

export type { Weekday } from '../../common/calendar.js';

// ═══════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════

export type ScheduleFrequency = 'DAILY' | 'WEEKLY' | 'MONTHLY' | 'CUSTOM_CRON';
export type ScheduleStatus = 'ACTIVE' | 'PAUSED' | 'DISABLED' | 'COMPLETED';
export type OutputFormat = 'PDF' | 'CSV' | 'XLSX' | 'HTML';

export const SCHEDULE_FREQUENCIES: readonly ScheduleFrequency[] = ['DAILY', 'WEEKLY', 'MONTHLY', 'CUSTOM_CRON'];
export const SCHEDULE_STATUSES: readonly ScheduleStatus[] = ['ACTIVE', 'PAUSED', 'DISABLED', 'COMPLETED'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['PDF', 'CSV', 'XLSX', 'HTML'];

/** Sentinel for "last day of the month" in MONTHLY schedules */
export const LAST_DAY_OF_MONTH = 'LAST' as const;
export type DayOfMonth = number | typeof LAST_DAY_OF_MONTH;

// ═══════════════════════════════════════════════════════════════
// SCHEDULE SPEC
// ═══════════════════════════════════════════════════════════════

/**
 * Recurrence of a report job. Only the fields of its frequency are read;
 * the rest stay null. Replaced wholesale on edit.
 */
export interface ScheduleSpec {
  readonly frequency: ScheduleFrequency;
  readonly intervalDays: number | null;
  readonly daysOfWeek: readonly Weekday[];
  readonly dayOfMonth: DayOfMonth | null;
  readonly cronExpression: string | null;
  readonly startDate: string | null; // YYYY-MM-DD, inclusive
  readonly endDate: string | null; // YYYY-MM-DD, inclusive
  readonly timeOfDay: string | null; // HH:mm, informational
  readonly status: ScheduleStatus;
}

export type ScheduleSpecInput = Partial<ScheduleSpec> & Pick<ScheduleSpec, 'frequency'>;

export function createScheduleSpec(input: ScheduleSpecInput): ScheduleSpec {
  return {
    frequency: input.frequency,
    intervalDays: input.intervalDays ?? null,
    daysOfWeek: input.daysOfWeek ? [...input.daysOfWeek] : [],
    dayOfMonth: input.dayOfMonth ?? null,
    cronExpression: input.cronExpression ?? null,
    startDate: input.startDate ?? null,
    endDate: input.endDate ?? null,
    timeOfDay: input.timeOfDay ?? null,
    status: input.status ?? 'ACTIVE',
  };
}

// ═══════════════════════════════════════════════════════════════
// SCHEDULE AGGREGATE
// ═══════════════════════════════════════════════════════════════

/** Most recent executions kept per schedule */
export const RUN_HISTORY_LIMIT = 50;

export interface ReportExecution {
  readonly runDate: string; // YYYY-MM-DD the run was for
  readonly executedAt: string; // ISO timestamp
  readonly success: boolean;
  readonly error: string | null;
}

export interface ScheduledReport {
  readonly scheduleId: string;
  readonly reportId: string;
  readonly name: string;
  readonly outputFormat: OutputFormat;
  readonly spec: ScheduleSpec;
  readonly lastRunDate: string | null; // latest successful runDate
  readonly runCount: number;
  readonly history: readonly ReportExecution[]; // newest first
  readonly createdAt: string;
  readonly createdBy: string;
  readonly updatedAt: string;
  readonly revision: number;
}

export interface RegisterScheduleInput {
  reportId: string;
  name: string;
  outputFormat?: OutputFormat;
  spec: ScheduleSpecInput;
  createdBy: string;
}

// ═══════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════

/**
 * External cron evaluator. The schedule core never parses cron text.
 */
export interface CronDelegate {
  isDue: (cronExpression: string, date: string) => boolean;
  validate: (cronExpression: string) => boolean;
}

export interface ScheduleRepository {
  load: (scheduleId: string) => Promise<ScheduledReport | null>;
  save: (schedule: ScheduledReport, expectedRevision: number | null) => Promise<void>;
  list: () => Promise<ScheduledReport[]>;
}

/**
 * Receives schedules that are due; rendering and delivery live behind it.
 */
export interface ReportJobDispatcher {
  dispatch: (schedule: ScheduledReport, runDate: string) => Promise<void>;
}

// ═══════════════════════════════════════════════════════════════
// RUNNER RESULTS
// ═══════════════════════════════════════════════════════════════

export interface ScheduleTickStep {
  scheduleId: string;
  status: 'DISPATCHED' | 'SKIPPED' | 'FAILED' | 'COMPLETED';
  reason?: string;
  error?: string;
}

export interface ScheduleTickResult {
  runDate: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  dispatched: number;
  completed: number;
  failed: number;
  steps: ScheduleTickStep[];
}
