/**
 * Schedule Service Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConcurrentModificationError, NotFoundError, ValidationError } from '../../../common/errors.js';
import { fixedClock } from '../../../common/host.deps.js';
import { InMemoryScheduleRepository } from '../schedule.repository.js';
import { ScheduleService, ScheduleStateError } from '../schedule.service.js';
import { MalformedScheduleError } from '../schedule.validation.js';
import { RUN_HISTORY_LIMIT } from '../schedule.types.js';
import type { CronDelegate, RegisterScheduleInput } from '../schedule.types.js';

const cron: CronDelegate = {
  isDue: (expr, date) => expr === '0 8 * * *' && date === '2025-01-15',
  validate: (expr) => expr.split(' ').length === 5,
};

const weekly: RegisterScheduleInput = {
  reportId: 'rep-sales',
  name: 'Weekly sales',
  createdBy: 'alice',
  spec: { frequency: 'WEEKLY', daysOfWeek: ['WEDNESDAY'] },
};

describe('ScheduleService', () => {
  let repository: InMemoryScheduleRepository;
  let service: ScheduleService;
  const clock = fixedClock('2025-01-15T09:00:00.000Z');
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    clock.set('2025-01-15T09:00:00.000Z');
    repository = new InMemoryScheduleRepository();
    service = new ScheduleService({ repository, cron, clock, logger: mockLogger });
  });

  describe('register', () => {
    it('should store a new schedule at revision 0', async () => {
      const schedule = await service.register(weekly);

      expect(schedule.revision).toBe(0);
      expect(schedule.outputFormat).toBe('PDF');
      expect(schedule.spec.status).toBe('ACTIVE');
      expect(schedule.createdAt).toBe('2025-01-15T09:00:00.000Z');
      expect(await service.get(schedule.scheduleId)).toEqual(schedule);
      expect(mockLogger.info).toHaveBeenCalledTimes(1);
    });

    it('should reject a malformed spec', async () => {
      await expect(
        service.register({ ...weekly, spec: { frequency: 'MONTHLY', dayOfMonth: 0 } }),
      ).rejects.toBeInstanceOf(MalformedScheduleError);
      expect(await repository.list()).toHaveLength(0);
    });

    it('should reject missing identity fields', async () => {
      await expect(service.register({ ...weekly, reportId: '' })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('get / list', () => {
    it('should throw NotFoundError for an unknown id', async () => {
      await expect(service.get('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should filter by report and status', async () => {
      const a = await service.register(weekly);
      await service.register({ ...weekly, reportId: 'rep-ops' });
      await service.changeStatus(a.scheduleId, 'pause');

      expect(await service.list({ reportId: 'rep-ops' })).toHaveLength(1);
      const paused = await service.list({ status: 'PAUSED' });
      expect(paused.map((s) => s.scheduleId)).toEqual([a.scheduleId]);
    });
  });

  describe('changeStatus', () => {
    it('should pause and resume', async () => {
      const { scheduleId } = await service.register(weekly);

      const paused = await service.changeStatus(scheduleId, 'pause');
      expect(paused.spec.status).toBe('PAUSED');
      expect(paused.revision).toBe(1);

      const resumed = await service.changeStatus(scheduleId, 'resume');
      expect(resumed.spec.status).toBe('ACTIVE');
      expect(resumed.revision).toBe(2);
    });

    it('should refuse to resume an active schedule', async () => {
      const { scheduleId } = await service.register(weekly);
      await expect(service.changeStatus(scheduleId, 'resume')).rejects.toBeInstanceOf(ScheduleStateError);
    });

    it('should not leave DISABLED', async () => {
      const { scheduleId } = await service.register(weekly);
      await service.changeStatus(scheduleId, 'disable');

      await expect(service.changeStatus(scheduleId, 'resume')).rejects.toBeInstanceOf(ScheduleStateError);
      await expect(service.replaceSpec(scheduleId, { frequency: 'DAILY' })).rejects.toBeInstanceOf(ScheduleStateError);
    });
  });

  describe('replaceSpec', () => {
    it('should replace the spec wholesale and keep the status', async () => {
      const { scheduleId } = await service.register({
        ...weekly,
        spec: { frequency: 'WEEKLY', daysOfWeek: ['MONDAY'], timeOfDay: '08:00' },
      });
      await service.changeStatus(scheduleId, 'pause');

      const updated = await service.replaceSpec(scheduleId, { frequency: 'DAILY', intervalDays: 2 });

      expect(updated.spec).toEqual({
        frequency: 'DAILY',
        intervalDays: 2,
        daysOfWeek: [],
        dayOfMonth: null,
        cronExpression: null,
        startDate: null,
        endDate: null,
        timeOfDay: null,
        status: 'PAUSED',
      });
    });
  });

  describe('isDue / listDue', () => {
    it('should evaluate against the clock date by default', async () => {
      // 2025-01-15 is a Wednesday
      const { scheduleId } = await service.register(weekly);

      expect(await service.isDue(scheduleId)).toEqual({ scheduleId, date: '2025-01-15', due: true });
      expect(await service.isDue(scheduleId, '2025-01-16')).toEqual({ scheduleId, date: '2025-01-16', due: false });
    });

    it('should list schedules due on a date', async () => {
      const wed = await service.register(weekly);
      const cronDue = await service.register({
        ...weekly,
        spec: { frequency: 'CUSTOM_CRON', cronExpression: '0 8 * * *' },
      });
      await service.register({ ...weekly, spec: { frequency: 'MONTHLY', dayOfMonth: 1 } });

      const due = await service.listDue('2025-01-15');
      expect(due.map((s) => s.scheduleId).sort()).toEqual([wed.scheduleId, cronDue.scheduleId].sort());
    });

    it('should reject an invalid date', async () => {
      await expect(service.listDue('2025-13-01')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('recordRun', () => {
    it('should record a run once per day', async () => {
      const { scheduleId } = await service.register(weekly);

      const first = await service.recordRun(scheduleId, '2025-01-15');
      expect(first?.runCount).toBe(1);
      expect(first?.lastRunDate).toBe('2025-01-15');

      expect(await service.recordRun(scheduleId, '2025-01-15')).toBeNull();
      expect((await service.get(scheduleId)).revision).toBe(1);
    });

    it('should keep the run history newest first', async () => {
      const { scheduleId } = await service.register(weekly);

      await service.recordRun(scheduleId, '2025-01-08');
      clock.set('2025-01-15T09:05:00.000Z');
      await service.recordFailure(scheduleId, '2025-01-15', 'renderer down');
      await service.recordRun(scheduleId, '2025-01-15');

      const schedule = await service.get(scheduleId);
      expect(schedule.history).toEqual([
        { runDate: '2025-01-15', executedAt: '2025-01-15T09:05:00.000Z', success: true, error: null },
        { runDate: '2025-01-15', executedAt: '2025-01-15T09:05:00.000Z', success: false, error: 'renderer down' },
        { runDate: '2025-01-08', executedAt: '2025-01-15T09:00:00.000Z', success: true, error: null },
      ]);
      expect(schedule.runCount).toBe(2);
    });

    it('should not move lastRunDate backwards', async () => {
      const { scheduleId } = await service.register(weekly);

      await service.recordRun(scheduleId, '2025-01-15');
      const backfilled = await service.recordRun(scheduleId, '2025-01-08');

      expect(backfilled?.lastRunDate).toBe('2025-01-15');
      expect(backfilled?.runCount).toBe(2);
      expect(await service.recordRun(scheduleId, '2025-01-08')).toBeNull();
    });

    it('should cap the run history', async () => {
      const { scheduleId } = await service.register(weekly);

      for (let i = 0; i < RUN_HISTORY_LIMIT + 5; i++) {
        await service.recordFailure(scheduleId, '2025-01-15', `attempt ${i}`);
      }

      const { history } = await service.get(scheduleId);
      expect(history).toHaveLength(RUN_HISTORY_LIMIT);
      expect(history[0].error).toBe(`attempt ${RUN_HISTORY_LIMIT + 4}`);
    });

    it('should reject a malformed run date', async () => {
      const { scheduleId } = await service.register(weekly);
      await expect(service.recordRun(scheduleId, 'yesterday')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('nextRun', () => {
    it('should find the next due day from the clock date', async () => {
      const { scheduleId } = await service.register({ ...weekly, spec: { frequency: 'WEEKLY', daysOfWeek: ['FRIDAY'] } });

      expect(await service.nextRun(scheduleId)).toEqual({ scheduleId, from: '2025-01-15', nextRun: '2025-01-17' });
      expect(await service.nextRun(scheduleId, '2025-01-18')).toEqual({
        scheduleId,
        from: '2025-01-18',
        nextRun: '2025-01-24',
      });
    });

    it('should have no next run while paused', async () => {
      const { scheduleId } = await service.register(weekly);
      await service.changeStatus(scheduleId, 'pause');

      expect((await service.nextRun(scheduleId)).nextRun).toBeNull();
    });
  });

  describe('concurrency', () => {
    it('should serialize mutations on the same schedule', async () => {
      const { scheduleId } = await service.register(weekly);

      const results = await Promise.all([
        service.recordRun(scheduleId, '2025-01-15'),
        service.recordRun(scheduleId, '2025-01-22'),
        service.changeStatus(scheduleId, 'pause'),
      ]);

      expect(results.every((r) => r !== null)).toBe(true);
      const final = await service.get(scheduleId);
      expect(final.revision).toBe(3);
      expect(final.runCount).toBe(2);
      expect(final.spec.status).toBe('PAUSED');
    });

    it('should reject a stale write at the repository', async () => {
      const schedule = await service.register(weekly);
      await service.changeStatus(schedule.scheduleId, 'pause');

      await expect(repository.save({ ...schedule, name: 'stale' }, 0)).rejects.toBeInstanceOf(
        ConcurrentModificationError,
      );
    });
  });
});
