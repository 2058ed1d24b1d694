/**
 * REPORT SCHEDULE — REPOSITORIES
 *
 * `save` is a compare-and-set on `revision`: pass null to insert, or the
 * revision that was loaded to update.
 */

import { ConcurrentModificationError } from '../../common/errors.js';
import { IScheduledReportDoc, ScheduledReportModel } from './schedule.model.js';
import type { ScheduledReport, ScheduleRepository } from './schedule.types.js';

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryScheduleRepository implements ScheduleRepository {
  private schedules: Map<string, ScheduledReport> = new Map();

  async load(scheduleId: string): Promise<ScheduledReport | null> {
    return this.schedules.get(scheduleId) ?? null;
  }

  async save(schedule: ScheduledReport, expectedRevision: number | null): Promise<void> {
    const existing = this.schedules.get(schedule.scheduleId);
    const actual = existing ? existing.revision : null;
    if (actual !== expectedRevision) {
      throw new ConcurrentModificationError('Schedule', schedule.scheduleId, expectedRevision ?? -1);
    }
    this.schedules.set(schedule.scheduleId, schedule);
  }

  async list(): Promise<ScheduledReport[]> {
    return Array.from(this.schedules.values());
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

function toScheduledReport(doc: IScheduledReportDoc): ScheduledReport {
  return {
    scheduleId: doc.scheduleId,
    reportId: doc.reportId,
    name: doc.name,
    outputFormat: doc.outputFormat,
    spec: doc.spec,
    lastRunDate: doc.lastRunDate ?? null,
    runCount: doc.runCount ?? 0,
    history: doc.history ?? [],
    createdAt: doc.createdAt,
    createdBy: doc.createdBy,
    updatedAt: doc.updatedAt,
    revision: doc.revision,
  };
}

function toDoc(schedule: ScheduledReport): IScheduledReportDoc {
  return { ...schedule, history: [...schedule.history] };
}

export class MongoScheduleRepository implements ScheduleRepository {
  async load(scheduleId: string): Promise<ScheduledReport | null> {
    const doc = await ScheduledReportModel.findOne({ scheduleId }).lean<IScheduledReportDoc>();
    return doc ? toScheduledReport(doc) : null;
  }

  async save(schedule: ScheduledReport, expectedRevision: number | null): Promise<void> {
    if (expectedRevision === null) {
      const exists = await ScheduledReportModel.exists({ scheduleId: schedule.scheduleId });
      if (exists) {
        throw new ConcurrentModificationError('Schedule', schedule.scheduleId, -1);
      }
      await ScheduledReportModel.create(toDoc(schedule));
      return;
    }

    const result = await ScheduledReportModel.updateOne(
      { scheduleId: schedule.scheduleId, revision: expectedRevision },
      { $set: toDoc(schedule) },
    );
    if (result.matchedCount === 0) {
      throw new ConcurrentModificationError('Schedule', schedule.scheduleId, expectedRevision);
    }
  }

  async list(): Promise<ScheduledReport[]> {
    const docs = await ScheduledReportModel.find({}).lean<IScheduledReportDoc[]>();
    return docs.map(toScheduledReport);
  }
}
