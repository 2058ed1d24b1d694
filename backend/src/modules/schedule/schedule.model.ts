/**
 * REPORT SCHEDULE — MongoDB model
 */

import mongoose, { Schema } from 'mongoose';
import type { OutputFormat, ReportExecution, ScheduleSpec } from './schedule.types.js';

export interface IScheduledReportDoc {
  scheduleId: string;
  reportId: string;
  name: string;
  outputFormat: OutputFormat;
  spec: ScheduleSpec;
  lastRunDate: string | null;
  runCount: number;
  history: ReportExecution[];
  createdAt: string;
  createdBy: string;
  updatedAt: string;
  revision: number;
}

const ScheduledReportSchema = new Schema<IScheduledReportDoc>(
  {
    scheduleId: { type: String, required: true, unique: true, index: true },
    reportId: { type: String, required: true, index: true },
    name: { type: String, required: true },
    outputFormat: { type: String, enum: ['PDF', 'CSV', 'XLSX', 'HTML'], default: 'PDF' },
    // replaced wholesale on edit, never patched field by field
    spec: { type: Schema.Types.Mixed, required: true },
    lastRunDate: { type: String, default: null },
    runCount: { type: Number, default: 0 },
    history: { type: [{ type: Schema.Types.Mixed }], default: [] },
    createdAt: { type: String, required: true },
    createdBy: { type: String, required: true },
    updatedAt: { type: String, required: true },
    revision: { type: Number, required: true, default: 0 },
  },
  { collection: 'report_schedules', versionKey: false },
);

ScheduledReportSchema.index({ 'spec.status': 1, reportId: 1 });

export const ScheduledReportModel = mongoose.model<IScheduledReportDoc>('ScheduledReport', ScheduledReportSchema);
