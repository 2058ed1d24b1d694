/**
 * REPORT GOVERNANCE — MongoDB model
 *
 * One document per report. Sub-records are stored as written by the
 * aggregate operations and always replaced together with `revision`.
 */

import mongoose, { Schema } from 'mongoose';
import type {
  ChangeRequest,
  Deprecation,
  FreezeWindow,
  GovernanceOptions,
  GovernancePolicy,
  LifecycleRecord,
  QualityGate,
  Release,
  VersionLedger,
  Workflow,
} from './governance.types.js';

export interface IReportGovernanceDoc {
  reportId: string;
  reportName: string;
  owner: string;
  options: GovernanceOptions;
  currentStage: string | null;
  lifecycle: LifecycleRecord;
  workflow: Workflow;
  ledger: VersionLedger;
  quality: QualityGate;
  freeze: FreezeWindow;
  changeRequests: ChangeRequest[];
  releases: Release[];
  currentReleaseId: string | null;
  policies: GovernancePolicy[];
  deprecation: Deprecation | null;
  createdAt: string;
  createdBy: string;
  updatedAt: string;
  revision: number;
}

const ReportGovernanceSchema = new Schema<IReportGovernanceDoc>(
  {
    reportId: { type: String, required: true, unique: true, index: true },
    reportName: { type: String, required: true },
    owner: { type: String, required: true, index: true },
    options: { type: Schema.Types.Mixed, required: true },
    // denormalized from lifecycle for stage queries
    currentStage: { type: String, default: null, index: true },
    lifecycle: { type: Schema.Types.Mixed, required: true },
    workflow: { type: Schema.Types.Mixed, required: true },
    ledger: { type: Schema.Types.Mixed, required: true },
    quality: { type: Schema.Types.Mixed, required: true },
    freeze: { type: Schema.Types.Mixed, required: true },
    changeRequests: { type: [{ type: Schema.Types.Mixed }], default: [] },
    releases: { type: [{ type: Schema.Types.Mixed }], default: [] },
    currentReleaseId: { type: String, default: null },
    policies: { type: [{ type: Schema.Types.Mixed }], default: [] },
    deprecation: { type: Schema.Types.Mixed, default: null },
    createdAt: { type: String, required: true },
    createdBy: { type: String, required: true },
    updatedAt: { type: String, required: true },
    revision: { type: Number, required: true, default: 0 },
  },
  { collection: 'report_governance', versionKey: false, minimize: false },
);

export const ReportGovernanceModel = mongoose.model<IReportGovernanceDoc>('ReportGovernance', ReportGovernanceSchema);
