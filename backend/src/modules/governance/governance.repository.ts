/**
 * REPORT GOVERNANCE — REPOSITORIES
 *
 * `save` is a compare-and-set on `revision`: pass null to insert, or the
 * revision that was loaded to update.
 */

import { ConcurrentModificationError } from '../../common/errors.js';
import { IReportGovernanceDoc, ReportGovernanceModel } from './governance.model.js';
import type { GovernanceRepository, ReportGovernance } from './governance.types.js';

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryGovernanceRepository implements GovernanceRepository {
  private governances: Map<string, ReportGovernance> = new Map();

  async load(reportId: string): Promise<ReportGovernance | null> {
    return this.governances.get(reportId) ?? null;
  }

  async save(governance: ReportGovernance, expectedRevision: number | null): Promise<void> {
    const existing = this.governances.get(governance.reportId);
    const actual = existing ? existing.revision : null;
    if (actual !== expectedRevision) {
      throw new ConcurrentModificationError('Governance', governance.reportId, expectedRevision ?? -1);
    }
    this.governances.set(governance.reportId, governance);
  }

  async list(): Promise<ReportGovernance[]> {
    return Array.from(this.governances.values());
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

function toDoc(governance: ReportGovernance): IReportGovernanceDoc {
  return {
    ...governance,
    currentStage: governance.lifecycle.currentStage,
    changeRequests: [...governance.changeRequests],
    releases: [...governance.releases],
    policies: [...governance.policies],
  };
}

function toGovernance(doc: IReportGovernanceDoc): ReportGovernance {
  return {
    reportId: doc.reportId,
    reportName: doc.reportName,
    owner: doc.owner,
    options: doc.options,
    lifecycle: doc.lifecycle,
    workflow: doc.workflow,
    ledger: doc.ledger,
    quality: doc.quality,
    freeze: doc.freeze,
    changeRequests: doc.changeRequests ?? [],
    releases: doc.releases ?? [],
    currentReleaseId: doc.currentReleaseId ?? null,
    policies: doc.policies ?? [],
    deprecation: doc.deprecation ?? null,
    createdAt: doc.createdAt,
    createdBy: doc.createdBy,
    updatedAt: doc.updatedAt,
    revision: doc.revision,
  };
}

export class MongoGovernanceRepository implements GovernanceRepository {
  async load(reportId: string): Promise<ReportGovernance | null> {
    const doc = await ReportGovernanceModel.findOne({ reportId }).lean<IReportGovernanceDoc>();
    return doc ? toGovernance(doc) : null;
  }

  async save(governance: ReportGovernance, expectedRevision: number | null): Promise<void> {
    if (expectedRevision === null) {
      const exists = await ReportGovernanceModel.exists({ reportId: governance.reportId });
      if (exists) {
        throw new ConcurrentModificationError('Governance', governance.reportId, -1);
      }
      await ReportGovernanceModel.create(toDoc(governance));
      return;
    }

    const result = await ReportGovernanceModel.updateOne(
      { reportId: governance.reportId, revision: expectedRevision },
      { $set: toDoc(governance) },
    );
    if (result.matchedCount === 0) {
      throw new ConcurrentModificationError('Governance', governance.reportId, expectedRevision);
    }
  }

  async list(): Promise<ReportGovernance[]> {
    const docs = await ReportGovernanceModel.find({}).lean<IReportGovernanceDoc[]>();
    return docs.map(toGovernance);
  }
}
