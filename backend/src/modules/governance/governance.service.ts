/**
 * REPORT GOVERNANCE — SERVICE
 *
 * Every mutation for one reportId goes through `mutate`:
 *   lock(reportId) → load → pure operation → ledger check → save(revision)
 * then, once the lock is released, the audit event is recorded.
 * Different reports never wait on each other.
 */

import { NotFoundError, errorMessage } from '../../common/errors.js';
import { KeyedLock } from '../../common/keyed-lock.js';
import { Clock, Logger, systemClock } from '../../common/host.deps.js';
import { AddStepInput, overdueSteps } from './approval.workflow.js';
import { isFrozen } from './change-freeze.gate.js';
import { SubmitChangeInput, countChangeRequests } from './change-request.register.js';
import {
  ChangeVerdict,
  CreateGovernanceInput,
  CreateVersionInput,
  DecideStepInput,
  GovernanceMutation,
  StepVerdict,
  TransitionStageInput,
  addApprovalStep,
  addChangeRequest,
  addGovernancePolicy,
  addQualityCheck,
  addRelease,
  createGovernance,
  createVersion,
  decideApprovalStep,
  decideChangeRequest,
  freezeChanges,
  implementChangeRequest,
  publishRelease,
  revertRelease,
  transitionStage,
  unfreezeChanges,
  withdrawRelease,
} from './governance.aggregate.js';
import { VersionConsistencyError } from './governance.errors.js';
import {
  AuditSink,
  DEFAULT_GOVERNANCE_OPTIONS,
  GovernanceEvent,
  GovernanceOptions,
  GovernanceRepository,
  GovernanceStatistics,
  LifecycleStage,
  QualityScore,
  ReleaseReadiness,
  ReportGovernance,
} from './governance.types.js';
import { allowedTargets, stageDurations } from './lifecycle.machine.js';
import { AddPolicyInput, countPolicies, policiesInEffect } from './policy.register.js';
import { RecordCheckInput, allPassed, qualityScore } from './quality.gate.js';
import { PlanReleaseInput, releaseReadiness } from './release.register.js';
import { assertConsistent } from './version.ledger.js';

export interface GovernanceServiceDeps {
  repository: GovernanceRepository;
  audit: AuditSink;
  clock?: Clock;
  logger: Logger;
  defaults?: GovernanceOptions;
}

export interface GovernanceOverview {
  reportId: string;
  currentStage: LifecycleStage | null;
  allowedTargets: readonly LifecycleStage[];
  workflowStatus: string;
  currentVersion: string | null;
  currentReleaseId: string | null;
  frozen: boolean;
  allChecksPassed: boolean;
  quality: QualityScore;
  changeRequests: ReturnType<typeof countChangeRequests>;
  policies: ReturnType<typeof countPolicies>;
  policiesInEffect: string[];
  overdueSteps: string[];
  stageDurationsMs: Partial<Record<LifecycleStage, number>>;
  readiness: ReleaseReadiness;
}

export class GovernanceService {
  private readonly repository: GovernanceRepository;
  private readonly audit: AuditSink;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly defaults: GovernanceOptions;
  private readonly lock = new KeyedLock();

  constructor(deps: GovernanceServiceDeps) {
    this.repository = deps.repository;
    this.audit = deps.audit;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger;
    this.defaults = deps.defaults ?? DEFAULT_GOVERNANCE_OPTIONS;
  }

  // ═══════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════

  async get(reportId: string): Promise<ReportGovernance> {
    const governance = await this.repository.load(reportId);
    if (!governance) throw new NotFoundError('Governance', reportId);
    return governance;
  }

  async list(filter: { stage?: LifecycleStage; owner?: string } = {}): Promise<ReportGovernance[]> {
    const all = await this.repository.list();
    return all.filter(
      (g) =>
        (filter.stage === undefined || g.lifecycle.currentStage === filter.stage) &&
        (filter.owner === undefined || g.owner === filter.owner),
    );
  }

  async readiness(reportId: string): Promise<ReleaseReadiness> {
    return releaseReadiness(await this.get(reportId), this.clock.now());
  }

  async quality(reportId: string): Promise<QualityScore> {
    const governance = await this.get(reportId);
    return qualityScore(governance.quality, governance.options.qualityThreshold);
  }

  async overview(reportId: string): Promise<GovernanceOverview> {
    const governance = await this.get(reportId);
    const now = this.clock.now();

    return {
      reportId,
      currentStage: governance.lifecycle.currentStage,
      allowedTargets: allowedTargets(governance.lifecycle.currentStage),
      workflowStatus: governance.workflow.status,
      currentVersion: governance.ledger.currentVersion,
      currentReleaseId: governance.currentReleaseId,
      frozen: isFrozen(governance.freeze, now),
      allChecksPassed: allPassed(governance.quality),
      quality: qualityScore(governance.quality, governance.options.qualityThreshold),
      changeRequests: countChangeRequests(governance.changeRequests),
      policies: countPolicies(governance.policies),
      policiesInEffect: policiesInEffect(governance.policies, now).map((p) => p.policyId),
      overdueSteps: overdueSteps(governance.workflow, now).map((s) => s.stepId),
      stageDurationsMs: stageDurations(governance.lifecycle, now),
      readiness: releaseReadiness(governance, now),
    };
  }

  async getStatistics(): Promise<GovernanceStatistics> {
    const all = await this.repository.list();
    const stats: GovernanceStatistics = {
      totalGovernances: all.length,
      byStage: {},
      byLevel: {},
      deprecatedReports: 0,
      totalApprovalSteps: 0,
      totalChangeRequests: 0,
      pendingChangeRequests: 0,
      totalPolicies: 0,
      activePolicies: 0,
    };

    for (const g of all) {
      const stage = g.lifecycle.currentStage;
      if (stage !== null) stats.byStage[stage] = (stats.byStage[stage] ?? 0) + 1;
      stats.byLevel[g.options.level] = (stats.byLevel[g.options.level] ?? 0) + 1;
      if (g.deprecation !== null) stats.deprecatedReports++;
      stats.totalApprovalSteps += g.workflow.steps.length;
      stats.totalChangeRequests += g.changeRequests.length;
      stats.pendingChangeRequests += g.changeRequests.filter((r) => r.status === 'PENDING').length;
      const policies = countPolicies(g.policies);
      stats.totalPolicies += policies.total;
      stats.activePolicies += policies.active;
    }
    return stats;
  }

  // ═══════════════════════════════════════════════════════════════
  // COMMANDS
  // ═══════════════════════════════════════════════════════════════

  async create(input: CreateGovernanceInput): Promise<ReportGovernance> {
    const { governance, event } = createGovernance(input, this.clock.now(), this.defaults);

    await this.lock.runExclusive(governance.reportId, async () => {
      assertConsistent(governance.ledger);
      await this.repository.save(governance, null);
    });

    this.logger.info(
      { reportId: governance.reportId, level: governance.options.level, version: governance.ledger.currentVersion },
      'Governance created',
    );
    this.emit(event);
    return governance;
  }

  async transition(reportId: string, input: TransitionStageInput): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => transitionStage(g, input, now));
  }

  async addApprovalStep(reportId: string, input: AddStepInput & { actor: string }): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => addApprovalStep(g, input, now));
  }

  async decideApprovalStep(reportId: string, verdict: StepVerdict, input: DecideStepInput): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => decideApprovalStep(g, verdict, input, now));
  }

  async createVersion(reportId: string, input: CreateVersionInput): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => createVersion(g, input, now));
  }

  async recordQualityCheck(reportId: string, input: Omit<RecordCheckInput, 'executedAt'>): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => addQualityCheck(g, input, now));
  }

  async activateFreeze(reportId: string, input: { until: string; actor: string; reason: string }): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => freezeChanges(g, input, now));
  }

  async deactivateFreeze(reportId: string, actor: string): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => unfreezeChanges(g, actor, now));
  }

  async submitChangeRequest(reportId: string, input: SubmitChangeInput): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => addChangeRequest(g, input, now));
  }

  async decideChangeRequest(
    reportId: string,
    verdict: ChangeVerdict,
    input: { changeId: string; actor: string; reason?: string },
  ): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => decideChangeRequest(g, verdict, input, now));
  }

  async implementChangeRequest(reportId: string, input: { changeId: string; actor: string }): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => implementChangeRequest(g, input, now));
  }

  async planRelease(reportId: string, input: PlanReleaseInput & { actor: string }): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => addRelease(g, input, now));
  }

  async markReleased(reportId: string, input: { releaseId: string; actor: string }): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => publishRelease(g, input, now));
  }

  async cancelRelease(reportId: string, input: { releaseId: string; actor: string }): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => withdrawRelease(g, input, now));
  }

  async rollbackRelease(reportId: string, input: { releaseId: string; actor: string }): Promise<ReportGovernance> {
    const governance = await this.mutate(reportId, (g, now) => revertRelease(g, input, now));
    this.logger.warn(
      { reportId, releaseId: input.releaseId, currentReleaseId: governance.currentReleaseId },
      'Release rolled back',
    );
    return governance;
  }

  /**
   * Priority defaults to 100 when not given.
   */
  async addPolicy(reportId: string, input: AddPolicyInput & { actor: string }): Promise<ReportGovernance> {
    return this.mutate(reportId, (g, now) => addGovernancePolicy(g, input, now));
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private async mutate(
    reportId: string,
    fn: (current: ReportGovernance, now: number) => GovernanceMutation,
  ): Promise<ReportGovernance> {
    const { governance, event } = await this.lock.runExclusive(reportId, async () => {
      const current = await this.get(reportId);
      const now = this.clock.now();
      const change = fn(current, now);

      try {
        assertConsistent(change.governance.ledger);
      } catch (err) {
        if (err instanceof VersionConsistencyError) {
          this.logger.error({ reportId, details: err.details }, 'Version ledger invariant broken');
        }
        throw err;
      }

      const saved: ReportGovernance = {
        ...change.governance,
        updatedAt: new Date(now).toISOString(),
        revision: current.revision + 1,
      };
      await this.repository.save(saved, current.revision);
      return { governance: saved, event: change.event };
    });

    this.emit(event);
    return governance;
  }

  private emit(event: GovernanceEvent): void {
    try {
      this.audit.record(event);
    } catch (err) {
      this.logger.warn({ reportId: event.reportId, type: event.type, error: errorMessage(err) }, 'Audit sink failed');
    }
  }
}
