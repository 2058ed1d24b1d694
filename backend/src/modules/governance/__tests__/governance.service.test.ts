/**
 * Governance Service Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConcurrentModificationError, NotFoundError } from '../../../common/errors.js';
import { fixedClock } from '../../../common/host.deps.js';
import { InMemoryAuditSink } from '../governance.audit.js';
import {
  ApprovalRequiredError,
  ChangeFrozenError,
  InvalidTransitionError,
  VersionConsistencyError,
} from '../governance.errors.js';
import { InMemoryGovernanceRepository } from '../governance.repository.js';
import { GovernanceService } from '../governance.service.js';
import type { GovernanceRepository, ReportGovernance } from '../governance.types.js';

const base = { reportName: 'Revenue', owner: 'alice', createdBy: 'alice' };

describe('GovernanceService', () => {
  let repository: InMemoryGovernanceRepository;
  let audit: InMemoryAuditSink;
  let service: GovernanceService;
  const clock = fixedClock('2025-06-01T12:00:00.000Z');
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    clock.set('2025-06-01T12:00:00.000Z');
    repository = new InMemoryGovernanceRepository();
    audit = new InMemoryAuditSink();
    service = new GovernanceService({ repository, audit, clock, logger: mockLogger });
  });

  async function approveAll(reportId: string): Promise<void> {
    const g = await service.addApprovalStep(reportId, { name: 'Owner', approverId: 'bob', actor: 'alice' });
    await service.decideApprovalStep(reportId, 'APPROVE', { stepId: g.workflow.steps[0].stepId, actor: 'bob' });
  }

  describe('create', () => {
    it('should register in DRAFT with version 1.0.0', async () => {
      const g = await service.create({ reportId: 'rep-1', ...base });

      expect(g.lifecycle.currentStage).toBe('DRAFT');
      expect(g.lifecycle.history).toHaveLength(1);
      expect(g.lifecycle.history[0]).toMatchObject({ from: null, to: 'DRAFT', actor: 'alice' });
      expect(g.ledger.currentVersion).toBe('1.0.0');
      expect(g.ledger.versions[0]).toMatchObject({ changeType: 'MAJOR', description: 'Initial version' });
      expect(g.options).toEqual({
        level: 'STANDARD',
        approvalRequired: true,
        versionControl: true,
        qualityChecks: true,
        qualityThreshold: 0.7,
      });
      expect(g.revision).toBe(0);
      expect(audit.list('rep-1').map((e) => e.type)).toEqual(['GOVERNANCE_CREATED']);
    });

    it('should start with an empty ledger without version control', async () => {
      const g = await service.create({ reportId: 'rep-1', ...base, options: { versionControl: false } });
      expect(g.ledger.versions).toEqual([]);
      expect(g.ledger.currentVersion).toBeNull();
    });

    it('should refuse a duplicate report', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await expect(service.create({ reportId: 'rep-1', ...base })).rejects.toBeInstanceOf(ConcurrentModificationError);
    });
  });

  describe('transition', () => {
    it('should refuse DRAFT → PUBLISHED without saving', async () => {
      await service.create({ reportId: 'rep-1', ...base });

      await expect(
        service.transition('rep-1', { to: 'PUBLISHED', actor: 'alice', reason: 'ship it' }),
      ).rejects.toBeInstanceOf(InvalidTransitionError);

      const g = await service.get('rep-1');
      expect(g.revision).toBe(0);
      expect(g.lifecycle.currentStage).toBe('DRAFT');
    });

    it('should walk DRAFT → REVIEW → APPROVED → PUBLISHED once approved', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await approveAll('rep-1');

      await service.transition('rep-1', { to: 'REVIEW', actor: 'alice', reason: 'ready' });
      await service.transition('rep-1', { to: 'APPROVED', actor: 'bob', reason: 'signed' });
      const g = await service.transition('rep-1', { to: 'PUBLISHED', actor: 'alice', reason: 'live' });

      expect(g.lifecycle.currentStage).toBe('PUBLISHED');
      expect(g.lifecycle.history.map((h) => h.to)).toEqual(['DRAFT', 'REVIEW', 'APPROVED', 'PUBLISHED']);
      expect(g.revision).toBe(5);
      expect(audit.list('rep-1').filter((e) => e.type === 'STAGE_TRANSITION')).toHaveLength(3);
    });

    it('should require approval to enter APPROVED', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await service.transition('rep-1', { to: 'REVIEW', actor: 'alice', reason: 'ready' });

      await expect(service.transition('rep-1', { to: 'APPROVED', actor: 'bob', reason: 'x' })).rejects.toBeInstanceOf(
        ApprovalRequiredError,
      );
    });

    it('should keep a rejected workflow rejected', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      let g = await service.addApprovalStep('rep-1', { name: 'Owner', approverId: 'bob', actor: 'alice' });
      g = await service.addApprovalStep('rep-1', { name: 'Legal', approverId: 'lee', actor: 'alice' });
      const [owner, legal] = g.workflow.steps;

      await service.decideApprovalStep('rep-1', 'REJECT', { stepId: owner.stepId, actor: 'bob', comment: 'no' });
      g = await service.decideApprovalStep('rep-1', 'APPROVE', { stepId: legal.stepId, actor: 'lee' });

      expect(g.workflow.status).toBe('REJECTED');
    });

    it('should capture deprecation metadata with the transition', async () => {
      await service.create({ reportId: 'rep-1', ...base, options: { approvalRequired: false } });
      for (const to of ['REVIEW', 'APPROVED', 'PUBLISHED'] as const) {
        await service.transition('rep-1', { to, actor: 'alice', reason: to });
      }

      clock.set('2025-07-01T00:00:00.000Z');
      const g = await service.transition('rep-1', {
        to: 'DEPRECATED',
        actor: 'alice',
        reason: 'superseded',
        deprecation: { replacementReportId: 'rep-2', retirementDate: '2025-12-31' },
      });

      expect(g.deprecation).toEqual({
        deprecatedAt: '2025-07-01T00:00:00.000Z',
        deprecatedBy: 'alice',
        reason: 'superseded',
        replacementReportId: 'rep-2',
        retirementDate: '2025-12-31',
      });
    });

    it('should throw NotFoundError for an unknown report', async () => {
      await expect(service.transition('nope', { to: 'REVIEW', actor: 'a', reason: '' })).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe('freeze', () => {
    it('should block transitions and change requests until lifted', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await service.activateFreeze('rep-1', { until: '2025-06-02T00:00:00.000Z', actor: 'ops', reason: 'close' });

      await expect(service.transition('rep-1', { to: 'REVIEW', actor: 'alice', reason: '' })).rejects.toBeInstanceOf(
        ChangeFrozenError,
      );
      await expect(
        service.submitChangeRequest('rep-1', { title: 'x', changeType: 'PATCH', requestedBy: 'alice' }),
      ).rejects.toBeInstanceOf(ChangeFrozenError);

      await service.deactivateFreeze('rep-1', 'ops');
      const g = await service.transition('rep-1', { to: 'REVIEW', actor: 'alice', reason: '' });
      expect(g.lifecycle.currentStage).toBe('REVIEW');
    });

    it('should expire at the end of the window', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await service.activateFreeze('rep-1', { until: '2025-06-02T00:00:00.000Z', actor: 'ops', reason: 'close' });

      clock.set('2025-06-02T00:00:00.000Z');
      const g = await service.transition('rep-1', { to: 'REVIEW', actor: 'alice', reason: '' });
      expect(g.lifecycle.currentStage).toBe('REVIEW');
    });
  });

  describe('versions', () => {
    it('should bump from the current version', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await service.createVersion('rep-1', { changeType: 'MINOR', description: 'new chart', actor: 'alice' });
      const g = await service.createVersion('rep-1', { changeType: 'HOTFIX', description: 'typo', actor: 'alice' });

      expect(g.ledger.currentVersion).toBe('1.1.1');
      expect(g.ledger.versions.filter((v) => v.current)).toHaveLength(1);
    });

    it('should fail loudly when the stored ledger is corrupt', async () => {
      const g = await service.create({ reportId: 'rep-1', ...base });
      const corrupt: ReportGovernance = {
        ...g,
        ledger: { ...g.ledger, versions: g.ledger.versions.map((v) => ({ ...v, current: false })) },
      };
      await repository.save(corrupt, 0);

      await expect(service.transition('rep-1', { to: 'REVIEW', actor: 'alice', reason: '' })).rejects.toBeInstanceOf(
        VersionConsistencyError,
      );
      expect(mockLogger.error).toHaveBeenCalledTimes(1);
      expect((await service.get('rep-1')).lifecycle.currentStage).toBe('DRAFT');
    });
  });

  describe('releases', () => {
    it('should release a ready report', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await approveAll('rep-1');
      await service.transition('rep-1', { to: 'REVIEW', actor: 'alice', reason: '' });
      await service.transition('rep-1', { to: 'APPROVED', actor: 'bob', reason: '' });
      await service.recordQualityCheck('rep-1', { name: 'totals', checkType: 'DATA', passed: true, score: 0.95, executedBy: 'ci' });

      expect(await service.readiness('rep-1')).toEqual({ go: true, blockers: [] });
      expect((await service.quality('rep-1')).grade).toBe('A');

      let g = await service.planRelease('rep-1', { name: 'June', versionNumber: '1.0.0', actor: 'alice' });
      g = await service.markReleased('rep-1', { releaseId: g.releases[0].releaseId, actor: 'alice' });

      expect(g.releases[0].status).toBe('RELEASED');
      expect(g.currentReleaseId).toBe(g.releases[0].releaseId);
      expect((await service.overview('rep-1')).currentReleaseId).toBe(g.releases[0].releaseId);
    });

    it('should move the current release back on rollback', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await approveAll('rep-1');
      await service.transition('rep-1', { to: 'REVIEW', actor: 'alice', reason: '' });
      await service.transition('rep-1', { to: 'APPROVED', actor: 'bob', reason: '' });

      await service.planRelease('rep-1', { name: 'June', versionNumber: '1.0.0', actor: 'alice' });
      let g = await service.planRelease('rep-1', { name: 'July', versionNumber: '1.0.0', actor: 'alice' });
      const [june, july] = g.releases.map((r) => r.releaseId);
      await service.markReleased('rep-1', { releaseId: june, actor: 'alice' });
      clock.set('2025-06-01T13:00:00.000Z');
      await service.markReleased('rep-1', { releaseId: july, actor: 'alice' });

      g = await service.rollbackRelease('rep-1', { releaseId: july, actor: 'carol' });

      expect(g.currentReleaseId).toBe(june);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { reportId: 'rep-1', releaseId: july, currentReleaseId: june },
        'Release rolled back',
      );
      expect(audit.list('rep-1').map((e) => e.type).slice(-3)).toEqual([
        'RELEASE_PUBLISHED',
        'RELEASE_PUBLISHED',
        'RELEASE_ROLLED_BACK',
      ]);
    });

    it('should cancel a planned release', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      let g = await service.planRelease('rep-1', { name: 'June', versionNumber: '1.0.0', actor: 'alice' });

      g = await service.cancelRelease('rep-1', { releaseId: g.releases[0].releaseId, actor: 'alice' });

      expect(g.releases[0].status).toBe('CANCELLED');
      expect(g.currentReleaseId).toBeNull();
    });
  });

  describe('policies', () => {
    it('should add policies and report those in effect', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await service.addPolicy('rep-1', { name: 'Four eyes', policyType: 'APPROVAL', priority: 10, actor: 'alice' });
      await service.addPolicy('rep-1', {
        name: 'Quiet period',
        policyType: 'FREEZE',
        effectiveFrom: '2025-07-01T00:00:00.000Z',
        actor: 'alice',
      });
      await service.addPolicy('rep-1', { name: 'Default', policyType: 'QUALITY', actor: 'alice' });
      const g = await service.addPolicy('rep-1', { name: 'Off', policyType: 'QUALITY', enabled: false, actor: 'alice' });

      expect(g.policies.map((p) => p.priority)).toEqual([10, 100, 100, 100]);
      const overview = await service.overview('rep-1');
      expect(overview.policies).toEqual({ total: 4, active: 3 });
      expect(overview.policiesInEffect).toEqual([g.policies[0].policyId, g.policies[2].policyId]);
      expect(audit.list('rep-1').filter((e) => e.type === 'POLICY_ADDED')).toHaveLength(4);
    });
  });

  describe('concurrency', () => {
    it('should serialize concurrent mutations on one report', async () => {
      await service.create({ reportId: 'rep-1', ...base });

      await Promise.all([
        service.createVersion('rep-1', { changeType: 'PATCH', description: 'a', actor: 'a' }),
        service.createVersion('rep-1', { changeType: 'PATCH', description: 'b', actor: 'b' }),
        service.createVersion('rep-1', { changeType: 'PATCH', description: 'c', actor: 'c' }),
      ]);

      const g = await service.get('rep-1');
      expect(g.revision).toBe(3);
      expect(g.ledger.currentVersion).toBe('1.0.3');
      expect(g.ledger.versions.filter((v) => v.current)).toHaveLength(1);
    });

    it('should surface a lost compare-and-set', async () => {
      const inner = new InMemoryGovernanceRepository();
      const racing: GovernanceRepository = {
        load: (id) => inner.load(id),
        list: () => inner.list(),
        save: async (g, expected) => {
          if (expected !== null) {
            const current = await inner.load(g.reportId);
            if (current) await inner.save({ ...current, revision: current.revision + 1 }, current.revision);
          }
          await inner.save(g, expected);
        },
      };
      const racy = new GovernanceService({ repository: racing, audit, clock, logger: mockLogger });
      await racy.create({ reportId: 'rep-1', ...base });

      await expect(
        racy.createVersion('rep-1', { changeType: 'PATCH', description: 'x', actor: 'a' }),
      ).rejects.toBeInstanceOf(ConcurrentModificationError);
    });
  });

  describe('statistics', () => {
    it('should aggregate over every report', async () => {
      await service.create({ reportId: 'rep-1', ...base });
      await service.create({ reportId: 'rep-2', ...base, options: { level: 'STRICT' } });
      await service.addApprovalStep('rep-1', { name: 'Owner', approverId: 'bob', actor: 'alice' });
      await service.submitChangeRequest('rep-2', { title: 'x', changeType: 'MINOR', requestedBy: 'alice' });
      await service.transition('rep-2', { to: 'REVIEW', actor: 'alice', reason: '' });
      await service.addPolicy('rep-1', { name: 'Four eyes', policyType: 'APPROVAL', actor: 'alice' });
      await service.addPolicy('rep-2', { name: 'Off', policyType: 'QUALITY', enabled: false, actor: 'alice' });

      expect(await service.getStatistics()).toEqual({
        totalGovernances: 2,
        byStage: { DRAFT: 1, REVIEW: 1 },
        byLevel: { STANDARD: 1, STRICT: 1 },
        deprecatedReports: 0,
        totalApprovalSteps: 1,
        totalChangeRequests: 1,
        pendingChangeRequests: 1,
        totalPolicies: 2,
        activePolicies: 1,
      });
    });
  });

  describe('audit', () => {
    it('should not undo a saved change when the sink throws', async () => {
      const failing = new GovernanceService({
        repository,
        audit: {
          record: () => {
            throw new Error('sink down');
          },
        },
        clock,
        logger: mockLogger,
      });

      const g = await failing.create({ reportId: 'rep-1', ...base });
      expect(g.revision).toBe(0);
      expect(await repository.load('rep-1')).not.toBeNull();
      expect(mockLogger.warn).toHaveBeenCalledTimes(1);
    });
  });
});
