/**
 * REPORT GOVERNANCE — RELEASES
 */

import { v4 as uuid } from 'uuid';
import { NotFoundError, ValidationError } from '../../common/errors.js';
import { isFrozen } from './change-freeze.gate.js';
import { ReleaseBlockedError, ReleaseStateError } from './governance.errors.js';
import { allPassed } from './quality.gate.js';
import { hasVersion } from './version.ledger.js';
import type { LifecycleStage, Release, ReleaseReadiness, ReportGovernance } from './governance.types.js';

const RELEASABLE_STAGES: readonly LifecycleStage[] = ['APPROVED', 'PUBLISHED', 'ARCHIVED'];

/**
 * Go/no-go with every blocker listed, not just the first.
 */
export function releaseReadiness(governance: ReportGovernance, now: number): ReleaseReadiness {
  const blockers: string[] = [];
  const { options, workflow, freeze, quality, lifecycle } = governance;

  if (options.approvalRequired && workflow.status !== 'APPROVED') {
    blockers.push(`approval workflow is ${workflow.status}`);
  }
  if (isFrozen(freeze, now)) {
    blockers.push(`changes are frozen until ${freeze.until ?? 'further notice'}`);
  }
  if (options.qualityChecks && !allPassed(quality)) {
    blockers.push(`${quality.failedCount} quality check(s) failed`);
  }
  const stage = lifecycle.currentStage;
  if (stage === null || !RELEASABLE_STAGES.includes(stage)) {
    blockers.push(`stage ${stage ?? '(none)'} is not releasable`);
  }

  return { go: blockers.length === 0, blockers };
}

export interface PlanReleaseInput {
  name: string;
  versionNumber: string;
  scheduledAt?: string | null;
}

export function planRelease(governance: ReportGovernance, input: PlanReleaseInput): { releases: Release[]; release: Release } {
  if (!input.name) {
    throw new ValidationError('Release needs a name');
  }
  if (!hasVersion(governance.ledger, input.versionNumber)) {
    throw new ValidationError(`Unknown version: ${input.versionNumber}`, { versionNumber: input.versionNumber });
  }
  if (input.scheduledAt != null && Number.isNaN(Date.parse(input.scheduledAt))) {
    throw new ValidationError(`Invalid scheduledAt: ${input.scheduledAt}`);
  }

  const release: Release = {
    releaseId: uuid(),
    name: input.name,
    versionNumber: input.versionNumber,
    status: input.scheduledAt ? 'SCHEDULED' : 'PLANNING',
    scheduledAt: input.scheduledAt ?? null,
    releasedAt: null,
    releasedBy: null,
  };

  return { releases: [...governance.releases, release], release };
}

export function markReleased(governance: ReportGovernance, releaseId: string, actor: string, now: number): Release[] {
  const target = governance.releases.find((r) => r.releaseId === releaseId);
  if (!target) throw new NotFoundError('Release', releaseId);
  if (target.status !== 'PLANNING' && target.status !== 'SCHEDULED') {
    throw new ReleaseBlockedError(releaseId, [`release is ${target.status}`]);
  }

  const readiness = releaseReadiness(governance, now);
  if (!readiness.go) {
    throw new ReleaseBlockedError(releaseId, readiness.blockers);
  }

  return governance.releases.map((r): Release =>
    r.releaseId === releaseId
      ? { ...r, status: 'RELEASED', releasedAt: new Date(now).toISOString(), releasedBy: actor }
      : r,
  );
}

function findRelease(releases: readonly Release[], releaseId: string): Release {
  const release = releases.find((r) => r.releaseId === releaseId);
  if (!release) throw new NotFoundError('Release', releaseId);
  return release;
}

/**
 * Drop a release that has not gone out yet.
 */
export function cancelRelease(releases: readonly Release[], releaseId: string): Release[] {
  const target = findRelease(releases, releaseId);
  if (target.status !== 'PLANNING' && target.status !== 'SCHEDULED') {
    throw new ReleaseStateError(releaseId, target.status, 'cancel');
  }
  return releases.map((r): Release => (r.releaseId === releaseId ? { ...r, status: 'CANCELLED' } : r));
}

/**
 * Withdraw a published release. When it was the current one, the
 * pointer falls back to the most recently released remaining release.
 */
export function rollbackRelease(
  governance: ReportGovernance,
  releaseId: string,
): { releases: Release[]; currentReleaseId: string | null } {
  const target = findRelease(governance.releases, releaseId);
  if (target.status !== 'RELEASED') {
    throw new ReleaseStateError(releaseId, target.status, 'roll back');
  }

  const releases = governance.releases.map((r): Release =>
    r.releaseId === releaseId ? { ...r, status: 'ROLLED_BACK' } : r,
  );
  if (governance.currentReleaseId !== releaseId) {
    return { releases, currentReleaseId: governance.currentReleaseId };
  }

  let fallback: Release | null = null;
  for (const r of releases) {
    if (r.status !== 'RELEASED') continue;
    if (fallback === null || (r.releasedAt ?? '') >= (fallback.releasedAt ?? '')) fallback = r;
  }
  return { releases, currentReleaseId: fallback ? fallback.releaseId : null };
}
