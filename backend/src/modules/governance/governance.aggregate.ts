/**
 * REPORT GOVERNANCE — AGGREGATE OPERATIONS
 *
 * Each operation takes the current aggregate and `now`, and returns the
 * next aggregate plus the audit event describing the change. Nothing is
 * mutated; a thrown error leaves the caller's value as it was.
 * `updatedAt` and `revision` belong to the service, not to these.
 */

import { ValidationError } from '../../common/errors.js';
import { isCalendarDate } from '../../common/calendar.js';
import { AddStepInput, addStep, approveStep, createWorkflow, rejectStep } from './approval.workflow.js';
import { activateFreeze, createFreezeWindow, deactivateFreeze } from './change-freeze.gate.js';
import {
  SubmitChangeInput,
  approveChangeRequest,
  markImplemented,
  rejectChangeRequest,
  submitChangeRequest,
} from './change-request.register.js';
import {
  DEFAULT_GOVERNANCE_OPTIONS,
  GOVERNANCE_LEVELS,
  ChangeType,
  Deprecation,
  GovernanceEvent,
  GovernanceEventType,
  GovernanceOptions,
  LifecycleStage,
  ReportGovernance,
} from './governance.types.js';
import { applyTransition, createLifecycle, transition } from './lifecycle.machine.js';
import { AddPolicyInput, addPolicy } from './policy.register.js';
import { RecordCheckInput, createQualityGate, recordCheck } from './quality.gate.js';
import { PlanReleaseInput, cancelRelease, markReleased, planRelease, rollbackRelease } from './release.register.js';
import { INITIAL_VERSION, addVersion, createLedger, currentVersionOf, nextVersion } from './version.ledger.js';

export interface GovernanceMutation {
  governance: ReportGovernance;
  event: GovernanceEvent;
}

function event(
  governance: ReportGovernance,
  type: GovernanceEventType,
  actor: string,
  now: number,
  extra: Pick<GovernanceEvent, 'transition' | 'meta'> = {},
): GovernanceEvent {
  return { reportId: governance.reportId, type, actor, ts: new Date(now).toISOString(), ...extra };
}

// ═══════════════════════════════════════════════════════════════
// CREATE
// ═══════════════════════════════════════════════════════════════

export interface CreateGovernanceInput {
  reportId: string;
  reportName: string;
  owner: string;
  createdBy: string;
  options?: Partial<GovernanceOptions>;
}

export function resolveOptions(
  input: Partial<GovernanceOptions> | undefined,
  defaults: GovernanceOptions = DEFAULT_GOVERNANCE_OPTIONS,
): GovernanceOptions {
  const options: GovernanceOptions = {
    level: input?.level ?? defaults.level,
    approvalRequired: input?.approvalRequired ?? defaults.approvalRequired,
    versionControl: input?.versionControl ?? defaults.versionControl,
    qualityChecks: input?.qualityChecks ?? defaults.qualityChecks,
    qualityThreshold: input?.qualityThreshold ?? defaults.qualityThreshold,
  };

  if (!GOVERNANCE_LEVELS.includes(options.level)) {
    throw new ValidationError(`Unknown governance level: ${String(options.level)}`);
  }
  if (!(options.qualityThreshold >= 0 && options.qualityThreshold <= 1)) {
    throw new ValidationError('qualityThreshold must be within 0..1', { qualityThreshold: options.qualityThreshold });
  }
  return options;
}

/**
 * New aggregate in DRAFT, with version 1.0.0 when version control is on.
 */
export function createGovernance(
  input: CreateGovernanceInput,
  now: number,
  defaults?: GovernanceOptions,
): GovernanceMutation {
  if (!input.reportId || !input.reportName || !input.owner || !input.createdBy) {
    throw new ValidationError('reportId, reportName, owner and createdBy are required');
  }

  const at = new Date(now).toISOString();
  const options = resolveOptions(input.options, defaults);
  const { record, transition: registered } = applyTransition(createLifecycle(), {
    to: 'DRAFT',
    actor: input.createdBy,
    reason: 'Registered',
    at,
  });

  let ledger = createLedger();
  if (options.versionControl) {
    ledger = addVersion(ledger, {
      ...INITIAL_VERSION,
      changeType: 'MAJOR',
      description: 'Initial version',
      createdAt: at,
      createdBy: input.createdBy,
    }).ledger;
  }

  const governance: ReportGovernance = {
    reportId: input.reportId,
    reportName: input.reportName,
    owner: input.owner,
    options,
    lifecycle: record,
    workflow: createWorkflow(),
    ledger,
    quality: createQualityGate(),
    freeze: createFreezeWindow(),
    changeRequests: [],
    releases: [],
    currentReleaseId: null,
    policies: [],
    deprecation: null,
    createdAt: at,
    createdBy: input.createdBy,
    updatedAt: at,
    revision: 0,
  };

  return {
    governance,
    event: event(governance, 'GOVERNANCE_CREATED', input.createdBy, now, {
      transition: registered,
      meta: { options, currentVersion: ledger.currentVersion },
    }),
  };
}

// ═══════════════════════════════════════════════════════════════
// LIFECYCLE
// ═══════════════════════════════════════════════════════════════

export interface DeprecationInput {
  reason?: string;
  replacementReportId?: string | null;
  retirementDate?: string | null;
}

export interface TransitionStageInput {
  to: LifecycleStage;
  actor: string;
  reason: string;
  deprecation?: DeprecationInput;
}

export function transitionStage(governance: ReportGovernance, input: TransitionStageInput, now: number): GovernanceMutation {
  const retirementDate = input.deprecation?.retirementDate ?? null;
  if (input.to === 'DEPRECATED' && retirementDate !== null && !isCalendarDate(retirementDate)) {
    throw new ValidationError(`retirementDate '${retirementDate}' is not a YYYY-MM-DD date`);
  }

  const at = new Date(now).toISOString();
  const { record, transition: entry } = transition(
    governance.lifecycle,
    { to: input.to, actor: input.actor, reason: input.reason, at },
    {
      workflow: governance.workflow,
      approvalRequired: governance.options.approvalRequired,
      freeze: governance.freeze,
      now,
    },
  );

  let deprecation: Deprecation | null = governance.deprecation;
  if (input.to === 'DEPRECATED') {
    deprecation = {
      deprecatedAt: at,
      deprecatedBy: input.actor,
      reason: input.deprecation?.reason ?? input.reason,
      replacementReportId: input.deprecation?.replacementReportId ?? null,
      retirementDate,
    };
  }

  const next: ReportGovernance = { ...governance, lifecycle: record, deprecation };
  return { governance: next, event: event(next, 'STAGE_TRANSITION', input.actor, now, { transition: entry }) };
}

// ═══════════════════════════════════════════════════════════════
// APPROVALS
// ═══════════════════════════════════════════════════════════════

export function addApprovalStep(
  governance: ReportGovernance,
  input: AddStepInput & { actor: string },
  now: number,
): GovernanceMutation {
  const { workflow, step } = addStep(governance.workflow, input, new Date(now).toISOString());
  const next: ReportGovernance = { ...governance, workflow };
  return {
    governance: next,
    event: event(next, 'STEP_ADDED', input.actor, now, {
      meta: { stepId: step.stepId, order: step.order, approverId: step.approverId },
    }),
  };
}

export type StepVerdict = 'APPROVE' | 'REJECT';

export interface DecideStepInput {
  stepId: string;
  actor: string;
  comment?: string | null;
}

export function decideApprovalStep(
  governance: ReportGovernance,
  verdict: StepVerdict,
  input: DecideStepInput,
  now: number,
): GovernanceMutation {
  const decision = { ...input, at: new Date(now).toISOString() };
  const workflow = verdict === 'APPROVE' ? approveStep(governance.workflow, decision) : rejectStep(governance.workflow, decision);
  const next: ReportGovernance = { ...governance, workflow };

  return {
    governance: next,
    event: event(next, verdict === 'APPROVE' ? 'STEP_APPROVED' : 'STEP_REJECTED', input.actor, now, {
      meta: { stepId: input.stepId, workflowStatus: workflow.status },
    }),
  };
}

// ═══════════════════════════════════════════════════════════════
// VERSIONS / QUALITY
// ═══════════════════════════════════════════════════════════════

export interface CreateVersionInput {
  changeType: ChangeType;
  description: string;
  actor: string;
  stable?: boolean;
}

export function createVersion(governance: ReportGovernance, input: CreateVersionInput, now: number): GovernanceMutation {
  if (!governance.options.versionControl) {
    throw new ValidationError(`Version control is disabled for report ${governance.reportId}`);
  }

  const bumped = nextVersion(currentVersionOf(governance.ledger), input.changeType);
  const { ledger, version } = addVersion(governance.ledger, {
    ...bumped,
    changeType: input.changeType,
    description: input.description,
    createdAt: new Date(now).toISOString(),
    createdBy: input.actor,
    stable: input.stable,
  });
  const next: ReportGovernance = { ...governance, ledger };

  return {
    governance: next,
    event: event(next, 'VERSION_ADDED', input.actor, now, {
      meta: { versionNumber: version.versionNumber, changeType: version.changeType },
    }),
  };
}

export function addQualityCheck(
  governance: ReportGovernance,
  input: Omit<RecordCheckInput, 'executedAt'>,
  now: number,
): GovernanceMutation {
  const { gate, check } = recordCheck(governance.quality, { ...input, executedAt: new Date(now).toISOString() });
  const next: ReportGovernance = { ...governance, quality: gate };

  return {
    governance: next,
    event: event(next, 'CHECK_RECORDED', input.executedBy, now, {
      meta: { checkId: check.checkId, name: check.name, passed: check.passed, score: check.score },
    }),
  };
}

// ═══════════════════════════════════════════════════════════════
// FREEZE
// ═══════════════════════════════════════════════════════════════

export function freezeChanges(
  governance: ReportGovernance,
  input: { until: string; actor: string; reason: string },
  now: number,
): GovernanceMutation {
  const freeze = activateFreeze(input, now);
  const next: ReportGovernance = { ...governance, freeze };
  return {
    governance: next,
    event: event(next, 'FREEZE_ACTIVATED', input.actor, now, { meta: { until: freeze.until, reason: input.reason } }),
  };
}

export function unfreezeChanges(governance: ReportGovernance, actor: string, now: number): GovernanceMutation {
  const next: ReportGovernance = { ...governance, freeze: deactivateFreeze() };
  return { governance: next, event: event(next, 'FREEZE_DEACTIVATED', actor, now) };
}

// ═══════════════════════════════════════════════════════════════
// CHANGE REQUESTS
// ═══════════════════════════════════════════════════════════════

export function addChangeRequest(governance: ReportGovernance, input: SubmitChangeInput, now: number): GovernanceMutation {
  const { requests, request } = submitChangeRequest(governance.changeRequests, input, governance.freeze, now);
  const next: ReportGovernance = { ...governance, changeRequests: requests };
  return {
    governance: next,
    event: event(next, 'CHANGE_SUBMITTED', input.requestedBy, now, {
      meta: { changeId: request.changeId, changeType: request.changeType },
    }),
  };
}

export type ChangeVerdict = 'APPROVE' | 'REJECT';

export function decideChangeRequest(
  governance: ReportGovernance,
  verdict: ChangeVerdict,
  input: { changeId: string; actor: string; reason?: string },
  now: number,
): GovernanceMutation {
  const changeRequests =
    verdict === 'APPROVE'
      ? approveChangeRequest(governance.changeRequests, input.changeId, input.actor, governance.freeze, now)
      : rejectChangeRequest(governance.changeRequests, input.changeId, input.actor, input.reason ?? '', now);
  const next: ReportGovernance = { ...governance, changeRequests };

  return {
    governance: next,
    event: event(next, verdict === 'APPROVE' ? 'CHANGE_APPROVED' : 'CHANGE_REJECTED', input.actor, now, {
      meta: { changeId: input.changeId },
    }),
  };
}

export function implementChangeRequest(
  governance: ReportGovernance,
  input: { changeId: string; actor: string },
  now: number,
): GovernanceMutation {
  const next: ReportGovernance = {
    ...governance,
    changeRequests: markImplemented(governance.changeRequests, input.changeId, now),
  };
  return {
    governance: next,
    event: event(next, 'CHANGE_IMPLEMENTED', input.actor, now, { meta: { changeId: input.changeId } }),
  };
}

// ═══════════════════════════════════════════════════════════════
// RELEASES
// ═══════════════════════════════════════════════════════════════

export function addRelease(
  governance: ReportGovernance,
  input: PlanReleaseInput & { actor: string },
  now: number,
): GovernanceMutation {
  const { releases, release } = planRelease(governance, input);
  const next: ReportGovernance = { ...governance, releases };
  return {
    governance: next,
    event: event(next, 'RELEASE_PLANNED', input.actor, now, {
      meta: { releaseId: release.releaseId, versionNumber: release.versionNumber, status: release.status },
    }),
  };
}

export function publishRelease(
  governance: ReportGovernance,
  input: { releaseId: string; actor: string },
  now: number,
): GovernanceMutation {
  const next: ReportGovernance = {
    ...governance,
    releases: markReleased(governance, input.releaseId, input.actor, now),
    currentReleaseId: input.releaseId,
  };
  return {
    governance: next,
    event: event(next, 'RELEASE_PUBLISHED', input.actor, now, { meta: { releaseId: input.releaseId } }),
  };
}

export function withdrawRelease(
  governance: ReportGovernance,
  input: { releaseId: string; actor: string },
  now: number,
): GovernanceMutation {
  const next: ReportGovernance = { ...governance, releases: cancelRelease(governance.releases, input.releaseId) };
  return {
    governance: next,
    event: event(next, 'RELEASE_CANCELLED', input.actor, now, { meta: { releaseId: input.releaseId } }),
  };
}

export function revertRelease(
  governance: ReportGovernance,
  input: { releaseId: string; actor: string },
  now: number,
): GovernanceMutation {
  const { releases, currentReleaseId } = rollbackRelease(governance, input.releaseId);
  const next: ReportGovernance = { ...governance, releases, currentReleaseId };
  return {
    governance: next,
    event: event(next, 'RELEASE_ROLLED_BACK', input.actor, now, {
      meta: { releaseId: input.releaseId, currentReleaseId },
    }),
  };
}

// ═══════════════════════════════════════════════════════════════
// POLICIES
// ═══════════════════════════════════════════════════════════════

export function addGovernancePolicy(
  governance: ReportGovernance,
  input: AddPolicyInput & { actor: string },
  now: number,
): GovernanceMutation {
  const { policies, policy } = addPolicy(governance.policies, input, input.actor, new Date(now).toISOString());
  const next: ReportGovernance = { ...governance, policies };
  return {
    governance: next,
    event: event(next, 'POLICY_ADDED', input.actor, now, {
      meta: { policyId: policy.policyId, name: policy.name, priority: policy.priority, enabled: policy.enabled },
    }),
  };
}
