/**
 * REPORT GOVERNANCE — ERRORS
 *
 * Policy violations, not transient failures: none of these is retried.
 */

import { AppError } from '../../common/errors.js';
import type { LifecycleStage, WorkflowStatus } from './governance.types.js';

export class InvalidTransitionError extends AppError {
  readonly from: LifecycleStage | null;
  readonly to: LifecycleStage;

  constructor(from: LifecycleStage | null, to: LifecycleStage) {
    super('INVALID_TRANSITION', `Cannot transition from ${from ?? '(none)'} to ${to}`, 409, { from, to });
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class ApprovalRequiredError extends AppError {
  constructor(workflowStatus: WorkflowStatus) {
    super('APPROVAL_REQUIRED', `Approval workflow must be APPROVED (currently ${workflowStatus})`, 409, {
      workflowStatus,
    });
    this.name = 'ApprovalRequiredError';
  }
}

export class ChangeFrozenError extends AppError {
  readonly until: string | null;

  constructor(operation: string, until: string | null) {
    super('CHANGE_FROZEN', `Operation '${operation}' blocked: changes are frozen until ${until ?? 'further notice'}`, 423, {
      operation,
      until,
    });
    this.name = 'ChangeFrozenError';
    this.until = until;
  }
}

/**
 * Zero or several current versions. Means the atomic ledger update was
 * broken somewhere; alert, do not recover.
 */
export class VersionConsistencyError extends AppError {
  constructor(reason: string, details: Record<string, unknown>) {
    super('VERSION_CONSISTENCY', `Version ledger inconsistent: ${reason}`, 500, details);
    this.name = 'VersionConsistencyError';
  }
}

export class StepNotFoundError extends AppError {
  constructor(stepId: string) {
    super('STEP_NOT_FOUND', `Approval step not found: ${stepId}`, 404, { stepId });
    this.name = 'StepNotFoundError';
  }
}

export class StepAlreadyDecidedError extends AppError {
  constructor(stepId: string, status: string) {
    super('STEP_ALREADY_DECIDED', `Approval step ${stepId} is already ${status}`, 409, { stepId, status });
    this.name = 'StepAlreadyDecidedError';
  }
}

export class ChangeRequestNotFoundError extends AppError {
  constructor(changeId: string) {
    super('CHANGE_REQUEST_NOT_FOUND', `Change request not found: ${changeId}`, 404, { changeId });
    this.name = 'ChangeRequestNotFoundError';
  }
}

export class ChangeRequestDecidedError extends AppError {
  constructor(changeId: string, status: string, action: string) {
    super('CHANGE_REQUEST_DECIDED', `Cannot ${action} change request ${changeId} in status ${status}`, 409, {
      changeId,
      status,
      action,
    });
    this.name = 'ChangeRequestDecidedError';
  }
}

export class ReleaseBlockedError extends AppError {
  readonly blockers: string[];

  constructor(releaseId: string, blockers: string[]) {
    super('RELEASE_BLOCKED', `Release ${releaseId} blocked: ${blockers.join('; ')}`, 409, { releaseId, blockers });
    this.name = 'ReleaseBlockedError';
    this.blockers = blockers;
  }
}

export class ReleaseStateError extends AppError {
  constructor(releaseId: string, status: string, action: string) {
    super('INVALID_RELEASE_STATE', `Cannot ${action} release ${releaseId} in status ${status}`, 409, {
      releaseId,
      status,
      action,
    });
    this.name = 'ReleaseStateError';
  }
}
