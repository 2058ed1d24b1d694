/**
 * REPORT GOVERNANCE — APPROVAL WORKFLOW ENGINE
 *
 * Status is always derived from the steps, never stored on its own:
 *   REJECTED    any step rejected (sticky)
 *   APPROVED    at least one step and every required step approved
 *   IN_PROGRESS some step decided
 *   PENDING     otherwise
 */

import { v4 as uuid } from 'uuid';
import { ValidationError } from '../../common/errors.js';
import { StepAlreadyDecidedError, StepNotFoundError } from './governance.errors.js';
import type { ApprovalStep, StepStatus, Workflow, WorkflowStatus } from './governance.types.js';

export function createWorkflow(): Workflow {
  return { steps: [], status: 'PENDING', requestedAt: null, completedAt: null };
}

export function deriveWorkflowStatus(steps: readonly ApprovalStep[]): WorkflowStatus {
  if (steps.some((s) => s.status === 'REJECTED')) return 'REJECTED';
  if (steps.length > 0 && steps.filter((s) => s.required).every((s) => s.status === 'APPROVED')) {
    return 'APPROVED';
  }
  if (steps.some((s) => s.status !== 'PENDING')) return 'IN_PROGRESS';
  return 'PENDING';
}

function withSteps(workflow: Workflow, steps: readonly ApprovalStep[], at: string): Workflow {
  const status = deriveWorkflowStatus(steps);
  return {
    steps,
    status,
    requestedAt: workflow.requestedAt ?? at,
    completedAt: workflow.completedAt ?? (status === 'APPROVED' ? at : null),
  };
}

// ═══════════════════════════════════════════════════════════════
// OPERATIONS
// ═══════════════════════════════════════════════════════════════

export interface AddStepInput {
  name: string;
  approverId: string;
  approverRole?: string | null;
  required?: boolean;
  timeoutDays?: number | null;
}

export function addStep(workflow: Workflow, input: AddStepInput, at: string): { workflow: Workflow; step: ApprovalStep } {
  if (!input.name || !input.approverId) {
    throw new ValidationError('Approval step needs a name and an approverId');
  }
  if (input.timeoutDays != null && (!Number.isInteger(input.timeoutDays) || input.timeoutDays < 1)) {
    throw new ValidationError('timeoutDays must be a positive integer');
  }

  const order = workflow.steps.reduce((max, s) => Math.max(max, s.order), 0) + 1;
  const step: ApprovalStep = {
    stepId: uuid(),
    order,
    name: input.name,
    approverId: input.approverId,
    approverRole: input.approverRole ?? null,
    required: input.required ?? true,
    status: 'PENDING',
    requestedAt: at,
    respondedAt: null,
    decidedBy: null,
    comment: null,
    timeoutDays: input.timeoutDays ?? null,
  };

  return { workflow: withSteps(workflow, [...workflow.steps, step], at), step };
}

export interface StepDecision {
  stepId: string;
  actor: string;
  comment?: string | null;
  at: string;
}

export function approveStep(workflow: Workflow, decision: StepDecision): Workflow {
  return decide(workflow, decision, 'APPROVED');
}

export function rejectStep(workflow: Workflow, decision: StepDecision): Workflow {
  return decide(workflow, decision, 'REJECTED');
}

function decide(workflow: Workflow, decision: StepDecision, status: Exclude<StepStatus, 'PENDING'>): Workflow {
  const target = workflow.steps.find((s) => s.stepId === decision.stepId);
  if (!target) throw new StepNotFoundError(decision.stepId);
  if (target.status !== 'PENDING') throw new StepAlreadyDecidedError(target.stepId, target.status);

  const steps = workflow.steps.map((s) =>
    s.stepId === decision.stepId
      ? {
          ...s,
          status,
          respondedAt: decision.at,
          decidedBy: decision.actor,
          comment: decision.comment ?? null,
        }
      : s,
  );
  return withSteps(workflow, steps, decision.at);
}

/**
 * Pending steps whose timeout has run out at `now`.
 */
export function overdueSteps(workflow: Workflow, now: number): ApprovalStep[] {
  const DAY_MS = 24 * 60 * 60 * 1000;
  return workflow.steps.filter(
    (s) => s.status === 'PENDING' && s.timeoutDays !== null && Date.parse(s.requestedAt) + s.timeoutDays * DAY_MS <= now,
  );
}
