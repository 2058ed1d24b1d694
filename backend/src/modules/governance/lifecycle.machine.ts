/**
 * REPORT GOVERNANCE — LIFECYCLE STATE MACHINE
 *
 * DRAFT → REVIEW → APPROVED → PUBLISHED → DEPRECATED → ARCHIVED → RETIRED
 * with the back-edges listed in TRANSITIONS. Checks run in a fixed order:
 * legality, approval gate, freeze gate. The first failure wins and the
 * record is left untouched.
 */

import { v4 as uuid } from 'uuid';
import { isFrozen } from './change-freeze.gate.js';
import { ApprovalRequiredError, ChangeFrozenError, InvalidTransitionError } from './governance.errors.js';
import type {
  FreezeWindow,
  LifecycleRecord,
  LifecycleStage,
  StageTransition,
  Workflow,
} from './governance.types.js';

// ═══════════════════════════════════════════════════════════════
// TRANSITION TABLE
// ═══════════════════════════════════════════════════════════════

const INITIAL_TARGETS: readonly LifecycleStage[] = ['DRAFT'];

const TRANSITIONS: Record<LifecycleStage, readonly LifecycleStage[]> = {
  DRAFT: ['REVIEW'],
  REVIEW: ['APPROVED', 'DRAFT'],
  APPROVED: ['PUBLISHED', 'REVIEW'],
  PUBLISHED: ['DEPRECATED', 'ARCHIVED'],
  DEPRECATED: ['ARCHIVED', 'RETIRED'],
  ARCHIVED: ['RETIRED', 'PUBLISHED'],
  RETIRED: [],
};

export function allowedTargets(from: LifecycleStage | null): readonly LifecycleStage[] {
  return from === null ? INITIAL_TARGETS : TRANSITIONS[from];
}

export function canTransition(from: LifecycleStage | null, to: LifecycleStage): boolean {
  return allowedTargets(from).includes(to);
}

export function isTerminal(stage: LifecycleStage): boolean {
  return TRANSITIONS[stage].length === 0;
}

// ═══════════════════════════════════════════════════════════════
// RECORD
// ═══════════════════════════════════════════════════════════════

export function createLifecycle(): LifecycleRecord {
  return {
    currentStage: null,
    previousStage: null,
    stageChangedAt: null,
    stageChangedBy: null,
    history: [],
    stageEnteredAt: {},
  };
}

export interface TransitionRequest {
  to: LifecycleStage;
  actor: string;
  reason: string;
  at: string; // ISO timestamp
}

export interface TransitionContext {
  workflow: Workflow;
  approvalRequired: boolean;
  freeze: FreezeWindow;
  now: number;
}

export interface TransitionOutcome {
  record: LifecycleRecord;
  transition: StageTransition;
}

export function transition(
  record: LifecycleRecord,
  request: TransitionRequest,
  ctx: TransitionContext,
): TransitionOutcome {
  const from = record.currentStage;
  const { to } = request;

  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
  if (to === 'APPROVED' && ctx.approvalRequired && ctx.workflow.status !== 'APPROVED') {
    throw new ApprovalRequiredError(ctx.workflow.status);
  }
  if (isFrozen(ctx.freeze, ctx.now)) {
    throw new ChangeFrozenError(`transition to ${to}`, ctx.freeze.until);
  }

  return applyTransition(record, request);
}

/**
 * Append without any gate. Only for registration, where the aggregate
 * does not exist yet and no gate can be armed.
 */
export function applyTransition(record: LifecycleRecord, request: TransitionRequest): TransitionOutcome {
  const entry: StageTransition = {
    transitionId: uuid(),
    from: record.currentStage,
    to: request.to,
    at: request.at,
    actor: request.actor,
    reason: request.reason,
  };

  return {
    record: {
      currentStage: request.to,
      previousStage: record.currentStage,
      stageChangedAt: request.at,
      stageChangedBy: request.actor,
      history: [...record.history, entry],
      stageEnteredAt: { ...record.stageEnteredAt, [request.to]: request.at },
    },
    transition: entry,
  };
}

/**
 * Total milliseconds spent in each stage; the current stage runs until `now`.
 */
export function stageDurations(record: LifecycleRecord, now: number): Partial<Record<LifecycleStage, number>> {
  const durations: Partial<Record<LifecycleStage, number>> = {};
  const { history } = record;

  history.forEach((entry, i) => {
    const start = Date.parse(entry.at);
    const next = history[i + 1];
    const end = next ? Date.parse(next.at) : now;
    durations[entry.to] = (durations[entry.to] ?? 0) + Math.max(0, end - start);
  });

  return durations;
}
