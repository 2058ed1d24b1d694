/**
 * Lifecycle State Machine Tests
 */

import { describe, it, expect } from 'vitest';
import { approveStep, addStep, createWorkflow } from '../approval.workflow.js';
import { createFreezeWindow } from '../change-freeze.gate.js';
import { ApprovalRequiredError, ChangeFrozenError, InvalidTransitionError } from '../governance.errors.js';
import {
  LIFECYCLE_STAGES,
  type FreezeWindow,
  type LifecycleRecord,
  type LifecycleStage,
  type Workflow,
} from '../governance.types.js';
import {
  allowedTargets,
  applyTransition,
  canTransition,
  createLifecycle,
  isTerminal,
  stageDurations,
  transition,
  type TransitionContext,
} from '../lifecycle.machine.js';

const NOW = Date.parse('2025-06-01T12:00:00.000Z');
const AT = '2025-06-01T12:00:00.000Z';

function approvedWorkflow(): Workflow {
  const { workflow, step } = addStep(createWorkflow(), { name: 'Data owner', approverId: 'bob' }, AT);
  return approveStep(workflow, { stepId: step.stepId, actor: 'bob', at: AT });
}

function ctx(overrides: Partial<TransitionContext> = {}): TransitionContext {
  return {
    workflow: approvedWorkflow(),
    approvalRequired: true,
    freeze: createFreezeWindow(),
    now: NOW,
    ...overrides,
  };
}

function recordAt(stage: LifecycleStage): LifecycleRecord {
  return applyTransition(createLifecycle(), { to: stage, actor: 'seed', reason: 'seed', at: AT }).record;
}

const EXPECTED: Record<LifecycleStage, LifecycleStage[]> = {
  DRAFT: ['REVIEW'],
  REVIEW: ['APPROVED', 'DRAFT'],
  APPROVED: ['PUBLISHED', 'REVIEW'],
  PUBLISHED: ['DEPRECATED', 'ARCHIVED'],
  DEPRECATED: ['ARCHIVED', 'RETIRED'],
  ARCHIVED: ['RETIRED', 'PUBLISHED'],
  RETIRED: [],
};

describe('transition table', () => {
  it('should only allow DRAFT from no stage', () => {
    expect(allowedTargets(null)).toEqual(['DRAFT']);
    expect(canTransition(null, 'REVIEW')).toBe(false);
  });

  it('should match the full table for every pair', () => {
    for (const from of LIFECYCLE_STAGES) {
      for (const to of LIFECYCLE_STAGES) {
        expect(canTransition(from, to)).toBe(EXPECTED[from].includes(to));
      }
    }
  });

  it('should treat RETIRED as the only terminal stage', () => {
    expect(LIFECYCLE_STAGES.filter(isTerminal)).toEqual(['RETIRED']);
  });
});

describe('transition', () => {
  it('should reject DRAFT → PUBLISHED and leave the record unchanged', () => {
    const record = recordAt('DRAFT');
    const before = JSON.stringify(record);

    expect(() => transition(record, { to: 'PUBLISHED', actor: 'alice', reason: 'ship', at: AT }, ctx())).toThrow(
      InvalidTransitionError,
    );
    expect(JSON.stringify(record)).toBe(before);
  });

  it('should walk the approved path to PUBLISHED', () => {
    let record = createLifecycle();
    const path: LifecycleStage[] = ['DRAFT', 'REVIEW', 'APPROVED', 'PUBLISHED'];

    path.forEach((to, i) => {
      const at = new Date(NOW + i * 1000).toISOString();
      record = transition(record, { to, actor: 'alice', reason: `step ${i}`, at }, ctx()).record;
    });

    expect(record.currentStage).toBe('PUBLISHED');
    expect(record.previousStage).toBe('APPROVED');
    expect(record.history.map((h) => [h.from, h.to])).toEqual([
      [null, 'DRAFT'],
      ['DRAFT', 'REVIEW'],
      ['REVIEW', 'APPROVED'],
      ['APPROVED', 'PUBLISHED'],
    ]);
    expect(record.history[record.history.length - 1].to).toBe(record.currentStage);
    expect(record.stageChangedAt).toBe('2025-06-01T12:00:03.000Z');
  });

  it('should require an approved workflow to enter APPROVED', () => {
    const record = recordAt('REVIEW');

    expect(() =>
      transition(record, { to: 'APPROVED', actor: 'alice', reason: 'ok', at: AT }, ctx({ workflow: createWorkflow() })),
    ).toThrow(ApprovalRequiredError);
  });

  it('should skip the approval gate when approval is not required', () => {
    const record = recordAt('REVIEW');
    const outcome = transition(
      record,
      { to: 'APPROVED', actor: 'alice', reason: 'ok', at: AT },
      ctx({ workflow: createWorkflow(), approvalRequired: false }),
    );
    expect(outcome.record.currentStage).toBe('APPROVED');
  });

  it('should check legality before the approval gate', () => {
    const record = recordAt('DRAFT');
    expect(() =>
      transition(record, { to: 'APPROVED', actor: 'alice', reason: 'skip', at: AT }, ctx({ workflow: createWorkflow() })),
    ).toThrow(InvalidTransitionError);
  });

  it('should block every transition while frozen', () => {
    const freeze: FreezeWindow = {
      active: true,
      activatedAt: '2025-06-01T00:00:00.000Z',
      until: '2025-06-02T00:00:00.000Z',
      activatedBy: 'ops',
      reason: 'quarter close',
    };
    const record = recordAt('DRAFT');

    expect(() => transition(record, { to: 'REVIEW', actor: 'alice', reason: 'r', at: AT }, ctx({ freeze }))).toThrow(
      ChangeFrozenError,
    );
  });

  it('should record who, when and why', () => {
    const { record, transition: entry } = transition(
      recordAt('DRAFT'),
      { to: 'REVIEW', actor: 'carol', reason: 'ready for review', at: AT },
      ctx(),
    );

    expect(entry).toMatchObject({ from: 'DRAFT', to: 'REVIEW', actor: 'carol', reason: 'ready for review', at: AT });
    expect(entry.transitionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(record.stageChangedBy).toBe('carol');
    expect(record.stageEnteredAt.REVIEW).toBe(AT);
  });
});

describe('stageDurations', () => {
  it('should sum time per stage up to now', () => {
    let record = createLifecycle();
    record = applyTransition(record, { to: 'DRAFT', actor: 'a', reason: '', at: '2025-06-01T00:00:00.000Z' }).record;
    record = applyTransition(record, { to: 'REVIEW', actor: 'a', reason: '', at: '2025-06-01T01:00:00.000Z' }).record;
    record = applyTransition(record, { to: 'DRAFT', actor: 'a', reason: '', at: '2025-06-01T01:30:00.000Z' }).record;

    const durations = stageDurations(record, Date.parse('2025-06-01T02:00:00.000Z'));

    expect(durations).toEqual({ DRAFT: 90 * 60 * 1000, REVIEW: 30 * 60 * 1000 });
  });
});
