/**
 * REPORT GOVERNANCE — CHANGE FREEZE GATE
 *
 * Frozen iff active && activatedAt <= now < until.
 * An active window without both bounds never freezes anything.
 */

import { ValidationError } from '../../common/errors.js';
import { ChangeFrozenError } from './governance.errors.js';
import type { FreezeWindow } from './governance.types.js';

export function createFreezeWindow(): FreezeWindow {
  return {
    active: false,
    activatedAt: null,
    until: null,
    activatedBy: null,
    reason: null,
  };
}

export function isFrozen(window: FreezeWindow, now: number): boolean {
  if (!window.active || window.activatedAt === null || window.until === null) return false;

  const from = Date.parse(window.activatedAt);
  const until = Date.parse(window.until);
  if (Number.isNaN(from) || Number.isNaN(until)) return false;

  return from <= now && now < until;
}

export function assertNotFrozen(window: FreezeWindow, now: number, operation: string): void {
  if (isFrozen(window, now)) {
    throw new ChangeFrozenError(operation, window.until);
  }
}

export interface ActivateFreezeInput {
  until: string;
  actor: string;
  reason: string;
}

export function activateFreeze(input: ActivateFreezeInput, now: number): FreezeWindow {
  const until = Date.parse(input.until);
  if (Number.isNaN(until)) {
    throw new ValidationError(`Invalid freeze end: ${input.until}`);
  }
  if (until <= now) {
    throw new ValidationError('Freeze end must be in the future', { until: input.until });
  }

  return {
    active: true,
    activatedAt: new Date(now).toISOString(),
    until: new Date(until).toISOString(),
    activatedBy: input.actor,
    reason: input.reason,
  };
}

export function deactivateFreeze(): FreezeWindow {
  return createFreezeWindow();
}
