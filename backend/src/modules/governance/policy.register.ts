/**
 * REPORT GOVERNANCE — POLICIES
 */

import { v4 as uuid } from 'uuid';
import { ValidationError } from '../../common/errors.js';
import type { GovernancePolicy } from './governance.types.js';

export const DEFAULT_POLICY_PRIORITY = 100;

export interface AddPolicyInput {
  name: string;
  policyType: string;
  description?: string;
  enabled?: boolean;
  mandatory?: boolean;
  priority?: number | null;
  condition?: string | null;
  action?: string | null;
  effectiveFrom?: string | null;
  effectiveUntil?: string | null;
}

function parseInstant(value: string | null | undefined, field: string): number | null {
  if (value == null) return null;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new ValidationError(`Invalid ${field}: ${value}`);
  }
  return ms;
}

export function addPolicy(
  policies: readonly GovernancePolicy[],
  input: AddPolicyInput,
  actor: string,
  at: string,
): { policies: GovernancePolicy[]; policy: GovernancePolicy } {
  if (!input.name || !input.policyType) {
    throw new ValidationError('Policy needs a name and a policyType');
  }
  const priority = input.priority ?? DEFAULT_POLICY_PRIORITY;
  if (!Number.isInteger(priority)) {
    throw new ValidationError(`priority must be an integer, got ${priority}`);
  }

  const from = parseInstant(input.effectiveFrom, 'effectiveFrom');
  const until = parseInstant(input.effectiveUntil, 'effectiveUntil');
  if (from !== null && until !== null && until <= from) {
    throw new ValidationError('effectiveUntil must be after effectiveFrom');
  }

  const policy: GovernancePolicy = {
    policyId: uuid(),
    name: input.name,
    description: input.description ?? '',
    policyType: input.policyType,
    enabled: input.enabled ?? true,
    mandatory: input.mandatory ?? false,
    priority,
    condition: input.condition ?? null,
    action: input.action ?? null,
    effectiveFrom: from === null ? null : new Date(from).toISOString(),
    effectiveUntil: until === null ? null : new Date(until).toISOString(),
    createdBy: actor,
    createdAt: at,
  };

  return { policies: [...policies, policy], policy };
}

export function countPolicies(policies: readonly GovernancePolicy[]): { total: number; active: number } {
  return { total: policies.length, active: policies.filter((p) => p.enabled).length };
}

/**
 * Enabled policies whose effective window contains `now`, by priority.
 */
export function policiesInEffect(policies: readonly GovernancePolicy[], now: number): GovernancePolicy[] {
  return policies
    .filter(
      (p) =>
        p.enabled &&
        (p.effectiveFrom === null || Date.parse(p.effectiveFrom) <= now) &&
        (p.effectiveUntil === null || now < Date.parse(p.effectiveUntil)),
    )
    .sort((a, b) => a.priority - b.priority);
}
