/**
 * REPORT GOVERNANCE — CHANGE REQUESTS
 *
 * Submitting and approving are changes and stop at the freeze gate;
 * rejecting is not and always goes through.
 */

import { v4 as uuid } from 'uuid';
import { ValidationError } from '../../common/errors.js';
import { assertNotFrozen } from './change-freeze.gate.js';
import { ChangeRequestDecidedError, ChangeRequestNotFoundError } from './governance.errors.js';
import { CHANGE_TYPES, ChangeRequest, ChangeType, FreezeWindow } from './governance.types.js';

export interface SubmitChangeInput {
  title: string;
  description?: string;
  changeType: ChangeType;
  requestedBy: string;
  scheduledFor?: string | null;
  impactsProduction?: boolean;
}

export interface ChangeRequestCounts {
  total: number;
  pending: number;
  approved: number;
  rejected: number;
  implemented: number;
}

export function submitChangeRequest(
  requests: readonly ChangeRequest[],
  input: SubmitChangeInput,
  freeze: FreezeWindow,
  now: number,
): { requests: ChangeRequest[]; request: ChangeRequest } {
  assertNotFrozen(freeze, now, 'submit change request');

  if (!input.title || !input.requestedBy) {
    throw new ValidationError('Change request needs a title and requestedBy');
  }
  if (!CHANGE_TYPES.includes(input.changeType)) {
    throw new ValidationError(`Unknown change type: ${String(input.changeType)}`);
  }

  const request: ChangeRequest = {
    changeId: uuid(),
    title: input.title,
    description: input.description ?? '',
    changeType: input.changeType,
    requestedBy: input.requestedBy,
    requestedAt: new Date(now).toISOString(),
    status: 'PENDING',
    decidedBy: null,
    decidedAt: null,
    rejectionReason: null,
    scheduledFor: input.scheduledFor ?? null,
    implementedAt: null,
    impactsProduction: input.impactsProduction ?? false,
  };

  return { requests: [...requests, request], request };
}

export function approveChangeRequest(
  requests: readonly ChangeRequest[],
  changeId: string,
  actor: string,
  freeze: FreezeWindow,
  now: number,
): ChangeRequest[] {
  assertNotFrozen(freeze, now, 'approve change request');

  return updatePending(requests, changeId, 'approve', (r) => ({
    ...r,
    status: 'APPROVED',
    decidedBy: actor,
    decidedAt: new Date(now).toISOString(),
  }));
}

export function rejectChangeRequest(
  requests: readonly ChangeRequest[],
  changeId: string,
  actor: string,
  reason: string,
  now: number,
): ChangeRequest[] {
  return updatePending(requests, changeId, 'reject', (r) => ({
    ...r,
    status: 'REJECTED',
    decidedBy: actor,
    decidedAt: new Date(now).toISOString(),
    rejectionReason: reason,
  }));
}

export function markImplemented(requests: readonly ChangeRequest[], changeId: string, now: number): ChangeRequest[] {
  const target = findRequest(requests, changeId);
  if (target.status !== 'APPROVED' || target.implementedAt !== null) {
    throw new ChangeRequestDecidedError(changeId, target.implementedAt ? 'IMPLEMENTED' : target.status, 'implement');
  }
  return requests.map((r) => (r.changeId === changeId ? { ...r, implementedAt: new Date(now).toISOString() } : r));
}

export function countChangeRequests(requests: readonly ChangeRequest[]): ChangeRequestCounts {
  return {
    total: requests.length,
    pending: requests.filter((r) => r.status === 'PENDING').length,
    approved: requests.filter((r) => r.status === 'APPROVED').length,
    rejected: requests.filter((r) => r.status === 'REJECTED').length,
    implemented: requests.filter((r) => r.implementedAt !== null).length,
  };
}

function findRequest(requests: readonly ChangeRequest[], changeId: string): ChangeRequest {
  const target = requests.find((r) => r.changeId === changeId);
  if (!target) throw new ChangeRequestNotFoundError(changeId);
  return target;
}

function updatePending(
  requests: readonly ChangeRequest[],
  changeId: string,
  action: string,
  fn: (request: ChangeRequest) => ChangeRequest,
): ChangeRequest[] {
  const target = findRequest(requests, changeId);
  if (target.status !== 'PENDING') {
    throw new ChangeRequestDecidedError(changeId, target.status, action);
  }
  return requests.map((r) => (r.changeId === changeId ? fn(r) : r));
}
