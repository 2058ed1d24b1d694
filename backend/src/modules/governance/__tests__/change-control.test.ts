/**
 * Change Freeze / Change Request Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../../common/errors.js';
import { activateFreeze, assertNotFrozen, createFreezeWindow, deactivateFreeze, isFrozen } from '../change-freeze.gate.js';
import {
  approveChangeRequest,
  countChangeRequests,
  markImplemented,
  rejectChangeRequest,
  submitChangeRequest,
} from '../change-request.register.js';
import { ChangeFrozenError, ChangeRequestDecidedError, ChangeRequestNotFoundError } from '../governance.errors.js';
import type { FreezeWindow } from '../governance.types.js';

const FROM = Date.parse('2025-06-01T00:00:00.000Z');
const UNTIL = Date.parse('2025-06-08T00:00:00.000Z');

const window: FreezeWindow = {
  active: true,
  activatedAt: '2025-06-01T00:00:00.000Z',
  until: '2025-06-08T00:00:00.000Z',
  activatedBy: 'ops',
  reason: 'month end',
};

describe('isFrozen', () => {
  it('should be frozen on [activatedAt, until)', () => {
    expect(isFrozen(window, FROM - 1)).toBe(false);
    expect(isFrozen(window, FROM)).toBe(true);
    expect(isFrozen(window, UNTIL - 1)).toBe(true);
    expect(isFrozen(window, UNTIL)).toBe(false);
  });

  it('should never freeze when inactive or unbounded', () => {
    expect(isFrozen({ ...window, active: false }, FROM)).toBe(false);
    expect(isFrozen({ ...window, until: null }, FROM)).toBe(false);
    expect(isFrozen(createFreezeWindow(), FROM)).toBe(false);
  });

  it('should name the end of the freeze in the error', () => {
    try {
      assertNotFrozen(window, FROM, 'publish');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ChangeFrozenError);
      if (err instanceof ChangeFrozenError) {
        expect(err.statusCode).toBe(423);
        expect(err.until).toBe('2025-06-08T00:00:00.000Z');
      }
    }
  });
});

describe('activateFreeze / deactivateFreeze', () => {
  it('should open a window from now', () => {
    const frozen = activateFreeze({ until: '2025-06-08T00:00:00Z', actor: 'ops', reason: 'audit' }, FROM);
    expect(frozen).toEqual({ ...window, reason: 'audit' });
  });

  it('should refuse an end in the past', () => {
    expect(() => activateFreeze({ until: '2025-05-01T00:00:00Z', actor: 'ops', reason: '' }, FROM)).toThrow(
      ValidationError,
    );
    expect(() => activateFreeze({ until: 'tomorrow', actor: 'ops', reason: '' }, FROM)).toThrow(ValidationError);
  });

  it('should clear the window', () => {
    expect(isFrozen(deactivateFreeze(), FROM)).toBe(false);
  });
});

describe('change requests', () => {
  const open = createFreezeWindow();
  const input = { title: 'Add region column', changeType: 'MINOR' as const, requestedBy: 'alice' };

  it('should admit a request outside a freeze', () => {
    const { requests, request } = submitChangeRequest([], input, open, FROM);

    expect(requests).toEqual([request]);
    expect(request).toMatchObject({
      title: 'Add region column',
      status: 'PENDING',
      requestedAt: '2025-06-01T00:00:00.000Z',
      impactsProduction: false,
    });
  });

  it('should refuse submission and approval while frozen', () => {
    expect(() => submitChangeRequest([], input, window, FROM)).toThrow(ChangeFrozenError);

    const { requests, request } = submitChangeRequest([], input, open, FROM - 1000);
    expect(() => approveChangeRequest(requests, request.changeId, 'bob', window, FROM)).toThrow(ChangeFrozenError);
  });

  it('should allow rejection while frozen', () => {
    const { requests, request } = submitChangeRequest([], input, open, FROM - 1000);
    const rejected = rejectChangeRequest(requests, request.changeId, 'bob', 'not now', FROM);

    expect(rejected[0]).toMatchObject({ status: 'REJECTED', decidedBy: 'bob', rejectionReason: 'not now' });
  });

  it('should decide a request only once', () => {
    const { requests, request } = submitChangeRequest([], input, open, FROM);
    const approved = approveChangeRequest(requests, request.changeId, 'bob', open, FROM);

    expect(() => rejectChangeRequest(approved, request.changeId, 'bob', 'changed mind', FROM)).toThrow(
      ChangeRequestDecidedError,
    );
    expect(() => approveChangeRequest(requests, 'missing', 'bob', open, FROM)).toThrow(ChangeRequestNotFoundError);
  });

  it('should implement approved requests only', () => {
    const first = submitChangeRequest([], input, open, FROM);
    const second = submitChangeRequest(first.requests, { ...input, title: 'Drop legacy tab' }, open, FROM);
    let requests = approveChangeRequest(second.requests, first.request.changeId, 'bob', open, FROM);

    expect(() => markImplemented(requests, second.request.changeId, FROM)).toThrow(ChangeRequestDecidedError);

    requests = markImplemented(requests, first.request.changeId, UNTIL);
    expect(requests[0].implementedAt).toBe('2025-06-08T00:00:00.000Z');
    expect(() => markImplemented(requests, first.request.changeId, UNTIL)).toThrow(ChangeRequestDecidedError);
    expect(countChangeRequests(requests)).toEqual({ total: 2, pending: 1, approved: 1, rejected: 0, implemented: 1 });
  });
});
