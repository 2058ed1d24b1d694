/**
 * REPORT GOVERNANCE — ROUTES
 *
 * Policy errors (409/423/404) come from the service and are mapped by
 * the app-level error handler.
 */

import { FastifyInstance } from 'fastify';
import { ValidationError } from '../../common/errors.js';
import type { AddStepInput } from './approval.workflow.js';
import type { SubmitChangeInput } from './change-request.register.js';
import type { InMemoryAuditSink } from './governance.audit.js';
import type {
  CreateGovernanceInput,
  CreateVersionInput,
  TransitionStageInput,
} from './governance.aggregate.js';
import type { GovernanceService } from './governance.service.js';
import {
  CHANGE_TYPES,
  GOVERNANCE_LEVELS,
  LIFECYCLE_STAGES,
  LifecycleStage,
} from './governance.types.js';
import type { AddPolicyInput } from './policy.register.js';
import type { RecordCheckInput } from './quality.gate.js';
import type { PlanReleaseInput } from './release.register.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const actorBody = {
  type: 'object',
  required: ['actor'],
  properties: {
    actor: { type: 'string', minLength: 1 },
    comment: { type: ['string', 'null'] },
    reason: { type: 'string' },
  },
} as const;

const createSchema = {
  body: {
    type: 'object',
    required: ['reportId', 'reportName', 'owner', 'createdBy'],
    properties: {
      reportId: { type: 'string', minLength: 1 },
      reportName: { type: 'string', minLength: 1 },
      owner: { type: 'string', minLength: 1 },
      createdBy: { type: 'string', minLength: 1 },
      options: {
        type: 'object',
        properties: {
          level: { type: 'string', enum: [...GOVERNANCE_LEVELS] },
          approvalRequired: { type: 'boolean' },
          versionControl: { type: 'boolean' },
          qualityChecks: { type: 'boolean' },
          qualityThreshold: { type: 'number', minimum: 0, maximum: 1 },
        },
      },
    },
  },
} as const;

const transitionSchema = {
  body: {
    type: 'object',
    required: ['to', 'actor', 'reason'],
    properties: {
      to: { type: 'string', enum: [...LIFECYCLE_STAGES] },
      actor: { type: 'string', minLength: 1 },
      reason: { type: 'string' },
      deprecation: {
        type: 'object',
        properties: {
          reason: { type: 'string' },
          replacementReportId: { type: ['string', 'null'] },
          retirementDate: { type: ['string', 'null'] },
        },
      },
    },
  },
} as const;

const stepSchema = {
  body: {
    type: 'object',
    required: ['name', 'approverId', 'actor'],
    properties: {
      name: { type: 'string', minLength: 1 },
      approverId: { type: 'string', minLength: 1 },
      approverRole: { type: ['string', 'null'] },
      required: { type: 'boolean' },
      timeoutDays: { type: ['integer', 'null'], minimum: 1 },
      actor: { type: 'string', minLength: 1 },
    },
  },
} as const;

const versionSchema = {
  body: {
    type: 'object',
    required: ['changeType', 'description', 'actor'],
    properties: {
      changeType: { type: 'string', enum: [...CHANGE_TYPES] },
      description: { type: 'string' },
      actor: { type: 'string', minLength: 1 },
      stable: { type: 'boolean' },
    },
  },
} as const;

const checkSchema = {
  body: {
    type: 'object',
    required: ['name', 'checkType', 'passed', 'executedBy'],
    properties: {
      name: { type: 'string', minLength: 1 },
      checkType: { type: 'string', minLength: 1 },
      passed: { type: 'boolean' },
      severity: { type: 'string', enum: ['INFO', 'WARNING', 'CRITICAL'] },
      score: { type: 'number', minimum: 0, maximum: 1 },
      issues: { type: 'array', items: { type: 'string' } },
      executedBy: { type: 'string', minLength: 1 },
    },
  },
} as const;

const freezeSchema = {
  body: {
    type: 'object',
    required: ['until', 'actor', 'reason'],
    properties: {
      until: { type: 'string', minLength: 1 },
      actor: { type: 'string', minLength: 1 },
      reason: { type: 'string' },
    },
  },
} as const;

const changeSchema = {
  body: {
    type: 'object',
    required: ['title', 'changeType', 'requestedBy'],
    properties: {
      title: { type: 'string', minLength: 1 },
      description: { type: 'string' },
      changeType: { type: 'string', enum: [...CHANGE_TYPES] },
      requestedBy: { type: 'string', minLength: 1 },
      scheduledFor: { type: ['string', 'null'] },
      impactsProduction: { type: 'boolean' },
    },
  },
} as const;

const releaseSchema = {
  body: {
    type: 'object',
    required: ['name', 'versionNumber', 'actor'],
    properties: {
      name: { type: 'string', minLength: 1 },
      versionNumber: { type: 'string', minLength: 1 },
      scheduledAt: { type: ['string', 'null'] },
      actor: { type: 'string', minLength: 1 },
    },
  },
} as const;

const policySchema = {
  body: {
    type: 'object',
    required: ['name', 'policyType', 'actor'],
    properties: {
      name: { type: 'string', minLength: 1 },
      policyType: { type: 'string', minLength: 1 },
      description: { type: 'string' },
      enabled: { type: 'boolean' },
      mandatory: { type: 'boolean' },
      priority: { type: ['integer', 'null'] },
      condition: { type: ['string', 'null'] },
      action: { type: ['string', 'null'] },
      effectiveFrom: { type: ['string', 'null'] },
      effectiveUntil: { type: ['string', 'null'] },
      actor: { type: 'string', minLength: 1 },
    },
  },
} as const;

type ReportParams = { reportId: string };
type ActorBody = { actor: string; comment?: string | null; reason?: string };

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export interface GovernanceRouteDeps {
  service: GovernanceService;
  /** recent events, served read-only */
  auditTrail: InMemoryAuditSink;
}

export async function registerGovernanceRoutes(app: FastifyInstance, deps: GovernanceRouteDeps): Promise<void> {
  const { service, auditTrail } = deps;
  const prefix = '/api/governance';

  // POST /api/governance — register a report under governance
  app.post<{ Body: CreateGovernanceInput }>(prefix, { schema: createSchema }, async (req, reply) => {
    const governance = await service.create(req.body);
    return reply.code(201).send({ ok: true, data: governance });
  });

  // GET /api/governance?stage=&owner=
  app.get<{ Querystring: { stage?: LifecycleStage; owner?: string } }>(prefix, async (req) => {
    const { stage, owner } = req.query;
    if (stage !== undefined && !LIFECYCLE_STAGES.includes(stage)) {
      throw new ValidationError(`Unknown stage: ${stage}`);
    }
    const governances = await service.list({ stage, owner });
    return { ok: true, data: governances, total: governances.length };
  });

  // GET /api/governance/stats
  app.get(`${prefix}/stats`, async () => {
    return { ok: true, data: await service.getStatistics() };
  });

  // GET /api/governance/:reportId
  app.get<{ Params: ReportParams }>(`${prefix}/:reportId`, async (req) => {
    return { ok: true, data: await service.get(req.params.reportId) };
  });

  // GET /api/governance/:reportId/overview
  app.get<{ Params: ReportParams }>(`${prefix}/:reportId/overview`, async (req) => {
    return { ok: true, data: await service.overview(req.params.reportId) };
  });

  // GET /api/governance/:reportId/readiness
  app.get<{ Params: ReportParams }>(`${prefix}/:reportId/readiness`, async (req) => {
    return { ok: true, data: await service.readiness(req.params.reportId) };
  });

  // GET /api/governance/:reportId/quality
  app.get<{ Params: ReportParams }>(`${prefix}/:reportId/quality`, async (req) => {
    return { ok: true, data: await service.quality(req.params.reportId) };
  });

  // GET /api/governance/:reportId/audit
  app.get<{ Params: ReportParams }>(`${prefix}/:reportId/audit`, async (req) => {
    await service.get(req.params.reportId);
    const events = auditTrail.list(req.params.reportId);
    return { ok: true, data: events, total: events.length };
  });

  // ─────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────

  app.post<{ Params: ReportParams; Body: TransitionStageInput }>(
    `${prefix}/:reportId/transition`,
    { schema: transitionSchema },
    async (req) => {
      return { ok: true, data: await service.transition(req.params.reportId, req.body) };
    },
  );

  // ─────────────────────────────────────────────────────────────
  // Approval workflow
  // ─────────────────────────────────────────────────────────────

  app.post<{ Params: ReportParams; Body: AddStepInput & { actor: string } }>(
    `${prefix}/:reportId/steps`,
    { schema: stepSchema },
    async (req, reply) => {
      const governance = await service.addApprovalStep(req.params.reportId, req.body);
      return reply.code(201).send({ ok: true, data: governance });
    },
  );

  app.post<{ Params: ReportParams & { stepId: string; verdict: string }; Body: ActorBody }>(
    `${prefix}/:reportId/steps/:stepId/:verdict`,
    { schema: { body: actorBody } },
    async (req) => {
      const { reportId, stepId, verdict } = req.params;
      if (verdict !== 'approve' && verdict !== 'reject') {
        throw new ValidationError(`Unknown step verdict: ${verdict}`);
      }
      const governance = await service.decideApprovalStep(reportId, verdict === 'approve' ? 'APPROVE' : 'REJECT', {
        stepId,
        actor: req.body.actor,
        comment: req.body.comment ?? null,
      });
      return { ok: true, data: governance };
    },
  );

  // ─────────────────────────────────────────────────────────────
  // Versions / quality
  // ─────────────────────────────────────────────────────────────

  app.post<{ Params: ReportParams; Body: CreateVersionInput }>(
    `${prefix}/:reportId/versions`,
    { schema: versionSchema },
    async (req, reply) => {
      const governance = await service.createVersion(req.params.reportId, req.body);
      return reply.code(201).send({ ok: true, data: governance });
    },
  );

  app.post<{ Params: ReportParams; Body: Omit<RecordCheckInput, 'executedAt'> }>(
    `${prefix}/:reportId/checks`,
    { schema: checkSchema },
    async (req, reply) => {
      const governance = await service.recordQualityCheck(req.params.reportId, req.body);
      return reply.code(201).send({ ok: true, data: governance });
    },
  );

  // ─────────────────────────────────────────────────────────────
  // Freeze
  // ─────────────────────────────────────────────────────────────

  app.post<{ Params: ReportParams; Body: { until: string; actor: string; reason: string } }>(
    `${prefix}/:reportId/freeze`,
    { schema: freezeSchema },
    async (req) => {
      return { ok: true, data: await service.activateFreeze(req.params.reportId, req.body) };
    },
  );

  app.delete<{ Params: ReportParams; Querystring: { actor?: string } }>(`${prefix}/:reportId/freeze`, async (req) => {
    const actor = req.query.actor;
    if (!actor) {
      throw new ValidationError('actor is required');
    }
    return { ok: true, data: await service.deactivateFreeze(req.params.reportId, actor) };
  });

  // ─────────────────────────────────────────────────────────────
  // Change requests
  // ─────────────────────────────────────────────────────────────

  app.post<{ Params: ReportParams; Body: SubmitChangeInput }>(
    `${prefix}/:reportId/changes`,
    { schema: changeSchema },
    async (req, reply) => {
      const governance = await service.submitChangeRequest(req.params.reportId, req.body);
      return reply.code(201).send({ ok: true, data: governance });
    },
  );

  app.post<{ Params: ReportParams & { changeId: string; action: string }; Body: ActorBody }>(
    `${prefix}/:reportId/changes/:changeId/:action`,
    { schema: { body: actorBody } },
    async (req) => {
      const { reportId, changeId, action } = req.params;
      const { actor, reason } = req.body;

      switch (action) {
        case 'approve':
          return { ok: true, data: await service.decideChangeRequest(reportId, 'APPROVE', { changeId, actor }) };
        case 'reject':
          return { ok: true, data: await service.decideChangeRequest(reportId, 'REJECT', { changeId, actor, reason }) };
        case 'implement':
          return { ok: true, data: await service.implementChangeRequest(reportId, { changeId, actor }) };
        default:
          throw new ValidationError(`Unknown change request action: ${action}`);
      }
    },
  );

  // ─────────────────────────────────────────────────────────────
  // Releases
  // ─────────────────────────────────────────────────────────────

  app.post<{ Params: ReportParams; Body: PlanReleaseInput & { actor: string } }>(
    `${prefix}/:reportId/releases`,
    { schema: releaseSchema },
    async (req, reply) => {
      const governance = await service.planRelease(req.params.reportId, req.body);
      return reply.code(201).send({ ok: true, data: governance });
    },
  );

  app.post<{ Params: ReportParams & { releaseId: string; action: string }; Body: ActorBody }>(
    `${prefix}/:reportId/releases/:releaseId/:action`,
    { schema: { body: actorBody } },
    async (req) => {
      const { reportId, releaseId, action } = req.params;
      const input = { releaseId, actor: req.body.actor };

      switch (action) {
        case 'publish':
          return { ok: true, data: await service.markReleased(reportId, input) };
        case 'cancel':
          return { ok: true, data: await service.cancelRelease(reportId, input) };
        case 'rollback':
          return { ok: true, data: await service.rollbackRelease(reportId, input) };
        default:
          throw new ValidationError(`Unknown release action: ${action}`);
      }
    },
  );

  // ─────────────────────────────────────────────────────────────
  // Policies
  // ─────────────────────────────────────────────────────────────

  app.post<{ Params: ReportParams; Body: AddPolicyInput & { actor: string } }>(
    `${prefix}/:reportId/policies`,
    { schema: policySchema },
    async (req, reply) => {
      const governance = await service.addPolicy(req.params.reportId, req.body);
      return reply.code(201).send({ ok: true, data: governance });
    },
  );

  app.log.info('[Governance] Routes registered');
}

export default registerGovernanceRoutes;
