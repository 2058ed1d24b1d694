/**
 * REPORT SCHEDULE — ROUTES
 *
 * Errors are thrown, not caught here: the app-level error handler maps
 * AppError subclasses to status codes.
 */

import { FastifyInstance } from 'fastify';
import { ValidationError } from '../../common/errors.js';
import type { ScheduleRunner } from './schedule.runner.js';
import type { ScheduleService, ScheduleStatusAction } from './schedule.service.js';
import {
  OUTPUT_FORMATS,
  SCHEDULE_FREQUENCIES,
  SCHEDULE_STATUSES,
  RegisterScheduleInput,
  ScheduleSpecInput,
  ScheduleStatus,
} from './schedule.types.js';
import { WEEKDAYS } from '../../common/calendar.js';

const STATUS_ACTIONS: readonly ScheduleStatusAction[] = ['pause', 'resume', 'disable', 'complete'];

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const specSchema = {
  type: 'object',
  required: ['frequency'],
  properties: {
    frequency: { type: 'string', enum: [...SCHEDULE_FREQUENCIES] },
    intervalDays: { type: ['integer', 'null'] },
    daysOfWeek: { type: 'array', items: { type: 'string', enum: [...WEEKDAYS] } },
    dayOfMonth: { anyOf: [{ type: 'null' }, { const: 'LAST' }, { type: 'integer' }] },
    cronExpression: { type: ['string', 'null'] },
    startDate: { type: ['string', 'null'] },
    endDate: { type: ['string', 'null'] },
    timeOfDay: { type: ['string', 'null'] },
    status: { type: 'string', enum: [...SCHEDULE_STATUSES] },
  },
} as const;

const runNowSchema = {
  type: ['object', 'null'],
  properties: {
    date: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
    backfill: { type: 'boolean' },
  },
} as const;

const registerSchema = {
  body: {
    type: 'object',
    required: ['reportId', 'name', 'createdBy', 'spec'],
    properties: {
      reportId: { type: 'string', minLength: 1 },
      name: { type: 'string', minLength: 1 },
      outputFormat: { type: 'string', enum: [...OUTPUT_FORMATS] },
      createdBy: { type: 'string', minLength: 1 },
      spec: specSchema,
    },
  },
} as const;

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export interface ScheduleRouteDeps {
  service: ScheduleService;
  runner: ScheduleRunner;
}

export async function registerScheduleRoutes(app: FastifyInstance, deps: ScheduleRouteDeps): Promise<void> {
  const { service, runner } = deps;
  const prefix = '/api/schedules';

  // POST /api/schedules — register a schedule
  app.post<{ Body: RegisterScheduleInput }>(prefix, { schema: registerSchema }, async (req, reply) => {
    const schedule = await service.register(req.body);
    return reply.code(201).send({ ok: true, data: schedule });
  });

  // GET /api/schedules — list, optionally by report / status
  app.get<{ Querystring: { reportId?: string; status?: ScheduleStatus } }>(prefix, async (req) => {
    const { reportId, status } = req.query;
    if (status !== undefined && !SCHEDULE_STATUSES.includes(status)) {
      throw new ValidationError(`Unknown status: ${status}`);
    }
    const schedules = await service.list({ reportId, status });
    return { ok: true, data: schedules, total: schedules.length };
  });

  // GET /api/schedules/due — schedules due on a date
  app.get<{ Querystring: { date?: string } }>(`${prefix}/due`, async (req) => {
    const schedules = await service.listDue(req.query.date);
    return { ok: true, data: schedules, total: schedules.length };
  });

  // POST /api/schedules/run-now — run the daily tick immediately
  app.post<{ Body: { date?: string; backfill?: boolean } | null | undefined }>(
    `${prefix}/run-now`,
    { schema: { body: runNowSchema } },
    async (req, reply) => {
      const result = await runner.tick(req.body?.date, { backfill: req.body?.backfill });
      if (!result) {
        return reply.code(409).send({ ok: false, error: 'TICK_RUNNING', message: 'A schedule tick is already running' });
      }
      return { ok: true, data: result };
    },
  );

  // GET /api/schedules/runner/status
  app.get(`${prefix}/runner/status`, async () => {
    return { ok: true, data: runner.getStatus() };
  });

  // GET /api/schedules/:scheduleId
  app.get<{ Params: { scheduleId: string } }>(`${prefix}/:scheduleId`, async (req) => {
    return { ok: true, data: await service.get(req.params.scheduleId) };
  });

  // GET /api/schedules/:scheduleId/due?date=YYYY-MM-DD
  app.get<{ Params: { scheduleId: string }; Querystring: { date?: string } }>(
    `${prefix}/:scheduleId/due`,
    async (req) => {
      return { ok: true, data: await service.isDue(req.params.scheduleId, req.query.date) };
    },
  );

  // GET /api/schedules/:scheduleId/next?from=YYYY-MM-DD — next due day on or after `from`
  app.get<{ Params: { scheduleId: string }; Querystring: { from?: string } }>(
    `${prefix}/:scheduleId/next`,
    async (req) => {
      return { ok: true, data: await service.nextRun(req.params.scheduleId, req.query.from) };
    },
  );

  // PUT /api/schedules/:scheduleId/spec — replace the spec wholesale
  app.put<{ Params: { scheduleId: string }; Body: ScheduleSpecInput }>(
    `${prefix}/:scheduleId/spec`,
    { schema: { body: specSchema } },
    async (req) => {
      return { ok: true, data: await service.replaceSpec(req.params.scheduleId, req.body) };
    },
  );

  // POST /api/schedules/:scheduleId/(pause|resume|disable|complete)
  app.post<{ Params: { scheduleId: string; action: string } }>(`${prefix}/:scheduleId/:action`, async (req) => {
    const action = STATUS_ACTIONS.find((a) => a === req.params.action);
    if (!action) {
      throw new ValidationError(`Unknown schedule action: ${req.params.action}`);
    }
    return { ok: true, data: await service.changeStatus(req.params.scheduleId, action) };
  });

  app.log.info('[Schedule] Routes registered');
}

export default registerScheduleRoutes;
