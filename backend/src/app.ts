import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { isAppError } from './common/errors.js';
import { registerGovernanceRoutes, type GovernanceService, type InMemoryAuditSink } from './modules/governance/index.js';
import { registerScheduleRoutes, type ScheduleRunner, type ScheduleService } from './modules/schedule/index.js';

export interface AppDeps {
  governance: GovernanceService;
  auditTrail: InMemoryAuditSink;
  schedules: ScheduleService;
  runner: ScheduleRunner;
}

export interface AppOptions {
  /** false silences the request logger (tests) */
  logger?: boolean;
}

/**
 * Fastify instance with CORS and the error envelopes, no routes yet.
 * Services are built against its `log` before routes are attached.
 */
export function createApp(options: AppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: options.logger === false ? false : { level: env.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (isAppError(err)) {
      if (err.statusCode >= 500) {
        app.log.error({ code: err.code, details: err.details }, err.message);
      } else {
        app.log.warn({ code: err.code }, err.message);
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    app.log.error(err);
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  return app;
}

export function registerAppRoutes(app: FastifyInstance, deps: AppDeps): void {
  app.get('/api/health', async () => ({
    ok: true,
    scheduler: deps.runner.getStatus().started,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerGovernanceRoutes(fastify, { service: deps.governance, auditTrail: deps.auditTrail });
    await registerScheduleRoutes(fastify, { service: deps.schedules, runner: deps.runner });
  });
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps, options: AppOptions = {}): FastifyInstance {
  const app = createApp(options);
  registerAppRoutes(app, deps);
  return app;
}
