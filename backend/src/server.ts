/**
 * Report Control Plane - Entrypoint
 *
 * Run: npm run build && npm start
 */

import 'dotenv/config';
import { createApp, registerAppRoutes } from './app.js';
import { env } from './config/env.js';
import { ensureIndexes } from './db/indexes.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import {
  GovernanceService,
  InMemoryAuditSink,
  InMemoryGovernanceRepository,
  MongoGovernanceRepository,
  createLoggerAuditSink,
  fanOutAuditSink,
  DEFAULT_GOVERNANCE_OPTIONS,
} from './modules/governance/index.js';
import {
  InMemoryScheduleRepository,
  MongoScheduleRepository,
  ScheduleRunner,
  ScheduleService,
  createLoggingDispatcher,
  cronParserDelegate,
} from './modules/schedule/index.js';

async function main() {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  Report Control Plane');
  console.log('═══════════════════════════════════════════════════════════════');

  const app = createApp();
  const log = (module: string) => app.log.child({ module });

  const useMongo = env.STORAGE === 'mongo';
  if (useMongo) {
    console.log('[Boot] Connecting to MongoDB...');
    await connectMongo(env.MONGO_URL);
    await ensureIndexes();
  } else {
    console.log('[Boot] STORAGE=memory, nothing is persisted');
  }

  const auditTrail = new InMemoryAuditSink();
  const governance = new GovernanceService({
    repository: useMongo ? new MongoGovernanceRepository() : new InMemoryGovernanceRepository(),
    audit: fanOutAuditSink(createLoggerAuditSink(log('Audit')), auditTrail),
    logger: log('Governance'),
    defaults: { ...DEFAULT_GOVERNANCE_OPTIONS, qualityThreshold: env.QUALITY_THRESHOLD },
  });

  const schedules = new ScheduleService({
    repository: useMongo ? new MongoScheduleRepository() : new InMemoryScheduleRepository(),
    cron: cronParserDelegate,
    logger: log('Schedule'),
  });

  const runner = new ScheduleRunner({
    service: schedules,
    dispatcher: createLoggingDispatcher(log('Dispatch')),
    cron: cronParserDelegate,
    tickCron: env.SCHEDULER_TICK_CRON,
    logger: log('ScheduleRunner'),
  });

  registerAppRoutes(app, { governance, auditTrail, schedules, runner });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Boot] Received ${signal}, shutting down...`);
    runner.stop();
    await app.close();
    if (useMongo) await disconnectMongo();
    console.log('[Boot] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    if (env.SCHEDULER_ENABLED) {
      runner.start();
    }
    console.log(`[Boot] ✅ Listening on ${env.HOST}:${env.PORT} (storage=${env.STORAGE})`);
  } catch (err) {
    console.error('[Boot] Fatal error:', err);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
