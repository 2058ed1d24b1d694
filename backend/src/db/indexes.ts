/**
 * Database Indexes
 * Run on startup, after connectMongo
 */

import { errorMessage } from '../common/errors.js';
import { mongoose } from './mongoose.js';

export async function ensureIndexes(): Promise<void> {
  const db = mongoose.connection.db;
  if (!db) {
    console.log('[DB] No database connection, skipping indexes');
    return;
  }

  // Governance indexes
  try {
    const governanceCol = db.collection('report_governance');
    await governanceCol.createIndex({ reportId: 1 }, { unique: true });
    await governanceCol.createIndex({ currentStage: 1, owner: 1 });
    await governanceCol.createIndex({ 'options.level': 1 });
    console.log('[DB] report_governance indexes created');
  } catch (err) {
    console.log('[DB] report_governance indexes already exist or error:', errorMessage(err));
  }

  // Schedule indexes
  try {
    const schedulesCol = db.collection('report_schedules');
    await schedulesCol.createIndex({ scheduleId: 1 }, { unique: true });
    await schedulesCol.createIndex({ reportId: 1 });
    await schedulesCol.createIndex({ 'spec.status': 1, reportId: 1 });
    console.log('[DB] report_schedules indexes created');
  } catch (err) {
    console.log('[DB] report_schedules indexes already exist or error:', errorMessage(err));
  }

  console.log('[DB] Indexes ensured');
}
