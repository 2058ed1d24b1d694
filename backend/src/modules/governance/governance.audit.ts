/**
 * REPORT GOVERNANCE — AUDIT SINKS
 *
 * `record` is fire-and-forget. A sink that throws is logged by the
 * service and never undoes a saved mutation.
 */

import type { Logger } from '../../common/host.deps.js';
import type { AuditSink, GovernanceEvent } from './governance.types.js';

export function createLoggerAuditSink(logger: Logger): AuditSink {
  return {
    record: (event) => {
      logger.info(
        {
          reportId: event.reportId,
          type: event.type,
          actor: event.actor,
          ts: event.ts,
          ...(event.transition ? { from: event.transition.from, to: event.transition.to } : {}),
          ...(event.meta ?? {}),
        },
        'Governance audit',
      );
    },
  };
}

/**
 * Keeps the last `limit` events in memory, newest last.
 */
export class InMemoryAuditSink implements AuditSink {
  private events: GovernanceEvent[] = [];

  constructor(private readonly limit = 1000) {}

  record(event: GovernanceEvent): void {
    this.events.push(event);
    if (this.events.length > this.limit) {
      this.events.splice(0, this.events.length - this.limit);
    }
  }

  list(reportId?: string): GovernanceEvent[] {
    return reportId === undefined ? [...this.events] : this.events.filter((e) => e.reportId === reportId);
  }
}

export function fanOutAuditSink(...sinks: AuditSink[]): AuditSink {
  return {
    record: (event) => {
      for (const sink of sinks) sink.record(event);
    },
  };
}
