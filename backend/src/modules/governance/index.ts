/**
 * REPORT GOVERNANCE MODULE
 */

export * from './governance.types.js';
export * from './governance.errors.js';
export * from './lifecycle.machine.js';
export * from './approval.workflow.js';
export * from './version.ledger.js';
export * from './change-freeze.gate.js';
export * from './quality.gate.js';
export * from './change-request.register.js';
export * from './release.register.js';
export * from './policy.register.js';
export * from './governance.aggregate.js';
export * from './governance.audit.js';
export * from './governance.repository.js';
export * from './governance.service.js';
export { default as registerGovernanceRoutes } from './governance.routes.js';
