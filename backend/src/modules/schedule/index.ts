/**
 * REPORT SCHEDULE MODULE
 */

export * from './schedule.types.js';
export * from './schedule.evaluator.js';
export * from './schedule.validation.js';
export * from './schedule.service.js';
export * from './schedule.runner.js';
export * from './schedule.repository.js';
export { CronParserDelegate, cronParserDelegate } from './cron.delegate.js';
export { default as registerScheduleRoutes } from './schedule.routes.js';
