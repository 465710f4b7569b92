/**
 * @fileoverview Scheduler exports: job identity, next-run rules, the
 * pending-job inspector, the scheduler itself and its interval driver.
 */

export * from './types.js';
export { generateJobId } from './job-identity.js';
export { calculateNextRun, pollingIntervalMs } from './next-run.js';
export { QueueJobStatusInspector, readPayloadUserId } from './inspector.js';
export { EmailScheduler, type EmailSchedulerDeps } from './scheduler.js';
export { createIntervalPoller, type Poller } from './poller.js';
