/**
 * @fileoverview Server entry point.
 *
 * Serves the health and automation routes, and runs the scheduler tick
 * that enqueues per-user email processing jobs. The jobs themselves run in
 * the worker process (see worker.ts).
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();

import { createApp } from './app.js';
import { createShutdown } from './shutdown.js';
import { openDatabase } from './services/database.js';
import { SqliteEmailConfigStore } from './services/email-config/index.js';
import { createJobQueue } from './services/job-queue/index.js';
import {
  EmailScheduler,
  QueueJobStatusInspector,
  createIntervalPoller,
} from './services/scheduler/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const logger = createLogger({ domain: 'server' });

if (!config.databasePath) {
  throw new Error('DATABASE_PATH is required');
}
const db = openDatabase(config.databasePath);
const configStore = new SqliteEmailConfigStore(db);
const queueHandle = createJobQueue(config.queue.provider, config.queue.redisUrl);
const inspector = new QueueJobStatusInspector(queueHandle.queue);
const scheduler = new EmailScheduler({ configStore, queue: queueHandle.queue, inspector });
const poller = createIntervalPoller(() => scheduler.scheduleJobs(), config.scheduler.intervalMs);

const app = createApp({
  configStore,
  scheduler,
  inspector,
  apiToken: config.automationApiToken,
});

const server = app.listen(config.port, () => {
  logger.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    queueProvider: config.queue.provider,
    schedulerEnabled: config.scheduler.enabled,
    hasAutomationApiToken: !!config.automationApiToken,
  });

  if (config.scheduler.enabled) {
    poller.start();
  }
});

const shutdown = createShutdown({
  poller,
  server,
  closeQueue: () => queueHandle.close(),
  closeDatabase: () => db.close(),
  logger,
});

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
