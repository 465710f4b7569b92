/**
 * @fileoverview Queue worker entry point.
 *
 * Consumes the email_processing queue and runs one standalone processing
 * pass per job. A pass that reports `status: 'error'` fails the job so it
 * is visible in BullMQ's failed set; skipped and partially failed passes
 * complete normally.
 */

import { Worker, type Job } from 'bullmq';
import config, { validateConfig } from './config.js';

validateConfig();

import { processUserEmailsStandalone, type ProcessingResult } from './services/email-processor/index.js';
import { ExchangeRateCache } from './services/extractor/index.js';
import { EMAIL_PROCESSING_QUEUE, PROCESS_USER_EMAILS_JOB, createRedisConnection } from './services/job-queue/index.js';
import { readPayloadUserId } from './services/scheduler/inspector.js';
import { createLogger, createRunId, initObservability, withLogContext } from './utils/observability/index.js';
import { errorMessage } from './utils/errors.js';

initObservability();

const logger = createLogger({ domain: 'worker' });

if (config.queue.provider !== 'bullmq') {
  logger.error('worker_requires_bullmq', { provider: config.queue.provider });
  process.exit(1);
}

const connection = createRedisConnection(config.queue.redisUrl);
const exchangeRateCache = new ExchangeRateCache(config.exchangeRates.ttlMinutes * 60_000);

async function handleJob(job: Job): Promise<ProcessingResult> {
  if (job.name !== PROCESS_USER_EMAILS_JOB) {
    throw new Error(`Unsupported job name: ${job.name}`);
  }
  const userId = readPayloadUserId(job.data);
  if (userId === undefined) {
    throw new Error('Job payload has no userId');
  }

  const jobId = job.id ?? 'unknown';
  return withLogContext({ runId: createRunId('job'), jobId, userId }, async () => {
    const result = await processUserEmailsStandalone(
      userId,
      { id: jobId, name: job.name, attempt: job.attemptsMade + 1 },
      { exchangeRateCache }
    );
    logger.info('job_finished', { status: result.status });
    if (result.status === 'error') {
      throw new Error(result.error);
    }
    return result;
  });
}

const worker = new Worker(EMAIL_PROCESSING_QUEUE, handleJob, {
  connection,
  concurrency: config.queue.workerConcurrency,
});

worker.on('failed', (job, error) => {
  logger.error('job_failed', { jobId: job?.id, error: error.message });
});

worker.on('error', (error) => {
  logger.error('worker_error', { error: error.message });
});

logger.info('worker_started', {
  queue: EMAIL_PROCESSING_QUEUE,
  concurrency: config.queue.workerConcurrency,
});

let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });
  try {
    // waits for active jobs to finish
    await worker.close();
    await connection.quit();
  } catch (error) {
    logger.error('worker_close_failed', { error: errorMessage(error) });
  }
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
