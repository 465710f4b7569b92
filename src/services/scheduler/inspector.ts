/**
 * @fileoverview Queue-backed pending-job inspector.
 *
 * Scans the queue's queued, scheduled and running collections for
 * processing jobs whose payload targets a given user. Read-only; each probe
 * is a single bounded listing of the collection's current contents.
 */

import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import { errorMessage } from '../../utils/errors.js';
import type { JobCollection, JobQueue, QueuedJobSnapshot } from '../job-queue/types.js';
import { PROCESS_USER_EMAILS_JOB } from '../job-queue/types.js';
import type { JobStatusInspector, UserJobStatus } from './types.js';

/**
 * Read the target user from a job payload, or undefined when the payload
 * does not look like one of ours.
 */
export function readPayloadUserId(data: unknown): number | undefined {
  if (typeof data !== 'object' || data === null || !('userId' in data)) {
    return undefined;
  }
  const { userId } = data;
  if (typeof userId === 'number' && Number.isFinite(userId)) return userId;
  if (typeof userId === 'string' && /^\d+$/.test(userId)) return Number(userId);
  return undefined;
}

export class QueueJobStatusInspector implements JobStatusInspector {
  private readonly logger: AppLogger;

  constructor(
    private readonly queue: JobQueue,
    logger?: AppLogger
  ) {
    this.logger = logger ?? createLogger({ domain: 'job-inspector' });
  }

  isUserJobRunning(userId: number): Promise<boolean> {
    return this.hasMatchingJob('running', userId);
  }

  isUserJobScheduled(userId: number): Promise<boolean> {
    return this.hasMatchingJob('scheduled', userId);
  }

  isUserJobQueued(userId: number): Promise<boolean> {
    return this.hasMatchingJob('queued', userId);
  }

  async hasUserJobPending(userId: number): Promise<boolean> {
    return (
      (await this.isUserJobRunning(userId)) ||
      (await this.isUserJobScheduled(userId)) ||
      (await this.isUserJobQueued(userId))
    );
  }

  async getUserJobStatus(userId: number): Promise<UserJobStatus> {
    const [running, scheduled, queued] = await Promise.all([
      this.isUserJobRunning(userId),
      this.isUserJobScheduled(userId),
      this.isUserJobQueued(userId),
    ]);
    return { userId, running, scheduled, queued, hasAnyPending: running || scheduled || queued };
  }

  /** A backend error answers false for this collection; it never throws. */
  private async hasMatchingJob(collection: JobCollection, userId: number): Promise<boolean> {
    let jobs: QueuedJobSnapshot[];
    try {
      jobs = await this.queue.listJobs(collection);
    } catch (error) {
      this.logger.error('job_collection_unreadable', {
        collection,
        userId,
        queue: this.queue.name,
        error: errorMessage(error),
      });
      return false;
    }

    return jobs.some((job) => this.matches(job, collection, userId));
  }

  private matches(job: QueuedJobSnapshot, collection: JobCollection, userId: number): boolean {
    if (job.name !== PROCESS_USER_EMAILS_JOB) {
      return false;
    }
    const target = readPayloadUserId(job.data);
    if (target === undefined) {
      this.logger.debug('job_payload_unreadable', { collection, jobId: job.id });
      return false;
    }
    return target === userId;
  }
}
