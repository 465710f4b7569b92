/**
 * @fileoverview BullMQ-backed job queue.
 *
 * Delayed jobs map to BullMQ's `delayed` set, ready jobs to `waiting`
 * (plus `prioritized`) and running jobs to `active`.
 */

import { Queue, type JobType } from 'bullmq';
import { Redis } from 'ioredis';
import type { EmailJobPayload, JobCollection, JobQueue, JobStatus, QueuedJobSnapshot } from './types.js';
import { EMAIL_PROCESSING_QUEUE, PROCESS_USER_EMAILS_JOB } from './types.js';

const COLLECTION_TYPES: Record<JobCollection, JobType[]> = {
  queued: ['waiting', 'prioritized'],
  scheduled: ['delayed'],
  running: ['active'],
};

/**
 * Shared Redis connection for Queue and Worker.
 * BullMQ requires `maxRetriesPerRequest: null` for blocking commands.
 */
export function createRedisConnection(url: string): Redis {
  return new Redis(url, { maxRetriesPerRequest: null });
}

export class BullMqJobQueue implements JobQueue {
  private readonly queue: Queue<EmailJobPayload>;

  constructor(
    connection: Redis,
    readonly name: string = EMAIL_PROCESSING_QUEUE,
    private readonly now: () => number = Date.now
  ) {
    this.queue = new Queue<EmailJobPayload>(name, {
      connection,
      defaultJobOptions: {
        removeOnComplete: { age: 24 * 3600 },
        removeOnFail: { age: 7 * 24 * 3600 },
      },
    });
  }

  async enqueueAt(runAt: Date, payload: EmailJobPayload, jobId: string): Promise<void> {
    const delay = Math.max(0, runAt.getTime() - this.now());
    await this.queue.add(PROCESS_USER_EMAILS_JOB, payload, { jobId, delay });
  }

  async listJobs(collection: JobCollection): Promise<QueuedJobSnapshot[]> {
    const jobs = await this.queue.getJobs(COLLECTION_TYPES[collection]);
    // entries come back empty when a job is removed between listing and fetch
    return jobs
      .filter((job) => job !== undefined && job !== null)
      .map((job) => ({ id: job.id ?? '', name: job.name, data: job.data }));
  }

  async getJobStatus(jobId: string): Promise<JobStatus> {
    const state = await this.queue.getJobState(jobId);
    switch (state) {
      case 'waiting':
      case 'prioritized':
      case 'waiting-children':
        return 'queued';
      case 'delayed':
        return 'scheduled';
      case 'active':
        return 'started';
      case 'completed':
        return 'finished';
      case 'failed':
        return 'failed';
      default:
        return 'not_found';
    }
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
