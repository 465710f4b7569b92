/**
 * @fileoverview In-process job queue for tests and Redis-less local runs.
 *
 * Nothing executes jobs here; callers move them between states with
 * start/complete/fail to simulate a worker.
 */

import type { EmailJobPayload, JobCollection, JobQueue, JobStatus, QueuedJobSnapshot } from './types.js';
import { EMAIL_PROCESSING_QUEUE, PROCESS_USER_EMAILS_JOB } from './types.js';

interface MemoryJob {
  snapshot: QueuedJobSnapshot;
  runAt: Date;
  state: 'waiting' | 'running' | 'finished' | 'failed';
}

export class MemoryJobQueue implements JobQueue {
  private readonly jobs = new Map<string, MemoryJob>();

  constructor(
    readonly name: string = EMAIL_PROCESSING_QUEUE,
    private readonly now: () => Date = () => new Date()
  ) {}

  async enqueueAt(runAt: Date, payload: EmailJobPayload, jobId: string): Promise<void> {
    if (this.jobs.has(jobId)) return;
    this.jobs.set(jobId, {
      snapshot: { id: jobId, name: PROCESS_USER_EMAILS_JOB, data: { ...payload } },
      runAt,
      state: 'waiting',
    });
  }

  async listJobs(collection: JobCollection): Promise<QueuedJobSnapshot[]> {
    const result: QueuedJobSnapshot[] = [];
    for (const job of this.jobs.values()) {
      if (this.collectionOf(job) === collection) {
        result.push(job.snapshot);
      }
    }
    return result;
  }

  async getJobStatus(jobId: string): Promise<JobStatus> {
    const job = this.jobs.get(jobId);
    if (!job) return 'not_found';
    switch (job.state) {
      case 'running':
        return 'started';
      case 'finished':
        return 'finished';
      case 'failed':
        return 'failed';
      case 'waiting':
        return this.collectionOf(job) === 'scheduled' ? 'scheduled' : 'queued';
    }
  }

  async close(): Promise<void> {
    this.jobs.clear();
  }

  /**
   * Insert a job verbatim, bypassing payload typing. Lets tests model jobs
   * written by other producers or older releases.
   */
  insertRaw(snapshot: QueuedJobSnapshot, collection: JobCollection): void {
    const runAt = collection === 'scheduled' ? new Date(this.now().getTime() + 3600_000) : this.now();
    this.jobs.set(snapshot.id, {
      snapshot,
      runAt,
      state: collection === 'running' ? 'running' : 'waiting',
    });
  }

  start(jobId: string): void {
    this.transition(jobId, 'running');
  }

  complete(jobId: string): void {
    this.transition(jobId, 'finished');
  }

  fail(jobId: string): void {
    this.transition(jobId, 'failed');
  }

  /** Ids of every job ever enqueued and not yet closed, in insertion order. */
  jobIds(): string[] {
    return [...this.jobs.keys()];
  }

  private transition(jobId: string, state: MemoryJob['state']): void {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new Error(`Unknown job ${jobId}`);
    }
    job.state = state;
  }

  private collectionOf(job: MemoryJob): JobCollection | null {
    if (job.state === 'running') return 'running';
    if (job.state !== 'waiting') return null;
    return job.runAt.getTime() > this.now().getTime() ? 'scheduled' : 'queued';
  }
}
