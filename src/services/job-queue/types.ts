/**
 * @fileoverview Job queue abstraction used by the scheduler and worker.
 *
 * The scheduler only needs to enqueue delayed one-shot jobs and to list
 * what is pending; everything backend-specific stays behind this interface.
 */

/** Logical queue that carries per-user email processing jobs. */
export const EMAIL_PROCESSING_QUEUE = 'email_processing';

/** Job name the worker dispatches to the standalone processor. */
export const PROCESS_USER_EMAILS_JOB = 'process_user_emails';

/** Non-terminal collections a job can sit in. */
export type JobCollection = 'queued' | 'scheduled' | 'running';

export type JobStatus = 'queued' | 'scheduled' | 'started' | 'finished' | 'failed' | 'not_found';

export interface EmailJobPayload {
  userId: number;
}

/**
 * A job as read back from the backend. `data` is whatever the backend
 * holds, so consumers must validate it before trusting its shape.
 */
export interface QueuedJobSnapshot {
  id: string;
  name: string;
  data: unknown;
}

export interface JobQueue {
  readonly name: string;
  /**
   * Enqueue a one-shot job to run at `runAt` (immediately if in the past).
   * Re-using an existing `jobId` leaves the existing job untouched.
   */
  enqueueAt(runAt: Date, payload: EmailJobPayload, jobId: string): Promise<void>;
  listJobs(collection: JobCollection): Promise<QueuedJobSnapshot[]>;
  getJobStatus(jobId: string): Promise<JobStatus>;
  close(): Promise<void>;
}
