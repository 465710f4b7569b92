/**
 * @fileoverview Scheduler types.
 */

/** Pending-job probes for one user; the scheduler's only dedup source. */
export interface JobStatusInspector {
  isUserJobRunning(userId: number): Promise<boolean>;
  isUserJobScheduled(userId: number): Promise<boolean>;
  isUserJobQueued(userId: number): Promise<boolean>;
  /** True if any of the three probes is true. */
  hasUserJobPending(userId: number): Promise<boolean>;
  getUserJobStatus(userId: number): Promise<UserJobStatus>;
}

export interface UserJobStatus {
  userId: number;
  running: boolean;
  scheduled: boolean;
  queued: boolean;
  hasAnyPending: boolean;
}

export type ScheduleOutcome =
  | { status: 'scheduled'; jobId: string; runAt: Date }
  | { status: 'already_pending' }
  | { status: 'no_run_time' }
  | { status: 'failed'; error: string };

export interface ScheduleSummary {
  considered: number;
  scheduled: number;
  alreadyPending: number;
  failed: number;
}

export type TriggerResult =
  | { queued: true; jobId: string }
  | { queued: false; reason: 'not_configured' }
  | { queued: false; reason: 'already_pending'; status: UserJobStatus };
