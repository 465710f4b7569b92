/**
 * @fileoverview Email processing scheduler.
 *
 * On each tick, enqueues at most one processing job per enabled user:
 * users with a pending job are skipped, everyone else gets a delayed
 * one-shot job at their next due time. One user's failure never stops the
 * loop over the others.
 */

import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import { errorDetails, errorMessage } from '../../utils/errors.js';
import type { EmailConfigStore, EmailConfiguration } from '../email-config/types.js';
import type { JobQueue } from '../job-queue/types.js';
import { generateJobId } from './job-identity.js';
import { calculateNextRun } from './next-run.js';
import type { JobStatusInspector, ScheduleOutcome, ScheduleSummary, TriggerResult } from './types.js';

export interface EmailSchedulerDeps {
  configStore: EmailConfigStore;
  queue: JobQueue;
  inspector: JobStatusInspector;
  logger?: AppLogger;
  now?: () => Date;
}

export class EmailScheduler {
  private readonly configStore: EmailConfigStore;
  private readonly queue: JobQueue;
  private readonly inspector: JobStatusInspector;
  private readonly logger: AppLogger;
  private readonly now: () => Date;

  constructor(deps: EmailSchedulerDeps) {
    this.configStore = deps.configStore;
    this.queue = deps.queue;
    this.inspector = deps.inspector;
    this.logger = deps.logger ?? createLogger({ domain: 'email-scheduler' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Schedule every enabled user. A failing configuration query is logged
   * and schedules nothing.
   */
  async scheduleJobs(): Promise<ScheduleSummary> {
    const summary: ScheduleSummary = { considered: 0, scheduled: 0, alreadyPending: 0, failed: 0 };

    let configs: EmailConfiguration[];
    try {
      configs = await this.configStore.listEnabled();
    } catch (error) {
      this.logger.error('schedule_jobs_query_failed', { error: errorMessage(error) });
      return summary;
    }

    for (const config of configs) {
      const outcome = await this.scheduleUserJob(config);
      summary.considered++;
      if (outcome.status === 'scheduled') summary.scheduled++;
      if (outcome.status === 'already_pending') summary.alreadyPending++;
      if (outcome.status === 'failed') summary.failed++;
    }

    this.logger.info('schedule_jobs_complete', { ...summary });
    return summary;
  }

  /** Never throws; failures come back as `{ status: 'failed' }`. */
  async scheduleUserJob(config: EmailConfiguration): Promise<ScheduleOutcome> {
    const { userId } = config;
    try {
      if (await this.inspector.hasUserJobPending(userId)) {
        this.logger.info('user_job_already_pending', { userId });
        return { status: 'already_pending' };
      }

      const runAt = calculateNextRun(config, this.now());
      if (Number.isNaN(runAt.getTime())) {
        this.logger.warn('user_job_no_run_time', { userId });
        return { status: 'no_run_time' };
      }

      const jobId = generateJobId(userId, runAt);
      await this.queue.enqueueAt(runAt, { userId }, jobId);

      this.logger.info('user_job_scheduled', {
        jobId,
        userId,
        emailAddress: config.emailAddress,
        runAt: runAt.toISOString(),
        queue: this.queue.name,
      });
      return { status: 'scheduled', jobId, runAt };
    } catch (error) {
      this.logger.error('user_job_schedule_failed', { userId, ...errorDetails(error) });
      return { status: 'failed', error: errorMessage(error) };
    }
  }

  /**
   * Enqueue an immediate run for one user, unless they are not configured
   * or already have a pending job. Queue errors propagate to the caller.
   */
  async triggerUserJob(userId: number): Promise<TriggerResult> {
    const config = await this.configStore.get(userId);
    if (!config || !config.isEnabled) {
      return { queued: false, reason: 'not_configured' };
    }

    const status = await this.inspector.getUserJobStatus(userId);
    if (status.hasAnyPending) {
      return { queued: false, reason: 'already_pending', status };
    }

    const runAt = this.now();
    const jobId = generateJobId(userId, runAt);
    await this.queue.enqueueAt(runAt, { userId }, jobId);
    this.logger.info('user_job_triggered', { jobId, userId });
    return { queued: true, jobId };
  }
}
