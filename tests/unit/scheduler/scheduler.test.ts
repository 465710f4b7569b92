import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryJobQueue } from '../../../src/services/job-queue/memory.js';
import { EmailScheduler } from '../../../src/services/scheduler/scheduler.js';
import { QueueJobStatusInspector } from '../../../src/services/scheduler/inspector.js';
import { InMemoryEmailConfigStore, createRecordingLogger, makeConfig } from '../../helpers/fakes.js';

const HOUR = 60 * 60 * 1000;
const now = new Date('2025-01-15T10:00:00.000Z');

describe('EmailScheduler', () => {
  let configStore: InMemoryEmailConfigStore;
  let queue: MemoryJobQueue;
  let logger: ReturnType<typeof createRecordingLogger>;
  let scheduler: EmailScheduler;

  beforeEach(() => {
    configStore = new InMemoryEmailConfigStore();
    queue = new MemoryJobQueue('email_processing', () => now);
    logger = createRecordingLogger();
    scheduler = new EmailScheduler({
      configStore,
      queue,
      inspector: new QueueJobStatusInspector(queue, logger),
      logger,
      now: () => now,
    });
  });

  describe('scheduleJobs', () => {
    it('enqueues one immediate job for an overdue user', async () => {
      configStore.add(makeConfig({ userId: 42, lastCheckTime: new Date(now.getTime() - 3 * HOUR) }));

      const summary = await scheduler.scheduleJobs();

      expect(summary).toEqual({ considered: 1, scheduled: 1, alreadyPending: 0, failed: 0 });
      expect(queue.jobIds()).toEqual(['email_process_42_1736935200']);
      expect(await queue.listJobs('queued')).toEqual([
        { id: 'email_process_42_1736935200', name: 'process_user_emails', data: { userId: 42 } },
      ]);
      expect(logger.records).toContainEqual({
        level: 'info',
        event: 'user_job_scheduled',
        data: {
          jobId: 'email_process_42_1736935200',
          userId: 42,
          emailAddress: 'alice@example.com',
          runAt: '2025-01-15T10:00:00.000Z',
          queue: 'email_processing',
        },
      });
    });

    it('does not schedule a second job on the next tick', async () => {
      configStore.add(makeConfig({ userId: 42, lastCheckTime: new Date(now.getTime() - 3 * HOUR) }));

      await scheduler.scheduleJobs();
      const second = await scheduler.scheduleJobs();

      expect(second).toEqual({ considered: 1, scheduled: 0, alreadyPending: 1, failed: 0 });
      expect(queue.jobIds()).toHaveLength(1);
    });

    it('skips disabled users', async () => {
      configStore.add(makeConfig({ userId: 1, isEnabled: false }));
      configStore.add(makeConfig({ userId: 2 }));

      const summary = await scheduler.scheduleJobs();

      expect(summary.considered).toBe(1);
      expect(queue.jobIds()).toEqual(['email_process_2_1736935200']);
    });

    it('keeps going when one user fails', async () => {
      configStore.add(makeConfig({ userId: 1, pollingInterval: null, lastCheckTime: new Date(now.getTime() - HOUR) }));
      configStore.add(makeConfig({ userId: 2 }));

      const summary = await scheduler.scheduleJobs();

      expect(summary).toEqual({ considered: 2, scheduled: 1, alreadyPending: 0, failed: 1 });
      expect(queue.jobIds()).toEqual(['email_process_2_1736935200']);
      expect(logger.records).toContainEqual({
        level: 'error',
        event: 'user_job_schedule_failed',
        data: {
          userId: 1,
          error: 'Polling interval is not set for user 1',
          code: 'INVALID_POLLING_INTERVAL',
          recoverable: false,
          errorContext: { userId: 1 },
        },
      });
    });

    it('schedules nothing when the configuration query fails', async () => {
      vi.spyOn(configStore, 'listEnabled').mockRejectedValue(new Error('database is locked'));

      const summary = await scheduler.scheduleJobs();

      expect(summary).toEqual({ considered: 0, scheduled: 0, alreadyPending: 0, failed: 0 });
      expect(logger.records).toEqual([
        { level: 'error', event: 'schedule_jobs_query_failed', data: { error: 'database is locked' } },
      ]);
    });
  });

  describe('scheduleUserJob', () => {
    it('never enqueues for a user with a pending job', async () => {
      queue.insertRaw({ id: 'existing', name: 'process_user_emails', data: { userId: 42 } }, 'scheduled');
      const enqueueAt = vi.spyOn(queue, 'enqueueAt');

      const outcome = await scheduler.scheduleUserJob(makeConfig({ userId: 42 }));

      expect(outcome).toEqual({ status: 'already_pending' });
      expect(enqueueAt).not.toHaveBeenCalled();
    });

    it('delays the job until the user is next due', async () => {
      const lastCheckTime = new Date(now.getTime() - 30 * 60 * 1000);

      const outcome = await scheduler.scheduleUserJob(makeConfig({ userId: 42, lastCheckTime }));

      const runAt = new Date('2025-01-15T10:30:00.000Z');
      expect(outcome).toEqual({ status: 'scheduled', jobId: 'email_process_42_1736937000', runAt });
      expect(await queue.listJobs('scheduled')).toHaveLength(1);
      expect(await queue.listJobs('queued')).toHaveLength(0);
    });

    it('reports no_run_time when the next run cannot be computed', async () => {
      const outcome = await scheduler.scheduleUserJob(makeConfig({ userId: 42, lastCheckTime: new Date(Number.NaN) }));

      expect(outcome).toEqual({ status: 'no_run_time' });
      expect(queue.jobIds()).toEqual([]);
    });

    it('returns failed instead of throwing when the enqueue fails', async () => {
      vi.spyOn(queue, 'enqueueAt').mockRejectedValue(new Error('redis unavailable'));

      const outcome = await scheduler.scheduleUserJob(makeConfig({ userId: 42 }));

      expect(outcome).toEqual({ status: 'failed', error: 'redis unavailable' });
    });
  });

  describe('triggerUserJob', () => {
    it('refuses users without a configuration', async () => {
      expect(await scheduler.triggerUserJob(5)).toEqual({ queued: false, reason: 'not_configured' });
    });

    it('refuses disabled users', async () => {
      configStore.add(makeConfig({ userId: 5, isEnabled: false }));
      expect(await scheduler.triggerUserJob(5)).toEqual({ queued: false, reason: 'not_configured' });
    });

    it('reports the pending job status instead of enqueueing', async () => {
      configStore.add(makeConfig({ userId: 42 }));
      queue.insertRaw({ id: 'existing', name: 'process_user_emails', data: { userId: 42 } }, 'running');

      expect(await scheduler.triggerUserJob(42)).toEqual({
        queued: false,
        reason: 'already_pending',
        status: { userId: 42, running: true, scheduled: false, queued: false, hasAnyPending: true },
      });
      expect(queue.jobIds()).toEqual(['existing']);
    });

    it('enqueues an immediate job even when the user is not yet due', async () => {
      configStore.add(makeConfig({ userId: 42, lastCheckTime: new Date(now.getTime() - 10 * 60 * 1000) }));

      const result = await scheduler.triggerUserJob(42);

      expect(result).toEqual({ queued: true, jobId: 'email_process_42_1736935200' });
      expect(await queue.listJobs('queued')).toHaveLength(1);
    });
  });
});
