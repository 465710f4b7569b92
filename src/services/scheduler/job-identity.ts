/**
 * Deterministic job ids: the same (user, run time) always yields the same
 * id, so re-scheduling an identical slot collides with the existing job
 * instead of creating a duplicate.
 */

const JOB_ID_PREFIX = 'email_process';

/** `email_process_{userId}_{epochSeconds}`; sub-second precision is dropped. */
export function generateJobId(userId: number, runAt: Date): string {
  return `${JOB_ID_PREFIX}_${userId}_${Math.floor(runAt.getTime() / 1000)}`;
}
