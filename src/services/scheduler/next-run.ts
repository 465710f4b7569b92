/**
 * @fileoverview Next-run calculation for per-user inbox polling.
 */

import { AppError } from '../../utils/errors.js';
import type { EmailConfiguration } from '../email-config/types.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Unrecognised values (including '') poll hourly. */
export function pollingIntervalMs(pollingInterval: string): number {
  return pollingInterval.toLowerCase() === 'daily' ? DAY_MS : HOUR_MS;
}

/**
 * When the user's inbox is next due.
 *
 * Never-checked users and overdue users are due `now`. A null polling
 * interval on a user that has been checked before throws
 * INVALID_POLLING_INTERVAL rather than guessing a default.
 */
export function calculateNextRun(
  config: Pick<EmailConfiguration, 'userId' | 'lastCheckTime' | 'pollingInterval'>,
  now: Date = new Date()
): Date {
  if (config.lastCheckTime === null) {
    return now;
  }

  if (config.pollingInterval === null) {
    throw new AppError(
      `Polling interval is not set for user ${config.userId}`,
      'INVALID_POLLING_INTERVAL',
      false,
      { userId: config.userId }
    );
  }

  const dueAt = new Date(config.lastCheckTime.getTime() + pollingIntervalMs(config.pollingInterval));
  return dueAt.getTime() <= now.getTime() ? now : dueAt;
}
