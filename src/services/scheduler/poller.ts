/**
 * @fileoverview Interval driver for the scheduler tick.
 *
 * Runs immediately on start, then every `intervalMs`. A tick that is still
 * running when the next one fires causes that next one to be skipped.
 */

import { createLogger, createRunId, withLogContext } from '../../utils/observability/index.js';
import { errorMessage } from '../../utils/errors.js';

const logger = createLogger({ domain: 'poller' });

export interface Poller {
  start(): void;
  /** Stop the loop and wait for any in-flight tick to complete */
  stop(): Promise<void>;
  isRunning(): boolean;
}

export function createIntervalPoller(
  tick: () => Promise<unknown>,
  intervalMs: number = 300000
): Poller {
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  function runTickSafe(): void {
    if (inFlight) {
      logger.info('poller_skip_overlap');
      return;
    }

    inFlight = withLogContext({ runId: createRunId('tick') }, async () => {
      try {
        await tick();
      } catch (error) {
        logger.error('poller_error', { error: errorMessage(error) });
      }
    }).finally(() => {
      inFlight = null;
    });
  }

  return {
    start(): void {
      if (intervalId !== null) {
        logger.warn('poller_already_running');
        return;
      }

      logger.info('poller_started', { intervalMs });
      runTickSafe();
      intervalId = setInterval(runTickSafe, intervalMs);
    },

    async stop(): Promise<void> {
      if (intervalId === null) {
        return;
      }

      clearInterval(intervalId);
      intervalId = null;

      if (inFlight) {
        await inFlight;
      }
      logger.info('poller_stopped');
    },

    isRunning(): boolean {
      return intervalId !== null;
    },
  };
}
