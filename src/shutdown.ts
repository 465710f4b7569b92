/**
 * @fileoverview Graceful shutdown for the server process.
 *
 * Order matters: the scheduler tick stops first, then the HTTP server
 * drains in-flight requests, and only then are the queue connection and
 * the database closed underneath it.
 */

import type { AppLogger } from './utils/observability/index.js';
import { errorMessage } from './utils/errors.js';

export interface ShutdownDeps {
  poller: { stop(): Promise<void> };
  server: { close(callback: (error?: Error) => void): unknown };
  closeQueue: () => Promise<void>;
  closeDatabase: () => void;
  logger: AppLogger;
  exit?: (code: number) => void;
  forceExitAfterMs?: number;
}

export function createShutdown(deps: ShutdownDeps): (signal: string) => Promise<void> {
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let isShuttingDown = false;

  return async (signal: string) => {
    if (isShuttingDown) {
      return;
    }
    isShuttingDown = true;
    deps.logger.info('shutdown_signal_received', { signal });

    const forceExitTimer = setTimeout(() => {
      deps.logger.warn('shutdown_forced');
      exit(1);
    }, deps.forceExitAfterMs ?? 10000);

    // Waits for an in-flight scheduling pass
    await deps.poller.stop();

    await new Promise<void>((resolve) => {
      deps.server.close((error) => {
        if (error) {
          deps.logger.warn('server_close_failed', { error: error.message });
        }
        resolve();
      });
    });
    deps.logger.info('server_closed');

    try {
      await deps.closeQueue();
    } catch (error) {
      deps.logger.error('queue_close_failed', { error: errorMessage(error) });
    }
    deps.closeDatabase();

    clearTimeout(forceExitTimer);
    exit(0);
  };
}
