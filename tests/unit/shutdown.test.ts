/**
 * Unit tests for the server's graceful shutdown sequence.
 */

import { describe, expect, it, vi } from 'vitest';
import { createShutdown, type ShutdownDeps } from '../../src/shutdown.js';
import { createRecordingLogger } from '../helpers/fakes.js';

function harness(overrides: Partial<ShutdownDeps> = {}) {
  const order: string[] = [];
  const logger = createRecordingLogger();
  const deps: ShutdownDeps = {
    poller: {
      stop: async () => {
        order.push('poller');
      },
    },
    server: {
      close: (callback: (error?: Error) => void) => {
        order.push('server');
        callback();
      },
    },
    closeQueue: async () => {
      order.push('queue');
    },
    closeDatabase: () => {
      order.push('database');
    },
    exit: (code: number) => {
      order.push(`exit:${code}`);
    },
    logger,
    ...overrides,
  };
  return { order, logger, shutdown: createShutdown(deps) };
}

describe('createShutdown', () => {
  it('drains the HTTP server before closing the queue and the database', async () => {
    const { order, shutdown } = harness();

    await shutdown('SIGTERM');

    expect(order).toEqual(['poller', 'server', 'queue', 'database', 'exit:0']);
  });

  it('keeps the database open until in-flight requests finish', async () => {
    let finishRequests: ((error?: Error) => void) | null = null;
    const closeDatabase = vi.fn();
    const { shutdown } = harness({
      server: {
        close: (callback: (error?: Error) => void) => {
          finishRequests = callback;
        },
      },
      closeDatabase,
    });

    const pending = shutdown('SIGINT');
    const release = await vi.waitFor(() => {
      if (!finishRequests) throw new Error('server not closing yet');
      return finishRequests;
    });
    expect(closeDatabase).not.toHaveBeenCalled();

    release();
    await pending;
    expect(closeDatabase).toHaveBeenCalledTimes(1);
  });

  it('still closes the database when the queue fails to close', async () => {
    const { order, logger, shutdown } = harness({
      closeQueue: async () => {
        throw new Error('redis gone');
      },
    });

    await shutdown('SIGTERM');

    expect(order).toEqual(['poller', 'server', 'database', 'exit:0']);
    expect(logger.records).toContainEqual({ level: 'error', event: 'queue_close_failed', data: { error: 'redis gone' } });
  });

  it('runs once however many signals arrive', async () => {
    const { order, shutdown } = harness();

    await Promise.all([shutdown('SIGTERM'), shutdown('SIGINT')]);

    expect(order.filter((step) => step === 'exit:0')).toHaveLength(1);
  });
});
